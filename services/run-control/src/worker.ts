// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runctl/run-control-service/worker`
 * Purpose: Bootstrap for worker processes that want run control around their items.
 * Scope: Resolves the run id, builds store + interceptor, executes the run, closes what it opened. Does not define items.
 * Invariants:
 *   - Run id from argv (`--run-id`) wins over RUN_ID
 *   - Without a resolvable run id no store is opened and the run proceeds uncontrolled
 *   - An injected store is never closed here (caller owns it)
 * Side-effects: IO (control store)
 * Links: packages/run-worker/src/runner/controlled-run.ts
 * @public
 */

import type { ControlStorePort, LoggerLike } from "@runctl/control-core";
import {
  ControlPointInterceptor,
  type ExecuteItem,
  executeControlledRun,
  type RunReport,
  resolveRunId,
  type WorkItem,
} from "@runctl/run-worker";

import { createControlStore } from "./bootstrap/container.js";
import type { Env } from "./bootstrap/env.js";

export interface ControlledWorkerParams<TItem extends WorkItem> {
  config: Env;
  argv: readonly string[];
  logger: LoggerLike;
  items: readonly TItem[];
  execute: ExecuteItem<TItem>;
  concurrency?: number | undefined;
  /** Injected store (embedding/tests). Defaults to the configured backend. */
  store?: ControlStorePort | undefined;
}

export async function runControlledWorker<TItem extends WorkItem>(
  params: ControlledWorkerParams<TItem>
): Promise<RunReport> {
  const { config, logger } = params;
  const run = resolveRunId({
    argv: params.argv,
    env: { RUN_ID: config.RUN_ID },
  });

  const ownedStore =
    params.store === undefined && run.kind === "resolved"
      ? createControlStore(config)
      : null;
  const store = params.store ?? ownedStore;

  const interceptor = new ControlPointInterceptor({
    store,
    run,
    logger,
    pausePollIntervalMs: config.RUN_CONTROL_POLL_INTERVAL_MS,
  });

  try {
    return await executeControlledRun({
      interceptor,
      items: params.items,
      execute: params.execute,
      logger,
      concurrency: params.concurrency,
    });
  } finally {
    await ownedStore?.close();
  }
}
