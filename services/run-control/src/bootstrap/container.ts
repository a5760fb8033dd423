// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runctl/run-control-service/bootstrap/container`
 * Purpose: Composition root — wires the configured ControlStore backend to the port.
 * Scope: All backend construction lives here. Returns services typed against the port.
 * Invariants:
 * - Only file that imports concrete backends (@runctl/control-store)
 * - The store's lifetime is owned by the caller (close() on shutdown)
 * Side-effects: none until the store is used
 * Links: services/run-control/src/bootstrap/env.ts
 * @internal
 */

import {
  type ControlStorePort,
  type LoggerLike,
  RunController,
} from "@runctl/control-core";
import { FileControlStore, MemoryControlStore } from "@runctl/control-store";

import type { Env } from "./env.js";

export interface ServiceContainer {
  store: ControlStorePort;
  controller: RunController;
  logger: LoggerLike;
}

export function createControlStore(config: Env): ControlStorePort {
  switch (config.RUN_CONTROL_BACKEND) {
    case "memory":
      return new MemoryControlStore();
    case "file":
      return new FileControlStore({
        directory: config.RUN_CONTROL_DIR,
        pollIntervalMs: config.RUN_CONTROL_POLL_INTERVAL_MS,
        lock: { timeoutMs: config.RUN_CONTROL_LOCK_TIMEOUT_MS },
      });
  }
}

export function createContainer(
  config: Env,
  logger: LoggerLike,
  store: ControlStorePort = createControlStore(config)
): ServiceContainer {
  return {
    store,
    controller: new RunController({
      store,
      logger: logger.child?.({ component: "run-controller" }) ?? logger,
      pollIntervalMs: config.RUN_CONTROL_POLL_INTERVAL_MS,
    }),
    logger,
  };
}
