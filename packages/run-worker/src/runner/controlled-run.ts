// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runctl/run-worker/runner/controlled-run`
 * Purpose: Drives a run's work items through the control points and builds the run report.
 * Scope: Ordering, concurrency and correlation scoping around injected item execution. Does not define what an item computes.
 * Invariants:
 *   - Every input item appears in the report, in input order
 *   - Each executed item runs inside its own item context with a fresh correlation id
 *   - An item failure is recorded and the run continues; run status is FAILED iff any item failed
 *   - concurrency > 1 runs items on a bounded queue; item contexts stay isolated
 *   - A concurrency that is not a positive integer (NaN, 0, 2.5) runs items one at a time
 * Side-effects: whatever `execute` does; status writes via the interceptor
 * Links: packages/run-worker/src/interceptor/control-point-interceptor.ts
 * @public
 */

import type { LoggerLike, RunStatus } from "@runctl/control-core";
import PQueue from "p-queue";

import {
  generateCorrelationId,
  runWithItemContext,
  runWithRunContext,
} from "../context/run-context";
import type {
  CollectedItem,
  ControlPointInterceptor,
  SkipReason,
  WorkItem,
} from "../interceptor/control-point-interceptor";

export type ItemStatus = "passed" | "failed" | "skipped";

export type SkipStage = "collection" | "before-item";

export interface ItemReport {
  readonly id: string;
  readonly status: ItemStatus;
  readonly skipReason: SkipReason | null;
  readonly skipStage: SkipStage | null;
  /** null for skipped items */
  readonly correlationId: string | null;
  readonly pausedMs: number;
  readonly durationMs: number;
  readonly error: string | null;
}

export interface RunReport {
  readonly runId: string | null;
  readonly runCorrelationId: string;
  readonly status: RunStatus;
  readonly items: readonly ItemReport[];
  /** Id of the first item after which cancellation was observed */
  readonly cancelDetectedAfter: string | null;
  readonly startedAt: string;
  readonly finishedAt: string;
}

export type ExecuteItem<TItem extends WorkItem> = (
  item: TItem,
  ctx: { readonly correlationId: string; readonly runId: string | null }
) => Promise<void>;

export interface ControlledRunParams<TItem extends WorkItem> {
  interceptor: ControlPointInterceptor;
  items: readonly TItem[];
  execute: ExecuteItem<TItem>;
  logger: LoggerLike;
  /** Default 1 (sequential) */
  concurrency?: number | undefined;
}

function skipped(
  id: string,
  reason: SkipReason,
  stage: SkipStage
): ItemReport {
  return {
    id,
    status: "skipped",
    skipReason: reason,
    skipStage: stage,
    correlationId: null,
    pausedMs: 0,
    durationMs: 0,
    error: null,
  };
}

export async function executeControlledRun<TItem extends WorkItem>(
  params: ControlledRunParams<TItem>
): Promise<RunReport> {
  const { interceptor, execute, logger } = params;
  const runId = interceptor.runId;
  const runCorrelationId = runId ?? generateCorrelationId();

  return runWithRunContext(runCorrelationId, async () => {
    const startedAt = new Date().toISOString();
    await interceptor.onRunStart();

    const collected = await interceptor.onCollect(params.items);
    const reports = new Map<number, ItemReport>();
    let cancelDetectedAfter: string | null = null;

    const runOne = async (
      entry: CollectedItem<TItem>,
      index: number
    ): Promise<void> => {
      const { item } = entry;
      if (entry.skip) {
        reports.set(index, skipped(item.id, entry.skip, "collection"));
        return;
      }

      const decision = await interceptor.beforeItem(item);
      if (decision.action === "skip") {
        reports.set(index, skipped(item.id, decision.reason, "before-item"));
        return;
      }

      const correlationId = generateCorrelationId();
      const itemStartedAt = performance.now();
      const error = await runWithItemContext(correlationId, async () => {
        try {
          await execute(item, { correlationId, runId });
          return null;
        } catch (err) {
          logger.error({ itemId: item.id, err }, "Work item failed");
          return err instanceof Error ? err.message : String(err);
        }
      });

      reports.set(index, {
        id: item.id,
        status: error === null ? "passed" : "failed",
        skipReason: null,
        skipStage: null,
        correlationId,
        pausedMs: decision.pausedMs,
        durationMs: Math.round(performance.now() - itemStartedAt),
        error,
      });

      const { cancelDetected } = await interceptor.afterItem(item);
      if (cancelDetected && cancelDetectedAfter === null) {
        cancelDetectedAfter = item.id;
      }
    };

    const requested = params.concurrency ?? 1;
    const concurrency =
      Number.isInteger(requested) && requested >= 1 ? requested : 1;
    if (concurrency === 1) {
      for (const [index, entry] of collected.entries()) {
        await runOne(entry, index);
      }
    } else {
      const queue = new PQueue({ concurrency });
      await Promise.all(
        collected.map((entry, index) => queue.add(() => runOne(entry, index)))
      );
    }

    const items = collected.map((entry, index) => {
      const report = reports.get(index);
      if (!report) {
        throw new Error(`No report recorded for item ${entry.item.id}`);
      }
      return report;
    });
    const failed = items.some((report) => report.status === "failed");
    const status = await interceptor.onRunEnd({ failed });

    const summary = {
      runId,
      status,
      passed: items.filter((r) => r.status === "passed").length,
      failed: items.filter((r) => r.status === "failed").length,
      skipped: items.filter((r) => r.status === "skipped").length,
    };
    logger.info(summary, "Run finished");

    return {
      runId,
      runCorrelationId,
      status,
      items,
      cancelDetectedAfter,
      startedAt,
      finishedAt: new Date().toISOString(),
    };
  });
}
