// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runctl/run-worker/interceptor/control-point-interceptor`
 * Purpose: Worker-side gate consulted at each control point (run start, collection, before/after item, run end).
 * Scope: Reads flags, waits out pauses, decides skips and keeps status in step with the lifecycle. Does not execute items.
 * Invariants:
 *   - Per NO_MIDFLIGHT_ABORT: cancellation only prevents future items; a started item always completes
 *   - Per READS_DEFAULT_TO_NO_SIGNAL: StoreUnavailableError on a read logs a warning and behaves as "no flag set"
 *   - Per CONTROL_PLANE_NEVER_ABORTS_WORK: status write failures are logged, never thrown
 *   - Per CANCEL_UNBLOCKS_PAUSE: a pause wait also ends when `cancelled` becomes true
 *   - Uncontrolled mode (no run id or no store): every control point is a no-op; exactly one warning at construction
 *   - Illegal lifecycle transitions are logged and not written
 * Side-effects: IO (via injected ControlStorePort), logging
 * Links: packages/control-core/src/lifecycle.ts, packages/run-worker/src/runner/controlled-run.ts
 * @public
 */

import {
  CONTROL_FLAGS,
  type ControlStorePort,
  canTransition,
  isStoreUnavailableError,
  type LoggerLike,
  readFlag,
  type RunId,
  type RunStatus,
  terminalStatusFor,
} from "@runctl/control-core";

import type { RunIdResolution } from "../run-id";

export interface WorkItem {
  readonly id: string;
}

export type SkipReason = "cancelled";

export type ControlPoint =
  | "run-start"
  | "collection"
  | "before-item"
  | "after-item"
  | "run-end";

export interface CollectedItem<TItem extends WorkItem> {
  readonly item: TItem;
  /** Set when the run was already cancelled at collection time */
  readonly skip: SkipReason | null;
}

export type ItemDecision =
  | { readonly action: "execute"; readonly pausedMs: number }
  | { readonly action: "skip"; readonly reason: SkipReason };

export interface ControlPointInterceptorDeps {
  /** null when the worker has no store wired (uncontrolled) */
  store: ControlStorePort | null;
  run: RunIdResolution;
  logger: LoggerLike;
  /** Poll interval for pause waits on polling backends */
  pausePollIntervalMs?: number | undefined;
}

interface ControlBinding {
  readonly store: ControlStorePort;
  readonly runId: RunId;
}

function describeUncontrolled(run: RunIdResolution, hasStore: boolean): string {
  switch (run.kind) {
    case "missing":
      return "no run id on the command line or in the environment";
    case "invalid":
      return `invalid run id from ${run.source}: ${JSON.stringify(run.raw)}`;
    case "resolved":
      return hasStore ? "" : "no control store configured";
  }
}

export class ControlPointInterceptor {
  private readonly binding: ControlBinding | null;
  private readonly logger: LoggerLike;
  private readonly pausePollIntervalMs: number | undefined;

  constructor(deps: ControlPointInterceptorDeps) {
    this.logger =
      deps.logger.child?.({ component: "control-points" }) ?? deps.logger;
    this.pausePollIntervalMs = deps.pausePollIntervalMs;

    if (deps.run.kind === "resolved" && deps.store) {
      this.binding = { store: deps.store, runId: deps.run.runId };
    } else {
      this.binding = null;
      this.logger.warn(
        { reason: describeUncontrolled(deps.run, deps.store !== null) },
        "Run id not resolved; running in uncontrolled mode"
      );
    }
  }

  get controlled(): boolean {
    return this.binding !== null;
  }

  get runId(): RunId | null {
    return this.binding?.runId ?? null;
  }

  async onRunStart(): Promise<void> {
    await this.transition("RUNNING", "run-start");
  }

  /**
   * Marks every item skipped when the run is already cancelled.
   * Items are never dropped, so reports can tell "skipped" from "never discovered".
   */
  async onCollect<TItem extends WorkItem>(
    items: readonly TItem[]
  ): Promise<CollectedItem<TItem>[]> {
    const cancelled = await this.readControlFlag(
      CONTROL_FLAGS.cancelled,
      "collection"
    );
    if (cancelled) {
      this.logger.info(
        { runId: this.runId, count: items.length },
        "Run cancelled before start; marking all items skipped"
      );
    }
    return items.map((item) => ({
      item,
      skip: cancelled ? "cancelled" : null,
    }));
  }

  async beforeItem(item: WorkItem): Promise<ItemDecision> {
    if (await this.readControlFlag(CONTROL_FLAGS.cancelled, "before-item")) {
      this.logger.info(
        { runId: this.runId, itemId: item.id },
        "Run cancelled; skipping item"
      );
      return { action: "skip", reason: "cancelled" };
    }

    if (!(await this.readControlFlag(CONTROL_FLAGS.paused, "before-item"))) {
      return { action: "execute", pausedMs: 0 };
    }

    const pausedMs = await this.waitWhilePaused(item);
    if (await this.readControlFlag(CONTROL_FLAGS.cancelled, "before-item")) {
      this.logger.info(
        { runId: this.runId, itemId: item.id, pausedMs },
        "Run cancelled while paused; skipping item"
      );
      return { action: "skip", reason: "cancelled" };
    }
    return { action: "execute", pausedMs };
  }

  /** Informational: the item that just ran is never undone. */
  async afterItem(item: WorkItem): Promise<{ cancelDetected: boolean }> {
    const cancelDetected = await this.readControlFlag(
      CONTROL_FLAGS.cancelled,
      "after-item"
    );
    if (cancelDetected) {
      this.logger.info(
        { runId: this.runId, itemId: item.id },
        "Cancellation detected after item completed"
      );
    }
    return { cancelDetected };
  }

  /**
   * Records COMPLETED/FAILED from the aggregate outcome.
   * Cancellation-skipped items do not count as failures.
   */
  async onRunEnd(outcome: { failed: boolean }): Promise<RunStatus> {
    const status = terminalStatusFor(outcome);
    await this.transition(status, "run-end");
    return status;
  }

  private async waitWhilePaused(item: WorkItem): Promise<number> {
    const startedAt = performance.now();
    if (!this.binding) {
      return 0;
    }
    const { store, runId } = this.binding;

    this.logger.info({ runId, itemId: item.id }, "Run paused; waiting for resume");
    try {
      await store.waitForFlag(runId, CONTROL_FLAGS.paused, {
        until: (flags) =>
          !readFlag(flags, CONTROL_FLAGS.paused) ||
          readFlag(flags, CONTROL_FLAGS.cancelled),
        timeoutMs: null,
        pollIntervalMs: this.pausePollIntervalMs,
      });
    } catch (error) {
      if (!isStoreUnavailableError(error)) {
        throw error;
      }
      this.logger.warn(
        { runId, itemId: item.id, err: error },
        "Control store unavailable during pause; proceeding"
      );
    }

    const pausedMs = Math.round(performance.now() - startedAt);
    this.logger.info({ runId, itemId: item.id, pausedMs }, "Pause wait ended");
    return pausedMs;
  }

  private async readControlFlag(
    flag: string,
    controlPoint: ControlPoint
  ): Promise<boolean> {
    if (!this.binding) {
      return false;
    }
    const { store, runId } = this.binding;
    try {
      return await store.checkFlag(runId, flag);
    } catch (error) {
      if (!isStoreUnavailableError(error)) {
        throw error;
      }
      this.logger.warn(
        { runId, flag, controlPoint, err: error },
        "Control store unavailable; assuming no control signal"
      );
      return false;
    }
  }

  private async transition(
    to: RunStatus,
    controlPoint: ControlPoint
  ): Promise<void> {
    if (!this.binding) {
      return;
    }
    const { store, runId } = this.binding;
    try {
      const current = await store.getStatus(runId);
      if (!canTransition(current, to)) {
        this.logger.warn(
          { runId, from: current, to, controlPoint },
          "Illegal status transition; status left unchanged"
        );
        return;
      }
      await store.setStatus(runId, to);
      this.logger.info({ runId, status: to, controlPoint }, "Run status updated");
    } catch (error) {
      if (!isStoreUnavailableError(error)) {
        throw error;
      }
      this.logger.error(
        { runId, status: to, controlPoint, err: error },
        "Control store unavailable; run status not recorded"
      );
    }
  }
}
