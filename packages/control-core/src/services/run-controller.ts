// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runctl/control-core/services/run-controller`
 * Purpose: Orchestrator-side control operations (create, pause, resume, cancel, status, gc).
 * Scope: Translates orchestrator intents into ControlStorePort writes. Does not start worker processes.
 * Invariants:
 *   - Per ORCHESTRATOR_FAILS_LOUD: store errors propagate; a cancel request is never dropped silently
 *   - Per WORKER_NEVER_DELETES: only this service calls deleteRun
 *   - Control requests on a run with no record throw RunNotFoundError
 *   - createRun throws RunAlreadyExistsError when the id already has a status
 * Side-effects: IO (via injected store)
 * Links: packages/control-core/src/ports/control-store.port.ts, services/run-control/src/cli.ts
 * @public
 */

import { randomUUID } from "node:crypto";

import { assertTransition, isTerminalStatus } from "../lifecycle";
import type { LoggerLike } from "../logger";
import type { ControlStorePort } from "../ports";
import { type RunId, toRunId } from "../run-id";
import { CONTROL_FLAGS, type RunSnapshot, type RunStatus } from "../types";
import { pollUntil } from "../wait";

export class RunAlreadyExistsError extends Error {
  constructor(public readonly runId: RunId) {
    super(`Run already exists: ${runId}`);
    this.name = "RunAlreadyExistsError";
  }
}

export class RunNotFoundError extends Error {
  constructor(public readonly runId: RunId) {
    super(`Run not found: ${runId}`);
    this.name = "RunNotFoundError";
  }
}

export function isRunAlreadyExistsError(
  error: unknown
): error is RunAlreadyExistsError {
  return error instanceof Error && error.name === "RunAlreadyExistsError";
}

export function isRunNotFoundError(error: unknown): error is RunNotFoundError {
  return error instanceof Error && error.name === "RunNotFoundError";
}

export interface RunControllerDeps {
  store: ControlStorePort;
  logger?: LoggerLike | undefined;
  /** Returns epoch ms. Defaults to Date.now. */
  now?: (() => number) | undefined;
  /** Poll interval for awaitTerminal. */
  pollIntervalMs?: number | undefined;
}

export class RunController {
  private readonly store: ControlStorePort;
  private readonly logger: LoggerLike | undefined;
  private readonly now: () => number;
  private readonly pollIntervalMs: number | undefined;

  constructor(deps: RunControllerDeps) {
    this.store = deps.store;
    this.logger = deps.logger;
    this.now = deps.now ?? Date.now;
    this.pollIntervalMs = deps.pollIntervalMs;
  }

  /** Writes PENDING for a new run. Generates a UUID when no id is given. */
  async createRun(rawRunId?: string): Promise<RunId> {
    const runId = toRunId(rawRunId ?? randomUUID());
    const current = await this.store.getStatus(runId);
    if (current !== null) {
      throw new RunAlreadyExistsError(runId);
    }
    assertTransition(runId, current, "PENDING");
    await this.store.setStatus(runId, "PENDING");
    this.logger?.info({ runId }, "run created");
    return runId;
  }

  async requestCancel(runId: RunId): Promise<void> {
    await this.requireRun(runId);
    await this.store.setFlag(runId, CONTROL_FLAGS.cancelled, true);
    this.logger?.info({ runId }, "cancel requested");
  }

  async requestPause(runId: RunId): Promise<void> {
    await this.requireRun(runId);
    await this.store.setFlag(runId, CONTROL_FLAGS.paused, true);
    this.logger?.info({ runId }, "pause requested");
  }

  async requestResume(runId: RunId): Promise<void> {
    await this.requireRun(runId);
    await this.store.setFlag(runId, CONTROL_FLAGS.paused, false);
    this.logger?.info({ runId }, "resume requested");
  }

  queryStatus(runId: RunId): Promise<RunStatus | null> {
    return this.store.getStatus(runId);
  }

  describeRun(runId: RunId): Promise<RunSnapshot | null> {
    return this.store.describeRun(runId);
  }

  /**
   * Waits for the run to reach COMPLETED or FAILED.
   * @returns the terminal status, or null if timeoutMs elapsed first
   * @throws RunNotFoundError when the run does not exist when the wait starts
   */
  async awaitTerminal(
    runId: RunId,
    options: { timeoutMs?: number | null | undefined } = {}
  ): Promise<RunStatus | null> {
    await this.requireRun(runId);
    let status: RunStatus | null = null;
    const reached = await pollUntil(
      async () => {
        status = await this.store.getStatus(runId);
        return isTerminalStatus(status);
      },
      { intervalMs: this.pollIntervalMs, timeoutMs: options.timeoutMs }
    );
    return reached ? status : null;
  }

  /**
   * Deletes terminal runs last updated more than `olderThanMs` ago.
   * @returns ids of the deleted runs
   */
  async collectTerminalRuns(options: { olderThanMs: number }): Promise<RunId[]> {
    const cutoff = this.now() - options.olderThanMs;
    const deleted: RunId[] = [];

    for (const runId of await this.store.listRunIds()) {
      const snapshot = await this.store.describeRun(runId);
      if (
        snapshot &&
        isTerminalStatus(snapshot.status) &&
        Date.parse(snapshot.updatedAt) <= cutoff
      ) {
        await this.store.deleteRun(runId);
        deleted.push(runId);
      }
    }

    if (deleted.length > 0) {
      this.logger?.info({ count: deleted.length }, "terminal runs collected");
    }
    return deleted;
  }

  private async requireRun(runId: RunId): Promise<void> {
    const snapshot = await this.store.describeRun(runId);
    if (!snapshot) {
      throw new RunNotFoundError(runId);
    }
  }
}
