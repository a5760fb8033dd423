// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runctl/control-core/lifecycle`
 * Purpose: Run lifecycle state machine (legal status transitions).
 * Scope: Transition table and helpers. Does not read or write any store.
 * Invariants:
 * - COMPLETED and FAILED are terminal
 * - Rewriting the current non-terminal status is an idempotent no-op
 * - A run with no status yet may enter PENDING (orchestrator) or RUNNING (worker)
 * Side-effects: none
 * Links: packages/run-worker/src/interceptor/control-point-interceptor.ts
 * @public
 */

import type { RunId } from "./run-id";
import { type RunStatus, TERMINAL_RUN_STATUSES } from "./types";

/**
 * Transition table.
 * | From     | To                  | Trigger                       |
 * |----------|---------------------|-------------------------------|
 * | (none)   | PENDING             | orchestrator creates the run  |
 * | (none)   | RUNNING             | worker starts an unknown run  |
 * | PENDING  | RUNNING             | run-start control point       |
 * | RUNNING  | COMPLETED / FAILED  | run-end control point         |
 */
const TRANSITIONS: Readonly<Record<RunStatus | "NONE", readonly RunStatus[]>> =
  {
    NONE: ["PENDING", "RUNNING"],
    PENDING: ["RUNNING"],
    RUNNING: ["COMPLETED", "FAILED"],
    COMPLETED: [],
    FAILED: [],
  };

export class InvalidRunTransitionError extends Error {
  constructor(
    public readonly runId: RunId,
    public readonly from: RunStatus | null,
    public readonly to: RunStatus
  ) {
    super(`Illegal status transition for run ${runId}: ${from ?? "none"} -> ${to}`);
    this.name = "InvalidRunTransitionError";
  }
}

export function isInvalidRunTransitionError(
  error: unknown
): error is InvalidRunTransitionError {
  return error instanceof Error && error.name === "InvalidRunTransitionError";
}

export function isTerminalStatus(status: RunStatus | null): boolean {
  return status !== null && TERMINAL_RUN_STATUSES.includes(status);
}

export function canTransition(from: RunStatus | null, to: RunStatus): boolean {
  if (from === to) {
    return !isTerminalStatus(from);
  }
  return TRANSITIONS[from ?? "NONE"].includes(to);
}

export function assertTransition(
  runId: RunId,
  from: RunStatus | null,
  to: RunStatus
): void {
  if (!canTransition(from, to)) {
    throw new InvalidRunTransitionError(runId, from, to);
  }
}

/** Terminal status for an aggregate outcome. Skipped items never force FAILED. */
export function terminalStatusFor(outcome: { failed: boolean }): RunStatus {
  return outcome.failed ? "FAILED" : "COMPLETED";
}
