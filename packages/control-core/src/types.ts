// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runctl/control-core/types`
 * Purpose: Run status, control flag and snapshot types shared by orchestrator and worker.
 * Scope: Pure types and constants. Does not contain store logic.
 * Invariants:
 * - Per FLAGS_NOT_STATES: pause/cancel are flags layered on RUNNING, never statuses
 * - Per CANCEL_IS_STICKY: `cancelled` never returns to false once set
 * Side-effects: none
 * Links: packages/control-core/src/lifecycle.ts
 * @public
 */

import type { JsonValue } from "type-fest";

import type { RunId } from "./run-id";

export const RUN_STATUSES = [
  "PENDING",
  "RUNNING",
  "COMPLETED",
  "FAILED",
] as const;

export type RunStatus = (typeof RUN_STATUSES)[number];

export const TERMINAL_RUN_STATUSES: readonly RunStatus[] = [
  "COMPLETED",
  "FAILED",
];

/** Well-known control flags. Stores accept any flag name; unknown names read as false. */
export const CONTROL_FLAGS = {
  cancelled: "cancelled",
  paused: "paused",
} as const;

export type ControlFlagName = (typeof CONTROL_FLAGS)[keyof typeof CONTROL_FLAGS];

/** Flags that may go false -> true but never back. */
export const STICKY_FLAGS: ReadonlySet<string> = new Set([
  CONTROL_FLAGS.cancelled,
]);

/** Point-in-time view of every flag stored for a run. */
export type FlagState = Readonly<Record<string, boolean>>;

export interface RunSnapshot {
  readonly runId: RunId;
  /** null when only flags/metadata were written (no status yet) */
  readonly status: RunStatus | null;
  readonly flags: FlagState;
  readonly metadata: Readonly<Record<string, JsonValue>>;
  /** ISO 8601 */
  readonly createdAt: string;
  /** ISO 8601 */
  readonly updatedAt: string;
}

export function isRunStatus(value: unknown): value is RunStatus {
  return RUN_STATUSES.some((status) => status === value);
}

export function readFlag(flags: FlagState, flag: string): boolean {
  return flags[flag] === true;
}

/**
 * Resolves the value a flag holds after a write.
 * Sticky flags ignore a `false` written over a stored `true`.
 */
export function resolveFlagWrite(
  flags: FlagState,
  flag: string,
  value: boolean
): boolean {
  if (!value && STICKY_FLAGS.has(flag) && readFlag(flags, flag)) {
    return true;
  }
  return value;
}
