// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runctl/control-core/ports/control-store`
 * Purpose: Backend-agnostic port for run-scoped control flags, status and metadata.
 * Scope: Defines the store contract and its error taxonomy. Does not contain implementations.
 * Invariants:
 *   - Per RUN_NAMESPACE_ISOLATION: every read/write is qualified by runId; runs never observe each other
 *   - Per CANCEL_IS_STICKY: setFlag(run, "cancelled", false) after true is ignored
 *   - Per LAST_WRITER_WINS: concurrent writes to the same run/flag never produce torn values
 *   - checkFlag returns false for unset or unknown flags (never throws for a name)
 *   - deleteRun is idempotent (no-op if not found)
 *   - Backend failures surface as StoreUnavailableError, never as "flag not set"
 * Side-effects: none (interface definition only)
 * Links: packages/control-store/src/memory/memory-control-store.ts, packages/control-store/src/file/file-control-store.ts
 * @public
 */

import type { JsonValue } from "type-fest";

import type { RunId } from "../run-id";
import type { FlagState, RunSnapshot, RunStatus } from "../types";

export interface WaitForFlagOptions {
  /**
   * Wait condition over the run's current flags.
   * Default: the waited flag is false.
   */
  readonly until?: ((flags: FlagState) => boolean) | undefined;
  /** Give up after this many ms and resolve false. null/undefined waits forever. */
  readonly timeoutMs?: number | null | undefined;
  /** Overrides the backend's poll interval for this wait (polling backends only). */
  readonly pollIntervalMs?: number | undefined;
}

/**
 * Error thrown when the control store backend cannot be reached or holds corrupt data.
 * Orchestrator writes must propagate it; worker reads treat it as "no signal pending".
 */
export class StoreUnavailableError extends Error {
  constructor(
    public readonly operation: string,
    public readonly cause?: Error
  ) {
    super(
      `Control store unavailable during ${operation}: ${cause?.message ?? "unknown error"}`
    );
    this.name = "StoreUnavailableError";
  }
}

export function isStoreUnavailableError(
  error: unknown
): error is StoreUnavailableError {
  return error instanceof Error && error.name === "StoreUnavailableError";
}

/**
 * Run control store.
 *
 * | Method       | Idempotent? | On unknown run          |
 * |--------------|-------------|-------------------------|
 * | setFlag      | Yes         | Creates the run record  |
 * | checkFlag    | Yes         | false                   |
 * | waitForFlag  | Yes         | Evaluates empty flags   |
 * | setStatus    | Yes         | Creates the run record  |
 * | getStatus    | Yes         | null                    |
 * | setMetadata  | Yes         | Creates the run record  |
 * | getMetadata  | Yes         | null                    |
 * | describeRun  | Yes         | null                    |
 * | deleteRun    | Yes         | No-op                   |
 */
export interface ControlStorePort {
  setFlag(runId: RunId, flag: string, value: boolean): Promise<void>;

  checkFlag(runId: RunId, flag: string): Promise<boolean>;

  /**
   * Blocks the calling task (not the process) until `options.until` holds
   * or the timeout elapses.
   *
   * @returns true if the condition held, false on timeout. An unbounded wait never resolves false.
   * @throws StoreUnavailableError if the backend fails while waiting
   */
  waitForFlag(
    runId: RunId,
    flag: string,
    options?: WaitForFlagOptions
  ): Promise<boolean>;

  setStatus(runId: RunId, status: RunStatus): Promise<void>;

  getStatus(runId: RunId): Promise<RunStatus | null>;

  setMetadata(runId: RunId, key: string, value: JsonValue): Promise<void>;

  getMetadata(runId: RunId, key: string): Promise<JsonValue | null>;

  describeRun(runId: RunId): Promise<RunSnapshot | null>;

  listRunIds(): Promise<RunId[]>;

  /** Orchestrator-only garbage collection. Workers never delete runs. */
  deleteRun(runId: RunId): Promise<void>;

  /** Releases backend resources. Later calls throw StoreUnavailableError. */
  close(): Promise<void>;
}
