// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runctl/control-core`
 * Purpose: Run control core types, lifecycle, store port and orchestrator service.
 * Scope: Pure types, state machine and port interfaces plus the RunController service. Does not contain backends.
 * Invariants:
 * - FORBIDDEN: backend I/O (fs, network clients)
 * - ALLOWED: types, timers, the ControlStorePort abstraction
 * Side-effects: none
 * @public
 */

export {
  assertTransition,
  canTransition,
  InvalidRunTransitionError,
  isInvalidRunTransitionError,
  isTerminalStatus,
  terminalStatusFor,
} from "./lifecycle";
export type { LoggerLike } from "./logger";
// Ports
export {
  type ControlStorePort,
  isStoreUnavailableError,
  StoreUnavailableError,
  type WaitForFlagOptions,
} from "./ports";
export {
  InvalidRunIdError,
  isInvalidRunIdError,
  isValidRunId,
  RUN_ID_RE,
  type RunId,
  toRunId,
} from "./run-id";
// Services
export {
  isRunAlreadyExistsError,
  isRunNotFoundError,
  RunAlreadyExistsError,
  RunController,
  type RunControllerDeps,
  RunNotFoundError,
} from "./services/run-controller";
// Types
export {
  CONTROL_FLAGS,
  type ControlFlagName,
  type FlagState,
  isRunStatus,
  readFlag,
  resolveFlagWrite,
  RUN_STATUSES,
  type RunSnapshot,
  type RunStatus,
  STICKY_FLAGS,
  TERMINAL_RUN_STATUSES,
} from "./types";
export { DEFAULT_POLL_INTERVAL_MS, type PollOptions, pollUntil } from "./wait";
