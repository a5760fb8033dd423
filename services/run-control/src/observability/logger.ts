// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runctl/run-control-service/observability/logger`
 * Purpose: Pino logger factory - JSON-only emission with run/item correlation ids.
 * Scope: Create configured pino loggers. Does not manage correlation scopes (run-worker does).
 * Invariants:
 *   - Every line emitted inside a run or item context carries `correlationId` verbatim (correlationMixin)
 *   - Silenced under Vitest or NODE_ENV=test unless an explicit destination is passed
 *   - Reads logging env vars directly to avoid triggering full env validation at module load
 * Side-effects: IO (stderr, keeping stdout for CLI output)
 * Links: packages/run-worker/src/observability/correlation.ts
 * @public
 */

import { correlationMixin } from "@runctl/run-worker";
import pino, {
  type DestinationStream,
  type Logger,
  type LoggerOptions,
} from "pino";

import { REDACT_PATHS } from "./redact.js";

export type { Logger } from "pino";

export interface MakeLoggerOptions {
  bindings?: Record<string, unknown> | undefined;
  /** Overrides the default stderr destination (tests). Always enabled when set. */
  destination?: DestinationStream | undefined;
  level?: string | undefined;
}

let sharedDestination: ReturnType<typeof pino.destination> | null = null;

export function makeLogger(options: MakeLoggerOptions = {}): Logger {
  const isVitest = process.env.VITEST === "true";
  const nodeEnv = process.env.NODE_ENV ?? "development";
  const level = options.level ?? process.env.LOG_LEVEL ?? "info";
  const serviceName = process.env.SERVICE_NAME ?? "run-control";

  const isTestTooling = isVitest || nodeEnv === "test";

  const config: LoggerOptions = {
    level,
    enabled: options.destination !== undefined || !isTestTooling,
    // Stable base: bindings first, then reserved keys (prevents overwrite)
    base: { ...options.bindings, service: serviceName },
    messageKey: "msg",
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
    mixin: correlationMixin,
  };

  if (options.destination) {
    return pino(config, options.destination);
  }

  if (!sharedDestination) {
    // stderr keeps stdout free for CLI output
    sharedDestination = pino.destination({
      dest: 2,
      sync: nodeEnv !== "production",
    });
  }
  return pino(config, sharedDestination);
}

/** Flush buffered async output before exit. */
export function flushLogger(): void {
  sharedDestination?.flushSync();
}
