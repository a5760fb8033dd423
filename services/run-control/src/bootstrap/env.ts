// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runctl/run-control-service/bootstrap/env`
 * Purpose: Environment configuration with Zod validation and lazy singleton.
 * Scope: Config parsing only — no store construction, no side-effects beyond process.env read.
 * Invariants:
 * - RUN_CONTROL_DIR is shared by orchestrator and worker when the file backend is used
 * - RUN_ID is optional; without it workers run uncontrolled
 * - Fails fast with one error listing every invalid variable
 * Side-effects: Reads process.env
 * Links: services/run-control/src/bootstrap/container.ts
 * @internal
 */

import { z } from "zod";

const EnvSchema = z.object({
  /** Control store backend: file (same host, multi-process) or memory (single process) */
  RUN_CONTROL_BACKEND: z.enum(["file", "memory"]).default("file"),

  /** Directory holding run documents for the file backend */
  RUN_CONTROL_DIR: z.string().min(1).default(".run-control"),

  /** Poll interval for flag waits (default: 500) */
  RUN_CONTROL_POLL_INTERVAL_MS: z.coerce.number().int().min(10).default(500),

  /** Max time to wait for a run's lock file (default: 5000) */
  RUN_CONTROL_LOCK_TIMEOUT_MS: z.coerce.number().int().min(1).default(5000),

  /** Run id handed to the worker by the orchestrator (validated later, not here) */
  RUN_ID: z
    .string()
    .min(1)
    .optional()
    .or(z.literal("").transform(() => undefined)),

  /** Log level (default: info) */
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

  /** Service name for logging (default: run-control) */
  SERVICE_NAME: z.string().default("run-control"),
});

export type Env = z.infer<typeof EnvSchema>;

/** Parses an env record without caching. */
export function parseEnv(source: Readonly<Record<string, string | undefined>>): Env {
  const result = EnvSchema.safeParse(source);
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new Error(`Invalid environment configuration:\n${errors}`);
  }
  return result.data;
}

let _env: Env | null = null;

/**
 * Returns validated environment singleton.
 * Parses process.env on first call, caches result.
 */
export function env(): Env {
  if (!_env) {
    _env = parseEnv(process.env);
  }
  return _env;
}
