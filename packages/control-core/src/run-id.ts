// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runctl/control-core/run-id`
 * Purpose: Branded run identifier with a single boundary constructor.
 * Scope: Validation and branding only.
 * Invariants:
 * - toRunId() is the single entry point for creating a RunId
 * - A RunId is safe to use as a file name and a key segment (no separators, no "..")
 * Side-effects: none
 * @public
 */

import type { Tagged } from "type-fest";

/** 1-128 chars, alphanumeric first, then alphanumerics and `_ . -`. */
export const RUN_ID_RE = /^[A-Za-z0-9][A-Za-z0-9_.-]{0,127}$/;

export type RunId = Tagged<string, "RunId">;

export class InvalidRunIdError extends Error {
  constructor(public readonly raw: string) {
    super(`Invalid run id: ${JSON.stringify(raw)}`);
    this.name = "InvalidRunIdError";
  }
}

export function isInvalidRunIdError(
  error: unknown
): error is InvalidRunIdError {
  return error instanceof Error && error.name === "InvalidRunIdError";
}

export function isValidRunId(raw: string): boolean {
  return RUN_ID_RE.test(raw);
}

/** Validate and brand a raw string as RunId. Call at edges only. */
export function toRunId(raw: string): RunId {
  if (!isValidRunId(raw)) {
    throw new InvalidRunIdError(raw);
  }
  return raw as RunId;
}
