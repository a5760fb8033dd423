// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runctl/control-core/tests/run-id`
 * Purpose: Unit tests for RunId validation.
 * Scope: toRunId boundary and InvalidRunIdError. Pure functions only.
 * Side-effects: none
 * Links: src/run-id.ts
 * @internal
 */

import { describe, expect, it } from "vitest";

import {
  InvalidRunIdError,
  isInvalidRunIdError,
  isValidRunId,
  toRunId,
} from "../src/run-id";

describe("toRunId", () => {
  it.each([
    "run-1",
    "2025-01-15T10.30",
    "a",
    "0f8fad5b-d9cb-469f-a165-70867728950e",
    "x".repeat(128),
  ])("accepts %s", (raw) => {
    expect(toRunId(raw)).toBe(raw);
  });

  it.each([
    "",
    "-leading-dash",
    ".hidden",
    "../escape",
    "has/slash",
    "has space",
    "x".repeat(129),
  ])("rejects %j", (raw) => {
    expect(isValidRunId(raw)).toBe(false);
    expect(() => toRunId(raw)).toThrow(InvalidRunIdError);
  });

  it("reports the raw value", () => {
    let caught: unknown;
    try {
      toRunId("a b");
    } catch (error) {
      caught = error;
    }
    expect(isInvalidRunIdError(caught)).toBe(true);
    expect(caught).toMatchObject({ raw: "a b", message: 'Invalid run id: "a b"' });
  });
});
