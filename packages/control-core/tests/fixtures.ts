// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runctl/control-core/tests/fixtures`
 * Purpose: Mock ControlStorePort and snapshot builders for control-core unit tests.
 * Scope: Test helpers only.
 * Side-effects: none
 * @internal
 */

import { vi } from "vitest";

import type { ControlStorePort } from "../src/ports";
import { type RunId, toRunId } from "../src/run-id";
import type { RunSnapshot } from "../src/types";

export const RUN_A: RunId = toRunId("run-a");
export const RUN_B: RunId = toRunId("run-b");
export const RUN_C: RunId = toRunId("run-c");

export function makeMockStore() {
  return {
    setFlag: vi.fn<ControlStorePort["setFlag"]>().mockResolvedValue(undefined),
    checkFlag: vi.fn<ControlStorePort["checkFlag"]>().mockResolvedValue(false),
    waitForFlag: vi
      .fn<ControlStorePort["waitForFlag"]>()
      .mockResolvedValue(true),
    setStatus: vi
      .fn<ControlStorePort["setStatus"]>()
      .mockResolvedValue(undefined),
    getStatus: vi.fn<ControlStorePort["getStatus"]>().mockResolvedValue(null),
    setMetadata: vi
      .fn<ControlStorePort["setMetadata"]>()
      .mockResolvedValue(undefined),
    getMetadata: vi
      .fn<ControlStorePort["getMetadata"]>()
      .mockResolvedValue(null),
    describeRun: vi
      .fn<ControlStorePort["describeRun"]>()
      .mockResolvedValue(null),
    listRunIds: vi.fn<ControlStorePort["listRunIds"]>().mockResolvedValue([]),
    deleteRun: vi
      .fn<ControlStorePort["deleteRun"]>()
      .mockResolvedValue(undefined),
    close: vi.fn<ControlStorePort["close"]>().mockResolvedValue(undefined),
  } satisfies ControlStorePort;
}

export function makeSnapshot(
  runId: RunId,
  overrides: Partial<Omit<RunSnapshot, "runId">> = {}
): RunSnapshot {
  return {
    runId,
    status: "PENDING",
    flags: {},
    metadata: {},
    createdAt: "2025-01-01T00:00:00.000Z",
    updatedAt: "2025-01-01T00:00:00.000Z",
    ...overrides,
  };
}

export function makeMockLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}
