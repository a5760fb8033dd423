// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runctl/run-worker/tests/fixtures`
 * Purpose: Shared helpers for run-worker tests.
 * Scope: Mock logger, run id resolutions and work items.
 * Side-effects: none
 * @internal
 */

import { type RunId, toRunId } from "@runctl/control-core";
import { vi } from "vitest";

import type { WorkItem } from "../src/interceptor/control-point-interceptor";
import type { RunIdResolution } from "../src/run-id";

export const RUN_ID: RunId = toRunId("run-worker-test");

export function makeMockLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

export function resolved(runId: RunId = RUN_ID): RunIdResolution {
  return { kind: "resolved", runId, source: "env" };
}

export function makeItems(count: number): WorkItem[] {
  return Array.from({ length: count }, (_, i) => ({ id: `item-${i + 1}` }));
}
