// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runctl/run-control-service/tests/cli`
 * Purpose: Unit tests for the runctl command tree.
 * Scope: Each command against a RunController over the in-memory backend. Does not spawn processes.
 * Side-effects: none
 * Links: src/cli.ts
 * @internal
 */

import {
  isInvalidRunIdError,
  isRunAlreadyExistsError,
  isRunNotFoundError,
  RunController,
  toRunId,
} from "@runctl/control-core";
import { MemoryControlStore } from "@runctl/control-store";
import { CommanderError } from "commander";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { buildCli } from "../src/cli";

describe("runctl", () => {
  let store: MemoryControlStore;
  let output: string[];
  let usage: string[];

  beforeEach(() => {
    store = new MemoryControlStore();
    output = [];
    usage = [];
  });

  afterEach(async () => {
    await store.close();
  });

  function runctl(...args: string[]): Promise<unknown> {
    const program = buildCli({
      controller: new RunController({ store, pollIntervalMs: 5 }),
      out: (line) => output.push(line),
      err: (text) => usage.push(text),
    });
    return program.parseAsync(args, { from: "user" });
  }

  it("creates a run with the given id", async () => {
    await runctl("create", "run-1");

    expect(output).toEqual(["run-1"]);
    expect(await store.getStatus(toRunId("run-1"))).toBe("PENDING");
  });

  it("creates a run with a generated id", async () => {
    await runctl("create");

    expect(output).toHaveLength(1);
    expect(await store.getStatus(toRunId(output[0] ?? ""))).toBe("PENDING");
  });

  it("refuses to create the same run twice", async () => {
    await runctl("create", "run-1");

    const error = await runctl("create", "run-1").catch((e: unknown) => e);

    expect(isRunAlreadyExistsError(error)).toBe(true);
  });

  it("pauses, resumes and cancels", async () => {
    const runId = toRunId("run-1");
    await runctl("create", "run-1");

    await runctl("pause", "run-1");
    expect(await store.checkFlag(runId, "paused")).toBe(true);

    await runctl("resume", "run-1");
    expect(await store.checkFlag(runId, "paused")).toBe(false);

    await runctl("cancel", "run-1");
    expect(await store.checkFlag(runId, "cancelled")).toBe(true);

    expect(output).toEqual([
      "run-1",
      "pause requested: run-1",
      "resume requested: run-1",
      "cancel requested: run-1",
    ]);
  });

  it("fails for an unknown run", async () => {
    const error = await runctl("cancel", "ghost").catch((e: unknown) => e);

    expect(isRunNotFoundError(error)).toBe(true);
    expect(output).toEqual([]);
  });

  it("rejects an invalid run id", async () => {
    const error = await runctl("pause", "../etc").catch((e: unknown) => e);

    expect(isInvalidRunIdError(error)).toBe(true);
  });

  it("prints the run snapshot as JSON", async () => {
    await runctl("create", "run-1");
    await runctl("pause", "run-1");

    await runctl("status", "run-1");

    expect(JSON.parse(output[2] ?? "")).toMatchObject({
      runId: "run-1",
      status: "PENDING",
      flags: { paused: true },
      metadata: {},
    });
  });

  it("waits for a terminal status", async () => {
    await store.setStatus(toRunId("run-1"), "RUNNING");
    setTimeout(() => {
      void store.setStatus(toRunId("run-1"), "COMPLETED");
    }, 20);

    await runctl("wait", "run-1", "--timeout", "5000");

    expect(output).toEqual(["COMPLETED"]);
  });

  it("gives up waiting after the timeout", async () => {
    await store.setStatus(toRunId("run-1"), "RUNNING");

    await expect(runctl("wait", "run-1", "--timeout", "30")).rejects.toThrow(
      "Timed out waiting for run run-1"
    );
  });

  it("fails to wait on an unknown run", async () => {
    const error = await runctl("wait", "ghost").catch((e: unknown) => e);

    expect(isRunNotFoundError(error)).toBe(true);
    expect(output).toEqual([]);
  });

  it("rejects a malformed timeout as a usage error", async () => {
    const error = await runctl("wait", "run-1", "--timeout", "soon").catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(CommanderError);
    expect(error).toMatchObject({ code: "commander.invalidArgument" });
    expect(usage.join("")).toContain("Expected a non-negative integer (ms).");
  });

  it("collects terminal runs", async () => {
    await store.setStatus(toRunId("run-done"), "COMPLETED");
    await store.setStatus(toRunId("run-live"), "RUNNING");

    await runctl("gc", "--older-than", "0");

    expect(output).toEqual(["run-done"]);
    expect(await store.listRunIds()).toEqual(["run-live"]);
  });
});
