// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runctl/run-control-service/cli`
 * Purpose: `runctl` command tree for orchestrator-side control operations.
 * Scope: Argument parsing and output formatting over RunController. Does not construct stores.
 * Invariants:
 *   - Run ids are validated before any store access (InvalidRunIdError)
 *   - Errors propagate to the entry point, which maps them to exit code 1
 *   - Commander never exits the process itself (exitOverride); usage errors surface as CommanderError
 *   - Only command results go to `out`; diagnostics go to the logger
 * Side-effects: none beyond the injected controller and `out`
 * Links: services/run-control/src/main.ts
 * @public
 */

import { type RunController, RunNotFoundError, toRunId } from "@runctl/control-core";
import { Command, InvalidArgumentError } from "commander";

export interface CliDeps {
  controller: RunController;
  out: (line: string) => void;
  /** Usage/help errors from commander. Defaults to stderr. */
  err?: ((text: string) => void) | undefined;
}

const DEFAULT_GC_AGE_MS = 24 * 60 * 60 * 1000;

function parseDuration(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer (ms).");
  }
  return parsed;
}

export function buildCli(deps: CliDeps): Command {
  const { controller, out } = deps;
  // Set before subcommands are added so they inherit it
  const program = new Command("runctl")
    .description("Pause, resume, cancel and inspect controlled runs")
    .exitOverride()
    .showHelpAfterError();
  if (deps.err) {
    program.configureOutput({ writeErr: deps.err });
  }

  program
    .command("create")
    .description("Create a run in PENDING state and print its id")
    .argument("[runId]", "run id (generated when omitted)")
    .action(async (rawRunId: string | undefined) => {
      out(await controller.createRun(rawRunId));
    });

  program
    .command("pause")
    .description("Ask the worker to pause before its next item")
    .argument("<runId>")
    .action(async (rawRunId: string) => {
      const runId = toRunId(rawRunId);
      await controller.requestPause(runId);
      out(`pause requested: ${runId}`);
    });

  program
    .command("resume")
    .description("Clear a pause request")
    .argument("<runId>")
    .action(async (rawRunId: string) => {
      const runId = toRunId(rawRunId);
      await controller.requestResume(runId);
      out(`resume requested: ${runId}`);
    });

  program
    .command("cancel")
    .description("Skip every item that has not started yet")
    .argument("<runId>")
    .action(async (rawRunId: string) => {
      const runId = toRunId(rawRunId);
      await controller.requestCancel(runId);
      out(`cancel requested: ${runId}`);
    });

  program
    .command("status")
    .description("Print the run snapshot as JSON")
    .argument("<runId>")
    .action(async (rawRunId: string) => {
      const runId = toRunId(rawRunId);
      const snapshot = await controller.describeRun(runId);
      if (!snapshot) {
        throw new RunNotFoundError(runId);
      }
      out(JSON.stringify(snapshot, null, 2));
    });

  program
    .command("wait")
    .description("Block until the run is COMPLETED or FAILED")
    .argument("<runId>")
    .option("--timeout <ms>", "give up after this many ms", parseDuration)
    .action(async (rawRunId: string, options: { timeout?: number }) => {
      const runId = toRunId(rawRunId);
      const status = await controller.awaitTerminal(runId, {
        timeoutMs: options.timeout ?? null,
      });
      if (status === null) {
        throw new Error(`Timed out waiting for run ${runId}`);
      }
      out(status);
    });

  program
    .command("gc")
    .description("Delete terminal runs older than the given age")
    .option(
      "--older-than <ms>",
      "minimum age since last update",
      parseDuration,
      DEFAULT_GC_AGE_MS
    )
    .action(async (options: { olderThan: number }) => {
      const deleted = await controller.collectTerminalRuns({
        olderThanMs: options.olderThan,
      });
      for (const runId of deleted) {
        out(runId);
      }
    });

  return program;
}
