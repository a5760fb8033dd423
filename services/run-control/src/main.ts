#!/usr/bin/env node
// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runctl/run-control-service/main`
 * Purpose: `runctl` entry point.
 * Scope: Calls env(), builds the container, runs one CLI command, closes the store. Does not contain control logic.
 * Invariants:
 *   - Reads config from env (no hardcoded values)
 *   - Any command error exits with code 1 and a one-line message on stderr
 *   - Usage errors keep commander's exit code
 * Side-effects: IO (control store, stdout/stderr, process exit code)
 * @public
 */

import { CommanderError } from "commander";

import { createContainer } from "./bootstrap/container.js";
import { env } from "./bootstrap/env.js";
import { buildCli } from "./cli.js";
import { flushLogger, makeLogger } from "./observability/logger.js";

async function main(): Promise<void> {
  const config = env();
  const logger = makeLogger({ level: config.LOG_LEVEL });
  const { store, controller } = createContainer(config, logger);

  const program = buildCli({
    controller,
    out: (line) => process.stdout.write(`${line}\n`),
  });

  try {
    await program.parseAsync(process.argv);
  } finally {
    await store.close();
  }
}

const bootLogger = makeLogger({ bindings: { phase: "boot" } });

main().then(
  () => flushLogger(),
  (err: unknown) => {
    if (err instanceof CommanderError) {
      // Help, version and usage errors: commander already printed the message
      flushLogger();
      process.exitCode = err.exitCode;
      return;
    }
    bootLogger.error({ err }, "Command failed");
    process.stderr.write(
      `runctl: ${err instanceof Error ? err.message : String(err)}\n`
    );
    flushLogger();
    process.exitCode = 1;
  }
);
