// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runctl/run-worker/run-id`
 * Purpose: Resolve the worker's run id from its command line or environment.
 * Scope: Pure parsing. Logging the uncontrolled-mode warning is the interceptor's job.
 * Invariants:
 * - `--run-id <id>` / `--run-id=<id>` wins over the environment variable
 * - A present but invalid value resolves as "invalid" (treated as missing by callers)
 * Side-effects: none
 * @public
 */

import { isValidRunId, type RunId, toRunId } from "@runctl/control-core";

export const RUN_ID_FLAG = "--run-id";
export const RUN_ID_ENV = "RUN_ID";

export type RunIdSource = "argv" | "env";

export type RunIdResolution =
  | { readonly kind: "resolved"; readonly runId: RunId; readonly source: RunIdSource }
  | { readonly kind: "invalid"; readonly raw: string; readonly source: RunIdSource }
  | { readonly kind: "missing" };

function fromArgv(argv: readonly string[]): string | undefined {
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === RUN_ID_FLAG) {
      return argv[i + 1] ?? "";
    }
    if (arg?.startsWith(`${RUN_ID_FLAG}=`)) {
      return arg.slice(RUN_ID_FLAG.length + 1);
    }
  }
  return undefined;
}

export function resolveRunId(input: {
  argv: readonly string[];
  env: Readonly<Record<string, string | undefined>>;
  envVar?: string | undefined;
}): RunIdResolution {
  const candidates: Array<[RunIdSource, string | undefined]> = [
    ["argv", fromArgv(input.argv)],
    ["env", input.env[input.envVar ?? RUN_ID_ENV]],
  ];

  for (const [source, raw] of candidates) {
    if (raw === undefined || raw === "") {
      continue;
    }
    return isValidRunId(raw)
      ? { kind: "resolved", runId: toRunId(raw), source }
      : { kind: "invalid", raw, source };
  }
  return { kind: "missing" };
}
