// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runctl/control-core/wait`
 * Purpose: Poll-until primitive behind waitForFlag and awaitTerminal.
 * Scope: Re-checks an async condition on a fixed interval with an optional timeout. Does not know about stores.
 * Invariants:
 * - Resolves true as soon as a check passes
 * - Resolves false only once the measured elapsed time is >= timeoutMs
 * - timeoutMs null/undefined never resolves false
 * - Check errors reject the wait (callers decide the fallback)
 * Side-effects: timers
 * @public
 */

import { setTimeout as sleep } from "node:timers/promises";

/** Reference poll interval for cross-process backends. */
export const DEFAULT_POLL_INTERVAL_MS = 500;

export interface PollOptions {
  readonly intervalMs?: number | undefined;
  readonly timeoutMs?: number | null | undefined;
}

export async function pollUntil(
  check: () => Promise<boolean>,
  options: PollOptions = {}
): Promise<boolean> {
  const intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const timeoutMs = options.timeoutMs ?? null;
  const startedAt = performance.now();

  for (;;) {
    if (await check()) {
      return true;
    }

    if (timeoutMs === null) {
      await sleep(intervalMs);
      continue;
    }

    const remaining = timeoutMs - (performance.now() - startedAt);
    if (remaining <= 0) {
      return false;
    }
    await sleep(Math.min(intervalMs, Math.ceil(remaining)));
  }
}
