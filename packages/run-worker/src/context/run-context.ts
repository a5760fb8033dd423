// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runctl/run-worker/context/run-context`
 * Purpose: Run- and item-scoped correlation ids using AsyncLocalStorage.
 * Scope: Scope creation plus get/set/clear of the current correlation id. Does not log or touch the store.
 * Invariants:
 *   - RUN_CONTEXT_VIA_ALS: ids travel with the async call chain, never through a global
 *   - One scope per work item; a value set in one item is invisible to every other item, even when interleaved
 *   - getCurrentCorrelationId() returns the item id, else the run id, else UNSET_CORRELATION_ID
 *   - setCurrentCorrelationId() outside any scope throws
 *   - set/clear replace the scope for the calling async chain; the enclosing scope object is never mutated
 * Side-effects: none (AsyncLocalStorage is per-task isolation)
 * Links: packages/run-worker/src/runner/controlled-run.ts, packages/run-worker/src/observability/correlation.ts
 * @public
 */

import { AsyncLocalStorage } from "node:async_hooks";
import { randomUUID } from "node:crypto";

/** Sentinel returned when no correlation id is in scope. */
export const UNSET_CORRELATION_ID = "unknown";

interface CorrelationScope {
  readonly runCorrelationId: string | null;
  readonly itemCorrelationId: string | null;
}

const correlationALS = new AsyncLocalStorage<CorrelationScope>();

export function generateCorrelationId(): string {
  return randomUUID();
}

/**
 * Execute `fn` with a run-level correlation id.
 * Nested item scopes inherit it as their fallback.
 */
export function runWithRunContext<T>(runCorrelationId: string, fn: () => T): T {
  return correlationALS.run(
    { runCorrelationId, itemCorrelationId: null },
    fn
  );
}

/**
 * Execute `fn` as one unit of work with its own item correlation id.
 * The item id disappears when `fn` settles; siblings never see it.
 *
 * @example
 * ```typescript
 * await runWithItemContext(generateCorrelationId(), () => execute(item));
 * ```
 */
export function runWithItemContext<T>(
  itemCorrelationId: string | null,
  fn: () => T
): T {
  const parent = correlationALS.getStore();
  return correlationALS.run(
    {
      runCorrelationId: parent?.runCorrelationId ?? null,
      itemCorrelationId,
    },
    fn
  );
}

export function hasRunContext(): boolean {
  return correlationALS.getStore() !== undefined;
}

export function getRunCorrelationId(): string | null {
  return correlationALS.getStore()?.runCorrelationId ?? null;
}

export function getCurrentCorrelationId(): string {
  const scope = correlationALS.getStore();
  return (
    scope?.itemCorrelationId ?? scope?.runCorrelationId ?? UNSET_CORRELATION_ID
  );
}

/**
 * Sets the item correlation id for the rest of the calling async chain.
 * Concurrent tasks started from the same scope keep their own value.
 */
export function setCurrentCorrelationId(correlationId: string): void {
  const scope = correlationALS.getStore();
  if (!scope) {
    throw new Error(
      "setCurrentCorrelationId() called outside of a run or item context. " +
        "Wrap the unit of work with runWithItemContext()."
    );
  }
  correlationALS.enterWith({ ...scope, itemCorrelationId: correlationId });
}

export function clearCurrentCorrelationId(): void {
  const scope = correlationALS.getStore();
  if (scope) {
    correlationALS.enterWith({ ...scope, itemCorrelationId: null });
  }
}
