// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runctl/run-worker/observability/correlation`
 * Purpose: Log-line enrichment with the current run and item correlation ids.
 * Scope: Produces fields for a pino `mixin`. Does not create loggers.
 * Invariants: Inside any run/item context every log line carries `correlationId` verbatim; outside, no fields are added.
 * Side-effects: none
 * Links: services/run-control/src/observability/logger.ts
 * @public
 */

import {
  getCurrentCorrelationId,
  getRunCorrelationId,
  hasRunContext,
} from "../context/run-context";

export interface CorrelationFields {
  runCorrelationId?: string;
  correlationId?: string;
}

/** Pass as `mixin` in pino options. */
export function correlationMixin(): CorrelationFields {
  if (!hasRunContext()) {
    return {};
  }
  const runCorrelationId = getRunCorrelationId();
  return {
    ...(runCorrelationId === null ? {} : { runCorrelationId }),
    correlationId: getCurrentCorrelationId(),
  };
}
