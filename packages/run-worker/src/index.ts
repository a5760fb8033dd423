// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runctl/run-worker`
 * Purpose: Worker-side run control: control-point interceptor, run harness, correlation context.
 * Scope: Depends on ControlStorePort only; backends are injected by the composition root.
 * Side-effects: none at import
 * @public
 */

export {
  clearCurrentCorrelationId,
  generateCorrelationId,
  getCurrentCorrelationId,
  getRunCorrelationId,
  hasRunContext,
  runWithItemContext,
  runWithRunContext,
  setCurrentCorrelationId,
  UNSET_CORRELATION_ID,
} from "./context/run-context";
export {
  type CollectedItem,
  type ControlPoint,
  ControlPointInterceptor,
  type ControlPointInterceptorDeps,
  type ItemDecision,
  type SkipReason,
  type WorkItem,
} from "./interceptor/control-point-interceptor";
export {
  type CorrelationFields,
  correlationMixin,
} from "./observability/correlation";
export {
  RUN_ID_ENV,
  RUN_ID_FLAG,
  type RunIdResolution,
  type RunIdSource,
  resolveRunId,
} from "./run-id";
export {
  type ControlledRunParams,
  type ExecuteItem,
  executeControlledRun,
  type ItemReport,
  type ItemStatus,
  type RunReport,
  type SkipStage,
} from "./runner/controlled-run";
