// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runctl/control-core/logger`
 * Purpose: Structural logger contract injected into packages.
 * Scope: Type only. Compatible with pino's Logger; packages never construct loggers.
 * Side-effects: none
 * @public
 */

export interface LoggerLike {
  info(obj: Record<string, unknown>, msg?: string): void;
  warn(obj: Record<string, unknown>, msg?: string): void;
  error(obj: Record<string, unknown>, msg?: string): void;
  debug?(obj: Record<string, unknown>, msg?: string): void;
  child?(bindings: Record<string, unknown>): LoggerLike;
}
