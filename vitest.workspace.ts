// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `vitest.workspace`
 * Purpose: Vitest workspace configuration for monorepo test discovery.
 * Scope: Discovers package-local and service-local vitest configs.
 * Invariants:
 *   - Package tests in packages/<pkg>/tests/** only import that package or other @runctl/* packages
 *   - Service tests run against the memory and file backends only (no network)
 * Side-effects: none
 * Links: packages/&lt;pkg&gt;/vitest.config.ts, services/&lt;svc&gt;/vitest.config.ts
 * @public
 */

import { defineWorkspace } from "vitest/config";

export default defineWorkspace([
  "./packages/*/vitest.config.ts",
  "./services/*/vitest.config.ts",
]);
