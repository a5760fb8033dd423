// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runctl/run-control-service/tsup.config`
 * Purpose: Build configuration for the runctl service.
 * Scope: Defines tsup bundler settings. Does not contain runtime code.
 * Invariants: ESM format only; workspace packages are bundled, npm deps stay external.
 * Side-effects: none
 * Links: services/run-control/package.json
 * @internal
 */

import { defineConfig } from "tsup";

export default defineConfig({
  entry: {
    main: "services/run-control/src/main.ts",
    worker: "services/run-control/src/worker.ts",
  },
  outDir: "services/run-control/dist",
  format: ["esm"],
  bundle: true,
  noExternal: [/^@runctl\//],
  splitting: false,
  dts: false,
  clean: true,
  sourcemap: true,
  platform: "node",
  target: "node20",
});
