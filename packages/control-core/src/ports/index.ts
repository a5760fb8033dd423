// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runctl/control-core/ports`
 * Purpose: Barrel export for control-core port interfaces.
 * Scope: Re-exports only.
 * Side-effects: none
 * @public
 */

export {
  type ControlStorePort,
  isStoreUnavailableError,
  StoreUnavailableError,
  type WaitForFlagOptions,
} from "./control-store.port";
