// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runctl/control-store`
 * Purpose: ControlStorePort backends (in-process memory, same-host file).
 * Scope: Adapters only. Composition roots choose a backend; core and worker code depend on the port.
 * Side-effects: none at import
 * @public
 */

export {
  FileControlStore,
  type FileControlStoreOptions,
} from "./file/file-control-store";
export {
  acquireFileLock,
  DEFAULT_FILE_LOCK_OPTIONS,
  type FileLockOptions,
  FileLockTimeoutError,
  isFileLockTimeoutError,
  type ReleaseLock,
} from "./file/file-lock";
export {
  MemoryControlStore,
  type MemoryControlStoreOptions,
} from "./memory/memory-control-store";
