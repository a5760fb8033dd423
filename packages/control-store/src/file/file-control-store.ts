// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runctl/control-store/file`
 * Purpose: Same-host, multi-process implementation of ControlStorePort on the local filesystem.
 * Scope: One JSON document per run under `directory`, guarded by a per-run lock file.
 * Invariants:
 *   - Per RUN_NAMESPACE_ISOLATION: `<runId>.json` / `<runId>.lock` are per run; runs never share a lock
 *   - Per LAST_WRITER_WINS: mutations are read-modify-write under the run lock, published by rename (no torn reads)
 *   - Readers never take the lock
 *   - Missing documents read as "no run"; corrupt documents and other fs errors throw StoreUnavailableError
 *   - waitForFlag polls every pollIntervalMs (default 500ms)
 * Side-effects: IO (filesystem)
 * Links: ControlStorePort, file-lock.ts
 * @public
 */

import { randomUUID } from "node:crypto";
import { mkdir, readdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";

import {
  type ControlStorePort,
  DEFAULT_POLL_INTERVAL_MS,
  type FlagState,
  isStoreUnavailableError,
  isValidRunId,
  pollUntil,
  readFlag,
  resolveFlagWrite,
  RUN_STATUSES,
  type RunId,
  type RunSnapshot,
  type RunStatus,
  StoreUnavailableError,
  toRunId,
  type WaitForFlagOptions,
} from "@runctl/control-core";
import type { JsonValue } from "type-fest";
import { z } from "zod";

import {
  acquireFileLock,
  DEFAULT_FILE_LOCK_OPTIONS,
  type FileLockOptions,
  hasErrorCode,
} from "./file-lock";

const DOCUMENT_EXT = ".json";
const LOCK_EXT = ".lock";

type StoredJson =
  | string
  | number
  | boolean
  | null
  | StoredJson[]
  | { [key: string]: StoredJson };

const StoredJsonSchema: z.ZodType<StoredJson> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(StoredJsonSchema),
    z.record(StoredJsonSchema),
  ])
);

const RunDocumentSchema = z.object({
  status: z.enum(RUN_STATUSES).nullable(),
  flags: z.record(z.boolean()),
  metadata: z.record(StoredJsonSchema),
  createdAt: z.string(),
  updatedAt: z.string(),
});

interface RunDocument {
  status: RunStatus | null;
  flags: Record<string, boolean>;
  metadata: Record<string, JsonValue>;
  createdAt: string;
  updatedAt: string;
}

export interface FileControlStoreOptions {
  /** Directory shared by orchestrator and worker processes. Created on first write. */
  directory: string;
  pollIntervalMs?: number | undefined;
  lock?: Partial<FileLockOptions> | undefined;
  /** Returns ISO 8601 timestamps. Defaults to the system clock. */
  now?: (() => string) | undefined;
}

function toUnavailable(operation: string, error: unknown): StoreUnavailableError {
  if (isStoreUnavailableError(error)) {
    return error;
  }
  return new StoreUnavailableError(
    operation,
    error instanceof Error ? error : new Error(String(error))
  );
}

export class FileControlStore implements ControlStorePort {
  private readonly directory: string;
  private readonly pollIntervalMs: number;
  private readonly lockOptions: FileLockOptions;
  private readonly now: () => string;
  private directoryReady: Promise<void> | null = null;
  private closed = false;

  constructor(options: FileControlStoreOptions) {
    this.directory = path.resolve(options.directory);
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.lockOptions = { ...DEFAULT_FILE_LOCK_OPTIONS, ...options.lock };
    this.now = options.now ?? (() => new Date().toISOString());
  }

  async setFlag(runId: RunId, flag: string, value: boolean): Promise<void> {
    await this.update("setFlag", runId, (doc) => {
      doc.flags[flag] = resolveFlagWrite(doc.flags, flag, value);
    });
  }

  async checkFlag(runId: RunId, flag: string): Promise<boolean> {
    const doc = await this.read("checkFlag", runId);
    return readFlag(doc?.flags ?? {}, flag);
  }

  async waitForFlag(
    runId: RunId,
    flag: string,
    options: WaitForFlagOptions = {}
  ): Promise<boolean> {
    const until =
      options.until ?? ((flags: FlagState) => !readFlag(flags, flag));

    return pollUntil(
      async () => {
        const doc = await this.read("waitForFlag", runId);
        return until(doc?.flags ?? {});
      },
      {
        intervalMs: options.pollIntervalMs ?? this.pollIntervalMs,
        timeoutMs: options.timeoutMs,
      }
    );
  }

  async setStatus(runId: RunId, status: RunStatus): Promise<void> {
    await this.update("setStatus", runId, (doc) => {
      doc.status = status;
    });
  }

  async getStatus(runId: RunId): Promise<RunStatus | null> {
    const doc = await this.read("getStatus", runId);
    return doc?.status ?? null;
  }

  async setMetadata(runId: RunId, key: string, value: JsonValue): Promise<void> {
    await this.update("setMetadata", runId, (doc) => {
      doc.metadata[key] = value;
    });
  }

  async getMetadata(runId: RunId, key: string): Promise<JsonValue | null> {
    const doc = await this.read("getMetadata", runId);
    return doc?.metadata[key] ?? null;
  }

  async describeRun(runId: RunId): Promise<RunSnapshot | null> {
    const doc = await this.read("describeRun", runId);
    if (!doc) {
      return null;
    }
    return { runId, ...doc };
  }

  async listRunIds(): Promise<RunId[]> {
    this.ensureOpen("listRunIds");
    let entries: string[];
    try {
      entries = await readdir(this.directory);
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) {
        return [];
      }
      throw toUnavailable("listRunIds", error);
    }
    return entries
      .filter((name) => name.endsWith(DOCUMENT_EXT))
      .map((name) => name.slice(0, -DOCUMENT_EXT.length))
      .filter(isValidRunId)
      .map(toRunId)
      .sort();
  }

  async deleteRun(runId: RunId): Promise<void> {
    await this.withRunLock("deleteRun", runId, async () => {
      await rm(this.documentPath(runId), { force: true });
    });
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private documentPath(runId: RunId): string {
    return path.join(this.directory, `${runId}${DOCUMENT_EXT}`);
  }

  private async read(operation: string, runId: RunId): Promise<RunDocument | null> {
    this.ensureOpen(operation);
    const file = this.documentPath(runId);
    let raw: string;
    try {
      raw = await readFile(file, "utf8");
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) {
        return null;
      }
      throw toUnavailable(operation, error);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw toUnavailable(operation, error);
    }
    const parsed = RunDocumentSchema.safeParse(json);
    if (!parsed.success) {
      throw new StoreUnavailableError(
        operation,
        new Error(`Corrupt run document ${file}: ${parsed.error.message}`)
      );
    }
    return parsed.data;
  }

  private async update(
    operation: string,
    runId: RunId,
    apply: (doc: RunDocument) => void
  ): Promise<void> {
    await this.withRunLock(operation, runId, async () => {
      const now = this.now();
      const doc: RunDocument = (await this.read(operation, runId)) ?? {
        status: null,
        flags: {},
        metadata: {},
        createdAt: now,
        updatedAt: now,
      };
      apply(doc);
      doc.updatedAt = now;

      const target = this.documentPath(runId);
      const temp = `${target}.${process.pid}.${randomUUID()}.tmp`;
      try {
        await writeFile(temp, JSON.stringify(doc), "utf8");
        await rename(temp, target);
      } catch (error) {
        await rm(temp, { force: true });
        throw error;
      }
    });
  }

  private async withRunLock(
    operation: string,
    runId: RunId,
    fn: () => Promise<void>
  ): Promise<void> {
    this.ensureOpen(operation);
    try {
      await this.ensureDirectory();
      const release = await acquireFileLock(
        path.join(this.directory, `${runId}${LOCK_EXT}`),
        this.lockOptions
      );
      try {
        await fn();
      } finally {
        await release();
      }
    } catch (error) {
      throw toUnavailable(operation, error);
    }
  }

  private ensureDirectory(): Promise<void> {
    if (!this.directoryReady) {
      this.directoryReady = mkdir(this.directory, { recursive: true }).then(
        () => undefined,
        (error: unknown) => {
          this.directoryReady = null;
          throw error;
        }
      );
    }
    return this.directoryReady;
  }

  private ensureOpen(operation: string): void {
    if (this.closed) {
      throw new StoreUnavailableError(operation, new Error("store closed"));
    }
  }
}
