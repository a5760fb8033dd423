// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runctl/control-store/memory`
 * Purpose: In-process implementation of ControlStorePort.
 * Scope: Single-process orchestrator + worker (tests, embedded runs). Not visible across processes.
 * Invariants:
 *   - Waits are push-notified on every write to the run; no polling
 *   - Per CANCEL_IS_STICKY via resolveFlagWrite
 *   - Metadata is copied on the way in and out; callers never share a reference with the store
 *   - After close(), pending waits reject and every call throws StoreUnavailableError
 * Side-effects: none (memory only)
 * Links: ControlStorePort
 * @public
 */

import { EventEmitter } from "node:events";

import {
  type ControlStorePort,
  type FlagState,
  readFlag,
  resolveFlagWrite,
  type RunId,
  type RunSnapshot,
  type RunStatus,
  StoreUnavailableError,
  type WaitForFlagOptions,
} from "@runctl/control-core";
import type { JsonValue } from "type-fest";

interface RunRecord {
  status: RunStatus | null;
  flags: Record<string, boolean>;
  metadata: Record<string, JsonValue>;
  createdAt: string;
  updatedAt: string;
}

const CLOSED_EVENT = "closed";

function changeEvent(runId: RunId): string {
  return `change:${runId}`;
}

export interface MemoryControlStoreOptions {
  /** Returns ISO 8601 timestamps. Defaults to the system clock. */
  now?: (() => string) | undefined;
}

export class MemoryControlStore implements ControlStorePort {
  private readonly runs = new Map<RunId, RunRecord>();
  private readonly changes = new EventEmitter();
  private readonly now: () => string;
  private closed = false;

  constructor(options: MemoryControlStoreOptions = {}) {
    this.now = options.now ?? (() => new Date().toISOString());
    // One listener per pending wait
    this.changes.setMaxListeners(0);
  }

  async setFlag(runId: RunId, flag: string, value: boolean): Promise<void> {
    this.mutate("setFlag", runId, (record) => {
      record.flags[flag] = resolveFlagWrite(record.flags, flag, value);
    });
  }

  async checkFlag(runId: RunId, flag: string): Promise<boolean> {
    this.ensureOpen("checkFlag");
    return readFlag(this.flagsOf(runId), flag);
  }

  waitForFlag(
    runId: RunId,
    flag: string,
    options: WaitForFlagOptions = {}
  ): Promise<boolean> {
    try {
      this.ensureOpen("waitForFlag");
    } catch (error) {
      return Promise.reject(error);
    }

    const until =
      options.until ?? ((flags: FlagState) => !readFlag(flags, flag));
    const timeoutMs = options.timeoutMs ?? null;

    if (until(this.flagsOf(runId))) {
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve, reject) => {
      const startedAt = performance.now();
      let timer: NodeJS.Timeout | undefined;

      const cleanup = (): void => {
        this.changes.off(changeEvent(runId), onChange);
        this.changes.off(CLOSED_EVENT, onClosed);
        if (timer) {
          clearTimeout(timer);
        }
      };
      const onChange = (): void => {
        if (until(this.flagsOf(runId))) {
          cleanup();
          resolve(true);
        }
      };
      const onClosed = (): void => {
        cleanup();
        reject(new StoreUnavailableError("waitForFlag", new Error("store closed")));
      };
      const remainingMs = (totalMs: number): number =>
        totalMs - (performance.now() - startedAt);
      const armTimeout = (totalMs: number): void => {
        timer = setTimeout(() => {
          // Timers may fire marginally early; only report timeout once it has fully elapsed
          if (remainingMs(totalMs) > 0) {
            armTimeout(totalMs);
            return;
          }
          cleanup();
          resolve(false);
        }, Math.max(0, Math.ceil(remainingMs(totalMs))));
      };

      this.changes.on(changeEvent(runId), onChange);
      this.changes.on(CLOSED_EVENT, onClosed);
      if (timeoutMs !== null) {
        armTimeout(timeoutMs);
      }
    });
  }

  async setStatus(runId: RunId, status: RunStatus): Promise<void> {
    this.mutate("setStatus", runId, (record) => {
      record.status = status;
    });
  }

  async getStatus(runId: RunId): Promise<RunStatus | null> {
    this.ensureOpen("getStatus");
    return this.runs.get(runId)?.status ?? null;
  }

  async setMetadata(runId: RunId, key: string, value: JsonValue): Promise<void> {
    this.mutate("setMetadata", runId, (record) => {
      record.metadata[key] = structuredClone(value);
    });
  }

  async getMetadata(runId: RunId, key: string): Promise<JsonValue | null> {
    this.ensureOpen("getMetadata");
    const value = this.runs.get(runId)?.metadata[key];
    return value === undefined ? null : structuredClone(value);
  }

  async describeRun(runId: RunId): Promise<RunSnapshot | null> {
    this.ensureOpen("describeRun");
    const record = this.runs.get(runId);
    if (!record) {
      return null;
    }
    return {
      runId,
      status: record.status,
      flags: { ...record.flags },
      metadata: structuredClone(record.metadata),
      createdAt: record.createdAt,
      updatedAt: record.updatedAt,
    };
  }

  async listRunIds(): Promise<RunId[]> {
    this.ensureOpen("listRunIds");
    return [...this.runs.keys()];
  }

  async deleteRun(runId: RunId): Promise<void> {
    this.ensureOpen("deleteRun");
    this.runs.delete(runId);
    this.changes.emit(changeEvent(runId));
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.changes.emit(CLOSED_EVENT);
    this.changes.removeAllListeners();
    this.runs.clear();
  }

  private flagsOf(runId: RunId): FlagState {
    return this.runs.get(runId)?.flags ?? {};
  }

  private mutate(
    operation: string,
    runId: RunId,
    apply: (record: RunRecord) => void
  ): void {
    this.ensureOpen(operation);
    const now = this.now();
    let record = this.runs.get(runId);
    if (!record) {
      record = {
        status: null,
        flags: {},
        metadata: {},
        createdAt: now,
        updatedAt: now,
      };
      this.runs.set(runId, record);
    }
    apply(record);
    record.updatedAt = now;
    this.changes.emit(changeEvent(runId));
  }

  private ensureOpen(operation: string): void {
    if (this.closed) {
      throw new StoreUnavailableError(operation, new Error("store closed"));
    }
  }
}
