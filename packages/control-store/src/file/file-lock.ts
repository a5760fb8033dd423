// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runctl/control-store/file/file-lock`
 * Purpose: Cross-process exclusive lock backed by a create-exclusive lock file.
 * Scope: Acquire/release one lock path. Does not know about run documents.
 * Invariants:
 * - At most one holder per lock path across processes on the same host
 * - Each acquisition writes its own token; release removes the file only while it still holds that token
 * - A lock file older than staleMs is taken over (crashed holder) by renaming it aside, never by deleting in place
 * - A lock file that vanishes between EEXIST and inspection is retried, never removed
 * - Acquisition gives up after timeoutMs with FileLockTimeoutError
 * Side-effects: IO (filesystem)
 * @internal
 */

import { randomUUID } from "node:crypto";
import { link, open, readFile, rename, rm, stat } from "node:fs/promises";
import { setTimeout as sleep } from "node:timers/promises";

import { z } from "zod";

export interface FileLockOptions {
  readonly timeoutMs: number;
  readonly retryIntervalMs: number;
  readonly staleMs: number;
}

export const DEFAULT_FILE_LOCK_OPTIONS: FileLockOptions = {
  timeoutMs: 5_000,
  retryIntervalMs: 10,
  staleMs: 30_000,
};

export class FileLockTimeoutError extends Error {
  constructor(
    public readonly lockPath: string,
    public readonly timeoutMs: number
  ) {
    super(`Timed out after ${timeoutMs}ms acquiring lock ${lockPath}`);
    this.name = "FileLockTimeoutError";
  }
}

export function isFileLockTimeoutError(
  error: unknown
): error is FileLockTimeoutError {
  return error instanceof Error && error.name === "FileLockTimeoutError";
}

export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

export type ReleaseLock = () => Promise<void>;

const LockFileSchema = z.object({ token: z.string() });

type LockState =
  | { readonly kind: "missing" }
  | { readonly kind: "live" }
  | { readonly kind: "stale"; readonly token: string | null };

export async function acquireFileLock(
  lockPath: string,
  options: FileLockOptions = DEFAULT_FILE_LOCK_OPTIONS
): Promise<ReleaseLock> {
  const token = randomUUID();
  const deadline = performance.now() + options.timeoutMs;

  for (;;) {
    if (await tryCreate(lockPath, token)) {
      return async () => {
        if ((await readLockToken(lockPath)) === token) {
          await rm(lockPath, { force: true });
        }
      };
    }

    const state = await inspectLock(lockPath, options.staleMs);
    if (state.kind === "missing") {
      continue;
    }
    if (state.kind === "stale") {
      await evictStaleLock(lockPath, state.token, token);
      continue;
    }

    if (performance.now() >= deadline) {
      throw new FileLockTimeoutError(lockPath, options.timeoutMs);
    }
    await sleep(options.retryIntervalMs);
  }
}

async function tryCreate(lockPath: string, token: string): Promise<boolean> {
  try {
    const handle = await open(lockPath, "wx");
    try {
      await handle.writeFile(
        JSON.stringify({ pid: process.pid, token, acquiredAt: Date.now() })
      );
    } finally {
      await handle.close();
    }
    return true;
  } catch (error) {
    if (hasErrorCode(error, "EEXIST")) {
      return false;
    }
    throw error;
  }
}

/** null when the file is gone, still empty, or not a lock document. */
async function readLockToken(lockPath: string): Promise<string | null> {
  let raw: string;
  try {
    raw = await readFile(lockPath, "utf8");
  } catch (error) {
    if (hasErrorCode(error, "ENOENT")) {
      return null;
    }
    throw error;
  }
  try {
    const parsed = LockFileSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data.token : null;
  } catch {
    // Holder crashed between open() and write(), or is writing right now
    return null;
  }
}

async function inspectLock(lockPath: string, staleMs: number): Promise<LockState> {
  try {
    const info = await stat(lockPath);
    if (Date.now() - info.mtimeMs <= staleMs) {
      return { kind: "live" };
    }
  } catch (error) {
    if (hasErrorCode(error, "ENOENT")) {
      return { kind: "missing" };
    }
    throw error;
  }
  return { kind: "stale", token: await readLockToken(lockPath) };
}

/**
 * Moves a stale lock aside so that only one contender evicts it.
 * If the file moved is not the one judged stale, a new holder got in first: put it back.
 */
async function evictStaleLock(
  lockPath: string,
  staleToken: string | null,
  ownToken: string
): Promise<void> {
  const evictedPath = `${lockPath}.${ownToken}.stale`;
  try {
    await rename(lockPath, evictedPath);
  } catch (error) {
    if (hasErrorCode(error, "ENOENT")) {
      return;
    }
    throw error;
  }

  if ((await readLockToken(evictedPath)) !== staleToken) {
    try {
      await link(evictedPath, lockPath);
    } catch (error) {
      if (!hasErrorCode(error, "EEXIST")) {
        throw error;
      }
    }
  }
  await rm(evictedPath, { force: true });
}
