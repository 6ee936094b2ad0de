import { mkdir, stat } from "node:fs/promises";
import { join } from "node:path";

import { NovelCliError, errorMessage } from "./errors.js";
import { readJsonFile, removePath, writeJsonFile } from "./fs-utils.js";
import { asInt, isPlainObject } from "./type-guards.js";

export const LOCK_DIR_NAME = ".novel.lock";
const LOCK_INFO_FILE = "info.json";
const STALE_AFTER_MINUTES = 30;

/** Who holds the lock; every field is best effort since the holder may have died mid-write. */
export type LockInfo = {
  pid?: number;
  started?: string;
  command?: string;
  chapter?: number;
};

export type LockStatus = {
  exists: boolean;
  stale: boolean;
  lockDir: string;
  infoPath: string;
  info?: LockInfo;
};

function lockPaths(rootDir: string): { lockDir: string; infoPath: string } {
  const lockDir = join(rootDir, LOCK_DIR_NAME);
  return { lockDir, infoPath: join(lockDir, LOCK_INFO_FILE) };
}

function toLockInfo(raw: unknown): LockInfo {
  if (!isPlainObject(raw)) return {};
  const pid = asInt(raw.pid);
  const chapter = asInt(raw.chapter);
  return {
    ...(pid !== null ? { pid } : {}),
    ...(typeof raw.started === "string" ? { started: raw.started } : {}),
    ...(typeof raw.command === "string" ? { command: raw.command } : {}),
    ...(chapter !== null ? { chapter } : {})
  };
}

async function readLockInfo(infoPath: string): Promise<LockInfo | undefined> {
  try {
    return toLockInfo(await readJsonFile(infoPath));
  } catch (err: unknown) {
    // A holder that crashed before writing info.json still leaves a valid lock.
    if (err instanceof NovelCliError && err.message.startsWith("Invalid JSON")) return {};
    return undefined;
  }
}

/** `null` when nothing exists at `path`; throws for anything that is not a directory. */
async function lockDirMtime(path: string): Promise<number | null> {
  try {
    const s = await stat(path);
    if (!s.isDirectory()) throw new NovelCliError(`Lock path exists but is not a directory: ${path}`, 2);
    return s.mtimeMs;
  } catch (err: unknown) {
    if ((err as { code?: string }).code === "ENOENT") return null;
    throw err;
  }
}

/** Age is measured from `info.started`, falling back to the lock directory's mtime. */
export async function getLockStatus(rootDir: string, nowMs: number = Date.now()): Promise<LockStatus> {
  const { lockDir, infoPath } = lockPaths(rootDir);
  const mtime = await lockDirMtime(lockDir);
  if (mtime === null) return { exists: false, stale: false, lockDir, infoPath };

  const info = await readLockInfo(infoPath);
  const startedMs = info?.started ? Date.parse(info.started) : Number.NaN;
  const since = Number.isFinite(startedMs) ? startedMs : mtime;
  return { exists: true, stale: nowMs - since > STALE_AFTER_MINUTES * 60_000, lockDir, infoPath, info };
}

function describeHolder(info: LockInfo | undefined): string {
  return `command=${info?.command ?? "unknown"} started=${info?.started ?? "unknown"} pid=${info?.pid ?? "unknown"}`;
}

export async function clearStaleLock(rootDir: string): Promise<boolean> {
  const status = await getLockStatus(rootDir);
  if (!status.exists) return false;
  if (!status.stale) {
    throw new NovelCliError(`Lock is active; refusing to clear. Use after ${STALE_AFTER_MINUTES} minutes or stop the other run.`, 2);
  }
  await removePath(status.lockDir);
  return true;
}

/** mkdir is the atomic step; a stale holder is evicted at most twice before giving up. */
async function acquire(rootDir: string): Promise<string> {
  const { lockDir } = lockPaths(rootDir);
  for (let attempt = 0; attempt < 3; attempt += 1) {
    try {
      await mkdir(lockDir);
      return lockDir;
    } catch (err: unknown) {
      if ((err as { code?: string }).code !== "EEXIST") {
        throw new NovelCliError(`Failed to acquire lock: ${errorMessage(err)}`, 2);
      }
    }
    const status = await getLockStatus(rootDir);
    if (status.exists && !status.stale) {
      throw new NovelCliError(`Another run holds the lock (${describeHolder(status.info)}).`, 2);
    }
    await removePath(lockDir);
  }
  throw new NovelCliError("Failed to acquire lock after clearing stale lock; another run likely acquired it.", 2);
}

/** Holds `.novel.lock` for the duration of `fn`. A lock older than 30 minutes is taken over. */
export async function withWriteLock<T>(rootDir: string, meta: { command: string; chapter?: number }, fn: () => Promise<T>): Promise<T> {
  const lockDir = await acquire(rootDir);
  try {
    await writeJsonFile(join(lockDir, LOCK_INFO_FILE), {
      pid: process.pid,
      started: new Date().toISOString(),
      command: meta.command,
      chapter: meta.chapter ?? null
    });
    return await fn();
  } finally {
    await removePath(lockDir);
  }
}
