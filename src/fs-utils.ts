import { appendFile, mkdir, readFile, readdir, rename, rm, stat, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import { NovelCliError, errorMessage } from "./errors.js";

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function errCode(err: unknown): string | undefined {
  return (err as { code?: string }).code;
}

async function renameWithRetry(from: string, to: string, attempts: number): Promise<void> {
  for (let i = 0; ; i += 1) {
    try {
      await rename(from, to);
      return;
    } catch (err: unknown) {
      const code = errCode(err);
      const retryable = code === "EBUSY" || code === "EPERM" || code === "EACCES";
      if (!retryable || i >= attempts - 1) throw err;
      await sleep(40 * (i + 1));
    }
  }
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

export async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

export async function ensureDir(path: string): Promise<void> {
  await mkdir(path, { recursive: true });
}

export async function readTextFile(path: string): Promise<string> {
  try {
    return await readFile(path, "utf8");
  } catch (err: unknown) {
    throw new NovelCliError(`Failed to read file: ${path}. ${errorMessage(err)}`);
  }
}

export async function readJsonFile(path: string): Promise<unknown> {
  const raw = await readTextFile(path);
  try {
    return JSON.parse(raw) as unknown;
  } catch (err: unknown) {
    throw new NovelCliError(`Invalid JSON: ${path}. ${errorMessage(err)}`);
  }
}

export async function writeTextFile(path: string, contents: string): Promise<void> {
  try {
    await ensureDir(dirname(path));
    await writeFile(path, contents, "utf8");
  } catch (err: unknown) {
    throw new NovelCliError(`Failed to write file: ${path}. ${errorMessage(err)}`);
  }
}

/**
 * Whole-file replace: the payload goes to a sibling temp file first and is renamed over the
 * target, so a reader sees either the previous contents or the new ones.
 */
export async function writeTextFileAtomic(path: string, contents: string): Promise<void> {
  const tmpPath = `${path}.tmp-${process.pid}-${Date.now()}-${Math.random().toString(16).slice(2)}`;
  try {
    await ensureDir(dirname(path));
    await writeFile(tmpPath, contents, "utf8");
    await renameWithRetry(tmpPath, path, 8);
  } catch (err: unknown) {
    await rm(tmpPath, { force: true });
    throw new NovelCliError(`Failed to write file atomically: ${path}. ${errorMessage(err)}`);
  }
}

export async function writeJsonFile(path: string, payload: unknown): Promise<void> {
  await writeTextFile(path, `${JSON.stringify(payload, null, 2)}\n`);
}

export async function writeJsonFileAtomic(path: string, payload: unknown): Promise<void> {
  await writeTextFileAtomic(path, `${JSON.stringify(payload, null, 2)}\n`);
}

export async function appendJsonLine(path: string, record: unknown): Promise<void> {
  try {
    await ensureDir(dirname(path));
    await appendFile(path, `${JSON.stringify(record)}\n`, "utf8");
  } catch (err: unknown) {
    throw new NovelCliError(`Failed to append to file: ${path}. ${errorMessage(err)}`);
  }
}

export async function listFileNames(dir: string): Promise<string[]> {
  if (!(await pathExists(dir))) return [];
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((e) => e.isFile())
    .map((e) => e.name)
    .sort();
}

export async function removePath(path: string): Promise<void> {
  try {
    await rm(path, { recursive: true, force: true });
  } catch (err: unknown) {
    throw new NovelCliError(`Failed to remove path: ${path}. ${errorMessage(err)}`);
  }
}
