import { isAbsolute, join, relative, resolve, sep } from "node:path";

import { NovelCliError } from "./errors.js";

export function rejectPathTraversalInput(inputPath: string, label: string): void {
  const normalized = inputPath.replaceAll("\\", "/");
  const parts = normalized.split("/").filter(Boolean);
  if (parts.includes("..")) {
    throw new NovelCliError(`${label} must not contain '..' path traversal segments.`, 2);
  }
}

export function assertInsideProjectRoot(projectRootAbs: string, absolutePath: string): void {
  const root = projectRootAbs.endsWith(sep) ? projectRootAbs : `${projectRootAbs}${sep}`;
  if (absolutePath === projectRootAbs) return;
  if (!absolutePath.startsWith(root)) {
    throw new NovelCliError(`Unsafe path outside project root: ${absolutePath}`, 2);
  }
}

/**
 * Resolves a file or directory given on the command line. Absolute paths must still land
 * inside the project root. Returns both the absolute and the project-relative form.
 */
export function resolveProjectPathArg(projectRootAbs: string, input: string, label: string): { abs: string; rel: string } {
  if (input.trim().length === 0) throw new NovelCliError(`Invalid ${label}: must be a non-empty path.`, 2);
  rejectPathTraversalInput(input, label);
  const abs = isAbsolute(input) ? resolve(input) : join(projectRootAbs, input);
  assertInsideProjectRoot(projectRootAbs, abs);
  return { abs, rel: relative(projectRootAbs, abs).split(sep).join("/") };
}
