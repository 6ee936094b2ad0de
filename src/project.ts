import { resolve } from "node:path";

import { NovelCliError } from "./errors.js";
import { ensureDir, isDirectory, pathExists } from "./fs-utils.js";
import { rejectPathTraversalInput } from "./safe-path.js";

type ResolveProjectRootArgs = {
  cwd: string;
  projectOverride?: string;
  /** Create the directory when it does not exist yet (the `run` command). */
  create?: boolean;
};

/** Output root of a novel: `--project <dir>` relative to cwd, or cwd itself. */
export async function resolveProjectRoot(args: ResolveProjectRootArgs): Promise<string> {
  const cwdAbs = resolve(args.cwd);
  if (!args.projectOverride) return cwdAbs;

  rejectPathTraversalInput(args.projectOverride, "--project");
  const candidate = resolve(cwdAbs, args.projectOverride);
  if (await isDirectory(candidate)) return candidate;
  if (await pathExists(candidate)) throw new NovelCliError(`Project root is not a directory: ${candidate}`, 2);
  if (!args.create) throw new NovelCliError(`Project root does not exist: ${candidate}`, 2);
  await ensureDir(candidate);
  return candidate;
}
