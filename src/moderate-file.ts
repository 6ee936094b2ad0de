import { basename, join } from "node:path";

import { readChapterIndex, upsertChapterRecord } from "./checkpoint.js";
import { runComplianceLoop, type ComplianceOutcome } from "./compliance.js";
import { NovelCliError } from "./errors.js";
import { isDirectory, listFileNames, readTextFile } from "./fs-utils.js";
import type { Logger } from "./logger.js";
import { writeChapterArtifact } from "./manuscript.js";
import type { GenerationOracle } from "./oracle/generation.js";
import type { ModerationOracle } from "./oracle/moderation.js";
import { deriveChapterTitle } from "./pipeline.js";
import { resolveProjectPathArg } from "./safe-path.js";
import { sleep as defaultSleep, type Sleep } from "./sleep.js";
import { MODERATION_FAILED_MARKER, type ChapterStatus } from "./steps.js";

const CHAPTER_FILE_RE = /^chapter-(\d+)(?:-(.+))?\.md$/u;

export function parseChapterFileName(name: string): { chapter: number; suffix: string | null } | null {
  const m = CHAPTER_FILE_RE.exec(name);
  if (!m?.[1]) return null;
  const chapter = Number.parseInt(m[1], 10);
  if (!Number.isInteger(chapter) || chapter < 1) return null;
  return { chapter, suffix: m[2] ?? null };
}

export type ModerateFileArgs = {
  rootDir: string;
  file: string;
  moderation: ModerationOracle;
  generation: GenerationOracle;
  repairModel: string;
  maxRounds: number;
  cooldownMs: number;
  sleep?: Sleep;
  logger: Logger;
};

export type ModerateFileResult = {
  chapter: number;
  status: ChapterStatus;
  previous_file: string;
  file: string;
  rounds: number;
  moderation_calls: number;
  repair_calls: number;
};

/**
 * Runs the compliance loop over an existing chapter artifact and renames it by outcome. An
 * existing title survives a pass; a file without one gets a derived title.
 */
export async function moderateChapterFile(args: ModerateFileArgs): Promise<ModerateFileResult> {
  const { abs, rel } = resolveProjectPathArg(args.rootDir, args.file, "<file>");
  const parsed = parseChapterFileName(basename(abs));
  if (!parsed) throw new NovelCliError(`Not a chapter file (expected chapter-NNN[-title].md): ${rel}`, 2);
  const { chapter } = parsed;

  const text = await readTextFile(abs);
  if (text.trim().length === 0) throw new NovelCliError(`Chapter file is empty: ${rel}`, 2);

  const outcome: ComplianceOutcome = await runComplianceLoop({
    rootDir: args.rootDir,
    chapter,
    text: text.trim(),
    moderation: args.moderation,
    oracle: args.generation,
    model: args.repairModel,
    maxRounds: args.maxRounds,
    cooldownMs: args.cooldownMs,
    sleep: args.sleep,
    logger: args.logger
  });

  const status: ChapterStatus = outcome.status === "compliant" ? "compliant" : "moderation_failed";
  let title = "";
  if (status === "compliant") {
    title =
      parsed.suffix && parsed.suffix !== MODERATION_FAILED_MARKER
        ? parsed.suffix
        : await deriveChapterTitle({ generation: args.generation, model: args.repairModel, chapter, text: outcome.text, logger: args.logger });
  }

  const file = await writeChapterArtifact({ rootDir: args.rootDir, chapter, status, title, text: outcome.text });

  const index = await readChapterIndex(args.rootDir);
  const existing = index.chapters.find((c) => c.chapter === chapter);
  await upsertChapterRecord(args.rootDir, {
    chapter,
    status,
    title,
    file,
    residual_conflicts: existing?.residual_conflicts ?? 0,
    moderation_rounds: outcome.rounds
  });

  return {
    chapter,
    status,
    previous_file: rel,
    file,
    rounds: outcome.rounds,
    moderation_calls: outcome.moderation_calls,
    repair_calls: outcome.repair_calls
  };
}

export type BatchOutcome = ChapterStatus | "skipped" | "error";

export type BatchEntry = {
  file: string;
  outcome: BatchOutcome;
  renamed_to: string | null;
  detail: string;
};

export type BatchModerationResult = {
  directory: string;
  entries: BatchEntry[];
  counts: Record<Exclude<BatchOutcome, "unchecked">, number>;
};

/**
 * Moderates every `*.md` file of a directory in name order, pausing `fileGapMs` between
 * processed files. Empty or misnamed files are skipped; a file whose moderation or rewrite
 * fails is recorded and the batch moves on.
 */
export async function moderateChapterDirectory(
  args: Omit<ModerateFileArgs, "file"> & { dir: string; fileGapMs: number }
): Promise<BatchModerationResult> {
  const { abs, rel } = resolveProjectPathArg(args.rootDir, args.dir, "<path>");
  if (!(await isDirectory(abs))) throw new NovelCliError(`Not a directory: ${rel}`, 2);
  const pause = args.sleep ?? defaultSleep;
  const log = args.logger;

  const entries: BatchEntry[] = [];
  let processed = 0;
  for (const name of await listFileNames(abs)) {
    if (!name.endsWith(".md")) continue;
    const file = rel.length > 0 ? `${rel}/${name}` : name;

    if (!parseChapterFileName(name)) {
      entries.push({ file, outcome: "skipped", renamed_to: null, detail: "not a chapter file" });
      continue;
    }
    if ((await readTextFile(join(abs, name))).trim().length === 0) {
      entries.push({ file, outcome: "skipped", renamed_to: null, detail: "empty" });
      continue;
    }

    if (processed > 0 && args.fileGapMs > 0) await pause(args.fileGapMs);
    processed += 1;
    try {
      const result = await moderateChapterFile({ ...args, file });
      entries.push({
        file,
        outcome: result.status,
        renamed_to: result.file,
        detail: `${result.moderation_calls} check(s), ${result.repair_calls} rewrite(s)`
      });
    } catch (err: unknown) {
      if (!(err instanceof NovelCliError)) throw err;
      log.warn(`${file}: moderation aborted`, { error: err.message });
      entries.push({ file, outcome: "error", renamed_to: null, detail: err.message });
    }
  }

  const counts = { compliant: 0, moderation_failed: 0, skipped: 0, error: 0 };
  for (const e of entries) if (e.outcome !== "unchecked") counts[e.outcome] += 1;
  log.info(`batch moderation of ${rel.length > 0 ? rel : "."} finished`, counts);
  return { directory: rel, entries, counts };
}
