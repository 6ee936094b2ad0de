import { join } from "node:path";

import type { StoryBlueprint } from "./blueprint.js";
import { buildSnapshot, loadSnapshot, restoreSnapshot, upsertChapterRecord, writeSnapshot } from "./checkpoint.js";
import { runComplianceLoop } from "./compliance.js";
import type { RunConfig } from "./config.js";
import { runConsistencyStage, type ConsistencyStatus } from "./consistency.js";
import { NovelCliError, OracleError, errorMessage } from "./errors.js";
import { FactStore } from "./fact-store.js";
import { ensureDir, writeJsonFile, writeTextFile } from "./fs-utils.js";
import type { Logger } from "./logger.js";
import { assembleManuscript, writeChapterArtifact, type AssembleResult } from "./manuscript.js";
import type { GenerationOracle, SamplingParams } from "./oracle/generation.js";
import type { ModerationOracle } from "./oracle/moderation.js";
import { processUsage, type UsageMeter, type UsageSnapshot } from "./oracle/usage.js";
import { PlotBook } from "./plot-threads.js";
import { cleanChapterText, extractSummaryLines, fallbackTitle, sanitizeTitle } from "./post-process.js";
import { buildChapterPrompt, buildSummaryPrompt, buildTitlePrompt } from "./prompts.js";
import { RollingContext } from "./rolling-context.js";
import { sleep as defaultSleep, type Sleep } from "./sleep.js";
import { FATAL_ERROR_REL, USAGE_REL, chapterRelPaths, type ChapterStage, type ChapterStatus, type RunStage } from "./steps.js";

export const SUMMARY_SAMPLING: SamplingParams = { temperature: 0.6, top_p: 0.85, max_output_tokens: 800 };
export const TITLE_SAMPLING: SamplingParams = { temperature: 0.5, top_p: 0.85, max_output_tokens: 20 };

const OUTPUT_DIRS = ["chapters", "summaries", "logs", "state"] as const;

export type PipelineDeps = {
  rootDir: string;
  config: RunConfig;
  blueprint: StoryBlueprint;
  generation: GenerationOracle;
  /** `null` skips the compliance stage; chapters are then recorded as `unchecked`. */
  moderation: ModerationOracle | null;
  logger: Logger;
  sleep?: Sleep;
  usage?: UsageMeter;
};

export type ChapterReport = {
  chapter: number;
  status: ChapterStatus;
  title: string;
  file: string;
  consistency: ConsistencyStatus;
  residual_conflicts: number;
  moderation_rounds: number | null;
  summary_lines: number;
};

export type RunReport = {
  start_chapter: number;
  chapters: ChapterReport[];
  resumed_from: number | null;
  cold_resume: boolean;
  manuscript: AssembleResult;
  usage: UsageSnapshot;
};

type RunState = {
  store: FactStore;
  context: RollingContext;
  resumedFrom: number | null;
  coldResume: boolean;
};

function seededStore(blueprint: StoryBlueprint): FactStore {
  return new FactStore(undefined, undefined, PlotBook.seeded(blueprint.plot_threads));
}

async function restoreState(deps: PipelineDeps): Promise<RunState> {
  const { config, rootDir } = deps;
  const log = deps.logger.withScope("checkpoint");
  if (config.start_chapter <= 1) {
    return { store: seededStore(deps.blueprint), context: new RollingContext(config.window), resumedFrom: null, coldResume: false };
  }

  const prev = config.start_chapter - 1;
  const snapshot = await loadSnapshot(rootDir, prev);
  if (!snapshot) {
    log.warn(`cold resume: no snapshot for chapter ${prev}; continuing with an empty ledger and context`, { start_chapter: config.start_chapter });
    return { store: seededStore(deps.blueprint), context: new RollingContext(config.window), resumedFrom: null, coldResume: true };
  }

  const restored = restoreSnapshot(snapshot);
  log.info(`resumed from snapshot of chapter ${prev}`, {
    characters: Object.keys(snapshot.ledger.characters).length,
    events: snapshot.ledger.events.length,
    summaries: restored.context.chapters().length
  });
  const context = restored.context.size === config.window ? restored.context : restored.context.resized(config.window);
  return { store: restored.store, context, resumedFrom: prev, coldResume: false };
}

/** Short title from the repair model; any oracle failure or empty answer falls back to `第N章`. */
export async function deriveChapterTitle(args: {
  generation: GenerationOracle;
  model: string;
  chapter: number;
  text: string;
  logger: Logger;
}): Promise<string> {
  const { chapter, logger } = args;
  try {
    const res = await args.generation.generate({
      purpose: "title",
      ...buildTitlePrompt(args.text),
      sampling: TITLE_SAMPLING,
      model: args.model
    });
    const title = res.flagged ? "" : sanitizeTitle(res.text);
    if (title.length > 0) return title;
    logger.warn(`chapter ${chapter}: title came back empty; using positional title`, { flagged: res.flagged });
  } catch (err: unknown) {
    if (!(err instanceof OracleError)) throw err;
    logger.warn(`chapter ${chapter}: title generation failed; using positional title`, { error: err.message });
  }
  return fallbackTitle(chapter);
}

async function summarize(deps: PipelineDeps, chapter: number, text: string): Promise<string[]> {
  const res = await deps.generation.generate({
    purpose: "summary",
    ...buildSummaryPrompt(text),
    sampling: SUMMARY_SAMPLING,
    model: deps.config.llm.model
  });
  if (res.flagged) {
    deps.logger.withScope("pipeline").warn(`chapter ${chapter}: summary was flagged; context gets no entry for this chapter`);
    return [];
  }
  return extractSummaryLines(res.text);
}

async function runChapter(deps: PipelineDeps, state: RunState, chapter: number, track: (stage: ChapterStage) => void): Promise<ChapterReport> {
  const { rootDir, config, blueprint } = deps;
  const log = deps.logger.withScope("pipeline");
  const paths = chapterRelPaths(chapter);

  track("draft");
  const prompt = buildChapterPrompt({
    chapter,
    blueprint,
    window: state.context.window(chapter),
    ledger: state.store.ledger,
    characterLines: state.store.characters.briefLines(),
    threadLines: state.store.threads.briefLines()
  });
  const draft = await deps.generation.generate({ purpose: "chapter", ...prompt, sampling: config.sampling, model: config.llm.model });
  await writeTextFile(join(rootDir, paths.rawText), draft.text);
  const cleaned = draft.flagged ? "" : cleanChapterText(draft.text);
  if (cleaned.length === 0) {
    throw new OracleError(`Chapter ${chapter} draft is unusable (${draft.flagged ? "flagged by the service" : "empty"}).`);
  }
  log.info(`chapter ${chapter}: draft ready`, { chars: cleaned.length, finish_reason: draft.finish_reason });

  track("consistency");
  const consistency = await runConsistencyStage({
    rootDir,
    chapter,
    text: cleaned,
    store: state.store,
    oracle: deps.generation,
    model: config.llm.model,
    logger: deps.logger.withScope("facts")
  });

  track("moderation");
  let text = consistency.text;
  let status: ChapterStatus = "unchecked";
  let moderationRounds: number | null = null;
  if (deps.moderation) {
    const outcome = await runComplianceLoop({
      rootDir,
      chapter,
      text,
      moderation: deps.moderation,
      oracle: deps.generation,
      model: config.llm.repair_model,
      maxRounds: config.max_moderation_rounds,
      cooldownMs: config.moderation_cooldown_seconds * 1000,
      sleep: deps.sleep,
      logger: deps.logger.withScope("moderation")
    });
    text = outcome.text;
    status = outcome.status === "compliant" ? "compliant" : "moderation_failed";
    moderationRounds = outcome.rounds;
  }

  track("title");
  const title =
    status === "moderation_failed"
      ? ""
      : await deriveChapterTitle({ generation: deps.generation, model: config.llm.repair_model, chapter, text, logger: log });
  const file = await writeChapterArtifact({ rootDir, chapter, status, title, text });
  log.info(`chapter ${chapter}: written`, { file, status });

  track("summarize");
  const lines = await summarize(deps, chapter, text);
  await writeTextFile(join(rootDir, paths.summary), `${lines.map((l) => `- ${l}`).join("\n")}\n`);
  state.context.record(chapter, lines);

  track("checkpoint");
  await upsertChapterRecord(rootDir, {
    chapter,
    status,
    title,
    file,
    residual_conflicts: consistency.residual.length,
    moderation_rounds: moderationRounds
  });
  await writeSnapshot(rootDir, buildSnapshot(chapter, state.store, state.context));

  return {
    chapter,
    status,
    title,
    file,
    consistency: consistency.status,
    residual_conflicts: consistency.residual.length,
    moderation_rounds: moderationRounds,
    summary_lines: lines.length
  };
}

/** Writes `logs/fatal-error.json`; a failure to write is logged, never raised over `err`. */
export async function writeFatalError(
  target: { rootDir: string; logger: Logger },
  chapter: number,
  stage: RunStage,
  err: unknown
): Promise<void> {
  const payload = {
    timestamp: new Date().toISOString(),
    chapter,
    stage,
    error: err instanceof Error ? err.name : "Error",
    message: errorMessage(err),
    exit_code: err instanceof NovelCliError ? err.exitCode : 1
  };
  try {
    await writeJsonFile(join(target.rootDir, FATAL_ERROR_REL), payload);
  } catch (writeErr: unknown) {
    target.logger.error("could not write the fatal error report", { error: errorMessage(writeErr) });
  }
}

/**
 * Runs chapters `start_chapter..chapters` strictly in order. Each chapter leaves its artifact,
 * its index entry and its snapshot before the next one starts; a fatal error stops the run
 * with the previous snapshot as the resume point.
 */
export async function runNovel(deps: PipelineDeps): Promise<RunReport> {
  const { config, rootDir } = deps;
  const log = deps.logger.withScope("pipeline");
  const pause = deps.sleep ?? defaultSleep;
  const usage = deps.usage ?? processUsage;

  for (const dir of OUTPUT_DIRS) await ensureDir(join(rootDir, dir));
  const state = await restoreState(deps);

  log.info(`run: chapters ${config.start_chapter}..${config.chapters}`, {
    model: config.llm.model,
    dry_run: config.dry_run,
    moderation: deps.moderation !== null
  });

  const reports: ChapterReport[] = [];
  for (let chapter = config.start_chapter; chapter <= config.chapters; chapter += 1) {
    let stage: ChapterStage = "draft";
    try {
      reports.push(
        await runChapter(deps, state, chapter, (s) => {
          stage = s;
        })
      );
    } catch (err: unknown) {
      log.error(`chapter ${chapter}: aborted at ${stage}`, { error: errorMessage(err) });
      await writeFatalError(deps, chapter, stage, err);
      throw err;
    }

    if (chapter < config.chapters && config.wait_seconds > 0 && !config.dry_run) {
      log.info(`chapter ${chapter} done; waiting ${config.wait_seconds}s before chapter ${chapter + 1}`);
      await pause(config.wait_seconds * 1000);
    }
  }

  const snapshot = usage.snapshot();
  await writeJsonFile(join(rootDir, USAGE_REL), snapshot);
  log.info("usage", snapshot);

  const manuscript = await assembleManuscript(rootDir, config.chapters);
  if (manuscript.missing.length > 0) log.warn("manuscript is missing chapters", { missing: manuscript.missing });
  log.info(`manuscript written to ${manuscript.file}`, { chapters: manuscript.chapters.length });

  return {
    start_chapter: config.start_chapter,
    chapters: reports,
    resumed_from: state.resumedFrom,
    cold_resume: state.coldResume,
    manuscript,
    usage: snapshot
  };
}
