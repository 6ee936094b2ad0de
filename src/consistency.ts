import { join } from "node:path";

import { formatConflict, type ConflictRecord, type FactDelta } from "./fact-ledger.js";
import { extractFacts, type FactStore } from "./fact-store.js";
import { writeJsonFile } from "./fs-utils.js";
import type { Logger } from "./logger.js";
import type { GenerationOracle, SamplingParams } from "./oracle/generation.js";
import { cleanChapterText } from "./post-process.js";
import { buildConsistencyRepairPrompt } from "./prompts.js";
import { chapterRelPaths } from "./steps.js";

export const CONSISTENCY_REPAIR_SAMPLING: SamplingParams = { temperature: 0.4, top_p: 0.85, max_output_tokens: 4600 };

export type ConsistencyStatus = "clean" | "repaired" | "residual";

export type ConsistencyOutcome = {
  text: string;
  status: ConsistencyStatus;
  /** Conflicts found in the first extraction. */
  conflicts: ConflictRecord[];
  /** Conflicts still present after the single repair. */
  residual: ConflictRecord[];
};

async function writeFactsLog(rootDir: string, rel: string, delta: FactDelta, conflicts: ConflictRecord[]): Promise<void> {
  await writeJsonFile(join(rootDir, rel), { extracted: delta, conflicts: conflicts.map(formatConflict) });
}

/**
 * Extract, diff, and at most one repair. The repaired text replaces the working text even when
 * conflicts remain; in that case the ledger is left untouched and only character state advances.
 */
export async function runConsistencyStage(args: {
  rootDir: string;
  chapter: number;
  text: string;
  store: FactStore;
  oracle: GenerationOracle;
  model?: string;
  logger: Logger;
}): Promise<ConsistencyOutcome> {
  const { rootDir, chapter, store, oracle, logger } = args;
  const paths = chapterRelPaths(chapter);

  const first = await extractFacts({ oracle, text: args.text, model: args.model, logger });
  const conflicts = store.conflictsWith(first);
  await writeFactsLog(rootDir, paths.factsLog, first, conflicts);

  if (conflicts.length === 0) {
    store.merge(first);
    store.applyChapterState(chapter, first);
    logger.debug(`chapter ${chapter}: no conflicts`, { characters: Object.keys(first.characters).length, events: first.events.length });
    return { text: args.text, status: "clean", conflicts: [], residual: [] };
  }

  logger.info(`chapter ${chapter}: ${conflicts.length} conflict(s), repairing once`, { conflicts: conflicts.map(formatConflict) });
  const prompt = buildConsistencyRepairPrompt({ ledger: store.ledger, conflicts, text: args.text });
  const res = await oracle.generate({ purpose: "consistency_repair", ...prompt, sampling: CONSISTENCY_REPAIR_SAMPLING, model: args.model });
  const repaired = res.flagged ? "" : cleanChapterText(res.text);
  if (repaired.length === 0) logger.warn(`chapter ${chapter}: repair produced no text; keeping the draft`, { flagged: res.flagged });
  const text = repaired.length > 0 ? repaired : args.text;

  const second = await extractFacts({ oracle, text, model: args.model, logger });
  const residual = store.conflictsWith(second);
  await writeFactsLog(rootDir, paths.factsFixedLog, second, residual);
  store.applyChapterState(chapter, second);

  if (residual.length === 0) {
    store.merge(second);
    return { text, status: "repaired", conflicts, residual: [] };
  }

  logger.warn(`chapter ${chapter}: ${residual.length} conflict(s) remain after repair; ledger left unchanged`, {
    residual: residual.map(formatConflict)
  });
  return { text, status: "residual", conflicts, residual };
}
