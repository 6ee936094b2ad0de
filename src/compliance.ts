import { join } from "node:path";

import { appendJsonLine } from "./fs-utils.js";
import type { Logger } from "./logger.js";
import type { GenerationOracle, SamplingParams } from "./oracle/generation.js";
import {
  extractHitWords,
  formatVerdictDetail,
  hitWordsOfVerdict,
  type ModerationOracle,
  type ModerationVerdict
} from "./oracle/moderation.js";
import { cleanChapterText } from "./post-process.js";
import { buildComplianceRepairPrompt } from "./prompts.js";
import { sleep as defaultSleep, type Sleep } from "./sleep.js";
import { chapterRelPaths } from "./steps.js";

export const COMPLIANCE_REPAIR_SAMPLING: SamplingParams = { temperature: 0.3, top_p: 0.8, max_output_tokens: 5000 };
export const DEFAULT_MAX_MODERATION_ROUNDS = 3;
export const DEFAULT_MODERATION_COOLDOWN_MS = 2000;

export type ComplianceRound = {
  timestamp: string;
  chapter: number;
  round: number;
  status: ModerationVerdict["kind"];
  hit_words: string[];
  detail: string;
  repaired: boolean;
};

export type ComplianceOutcome = {
  status: "compliant" | "failed";
  /** Final draft; on failure this is the last attempted rewrite, not the input. */
  text: string;
  /** Index of the round that ended the loop. */
  rounds: number;
  moderation_calls: number;
  repair_calls: number;
  history: ComplianceRound[];
};

function issueLines(verdict: ModerationVerdict, detail: string): string[] {
  if (verdict.kind === "non_compliant" && verdict.violations.length > 0) {
    return verdict.violations.map((v) => `- ${v.category}: ${v.message}`);
  }
  return [detail];
}

/**
 * Moderate, rewrite, repeat. Round `n` runs for n = 0..maxRounds, so the loop makes at most
 * maxRounds + 1 moderation calls and maxRounds rewrites. A service error spends a round
 * without a rewrite: there is nothing to scope the edit to.
 */
export async function runComplianceLoop(args: {
  rootDir: string;
  chapter: number;
  text: string;
  moderation: ModerationOracle;
  oracle: GenerationOracle;
  model?: string;
  maxRounds?: number;
  cooldownMs?: number;
  sleep?: Sleep;
  logger: Logger;
}): Promise<ComplianceOutcome> {
  const maxRounds = args.maxRounds ?? DEFAULT_MAX_MODERATION_ROUNDS;
  const cooldownMs = args.cooldownMs ?? DEFAULT_MODERATION_COOLDOWN_MS;
  const pause = args.sleep ?? defaultSleep;
  const { chapter, logger } = args;
  const logPath = join(args.rootDir, chapterRelPaths(chapter).moderationLog);

  const history: ComplianceRound[] = [];
  let text = args.text;
  let moderationCalls = 0;
  let repairCalls = 0;

  for (let round = 0; ; round += 1) {
    const verdict = await args.moderation.moderate(text);
    moderationCalls += 1;
    const detail = formatVerdictDetail(verdict);
    const structured = hitWordsOfVerdict(verdict);
    const hitWords = structured.length > 0 ? structured : extractHitWords(detail);
    const terminal = verdict.kind === "compliant" || round >= maxRounds;
    const willRepair = !terminal && verdict.kind === "non_compliant";

    const record: ComplianceRound = {
      timestamp: new Date().toISOString(),
      chapter,
      round,
      status: verdict.kind,
      hit_words: hitWords,
      detail,
      repaired: willRepair
    };
    history.push(record);
    await appendJsonLine(logPath, record);

    if (verdict.kind === "compliant") {
      logger.info(`chapter ${chapter}: compliant at round ${round}`);
      return { status: "compliant", text, rounds: round, moderation_calls: moderationCalls, repair_calls: repairCalls, history };
    }
    if (round >= maxRounds) {
      logger.warn(`chapter ${chapter}: still non-compliant after ${maxRounds} rewrite round(s)`, { last: verdict.kind, hit_words: hitWords });
      return { status: "failed", text, rounds: round, moderation_calls: moderationCalls, repair_calls: repairCalls, history };
    }

    if (willRepair) {
      logger.info(`chapter ${chapter}: round ${round} rejected, rewriting`, { hit_words: hitWords });
      const prompt = buildComplianceRepairPrompt({ text, hitWords, issues: issueLines(verdict, detail) });
      const res = await args.oracle.generate({ purpose: "compliance_repair", ...prompt, sampling: COMPLIANCE_REPAIR_SAMPLING, model: args.model });
      repairCalls += 1;
      const rewritten = res.flagged ? "" : cleanChapterText(res.text);
      if (rewritten.length > 0) text = rewritten;
      else logger.warn(`chapter ${chapter}: rewrite produced no text; resubmitting the previous draft`, { flagged: res.flagged });
    } else {
      logger.warn(`chapter ${chapter}: moderation service error at round ${round}; retrying after cooldown`, { detail });
    }
    await pause(cooldownMs);
  }
}
