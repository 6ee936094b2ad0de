import { CharacterBook } from "./character-book.js";
import {
  cloneLedger,
  detectConflicts,
  emptyDelta,
  emptyLedger,
  mergeFacts,
  parseFactDelta,
  type ConflictRecord,
  type FactDelta,
  type FactLedger
} from "./fact-ledger.js";
import { parseJsonObjectFromModel } from "./llm-json.js";
import type { Logger } from "./logger.js";
import type { GenerationOracle, SamplingParams } from "./oracle/generation.js";
import { PlotBook } from "./plot-threads.js";
import { buildFactExtractionPrompt } from "./prompts.js";

export const EXTRACTION_SAMPLING: SamplingParams = { temperature: 0.3, top_p: 0.85, max_output_tokens: 1200 };

/**
 * Ledger, character states and plot threads, owned by the run loop. The ledger is only ever
 * replaced through `merge`, which keeps first-write-wins.
 */
export class FactStore {
  constructor(
    private ledgerState: FactLedger = emptyLedger(),
    readonly characters: CharacterBook = new CharacterBook(),
    readonly threads: PlotBook = new PlotBook()
  ) {}

  get ledger(): FactLedger {
    return cloneLedger(this.ledgerState);
  }

  conflictsWith(delta: FactDelta): ConflictRecord[] {
    return detectConflicts(delta, this.ledgerState);
  }

  merge(delta: FactDelta): void {
    this.ledgerState = mergeFacts(delta, this.ledgerState);
  }

  /** Character and thread changes for one chapter; independent of whether the ledger merge happened. */
  applyChapterState(chapter: number, delta: FactDelta): void {
    this.characters.applyChapter(chapter, delta);
    if (delta.threads) this.threads.apply(delta.threads);
  }
}

/**
 * Asks the oracle for the chapter's facts. Unusable output (flagged, empty, not JSON) yields an
 * empty delta; oracle failures propagate.
 */
export async function extractFacts(args: {
  oracle: GenerationOracle;
  text: string;
  model?: string;
  logger?: Logger;
}): Promise<FactDelta> {
  const prompt = buildFactExtractionPrompt(args.text);
  const res = await args.oracle.generate({ purpose: "facts", ...prompt, sampling: EXTRACTION_SAMPLING, model: args.model });
  if (res.flagged || res.text.trim().length === 0) {
    args.logger?.warn("fact extraction returned no usable payload", { flagged: res.flagged });
    return emptyDelta();
  }
  let raw: unknown;
  try {
    raw = parseJsonObjectFromModel(res.text);
  } catch {
    args.logger?.warn("fact extraction payload is not JSON; using an empty delta", { preview: res.text.slice(0, 120) });
    return emptyDelta();
  }
  return parseFactDelta(raw);
}
