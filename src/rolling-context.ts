import { NovelCliError } from "./errors.js";
import { isPlainObject, isStringArray } from "./type-guards.js";

export type ContextEntry = {
  chapter: number;
  lines: string[];
};

export type RollingContextJson = {
  window: number;
  summaries: Record<string, string[]>;
};

export const DEFAULT_CONTEXT_WINDOW = 3;
export const MAX_BULLETS_PER_CHAPTER = 5;

/**
 * Summary bullets for every finished chapter. Only the last `size` chapters before the one
 * being written reach the prompt; older entries stay for the checkpoint.
 */
export class RollingContext {
  private readonly summaries = new Map<number, string[]>();

  constructor(readonly size: number = DEFAULT_CONTEXT_WINDOW) {
    if (!Number.isInteger(size) || size < 0) throw new NovelCliError(`Invalid context window: ${size}`, 2);
  }

  record(chapter: number, lines: string[]): void {
    this.summaries.set(chapter, [...lines]);
  }

  linesFor(chapter: number): string[] | undefined {
    const lines = this.summaries.get(chapter);
    return lines ? [...lines] : undefined;
  }

  chapters(): number[] {
    return [...this.summaries.keys()].sort((a, b) => a - b);
  }

  window(forChapter: number): ContextEntry[] {
    const out: ContextEntry[] = [];
    for (let c = Math.max(1, forChapter - this.size); c < forChapter; c += 1) {
      const lines = this.summaries.get(c);
      if (lines && lines.length > 0) out.push({ chapter: c, lines: lines.slice(0, MAX_BULLETS_PER_CHAPTER) });
    }
    return out;
  }

  resized(size: number): RollingContext {
    const next = new RollingContext(size);
    for (const [c, lines] of this.summaries) next.record(c, lines);
    return next;
  }

  toJSON(): RollingContextJson {
    const summaries: Record<string, string[]> = {};
    for (const c of this.chapters()) summaries[String(c)] = [...(this.summaries.get(c) ?? [])];
    return { window: this.size, summaries };
  }

  static fromJSON(raw: unknown, file: string): RollingContext {
    if (!isPlainObject(raw)) throw new NovelCliError(`Invalid ${file}: 'rolling_context' must be an object.`, 2);
    const size = raw.window;
    if (typeof size !== "number" || !Number.isInteger(size) || size < 0) {
      throw new NovelCliError(`Invalid ${file}: 'rolling_context.window' must be a non-negative int.`, 2);
    }
    if (!isPlainObject(raw.summaries)) throw new NovelCliError(`Invalid ${file}: 'rolling_context.summaries' must be an object.`, 2);
    const ctx = new RollingContext(size);
    for (const [key, lines] of Object.entries(raw.summaries)) {
      const chapter = Number.parseInt(key, 10);
      if (!Number.isInteger(chapter) || chapter < 1 || String(chapter) !== key || !isStringArray(lines)) {
        throw new NovelCliError(`Invalid ${file}: 'rolling_context.summaries.${key}' must be a string array keyed by chapter.`, 2);
      }
      ctx.record(chapter, lines);
    }
    return ctx;
  }
}
