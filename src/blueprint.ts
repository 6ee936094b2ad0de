import { fileURLToPath } from "node:url";

import { NovelCliError } from "./errors.js";
import { pathExists, readJsonFile } from "./fs-utils.js";
import type { ThreadSeed } from "./plot-threads.js";
import { isPlainObject } from "./type-guards.js";

export type StoryArc = {
  name: string;
  /** Inclusive chapter range. */
  chapters: [number, number];
  theme: string;
  emotion: string;
  guide: string;
};

export type ChapterGoal = {
  chapter: number;
  goal: string;
};

export type StoryBlueprint = {
  schema_version: number;
  title: string;
  persona: string;
  platform_values: string[];
  avoid: string[];
  world_setting: string;
  style_rules: string;
  techniques: string[];
  structure_rules: string;
  word_count_rule: string;
  arcs: StoryArc[];
  fallback_arc: StoryArc;
  chapter_goals: ChapterGoal[];
  fallback_goal: string;
  /** Threads open before chapter 1; empty when the blueprint names none. */
  plot_threads: ThreadSeed[];
};

export function bundledBlueprintPath(): string {
  return fileURLToPath(new URL("../templates/blueprint.json", import.meta.url));
}

function requireIntField(obj: Record<string, unknown>, field: string, file: string): number {
  const v = obj[field];
  if (typeof v !== "number" || !Number.isInteger(v)) throw new NovelCliError(`Invalid ${file}: '${field}' must be an int.`, 2);
  return v;
}

function requireStringField(obj: Record<string, unknown>, field: string, file: string): string {
  const v = obj[field];
  if (typeof v !== "string" || v.trim().length === 0) throw new NovelCliError(`Invalid ${file}: '${field}' must be a non-empty string.`, 2);
  return v.trim();
}

function requireStringArrayField(obj: Record<string, unknown>, field: string, file: string): string[] {
  const v = obj[field];
  if (!Array.isArray(v)) throw new NovelCliError(`Invalid ${file}: '${field}' must be a string array.`, 2);
  const out: string[] = [];
  for (const item of v) {
    if (typeof item !== "string") throw new NovelCliError(`Invalid ${file}: '${field}' must be a string array.`, 2);
    if (item.trim().length > 0) out.push(item.trim());
  }
  return out;
}

function parseArc(raw: unknown, file: string, where: string): StoryArc {
  if (!isPlainObject(raw)) throw new NovelCliError(`Invalid ${file}: '${where}' must be an object.`, 2);
  const range = raw.chapters;
  if (!Array.isArray(range) || range.length !== 2) {
    throw new NovelCliError(`Invalid ${file}: '${where}.chapters' must be [from, to].`, 2);
  }
  const [from, to] = range;
  if (typeof from !== "number" || typeof to !== "number" || !Number.isInteger(from) || !Number.isInteger(to) || from < 1 || to < from) {
    throw new NovelCliError(`Invalid ${file}: '${where}.chapters' must be ints with 1 <= from <= to.`, 2);
  }
  return {
    name: requireStringField(raw, "name", file),
    chapters: [from, to],
    theme: requireStringField(raw, "theme", file),
    emotion: requireStringField(raw, "emotion", file),
    guide: requireStringField(raw, "guide", file)
  };
}

function parseChapterGoals(raw: unknown, file: string): ChapterGoal[] {
  if (!Array.isArray(raw)) throw new NovelCliError(`Invalid ${file}: 'chapter_goals' must be an array.`, 2);
  const seen = new Set<number>();
  const goals: ChapterGoal[] = [];
  for (const [i, item] of raw.entries()) {
    if (!isPlainObject(item)) throw new NovelCliError(`Invalid ${file}: 'chapter_goals[${i}]' must be an object.`, 2);
    const chapter = requireIntField(item, "chapter", file);
    if (chapter < 1) throw new NovelCliError(`Invalid ${file}: 'chapter_goals[${i}].chapter' must be >= 1.`, 2);
    if (seen.has(chapter)) throw new NovelCliError(`Invalid ${file}: duplicate goal for chapter ${chapter}.`, 2);
    seen.add(chapter);
    goals.push({ chapter, goal: requireStringField(item, "goal", file) });
  }
  return goals.sort((a, b) => a.chapter - b.chapter);
}

function parseThreadSeeds(raw: unknown, file: string): ThreadSeed[] {
  if (raw === undefined) return [];
  if (!Array.isArray(raw)) throw new NovelCliError(`Invalid ${file}: 'plot_threads' must be an array.`, 2);
  return raw.map((item, i) => {
    if (!isPlainObject(item)) throw new NovelCliError(`Invalid ${file}: 'plot_threads[${i}]' must be an object.`, 2);
    return { name: requireStringField(item, "name", file), description: requireStringField(item, "description", file) };
  });
}

export function parseBlueprint(raw: unknown, file: string): StoryBlueprint {
  if (!isPlainObject(raw)) throw new NovelCliError(`Invalid ${file}: expected a JSON object.`, 2);

  const arcsRaw = raw.arcs;
  if (!Array.isArray(arcsRaw)) throw new NovelCliError(`Invalid ${file}: 'arcs' must be an array.`, 2);
  const arcs = arcsRaw.map((a, i) => parseArc(a, file, `arcs[${i}]`)).sort((a, b) => a.chapters[0] - b.chapters[0]);

  return {
    schema_version: requireIntField(raw, "schema_version", file),
    title: requireStringField(raw, "title", file),
    persona: requireStringField(raw, "persona", file),
    platform_values: requireStringArrayField(raw, "platform_values", file),
    avoid: requireStringArrayField(raw, "avoid", file),
    world_setting: requireStringField(raw, "world_setting", file),
    style_rules: requireStringField(raw, "style_rules", file),
    techniques: requireStringArrayField(raw, "techniques", file),
    structure_rules: requireStringField(raw, "structure_rules", file),
    word_count_rule: requireStringField(raw, "word_count_rule", file),
    arcs,
    fallback_arc: parseArc(raw.fallback_arc, file, "fallback_arc"),
    chapter_goals: parseChapterGoals(raw.chapter_goals, file),
    fallback_goal: requireStringField(raw, "fallback_goal", file),
    plot_threads: parseThreadSeeds(raw.plot_threads, file)
  };
}

export async function loadBlueprint(path: string = bundledBlueprintPath()): Promise<StoryBlueprint> {
  if (!(await pathExists(path))) throw new NovelCliError(`Blueprint not found: ${path}`, 2);
  return parseBlueprint(await readJsonFile(path), path);
}

export function narrativeGoalFor(blueprint: StoryBlueprint, chapter: number): string {
  return blueprint.chapter_goals.find((g) => g.chapter === chapter)?.goal ?? blueprint.fallback_goal;
}

export function arcFor(blueprint: StoryBlueprint, chapter: number): StoryArc {
  return blueprint.arcs.find((a) => chapter >= a.chapters[0] && chapter <= a.chapters[1]) ?? blueprint.fallback_arc;
}
