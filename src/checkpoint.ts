import { join } from "node:path";

import { CharacterBook, INTERACTION_HISTORY_LIMIT, parseCharacterState, parseInteraction, type CharacterState, type Interaction } from "./character-book.js";
import { NovelCliError } from "./errors.js";
import { parseLedger, type FactLedger } from "./fact-ledger.js";
import { FactStore } from "./fact-store.js";
import { listFileNames, pathExists, readJsonFile, writeJsonFileAtomic } from "./fs-utils.js";
import { PlotBook, parsePlotThread, type PlotThread } from "./plot-threads.js";
import { RollingContext, type RollingContextJson } from "./rolling-context.js";
import { CHAPTER_INDEX_REL, CHAPTER_STATUSES, chapterRelPaths, type ChapterStatus } from "./steps.js";
import { asInt, isPlainObject } from "./type-guards.js";

export const SNAPSHOT_SCHEMA_VERSION = 1;

export type CheckpointSnapshot = {
  schema_version: number;
  chapter: number;
  saved_at: string;
  ledger: FactLedger;
  characters: Record<string, CharacterState>;
  interaction_history: Interaction[];
  plot_threads: PlotThread[];
  rolling_context: RollingContextJson;
};

export type RestoredState = {
  chapter: number;
  store: FactStore;
  context: RollingContext;
};

export function buildSnapshot(chapter: number, store: FactStore, context: RollingContext, now: Date = new Date()): CheckpointSnapshot {
  const book = store.characters.toJSON();
  return {
    schema_version: SNAPSHOT_SCHEMA_VERSION,
    chapter,
    saved_at: now.toISOString(),
    ledger: store.ledger,
    characters: book.characters,
    interaction_history: book.interaction_history.slice(-INTERACTION_HISTORY_LIMIT),
    plot_threads: store.threads.toJSON(),
    rolling_context: context.toJSON()
  };
}

export function parseSnapshot(data: unknown, file: string): CheckpointSnapshot {
  if (!isPlainObject(data)) throw new NovelCliError(`${file} must be a JSON object.`, 2);

  const version = asInt(data.schema_version);
  if (version !== SNAPSHOT_SCHEMA_VERSION) {
    throw new NovelCliError(`${file}.schema_version must be ${SNAPSHOT_SCHEMA_VERSION} (got ${String(data.schema_version)}).`, 2);
  }

  const chapter = asInt(data.chapter);
  if (chapter === null || chapter < 1) throw new NovelCliError(`${file}.chapter must be an int >= 1.`, 2);

  if (typeof data.saved_at !== "string") throw new NovelCliError(`${file}.saved_at must be a string.`, 2);

  const ledger = parseLedger(data.ledger);
  if (!ledger) throw new NovelCliError(`${file}.ledger must be {characters, events}.`, 2);

  if (!isPlainObject(data.characters)) throw new NovelCliError(`${file}.characters must be an object.`, 2);
  const characters: Record<string, CharacterState> = {};
  for (const [name, raw] of Object.entries(data.characters)) {
    const state = parseCharacterState(raw);
    if (!state) throw new NovelCliError(`${file}.characters.${name} is not a valid character state.`, 2);
    characters[name] = state;
  }

  if (!Array.isArray(data.interaction_history)) throw new NovelCliError(`${file}.interaction_history must be an array.`, 2);
  const interaction_history: Interaction[] = [];
  for (const [i, raw] of data.interaction_history.entries()) {
    const it = parseInteraction(raw);
    if (!it) throw new NovelCliError(`${file}.interaction_history[${i}] is not a valid interaction.`, 2);
    interaction_history.push(it);
  }

  // Snapshots written before plot threads existed carry no such field.
  const threadsRaw = data.plot_threads ?? [];
  if (!Array.isArray(threadsRaw)) throw new NovelCliError(`${file}.plot_threads must be an array.`, 2);
  const plot_threads: PlotThread[] = [];
  for (const [i, raw] of threadsRaw.entries()) {
    const thread = parsePlotThread(raw);
    if (!thread) throw new NovelCliError(`${file}.plot_threads[${i}] is not a valid plot thread.`, 2);
    plot_threads.push(thread);
  }

  const rolling_context = RollingContext.fromJSON(data.rolling_context, file).toJSON();

  return {
    schema_version: version,
    chapter,
    saved_at: data.saved_at,
    ledger,
    characters,
    interaction_history: interaction_history.slice(-INTERACTION_HISTORY_LIMIT),
    plot_threads,
    rolling_context
  };
}

export function restoreSnapshot(snapshot: CheckpointSnapshot): RestoredState {
  return {
    chapter: snapshot.chapter,
    store: new FactStore(
      snapshot.ledger,
      CharacterBook.restore(snapshot.characters, snapshot.interaction_history),
      PlotBook.restore(snapshot.plot_threads)
    ),
    context: RollingContext.fromJSON(snapshot.rolling_context, `snapshot ${snapshot.chapter}`)
  };
}

export async function writeSnapshot(rootDir: string, snapshot: CheckpointSnapshot): Promise<string> {
  const rel = chapterRelPaths(snapshot.chapter).snapshot;
  await writeJsonFileAtomic(join(rootDir, rel), snapshot);
  return rel;
}

/** `null` when no snapshot exists for `chapter`; a present but invalid file is an error. */
export async function loadSnapshot(rootDir: string, chapter: number): Promise<CheckpointSnapshot | null> {
  const rel = chapterRelPaths(chapter).snapshot;
  const abs = join(rootDir, rel);
  if (!(await pathExists(abs))) return null;
  return parseSnapshot(await readJsonFile(abs), rel);
}

const SNAPSHOT_FILE_RE = /^snapshot-chapter-(\d{3,})\.json$/u;

export async function latestSnapshotChapter(rootDir: string): Promise<number | null> {
  let latest: number | null = null;
  for (const name of await listFileNames(join(rootDir, "state"))) {
    const m = SNAPSHOT_FILE_RE.exec(name);
    if (!m?.[1]) continue;
    const n = Number.parseInt(m[1], 10);
    if (latest === null || n > latest) latest = n;
  }
  return latest;
}

export type ChapterRecord = {
  chapter: number;
  status: ChapterStatus;
  title: string;
  file: string;
  residual_conflicts: number;
  moderation_rounds: number | null;
};

export type ChapterIndex = {
  chapters: ChapterRecord[];
};

function parseChapterStatus(value: unknown, file: string): ChapterStatus {
  if (typeof value === "string") {
    for (const s of CHAPTER_STATUSES) if (s === value) return s;
  }
  throw new NovelCliError(`${file}: status must be one of: ${CHAPTER_STATUSES.join(", ")}.`, 2);
}

function parseChapterRecord(raw: unknown, file: string): ChapterRecord {
  if (!isPlainObject(raw)) throw new NovelCliError(`${file}: chapter entries must be objects.`, 2);
  const chapter = asInt(raw.chapter);
  if (chapter === null || chapter < 1) throw new NovelCliError(`${file}: chapter must be an int >= 1.`, 2);
  if (typeof raw.title !== "string" || typeof raw.file !== "string") {
    throw new NovelCliError(`${file}: chapter ${chapter} needs string 'title' and 'file'.`, 2);
  }
  const residual = asInt(raw.residual_conflicts);
  const rounds = raw.moderation_rounds === null ? null : asInt(raw.moderation_rounds);
  if (residual === null || residual < 0) throw new NovelCliError(`${file}: chapter ${chapter} residual_conflicts must be an int >= 0.`, 2);
  if (raw.moderation_rounds !== null && rounds === null) {
    throw new NovelCliError(`${file}: chapter ${chapter} moderation_rounds must be an int (or null).`, 2);
  }
  return {
    chapter,
    status: parseChapterStatus(raw.status, file),
    title: raw.title,
    file: raw.file,
    residual_conflicts: residual,
    moderation_rounds: rounds
  };
}

export async function readChapterIndex(rootDir: string): Promise<ChapterIndex> {
  const abs = join(rootDir, CHAPTER_INDEX_REL);
  if (!(await pathExists(abs))) return { chapters: [] };
  const raw = await readJsonFile(abs);
  if (!isPlainObject(raw) || !Array.isArray(raw.chapters)) {
    throw new NovelCliError(`${CHAPTER_INDEX_REL} must be an object with a 'chapters' array.`, 2);
  }
  return { chapters: raw.chapters.map((c) => parseChapterRecord(c, CHAPTER_INDEX_REL)) };
}

export async function upsertChapterRecord(rootDir: string, record: ChapterRecord): Promise<ChapterIndex> {
  const index = await readChapterIndex(rootDir);
  const chapters = index.chapters.filter((c) => c.chapter !== record.chapter);
  chapters.push(record);
  chapters.sort((a, b) => a.chapter - b.chapter);
  const next = { chapters };
  await writeJsonFileAtomic(join(rootDir, CHAPTER_INDEX_REL), next);
  return next;
}
