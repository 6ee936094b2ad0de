import { asTrimmedString, isPlainObject } from "./type-guards.js";

export const THREAD_STATUSES = ["进行中", "已解决", "搁置"] as const;
export type ThreadStatus = (typeof THREAD_STATUSES)[number];

const RESOLVED: ThreadStatus = "已解决";
const KEY_EVENTS_LIMIT = 3;

export type PlotThread = {
  name: string;
  description: string;
  status: ThreadStatus;
  /** Most recent last; at most three. */
  key_events: string[];
  related_characters: string[];
};

/** One extractor-reported change to a thread, keyed by name. */
export type ThreadUpdate = {
  name: string;
  description?: string;
  status?: ThreadStatus;
  event?: string;
  characters?: string[];
};

export type ThreadSeed = { name: string; description: string };

function isThreadStatus(value: unknown): value is ThreadStatus {
  return THREAD_STATUSES.some((s) => s === value);
}

function parseNames(raw: unknown): string[] {
  if (!Array.isArray(raw)) return [];
  const out: string[] = [];
  for (const item of raw) {
    const s = asTrimmedString(item);
    if (s !== null && !out.includes(s)) out.push(s);
  }
  return out;
}

function cloneThread(t: PlotThread): PlotThread {
  return { ...t, key_events: [...t.key_events], related_characters: [...t.related_characters] };
}

/** Lenient: an unknown status is dropped, a missing name drops the whole update. */
export function parseThreadUpdate(raw: unknown): ThreadUpdate | null {
  if (!isPlainObject(raw)) return null;
  const name = asTrimmedString(raw.name);
  if (name === null) return null;
  const update: ThreadUpdate = { name };
  const description = asTrimmedString(raw.description);
  if (description !== null) update.description = description;
  const status = asTrimmedString(raw.status);
  if (isThreadStatus(status)) update.status = status;
  const event = asTrimmedString(raw.event);
  if (event !== null) update.event = event;
  const characters = parseNames(raw.characters);
  if (characters.length > 0) update.characters = characters;
  return update;
}

/** Strict counterpart used for snapshots. */
export function parsePlotThread(raw: unknown): PlotThread | null {
  if (!isPlainObject(raw)) return null;
  const name = asTrimmedString(raw.name);
  if (name === null || typeof raw.description !== "string" || !isThreadStatus(raw.status)) return null;
  if (!Array.isArray(raw.key_events) || !Array.isArray(raw.related_characters)) return null;
  return {
    name,
    description: raw.description,
    status: raw.status,
    key_events: parseNames(raw.key_events).slice(-KEY_EVENTS_LIMIT),
    related_characters: parseNames(raw.related_characters)
  };
}

/**
 * Story threads in first-seen order. Threads are never removed; a resolved thread stays in
 * the snapshot but leaves the prompt.
 */
export class PlotBook {
  private threads = new Map<string, PlotThread>();

  static seeded(seeds: ThreadSeed[]): PlotBook {
    const book = new PlotBook();
    for (const seed of seeds) book.apply([{ name: seed.name, description: seed.description }]);
    return book;
  }

  static restore(threads: PlotThread[]): PlotBook {
    const book = new PlotBook();
    for (const t of threads) book.threads.set(t.name, cloneThread(t));
    return book;
  }

  apply(updates: ThreadUpdate[]): void {
    for (const u of updates) {
      const thread: PlotThread = this.threads.get(u.name) ?? {
        name: u.name,
        description: "",
        status: "进行中",
        key_events: [],
        related_characters: []
      };
      if (u.description) thread.description = u.description;
      if (u.status) thread.status = u.status;
      if (u.event && thread.key_events[thread.key_events.length - 1] !== u.event) {
        thread.key_events = [...thread.key_events, u.event].slice(-KEY_EVENTS_LIMIT);
      }
      for (const who of u.characters ?? []) {
        if (!thread.related_characters.includes(who)) thread.related_characters.push(who);
      }
      this.threads.set(u.name, thread);
    }
  }

  toJSON(): PlotThread[] {
    return [...this.threads.values()].map(cloneThread);
  }

  /** Prompt lines for every thread that is not resolved. */
  briefLines(): string[] {
    const lines: string[] = [];
    for (const t of this.threads.values()) {
      if (t.status === RESOLVED) continue;
      lines.push(t.description ? `【${t.name}】（${t.status}）：${t.description}` : `【${t.name}】（${t.status}）`);
      if (t.key_events.length > 0) lines.push(`  关键事件：${t.key_events.join("→")}`);
    }
    return lines;
  }
}
