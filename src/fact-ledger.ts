import { parseThreadUpdate, type ThreadUpdate } from "./plot-threads.js";
import { asTrimmedString, isPlainObject } from "./type-guards.js";

export type AttributeMap = Record<string, string>;

export type FactLedger = {
  characters: Record<string, AttributeMap>;
  /** Ordered, deduplicated short event descriptors. */
  events: string[];
};

export type CharacterStatePatch = {
  emotional_state?: string;
  physical_state?: string;
  location?: string;
  current_goal?: string;
  recent_events?: string[];
  knowledge?: string[];
  relationships_status?: Record<string, string>;
};

export type InteractionDraft = {
  characters: string[];
  type: string;
  details: string;
};

export type FactDelta = FactLedger & {
  states: Record<string, CharacterStatePatch>;
  interactions: InteractionDraft[];
  /** Present only when the extractor reported at least one thread change. */
  threads?: ThreadUpdate[];
};

export type ConflictRecord = {
  character: string;
  attribute: string;
  old_value: string;
  new_value: string;
};

export function emptyLedger(): FactLedger {
  return { characters: {}, events: [] };
}

export function emptyDelta(): FactDelta {
  return { characters: {}, events: [], states: {}, interactions: [] };
}

export function cloneLedger(ledger: FactLedger): FactLedger {
  const characters: FactLedger["characters"] = {};
  for (const [name, attrs] of Object.entries(ledger.characters)) characters[name] = { ...attrs };
  return { characters, events: [...ledger.events] };
}

function parseStringList(raw: unknown): string[] {
  if (!Array.isArray(raw)) return [];
  const out: string[] = [];
  for (const item of raw) {
    const s = asTrimmedString(item);
    if (s !== null) out.push(s);
  }
  return out;
}

function parseStringRecord(raw: unknown): Record<string, string> {
  if (!isPlainObject(raw)) return {};
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(raw)) {
    const key = k.trim();
    const value = asTrimmedString(v);
    if (key.length === 0 || value === null) continue;
    out[key] = value;
  }
  return out;
}

function parseStatePatch(raw: unknown): CharacterStatePatch | null {
  if (!isPlainObject(raw)) return null;
  const patch: CharacterStatePatch = {};
  for (const field of ["emotional_state", "physical_state", "location", "current_goal"] as const) {
    const v = asTrimmedString(raw[field]);
    if (v !== null) patch[field] = v;
  }
  const recent = parseStringList(raw.recent_events);
  if (recent.length > 0) patch.recent_events = recent;
  const knowledge = parseStringList(raw.knowledge);
  if (knowledge.length > 0) patch.knowledge = knowledge;
  const relationships = parseStringRecord(raw.relationships_status ?? raw.relationships);
  if (Object.keys(relationships).length > 0) patch.relationships_status = relationships;
  return Object.keys(patch).length > 0 ? patch : null;
}

/**
 * Lenient reader for the extractor's payload. Entries of the wrong shape are dropped one by
 * one; a payload that is not an object yields an empty delta.
 */
export function parseFactDelta(raw: unknown): FactDelta {
  const delta = emptyDelta();
  if (!isPlainObject(raw)) return delta;

  if (isPlainObject(raw.characters)) {
    for (const [name, attrs] of Object.entries(raw.characters)) {
      const key = name.trim();
      if (key.length === 0) continue;
      const parsed = parseStringRecord(attrs);
      if (Object.keys(parsed).length > 0) delta.characters[key] = parsed;
    }
  }

  for (const ev of parseStringList(raw.events)) {
    if (!delta.events.includes(ev)) delta.events.push(ev);
  }

  if (isPlainObject(raw.states)) {
    for (const [name, patchRaw] of Object.entries(raw.states)) {
      const key = name.trim();
      const patch = parseStatePatch(patchRaw);
      if (key.length > 0 && patch) delta.states[key] = patch;
    }
  }

  if (Array.isArray(raw.interactions)) {
    for (const item of raw.interactions) {
      if (!isPlainObject(item)) continue;
      const characters = parseStringList(item.characters);
      const type = asTrimmedString(item.type);
      if (characters.length === 0 || type === null) continue;
      delta.interactions.push({ characters, type, details: asTrimmedString(item.details) ?? "" });
    }
  }

  if (Array.isArray(raw.threads)) {
    const threads: ThreadUpdate[] = [];
    for (const item of raw.threads) {
      const update = parseThreadUpdate(item);
      if (update) threads.push(update);
    }
    if (threads.length > 0) delta.threads = threads;
  }

  return delta;
}

/**
 * One record per (character, attribute) present in both with non-empty, unequal values.
 * Events never conflict.
 */
export function detectConflicts(delta: FactLedger, ledger: FactLedger): ConflictRecord[] {
  const conflicts: ConflictRecord[] = [];
  for (const [name, attrs] of Object.entries(delta.characters)) {
    const known = ledger.characters[name];
    if (!known) continue;
    for (const [attribute, value] of Object.entries(attrs)) {
      const old = known[attribute];
      if (!old || !value) continue;
      if (old.trim() !== value.trim()) {
        conflicts.push({ character: name, attribute, old_value: old, new_value: value });
      }
    }
  }
  return conflicts;
}

/** First-write-wins merge; returns a new ledger and leaves both inputs untouched. */
export function mergeFacts(delta: FactLedger, ledger: FactLedger): FactLedger {
  const next = cloneLedger(ledger);
  for (const [name, attrs] of Object.entries(delta.characters)) {
    const dst = next.characters[name] ?? {};
    for (const [attribute, value] of Object.entries(attrs)) {
      if (value && !dst[attribute]) dst[attribute] = value;
    }
    next.characters[name] = dst;
  }
  for (const ev of delta.events) {
    if (ev.length > 0 && !next.events.includes(ev)) next.events.push(ev);
  }
  return next;
}

export function formatConflict(c: ConflictRecord): string {
  return `人物[${c.character}] 字段[${c.attribute}] 不一致: 旧=${c.old_value} 新=${c.new_value}`;
}

export function parseLedger(raw: unknown): FactLedger | null {
  if (!isPlainObject(raw) || !isPlainObject(raw.characters) || !Array.isArray(raw.events)) return null;
  const delta = parseFactDelta({ characters: raw.characters, events: raw.events });
  return { characters: delta.characters, events: delta.events };
}
