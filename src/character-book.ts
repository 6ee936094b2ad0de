import type { CharacterStatePatch, FactDelta } from "./fact-ledger.js";
import { asInt, asTrimmedString, isPlainObject, isStringArray } from "./type-guards.js";

export type CharacterState = {
  emotional_state: string;
  physical_state: string;
  location: string;
  current_goal: string;
  recent_events: string[];
  /** Set semantics: insertion order, no repeats. */
  knowledge: string[];
  relationships_status: Record<string, string>;
};

export type Interaction = {
  chapter: number;
  characters: string[];
  type: string;
  details: string;
};

export const INTERACTION_HISTORY_LIMIT = 20;
const RECENT_EVENTS_LIMIT = 5;

export function emptyCharacterState(): CharacterState {
  return {
    emotional_state: "",
    physical_state: "",
    location: "",
    current_goal: "",
    recent_events: [],
    knowledge: [],
    relationships_status: {}
  };
}

function cloneState(state: CharacterState): CharacterState {
  return {
    ...state,
    recent_events: [...state.recent_events],
    knowledge: [...state.knowledge],
    relationships_status: { ...state.relationships_status }
  };
}

function applyPatch(state: CharacterState, patch: CharacterStatePatch): void {
  if (patch.emotional_state) state.emotional_state = patch.emotional_state;
  if (patch.physical_state) state.physical_state = patch.physical_state;
  if (patch.location) state.location = patch.location;
  if (patch.current_goal) state.current_goal = patch.current_goal;
  if (patch.recent_events) state.recent_events = [...state.recent_events, ...patch.recent_events].slice(-RECENT_EVENTS_LIMIT);
  for (const item of patch.knowledge ?? []) {
    if (!state.knowledge.includes(item)) state.knowledge.push(item);
  }
  if (patch.relationships_status) Object.assign(state.relationships_status, patch.relationships_status);
}

/**
 * Mutable per-character state plus the bounded interaction history. States are created on
 * first reference and never removed.
 */
export class CharacterBook {
  private readonly states = new Map<string, CharacterState>();
  private history: Interaction[] = [];

  get(name: string): CharacterState | undefined {
    return this.states.get(name);
  }

  names(): string[] {
    return [...this.states.keys()];
  }

  ensure(name: string): CharacterState {
    let state = this.states.get(name);
    if (!state) {
      state = emptyCharacterState();
      this.states.set(name, state);
    }
    return state;
  }

  /** Applies one chapter's delta: every character mentioned is ensured, patches land, interactions append. */
  applyChapter(chapter: number, delta: FactDelta): void {
    for (const name of Object.keys(delta.characters)) this.ensure(name);
    for (const [name, patch] of Object.entries(delta.states)) applyPatch(this.ensure(name), patch);
    for (const it of delta.interactions) {
      for (const name of it.characters) this.ensure(name);
      this.history.push({ chapter, characters: [...it.characters], type: it.type, details: it.details });
    }
    if (this.history.length > INTERACTION_HISTORY_LIMIT) this.history = this.history.slice(-INTERACTION_HISTORY_LIMIT);
  }

  interactions(): Interaction[] {
    return this.history.map((it) => ({ ...it, characters: [...it.characters] }));
  }

  toJSON(): { characters: Record<string, CharacterState>; interaction_history: Interaction[] } {
    const characters: Record<string, CharacterState> = {};
    for (const [name, state] of this.states) characters[name] = cloneState(state);
    return { characters, interaction_history: this.interactions() };
  }

  static restore(characters: Record<string, CharacterState>, interactionHistory: Interaction[]): CharacterBook {
    const book = new CharacterBook();
    for (const [name, state] of Object.entries(characters)) book.states.set(name, cloneState(state));
    book.history = interactionHistory.slice(-INTERACTION_HISTORY_LIMIT).map((it) => ({ ...it, characters: [...it.characters] }));
    return book;
  }

  /** Prompt lines describing the current state of each known character. */
  briefLines(): string[] {
    const lines: string[] = [];
    for (const [name, s] of this.states) {
      const parts: string[] = [];
      if (s.emotional_state) parts.push(`情绪: ${s.emotional_state}`);
      if (s.physical_state) parts.push(`身体: ${s.physical_state}`);
      if (s.location) parts.push(`位置: ${s.location}`);
      if (s.current_goal) parts.push(`目标: ${s.current_goal}`);
      const rel = Object.entries(s.relationships_status).map(([who, status]) => `${who}(${status})`);
      if (rel.length > 0) parts.push(`关系: ${rel.join("、")}`);
      if (s.knowledge.length > 0) parts.push(`已知: ${s.knowledge.slice(-5).join("、")}`);
      if (parts.length > 0) lines.push(`- ${name}: ${parts.join("; ")}`);
    }
    return lines;
  }
}

export function parseCharacterState(raw: unknown): CharacterState | null {
  if (!isPlainObject(raw)) return null;
  const str = (v: unknown): string | null => (typeof v === "string" ? v : null);
  const emotional_state = str(raw.emotional_state);
  const physical_state = str(raw.physical_state);
  const location = str(raw.location);
  const current_goal = str(raw.current_goal);
  if (emotional_state === null || physical_state === null || location === null || current_goal === null) return null;
  if (!isStringArray(raw.recent_events) || !isStringArray(raw.knowledge)) return null;
  if (!isPlainObject(raw.relationships_status)) return null;
  const relationships_status: Record<string, string> = {};
  for (const [k, v] of Object.entries(raw.relationships_status)) {
    if (typeof v !== "string") return null;
    relationships_status[k] = v;
  }
  return {
    emotional_state,
    physical_state,
    location,
    current_goal,
    recent_events: [...raw.recent_events],
    knowledge: [...raw.knowledge],
    relationships_status
  };
}

export function parseInteraction(raw: unknown): Interaction | null {
  if (!isPlainObject(raw)) return null;
  const chapter = asInt(raw.chapter);
  const type = asTrimmedString(raw.type);
  if (chapter === null || chapter < 1 || type === null || !isStringArray(raw.characters)) return null;
  return { chapter, characters: [...raw.characters], type, details: typeof raw.details === "string" ? raw.details : "" };
}
