import { NovelCliError } from "./errors.js";

function tryParse(value: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(value) as unknown };
  } catch {
    return { ok: false };
  }
}

function extractFenced(value: string): string | null {
  const match = /```(?:json)?\s*([\s\S]*?)\s*```/iu.exec(value);
  return match?.[1]?.trim() ?? null;
}

function extractBraceSlice(value: string): string | null {
  const start = value.indexOf("{");
  const end = value.lastIndexOf("}");
  if (start < 0 || end <= start) return null;
  return value.slice(start, end + 1);
}

/**
 * Parses the JSON object a model was asked to emit, tolerating code fences and chatter
 * around the object. Throws when nothing parseable is found.
 */
export function parseJsonObjectFromModel(raw: string): unknown {
  const trimmed = raw.trim();
  const candidates = [trimmed, extractFenced(trimmed), extractBraceSlice(trimmed)];
  for (const candidate of candidates) {
    if (!candidate) continue;
    const parsed = tryParse(candidate);
    if (parsed.ok) return parsed.value;
  }
  throw new NovelCliError("Model response did not contain a parseable JSON object.");
}
