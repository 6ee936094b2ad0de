export const CHAPTER_STAGES = ["draft", "consistency", "moderation", "title", "summarize", "checkpoint"] as const;
export type ChapterStage = (typeof CHAPTER_STAGES)[number];
/** `startup` covers everything before the first chapter: credentials, blueprint, oracles. */
export type RunStage = "startup" | ChapterStage;

export const CHAPTER_STATUSES = ["compliant", "moderation_failed", "unchecked"] as const;
export type ChapterStatus = (typeof CHAPTER_STATUSES)[number];

export const MODERATION_FAILED_MARKER = "moderation-failed";

export const CHAPTER_INDEX_REL = "state/chapters.json";
export const USAGE_REL = "logs/usage.json";
export const FATAL_ERROR_REL = "logs/fatal-error.json";
export const MANUSCRIPT_REL = "novel-full.md";
export const CHAPTERS_DIR_REL = "chapters";

export function pad3(n: number): string {
  return String(n).padStart(3, "0");
}

export function chapterFilePrefix(chapter: number): string {
  return `chapter-${pad3(chapter)}`;
}

const UNSAFE_FILENAME_CHARS = /[\\/:*?"<>|\s]/gu;

export function sanitizeFileStem(name: string): string {
  return name.replace(UNSAFE_FILENAME_CHARS, "").trim();
}

/**
 * Deterministic artifact name for one chapter. A failed moderation run replaces the title
 * with an explicit marker so that an auditor can tell outcomes apart by filename alone.
 */
export function chapterFileRel(chapter: number, status: ChapterStatus, title: string): string {
  const suffix = status === "moderation_failed" ? MODERATION_FAILED_MARKER : sanitizeFileStem(title);
  const stem = suffix.length > 0 ? `${chapterFilePrefix(chapter)}-${suffix}` : chapterFilePrefix(chapter);
  return `${CHAPTERS_DIR_REL}/${stem}.md`;
}

export function chapterRelPaths(chapter: number): {
  rawText: string;
  summary: string;
  factsLog: string;
  factsFixedLog: string;
  moderationLog: string;
  snapshot: string;
} {
  const id = pad3(chapter);
  return {
    rawText: `logs/chapter-${id}.raw.txt`,
    summary: `summaries/chapter-${id}-summary.md`,
    factsLog: `logs/facts-chapter-${id}.json`,
    factsFixedLog: `logs/facts-chapter-${id}-fixed.json`,
    moderationLog: `logs/moderation-chapter-${id}.jsonl`,
    snapshot: `state/snapshot-chapter-${id}.json`
  };
}
