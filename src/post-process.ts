const DROP_LINE_PATTERNS: readonly RegExp[] = [
  /^下一章[:：]/u,
  /^第[一二三四五六七八九十百零\d]+章/u,
  /^#{1,6}\s/u,
  /^-{3,}$/u,
  /^={3,}$/u,
  /^\*{3,}$/u,
  /^【.*】$/u,
  /^写作意图[:：]/u
];

const META_KEYWORDS = ["下一章", "写作意图", "章节目标", "提示词", "大纲", "总结", "概要", "Chapter", "CHAPTER", "分隔符"];
const TRAILING_META_KEYWORDS = ["写作", "意图", "下章", "下一章", "预告"];
const SHORT_LINE = 50;

function charLength(s: string): number {
  return [...s].length;
}

function isShortMeta(line: string, keywords: readonly string[]): boolean {
  return charLength(line) < SHORT_LINE && keywords.some((k) => line.includes(k));
}

/** Strips headings, separators and the short meta lines models like to append. Paragraph breaks collapse to one blank line. */
export function cleanChapterText(raw: string): string {
  const out: string[] = [];
  for (const line of raw.trim().split(/\r?\n/u)) {
    const t = line.trim();
    if (t.length === 0) {
      if (out.length > 0 && out[out.length - 1] !== "") out.push("");
      continue;
    }
    if (DROP_LINE_PATTERNS.some((re) => re.test(t))) continue;
    if (isShortMeta(t, META_KEYWORDS)) continue;
    out.push(line.trimEnd());
  }
  while (out.length > 0 && out[out.length - 1] === "") out.pop();

  const last = out[out.length - 1];
  if (last !== undefined && isShortMeta(last.trim(), TRAILING_META_KEYWORDS)) {
    out.pop();
    while (out.length > 0 && out[out.length - 1] === "") out.pop();
  }
  return out.join("\n");
}

const BULLET_PREFIX = /^[\d\-*•.、)）]+\s*/u;
const SUMMARY_META = ["概要", "提要", "总结", "如下"];

export function extractSummaryLines(raw: string): string[] {
  const items: string[] = [];
  for (const line of raw.trim().split(/\r?\n/u)) {
    const cleaned = line.trim().replace(BULLET_PREFIX, "").trim();
    if (charLength(cleaned) < 5) continue;
    if (charLength(cleaned) < 20 && SUMMARY_META.some((k) => cleaned.includes(k))) continue;
    items.push(cleaned);
  }
  return items;
}

const TITLE_MAX_CHARS = 8;
const TITLE_PUNCTUATION = /[。，、；：！？,.;:!?"'“”‘’《》【】()（）\s]/gu;
const TITLE_CHAPTER_PREFIX = /^第[一二三四五六七八九十百零\d]+章/u;

/** Empty result means the caller should fall back to a positional title. */
export function sanitizeTitle(raw: string): string {
  const firstLine = raw.trim().split(/\r?\n/u)[0] ?? "";
  const stripped = firstLine.replace(TITLE_PUNCTUATION, "").replace(TITLE_CHAPTER_PREFIX, "");
  return [...stripped].slice(0, TITLE_MAX_CHARS).join("");
}

export function fallbackTitle(chapter: number): string {
  return `第${chapter}章`;
}
