import { basename, join } from "node:path";

import { readChapterIndex } from "./checkpoint.js";
import { NovelCliError } from "./errors.js";
import { listFileNames, pathExists, readTextFile, removePath, writeTextFile, writeTextFileAtomic } from "./fs-utils.js";
import { CHAPTERS_DIR_REL, MANUSCRIPT_REL, chapterFilePrefix, chapterFileRel, type ChapterStatus } from "./steps.js";

/** Older artifacts of the same chapter index, e.g. a failed draft that a later run replaced. */
async function staleChapterFiles(rootDir: string, chapter: number, keepRel: string): Promise<string[]> {
  const prefix = `${chapterFilePrefix(chapter)}`;
  const keep = basename(keepRel);
  const names = await listFileNames(join(rootDir, CHAPTERS_DIR_REL));
  return names.filter((n) => n !== keep && n.endsWith(".md") && (n === `${prefix}.md` || n.startsWith(`${prefix}-`)));
}

/** Writes the one artifact for `chapter` and removes any other file of the same index. */
export async function writeChapterArtifact(args: {
  rootDir: string;
  chapter: number;
  status: ChapterStatus;
  title: string;
  text: string;
}): Promise<string> {
  const rel = chapterFileRel(args.chapter, args.status, args.title);
  await writeTextFileAtomic(join(args.rootDir, rel), `${args.text.trimEnd()}\n`);
  for (const name of await staleChapterFiles(args.rootDir, args.chapter, rel)) {
    await removePath(join(args.rootDir, CHAPTERS_DIR_REL, name));
  }
  return rel;
}

async function findChapterFile(rootDir: string, chapter: number, indexed: Map<number, string>): Promise<string | null> {
  const fromIndex = indexed.get(chapter);
  if (fromIndex && (await pathExists(join(rootDir, fromIndex)))) return fromIndex;
  const prefix = chapterFilePrefix(chapter);
  const names = await listFileNames(join(rootDir, CHAPTERS_DIR_REL));
  const match = names.find((n) => n.endsWith(".md") && (n === `${prefix}.md` || n.startsWith(`${prefix}-`)));
  return match ? `${CHAPTERS_DIR_REL}/${match}` : null;
}

export type AssembleResult = {
  file: string;
  chapters: number[];
  missing: number[];
};

/**
 * Concatenates chapters 1..`chapters` in order. Each part is `## <file stem>`, the body and a
 * `---` rule. Missing chapters are reported, not fatal, unless none exist at all.
 */
export async function assembleManuscript(rootDir: string, chapters: number): Promise<AssembleResult> {
  if (!Number.isInteger(chapters) || chapters < 1) throw new NovelCliError(`--chapters must be an int >= 1.`, 2);
  const index = await readChapterIndex(rootDir);
  const indexed = new Map(index.chapters.map((c) => [c.chapter, c.file] as const));

  const parts: string[] = [];
  const included: number[] = [];
  const missing: number[] = [];
  for (let c = 1; c <= chapters; c += 1) {
    const rel = await findChapterFile(rootDir, c, indexed);
    if (!rel) {
      missing.push(c);
      continue;
    }
    const body = (await readTextFile(join(rootDir, rel))).trim();
    parts.push(`## ${basename(rel, ".md")}\n\n${body}\n\n---\n`);
    included.push(c);
  }

  if (included.length === 0) throw new NovelCliError(`No chapter files found under ${CHAPTERS_DIR_REL}/.`, 2);
  await writeTextFile(join(rootDir, MANUSCRIPT_REL), parts.join("\n"));
  return { file: MANUSCRIPT_REL, chapters: included, missing };
}
