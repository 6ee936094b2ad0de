import assert from "node:assert/strict";
import { readFile, readdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import test from "node:test";

import { loadBlueprint } from "../blueprint.js";
import { loadSnapshot, readChapterIndex } from "../checkpoint.js";
import { loadRunConfig, type RunFlags } from "../config.js";
import { NovelCliError, OracleError, OracleExhaustedError, TransientHttpError } from "../errors.js";
import { ensureDir, pathExists } from "../fs-utils.js";
import { createMemoryLogger, createSilentLogger } from "../logger.js";
import { moderateChapterDirectory, moderateChapterFile } from "../moderate-file.js";
import { DryRunOracle } from "../oracle/generation.js";
import type { ModerationOracle } from "../oracle/moderation.js";
import { UsageMeter } from "../oracle/usage.js";
import { runNovel, type PipelineDeps } from "../pipeline.js";
import { CHAPTER_BODY, ScriptedModeration, ScriptedOracle, makeTempRoot, nonCompliant, recordingSleep, type ScriptedReply } from "./helpers/fakes.js";

async function deps(args: {
  rootDir: string;
  flags: RunFlags;
  generation: PipelineDeps["generation"];
  moderation?: ModerationOracle | null;
  logger?: PipelineDeps["logger"];
  sleep?: PipelineDeps["sleep"];
}): Promise<PipelineDeps> {
  return {
    rootDir: args.rootDir,
    config: loadRunConfig(args.flags, {}),
    blueprint: await loadBlueprint(),
    generation: args.generation,
    moderation: args.moderation ?? null,
    logger: args.logger ?? createSilentLogger(),
    sleep: args.sleep ?? recordingSleep().sleep,
    usage: new UsageMeter()
  };
}

const SUMMARY_LINES = ["林晚在雨夜离开顾家，把戒指留在玄关柜上", "顾言回家发现空荡的房间，情绪第一次失控", "林晚独自登上去南方的列车，决定重新开始"];

test("a moderated run writes every artifact and waits between chapters", async () => {
  const rootDir = await makeTempRoot("pipeline-full");
  const generation = new ScriptedOracle();
  const moderation = new ScriptedModeration();
  const { sleep, delays } = recordingSleep();

  const report = await runNovel(await deps({ rootDir, flags: { chapters: 2 }, generation, moderation, sleep }));

  assert.deepEqual(
    report.chapters.map((c) => [c.chapter, c.status, c.title, c.file, c.consistency, c.moderation_rounds, c.summary_lines]),
    [
      [1, "compliant", "雨夜离别", "chapters/chapter-001-雨夜离别.md", "clean", 0, 3],
      [2, "compliant", "雨夜离别", "chapters/chapter-002-雨夜离别.md", "clean", 0, 3]
    ]
  );
  assert.deepEqual(delays, [60000]);
  assert.equal(report.cold_resume, false);
  assert.equal(report.resumed_from, null);
  assert.deepEqual(report.manuscript, { file: "novel-full.md", chapters: [1, 2], missing: [] });

  const chapterCalls = generation.calls("chapter");
  assert.equal(chapterCalls[0]?.model, "ernie-x1-turbo-32k");
  assert.ok(chapterCalls[1]?.user_prompt.includes(`【近期剧情脉络】\n第1章：\n${SUMMARY_LINES.map((l) => `- ${l}`).join("\n")}`));
  assert.equal(generation.calls("title")[0]?.model, "ernie-4.5-turbo-128k");

  assert.equal(
    await readFile(join(rootDir, "summaries/chapter-001-summary.md"), "utf8"),
    `${SUMMARY_LINES.map((l) => `- ${l}`).join("\n")}\n`
  );
  for (const rel of ["logs/chapter-001.raw.txt", "logs/facts-chapter-002.json", "logs/moderation-chapter-001.jsonl", "logs/usage.json"]) {
    assert.equal(await pathExists(join(rootDir, rel)), true, rel);
  }
  assert.deepEqual((await readdir(join(rootDir, "state"))).sort(), ["chapters.json", "snapshot-chapter-001.json", "snapshot-chapter-002.json"]);
  const index = await readChapterIndex(rootDir);
  assert.deepEqual(index.chapters[1], {
    chapter: 2,
    status: "compliant",
    title: "雨夜离别",
    file: "chapters/chapter-002-雨夜离别.md",
    residual_conflicts: 0,
    moderation_rounds: 0
  });
});

test("a dry run completes without moderation or cooldowns", async () => {
  const rootDir = await makeTempRoot("pipeline-dry");
  const { sleep, delays } = recordingSleep();

  const report = await runNovel(await deps({ rootDir, flags: { chapters: 2, dryRun: true }, generation: new DryRunOracle(), sleep }));

  assert.deepEqual(
    report.chapters.map((c) => [c.status, c.file, c.moderation_rounds]),
    [
      ["unchecked", "chapters/chapter-001-干跑标题.md", null],
      ["unchecked", "chapters/chapter-002-干跑标题.md", null]
    ]
  );
  assert.deepEqual(delays, []);
  assert.equal(await readFile(join(rootDir, "summaries/chapter-002-summary.md"), "utf8"), "- 干跑模式: 以八到十二条二三十字要点代替。\n");
  assert.equal(await pathExists(join(rootDir, "novel-full.md")), true);
});

test("a missing predecessor snapshot is a logged cold resume", async () => {
  const rootDir = await makeTempRoot("pipeline-cold");
  const { logger, entries } = createMemoryLogger("warn");
  const generation = new ScriptedOracle();

  const report = await runNovel(await deps({ rootDir, flags: { chapters: 3, startChapter: 3 }, generation, logger }));

  assert.equal(report.cold_resume, true);
  assert.equal(report.resumed_from, null);
  assert.deepEqual(entries[0], {
    timestamp: entries[0]?.timestamp,
    level: "warn",
    scope: "checkpoint",
    message: "cold resume: no snapshot for chapter 2; continuing with an empty ledger and context",
    data: { start_chapter: 3 }
  });
  assert.ok(generation.calls("chapter")[0]?.user_prompt.startsWith("请写第3章正文。\n前情提要：故事开始。\n"));
  assert.deepEqual(report.manuscript, { file: "novel-full.md", chapters: [3], missing: [1, 2] });
});

const FACTS_BY_CHAPTER: ScriptedReply[] = [
  '{"characters": {"林晚": {"身高": "168cm"}}, "events": ["雨夜离别"], "states": {"林晚": {"location": "机场"}}, "interactions": [{"characters": ["林晚", "顾言"], "type": "争吵", "details": "玄关"}]}',
  '{"characters": {"顾言": {"职业": "总裁"}}, "events": ["车站重逢"], "states": {"顾言": {"emotional_state": "悔恨"}}, "threads": [{"name": "误会", "description": "顾言误以为林晚背叛", "event": "车站重逢"}, {"name": "主线", "status": "已解决"}]}',
  '{"characters": {"林晚": {"职业": "设计师"}}, "events": ["画展"]}'
];

test("resuming from a snapshot reproduces the uninterrupted run", async () => {
  const straightRoot = await makeTempRoot("pipeline-straight");
  const straight = new ScriptedOracle({ facts: FACTS_BY_CHAPTER });
  await runNovel(await deps({ rootDir: straightRoot, flags: { chapters: 3 }, generation: straight }));

  const resumedRoot = await makeTempRoot("pipeline-resumed");
  await runNovel(await deps({ rootDir: resumedRoot, flags: { chapters: 2 }, generation: new ScriptedOracle({ facts: FACTS_BY_CHAPTER.slice(0, 2) }) }));
  const resumed = new ScriptedOracle({ facts: FACTS_BY_CHAPTER.slice(2) });
  const report = await runNovel(await deps({ rootDir: resumedRoot, flags: { chapters: 3, startChapter: 3 }, generation: resumed }));

  assert.equal(report.resumed_from, 2);
  assert.equal(report.cold_resume, false);
  assert.equal(resumed.calls("chapter")[0]?.user_prompt, straight.calls("chapter")[2]?.user_prompt);

  const a = await loadSnapshot(straightRoot, 3);
  const b = await loadSnapshot(resumedRoot, 3);
  assert.ok(a && b);
  assert.deepEqual(b.ledger, a.ledger);
  assert.deepEqual(b.characters, a.characters);
  assert.deepEqual(b.interaction_history, a.interaction_history);
  assert.deepEqual(b.rolling_context, a.rolling_context);
  assert.deepEqual(b.plot_threads, a.plot_threads);
  assert.deepEqual(
    a.plot_threads.map((t) => [t.name, t.status, t.key_events]),
    [
      ["主线", "已解决", []],
      ["误会", "进行中", ["车站重逢"]]
    ]
  );
  assert.ok(straight.calls("chapter")[0]?.user_prompt.includes("【剧情线索】\n【主线】（进行中）：误会导致离婚，真相大白后男主追妻，两人破镜重圆\n背景设定："));
  assert.ok(straight.calls("chapter")[2]?.user_prompt.includes("【剧情线索】\n【误会】（进行中）：顾言误以为林晚背叛\n  关键事件：车站重逢\n背景设定："));
  assert.deepEqual(a.ledger, {
    characters: { 林晚: { 身高: "168cm", 职业: "设计师" }, 顾言: { 职业: "总裁" } },
    events: ["雨夜离别", "车站重逢", "画展"]
  });
});

test("a fatal oracle error stops the run and leaves the previous snapshot", async () => {
  const rootDir = await makeTempRoot("pipeline-fatal");
  const generation = new ScriptedOracle({
    chapter: [CHAPTER_BODY, new OracleExhaustedError(5, new TransientHttpError("HTTP 503"))]
  });

  await assert.rejects(
    runNovel(await deps({ rootDir, flags: { chapters: 3, waitSeconds: 0 }, generation })),
    (err: unknown) => err instanceof OracleExhaustedError
  );

  const fatal: unknown = JSON.parse(await readFile(join(rootDir, "logs/fatal-error.json"), "utf8"));
  assert.ok(fatal && typeof fatal === "object");
  assert.deepEqual(
    { ...fatal, timestamp: "" },
    {
      timestamp: "",
      chapter: 2,
      stage: "draft",
      error: "OracleExhaustedError",
      message: "Oracle failed after 5 attempt(s): HTTP 503",
      exit_code: 4
    }
  );
  assert.equal(await pathExists(join(rootDir, "state/snapshot-chapter-001.json")), true);
  assert.equal(await pathExists(join(rootDir, "state/snapshot-chapter-002.json")), false);
  assert.equal(await pathExists(join(rootDir, "novel-full.md")), false);
});

test("a flagged draft is fatal", async () => {
  const rootDir = await makeTempRoot("pipeline-flagged");
  const generation = new ScriptedOracle({ chapter: [{ flagged: true }] });
  await assert.rejects(
    runNovel(await deps({ rootDir, flags: { chapters: 1 }, generation })),
    (err: unknown) => err instanceof OracleError && err.message === "Chapter 1 draft is unusable (flagged by the service)."
  );
});

test("a chapter that never passes moderation is kept under the failure marker", async () => {
  const rootDir = await makeTempRoot("pipeline-modfail");
  const generation = new ScriptedOracle();
  const moderation = new ScriptedModeration([nonCompliant(["笨蛋"]), nonCompliant(["笨蛋"])]);

  const report = await runNovel(
    await deps({ rootDir, flags: { chapters: 1, maxModerationRounds: 1, moderationCooldownSeconds: 0 }, generation, moderation })
  );

  assert.deepEqual(report.chapters[0], {
    chapter: 1,
    status: "moderation_failed",
    title: "",
    file: "chapters/chapter-001-moderation-failed.md",
    consistency: "clean",
    residual_conflicts: 0,
    moderation_rounds: 1,
    summary_lines: 3
  });
  assert.equal(generation.calls("title").length, 0);
  assert.equal(generation.calls("compliance_repair").length, 1);
  assert.equal(await readFile(join(rootDir, "chapters/chapter-001-moderation-failed.md"), "utf8"), "改写后的正文。\n");
});

test("moderateChapterFile repairs an existing chapter and renames it", async () => {
  const rootDir = await makeTempRoot("pipeline-moderate-file");
  await ensureDir(join(rootDir, "chapters"));
  await writeFile(join(rootDir, "chapters/chapter-002-moderation-failed.md"), "他骂了一句笨蛋。\n", "utf8");
  const moderation = new ScriptedModeration([nonCompliant(["笨蛋"])]);
  const generation = new ScriptedOracle();

  const result = await moderateChapterFile({
    rootDir,
    file: "chapters/chapter-002-moderation-failed.md",
    moderation,
    generation,
    repairModel: "repair",
    maxRounds: 3,
    cooldownMs: 0,
    sleep: recordingSleep().sleep,
    logger: createSilentLogger()
  });

  assert.deepEqual(result, {
    chapter: 2,
    status: "compliant",
    previous_file: "chapters/chapter-002-moderation-failed.md",
    file: "chapters/chapter-002-雨夜离别.md",
    rounds: 1,
    moderation_calls: 2,
    repair_calls: 1
  });
  assert.deepEqual(moderation.texts, ["他骂了一句笨蛋。", "改写后的正文。"]);
  assert.deepEqual(await readdir(join(rootDir, "chapters")), ["chapter-002-雨夜离别.md"]);
  const index = await readChapterIndex(rootDir);
  assert.equal(index.chapters[0]?.moderation_rounds, 1);
});

test("a failed, flagged or empty title falls back to the positional title and the run continues", async () => {
  const rootDir = await makeTempRoot("pipeline-title");
  const { logger, entries } = createMemoryLogger("warn");
  const generation = new ScriptedOracle({ title: [new OracleError("title service down"), { flagged: true }, "  "] });

  const report = await runNovel(
    await deps({ rootDir, flags: { chapters: 3, waitSeconds: 0 }, generation, moderation: new ScriptedModeration(), logger })
  );

  assert.deepEqual(
    report.chapters.map((c) => [c.status, c.title, c.file]),
    [
      ["compliant", "第1章", "chapters/chapter-001-第1章.md"],
      ["compliant", "第2章", "chapters/chapter-002-第2章.md"],
      ["compliant", "第3章", "chapters/chapter-003-第3章.md"]
    ]
  );
  assert.deepEqual((await readdir(join(rootDir, "chapters"))).sort(), ["chapter-001-第1章.md", "chapter-002-第2章.md", "chapter-003-第3章.md"]);
  const index = await readChapterIndex(rootDir);
  assert.deepEqual(index.chapters[0], {
    chapter: 1,
    status: "compliant",
    title: "第1章",
    file: "chapters/chapter-001-第1章.md",
    residual_conflicts: 0,
    moderation_rounds: 0
  });
  assert.deepEqual(
    entries.map((e) => [e.level, e.scope, e.message, e.data]),
    [
      ["warn", "pipeline", "chapter 1: title generation failed; using positional title", { error: "title service down" }],
      ["warn", "pipeline", "chapter 2: title came back empty; using positional title", { flagged: true }],
      ["warn", "pipeline", "chapter 3: title came back empty; using positional title", { flagged: false }]
    ]
  );
  assert.deepEqual(report.manuscript.chapters, [1, 2, 3]);
});

test("moderateChapterDirectory walks a directory, records each file and keeps going after a failure", async () => {
  const rootDir = await makeTempRoot("pipeline-moderate-dir");
  const chaptersDir = join(rootDir, "chapters");
  await ensureDir(chaptersDir);
  const files: Record<string, string> = {
    "chapter-001-甲.md": "干净的正文。\n",
    "chapter-002.md": "他骂了一句笨蛋。\n",
    "chapter-003.md": "  \n",
    "chapter-004.md": "他又骂了一句笨蛋。\n",
    "notes.md": "备忘。\n",
    "readme.txt": "说明。\n"
  };
  for (const [name, body] of Object.entries(files)) await writeFile(join(chaptersDir, name), body, "utf8");

  const moderation = new ScriptedModeration([
    { kind: "compliant", conclusion: "合规" },
    nonCompliant(["笨蛋"]),
    nonCompliant(["笨蛋"]),
    nonCompliant(["笨蛋"])
  ]);
  const generation = new ScriptedOracle({ compliance_repair: ["改写后的正文。", new OracleError("repair service down")] });
  const { sleep, delays } = recordingSleep();

  const batch = await moderateChapterDirectory({
    rootDir,
    dir: "chapters",
    moderation,
    generation,
    repairModel: "repair",
    maxRounds: 1,
    cooldownMs: 500,
    fileGapMs: 2000,
    sleep,
    logger: createSilentLogger()
  });

  assert.equal(batch.directory, "chapters");
  assert.deepEqual(batch.entries, [
    { file: "chapters/chapter-001-甲.md", outcome: "compliant", renamed_to: "chapters/chapter-001-甲.md", detail: "1 check(s), 0 rewrite(s)" },
    {
      file: "chapters/chapter-002.md",
      outcome: "moderation_failed",
      renamed_to: "chapters/chapter-002-moderation-failed.md",
      detail: "2 check(s), 1 rewrite(s)"
    },
    { file: "chapters/chapter-003.md", outcome: "skipped", renamed_to: null, detail: "empty" },
    { file: "chapters/chapter-004.md", outcome: "error", renamed_to: null, detail: "repair service down" },
    { file: "chapters/notes.md", outcome: "skipped", renamed_to: null, detail: "not a chapter file" }
  ]);
  assert.deepEqual(batch.counts, { compliant: 1, moderation_failed: 1, skipped: 2, error: 1 });
  assert.deepEqual(delays, [2000, 500, 2000]);
  assert.deepEqual(moderation.texts, ["干净的正文。", "他骂了一句笨蛋。", "改写后的正文。", "他又骂了一句笨蛋。"]);
  assert.equal(generation.calls("title").length, 0);

  assert.deepEqual((await readdir(chaptersDir)).sort(), [
    "chapter-001-甲.md",
    "chapter-002-moderation-failed.md",
    "chapter-003.md",
    "chapter-004.md",
    "notes.md",
    "readme.txt"
  ]);
  assert.equal(await readFile(join(chaptersDir, "chapter-002-moderation-failed.md"), "utf8"), "改写后的正文。\n");
  const index = await readChapterIndex(rootDir);
  assert.deepEqual(
    index.chapters.map((c) => [c.chapter, c.status, c.file]),
    [
      [1, "compliant", "chapters/chapter-001-甲.md"],
      [2, "moderation_failed", "chapters/chapter-002-moderation-failed.md"]
    ]
  );
});

test("moderateChapterDirectory rejects a path that is not a directory", async () => {
  const rootDir = await makeTempRoot("pipeline-moderate-notdir");
  await assert.rejects(
    moderateChapterDirectory({
      rootDir,
      dir: "missing",
      moderation: new ScriptedModeration(),
      generation: new ScriptedOracle(),
      repairModel: "repair",
      maxRounds: 1,
      cooldownMs: 0,
      fileGapMs: 0,
      logger: createSilentLogger()
    }),
    (err: unknown) => err instanceof NovelCliError && err.message === "Not a directory: missing" && err.exitCode === 2
  );
});
