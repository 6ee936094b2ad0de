#!/usr/bin/env node
import { Command, CommanderError } from "commander";
import { resolve } from "node:path";
import { pathToFileURL } from "node:url";

import { loadBlueprint, type StoryBlueprint } from "./blueprint.js";
import { latestSnapshotChapter, readChapterIndex } from "./checkpoint.js";
import { loadEnv, loadRunConfig, moderationConfigFromEnv, RUN_DEFAULTS, type RunConfig, type RunFlags } from "./config.js";
import { EXIT_USAGE, NovelCliError, errorMessage } from "./errors.js";
import { isDirectory } from "./fs-utils.js";
import { clearStaleLock, getLockStatus, withWriteLock } from "./lock.js";
import { createLogger, formatLogEntry, type LogFormat, type LogLevel, type Logger } from "./logger.js";
import { assembleManuscript } from "./manuscript.js";
import { moderateChapterDirectory, moderateChapterFile } from "./moderate-file.js";
import { DryRunOracle, createGenerationOracle, type GenerationOracle } from "./oracle/generation.js";
import { TextModerationClient, type ModerationOracle } from "./oracle/moderation.js";
import { processUsage } from "./oracle/usage.js";
import { errJson, okJson, printJson, stderrWrite, stdoutWrite, type Write } from "./output.js";
import { runNovel, writeFatalError } from "./pipeline.js";
import { resolveProjectRoot } from "./project.js";
import { resolveProjectPathArg } from "./safe-path.js";
import type { Sleep } from "./sleep.js";

type GlobalOpts = {
  json?: boolean;
  project?: string;
};

export type CliIo = {
  out: Write;
  err: Write;
  cwd: string;
  env?: Record<string, string | undefined>;
  /** Replaces the wall-clock cooldowns; the real delay is used when absent. */
  sleep?: Sleep;
};

function detectCommandName(argv: string[]): string {
  const withValue = new Set(["--project"]);
  for (let i = 0; i < argv.length; i++) {
    const token = argv[i] ?? "";
    if (token === "--") return "unknown";
    if (withValue.has(token)) {
      i++;
      continue;
    }
    if (!token.startsWith("-")) return token;
  }
  return "unknown";
}

function isJsonMode(argv: string[]): boolean {
  return argv.includes("--json");
}

function makeLogger(io: CliIo, opts: { level: LogLevel; format: LogFormat }): Logger {
  return createLogger({ level: opts.level, sink: (entry) => io.err(`${formatLogEntry(entry, opts.format)}\n`) });
}

const BATCH_FILE_GAP_SECONDS = 2;

function parseGapSeconds(raw: string | undefined): number {
  if (raw === undefined) return BATCH_FILE_GAP_SECONDS;
  const n = Number(raw.trim());
  if (raw.trim().length === 0 || !Number.isFinite(n) || n < 0) {
    throw new NovelCliError(`Invalid --gap: must be a number >= 0 (got ${raw}).`, EXIT_USAGE);
  }
  return n;
}

type PreparedRun = { blueprint: StoryBlueprint; generation: GenerationOracle; moderation: ModerationOracle | null };

async function prepareRun(config: RunConfig, io: CliIo, logger: Logger): Promise<PreparedRun> {
  const blueprint = await loadBlueprint(config.blueprint_path ? resolve(io.cwd, config.blueprint_path) : undefined);
  const generation: GenerationOracle = config.dry_run
    ? new DryRunOracle()
    : createGenerationOracle({
        apiKey: config.llm.api_key,
        baseUrl: config.llm.base_url,
        model: config.llm.model,
        timeoutMs: config.llm.timeout_ms,
        maxAttempts: config.llm.max_attempts,
        baseDelayMs: config.llm.retry_base_ms,
        logger: logger.withScope("llm"),
        sleep: io.sleep
      });
  const moderation: ModerationOracle | null = config.moderation
    ? new TextModerationClient({
        apiKey: config.moderation.api_key,
        secretKey: config.moderation.secret_key,
        tokenMarginSeconds: config.moderation.token_margin_seconds,
        timeoutMs: config.moderation.timeout_ms,
        logger: logger.withScope("moderation")
      })
    : null;
  return { blueprint, generation, moderation };
}

function buildProgram(argv: string[], io: CliIo): Command {
  const jsonMode = isJsonMode(argv);
  const { out } = io;

  const program = new Command();
  program.name("serial-novel").description("Chapter-by-chapter novel generation with continuity and moderation repair.");
  program.option("--json", "Emit machine-readable JSON (single object).");
  program.option("--project <dir>", "Output root directory (defaults to the current directory).");

  program.configureOutput({
    writeOut: (str) => out(str),
    writeErr: (str) => {
      if (!jsonMode) io.err(str);
    }
  });

  program.showHelpAfterError(false);
  program.showSuggestionAfterError(false);
  program.exitOverride();

  const rootFor = async (create = false): Promise<string> => {
    const opts = program.opts<GlobalOpts>();
    return resolveProjectRoot({ cwd: io.cwd, projectOverride: opts.project, create });
  };

  program
    .command("run")
    .description("Generate chapters start..chapters, resuming from the previous chapter's snapshot.")
    .option("--chapters <n>", `Last chapter index (default ${RUN_DEFAULTS.chapters}).`)
    .option("--start-chapter <n>", "First chapter to generate; > 1 resumes from its predecessor's snapshot.")
    .option("--temperature <t>", `Sampling temperature (default ${RUN_DEFAULTS.temperature}).`)
    .option("--top-p <p>", `Nucleus sampling (default ${RUN_DEFAULTS.top_p}).`)
    .option("--max-tokens <n>", `Max output tokens per chapter (default ${RUN_DEFAULTS.max_output_tokens}).`)
    .option("--wait-seconds <s>", `Cooldown between chapters (default ${RUN_DEFAULTS.wait_seconds}).`)
    .option("--window <n>", `Chapters of summary context in each prompt (default ${RUN_DEFAULTS.window}).`)
    .option("--max-moderation-rounds <n>", `Rewrite rounds before a chapter is marked failed (default ${RUN_DEFAULTS.max_moderation_rounds}).`)
    .option("--moderation-cooldown <s>", `Pause after each rewrite (default ${RUN_DEFAULTS.moderation_cooldown_seconds}).`)
    .option("--blueprint <file>", "Story blueprint JSON (defaults to the bundled one).")
    .option("--dry-run", "Use placeholder text; no network calls.")
    .option("--quiet", "Only log warnings and errors.")
    .action(
      async (localOpts: {
        chapters?: string;
        startChapter?: string;
        temperature?: string;
        topP?: string;
        maxTokens?: string;
        waitSeconds?: string;
        window?: string;
        maxModerationRounds?: string;
        moderationCooldown?: string;
        blueprint?: string;
        dryRun?: boolean;
        quiet?: boolean;
      }) => {
        const json = Boolean(program.opts<GlobalOpts>().json);
        const rootDir = await rootFor(true);
        const env = await loadEnv(rootDir, io.env ?? process.env);
        const flags: RunFlags = {
          chapters: localOpts.chapters,
          startChapter: localOpts.startChapter,
          temperature: localOpts.temperature,
          topP: localOpts.topP,
          maxOutputTokens: localOpts.maxTokens,
          waitSeconds: localOpts.waitSeconds,
          window: localOpts.window,
          maxModerationRounds: localOpts.maxModerationRounds,
          moderationCooldownSeconds: localOpts.moderationCooldown,
          blueprint: localOpts.blueprint,
          dryRun: localOpts.dryRun,
          quiet: localOpts.quiet
        };
        const config = loadRunConfig(flags, env);
        const logger = makeLogger(io, config.log);

        let prepared: PreparedRun;
        try {
          prepared = await prepareRun(config, io, logger);
        } catch (err: unknown) {
          await writeFatalError({ rootDir, logger }, config.start_chapter, "startup", err);
          throw err;
        }
        const { blueprint, generation, moderation } = prepared;
        if (!moderation) logger.withScope("pipeline").info("moderation disabled; chapters will be recorded as unchecked");

        processUsage.reset();
        const report = await withWriteLock(rootDir, { command: "run", chapter: config.start_chapter }, () =>
          runNovel({ rootDir, config, blueprint, generation, moderation, logger, sleep: io.sleep })
        );

        if (json) {
          printJson(okJson("run", { rootDir, ...report }), out);
          return;
        }
        for (const c of report.chapters) {
          out(`chapter ${c.chapter}: ${c.status} ${c.file}${c.residual_conflicts > 0 ? ` (residual conflicts: ${c.residual_conflicts})` : ""}\n`);
        }
        if (report.cold_resume) out(`Cold resume: no snapshot before chapter ${report.start_chapter}.\n`);
        out(`Manuscript: ${report.manuscript.file}\n`);
        out(`Usage: calls=${report.usage.calls} input=${report.usage.input_tokens} output=${report.usage.output_tokens}\n`);
      }
    );

  program
    .command("status")
    .description("Show the last snapshot, chapter statuses and lock state.")
    .action(async () => {
      const json = Boolean(program.opts<GlobalOpts>().json);
      const rootDir = await rootFor();
      const lastSnapshot = await latestSnapshotChapter(rootDir);
      const index = await readChapterIndex(rootDir);
      const lock = await getLockStatus(rootDir);
      const next = lastSnapshot === null ? 1 : lastSnapshot + 1;

      if (json) {
        printJson(okJson("status", { rootDir, last_snapshot: lastSnapshot, next_chapter: next, chapters: index.chapters, lock }), out);
        return;
      }

      out(`Project: ${rootDir}\n`);
      out(`Last snapshot: ${lastSnapshot ?? "none"} (next run: --start-chapter ${next})\n`);
      for (const c of index.chapters) {
        const rounds = c.moderation_rounds === null ? "-" : String(c.moderation_rounds);
        out(`  ${c.chapter}: ${c.status} rounds=${rounds} residual=${c.residual_conflicts} ${c.file}\n`);
      }
      if (lock.exists) {
        out(`Lock: present${lock.stale ? " (stale)" : ""} started=${lock.info?.started ?? "unknown"} pid=${lock.info?.pid ?? "unknown"}\n`);
      } else {
        out("Lock: none\n");
      }
    });

  program
    .command("assemble")
    .description("Rebuild novel-full.md from the chapter files.")
    .option("--chapters <n>", "Last chapter to include (defaults to the highest indexed chapter).")
    .action(async (localOpts: { chapters?: string }) => {
      const json = Boolean(program.opts<GlobalOpts>().json);
      const rootDir = await rootFor();
      let chapters: number;
      if (localOpts.chapters !== undefined) {
        chapters = Number(localOpts.chapters);
      } else {
        const index = await readChapterIndex(rootDir);
        chapters = index.chapters.reduce((max, c) => Math.max(max, c.chapter), 0);
        if (chapters === 0) throw new NovelCliError("No chapters recorded in state/chapters.json; pass --chapters <n>.", EXIT_USAGE);
      }
      const result = await withWriteLock(rootDir, { command: "assemble" }, () => assembleManuscript(rootDir, chapters));

      if (json) {
        printJson(okJson("assemble", { rootDir, ...result }), out);
        return;
      }
      out(`Wrote ${result.file} (${result.chapters.length} chapter(s)).\n`);
      if (result.missing.length > 0) out(`Missing: ${result.missing.join(", ")}\n`);
    });

  program
    .command("moderate")
    .description("Moderate a chapter file, or every chapter file of a directory, rewriting until compliant or out of rounds.")
    .argument("<path>", "Chapter file (chapters/chapter-003-重逢.md) or directory (chapters)")
    .option("--max-rounds <n>", `Rewrite rounds (default ${RUN_DEFAULTS.max_moderation_rounds}).`)
    .option("--cooldown <s>", `Pause after each rewrite (default ${RUN_DEFAULTS.moderation_cooldown_seconds}).`)
    .option("--gap <s>", `Pause between files of a directory (default ${BATCH_FILE_GAP_SECONDS}).`)
    .action(async (file: string, localOpts: { maxRounds?: string; cooldown?: string; gap?: string }) => {
      const json = Boolean(program.opts<GlobalOpts>().json);
      const rootDir = await rootFor();
      const env = await loadEnv(rootDir, io.env ?? process.env);
      const config = loadRunConfig({ maxModerationRounds: localOpts.maxRounds, moderationCooldownSeconds: localOpts.cooldown }, env);
      const moderationConfig = moderationConfigFromEnv(env);
      if (!moderationConfig) {
        throw new NovelCliError("Moderation credentials missing. Set MODERATION_API_KEY and MODERATION_SECRET_KEY.", EXIT_USAGE);
      }
      const logger = makeLogger(io, config.log);
      const generation = createGenerationOracle({
        apiKey: config.llm.api_key,
        baseUrl: config.llm.base_url,
        model: config.llm.repair_model,
        timeoutMs: config.llm.timeout_ms,
        maxAttempts: config.llm.max_attempts,
        baseDelayMs: config.llm.retry_base_ms,
        logger: logger.withScope("llm"),
        sleep: io.sleep
      });
      const moderation = new TextModerationClient({
        apiKey: moderationConfig.api_key,
        secretKey: moderationConfig.secret_key,
        tokenMarginSeconds: moderationConfig.token_margin_seconds,
        timeoutMs: moderationConfig.timeout_ms,
        logger: logger.withScope("moderation")
      });

      const target = resolveProjectPathArg(rootDir, file, "<path>");
      const shared = {
        rootDir,
        moderation,
        generation,
        repairModel: config.llm.repair_model,
        maxRounds: config.max_moderation_rounds,
        cooldownMs: config.moderation_cooldown_seconds * 1000,
        sleep: io.sleep,
        logger: logger.withScope("moderation")
      };

      if (await isDirectory(target.abs)) {
        const fileGapMs = parseGapSeconds(localOpts.gap) * 1000;
        const batch = await withWriteLock(rootDir, { command: "moderate" }, () =>
          moderateChapterDirectory({ ...shared, dir: file, fileGapMs })
        );
        if (json) {
          printJson(okJson("moderate", { rootDir, ...batch }), out);
          return;
        }
        for (const e of batch.entries) {
          out(`${e.file}: ${e.outcome}${e.renamed_to ? ` -> ${e.renamed_to}` : ""} (${e.detail})\n`);
        }
        const { compliant, moderation_failed, skipped, error } = batch.counts;
        out(`Summary: compliant=${compliant} moderation_failed=${moderation_failed} skipped=${skipped} error=${error}\n`);
        return;
      }

      const result = await withWriteLock(rootDir, { command: "moderate" }, () => moderateChapterFile({ ...shared, file }));

      if (json) {
        printJson(okJson("moderate", { rootDir, ...result }), out);
        return;
      }
      out(`chapter ${result.chapter}: ${result.status} after ${result.moderation_calls} check(s), ${result.repair_calls} rewrite(s) -> ${result.file}\n`);
    });

  const lock = program.command("lock").description("Manage the run lock (.novel.lock).");

  lock
    .command("status")
    .description("Show lock status.")
    .action(async () => {
      const json = Boolean(program.opts<GlobalOpts>().json);
      const rootDir = await rootFor();
      const status = await getLockStatus(rootDir);

      if (json) {
        printJson(okJson("lock status", { rootDir, ...status }), out);
        return;
      }

      if (!status.exists) {
        out("No lock.\n");
        return;
      }
      out(
        `Lock present${status.stale ? " (stale)" : ""}: command=${status.info?.command ?? "unknown"} started=${
          status.info?.started ?? "unknown"
        } pid=${status.info?.pid ?? "unknown"}\n`
      );
    });

  lock
    .command("clear")
    .description("Clear a stale lock (or fail if the lock is active).")
    .action(async () => {
      const json = Boolean(program.opts<GlobalOpts>().json);
      const rootDir = await rootFor();
      const cleared = await clearStaleLock(rootDir);

      if (json) {
        printJson(okJson("lock clear", { rootDir, cleared }), out);
        return;
      }

      out(cleared ? "Cleared stale lock.\n" : "No lock to clear.\n");
    });

  return program;
}

const defaultIo = (): CliIo => ({ out: stdoutWrite, err: stderrWrite, cwd: process.cwd() });

export async function main(argv: string[] = process.argv.slice(2), io: CliIo = defaultIo()): Promise<number> {
  const jsonMode = isJsonMode(argv);
  const program = buildProgram(argv, io);

  try {
    await program.parseAsync(argv, { from: "user" });
    return 0;
  } catch (err: unknown) {
    const command = detectCommandName(argv);
    if (err instanceof NovelCliError) {
      if (jsonMode) {
        printJson(errJson(command, err.message, { code: err.name, exitCode: err.exitCode }), io.out);
      } else {
        io.err(`${err.message}\n`);
      }
      return err.exitCode;
    }

    if (err instanceof CommanderError) {
      if (err.code === "commander.helpDisplayed" || err.code === "commander.version") {
        return 0;
      }
      if (jsonMode) {
        printJson(errJson(command, err.message, { code: err.code, exitCode: EXIT_USAGE }), io.out);
      } else {
        io.err(`${err.message}\n`);
      }
      return EXIT_USAGE;
    }

    const message = errorMessage(err);
    if (jsonMode) {
      printJson(errJson(command, message, { exitCode: 1 }), io.out);
    } else {
      io.err(`${message}\n`);
    }
    return 1;
  }
}

const entryPath = process.argv[1] ? resolve(process.argv[1]) : null;
if (entryPath && import.meta.url === pathToFileURL(entryPath).href) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      const message = err instanceof Error ? err.stack ?? err.message : String(err);
      process.stderr.write(`${message}\n`);
      process.exitCode = 1;
    });
}
