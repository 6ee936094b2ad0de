import dotenv from "dotenv";
import { readFile } from "node:fs/promises";
import { join } from "node:path";

import { NovelCliError, errorMessage } from "./errors.js";
import { pathExists } from "./fs-utils.js";
import { LOG_LEVELS, type LogFormat, type LogLevel } from "./logger.js";
import type { SamplingParams } from "./oracle/generation.js";

export type Env = Record<string, string | undefined>;

/** Raw flag values as the CLI collected them; every field is optional and validated here. */
export type RunFlags = {
  chapters?: string | number;
  startChapter?: string | number;
  temperature?: string | number;
  topP?: string | number;
  maxOutputTokens?: string | number;
  waitSeconds?: string | number;
  window?: string | number;
  maxModerationRounds?: string | number;
  moderationCooldownSeconds?: string | number;
  dryRun?: boolean;
  blueprint?: string;
  quiet?: boolean;
};

export type LlmConfig = {
  api_key: string | null;
  base_url: string;
  model: string;
  repair_model: string;
  max_attempts: number;
  retry_base_ms: number;
  timeout_ms: number;
};

export type ModerationConfig = {
  api_key: string;
  secret_key: string;
  token_margin_seconds: number;
  timeout_ms: number;
};

export type RunConfig = {
  chapters: number;
  start_chapter: number;
  sampling: SamplingParams;
  wait_seconds: number;
  window: number;
  max_moderation_rounds: number;
  moderation_cooldown_seconds: number;
  dry_run: boolean;
  blueprint_path: string | null;
  quiet: boolean;
  llm: LlmConfig;
  /** `null` disables the compliance stage. */
  moderation: ModerationConfig | null;
  log: { level: LogLevel; format: LogFormat };
};

export const RUN_DEFAULTS = {
  chapters: 15,
  start_chapter: 1,
  temperature: 0.75,
  top_p: 0.85,
  max_output_tokens: 4600,
  wait_seconds: 60,
  window: 3,
  max_moderation_rounds: 3,
  moderation_cooldown_seconds: 2
} as const;

export const LLM_DEFAULTS = {
  base_url: "https://qianfan.baidubce.com/v2",
  model: "ernie-x1-turbo-32k",
  repair_model: "ernie-4.5-turbo-128k",
  max_attempts: 5,
  retry_base_ms: 2000,
  timeout_ms: 300_000
} as const;

/**
 * Reads `<rootDir>/.env` with dotenv. Values already present in `base` win, so the shell
 * environment overrides the file.
 */
export async function loadEnv(rootDir: string, base: Env = process.env): Promise<Env> {
  const path = join(rootDir, ".env");
  if (!(await pathExists(path))) return { ...base };
  let parsed: Record<string, string>;
  try {
    parsed = dotenv.parse(await readFile(path, "utf8"));
  } catch (err: unknown) {
    throw new NovelCliError(`Failed to read ${path}: ${errorMessage(err)}`, 2);
  }
  return { ...parsed, ...base };
}

function opt(env: Env, name: string): string | undefined {
  const v = env[name];
  return v && v.trim() ? v.trim() : undefined;
}

function optAny(env: Env, names: string[]): string | undefined {
  for (const name of names) {
    const v = opt(env, name);
    if (v) return v;
  }
  return undefined;
}

function toNumber(label: string, raw: string | number): number {
  const n = typeof raw === "number" ? raw : Number(raw.trim());
  if (!Number.isFinite(n) || (typeof raw === "string" && raw.trim().length === 0)) {
    throw new NovelCliError(`Invalid number for ${label}: ${String(raw)}`, 2);
  }
  return n;
}

function intIn(label: string, raw: string | number | undefined, def: number, min: number): number {
  if (raw === undefined) return def;
  const n = toNumber(label, raw);
  if (!Number.isInteger(n)) throw new NovelCliError(`Invalid ${label}: must be an integer (got ${String(raw)}).`, 2);
  if (n < min) throw new NovelCliError(`Invalid ${label}: must be >= ${min} (got ${n}).`, 2);
  return n;
}

function floatIn(label: string, raw: string | number | undefined, def: number, min: number, max: number): number {
  if (raw === undefined) return def;
  const n = toNumber(label, raw);
  if (n < min || n > max) throw new NovelCliError(`Invalid ${label}: must be within [${min}, ${max}] (got ${n}).`, 2);
  return n;
}

function enumOf<T extends string>(label: string, raw: string | undefined, allowed: readonly T[], def: T): T {
  if (raw === undefined) return def;
  const v = raw.toLowerCase();
  for (const a of allowed) if (a === v) return a;
  throw new NovelCliError(`Invalid value for ${label}: ${raw}. Allowed: ${allowed.join(", ")}`, 2);
}

const LOG_FORMATS: readonly LogFormat[] = ["pretty", "json"];

export const MODERATION_DEFAULTS = {
  token_margin_seconds: 60,
  timeout_ms: 30_000
} as const;

function moderationTuning(env: Env, api_key: string, secret_key: string): ModerationConfig {
  return {
    api_key,
    secret_key,
    token_margin_seconds: intIn(
      "MODERATION_TOKEN_MARGIN_SECONDS",
      opt(env, "MODERATION_TOKEN_MARGIN_SECONDS"),
      MODERATION_DEFAULTS.token_margin_seconds,
      0
    ),
    timeout_ms: intIn("MODERATION_TIMEOUT_MS", opt(env, "MODERATION_TIMEOUT_MS"), MODERATION_DEFAULTS.timeout_ms, 1)
  };
}

/** Flags > environment > defaults. Rejects bad values before anything touches an oracle. */
export function loadRunConfig(flags: RunFlags, env: Env): RunConfig {
  const chapters = intIn("--chapters", flags.chapters, RUN_DEFAULTS.chapters, 1);
  const start_chapter = intIn("--start-chapter", flags.startChapter, RUN_DEFAULTS.start_chapter, 1);
  if (start_chapter > chapters) {
    throw new NovelCliError(`Invalid --start-chapter: ${start_chapter} is past --chapters ${chapters}.`, 2);
  }

  const dry_run = Boolean(flags.dryRun);
  const quiet = Boolean(flags.quiet);

  const moderationKey = optAny(env, ["MODERATION_API_KEY", "TEXT_API_KEY"]);
  const moderationSecret = optAny(env, ["MODERATION_SECRET_KEY", "TEXT_SECRET_KEY"]);
  const moderation = !dry_run && moderationKey && moderationSecret ? moderationTuning(env, moderationKey, moderationSecret) : null;

  const level = enumOf("LOG_LEVEL", opt(env, "LOG_LEVEL"), LOG_LEVELS, "info");

  return {
    chapters,
    start_chapter,
    sampling: {
      temperature: floatIn("--temperature", flags.temperature, RUN_DEFAULTS.temperature, 0, 2),
      top_p: floatIn("--top-p", flags.topP, RUN_DEFAULTS.top_p, 0, 1),
      max_output_tokens: intIn("--max-tokens", flags.maxOutputTokens, RUN_DEFAULTS.max_output_tokens, 1)
    },
    wait_seconds: intIn("--wait-seconds", flags.waitSeconds, RUN_DEFAULTS.wait_seconds, 0),
    window: intIn("--window", flags.window, RUN_DEFAULTS.window, 0),
    max_moderation_rounds: intIn("--max-moderation-rounds", flags.maxModerationRounds, RUN_DEFAULTS.max_moderation_rounds, 0),
    moderation_cooldown_seconds: floatIn(
      "--moderation-cooldown",
      flags.moderationCooldownSeconds,
      RUN_DEFAULTS.moderation_cooldown_seconds,
      0,
      Number.MAX_SAFE_INTEGER
    ),
    dry_run,
    blueprint_path: flags.blueprint && flags.blueprint.trim() ? flags.blueprint.trim() : null,
    quiet,
    llm: {
      api_key: optAny(env, ["LLM_API_KEY", "BAIDU_API_KEY"]) ?? null,
      base_url: opt(env, "LLM_BASE_URL") ?? LLM_DEFAULTS.base_url,
      model: opt(env, "LLM_MODEL") ?? LLM_DEFAULTS.model,
      repair_model: opt(env, "LLM_REPAIR_MODEL") ?? LLM_DEFAULTS.repair_model,
      max_attempts: intIn("LLM_MAX_ATTEMPTS", opt(env, "LLM_MAX_ATTEMPTS"), LLM_DEFAULTS.max_attempts, 1),
      retry_base_ms: intIn("LLM_RETRY_BASE_MS", opt(env, "LLM_RETRY_BASE_MS"), LLM_DEFAULTS.retry_base_ms, 0),
      timeout_ms: intIn("LLM_TIMEOUT_MS", opt(env, "LLM_TIMEOUT_MS"), LLM_DEFAULTS.timeout_ms, 1)
    },
    moderation,
    log: {
      level: quiet && (level === "debug" || level === "info") ? "warn" : level,
      format: enumOf("LOG_FORMAT", opt(env, "LOG_FORMAT"), LOG_FORMATS, "pretty")
    }
  };
}

/** Moderation credentials for the standalone `moderate` command, which has no dry-run. */
export function moderationConfigFromEnv(env: Env): ModerationConfig | null {
  const api_key = optAny(env, ["MODERATION_API_KEY", "TEXT_API_KEY"]);
  const secret_key = optAny(env, ["MODERATION_SECRET_KEY", "TEXT_SECRET_KEY"]);
  if (!api_key || !secret_key) return null;
  return moderationTuning(env, api_key, secret_key);
}
