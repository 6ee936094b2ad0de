import OpenAI, { APIConnectionError, APIError } from "openai";

import { AuthError, OracleError, RateLimitedError, TransientHttpError, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import { sleep as defaultSleep, type Sleep } from "../sleep.js";
import { isPlainObject } from "../type-guards.js";
import { withBackoff } from "./backoff.js";
import { processUsage, type TokenUsage, type UsageMeter } from "./usage.js";

export type GenerationPurpose = "chapter" | "facts" | "consistency_repair" | "compliance_repair" | "title" | "summary";

export type SamplingParams = {
  temperature: number;
  top_p: number;
  max_output_tokens: number;
};

export type GenerationRequest = {
  purpose: GenerationPurpose;
  system_prompt: string;
  user_prompt: string;
  sampling: SamplingParams;
  model?: string;
};

export type GenerationResult = {
  text: string;
  finish_reason: string | null;
  usage: TokenUsage;
  /** The service refused or truncated the output on content grounds. Returned as data, not thrown. */
  flagged: boolean;
};

export interface GenerationOracle {
  generate(request: GenerationRequest): Promise<GenerationResult>;
}

export type ChatRequestBody = {
  model: string;
  system_prompt: string;
  user_prompt: string;
  temperature: number;
  top_p: number;
  max_tokens: number;
};

/** One raw round-trip to a chat-completions endpoint. Errors are classified by the oracle. */
export type ChatTransport = (body: ChatRequestBody) => Promise<unknown>;

const RATE_LIMIT_PATTERN = /rate limit|qps|too many requests/iu;
const TRANSIENT_PATTERN = /access token expired|timed? ?out|econnreset|etimedout|socket hang up|service unavailable/iu;
const CONTENT_PATTERN = /content security|content_filter|sensitive/iu;

function classifyMessage(message: string, status: number | null): OracleError {
  if (RATE_LIMIT_PATTERN.test(message)) return new RateLimitedError(`Generation oracle rate limited: ${message}`, status);
  if (TRANSIENT_PATTERN.test(message)) return new TransientHttpError(`Generation oracle transient failure: ${message}`, status);
  return new OracleError(`Generation oracle failed: ${message}`, { status });
}

export function classifyGenerationError(err: unknown): OracleError {
  if (err instanceof OracleError) return err;
  if (err instanceof APIConnectionError) return new TransientHttpError(`Generation oracle unreachable: ${err.message}`);
  if (err instanceof APIError) {
    const status = err.status ?? null;
    if (status === 401 || status === 403) return new AuthError(`Generation oracle rejected the credential (HTTP ${status}).`, status);
    if (status === 429) return new RateLimitedError(`Generation oracle rate limited (HTTP 429): ${err.message}`, status);
    if (status !== null && (status >= 500 || status === 408)) {
      return new TransientHttpError(`Generation oracle HTTP ${status}: ${err.message}`, status);
    }
    return classifyMessage(err.message, status);
  }
  return classifyMessage(errorMessage(err), null);
}

function estimateTokens(text: string): number {
  return Math.floor(Buffer.byteLength(text, "utf8") / 2);
}

function readUsage(raw: Record<string, unknown>, estimatedInput: number): TokenUsage {
  const usage: Record<string, unknown> = isPlainObject(raw.usage) ? raw.usage : {};
  const input = typeof usage.prompt_tokens === "number" ? usage.prompt_tokens : estimatedInput;
  const output = typeof usage.completion_tokens === "number" ? usage.completion_tokens : 0;
  return { input_tokens: input, output_tokens: output };
}

function pickChoiceText(choice: Record<string, unknown>): string | null {
  const message = choice.message;
  if (isPlainObject(message) && typeof message.content === "string") return message.content;
  if (typeof choice.content === "string") return choice.content;
  return null;
}

/**
 * Folds the payload shapes the endpoint has been seen to return (`result`, `output`,
 * `choices[].message.content`, `choices[].content`, `error_code`/`error_msg`) into one result.
 */
export function normalizeGenerationPayload(raw: unknown, estimatedInputTokens = 0): GenerationResult {
  if (!isPlainObject(raw)) throw new OracleError("Generation oracle returned a non-object payload.");

  if (raw.error_code !== undefined || raw.error_msg !== undefined) {
    const message = `API Error ${String(raw.error_code ?? "unknown")}: ${String(raw.error_msg ?? "Unknown API error")}`;
    if (CONTENT_PATTERN.test(message)) {
      return { text: "", finish_reason: "content_filter", usage: readUsage(raw, estimatedInputTokens), flagged: true };
    }
    throw classifyMessage(message, null);
  }

  const usage = readUsage(raw, estimatedInputTokens);
  if (typeof raw.result === "string") return { text: raw.result, finish_reason: null, usage, flagged: false };
  if (typeof raw.output === "string") return { text: raw.output, finish_reason: null, usage, flagged: false };

  const choices = raw.choices;
  if (Array.isArray(choices) && choices.length > 0 && isPlainObject(choices[0])) {
    const choice = choices[0];
    const text = pickChoiceText(choice);
    const finish_reason = typeof choice.finish_reason === "string" ? choice.finish_reason : null;
    const flagged = finish_reason === "content_filter";
    if (text !== null) return { text, finish_reason, usage, flagged };
    if (flagged) return { text: "", finish_reason, usage, flagged };
  }

  throw new OracleError("Generation oracle response is missing message content.");
}

export type ChatCompletionsOracleOptions = {
  transport: ChatTransport;
  model: string;
  maxAttempts: number;
  baseDelayMs: number;
  sleep?: Sleep;
  usage?: UsageMeter;
  logger?: Logger;
};

export class ChatCompletionsOracle implements GenerationOracle {
  constructor(private readonly opts: ChatCompletionsOracleOptions) {}

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const model = request.model ?? this.opts.model;
    const estimatedInput = estimateTokens(`${request.system_prompt}\n${request.user_prompt}`);
    const body: ChatRequestBody = {
      model,
      system_prompt: request.system_prompt,
      user_prompt: request.user_prompt,
      temperature: request.sampling.temperature,
      top_p: request.sampling.top_p,
      max_tokens: request.sampling.max_output_tokens
    };

    const result = await withBackoff(async () => normalizeGenerationPayload(await this.opts.transport(body), estimatedInput), {
      maxAttempts: this.opts.maxAttempts,
      baseDelayMs: this.opts.baseDelayMs,
      sleep: this.opts.sleep ?? defaultSleep,
      classify: classifyGenerationError,
      onRetry: ({ attempt, delayMs, error }) => {
        this.opts.logger?.warn(`${request.purpose}: retry ${attempt} in ${delayMs}ms`, { error: error.message });
      }
    });

    const meter = this.opts.usage ?? processUsage;
    meter.record(model, result.usage);
    this.opts.logger?.debug(`${request.purpose}: ${model} ok`, {
      finish_reason: result.finish_reason,
      input_tokens: result.usage.input_tokens,
      output_tokens: result.usage.output_tokens
    });
    return result;
  }
}

export function openAiTransport(args: { apiKey: string; baseUrl: string; timeoutMs: number }): ChatTransport {
  const client = new OpenAI({ apiKey: args.apiKey, baseURL: args.baseUrl, timeout: args.timeoutMs, maxRetries: 0 });
  return async (body) =>
    await client.chat.completions.create({
      model: body.model,
      messages: [
        { role: "system", content: body.system_prompt },
        { role: "user", content: body.user_prompt }
      ],
      temperature: body.temperature,
      top_p: body.top_p,
      max_tokens: body.max_tokens,
      stream: false
    });
}

export function createGenerationOracle(args: {
  apiKey: string | null;
  baseUrl: string;
  model: string;
  timeoutMs: number;
  maxAttempts: number;
  baseDelayMs: number;
  logger?: Logger;
  usage?: UsageMeter;
  sleep?: Sleep;
}): ChatCompletionsOracle {
  if (!args.apiKey) {
    throw new AuthError("No generation credential configured. Set LLM_API_KEY (or BAIDU_API_KEY), or use --dry-run.");
  }
  return new ChatCompletionsOracle({
    transport: openAiTransport({ apiKey: args.apiKey, baseUrl: args.baseUrl, timeoutMs: args.timeoutMs }),
    model: args.model,
    maxAttempts: args.maxAttempts,
    baseDelayMs: args.baseDelayMs,
    logger: args.logger,
    usage: args.usage,
    sleep: args.sleep
  });
}

const DRY_RUN_TEXT: Record<GenerationPurpose, string> = {
  chapter: "【干跑模式】本章正文占位。该模式不调用接口, 仅用于验证流程与提示词。",
  facts: '{"characters": {}, "events": [], "states": {}, "interactions": []}',
  consistency_repair: "【干跑模式】一致性修订占位。",
  compliance_repair: "【干跑模式】合规修订占位。",
  title: "干跑标题",
  summary: "干跑模式: 以八到十二条二三十字要点代替。"
};

/** Deterministic stand-in used by `--dry-run`; never touches the network. */
export class DryRunOracle implements GenerationOracle {
  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const text = request.purpose === "chapter" ? `${DRY_RUN_TEXT.chapter}\n\n${request.user_prompt}` : DRY_RUN_TEXT[request.purpose];
    return { text, finish_reason: "stop", usage: { input_tokens: 0, output_tokens: 0 }, flagged: false };
  }
}
