import { errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import { asInt, isPlainObject } from "../type-guards.js";

export type Violation = {
  category: string;
  message: string;
  hit_terms: string[];
};

export type ModerationVerdict =
  | { kind: "compliant"; conclusion: string }
  | { kind: "non_compliant"; conclusion: string; conclusion_code: number; violations: Violation[] }
  | { kind: "service_error"; message: string };

export interface ModerationOracle {
  /** Never throws: transport and payload failures come back as a `service_error` verdict. */
  moderate(text: string): Promise<ModerationVerdict>;
}

// 1 = compliant, 2 = non-compliant, 3 = suspected, 4 = review failed. Only 1 passes.
export const CONCLUSION_COMPLIANT = 1;
const NON_PASSING_CONCLUSIONS = new Set([2, 3, 4]);

function dedupe(values: Iterable<string>): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const v of values) {
    if (v.length === 0 || seen.has(v)) continue;
    seen.add(v);
    out.push(v);
  }
  return out;
}

function parseHits(raw: unknown): string[] {
  if (!Array.isArray(raw)) return [];
  const words: string[] = [];
  for (const hit of raw) {
    if (!isPlainObject(hit)) continue;
    const w = hit.words;
    if (typeof w === "string") words.push(w.trim());
    else if (Array.isArray(w)) for (const item of w) if (typeof item === "string") words.push(item.trim());
  }
  return dedupe(words);
}

function parseViolations(raw: unknown): Violation[] {
  if (!Array.isArray(raw)) return [];
  const out: Violation[] = [];
  for (const item of raw) {
    if (!isPlainObject(item)) continue;
    const type = item.type;
    const msg = item.msg;
    if ((typeof type !== "string" && typeof type !== "number") || typeof msg !== "string" || msg.length === 0) continue;
    out.push({ category: String(type), message: msg, hit_terms: parseHits(item.hits) });
  }
  return out;
}

export function parseModerationResponse(raw: unknown): ModerationVerdict {
  if (!isPlainObject(raw)) return { kind: "service_error", message: "Moderation response is not a JSON object." };

  if (raw.error_code !== undefined) {
    const msg = typeof raw.error_msg === "string" ? raw.error_msg : "未知错误";
    return { kind: "service_error", message: `API错误 ${String(raw.error_code)}: ${msg}` };
  }

  const code = asInt(raw.conclusionType);
  const conclusion = typeof raw.conclusion === "string" ? raw.conclusion : "未知";
  if (code === CONCLUSION_COMPLIANT) return { kind: "compliant", conclusion };
  if (code !== null && NON_PASSING_CONCLUSIONS.has(code)) {
    return { kind: "non_compliant", conclusion, conclusion_code: code, violations: parseViolations(raw.data) };
  }
  return { kind: "service_error", message: `Moderation response has no usable conclusionType (${String(raw.conclusionType)}).` };
}

export function formatVerdictDetail(verdict: ModerationVerdict): string {
  switch (verdict.kind) {
    case "compliant":
      return `内容合规 - ${verdict.conclusion}`;
    case "service_error":
      return verdict.message;
    case "non_compliant": {
      const lines: string[] = [];
      for (const v of verdict.violations) {
        lines.push(`类型:${v.category} - ${v.message}`);
        if (v.hit_terms.length > 0) lines.push(`  命中词汇: ${v.hit_terms.join("、")}`);
      }
      const head = `结论: ${verdict.conclusion}`;
      return lines.length > 0 ? `${head}\n详细信息:\n${lines.join("\n")}` : head;
    }
  }
}

const HIT_LINE = /命中词汇\s*[:：]\s*(.*)$/u;
// Whitespace is not a separator: a hit term may itself contain spaces.
const HIT_SEPARATORS = /[、,，;；]+/u;
const HIT_DECORATION = /[[\]'"“”‘’]/gu;

/** Pulls hit terms out of a rendered verdict detail, first occurrence order, no repeats. */
export function extractHitWords(detail: string): string[] {
  const words: string[] = [];
  for (const line of detail.split(/\r?\n/u)) {
    const m = HIT_LINE.exec(line);
    if (!m) continue;
    const rest = (m[1] ?? "").replace(HIT_DECORATION, " ");
    for (const part of rest.split(HIT_SEPARATORS)) words.push(part.trim());
  }
  return dedupe(words);
}

export function hitWordsOfVerdict(verdict: ModerationVerdict): string[] {
  if (verdict.kind !== "non_compliant") return [];
  return dedupe(verdict.violations.flatMap((v) => v.hit_terms));
}

export type HttpResponseLike = {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
};

export type FetchLike = (
  url: string,
  init: { method: string; headers?: Record<string, string>; body?: string; signal?: AbortSignal }
) => Promise<HttpResponseLike>;

export const MODERATION_TOKEN_URL = "https://aip.baidubce.com/oauth/2.0/token";
export const MODERATION_CENSOR_URL = "https://aip.baidubce.com/rest/2.0/solution/v1/text_censor/v2/user_defined";
const DEFAULT_TOKEN_LIFETIME_SECONDS = 2_592_000;
const DEFAULT_TIMEOUT_MS = 30_000;
// Invalid / expired access token codes reported in the payload body.
const TOKEN_ERROR_CODES = new Set([110, 111]);

export type TextModerationOptions = {
  apiKey: string;
  secretKey: string;
  tokenMarginSeconds?: number;
  /** Per request, covering both the response and its body. */
  timeoutMs?: number;
  fetch?: FetchLike;
  now?: () => number;
  tokenUrl?: string;
  censorUrl?: string;
  logger?: Logger;
};

/** Text censor client with a cached OAuth client-credentials bearer token. */
export class TextModerationClient implements ModerationOracle {
  private token: { value: string; expiresAtMs: number } | null = null;
  private readonly fetchImpl: FetchLike;
  private readonly now: () => number;
  private readonly marginMs: number;
  private readonly timeoutMs: number;

  constructor(private readonly opts: TextModerationOptions) {
    this.fetchImpl = opts.fetch ?? ((url, init) => fetch(url, init));
    this.now = opts.now ?? Date.now;
    this.marginMs = (opts.tokenMarginSeconds ?? 60) * 1000;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /** Aborts the request after `timeoutMs` and rejects even when the transport ignores the signal. */
  private async postJson(url: string, label: string, init: { headers?: Record<string, string>; body?: string } = {}): Promise<unknown> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new Error(`${label} timed out after ${this.timeoutMs}ms`));
        controller.abort();
      }, this.timeoutMs);
    });
    try {
      const res = await Promise.race([this.fetchImpl(url, { method: "POST", ...init, signal: controller.signal }), timedOut]);
      if (!res.ok) throw new Error(`${label} HTTP ${res.status}`);
      return await Promise.race([res.json(), timedOut]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async accessToken(): Promise<string> {
    if (this.token && this.now() < this.token.expiresAtMs - this.marginMs) return this.token.value;

    const params = new URLSearchParams({
      grant_type: "client_credentials",
      client_id: this.opts.apiKey,
      client_secret: this.opts.secretKey
    });
    const data = await this.postJson(`${this.opts.tokenUrl ?? MODERATION_TOKEN_URL}?${params.toString()}`, "token endpoint");
    if (!isPlainObject(data) || typeof data.access_token !== "string") {
      throw new Error(`token endpoint returned no access_token: ${JSON.stringify(data)}`);
    }
    const expiresIn = typeof data.expires_in === "number" ? data.expires_in : DEFAULT_TOKEN_LIFETIME_SECONDS;
    this.token = { value: data.access_token, expiresAtMs: this.now() + expiresIn * 1000 };
    this.opts.logger?.debug("moderation token refreshed", { expires_in: expiresIn });
    return this.token.value;
  }

  private async censorOnce(text: string): Promise<unknown> {
    const token = await this.accessToken();
    const url = `${this.opts.censorUrl ?? MODERATION_CENSOR_URL}?access_token=${encodeURIComponent(token)}`;
    return this.postJson(url, "censor endpoint", {
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
      body: new URLSearchParams({ text }).toString()
    });
  }

  async moderate(text: string): Promise<ModerationVerdict> {
    try {
      let raw = await this.censorOnce(text);
      if (isPlainObject(raw) && TOKEN_ERROR_CODES.has(asInt(raw.error_code) ?? -1)) {
        this.token = null;
        raw = await this.censorOnce(text);
      }
      return parseModerationResponse(raw);
    } catch (err: unknown) {
      const message = `文本审核请求失败: ${errorMessage(err)}`;
      this.opts.logger?.warn(message);
      return { kind: "service_error", message };
    }
  }
}
