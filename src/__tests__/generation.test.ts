import assert from "node:assert/strict";
import test from "node:test";

import { APIError } from "openai";

import { AuthError, OracleError, OracleExhaustedError, RateLimitedError, TransientHttpError } from "../errors.js";
import {
  ChatCompletionsOracle,
  DryRunOracle,
  classifyGenerationError,
  createGenerationOracle,
  normalizeGenerationPayload,
  type ChatRequestBody
} from "../oracle/generation.js";
import { UsageMeter } from "../oracle/usage.js";

const SAMPLING = { temperature: 0.75, top_p: 0.85, max_output_tokens: 4600 };

test("normalizeGenerationPayload reads the chat-completions shape with usage", () => {
  const res = normalizeGenerationPayload({
    choices: [{ message: { role: "assistant", content: "夜雨落在长街上。" }, finish_reason: "stop" }],
    usage: { prompt_tokens: 120, completion_tokens: 30 }
  });
  assert.deepEqual(res, {
    text: "夜雨落在长街上。",
    finish_reason: "stop",
    usage: { input_tokens: 120, output_tokens: 30 },
    flagged: false
  });
});

test("normalizeGenerationPayload accepts result/output/choices[].content shapes", () => {
  assert.equal(normalizeGenerationPayload({ result: "甲" }).text, "甲");
  assert.equal(normalizeGenerationPayload({ output: "乙" }).text, "乙");
  assert.equal(normalizeGenerationPayload({ choices: [{ content: "丙" }] }).text, "丙");
  assert.deepEqual(normalizeGenerationPayload({ result: "甲" }, 42).usage, { input_tokens: 42, output_tokens: 0 });
});

test("normalizeGenerationPayload returns content-filtered output as flagged data", () => {
  const filtered = normalizeGenerationPayload({ choices: [{ message: { content: "" }, finish_reason: "content_filter" }] });
  assert.equal(filtered.flagged, true);
  assert.equal(filtered.text, "");

  const security = normalizeGenerationPayload({ error_code: 336003, error_msg: "content security check failed" });
  assert.equal(security.flagged, true);
  assert.equal(security.finish_reason, "content_filter");
});

test("normalizeGenerationPayload raises classified errors for error payloads", () => {
  assert.throws(() => normalizeGenerationPayload({ error_code: 18, error_msg: "Open api qps request limit reached" }), RateLimitedError);
  assert.throws(() => normalizeGenerationPayload({ error_code: 111, error_msg: "Access token expired" }), TransientHttpError);
  assert.throws(
    () => normalizeGenerationPayload({ error_code: 6, error_msg: "No permission" }),
    (err: unknown) => err instanceof OracleError && !err.retryable
  );
  assert.throws(() => normalizeGenerationPayload("plain text"), OracleError);
  assert.throws(() => normalizeGenerationPayload({ choices: [] }), OracleError);
});

test("classifyGenerationError maps HTTP statuses onto the error taxonomy", () => {
  const auth = classifyGenerationError(new APIError(401, undefined, "unauthorized", undefined));
  assert.ok(auth instanceof AuthError);
  assert.equal(auth.exitCode, 3);

  assert.ok(classifyGenerationError(new APIError(429, undefined, "slow down", undefined)) instanceof RateLimitedError);
  assert.ok(classifyGenerationError(new APIError(503, undefined, "unavailable", undefined)) instanceof TransientHttpError);

  const badRequest = classifyGenerationError(new APIError(400, undefined, "bad request", undefined));
  assert.equal(badRequest.retryable, false);
  assert.equal(badRequest.status, 400);

  assert.ok(classifyGenerationError(new Error("ETIMEDOUT")) instanceof TransientHttpError);
  const passthrough = new RateLimitedError("already classified");
  assert.equal(classifyGenerationError(passthrough), passthrough);
});

test("ChatCompletionsOracle retries transient transport errors and records usage", async () => {
  const bodies: ChatRequestBody[] = [];
  const delays: number[] = [];
  const usage = new UsageMeter();
  let calls = 0;
  const oracle = new ChatCompletionsOracle({
    model: "base-model",
    maxAttempts: 3,
    baseDelayMs: 50,
    usage,
    sleep: async (ms) => {
      delays.push(ms);
    },
    transport: async (body) => {
      bodies.push(body);
      calls += 1;
      if (calls === 1) throw new Error("Access token expired");
      return { choices: [{ message: { content: "正文" }, finish_reason: "stop" }], usage: { prompt_tokens: 10, completion_tokens: 5 } };
    }
  });

  const res = await oracle.generate({ purpose: "title", system_prompt: "s", user_prompt: "u", sampling: SAMPLING, model: "repair-model" });
  assert.equal(res.text, "正文");
  assert.deepEqual(delays, [50]);
  assert.equal(bodies.length, 2);
  assert.deepEqual(bodies[0], {
    model: "repair-model",
    system_prompt: "s",
    user_prompt: "u",
    temperature: 0.75,
    top_p: 0.85,
    max_tokens: 4600
  });
  assert.deepEqual(usage.snapshot(), {
    calls: 1,
    input_tokens: 10,
    output_tokens: 5,
    by_model: { "repair-model": { calls: 1, input_tokens: 10, output_tokens: 5 } }
  });
});

test("ChatCompletionsOracle gives up with OracleExhaustedError", async () => {
  const oracle = new ChatCompletionsOracle({
    model: "m",
    maxAttempts: 2,
    baseDelayMs: 1,
    usage: new UsageMeter(),
    sleep: async () => undefined,
    transport: async () => {
      throw new APIError(502, undefined, "bad gateway", undefined);
    }
  });
  await assert.rejects(
    oracle.generate({ purpose: "chapter", system_prompt: "s", user_prompt: "u", sampling: SAMPLING }),
    (err: unknown) => err instanceof OracleExhaustedError && err.attempts === 2
  );
});

test("createGenerationOracle refuses to start without a credential", () => {
  assert.throws(
    () => createGenerationOracle({ apiKey: null, baseUrl: "http://localhost", model: "m", timeoutMs: 1000, maxAttempts: 1, baseDelayMs: 1 }),
    (err: unknown) => err instanceof AuthError && err.exitCode === 3
  );
});

test("DryRunOracle answers every purpose without a network call", async () => {
  const oracle = new DryRunOracle();
  const chapter = await oracle.generate({ purpose: "chapter", system_prompt: "s", user_prompt: "请写第1章正文。", sampling: SAMPLING });
  assert.ok(chapter.text.startsWith("【干跑模式】"));
  assert.ok(chapter.text.endsWith("请写第1章正文。"));
  const facts = await oracle.generate({ purpose: "facts", system_prompt: "s", user_prompt: "u", sampling: SAMPLING });
  assert.deepEqual(JSON.parse(facts.text), { characters: {}, events: [], states: {}, interactions: [] });
  const title = await oracle.generate({ purpose: "title", system_prompt: "s", user_prompt: "u", sampling: SAMPLING });
  assert.equal(title.text, "干跑标题");
});
