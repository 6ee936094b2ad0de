import assert from "node:assert/strict";
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import test from "node:test";

import { runConsistencyStage } from "../consistency.js";
import { FactStore } from "../fact-store.js";
import { pathExists } from "../fs-utils.js";
import { createMemoryLogger, createSilentLogger } from "../logger.js";
import { ScriptedOracle, makeTempRoot } from "./helpers/fakes.js";

const DRAFT = "林晚站在门口，一米九的身影挡住了走廊的灯光。";
const REPAIRED = "林晚站在门口，一米八八的身影挡住了走廊的灯光。";

function seededStore(): FactStore {
  return new FactStore({ characters: { 林晚: { 身高: "188cm" } }, events: ["雨夜离别"] });
}

test("zero conflicts merge the extraction without any repair call", async () => {
  const rootDir = await makeTempRoot("consistency-clean");
  const store = new FactStore();
  const oracle = new ScriptedOracle({
    facts: ['{"characters": {"林晚": {"身高": "188cm"}}, "events": ["雨夜离别"], "states": {"林晚": {"location": "机场"}}}']
  });

  const outcome = await runConsistencyStage({ rootDir, chapter: 1, text: DRAFT, store, oracle, logger: createSilentLogger() });

  assert.deepEqual(outcome, { text: DRAFT, status: "clean", conflicts: [], residual: [] });
  assert.equal(oracle.calls("consistency_repair").length, 0);
  assert.equal(oracle.calls("facts").length, 1);
  assert.deepEqual(store.ledger, { characters: { 林晚: { 身高: "188cm" } }, events: ["雨夜离别"] });
  assert.equal(store.characters.get("林晚")?.location, "机场");

  const log: unknown = JSON.parse(await readFile(join(rootDir, "logs/facts-chapter-001.json"), "utf8"));
  assert.deepEqual(log, {
    extracted: {
      characters: { 林晚: { 身高: "188cm" } },
      events: ["雨夜离别"],
      states: { 林晚: { location: "机场" } },
      interactions: []
    },
    conflicts: []
  });
  assert.equal(await pathExists(join(rootDir, "logs/facts-chapter-001-fixed.json")), false);
});

test("a conflict triggers exactly one repair and the repaired extraction is merged", async () => {
  const rootDir = await makeTempRoot("consistency-repaired");
  const store = seededStore();
  const oracle = new ScriptedOracle({
    facts: [
      '{"characters": {"林晚": {"身高": "190cm"}}, "events": ["重逢"]}',
      '{"characters": {"林晚": {"身高": "188cm", "职业": "设计师"}}, "events": ["重逢"]}'
    ],
    consistency_repair: [REPAIRED]
  });

  const outcome = await runConsistencyStage({ rootDir, chapter: 2, text: DRAFT, store, oracle, model: "m", logger: createSilentLogger() });

  assert.equal(outcome.status, "repaired");
  assert.equal(outcome.text, REPAIRED);
  assert.deepEqual(outcome.conflicts, [{ character: "林晚", attribute: "身高", old_value: "188cm", new_value: "190cm" }]);
  assert.deepEqual(outcome.residual, []);

  const repairs = oracle.calls("consistency_repair");
  assert.equal(repairs.length, 1);
  assert.ok(repairs[0]?.user_prompt.includes("人物[林晚] 字段[身高] 不一致: 旧=188cm 新=190cm"));
  assert.ok(repairs[0]?.user_prompt.endsWith(DRAFT));
  assert.equal(oracle.calls("facts")[1]?.user_prompt.endsWith(REPAIRED), true);

  assert.deepEqual(store.ledger, { characters: { 林晚: { 身高: "188cm", 职业: "设计师" } }, events: ["雨夜离别", "重逢"] });
  assert.equal(await pathExists(join(rootDir, "logs/facts-chapter-002-fixed.json")), true);
});

test("residual conflicts keep the ledger but still advance character state", async () => {
  const rootDir = await makeTempRoot("consistency-residual");
  const store = seededStore();
  const { logger, entries } = createMemoryLogger("warn");
  const oracle = new ScriptedOracle({
    facts: [
      '{"characters": {"林晚": {"身高": "190cm"}}, "events": []}',
      '{"characters": {"林晚": {"身高": "190cm"}}, "events": ["新事件"], "states": {"林晚": {"emotional_state": "忐忑"}}}'
    ],
    consistency_repair: [REPAIRED]
  });

  const outcome = await runConsistencyStage({ rootDir, chapter: 3, text: DRAFT, store, oracle, logger });

  assert.equal(outcome.status, "residual");
  assert.equal(outcome.text, REPAIRED);
  assert.equal(outcome.residual.length, 1);
  assert.equal(oracle.calls("consistency_repair").length, 1);
  assert.deepEqual(store.ledger, { characters: { 林晚: { 身高: "188cm" } }, events: ["雨夜离别"] });
  assert.equal(store.characters.get("林晚")?.emotional_state, "忐忑");
  assert.deepEqual(
    entries.map((e) => e.message),
    ["chapter 3: 1 conflict(s) remain after repair; ledger left unchanged"]
  );

  const fixed: unknown = JSON.parse(await readFile(join(rootDir, "logs/facts-chapter-003-fixed.json"), "utf8"));
  assert.deepEqual(fixed, {
    extracted: {
      characters: { 林晚: { 身高: "190cm" } },
      events: ["新事件"],
      states: { 林晚: { emotional_state: "忐忑" } },
      interactions: []
    },
    conflicts: ["人物[林晚] 字段[身高] 不一致: 旧=188cm 新=190cm"]
  });
});

test("a flagged repair keeps the draft text", async () => {
  const rootDir = await makeTempRoot("consistency-flagged");
  const store = seededStore();
  const oracle = new ScriptedOracle({
    facts: ['{"characters": {"林晚": {"身高": "190cm"}}, "events": []}', '{"characters": {}, "events": []}'],
    consistency_repair: [{ flagged: true }]
  });

  const outcome = await runConsistencyStage({ rootDir, chapter: 4, text: DRAFT, store, oracle, logger: createSilentLogger() });

  assert.equal(outcome.text, DRAFT);
  assert.equal(outcome.status, "repaired");
  assert.equal(oracle.calls("facts")[1]?.user_prompt.endsWith(DRAFT), true);
});
