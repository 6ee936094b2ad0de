import assert from "node:assert/strict";
import test from "node:test";

import { parseFactDelta } from "../fact-ledger.js";
import { FactStore } from "../fact-store.js";
import { PlotBook, parsePlotThread, parseThreadUpdate } from "../plot-threads.js";

test("thread updates create, advance and resolve threads by name", () => {
  const book = PlotBook.seeded([{ name: "主线", description: "离婚后的追妻" }]);
  book.apply([
    { name: "秘密", description: "林晚隐瞒病情", event: "体检报告", characters: ["林晚"] },
    { name: "主线", event: "雨夜离别" }
  ]);
  book.apply([
    { name: "秘密", event: "医院偶遇", characters: ["顾言", "林晚"] },
    { name: "主线", event: "车站重逢" }
  ]);

  assert.deepEqual(book.toJSON(), [
    { name: "主线", description: "离婚后的追妻", status: "进行中", key_events: ["雨夜离别", "车站重逢"], related_characters: [] },
    { name: "秘密", description: "林晚隐瞒病情", status: "进行中", key_events: ["体检报告", "医院偶遇"], related_characters: ["林晚", "顾言"] }
  ]);
  assert.deepEqual(book.briefLines(), [
    "【主线】（进行中）：离婚后的追妻",
    "  关键事件：雨夜离别→车站重逢",
    "【秘密】（进行中）：林晚隐瞒病情",
    "  关键事件：体检报告→医院偶遇"
  ]);
});

test("only the last three key events are kept and a repeated event is not appended", () => {
  const book = new PlotBook();
  for (const event of ["一", "二", "二", "三", "四"]) book.apply([{ name: "线", event }]);
  assert.deepEqual(book.toJSON()[0]?.key_events, ["二", "三", "四"]);
  assert.deepEqual(book.briefLines(), ["【线】（进行中）", "  关键事件：二→三→四"]);
});

test("resolved threads leave the prompt while shelved ones stay", () => {
  const book = PlotBook.seeded([
    { name: "主线", description: "追妻" },
    { name: "支线", description: "公司危机" }
  ]);
  book.apply([
    { name: "主线", status: "已解决" },
    { name: "支线", status: "搁置" }
  ]);
  assert.deepEqual(book.briefLines(), ["【支线】（搁置）：公司危机"]);
  assert.equal(book.toJSON().length, 2);
  assert.deepEqual(PlotBook.restore(book.toJSON()).briefLines(), book.briefLines());
});

test("thread updates are read leniently and stored threads strictly", () => {
  assert.deepEqual(parseThreadUpdate({ name: " 秘密 ", status: "完结", event: "", characters: ["林晚", "林晚", 3] }), {
    name: "秘密",
    characters: ["林晚", "3"]
  });
  assert.equal(parseThreadUpdate({ status: "进行中" }), null);
  assert.equal(parsePlotThread({ name: "秘密", description: "x", status: "完结", key_events: [], related_characters: [] }), null);
  assert.equal(parsePlotThread({ name: "秘密", description: "x", status: "搁置", key_events: [] }), null);
});

test("extracted thread changes reach the store even when the ledger merge is skipped", () => {
  const delta = parseFactDelta({ events: ["重逢"], threads: [{ name: "秘密", status: "已解决" }, { description: "无名" }, "bad"] });
  assert.deepEqual(delta.threads, [{ name: "秘密", status: "已解决" }]);
  assert.equal(parseFactDelta({ events: [], threads: [] }).threads, undefined);

  const store = new FactStore(undefined, undefined, PlotBook.seeded([{ name: "秘密", description: "林晚隐瞒病情" }]));
  store.applyChapterState(4, delta);
  assert.deepEqual(store.threads.briefLines(), []);
  assert.deepEqual(store.ledger, { characters: {}, events: [] });
});
