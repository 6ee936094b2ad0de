import { arcFor, narrativeGoalFor, type StoryBlueprint } from "./blueprint.js";
import { formatConflict, type ConflictRecord, type FactLedger } from "./fact-ledger.js";
import type { ContextEntry } from "./rolling-context.js";

export type PromptPair = {
  system_prompt: string;
  user_prompt: string;
};

const LEDGER_EVENTS_IN_PROMPT = 12;
const TITLE_EXCERPT_CHARS = 1500;

function bulletList(lines: string[]): string {
  return lines.map((l) => `- ${l}`).join("\n");
}

function renderContext(window: ContextEntry[]): string {
  if (window.length === 0) return "前情提要：故事开始。";
  const blocks = window.map((entry) => `第${entry.chapter}章：\n${bulletList(entry.lines)}`);
  return `【近期剧情脉络】\n${blocks.join("\n")}`;
}

export function renderLedgerBrief(ledger: FactLedger): string[] {
  const lines: string[] = [];
  for (const [name, attrs] of Object.entries(ledger.characters)) {
    const pairs = Object.entries(attrs).map(([k, v]) => `${k}=${v}`);
    if (pairs.length > 0) lines.push(`- ${name}: ${pairs.join("; ")}`);
  }
  return lines;
}

export function buildChapterPrompt(args: {
  chapter: number;
  blueprint: StoryBlueprint;
  window: ContextEntry[];
  ledger: FactLedger;
  characterLines: string[];
  threadLines?: string[];
}): PromptPair {
  const { chapter, blueprint } = args;
  const arc = arcFor(blueprint, chapter);
  const sections: string[] = [`请写第${chapter}章正文。`, renderContext(args.window)];

  const facts = renderLedgerBrief(args.ledger);
  if (facts.length > 0) sections.push(`【既定事实（不可违背）】\n${facts.join("\n")}`);
  const events = args.ledger.events.slice(-LEDGER_EVENTS_IN_PROMPT);
  if (events.length > 0) sections.push(`【已发生事件】\n${bulletList(events)}`);
  if (args.characterLines.length > 0) sections.push(`【人物状态】\n${args.characterLines.join("\n")}`);
  if (args.threadLines && args.threadLines.length > 0) sections.push(`【剧情线索】\n${args.threadLines.join("\n")}`);

  sections.push(
    `背景设定：${blueprint.world_setting}`,
    `当前阶段：${arc.theme}（${arc.emotion}）`,
    `本章目标：${narrativeGoalFor(blueprint, chapter)}`,
    arc.guide,
    blueprint.style_rules,
    `写作技巧：\n${blueprint.techniques.map((t, i) => `${i + 1}. ${t}`).join("\n")}`,
    blueprint.structure_rules,
    blueprint.word_count_rule
  );

  const values = blueprint.platform_values.map((v, i) => `${i + 1}. ${v}`).join("\n");
  const avoid = blueprint.avoid.map((v, i) => `${i + 1}. ${v}`).join("\n");
  return {
    system_prompt: `${blueprint.persona}\n=== 我们追求的内容 ===\n${values}\n=== 我们坚决避免的内容 ===\n${avoid}`,
    user_prompt: sections.join("\n")
  };
}

export function buildSummaryPrompt(text: string): PromptPair {
  return {
    system_prompt: "你是专业的小说编辑，擅长提炼剧情要点和情感脉络。",
    user_prompt: [
      "请将以下正文提炼为前情提要，要求：",
      "1. 重点提取情感变化和关系进展",
      "2. 记录关键事件和转折点",
      "3. 每条二十至三十字",
      "4. 共八至十二条",
      "5. 使用换行分条，不写编号与多余符号",
      "",
      "【正文】",
      text
    ].join("\n")
  };
}

export function buildFactExtractionPrompt(text: string): PromptPair {
  return {
    system_prompt: "你是严谨的小说事实抽取器，只输出JSON。",
    user_prompt: [
      "请从以下正文抽取稳定事实，输出一个JSON对象，键为 characters、events、states、interactions、threads：",
      "characters: {姓名: {属性名: 属性值}}，只记录外貌、年龄、职业、身份等不会随章节改变的设定；",
      "events: 字符串数组，每项二十字以内的关键事件或设定；",
      "states: {姓名: {emotional_state, physical_state, location, current_goal, knowledge: [已知信息], relationships_status: {他人: 关系现状}}}，只写本章结束时的状态；",
      "interactions: [{characters: [甲, 乙], type: 互动类型, details: 一句话说明}]；",
      "threads: [{name: 线索名, description: 一句话说明, status: 进行中/已解决/搁置, event: 本章推进该线索的事件, characters: [相关人物]}]，只写本章有变化的剧情线索。",
      "不要输出任何解释。",
      "正文：",
      text
    ].join("\n")
  };
}

export function buildConsistencyRepairPrompt(args: { ledger: FactLedger; conflicts: ConflictRecord[]; text: string }): PromptPair {
  return {
    system_prompt: "你是小说一致性编辑，只输出修订后正文。",
    user_prompt: [
      "【既有事实库】",
      JSON.stringify(args.ledger),
      "",
      "【检测到的冲突】",
      args.conflicts.map(formatConflict).join("\n"),
      "",
      "请在严格不改变故事关键事件顺序与情感走向的前提下，对正文进行最小幅度修订，确保与事实库一致。",
      "不要扩写或删减段落，不要增加或删除情节，仅在冲突处做替换。只输出修订后的正文。",
      "",
      "【待修订正文】",
      args.text
    ].join("\n")
  };
}

/**
 * Rewrite instruction for a rejected draft. `hitWords` scopes the edit; when the verdict carried
 * none, `issues` (rendered violation lines) stand in for them.
 */
export function buildComplianceRepairPrompt(args: { text: string; hitWords: string[]; issues: string[] }): PromptPair {
  const problem =
    args.hitWords.length > 0
      ? `审核命中的词汇：${args.hitWords.join("、")}\n只改写包含上述词汇的句子，其余句子保持原样。`
      : `审核发现的问题：\n${args.issues.join("\n")}\n只改写与上述问题相关的句子，其余句子保持原样。`;
  return {
    system_prompt: "你是一位专业的文本编辑，擅长在保持原意的前提下，将内容修改得更加符合平台规范。",
    user_prompt: [
      "请根据以下审核反馈，对小说文本进行最小化修改，使其符合内容规范。",
      "",
      problem,
      "",
      "修改要求：",
      "1. 尽量使用委婉、隐喻的表达替代直接描述",
      "2. 保持原文的叙事风格、情节发展和人物关系",
      "3. 不要添加新的情节或删除重要内容",
      "4. 只输出修改后的小说正文，不要输出任何说明",
      "",
      "原文：",
      args.text
    ].join("\n")
  };
}

export function buildTitlePrompt(text: string): PromptPair {
  return {
    system_prompt: "你是一位资深的小说编辑，擅长为章节起标题。",
    user_prompt: [
      "请为以下小说章节生成一个精炼的标题。",
      "",
      "要求：",
      "1. 标题要体现本章的核心事件或转折",
      "2. 使用2-4个字的词语",
      "3. 只输出标题本身，不要加“第X章”，不要加任何标点符号",
      "4. 不要输出任何解释或说明",
      "",
      "章节内容：",
      `${text.slice(0, TITLE_EXCERPT_CHARS)}...`
    ].join("\n")
  };
}
