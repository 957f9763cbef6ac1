/**
 * Fixture drill files shared by the tests of every package.
 *
 *   1. Basics: three question words, six present-tense verbs, two of
 *      which govern an infinitive
 *   2. Minimal: one question word, one verb, no infinitive chains
 */

import type { DrillFile, VerbEntry } from "./drill-file.js";

function verb(
  infinitive: string,
  rows: [[string, string], [string, string], [string, string]],
  expectInfinitive = false,
  questions: VerbEntry["questions"] = []
): VerbEntry {
  return {
    forms: {
      infinitive,
      conjugations: rows.map(([singular, plural]) => ({ singular, plural })),
    },
    expectInfinitive,
    questions,
  };
}

// ─── Fixture 1: Basics ───────────────────────────────────────────────────────

export const FIXTURE_BASICS: DrillFile = {
  words: {
    questionWords: [{ text: "Что" }, { text: "Где" }, { text: "Почему" }],
    verbs: [
      verb("любить", [["люблю", "любим"], ["любишь", "любите"], ["любит", "любят"]], false, ["Whom"]),
      verb("хотеть", [["хочу", "хотим"], ["хочешь", "хотите"], ["хочет", "хотят"]], true),
      verb("мочь", [["могу", "можем"], ["можешь", "можете"], ["может", "могут"]], true),
      verb("читать", [["читаю", "читаем"], ["читаешь", "читаете"], ["читает", "читают"]]),
      verb("говорить", [["говорю", "говорим"], ["говоришь", "говорите"], ["говорит", "говорят"]], false, ["ToWhom", "AboutWhom"]),
      verb("жить", [["живу", "живём"], ["живёшь", "живёте"], ["живёт", "живут"]], false, ["WithWhom"]),
    ],
  },
  learn: { words: ["хотеть", "читать"] },
};

// ─── Fixture 2: Minimal ──────────────────────────────────────────────────────

export const FIXTURE_MINIMAL: DrillFile = {
  words: {
    questionWords: [{ text: "Что" }],
    verbs: [
      verb("любить", [["люблю", "любим"], ["любишь", "любите"], ["любит", "любят"]]),
    ],
  },
  learn: { words: ["Я"] },
};
