import { describe, expect, it } from "vitest";
import {
  EmptyVocabularyError, FIXTURE_MINIMAL, UnknownLearningTargetError
} from "@phrasedrill/shared-types";
import { buildLexicalIndex, parseDrillFile, resolveLearningTargets, toDrillDefinition } from "@phrasedrill/lexicon";
import { advance, finishSentence, generateSentence, initialState, openingPart } from "../sentence.js";
import type { GenerationState } from "../sentence.js";
import type { SelectionContext } from "../selection.js";
import { seededRandom } from "../random.js";
import { scriptedRandom } from "./scripted-random.js";

const minimal = toDrillDefinition(FIXTURE_MINIMAL).vocabulary;

const LOVE = { forms: { infinitive: "любить", conjugations: [
  { singular: "люблю", plural: "любим" },
  { singular: "любишь", plural: "любите" },
  { singular: "любит", plural: "любят" },
] } };
const WANT = { expectInfinitive: true, forms: { infinitive: "хотеть", conjugations: [
  { singular: "хочу", plural: "хотим" },
  { singular: "хочешь", plural: "хотите" },
  { singular: "хочет", plural: "хотят" },
] } };

const chain = parseDrillFile({ words: { questionWords: [{ text: "Что" }], verbs: [LOVE, WANT] } }).vocabulary;

describe("openingPart", () => {
  it("forces a question when a question word is targeted", () => {
    const ctx: SelectionContext = {
      vocabulary: minimal,
      targets: resolveLearningTargets(["что"], buildLexicalIndex(minimal)),
      rng: scriptedRandom(),
    };
    expect(openingPart(ctx)).toEqual({ kind: "question" });
  });

  it("flips a coin otherwise", () => {
    expect(openingPart({ vocabulary: minimal, targets: [], rng: scriptedRandom(0.3) })).toEqual({ kind: "question" });
    expect(openingPart({ vocabulary: minimal, targets: [], rng: scriptedRandom(0.8) })).toEqual({ kind: "pronoun" });
  });
});

describe("advance", () => {
  it("walks pronoun to verb, threading the pronoun's form", () => {
    const ctx: SelectionContext = { vocabulary: minimal, targets: [], rng: scriptedRandom(0.9, 0.6, 0) };
    let state = initialState(ctx);
    expect(state).toEqual({ parts: [], next: { kind: "pronoun" } });

    state = advance(state, ctx);
    expect(state.parts.map(p => p.text)).toEqual(["мы"]);
    expect(state.next).toEqual({ kind: "verb", form: { person: "first", number: "plural" } });

    state = advance(state, ctx);
    expect(state.parts.map(p => p.text)).toEqual(["мы", "любим"]);
    expect(state.next).toEqual({ kind: "done" });
  });

  it("leaves a finished state untouched", () => {
    const done: GenerationState = { parts: [], next: { kind: "done" } };
    expect(advance(done, { vocabulary: minimal, targets: [], rng: scriptedRandom() })).toBe(done);
  });

  it("does not mutate the previous state", () => {
    const ctx: SelectionContext = { vocabulary: minimal, targets: [], rng: scriptedRandom(0.9, 0) };
    const start = initialState(ctx);
    advance(start, ctx);
    expect(start.parts).toEqual([]);
  });
});

describe("generateSentence", () => {
  it("builds a pronoun-led sentence", () => {
    const sentence = generateSentence(minimal, ["я"], { rng: scriptedRandom(0.9, 0, 0) });
    expect(sentence.text).toBe("Я люблю");
    expect(sentence.tokens).toEqual(["Я", "люблю"]);
    expect(sentence.parts.map(p => p.role)).toEqual(["pronoun", "verb"]);
  });

  it("agrees the verb with a plural pronoun", () => {
    expect(generateSentence(minimal, ["они"], { rng: scriptedRandom(0.9, 0, 0) }).text).toBe("Они любят");
  });

  it("starts with a question word when one is targeted, for any draw", () => {
    for (const seed of ["a", "b", "c", "d"]) {
      expect(generateSentence(minimal, ["что", "я"], { rng: seededRandom(seed) }).text).toBe("Что я люблю");
    }
  });

  it("starts with a question word when the coin says so", () => {
    const sentence = generateSentence(minimal, [], { rng: scriptedRandom(0.1, 0, 0.99, 0) });
    expect(sentence.tokens).toEqual(["Что", "они", "любят"]);
    expect(sentence.parts[0]).toMatchObject({ role: "question", form: null, text: "что" });
  });

  it("completes an infinitive chain", () => {
    const sentence = generateSentence(chain, ["я", "хотеть"], { rng: scriptedRandom(0.9, 0, 0, 0) });
    expect(sentence.text).toBe("Я хочу любить");
    expect(sentence.parts.map(p => p.role)).toEqual(["pronoun", "verb", "infinitive"]);
    expect(sentence.parts[2]?.form).toEqual({ person: "infinitive" });
  });

  it("accepts targets in any case", () => {
    expect(generateSentence(chain, ["Я", "ХОТЕТЬ"], { rng: scriptedRandom(0.9, 0, 0, 0) }).text).toBe("Я хочу любить");
  });

  it("rejects an unknown target before drawing", () => {
    expect(() => generateSentence(minimal, ["бежать"], { rng: scriptedRandom() })).toThrow(UnknownLearningTargetError);
  });

  it("fails when a governing verb has nothing to chain to", () => {
    const onlyWant = parseDrillFile({ words: { questionWords: [{ text: "Что" }], verbs: [WANT] } }).vocabulary;
    expect(() => generateSentence(onlyWant, [], { rng: scriptedRandom(0.9, 0, 0) }))
      .toThrow("No non-infinitive-governing verb available to choose from.");
  });

  it("fails when a question is requested from an empty pool", () => {
    const noQuestions = parseDrillFile({ words: { verbs: [LOVE] } }).vocabulary;
    expect(() => generateSentence(noQuestions, [], { rng: scriptedRandom(0.1) })).toThrow(EmptyVocabularyError);
  });

  it("fails when there are no pronouns at all", () => {
    const noPronouns = { ...minimal, pronouns: [] };
    expect(() => generateSentence(noPronouns, [], { rng: scriptedRandom(0.9) })).toThrow(EmptyVocabularyError);
    expect(() => generateSentence(noPronouns, [], { rng: scriptedRandom(0.1, 0) }))
      .toThrow("No pronoun available to choose from.");
  });

  it("never produces more than four parts", () => {
    const rng = seededRandom("length");
    for (let i = 0; i < 50; i++) {
      const length = generateSentence(chain, [], { rng }).parts.length;
      expect(length).toBeGreaterThanOrEqual(2);
      expect(length).toBeLessThanOrEqual(4);
    }
  });
});

describe("finishSentence", () => {
  it("capitalizes only the first token", () => {
    const sentence = generateSentence(minimal, ["что", "я"], { rng: scriptedRandom(0, 0, 0) });
    const finished = finishSentence(sentence.parts);
    expect(finished.tokens).toEqual(["Что", "я", "люблю"]);
    expect(finishSentence([]).text).toBe("");
  });
});
