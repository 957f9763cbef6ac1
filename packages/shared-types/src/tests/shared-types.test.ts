import { describe, expect, it } from "vitest";
import {
  DrillConfigError, DrillFileSchema, EmptyVocabularyError, MalformedConjugationTableError,
  PRONOUN_NAMES, PRONOUN_TEXT, PhrasedrillError, UnknownLearningTargetError
} from "../index.js";

describe("errors", () => {
  it("carry a code and an HTTP status", () => {
    const cases: [PhrasedrillError, string, number][] = [
      [new UnknownLearningTargetError("бежать"), "UNKNOWN_LEARNING_TARGET", 422],
      [new EmptyVocabularyError("pronoun"), "EMPTY_VOCABULARY", 422],
      [new MalformedConjugationTableError("идти", 2), "MALFORMED_CONJUGATION_TABLE", 422],
      [new DrillConfigError(["words: Required"]), "INVALID_DRILL_CONFIG", 400],
    ];
    for (const [error, code, statusCode] of cases) {
      expect(error).toBeInstanceOf(PhrasedrillError);
      expect(error.code).toBe(code);
      expect(error.statusCode).toBe(statusCode);
    }
  });

  it("name the offending input", () => {
    expect(new UnknownLearningTargetError("бежать").target).toBe("бежать");
    expect(new EmptyVocabularyError("question").message).toBe("No question available to choose from.");
    expect(new DrillConfigError(["a: x", "b: y"]).message).toBe("Invalid drill file: a: x; b: y");
  });
});

describe("pronouns", () => {
  it("have a surface text for every name", () => {
    expect(PRONOUN_NAMES.map(name => PRONOUN_TEXT[name])).toEqual(["Я", "Ты", "Он", "Она", "Мы", "Вы", "Они"]);
  });
});

describe("DrillFileSchema", () => {
  it("fills in defaults", () => {
    const parsed = DrillFileSchema.parse({
      words: { verbs: [{ forms: { infinitive: "жить", conjugations: [] } }] },
    });
    expect(parsed).toEqual({
      words: {
        questionWords: [],
        verbs: [{ forms: { infinitive: "жить", conjugations: [] }, expectInfinitive: false, questions: [] }],
      },
      learn: { words: [] },
    });
  });

  it("rejects an unknown verb question", () => {
    const result = DrillFileSchema.safeParse({
      words: { verbs: [{ forms: { infinitive: "жить", conjugations: [] }, questions: ["WhereTo"] }] },
    });
    expect(result.success).toBe(false);
  });
});
