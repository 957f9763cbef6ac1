/**
 * Drill file → vocabulary conversion.
 */
import type { ZodIssue } from "zod";
import type {
  DrillDefinition, DrillFile, PronounWord, QuestionWord, Vocabulary, VerbWord
} from "@phrasedrill/shared-types";
import { DrillConfigError, DrillFileSchema, PRONOUN_NAMES } from "@phrasedrill/shared-types";

/** The fixed pronoun set, in table order. */
export function fixedPronouns(): PronounWord[] {
  return PRONOUN_NAMES.map((pronounName): PronounWord => ({ type: "pronoun", pronounName }));
}

/** Build a vocabulary from the file's word lists plus the fixed pronouns. */
export function createVocabulary(words: DrillFile["words"]): Vocabulary {
  const questionWords: QuestionWord[] = words.questionWords.map((q): QuestionWord => ({ type: "question", text: q.text }));
  const verbs: VerbWord[] = words.verbs.map((v): VerbWord => ({
    type: "verb",
    forms: {
      infinitive: v.forms.infinitive,
      conjugations: v.forms.conjugations.map(c => ({ singular: c.singular, plural: c.plural })),
    },
    expectsInfinitive: v.expectInfinitive,
    questions: [...v.questions],
  }));
  return { questionWords, pronouns: fixedPronouns(), verbs };
}

export function normalizeLearningTargets(words: readonly string[]): string[] {
  return words.map(w => w.trim().toLowerCase()).filter(w => w.length > 0);
}

export function toDrillDefinition(file: DrillFile): DrillDefinition {
  return {
    vocabulary: createVocabulary(file.words),
    learningTargets: normalizeLearningTargets(file.learn.words),
  };
}

/**
 * Parse an untrusted JSON value as a drill file.
 * Throws DrillConfigError listing every schema issue.
 */
export function parseDrillFile(raw: unknown): DrillDefinition {
  const parsed = DrillFileSchema.safeParse(raw);
  if (!parsed.success) throw new DrillConfigError(parsed.error.issues.map(formatIssue));
  return toDrillDefinition(parsed.data);
}

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${path}: ${issue.message}`;
}
