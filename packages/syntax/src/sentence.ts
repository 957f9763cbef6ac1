/**
 * Sentence state machine.
 *
 *   start ──(question target or coin)──▶ question ──▶ pronoun
 *   start ─────────────────────────────────────────▶ pronoun
 *   pronoun ──▶ verb(person, number)
 *   verb(finite) ──(verb governs an infinitive)──▶ verb(infinitive) ──▶ done
 *   verb(finite) ──▶ done
 *
 * At most four parts are produced. Agreement is threaded through the
 * state: the pronoun's form is carried into the finite verb.
 */
import type {
  GrammaticalForm, LearningTargets, Vocabulary, Word
} from "@phrasedrill/shared-types";
import { buildLexicalIndex, resolveLearningTargets, wordText } from "@phrasedrill/lexicon";
import type { LexicalIndex } from "@phrasedrill/lexicon";
import { INFINITIVE, isInfinitive, pronounForm, renderVerb } from "@phrasedrill/morphology";
import { coinFlip, systemRandom } from "./random.js";
import type { RandomSource } from "./random.js";
import { pickByType, pickNonInfinitiveGoverningVerb, pickVerb } from "./selection.js";
import type { SelectionContext } from "./selection.js";

/** What the sentence needs next */
export type NextPart =
  | { kind: "question" }
  | { kind: "pronoun" }
  | { kind: "verb"; form: GrammaticalForm }
  | { kind: "done" };

export type SentenceRole = "question" | "pronoun" | "verb" | "infinitive";

export interface SentencePart {
  role: SentenceRole;
  word: Word;
  /** Form the word was rendered in; null for question words */
  form: GrammaticalForm | null;
  /** Lower-cased surface text */
  text: string;
}

export interface GenerationState {
  parts: SentencePart[];
  next: NextPart;
}

export interface GeneratedSentence {
  /** Space-joined, first letter capitalized, no terminal punctuation */
  text: string;
  tokens: string[];
  parts: SentencePart[];
}

export interface GenerateSentenceOptions {
  rng?: RandomSource;
  /** Reuse an index built for the same vocabulary */
  index?: LexicalIndex;
}

const DONE: NextPart = { kind: "done" };

// ─── Transitions ──────────────────────────────────────────────────────────────

/**
 * Choose the opening part. A question target forces a question-led
 * sentence; otherwise a coin flip decides.
 */
export function openingPart(ctx: SelectionContext): NextPart {
  const questionTargeted = ctx.targets.some(w => w.type === "question");
  return questionTargeted || coinFlip(ctx.rng) ? { kind: "question" } : { kind: "pronoun" };
}

export function initialState(ctx: SelectionContext): GenerationState {
  return { parts: [], next: openingPart(ctx) };
}

/** Produce the next part. A finished state is returned unchanged. */
export function advance(state: GenerationState, ctx: SelectionContext): GenerationState {
  const next = state.next;
  switch (next.kind) {
    case "question": {
      const word = pickByType(ctx, "question");
      return append(state, { role: "question", word, form: null, text: wordText(word) }, { kind: "pronoun" });
    }
    case "pronoun": {
      const word = pickByType(ctx, "pronoun");
      const form = pronounForm(word);
      return append(state, { role: "pronoun", word, form, text: wordText(word) }, { kind: "verb", form });
    }
    case "verb": {
      if (isInfinitive(next.form)) {
        const word = pickNonInfinitiveGoverningVerb(ctx);
        return append(state, { role: "infinitive", word, form: next.form, text: renderVerb(word, next.form) }, DONE);
      }
      const word = pickVerb(ctx);
      const text = renderVerb(word, next.form);
      return append(
        state,
        { role: "verb", word, form: next.form, text },
        word.expectsInfinitive ? { kind: "verb", form: INFINITIVE } : DONE
      );
    }
    case "done":
      return state;
  }
}

function append(state: GenerationState, part: SentencePart, next: NextPart): GenerationState {
  return { parts: [...state.parts, part], next };
}

// ─── Generation ───────────────────────────────────────────────────────────────

/**
 * Generate one sentence biased toward the learning targets.
 *
 * Throws UnknownLearningTargetError when a target is not in the vocabulary,
 * EmptyVocabularyError when a step has no candidates, and
 * MalformedConjugationTableError when a verb lacks the needed row.
 */
export function generateSentence(
  vocabulary: Vocabulary,
  learningTargets: LearningTargets,
  options: GenerateSentenceOptions = {}
): GeneratedSentence {
  const index = options.index ?? buildLexicalIndex(vocabulary);
  const ctx: SelectionContext = {
    vocabulary,
    targets: resolveLearningTargets(learningTargets, index),
    rng: options.rng ?? systemRandom,
  };

  let state = initialState(ctx);
  while (state.next.kind !== "done") state = advance(state, ctx);
  return finishSentence(state.parts);
}

export function finishSentence(parts: SentencePart[]): GeneratedSentence {
  const tokens = parts.map((p, i) => (i === 0 ? capitalize(p.text) : p.text));
  return { text: tokens.join(" "), tokens, parts };
}

function capitalize(token: string): string {
  return token.charAt(0).toUpperCase() + token.slice(1);
}
