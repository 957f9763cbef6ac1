/**
 * Phrasedrill vocabulary schema
 *
 * The vocabulary model every package reads. A vocabulary is built once per
 * run from a drill file and is never mutated by the generator.
 */

// ─── Word classification ─────────────────────────────────────────────────────

export type WordType = "question" | "pronoun" | "verb";

export const WORD_TYPES: readonly WordType[] = ["question", "pronoun", "verb"];

// ─── Grammatical form ────────────────────────────────────────────────────────

export type GrammaticalPerson = "first" | "second" | "third";

export type GrammaticalNumber = "singular" | "plural";

/** A person/number pair that selects one conjugated surface form. */
export interface FiniteForm {
  person: GrammaticalPerson;
  number: GrammaticalNumber;
}

/** Marker for the dictionary form; number does not apply. */
export interface InfinitiveForm {
  person: "infinitive";
}

export type GrammaticalForm = FiniteForm | InfinitiveForm;

export const GRAMMATICAL_PERSONS: readonly GrammaticalPerson[] = ["first", "second", "third"];
export const GRAMMATICAL_NUMBERS: readonly GrammaticalNumber[] = ["singular", "plural"];

// ─── Pronouns ────────────────────────────────────────────────────────────────

/** The seven fixed pronoun identities. He and She share the third-person singular form. */
export type PronounName = "I" | "You" | "He" | "She" | "We" | "YouPlural" | "They";

export const PRONOUN_NAMES: readonly PronounName[] = ["I", "You", "He", "She", "We", "YouPlural", "They"];

/** Surface text of each pronoun, in the drill language. */
export const PRONOUN_TEXT: Readonly<Record<PronounName, string>> = {
  I: "Я",
  You: "Ты",
  He: "Он",
  She: "Она",
  We: "Мы",
  YouPlural: "Вы",
  They: "Они",
};

// ─── Verbs ───────────────────────────────────────────────────────────────────

/**
 * Case roles a verb governs. Carried as metadata for external tooling;
 * sentence generation does not read them.
 */
export type VerbQuestion = "ToWhom" | "Whom" | "WithWhom" | "AboutWhom";

export const VERB_QUESTIONS = ["ToWhom", "Whom", "WithWhom", "AboutWhom"] as const satisfies readonly VerbQuestion[];

/** Singular and plural surface forms for one grammatical person. */
export interface Conjugation {
  singular: string;
  plural: string;
}

export interface VerbForms {
  infinitive: string;
  /** Indexed by person: first, second, third. Exactly three rows when well-formed. */
  conjugations: Conjugation[];
}

// ─── Words ───────────────────────────────────────────────────────────────────

export interface QuestionWord {
  type: "question";
  text: string;
}

export interface PronounWord {
  type: "pronoun";
  pronounName: PronounName;
}

export interface VerbWord {
  type: "verb";
  forms: VerbForms;
  /** The finite form must be followed by a second verb in the infinitive */
  expectsInfinitive: boolean;
  questions: VerbQuestion[];
}

export type Word = QuestionWord | PronounWord | VerbWord;

export type WordOfType<T extends WordType> = Extract<Word, { type: T }>;

/**
 * Invariant: every word's lower-cased surface text is unique across all
 * three collections.
 */
export interface Vocabulary {
  questionWords: QuestionWord[];
  pronouns: PronounWord[];
  verbs: VerbWord[];
}

/** Lower-cased surface texts of the words currently being practised. */
export type LearningTargets = readonly string[];

/** A fully loaded drill: the vocabulary plus the learner's current targets. */
export interface DrillDefinition {
  vocabulary: Vocabulary;
  learningTargets: string[];
}

// ─── Validation ──────────────────────────────────────────────────────────────

export type ValidationModule = "lexicon" | "morphology" | "targets" | "cross-module";

export interface ValidationIssue {
  ruleId: string;
  module: ValidationModule;
  severity: "error" | "warning";
  message: string;
  /** Surface text or identifier of the offending entity */
  entityRef?: string;
}
