/**
 * Error kinds raised by sentence generation and drill loading.
 *
 * Each carries a stable `code` and the HTTP status the API gateway answers
 * with, so Fastify's error handler can map them without a lookup table.
 */

export type PhrasedrillErrorCode =
  | "UNKNOWN_LEARNING_TARGET"
  | "EMPTY_VOCABULARY"
  | "MALFORMED_CONJUGATION_TABLE"
  | "INVALID_DRILL_CONFIG";

export class PhrasedrillError extends Error {
  readonly code: PhrasedrillErrorCode;
  readonly statusCode: number;

  constructor(code: PhrasedrillErrorCode, message: string, statusCode = 422) {
    super(message);
    this.name = "PhrasedrillError";
    this.code = code;
    this.statusCode = statusCode;
  }
}

/** A learning target names no vocabulary entry. */
export class UnknownLearningTargetError extends PhrasedrillError {
  readonly target: string;

  constructor(target: string) {
    super("UNKNOWN_LEARNING_TARGET", `Learning target "${target}" is not in the vocabulary.`);
    this.name = "UnknownLearningTargetError";
    this.target = target;
  }
}

/** A selection step had no candidates to choose from. */
export class EmptyVocabularyError extends PhrasedrillError {
  /** What was being selected, e.g. "pronoun" or "non-infinitive-governing verb" */
  readonly candidate: string;

  constructor(candidate: string) {
    super("EMPTY_VOCABULARY", `No ${candidate} available to choose from.`);
    this.name = "EmptyVocabularyError";
    this.candidate = candidate;
  }
}

export class MalformedConjugationTableError extends PhrasedrillError {
  readonly infinitive: string;
  readonly personIndex: number;

  constructor(infinitive: string, personIndex: number) {
    super(
      "MALFORMED_CONJUGATION_TABLE",
      `Verb "${infinitive}" has no conjugation row at person index ${personIndex}.`
    );
    this.name = "MalformedConjugationTableError";
    this.infinitive = infinitive;
    this.personIndex = personIndex;
  }
}

export class DrillConfigError extends PhrasedrillError {
  /** One "path: message" line per schema issue */
  readonly issues: string[];

  constructor(issues: string[]) {
    super("INVALID_DRILL_CONFIG", `Invalid drill file: ${issues.join("; ")}`, 400);
    this.name = "DrillConfigError";
    this.issues = issues;
  }
}
