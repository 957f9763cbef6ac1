/**
 * @phrasedrill/lexicon
 * Word surface text, the lexical index, learning-target resolution and
 * vocabulary integrity checks.
 */
import type {
  Word, WordType, WordOfType, Vocabulary, LearningTargets
} from "@phrasedrill/shared-types";
import { PRONOUN_TEXT, UnknownLearningTargetError } from "@phrasedrill/shared-types";

export interface LexiconValidationIssue {
  ruleId: string; severity: "error"|"warning"; message: string; entityRef?: string;
}

/** Lower-cased surface text → vocabulary entry */
export type LexicalIndex = ReadonlyMap<string, Word>;

// ─── Surface text ─────────────────────────────────────────────────────────────

/**
 * The lower-cased text a word is known by: the question word itself, the
 * pronoun, or a verb's infinitive.
 */
export function wordText(word: Word): string {
  switch (word.type) {
    case "question": return word.text.toLowerCase();
    case "pronoun": return PRONOUN_TEXT[word.pronounName].toLowerCase();
    case "verb": return word.forms.infinitive.toLowerCase();
  }
}

export function isWordOfType<T extends WordType>(type: T): (word: Word) => word is WordOfType<T> {
  return (word): word is WordOfType<T> => word.type === type;
}

export function wordsOfType<T extends WordType>(vocabulary: Vocabulary, type: T): readonly WordOfType<T>[] {
  const pools: { [K in WordType]: readonly WordOfType<K>[] } = {
    question: vocabulary.questionWords,
    pronoun: vocabulary.pronouns,
    verb: vocabulary.verbs,
  };
  return pools[type];
}

// ─── Lexical index ────────────────────────────────────────────────────────────

/**
 * Index every word by its lower-cased surface text, scanning question words,
 * then pronouns, then verbs. Surface texts are assumed unique; when they are
 * not, the entry scanned last wins (see validateVocabulary, LEX_002).
 */
export function buildLexicalIndex(vocabulary: Vocabulary): LexicalIndex {
  const index = new Map<string, Word>();
  const scan: readonly (readonly Word[])[] = [vocabulary.questionWords, vocabulary.pronouns, vocabulary.verbs];
  for (const words of scan) {
    for (const word of words) index.set(wordText(word), word);
  }
  return index;
}

/**
 * Resolve each learning target back to its typed vocabulary entry.
 * An empty target list resolves to an empty list.
 */
export function resolveLearningTargets(targets: LearningTargets, index: LexicalIndex): Word[] {
  return targets.map(target => {
    const word = index.get(target.toLowerCase());
    if (!word) throw new UnknownLearningTargetError(target);
    return word;
  });
}

// ─── Lexicon validation ───────────────────────────────────────────────────────

export function validateVocabulary(vocabulary: Vocabulary): LexiconValidationIssue[] {
  const issues: LexiconValidationIssue[] = [];

  // Surface texts must be unique for the index to be unambiguous
  const seen = new Map<string, WordType>();
  for (const words of [vocabulary.questionWords, vocabulary.pronouns, vocabulary.verbs] as const) {
    for (const word of words) {
      const text = wordText(word);
      const prev = seen.get(text);
      if (prev) {
        issues.push({
          ruleId:"LEX_002",severity:"error",
          message:`Surface text "${text}" is used by both a ${prev} and a ${word.type}. Learning targets cannot be resolved unambiguously.`,
          entityRef:text
        });
      }
      seen.set(text, word.type);
    }
  }

  vocabulary.questionWords.forEach((q, i) => {
    if (!q.text.trim()) issues.push({ruleId:"LEX_020",severity:"error",message:`Question word ${i+1} has empty text.`,entityRef:`questionWords[${i}]`});
  });
  vocabulary.verbs.forEach((v, i) => {
    if (!v.forms.infinitive.trim()) issues.push({ruleId:"LEX_021",severity:"error",message:`Verb ${i+1} has an empty infinitive.`,entityRef:`verbs[${i}]`});
  });

  return issues;
}

export function validateLearningTargets(targets: LearningTargets, index: LexicalIndex): LexiconValidationIssue[] {
  const issues: LexiconValidationIssue[] = [];
  const seen = new Set<string>();
  for (const target of targets) {
    const key = target.toLowerCase();
    if (!index.has(key)) {
      issues.push({ruleId:"TGT_001",severity:"error",message:`Learning target "${target}" is not in the vocabulary.`,entityRef:target});
    }
    if (seen.has(key)) {
      issues.push({ruleId:"TGT_002",severity:"warning",message:`Learning target "${target}" is listed more than once.`,entityRef:target});
    }
    seen.add(key);
  }
  return issues;
}

export { createVocabulary, fixedPronouns, normalizeLearningTargets, parseDrillFile, toDrillDefinition } from "./drill.js";
