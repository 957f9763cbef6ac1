/**
 * Drill runner: narrows the learner's targets to a small sample and
 * generates one sentence around them.
 */
import type { DrillDefinition, LearningTargets } from "@phrasedrill/shared-types";
import { buildLexicalIndex } from "@phrasedrill/lexicon";
import { sampleWithoutReplacement, systemRandom } from "./random.js";
import type { RandomSource } from "./random.js";
import { generateSentence } from "./sentence.js";
import type { GeneratedSentence } from "./sentence.js";

/** Targets handed to a single generation call */
export const DEFAULT_TARGET_LIMIT = 2;

export interface DrillSentence extends GeneratedSentence {
  /** The sampled targets this sentence was biased toward */
  learningTargets: string[];
}

export interface DrillOptions {
  rng?: RandomSource;
  targetLimit?: number;
}

export function sampleLearningTargets(
  targets: LearningTargets,
  rng: RandomSource,
  limit = DEFAULT_TARGET_LIMIT
): string[] {
  return sampleWithoutReplacement(rng, targets, Math.min(targets.length, limit));
}

export function generateDrillSentence(definition: DrillDefinition, options: DrillOptions = {}): DrillSentence {
  const rng = options.rng ?? systemRandom;
  const index = buildLexicalIndex(definition.vocabulary);
  const learningTargets = sampleLearningTargets(definition.learningTargets, rng, options.targetLimit);
  const sentence = generateSentence(definition.vocabulary, learningTargets, { rng, index });
  return { ...sentence, learningTargets };
}
