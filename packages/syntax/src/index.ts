/**
 * @phrasedrill/syntax
 * Word selection policy, the sentence state machine and the drill runner.
 */
export { systemRandom, seededRandom, randomIndex, coinFlip, pickOne, sampleWithoutReplacement } from "./random.js";
export type { RandomSource } from "./random.js";
export {
  pickPreferringTargets, pickByType, pickVerb, pickNonInfinitiveGoverningVerb,
  isInfinitiveGoverningVerb, isNonInfinitiveGoverningVerb
} from "./selection.js";
export type { SelectionContext } from "./selection.js";
export { openingPart, initialState, advance, generateSentence, finishSentence } from "./sentence.js";
export type {
  NextPart, SentenceRole, SentencePart, GenerationState, GeneratedSentence, GenerateSentenceOptions
} from "./sentence.js";
export { DEFAULT_TARGET_LIMIT, sampleLearningTargets, generateDrillSentence } from "./drill.js";
export type { DrillSentence, DrillOptions } from "./drill.js";
