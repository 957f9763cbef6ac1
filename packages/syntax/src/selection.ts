/**
 * Word selection policy.
 *
 * Two tiers: a learning target of the wanted kind is always preferred;
 * only when none exists is the full vocabulary of that kind sampled.
 * Draws are uniform within whichever tier is used.
 */
import type { Vocabulary, VerbWord, Word, WordOfType, WordType } from "@phrasedrill/shared-types";
import { isWordOfType, wordsOfType } from "@phrasedrill/lexicon";
import { coinFlip, pickOne } from "./random.js";
import type { RandomSource } from "./random.js";

export interface SelectionContext {
  vocabulary: Vocabulary;
  /** Learning targets, already resolved to their vocabulary entries */
  targets: readonly Word[];
  rng: RandomSource;
}

const isVerb = isWordOfType("verb");

export function isInfinitiveGoverningVerb(word: Word): word is VerbWord {
  return word.type === "verb" && word.expectsInfinitive;
}

export function isNonInfinitiveGoverningVerb(word: Word): word is VerbWord {
  return word.type === "verb" && !word.expectsInfinitive;
}

/**
 * Pick uniformly among the targets matching `matches`, or from `pool` when
 * no target matches.
 */
export function pickPreferringTargets<T extends Word>(
  ctx: SelectionContext,
  matches: (word: Word) => word is T,
  pool: readonly T[],
  candidate: string
): T {
  const targeted = ctx.targets.filter(matches);
  return pickOne(ctx.rng, targeted.length > 0 ? targeted : pool, candidate);
}

export function pickByType<T extends WordType>(ctx: SelectionContext, type: T): WordOfType<T> {
  return pickPreferringTargets(ctx, isWordOfType(type), wordsOfType(ctx.vocabulary, type), type);
}

/**
 * Pick the finite verb.
 *
 * With verb targets present, a target is returned when any of them governs
 * an infinitive or a coin flip lands true; otherwise the pick comes from the
 * vocabulary's infinitive-governing verbs, which steers the sentence into a
 * chain that can still end on a targeted infinitive.
 */
export function pickVerb(ctx: SelectionContext): VerbWord {
  const targeted = ctx.targets.filter(isVerb);
  if (targeted.length > 0 && !targeted.some(v => v.expectsInfinitive) && !coinFlip(ctx.rng)) {
    const governing = ctx.vocabulary.verbs.filter(isInfinitiveGoverningVerb);
    return pickOne(ctx.rng, governing, "infinitive-governing verb");
  }
  return pickPreferringTargets(ctx, isVerb, ctx.vocabulary.verbs, "verb");
}

/** Pick the second verb of an infinitive chain. */
export function pickNonInfinitiveGoverningVerb(ctx: SelectionContext): VerbWord {
  return pickPreferringTargets(
    ctx,
    isNonInfinitiveGoverningVerb,
    ctx.vocabulary.verbs.filter(isNonInfinitiveGoverningVerb),
    "non-infinitive-governing verb"
  );
}
