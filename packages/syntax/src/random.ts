/**
 * Injectable random source. Generation never touches ambient randomness
 * directly, so a seeded source replays the same drill sentence.
 */
import { EmptyVocabularyError } from "@phrasedrill/shared-types";

export interface RandomSource {
  /** Uniform float in [0, 1) */
  next(): number;
}

export const systemRandom: RandomSource = { next: () => Math.random() };

/**
 * Mulberry32 generator. String seeds are hashed first so that CLI and API
 * callers can pass any token.
 */
export function seededRandom(seed: string | number): RandomSource {
  let state = typeof seed === "number" ? seed | 0 : hashSeed(seed);
  return {
    next() {
      state = (state + 0x6d2b79f5) | 0;
      const z = Math.imul(state ^ (state >>> 15), state | 1);
      const y = z ^ (z + Math.imul(z ^ (z >>> 7), z | 61));
      return ((y ^ (y >>> 14)) >>> 0) / 4294967296;
    },
  };
}

function hashSeed(seed: string): number {
  let hash = 0;
  for (let i = 0; i < seed.length; i++) {
    hash = (hash << 5) - hash + seed.charCodeAt(i);
    hash |= 0;
  }
  return hash;
}

// ─── Draws ────────────────────────────────────────────────────────────────────

export function randomIndex(rng: RandomSource, length: number): number {
  return Math.min(length - 1, Math.floor(rng.next() * length));
}

export function coinFlip(rng: RandomSource): boolean {
  return rng.next() < 0.5;
}

/**
 * Uniform pick from a candidate pool.
 * @param candidate what is being picked, named in the EmptyVocabularyError
 */
export function pickOne<T>(rng: RandomSource, items: readonly T[], candidate: string): T {
  if (items.length === 0) throw new EmptyVocabularyError(candidate);
  const item = items[randomIndex(rng, items.length)];
  if (item === undefined) throw new EmptyVocabularyError(candidate);
  return item;
}

/** Up to `count` distinct items, in draw order. */
export function sampleWithoutReplacement<T>(rng: RandomSource, items: readonly T[], count: number): T[] {
  const pool = [...items];
  const picked: T[] = [];
  while (picked.length < count && pool.length > 0) {
    const [item] = pool.splice(randomIndex(rng, pool.length), 1);
    if (item !== undefined) picked.push(item);
  }
  return picked;
}
