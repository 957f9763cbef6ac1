import { describe, expect, it } from "vitest";
import { EmptyVocabularyError } from "@phrasedrill/shared-types";
import {
  coinFlip, pickOne, randomIndex, sampleWithoutReplacement, seededRandom
} from "../random.js";
import { scriptedRandom } from "./scripted-random.js";

function draws(seed: string | number, count: number): number[] {
  const rng = seededRandom(seed);
  return Array.from({ length: count }, () => rng.next());
}

describe("seededRandom", () => {
  it("replays the same sequence for the same seed", () => {
    expect(draws("drill-7", 5)).toEqual(draws("drill-7", 5));
    expect(draws(42, 5)).toEqual(draws(42, 5));
  });

  it("diverges for different seeds", () => {
    expect(draws("drill-7", 5)).not.toEqual(draws("drill-8", 5));
  });

  it("stays within [0, 1)", () => {
    for (const value of draws("range", 200)) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});

describe("randomIndex", () => {
  it("scales the draw to the length", () => {
    expect(randomIndex(scriptedRandom(0), 3)).toBe(0);
    expect(randomIndex(scriptedRandom(0.5), 3)).toBe(1);
    expect(randomIndex(scriptedRandom(0.999), 3)).toBe(2);
  });

  it("clamps a draw of exactly 1", () => {
    expect(randomIndex(scriptedRandom(1), 3)).toBe(2);
  });
});

describe("coinFlip", () => {
  it("is true below one half", () => {
    expect(coinFlip(scriptedRandom(0.49))).toBe(true);
    expect(coinFlip(scriptedRandom(0.5))).toBe(false);
  });
});

describe("pickOne", () => {
  it("picks by index", () => {
    expect(pickOne(scriptedRandom(0.7), ["a", "b", "c"], "letter")).toBe("c");
  });

  it("throws on an empty pool without drawing", () => {
    expect(() => pickOne(scriptedRandom(), [], "pronoun")).toThrow(EmptyVocabularyError);
    expect(() => pickOne(scriptedRandom(), [], "pronoun")).toThrow("No pronoun available to choose from.");
  });
});

describe("sampleWithoutReplacement", () => {
  it("draws distinct items in draw order", () => {
    expect(sampleWithoutReplacement(scriptedRandom(0.5, 0), ["a", "b", "c"], 2)).toEqual(["b", "a"]);
  });

  it("stops when the pool is exhausted", () => {
    expect(sampleWithoutReplacement(scriptedRandom(0, 0), ["a", "b"], 5)).toEqual(["a", "b"]);
  });

  it("does not touch the input", () => {
    const items = ["a", "b", "c"];
    sampleWithoutReplacement(scriptedRandom(0, 0, 0), items, 3);
    expect(items).toEqual(["a", "b", "c"]);
  });
});
