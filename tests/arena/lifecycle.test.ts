import { describe, expect, it } from "vitest";
import { hasReachedGameLimit, isGameOver, nextSeed } from "@/arena/lifecycle";
import { createSeededRNG, drawSeed } from "@/lib/seededRandom";

describe("game lifecycle rules", () => {
  it("ends a game when one kind is left", () => {
    expect(isGameOver([2])).toBe(true);
    expect(isGameOver([0, 2])).toBe(false);
  });

  it("treats a game count of 0 as unlimited", () => {
    expect(hasReachedGameLimit(3, 3)).toBe(true);
    expect(hasReachedGameLimit(2, 3)).toBe(false);
    expect(hasReachedGameLimit(1000, 0)).toBe(false);
  });

  it("counts fixed seeds up by one", () => {
    const rng = createSeededRNG(1).domain("arena");
    expect(nextSeed({ fixed: 5, initial: 5 }, 9, rng)).toBe(10);
  });

  it("draws a fresh seed from the stream otherwise", () => {
    const expected = drawSeed(createSeededRNG(21).domain("arena"));
    const seed = nextSeed({ fixed: null, initial: 21 }, 21, createSeededRNG(21).domain("arena"));
    expect(seed).toBe(expected);
  });
});
