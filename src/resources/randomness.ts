/**
 * Randomness Resource - the seeded stream of the current game
 *
 * Every game draws from exactly one stream: the `arena` domain of the
 * game's seed. Placement, steering noise, bounce noise and (without a fixed
 * seed) the next game's seed all come from it, in that order, so a seed
 * replays the same game.
 *
 * @example
 * randomness.reseed(42);
 * const angle = randomness.stream().range(0, Math.PI * 2);
 */

import { defineResource } from "braided";
import { createSeededRNG, type DomainRNG } from "@/lib/seededRandom";
import type { ConfigResource } from "./config";

export const ARENA_DOMAIN = "arena";

export interface RandomnessResource {
  /** Seed of the current stream */
  getSeed(): number;

  /** Current game stream */
  stream(): DomainRNG;

  /** Start a fresh stream for a new game */
  reseed(seed: number): void;
}

export const randomness = defineResource({
  dependencies: ["config"],
  start: ({ config }: { config: ConfigResource }): RandomnessResource => {
    let seed = config.seed.initial;
    let rng = createSeededRNG(seed).domain(ARENA_DOMAIN);

    return {
      getSeed: () => seed,
      stream: () => rng,
      reseed: (nextSeed: number) => {
        seed = nextSeed;
        rng = createSeededRNG(nextSeed).domain(ARENA_DOMAIN);
      },
    };
  },
  halt: () => {
    // No cleanup needed - streams are plain closures
  },
});
