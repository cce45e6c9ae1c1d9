import { drawSeed, type DomainRNG } from "@/lib/seededRandom";
import type { SeedPolicy } from "./vocabulary/schemas/session";

/**
 * Pure game lifecycle rules
 */

/**
 * A game is over as soon as a single kind is left
 */
export function isGameOver(present: ReadonlyArray<number>): boolean {
  return present.length === 1;
}

/**
 * `games` of 0 means play forever
 */
export function hasReachedGameLimit(gamesPlayed: number, games: number): boolean {
  return games > 0 && gamesPlayed >= games;
}

/**
 * Fixed seeds count up (S, S + 1, ...); otherwise the finished game's
 * stream supplies a fresh one.
 */
export function nextSeed(
  policy: SeedPolicy,
  currentSeed: number,
  rng: DomainRNG
): number {
  if (policy.fixed !== null) {
    return currentSeed + 1;
  }
  return drawSeed(rng);
}
