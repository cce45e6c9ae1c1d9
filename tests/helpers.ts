import type { DomainRNG } from "@/lib/seededRandom";
import { compileKindTable } from "@/arena/kinds";
import type { Agent } from "@/arena/vocabulary/schemas/prelude";
import { classicProfile } from "@/profiles/classic";
import { fiveElementsProfile } from "@/profiles/five-elements";

export const physics = classicProfile.physics;

// paper = 0, rock = 1, scissors = 2
export const classic = compileKindTable(classicProfile.kinds);

// earth = 0, fire = 1, metal = 2, water = 3, wood = 4
export const fiveElements = compileKindTable(fiveElementsProfile.kinds);

export const PAPER = 0;
export const ROCK = 1;
export const SCISSORS = 2;

/**
 * Every draw lands in the middle of its range, so symmetric jitter is 0
 */
export function midpointRng(): DomainRNG {
  return {
    next: () => 0.5,
    range: (min, max) => (min + max) / 2,
    intRange: (min, max) => Math.floor((min + max) / 2),
    pick: (array) => array[0],
    shuffle: (array) => array,
    chance: () => false,
  };
}

export function agent(kind: number, x: number, y: number, vx = 0, vy = 0): Agent {
  return { kind, position: { x, y }, velocity: { x: vx, y: vy } };
}
