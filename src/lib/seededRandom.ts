/**
 * Seeded Random Number Generator (RNG)
 *
 * A master seed derives independent domain streams. The arena draws every
 * random number of a game from one domain stream, so a game's whole
 * trajectory is a function of its seed.
 *
 * @example
 * const rng = createSeededRNG(1234);
 * const arena = rng.domain("arena");
 * arena.range(0, 1); // same value for seed 1234, every run
 */

/**
 * cyrb53 string hash
 */
function hashString(str: string): number {
  let h1 = 0xdeadbeef;
  let h2 = 0x41c6ce57;

  for (let i = 0; i < str.length; i++) {
    const ch = str.charCodeAt(i);
    h1 = Math.imul(h1 ^ ch, 2654435761);
    h2 = Math.imul(h2 ^ ch, 1597334677);
  }

  h1 = Math.imul(h1 ^ (h1 >>> 16), 2246822507);
  h1 ^= Math.imul(h2 ^ (h2 >>> 13), 3266489909);
  h2 = Math.imul(h2 ^ (h2 >>> 16), 2246822507);
  h2 ^= Math.imul(h1 ^ (h1 >>> 13), 3266489909);

  return 4294967296 * (2097151 & h2) + (h1 >>> 0);
}

/**
 * Mulberry32 PRNG, values in [0, 1)
 */
function createPRNG(seed: number) {
  let state = seed;

  return function next(): number {
    state |= 0;
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export interface DomainRNG {
  /** Next value in [0, 1) */
  next(): number;

  /** Uniform value in [min, max) */
  range(min: number, max: number): number;

  /** Uniform integer in [min, max) */
  intRange(min: number, max: number): number;

  pick<T>(array: readonly T[]): T | undefined;

  /** Fisher-Yates, in place */
  shuffle<T>(array: T[]): T[];

  chance(probability: number): boolean;
}

function createDomainRNG(seed: number): DomainRNG {
  const prng = createPRNG(seed);

  return {
    next: () => prng(),

    range: (min: number, max: number) => {
      return min + prng() * (max - min);
    },

    intRange: (min: number, max: number) => {
      return Math.floor(min + prng() * (max - min));
    },

    pick: <T>(array: readonly T[]): T | undefined => {
      return array[Math.floor(prng() * array.length)];
    },

    shuffle: <T>(array: T[]): T[] => {
      for (let i = array.length - 1; i > 0; i--) {
        const j = Math.floor(prng() * (i + 1));
        const held = array[i];
        array[i] = array[j];
        array[j] = held;
      }
      return array;
    },

    chance: (probability: number) => {
      return prng() < probability;
    },
  };
}

export interface SeededRNG {
  getMasterSeed(): string;
  getMasterSeedNumber(): number;
  /** Get or create a domain stream */
  domain(name: string): DomainRNG;
  getDomains(): string[];
}

export function createSeededRNG(masterSeed: string | number): SeededRNG {
  const masterSeedStr = String(masterSeed);
  const masterSeedNum =
    typeof masterSeed === "number" ? masterSeed : hashString(masterSeedStr);

  const domains = new Map<string, DomainRNG>();

  return {
    getMasterSeed: () => masterSeedStr,
    getMasterSeedNumber: () => masterSeedNum,

    domain: (name: string) => {
      const existing = domains.get(name);
      if (existing) return existing;
      // Domain seed = hash("masterSeed:domainName")
      const created = createDomainRNG(hashString(`${masterSeedStr}:${name}`));
      domains.set(name, created);
      return created;
    },

    getDomains: () => Array.from(domains.keys()),
  };
}

export const MIN_SEED = 1;
export const MAX_SEED = 1_000_000;

/**
 * Draw a game seed in [MIN_SEED, MAX_SEED] from a stream
 */
export function drawSeed(rng: DomainRNG): number {
  return rng.intRange(MIN_SEED, MAX_SEED + 1);
}

/**
 * Seed for a session started without a fixed seed
 */
export function generateRandomSeed(): number {
  return Math.floor(Math.random() * MAX_SEED) + MIN_SEED;
}
