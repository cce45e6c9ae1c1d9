import type { ArenaProfile } from "../arena/vocabulary/schemas/world";

/**
 * Classic Profile - rock, paper, scissors
 *
 * 50 of each kind on an 800x800 arena. The physics values are the tuned
 * defaults every other profile starts from.
 */
export const classicProfile: ArenaProfile = {
  id: "classic",
  name: "Classic",
  description: "Rock, paper and scissors chase each other until one is left",

  world: {
    width: 800,
    height: 800,
    unitsPerKind: 50,
  },

  kinds: {
    rock: { label: "🪨", beats: "scissors", losesTo: "paper" },
    paper: { label: "📄", beats: "rock", losesTo: "scissors" },
    scissors: { label: "✂️", beats: "paper", losesTo: "rock" },
  },

  physics: {
    radius: 14, // Roughly a 24px emoji
    placementGap: 6,
    baseSpeed: 2.2,
    attraction: 1.6,
    repulsion: 1.8,
    allyRepel: 1.3,
    wallBounce: 0.9,
    jitter: 0.25,
    bounceJitter: 0.2,
    contactFactor: 1.1,
  },

  pacing: {
    delayMs: 30,
    postgameDelayMs: 5000,
    countdownSeconds: 0,
    fastForward: true,
  },

  obstacleColor: "white",
};
