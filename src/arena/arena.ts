import type { DomainRNG } from "@/lib/seededRandom";
import { applyBehavior } from "./behavior";
import { resolveContacts, type Conversion } from "./contact";
import { kindsPresent, type KindTable } from "./kinds";
import { applyMotion } from "./motion";
import { buildObstacles } from "./obstacles";
import { placeAgents } from "./placement";
import type { Agent, Obstacle, ObstacleSource } from "./vocabulary/schemas/prelude";
import type { ArenaPhysics, WorldConfig } from "./vocabulary/schemas/world";

export type ArenaSettings = {
  world: WorldConfig;
  kinds: KindTable;
  physics: ArenaPhysics;
  obstacles: ObstacleSource;
  obstacleColor: string;
};

export type TickReport = {
  conversions: Conversion[];
  kindsPresent: number[];
};

/**
 * Arena - agents and obstacles of the current game
 *
 * One tick is Behavior → Motion → Contact. Fast-forward and the end check
 * belong to the session and run on the returned report.
 */
export function createArena(settings: ArenaSettings) {
  const { world, kinds, physics } = settings;
  const agents: Agent[] = [];
  let obstacles: Obstacle[] = [];

  /**
   * Rebuild obstacles and place agents; all draws come from `rng`
   */
  const reset = (rng: DomainRNG) => {
    obstacles = buildObstacles(
      settings.obstacles,
      world,
      physics.radius,
      settings.obstacleColor,
      rng
    );
    const placed = placeAgents(kinds.ids.length, world, obstacles, physics, rng);
    // agents keeps its identity so observers can hold on to it
    agents.length = 0;
    agents.push(...placed);
  };

  const step = (rng: DomainRNG): TickReport => {
    applyBehavior(agents, kinds, physics, rng);
    applyMotion(agents, world, obstacles, physics, rng);
    const conversions = resolveContacts(agents, kinds, physics);
    return { conversions, kindsPresent: kindsPresent(agents) };
  };

  return {
    agents,
    getObstacles: (): ReadonlyArray<Obstacle> => obstacles,
    reset,
    step,
  };
}

export type Arena = ReturnType<typeof createArena>;
