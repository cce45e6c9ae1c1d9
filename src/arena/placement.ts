import type { DomainRNG } from "@/lib/seededRandom";
import { pointInAny } from "./obstacles";
import * as vec from "./vector";
import type { Agent, Obstacle, Vector2 } from "./vocabulary/schemas/prelude";
import type { ArenaPhysics, WorldConfig } from "./vocabulary/schemas/world";

export const PLACEMENT_CONSTANTS = {
  ATTEMPTS_PER_AGENT: 500, // Constrained phase budget, times the agent count
  FALLBACK_TRIES: 2000, // Per agent, obstacle check only
  EDGE_CLEARANCE: 2, // Added to the radius
} as const;

export function minSeparation(physics: ArenaPhysics): number {
  return physics.radius * 2 + physics.placementGap;
}

/**
 * `unitsPerKind` copies of every kind, in kind order, shuffled once
 */
export function buildKindRoster(
  kindCount: number,
  unitsPerKind: number,
  rng: DomainRNG
): number[] {
  const roster: number[] = [];
  for (let kind = 0; kind < kindCount; kind++) {
    for (let i = 0; i < unitsPerKind; i++) {
      roster.push(kind);
    }
  }
  return rng.shuffle(roster);
}

function samplePoint(
  world: Pick<WorldConfig, "width" | "height">,
  margin: number,
  rng: DomainRNG
): Vector2 {
  const x = rng.range(margin, world.width - margin);
  const y = rng.range(margin, world.height - margin);
  return { x, y };
}

function spawn(kind: number, position: Vector2, physics: ArenaPhysics, rng: DomainRNG): Agent {
  const angle = rng.range(0, 2 * Math.PI);
  const speed = rng.range(0, physics.baseSpeed);
  return { kind, position, velocity: vec.fromAngle(angle, speed) };
}

/**
 * Place a new game's agents
 *
 * Constrained phase: up to N * 500 draws, rejecting points inside an
 * obstacle (margin = radius) or closer than minSeparation to a placed
 * agent. Fallback phase: whoever is left ignores separation and gets up to
 * 2000 obstacle-free tries, then keeps the last sample.
 *
 * RNG order: shuffle, then per agent position draw(s), angle, speed.
 */
export function placeAgents(
  kindCount: number,
  world: WorldConfig,
  obstacles: ReadonlyArray<Obstacle>,
  physics: ArenaPhysics,
  rng: DomainRNG
): Agent[] {
  const roster = buildKindRoster(kindCount, world.unitsPerKind, rng);
  const margin = physics.radius + PLACEMENT_CONSTANTS.EDGE_CLEARANCE;
  const separation = minSeparation(physics);
  const separationSq = separation * separation;

  const agents: Agent[] = [];
  const maxAttempts = roster.length * PLACEMENT_CONSTANTS.ATTEMPTS_PER_AGENT;
  let attempts = 0;

  while (agents.length < roster.length && attempts < maxAttempts) {
    attempts++;
    const point = samplePoint(world, margin, rng);

    if (pointInAny(obstacles, point.x, point.y, physics.radius)) continue;

    const tooClose = agents.some(
      (placed) => vec.distanceSquared(point, placed.position) < separationSq
    );
    if (tooClose) continue;

    agents.push(spawn(roster[agents.length], point, physics, rng));
  }

  for (const kind of roster.slice(agents.length)) {
    let point = samplePoint(world, margin, rng);
    let tries = 1;
    while (
      pointInAny(obstacles, point.x, point.y, physics.radius) &&
      tries < PLACEMENT_CONSTANTS.FALLBACK_TRIES
    ) {
      point = samplePoint(world, margin, rng);
      tries++;
    }
    agents.push(spawn(kind, point, physics, rng));
  }

  return agents;
}
