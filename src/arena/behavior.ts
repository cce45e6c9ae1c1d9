import type { DomainRNG } from "@/lib/seededRandom";
import type { KindTable } from "./kinds";
import { minSeparation } from "./placement";
import * as vec from "./vector";
import type { Agent, Vector2 } from "./vocabulary/schemas/prelude";
import type { ArenaPhysics } from "./vocabulary/schemas/world";

/**
 * Behavior Policy
 *
 * Closest-choice steering: chase the nearest agent this kind converts, or
 * flee the nearest agent that converts it, whichever is closer (ties chase).
 * Allies inside minSeparation push away; a little jitter breaks stand-offs.
 */

export type Targets = {
  prey: Agent | null;
  preyDistanceSq: number;
  predator: Agent | null;
  predatorDistanceSq: number;
};

/**
 * Nearest prey and predator by squared distance; the first one seen wins ties
 */
export function findTargets(
  me: Agent,
  agents: ReadonlyArray<Agent>,
  table: KindTable
): Targets {
  const preyKind = table.beats[me.kind];
  const predatorKind = table.losesTo[me.kind];

  const targets: Targets = {
    prey: null,
    preyDistanceSq: Infinity,
    predator: null,
    predatorDistanceSq: Infinity,
  };

  for (const other of agents) {
    if (other === me) continue;
    const d2 = vec.distanceSquared(me.position, other.position);
    if (other.kind === preyKind && d2 < targets.preyDistanceSq) {
      targets.prey = other;
      targets.preyDistanceSq = d2;
    } else if (other.kind === predatorKind && d2 < targets.predatorDistanceSq) {
      targets.predator = other;
      targets.predatorDistanceSq = d2;
    }
  }

  return targets;
}

function pursue(me: Agent, prey: Agent, physics: ArenaPhysics): Vector2 {
  const direction = vec.normalize(vec.subtract(prey.position, me.position));
  return vec.multiply(direction, physics.attraction);
}

function evade(me: Agent, predator: Agent, physics: ArenaPhysics): Vector2 {
  const direction = vec.normalize(vec.subtract(me.position, predator.position));
  return vec.multiply(direction, physics.repulsion);
}

/**
 * Pursuit or evasion term; zero when neither target exists
 */
export function chooseDirection(
  me: Agent,
  targets: Targets,
  physics: ArenaPhysics
): Vector2 {
  const { prey, predator } = targets;
  if (prey && predator) {
    return targets.preyDistanceSq <= targets.predatorDistanceSq
      ? pursue(me, prey, physics)
      : evade(me, predator, physics);
  }
  if (prey) return pursue(me, prey, physics);
  if (predator) return evade(me, predator, physics);
  return { x: 0, y: 0 };
}

/**
 * Sum of pushes away from allies closer than minSeparation
 *
 * Strength grows as allyRepel * minSeparation / max(distance, 1).
 */
export function allySeparation(
  me: Agent,
  agents: ReadonlyArray<Agent>,
  physics: ArenaPhysics
): Vector2 {
  const separation = minSeparation(physics);
  const separationSq = separation * separation;
  let force: Vector2 = { x: 0, y: 0 };

  for (const other of agents) {
    if (other === me || other.kind !== me.kind) continue;
    const d2 = vec.distanceSquared(me.position, other.position);
    if (d2 < separationSq) {
      const direction = vec.normalize(vec.subtract(me.position, other.position));
      const strength =
        physics.allyRepel * (separation / Math.max(Math.sqrt(d2), 1.0));
      force = vec.add(force, vec.multiply(direction, strength));
    }
  }

  return force;
}

/**
 * Steering force for one agent. Draws two jitter values (x, then y).
 */
export function computeSteering(
  me: Agent,
  agents: ReadonlyArray<Agent>,
  table: KindTable,
  physics: ArenaPhysics,
  rng: DomainRNG
): Vector2 {
  const targets = findTargets(me, agents, table);
  let force = chooseDirection(me, targets, physics);
  force = vec.add(force, allySeparation(me, agents, physics));

  return {
    x: force.x + rng.range(-physics.jitter, physics.jitter),
    y: force.y + rng.range(-physics.jitter, physics.jitter),
  };
}

/**
 * Apply steering to every agent
 *
 * All forces are computed from the tick-start positions before any velocity
 * is written. Velocity is then capped at baseSpeed.
 */
export function applyBehavior(
  agents: Agent[],
  table: KindTable,
  physics: ArenaPhysics,
  rng: DomainRNG
): void {
  const forces = agents.map((agent) =>
    computeSteering(agent, agents, table, physics, rng)
  );

  for (let i = 0; i < agents.length; i++) {
    const agent = agents[i];
    agent.velocity = vec.limit(vec.add(agent.velocity, forces[i]), physics.baseSpeed);
  }
}
