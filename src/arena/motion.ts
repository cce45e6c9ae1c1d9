import type { DomainRNG } from "@/lib/seededRandom";
import { firstColliding } from "./obstacles";
import * as vec from "./vector";
import type { Agent, Obstacle, Vector2 } from "./vocabulary/schemas/prelude";
import type { ArenaPhysics, WorldConfig } from "./vocabulary/schemas/world";

export const MOTION_CONSTANTS = {
  OBSTACLE_PASSES: 2,
} as const;

type Bounds = Pick<WorldConfig, "width" | "height">;

type Resolution = {
  position: Vector2;
  velocity: Vector2;
  bounced: boolean;
};

/**
 * Fold a coordinate that crossed [radius, size - radius] back inside
 */
function foldAxis(
  coord: number,
  speed: number,
  size: number,
  radius: number,
  damping: number
): { coord: number; speed: number; bounced: boolean } {
  if (coord < radius) {
    return { coord: radius + (radius - coord), speed: -speed * damping, bounced: true };
  }
  const far = size - radius;
  if (coord > far) {
    return { coord: far - (coord - far), speed: -speed * damping, bounced: true };
  }
  return { coord, speed, bounced: false };
}

export function reflectOffWalls(
  position: Vector2,
  velocity: Vector2,
  bounds: Bounds,
  physics: ArenaPhysics
): Resolution {
  const x = foldAxis(position.x, velocity.x, bounds.width, physics.radius, physics.wallBounce);
  const y = foldAxis(position.y, velocity.y, bounds.height, physics.radius, physics.wallBounce);
  return {
    position: { x: x.coord, y: y.coord },
    velocity: { x: x.speed, y: y.speed },
    bounced: x.bounced || y.bounced,
  };
}

/**
 * Push a point out of an inflated rectangle through its nearest face
 *
 * Ties go left, right, top, bottom. The matching velocity component is
 * pointed outward and damped.
 */
export function pushOutOfObstacle(
  position: Vector2,
  velocity: Vector2,
  obstacle: Obstacle,
  physics: ArenaPhysics
): { position: Vector2; velocity: Vector2 } {
  const { radius, wallBounce } = physics;
  const left = obstacle.x1 - radius;
  const right = obstacle.x2 + radius;
  const top = obstacle.y1 - radius;
  const bottom = obstacle.y2 + radius;

  const dLeft = Math.abs(position.x - left);
  const dRight = Math.abs(position.x - right);
  const dTop = Math.abs(position.y - top);
  const dBottom = Math.abs(position.y - bottom);
  const nearest = Math.min(dLeft, dRight, dTop, dBottom);

  if (nearest === dLeft) {
    return {
      position: { x: left, y: position.y },
      velocity: { x: -Math.abs(velocity.x) * wallBounce, y: velocity.y },
    };
  }
  if (nearest === dRight) {
    return {
      position: { x: right, y: position.y },
      velocity: { x: Math.abs(velocity.x) * wallBounce, y: velocity.y },
    };
  }
  if (nearest === dTop) {
    return {
      position: { x: position.x, y: top },
      velocity: { x: velocity.x, y: -Math.abs(velocity.y) * wallBounce },
    };
  }
  return {
    position: { x: position.x, y: bottom },
    velocity: { x: velocity.x, y: Math.abs(velocity.y) * wallBounce },
  };
}

/**
 * Move one agent by its velocity and resolve walls then obstacles
 *
 * Draws two jitter values (x, then y) only when something bounced.
 */
export function moveAgent(
  agent: Agent,
  bounds: Bounds,
  obstacles: ReadonlyArray<Obstacle>,
  physics: ArenaPhysics,
  rng: DomainRNG
): boolean {
  const proposed = vec.add(agent.position, agent.velocity);
  let { position, velocity, bounced } = reflectOffWalls(
    proposed,
    agent.velocity,
    bounds,
    physics
  );

  for (let pass = 0; pass < MOTION_CONSTANTS.OBSTACLE_PASSES; pass++) {
    const obstacle = firstColliding(obstacles, position.x, position.y, physics.radius);
    if (!obstacle) break;
    ({ position, velocity } = pushOutOfObstacle(position, velocity, obstacle, physics));
    bounced = true;
  }

  if (bounced) {
    velocity = {
      x: velocity.x + rng.range(-physics.bounceJitter, physics.bounceJitter),
      y: velocity.y + rng.range(-physics.bounceJitter, physics.bounceJitter),
    };
    velocity = vec.limit(velocity, physics.baseSpeed);
  }

  agent.position = position;
  agent.velocity = velocity;
  return bounced;
}

/**
 * Move every agent in store order
 */
export function applyMotion(
  agents: Agent[],
  bounds: Bounds,
  obstacles: ReadonlyArray<Obstacle>,
  physics: ArenaPhysics,
  rng: DomainRNG
): void {
  for (const agent of agents) {
    moveAgent(agent, bounds, obstacles, physics, rng);
  }
}
