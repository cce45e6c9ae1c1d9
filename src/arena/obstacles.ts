import type { DomainRNG } from "@/lib/seededRandom";
import { obstacleModeKeywords } from "./vocabulary/keywords";
import type {
  LayoutBlock,
  Obstacle,
  ObstacleSource,
} from "./vocabulary/schemas/prelude";
import type { WorldConfig } from "./vocabulary/schemas/world";

/**
 * Obstacle Model
 *
 * Static rectangles queried with a margin (the agent radius), i.e. against
 * the rectangle inflated by `margin` on every side. Linear scan in list
 * order: the first match decides which face an agent bounces off.
 */

export const OBSTACLE_CONSTANTS = {
  MIN_SIDE_RATIO: 0.08, // Of world width / height
  MAX_SIDE_RATIO: 0.4,
  MAX_AREA_RATIO: 0.2, // Of the whole arena, per obstacle
  ATTEMPTS_PER_OBSTACLE: 30,
  MIN_SIDE: 4,
  EDGE_CLEARANCE: 2, // Added to the radius when positioning
} as const;

function contains(
  obstacle: Obstacle,
  x: number,
  y: number,
  margin: number
): boolean {
  return (
    obstacle.x1 - margin <= x &&
    x <= obstacle.x2 + margin &&
    obstacle.y1 - margin <= y &&
    y <= obstacle.y2 + margin
  );
}

export function pointInAny(
  obstacles: ReadonlyArray<Obstacle>,
  x: number,
  y: number,
  margin = 0
): boolean {
  return firstColliding(obstacles, x, y, margin) !== undefined;
}

export function firstColliding(
  obstacles: ReadonlyArray<Obstacle>,
  x: number,
  y: number,
  margin = 0
): Obstacle | undefined {
  for (const obstacle of obstacles) {
    if (contains(obstacle, x, y, margin)) {
      return obstacle;
    }
  }
  return undefined;
}

/**
 * Random rectangles for one game
 *
 * Sides are uniform integers in [8%, 40%] of the world side. A rectangle
 * above 20% of the arena area gets its height cut to fit and is dropped if
 * that leaves it shorter than the minimum height. Fewer than `count`
 * rectangles is a valid result.
 */
export function generateRandomObstacles(
  count: number,
  world: Pick<WorldConfig, "width" | "height">,
  radius: number,
  color: string,
  rng: DomainRNG
): Obstacle[] {
  const obstacles: Obstacle[] = [];
  if (count <= 0) return obstacles;

  const { width: W, height: H } = world;
  const maxArea = OBSTACLE_CONSTANTS.MAX_AREA_RATIO * W * H;
  const minW = Math.floor(OBSTACLE_CONSTANTS.MIN_SIDE_RATIO * W);
  const maxW = Math.floor(OBSTACLE_CONSTANTS.MAX_SIDE_RATIO * W);
  const minH = Math.floor(OBSTACLE_CONSTANTS.MIN_SIDE_RATIO * H);
  const maxH = Math.floor(OBSTACLE_CONSTANTS.MAX_SIDE_RATIO * H);
  const edge = radius + OBSTACLE_CONSTANTS.EDGE_CLEARANCE;

  const maxAttempts = count * OBSTACLE_CONSTANTS.ATTEMPTS_PER_OBSTACLE;
  let attempts = 0;

  while (obstacles.length < count && attempts < maxAttempts) {
    attempts++;
    const w = rng.intRange(minW, maxW + 1);
    let h = rng.intRange(minH, maxH + 1);

    if (w * h > maxArea) {
      h = Math.floor(maxArea / Math.max(w, 1));
      if (h < minH) continue;
    }

    const x1 = rng.intRange(edge, Math.max(edge, W - w - edge) + 1);
    const y1 = rng.intRange(edge, Math.max(edge, H - h - edge) + 1);

    if (w < OBSTACLE_CONSTANTS.MIN_SIDE || h < OBSTACLE_CONSTANTS.MIN_SIDE) {
      continue;
    }

    obstacles.push({ x1, y1, x2: x1 + w, y2: y1 + h, color });
  }

  return obstacles;
}

/**
 * Convert layout blocks (top/left/width/height) to arena rectangles
 */
export function obstaclesFromLayout(
  blocks: ReadonlyArray<LayoutBlock>
): Obstacle[] {
  return blocks.map((block) => ({
    x1: block.left,
    y1: block.top,
    x2: block.left + block.width,
    y2: block.top + block.height,
    color: block.color,
  }));
}

/**
 * Obstacles for a fresh game
 *
 * Random sources draw from `rng`; layouts are copied as-is with the default
 * color filled in.
 */
export function buildObstacles(
  source: ObstacleSource,
  world: Pick<WorldConfig, "width" | "height">,
  radius: number,
  defaultColor: string,
  rng: DomainRNG
): Obstacle[] {
  switch (source.mode) {
    case obstacleModeKeywords.none:
      return [];
    case obstacleModeKeywords.random:
      return generateRandomObstacles(source.count, world, radius, source.color, rng);
    case obstacleModeKeywords.layout:
      return source.obstacles.map((obstacle) => ({
        ...obstacle,
        color: obstacle.color ?? defaultColor,
      }));
  }
}

/**
 * Short description for the settings line
 */
export function describeObstacleSource(source: ObstacleSource): string {
  switch (source.mode) {
    case obstacleModeKeywords.none:
      return "none";
    case obstacleModeKeywords.random:
      return `random(${source.count})`;
    case obstacleModeKeywords.layout:
      return `layout:${source.source}`;
  }
}
