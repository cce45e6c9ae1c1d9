import { z } from "zod";
import { obstacleModeKeywords } from "../keywords";

/**
 * Prelude Schemas - building blocks shared by every other schema
 */

export const vectorSchema = z.object({
  x: z.number(),
  y: z.number(),
});

export type Vector2 = z.infer<typeof vectorSchema>;

// ============================================
// Agent
// ============================================

/**
 * Agent - one simulated unit
 *
 * `kind` is an index into the compiled kind table. Conversion rewrites it
 * in place; agents are never added or removed during a game.
 */
export const agentSchema = z.object({
  kind: z.number().int().min(0),
  position: vectorSchema,
  velocity: vectorSchema,
});

export type Agent = z.infer<typeof agentSchema>;

// ============================================
// Obstacles
// ============================================

/**
 * Axis-aligned rectangle in arena coordinates. Color is cosmetic.
 */
export const obstacleSchema = z.object({
  x1: z.number(),
  y1: z.number(),
  x2: z.number(),
  y2: z.number(),
  color: z.string().optional(),
});

export type Obstacle = z.infer<typeof obstacleSchema>;

const positiveInt = () =>
  z
    .number({
      error: (issue) =>
        issue.input === undefined ? "is required" : "must be a positive integer",
    })
    .int({ error: "must be a positive integer" })
    .positive({ error: "must be a positive integer" });

/**
 * One rectangle of a fixed obstacle layout, in screen terms
 */
export const layoutBlockSchema = z.object(
  {
    top: positiveInt(),
    left: positiveInt(),
    width: positiveInt(),
    height: positiveInt(),
    color: z.string({ error: "must be a string if provided" }).optional(),
  },
  { error: "is not an object" }
);

export type LayoutBlock = z.infer<typeof layoutBlockSchema>;

const layoutShapeMessage = "expected an object with key 'blocks' containing a list";

/**
 * Obstacle layout file: `{ "blocks": [ { top, left, width, height, color? } ] }`
 */
export const obstacleLayoutSchema = z.object(
  {
    blocks: z.array(layoutBlockSchema, { error: layoutShapeMessage }),
  },
  { error: layoutShapeMessage }
);

export type ObstacleLayout = z.infer<typeof obstacleLayoutSchema>;

/**
 * Where a game's obstacles come from
 *
 * - none: empty arena
 * - random: `count` rectangles generated anew on every reset
 * - layout: fixed rectangles, identical on every reset
 */
export const obstacleSourceSchema = z.discriminatedUnion("mode", [
  z.object({ mode: z.literal(obstacleModeKeywords.none) }),
  z.object({
    mode: z.literal(obstacleModeKeywords.random),
    count: z.number().int().min(0),
    color: z.string(),
  }),
  z.object({
    mode: z.literal(obstacleModeKeywords.layout),
    source: z.string(), // file path or "inline"
    obstacles: z.array(obstacleSchema),
  }),
]);

export type ObstacleSource = z.infer<typeof obstacleSourceSchema>;
