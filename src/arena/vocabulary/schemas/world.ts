import { z } from "zod";

/**
 * World Schemas - arena dimensions, kinds, physics and pacing
 *
 * A profile bundles all four into a named preset.
 */

// ============================================
// Arena Physics Schema
// ============================================

/**
 * Arena Physics - constants of the steering and collision model
 *
 * Units are arena pixels and pixels per tick.
 */
export const arenaPhysicsSchema = z.object({
  radius: z.number().positive(), // Collision radius of an agent
  placementGap: z.number().min(0), // Extra spacing at placement: minSeparation = 2 * radius + gap
  baseSpeed: z.number().positive(), // Speed cap per tick
  attraction: z.number(), // Pull toward prey
  repulsion: z.number(), // Push away from predators
  allyRepel: z.number(), // Push away from close allies
  wallBounce: z.number().min(0), // Velocity damping on bounce
  jitter: z.number().min(0), // Steering noise per axis
  bounceJitter: z.number().min(0), // Extra noise per axis after a bounce
  contactFactor: z.number().positive(), // contactRadius = radius * contactFactor
});

export type ArenaPhysics = z.infer<typeof arenaPhysicsSchema>;

// ============================================
// World Schema
// ============================================

export const worldConfigSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  unitsPerKind: z.number().int().positive(),
});

export type WorldConfig = z.infer<typeof worldConfigSchema>;

// ============================================
// Kind Schema
// ============================================

/**
 * Kind - one vertex of the cycle
 *
 * `beats` is the kind this one converts on contact; `losesTo` is the kind
 * that converts this one.
 */
export const kindConfigSchema = z.object({
  label: z.string().min(1), // Display label (emoji or name)
  beats: z.string(),
  losesTo: z.string(),
});

export type KindConfig = z.infer<typeof kindConfigSchema>;

export const kindRecordSchema = z.record(z.string(), kindConfigSchema);

export type KindRecord = z.infer<typeof kindRecordSchema>;

// ============================================
// Pacing Schema
// ============================================

export const pacingConfigSchema = z.object({
  delayMs: z.number().int().positive(), // Base tick delay in paced mode
  postgameDelayMs: z.number().int().min(0), // Pause between games in paced mode
  countdownSeconds: z.number().int().min(0), // Paused-physics window before a game
  fastForward: z.boolean(), // Collapse delay once the endgame is resolvable
});

export type PacingConfig = z.infer<typeof pacingConfigSchema>;

// ============================================
// Arena Profile Schema
// ============================================

/**
 * Arena Profile - complete preset for a session
 *
 * Examples: "classic" (rock/paper/scissors), "five-elements"
 */
export const arenaProfileSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string(),
  world: worldConfigSchema,
  kinds: kindRecordSchema,
  physics: arenaPhysicsSchema,
  pacing: pacingConfigSchema,
  obstacleColor: z.string(), // Default color of obstacles without one
});

export type ArenaProfile = z.infer<typeof arenaProfileSchema>;
