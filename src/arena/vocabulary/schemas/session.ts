import { z } from "zod";
import { defaultProfileId } from "../../../profiles";
import { modeKeywords } from "../keywords";
import type { KindTable } from "../../kinds";
import type { ObstacleSource } from "./prelude";
import type { ArenaPhysics, PacingConfig, WorldConfig } from "./world";

/**
 * Session Schemas - what a caller may ask for, and what the engine runs with
 */

export const sessionModeSchema = z.enum([modeKeywords.batch, modeKeywords.paced]);

export type SessionMode = z.infer<typeof sessionModeSchema>;

/**
 * Session Input - user-facing settings, every field optional
 *
 * Profile values are the defaults; anything set here overrides them.
 * `blocks` is 0 (none), a count of random obstacles, a path to a layout
 * file, or an inline layout.
 */
export const sessionInputSchema = z.strictObject({
  profile: z.string().default(defaultProfileId),
  mode: sessionModeSchema.default(modeKeywords.batch),
  width: z.number().int().positive().optional(),
  height: z.number().int().positive().optional(),
  unitsPerKind: z.number().int().optional(), // < 1 is raised to 1
  delayMs: z.number().int().optional(), // <= 0 is raised to 1
  seed: z.number().int().nullable().default(null), // null = random seeds
  games: z.number().int().min(0).default(0), // 0 = unlimited
  fastForward: z.boolean().optional(),
  countdownSeconds: z.number().int().min(0).optional(),
  postgameDelayMs: z.number().int().min(0).optional(),
  // inline layouts are validated by the layout loader
  blocks: z
    .union([
      z.number().int().min(0),
      z.string().min(1),
      z.record(z.string(), z.unknown()),
    ])
    .default(0),
  obstacleColor: z.string().optional(),
  logFile: z.string().nullable().default(null),
  quiet: z.boolean().default(false),
});

export type SessionInput = z.input<typeof sessionInputSchema>;
export type ParsedSessionInput = z.output<typeof sessionInputSchema>;

export type SeedPolicy = {
  fixed: number | null; // games use fixed, fixed + 1, ...
  initial: number; // seed of the first game
};

export type JournalOptions = {
  logFile: string | null;
  quiet: boolean;
};

/**
 * Resolved configuration the system runs with
 */
export type SessionConfig = {
  profileId: string;
  mode: SessionMode;
  world: WorldConfig;
  kinds: KindTable;
  physics: ArenaPhysics;
  pacing: PacingConfig;
  seed: SeedPolicy;
  games: number;
  obstacles: ObstacleSource;
  obstacleColor: string;
  journal: JournalOptions;
};
