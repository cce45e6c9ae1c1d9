import { z } from "zod";
import { phaseKeywords } from "../keywords";

/**
 * State Schemas - the runtime store
 *
 * **session** - changes every tick (step) or every game (seed, phase, pacing)
 * **outcomes** - append-only record of finished games
 */

export const phaseSchema = z.enum([
  phaseKeywords.placing, // Arena being rebuilt
  phaseKeywords.countdown, // Placed, physics paused
  phaseKeywords.running, // Ticking
  phaseKeywords.ended, // One kind left, waiting for the next game
  phaseKeywords.finished, // Game count reached
]);

export type Phase = z.infer<typeof phaseSchema>;

export const sessionStateSchema = z.object({
  phase: phaseSchema,
  seed: z.number(), // Seed of the current game
  gamesPlayed: z.number(), // Completed games
  step: z.number(), // Ticks of the current game
  gameStartedAt: z.number(), // Clock origin of the current game (ms)
  delayMs: z.number(), // Current tick delay
  fastForwardActive: z.boolean(), // One-way latch per game
  countdownRemaining: z.number(), // Seconds left before physics starts
});

export type SessionState = z.infer<typeof sessionStateSchema>;

export const gameOutcomeSchema = z.object({
  game: z.number(), // 1-based
  seed: z.number(),
  winner: z.string(), // Kind id of the survivor
  steps: z.number(),
  elapsedMs: z.number(),
});

export type GameOutcome = z.infer<typeof gameOutcomeSchema>;

export const runtimeStoreSchema = z.object({
  session: sessionStateSchema,
  outcomes: z.array(gameOutcomeSchema),
});

export type RuntimeStore = z.infer<typeof runtimeStoreSchema>;

export type SessionSummary = {
  outcomes: GameOutcome[];
};
