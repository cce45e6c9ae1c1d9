import { z } from "zod";
import { eventKeywords } from "../keywords";

/**
 * Event Schemas - messages that drive the session lifecycle
 *
 * Dispatched by the session driver (game start, end, fast-forward) and by
 * expiring timers (countdown, next game). Handled by the runtime controller.
 */

// ============================================
// Game Events
// ============================================

export const gameEventSchemas = {
  // A game is about to be placed with this seed
  started: z.object({
    type: z.literal(eventKeywords.game.started),
    seed: z.number(),
  }),
  // One kind is left
  ended: z.object({
    type: z.literal(eventKeywords.game.ended),
    winner: z.string(), // Kind id
    steps: z.number(),
    elapsedMs: z.number(),
  }),
  // Post-game pause is over, pick the next seed
  advanced: z.object({
    type: z.literal(eventKeywords.game.advanced),
  }),
};

// ============================================
// Pacing Events
// ============================================

export const pacingEventSchemas = {
  // One second of countdown elapsed
  countdownTicked: z.object({
    type: z.literal(eventKeywords.countdown.ticked),
  }),
  // Only a directly resolvable pair of kinds is left
  fastForwarded: z.object({
    type: z.literal(eventKeywords.arena.fastForwarded),
  }),
};

export const sessionEventSchemas = {
  finished: z.object({
    type: z.literal(eventKeywords.session.finished),
  }),
};

export const allEventSchema = z.discriminatedUnion("type", [
  gameEventSchemas.started,
  gameEventSchemas.ended,
  gameEventSchemas.advanced,
  pacingEventSchemas.countdownTicked,
  pacingEventSchemas.fastForwarded,
  sessionEventSchemas.finished,
]);

export type AllEvents = z.infer<typeof allEventSchema>;
export type GameStartedEvent = z.infer<typeof gameEventSchemas.started>;
export type GameEndedEvent = z.infer<typeof gameEventSchemas.ended>;
