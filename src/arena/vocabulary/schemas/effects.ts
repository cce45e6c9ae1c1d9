import { z } from "zod";
import { effectKeywords } from "../keywords";
import { allEventSchema } from "./events";
import { runtimeStoreSchema } from "./state";

/**
 * Effect Schemas - side effects produced by event handlers
 *
 * Handlers stay pure and return these; executors perform them.
 */

export const controlEffectSchemas = {
  // Merge into the runtime store
  stateUpdate: z.object({
    type: z.literal(effectKeywords.state.update),
    state: runtimeStoreSchema.partial(),
  }),
  // Dispatch `onExpire` after `delayMs` of wall-clock time
  timerSchedule: z.object({
    type: z.literal(effectKeywords.timer.schedule),
    id: z.string(),
    delayMs: z.number(),
    onExpire: allEventSchema,
  }),
  timerCancel: z.object({
    type: z.literal(effectKeywords.timer.cancel),
    id: z.string(),
  }),
  // Reseed and rebuild the arena for a new game
  engineReset: z.object({
    type: z.literal(effectKeywords.engine.reset),
    seed: z.number(),
  }),
  journalGameEnded: z.object({
    type: z.literal(effectKeywords.journal.gameEnded),
    elapsedMs: z.number(),
    steps: z.number(),
  }),
};

export const controlEffectSchema = z.discriminatedUnion("type", [
  controlEffectSchemas.stateUpdate,
  controlEffectSchemas.timerSchedule,
  controlEffectSchemas.timerCancel,
  controlEffectSchemas.engineReset,
  controlEffectSchemas.journalGameEnded,
]);

export type ControlEffect = z.infer<typeof controlEffectSchema>;

export const runtimeEffectSchemas = {
  dispatch: z.object({
    type: z.literal(effectKeywords.runtime.dispatch),
    event: allEventSchema,
  }),
};

export const runtimeEffectSchema = z.discriminatedUnion("type", [
  runtimeEffectSchemas.dispatch,
]);

export const allEffectSchema = z.union([controlEffectSchema, runtimeEffectSchema]);

export type RuntimeEffect = z.infer<typeof runtimeEffectSchemas.dispatch>;
export type AllEffects = z.infer<typeof allEffectSchema>;
