import { isResolvableMatchup, type KindTable } from "./kinds";

export const MIN_DELAY_MS = 1;

export type FastForwardState = {
  active: boolean;
  delayMs: number;
};

/**
 * Fast-forward latch
 *
 * Once two directly matched kinds are all that is left the outcome is
 * settled, so the tick delay drops to MIN_DELAY_MS. The latch only turns
 * on; a new game resets it.
 */
export function evaluateFastForward(
  state: FastForwardState,
  present: ReadonlyArray<number>,
  table: KindTable,
  enabled: boolean
): FastForwardState {
  if (!enabled || state.active) return state;
  if (!isResolvableMatchup(present, table)) return state;
  return { active: true, delayMs: Math.min(state.delayMs, MIN_DELAY_MS) };
}
