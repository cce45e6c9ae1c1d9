import { defineResource } from "braided";

/**
 * Time Resource - the only place the session reads a clock
 *
 * - `now()` is monotonic milliseconds since the system started, used for
 *   per-game elapsed time
 * - `date()` is wall-clock time, used for journal timestamps
 */
export type TimeResource = {
  now: () => number;
  date: () => Date;
};

export const time = defineResource({
  start: (): TimeResource => {
    const startedAtMs = performance.now();

    return {
      now: () => performance.now() - startedAtMs,
      date: () => new Date(),
    };
  },
  halt: () => {
    // No cleanup needed
  },
});
