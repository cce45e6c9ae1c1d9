import { defineResource } from "braided";

type Timer = {
  id: string;
  delayMs: number;
  startedAt: number;
  handle: ReturnType<typeof setTimeout>;
};

export interface TimerManager {
  schedule: (id: string, delayMs: number, callback: () => void) => void;
  cancel: (id: string) => void;
  cleanup: () => void;
  /** Cancel everything and ignore later schedules */
  close: () => void;
  exists: (id: string) => boolean;
  list: () => Timer[];
}

/**
 * Named wall-clock timers. Scheduling an id that is already pending
 * replaces it; a timer forgets itself once it fires. A closed manager
 * ignores new schedules, so effects that land after a stop arm nothing.
 */
export const timer = defineResource({
  start: (): TimerManager => {
    const timers = new Map<string, Timer>();
    let closed = false;

    const manager: TimerManager = {
      schedule: (id, delayMs, callback) => {
        manager.cancel(id);
        if (closed) return;
        const handle = setTimeout(() => {
          timers.delete(id);
          callback();
        }, delayMs);
        timers.set(id, { id, delayMs, startedAt: Date.now(), handle });
      },
      cancel: (id) => {
        const pending = timers.get(id);
        if (pending) {
          clearTimeout(pending.handle);
          timers.delete(id);
        }
      },
      cleanup: () => {
        timers.forEach((pending) => clearTimeout(pending.handle));
        timers.clear();
      },
      close: () => {
        closed = true;
        manager.cleanup();
      },
      exists: (id) => timers.has(id),
      list: () => Array.from(timers.values()),
    };

    return manager;
  },
  halt: (timerManager) => {
    timerManager.close();
  },
});
