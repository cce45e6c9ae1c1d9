type UpdateLoopHandlers = {
  onStart: () => void;
  onStop: () => void;
  // one iteration; the next one is armed after it returns
  onUpdate: (clockDeltaMs: number) => void;
  // read on every re-arm, so a shrinking delay applies from the next tick
  getDelayMs: () => number;
};

/**
 * Timer-driven loop. Each iteration re-arms itself with the current delay;
 * iterations never overlap.
 */
export const createUpdateLoop = (handlers: UpdateLoopHandlers) => {
  let handle: ReturnType<typeof setTimeout> | null = null;
  let isRunning = false;
  let lastFrameTime = performance.now();

  const { onUpdate, onStop, onStart, getDelayMs } = handlers;

  const arm = () => {
    handle = setTimeout(update, Math.max(1, getDelayMs()));
  };

  const update = () => {
    handle = null;
    if (!isRunning) return;
    const currentTime = performance.now();
    const clockDeltaMs = currentTime - lastFrameTime;
    lastFrameTime = currentTime;
    onUpdate(clockDeltaMs);
    // onUpdate may have stopped the loop
    if (isRunning) arm();
  };

  const start = () => {
    if (isRunning) return;
    isRunning = true;
    lastFrameTime = performance.now();
    onStart();
    arm();
  };

  const stop = () => {
    if (handle !== null) {
      clearTimeout(handle);
      handle = null;
    }
    if (!isRunning) return;
    isRunning = false;
    onStop();
  };

  return {
    start,
    stop,
    isRunning: () => isRunning,
  };
};

export type UpdateLoop = ReturnType<typeof createUpdateLoop>;
