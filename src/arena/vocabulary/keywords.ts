/**
 * Vocabulary - string constants shared by schemas, handlers and executors
 */

// ============================================
// Event Keywords
// ============================================

export const eventKeywords = {
  game: {
    started: "game/started",
    ended: "game/ended",
    advanced: "game/advanced",
  },
  countdown: {
    ticked: "countdown/ticked",
  },
  arena: {
    fastForwarded: "arena/fastForwarded",
  },
  session: {
    finished: "session/finished",
  },
} as const;

// ============================================
// Effect Keywords
// ============================================

export const effectKeywords = {
  state: {
    update: "state:update",
  },
  timer: {
    schedule: "timer:schedule",
    cancel: "timer:cancel",
  },
  engine: {
    reset: "engine:reset",
  },
  journal: {
    gameEnded: "journal:gameEnded",
  },
  runtime: {
    dispatch: "runtime:dispatch",
  },
} as const;

// ============================================
// Arena observer events
// ============================================

export const arenaEventKeywords = {
  placed: "agents/placed",
  moved: "agents/moved",
  converted: "agent/converted",
} as const;

export const phaseKeywords = {
  placing: "placing",
  countdown: "countdown",
  running: "running",
  ended: "ended",
  finished: "finished",
} as const;

export const modeKeywords = {
  batch: "batch",
  paced: "paced",
} as const;

export const obstacleModeKeywords = {
  none: "none",
  random: "random",
  layout: "layout",
} as const;

export const timerKeywords = {
  countdown: "countdown",
  nextGame: "next-game",
} as const;
