import type { StartedSystem } from "braided";
import type { SessionConfig } from "./arena/vocabulary/schemas/session";
import { createConfig } from "./resources/config";
import { engine } from "./resources/engine";
import { journal } from "./resources/journal";
import { randomness } from "./resources/randomness";
import { runtimeController } from "./resources/runtimeController";
import { runtimeStore } from "./resources/runtimeStore";
import { session } from "./resources/session";
import { time } from "./resources/time";
import { timer } from "./resources/timer";

/**
 * Resource graph of one arena session
 */
export const createArenaSystemConfig = (sessionConfig: SessionConfig) => ({
  config: createConfig(sessionConfig),
  time,
  timer,
  randomness,
  runtimeStore,
  journal,
  engine,
  runtimeController,
  session,
});

export type ArenaSystemConfig = ReturnType<typeof createArenaSystemConfig>;
export type ArenaSystem = StartedSystem<ArenaSystemConfig>;
