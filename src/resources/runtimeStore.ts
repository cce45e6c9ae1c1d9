import { defineResource, type StartedResource } from "braided";
import type { StoreApi } from "zustand/vanilla";
import { createStore } from "zustand/vanilla";
import { phaseKeywords } from "../arena/vocabulary/keywords";
import type { RuntimeStore } from "../arena/vocabulary/schemas/state";
import type { ConfigResource } from "./config";

export type RuntimeStoreApi = StoreApi<RuntimeStore>;

export const createInitialRuntimeState = (config: ConfigResource): RuntimeStore => ({
  session: {
    phase: phaseKeywords.placing,
    seed: config.seed.initial,
    gamesPlayed: 0,
    step: 0,
    gameStartedAt: 0,
    delayMs: config.pacing.delayMs,
    fastForwardActive: false,
    countdownRemaining: 0,
  },
  outcomes: [],
});

export const runtimeStore = defineResource({
  dependencies: ["config"],
  start: ({ config }: { config: ConfigResource }) => {
    // Single source of truth for session progress; written by the
    // runtime controller's state:update executor and the session tick
    const store = createStore<RuntimeStore>()(() => createInitialRuntimeState(config));

    return { store };
  },
  halt: () => {
    // No cleanup needed for zustand store
  },
});

export type StartedRuntimeStore = StartedResource<typeof runtimeStore>;
