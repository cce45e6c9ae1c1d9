import { defineResource } from "braided";
import { createSubscription } from "@/lib/state";
import { createArena, type TickReport } from "../arena/arena";
import { countByKind } from "../arena/kinds";
import { arenaEventKeywords } from "../arena/vocabulary/keywords";
import type { Agent, Obstacle } from "../arena/vocabulary/schemas/prelude";
import type { ConfigResource } from "./config";
import type { RandomnessResource } from "./randomness";

/**
 * What observers (renderers) see. Payloads are live views of the arena;
 * observers read them and never write.
 */
export type ArenaEvent =
  | {
      type: typeof arenaEventKeywords.placed;
      agents: ReadonlyArray<Agent>;
      obstacles: ReadonlyArray<Obstacle>;
    }
  | {
      type: typeof arenaEventKeywords.moved;
      step: number;
      agents: ReadonlyArray<Agent>;
    }
  | {
      type: typeof arenaEventKeywords.converted;
      step: number;
      index: number;
      from: string; // Kind id
      to: string;
    };

export type ArenaObserver = (event: ArenaEvent) => void;

export type ArenaEngine = {
  agents: ReadonlyArray<Agent>;
  getObstacles: () => ReadonlyArray<Obstacle>;
  /** Rebuild obstacles and agents from the current random stream */
  reset: () => void;
  /** One tick; `step` is the game's tick number, passed on to observers */
  step: (step: number) => TickReport;
  counts: () => number[];
  watch: (observer: ArenaObserver) => () => void;
};

export const engine = defineResource({
  dependencies: ["config", "randomness"],
  start: ({
    config,
    randomness,
  }: {
    config: ConfigResource;
    randomness: RandomnessResource;
  }): ArenaEngine => {
    const arena = createArena({
      world: config.world,
      kinds: config.kinds,
      physics: config.physics,
      obstacles: config.obstacles,
      obstacleColor: config.obstacleColor,
    });
    const events = createSubscription<ArenaEvent>();

    const watch = (observer: ArenaObserver) =>
      events.subscribe((event) => {
        try {
          observer(event);
        } catch (error) {
          console.warn(`[engine] Observer failed on ${event.type}:`, error);
        }
      });

    const reset = () => {
      arena.reset(randomness.stream());
      events.notify({
        type: arenaEventKeywords.placed,
        agents: arena.agents,
        obstacles: arena.getObstacles(),
      });
    };

    const step = (tick: number): TickReport => {
      const report = arena.step(randomness.stream());
      if (events.size() > 0) {
        for (const conversion of report.conversions) {
          events.notify({
            type: arenaEventKeywords.converted,
            step: tick,
            index: conversion.index,
            from: config.kinds.ids[conversion.from],
            to: config.kinds.ids[conversion.to],
          });
        }
        events.notify({ type: arenaEventKeywords.moved, step: tick, agents: arena.agents });
      }
      return report;
    };

    return {
      agents: arena.agents,
      getObstacles: arena.getObstacles,
      reset,
      step,
      counts: () => countByKind(arena.agents, config.kinds),
      watch,
    };
  },
  halt: () => {
    // Observers are owned by their callers
  },
});
