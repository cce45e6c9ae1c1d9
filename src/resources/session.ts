import { setImmediate as nextTurn } from "node:timers/promises";
import { defineResource } from "braided";
import { createUpdateLoop } from "@/lib/updateLoop";
import { evaluateFastForward } from "../arena/fastForward";
import { isGameOver } from "../arena/lifecycle";
import { eventKeywords, modeKeywords, phaseKeywords } from "../arena/vocabulary/keywords";
import type { SessionState, SessionSummary } from "../arena/vocabulary/schemas/state";
import type { ConfigResource } from "./config";
import type { ArenaEngine } from "./engine";
import type { Journal } from "./journal";
import type { RuntimeController } from "./runtimeController";
import type { StartedRuntimeStore } from "./runtimeStore";
import type { TimeResource } from "./time";
import type { TimerManager } from "./timer";

type TickResult = "idle" | "stepped" | "fastForwarded" | "ended";

// event loop turns to wait for a transition before calling the run stalled
const SETTLE_TURNS = 10_000;

const isLive = (session: SessionState) =>
  session.phase === phaseKeywords.running || session.phase === phaseKeywords.finished;

export type Session = {
  /** One physics tick; does nothing outside the running phase */
  tick: () => void;
  /** Play every configured game back to back and return the outcomes */
  runBatch: () => Promise<SessionSummary>;
  /** Tick on a timer; resolves when the game count is reached or on stop */
  startPaced: () => Promise<SessionSummary>;
  stop: () => void;
  summary: () => SessionSummary;
};

/**
 * Session - drives games through the runtime controller
 *
 * Per tick while running: step counter, arena step, counts row when
 * something converted, fast-forward check, end check. Every phase change
 * goes through an event so timers and the store stay consistent.
 *
 * Controller effects land asynchronously, so the batch loop waits for each
 * transition to show up in the store before it ticks again.
 */
export const session = defineResource({
  dependencies: ["config", "runtimeStore", "runtimeController", "engine", "journal", "time", "timer"],
  start: ({
    config,
    runtimeStore,
    runtimeController,
    engine,
    journal,
    time,
    timer,
  }: {
    config: ConfigResource;
    runtimeStore: StartedRuntimeStore;
    runtimeController: RuntimeController;
    engine: ArenaEngine;
    journal: Journal;
    time: TimeResource;
    timer: TimerManager;
  }): Session => {
    const store = runtimeStore.store;
    let begun = false;
    let stopped = false;
    let settle: (() => void) | null = null;
    let pending: Promise<SessionSummary> | null = null;

    const summary = (): SessionSummary => ({
      outcomes: [...store.getState().outcomes],
    });

    const begin = () => {
      if (begun) return;
      begun = true;
      journal.settings(time.date());
      journal.header();
      runtimeController.dispatch({
        type: eventKeywords.game.started,
        seed: config.seed.initial,
      });
    };

    const advance = (): TickResult => {
      const current = store.getState().session;
      if (current.phase !== phaseKeywords.running) return "idle";

      const step = current.step + 1;
      const report = engine.step(step);
      store.setState({ session: { ...current, step } });

      if (report.conversions.length > 0) {
        journal.counts(step, engine.counts());
      }

      const fastForward = evaluateFastForward(
        { active: current.fastForwardActive, delayMs: current.delayMs },
        report.kindsPresent,
        config.kinds,
        config.pacing.fastForward
      );
      if (fastForward.active && !current.fastForwardActive) {
        runtimeController.dispatch({ type: eventKeywords.arena.fastForwarded });
        return "fastForwarded";
      }

      if (isGameOver(report.kindsPresent)) {
        const survivor = report.kindsPresent[0];
        runtimeController.dispatch({
          type: eventKeywords.game.ended,
          winner: config.kinds.ids[survivor],
          steps: step,
          elapsedMs: time.now() - current.gameStartedAt,
        });
        return "ended";
      }

      return "stepped";
    };

    const tick = () => {
      advance();
    };

    const awaitTransition = async (ready: (session: SessionState) => boolean) => {
      for (let turn = 0; turn < SETTLE_TURNS; turn++) {
        if (stopped || ready(store.getState().session)) return;
        await nextTurn();
      }
      throw new Error(
        `[session] Batch run stalled in phase ${store.getState().session.phase}`
      );
    };

    const runBatch = async (): Promise<SessionSummary> => {
      if (config.mode !== modeKeywords.batch) {
        throw new Error(`[session] runBatch needs batch mode, got ${config.mode}`);
      }
      if (config.games === 0) {
        throw new Error("[session] runBatch needs a finite game count");
      }

      begin();
      await awaitTransition(isLive);
      while (!stopped && store.getState().session.phase !== phaseKeywords.finished) {
        const played = store.getState().session.gamesPlayed;
        const result = advance();
        if (result === "idle") {
          throw new Error(
            `[session] Batch run stalled in phase ${store.getState().session.phase}`
          );
        }
        if (result === "fastForwarded") {
          await awaitTransition((session) => session.fastForwardActive);
        } else if (result === "ended") {
          // the next game is placed, or the session is finished
          await awaitTransition((session) => session.gamesPlayed > played && isLive(session));
        }
      }
      return summary();
    };

    const loop = createUpdateLoop({
      onStart: begin,
      onStop: () => {
        settle?.();
      },
      onUpdate: tick,
      getDelayMs: () => store.getState().session.delayMs,
    });

    const startPaced = (): Promise<SessionSummary> => {
      if (pending) return pending;

      pending = new Promise<SessionSummary>((resolve) => {
        const unsubscribe = store.subscribe((state) => {
          if (state.session.phase === phaseKeywords.finished) loop.stop();
        });
        settle = () => {
          settle = null;
          unsubscribe();
          resolve(summary());
        };
      });

      loop.start();
      return pending;
    };

    const stop = () => {
      stopped = true;
      loop.stop();
      timer.close();
    };

    return { tick, runBatch, startPaced, stop, summary };
  },
  halt: (started) => {
    started.stop();
  },
});
