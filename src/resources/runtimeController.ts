import { defineResource } from "braided";
import {
  emergentSystem,
  type EventHandlerMap,
  type EffectExecutorMap,
} from "emergent";
import { produce } from "immer";
import { MIN_DELAY_MS } from "../arena/fastForward";
import { hasReachedGameLimit, nextSeed } from "../arena/lifecycle";
import {
  effectKeywords,
  eventKeywords,
  modeKeywords,
  phaseKeywords,
  timerKeywords,
} from "../arena/vocabulary/keywords";
import type { AllEffects } from "../arena/vocabulary/schemas/effects";
import type { AllEvents } from "../arena/vocabulary/schemas/events";
import type { SessionConfig } from "../arena/vocabulary/schemas/session";
import type { RuntimeStore } from "../arena/vocabulary/schemas/state";
import type { ConfigResource } from "./config";
import type { ArenaEngine } from "./engine";
import type { Journal } from "./journal";
import type { RandomnessResource } from "./randomness";
import type { RuntimeStoreApi, StartedRuntimeStore } from "./runtimeStore";
import type { TimeResource } from "./time";
import type { TimerManager } from "./timer";

// ============================================
// Event Handlers (Pure Functions)
// ============================================

type HandlerContext = {
  config: SessionConfig;
  now: () => number;
  // seed of the game after the current one
  nextSeed: (currentSeed: number) => number;
  nextState: (
    current: RuntimeStore,
    mutation: (draft: RuntimeStore) => void
  ) => RuntimeStore;
};

const COUNTDOWN_TICK_MS = 1000;

const cancelPendingTimers = (): AllEffects[] => [
  { type: effectKeywords.timer.cancel, id: timerKeywords.countdown },
  { type: effectKeywords.timer.cancel, id: timerKeywords.nextGame },
];

const handlers = {
  [eventKeywords.game.started]: (state: RuntimeStore, event, ctx): AllEffects[] => {
    const { countdownSeconds, delayMs } = ctx.config.pacing;
    const counting = countdownSeconds > 0;

    const effects: AllEffects[] = [
      ...cancelPendingTimers(),
      { type: effectKeywords.engine.reset, seed: event.seed },
      {
        type: effectKeywords.state.update,
        state: ctx.nextState(state, (draft) => {
          draft.session.phase = counting ? phaseKeywords.countdown : phaseKeywords.running;
          draft.session.seed = event.seed;
          draft.session.step = 0;
          draft.session.gameStartedAt = ctx.now();
          draft.session.delayMs = delayMs;
          draft.session.fastForwardActive = false;
          draft.session.countdownRemaining = countdownSeconds;
        }),
      },
    ];

    if (counting) {
      effects.push({
        type: effectKeywords.timer.schedule,
        id: timerKeywords.countdown,
        delayMs: COUNTDOWN_TICK_MS,
        onExpire: { type: eventKeywords.countdown.ticked },
      });
    }

    return effects;
  },

  [eventKeywords.countdown.ticked]: (state: RuntimeStore, _event, ctx): AllEffects[] => {
    if (state.session.phase !== phaseKeywords.countdown) return [];

    const remaining = state.session.countdownRemaining - 1;
    if (remaining > 0) {
      return [
        {
          type: effectKeywords.state.update,
          state: ctx.nextState(state, (draft) => {
            draft.session.countdownRemaining = remaining;
          }),
        },
        {
          type: effectKeywords.timer.schedule,
          id: timerKeywords.countdown,
          delayMs: COUNTDOWN_TICK_MS,
          onExpire: { type: eventKeywords.countdown.ticked },
        },
      ];
    }

    // Elapsed time counts from the first physics tick
    return [
      {
        type: effectKeywords.state.update,
        state: ctx.nextState(state, (draft) => {
          draft.session.countdownRemaining = 0;
          draft.session.phase = phaseKeywords.running;
          draft.session.gameStartedAt = ctx.now();
        }),
      },
    ];
  },

  [eventKeywords.arena.fastForwarded]: (state: RuntimeStore, _event, ctx): AllEffects[] => {
    if (state.session.fastForwardActive) return [];

    return [
      {
        type: effectKeywords.state.update,
        state: ctx.nextState(state, (draft) => {
          draft.session.fastForwardActive = true;
          draft.session.delayMs = Math.min(draft.session.delayMs, MIN_DELAY_MS);
        }),
      },
    ];
  },

  [eventKeywords.game.ended]: (state: RuntimeStore, event, ctx): AllEffects[] => {
    if (state.session.phase !== phaseKeywords.running) return [];

    const gamesPlayed = state.session.gamesPlayed + 1;
    const followUp = hasReachedGameLimit(gamesPlayed, ctx.config.games)
      ? ({ type: eventKeywords.session.finished } as const)
      : ({ type: eventKeywords.game.advanced } as const);

    const effects: AllEffects[] = [
      {
        type: effectKeywords.journal.gameEnded,
        elapsedMs: event.elapsedMs,
        steps: event.steps,
      },
      {
        type: effectKeywords.state.update,
        state: ctx.nextState(state, (draft) => {
          draft.session.phase = phaseKeywords.ended;
          draft.session.gamesPlayed = gamesPlayed;
          draft.outcomes.push({
            game: gamesPlayed,
            seed: state.session.seed,
            winner: event.winner,
            steps: event.steps,
            elapsedMs: event.elapsedMs,
          });
        }),
      },
    ];

    // Batch runs go straight on; paced runs show the result first
    if (ctx.config.mode === modeKeywords.batch) {
      effects.push({ type: effectKeywords.runtime.dispatch, event: followUp });
    } else {
      effects.push({
        type: effectKeywords.timer.schedule,
        id: timerKeywords.nextGame,
        delayMs: ctx.config.pacing.postgameDelayMs,
        onExpire: followUp,
      });
    }

    return effects;
  },

  [eventKeywords.game.advanced]: (state: RuntimeStore, _event, ctx): AllEffects[] => {
    if (state.session.phase !== phaseKeywords.ended) return [];

    return [
      {
        type: effectKeywords.runtime.dispatch,
        event: {
          type: eventKeywords.game.started,
          seed: ctx.nextSeed(state.session.seed),
        },
      },
    ];
  },

  [eventKeywords.session.finished]: (state: RuntimeStore, _event, ctx): AllEffects[] => {
    return [
      ...cancelPendingTimers(),
      {
        type: effectKeywords.state.update,
        state: ctx.nextState(state, (draft) => {
          draft.session.phase = phaseKeywords.finished;
        }),
      },
    ];
  },
} satisfies EventHandlerMap<AllEvents, AllEffects, RuntimeStore, HandlerContext>;

// ============================================
// Effect Executors (Side Effects)
// ============================================

type ExecutorContext = {
  store: RuntimeStoreApi;
  timer: TimerManager;
  engine: ArenaEngine;
  randomness: RandomnessResource;
  journal: Journal;
  time: TimeResource;
};

const executors = {
  [effectKeywords.state.update]: (effect, ctx) => {
    ctx.store.setState(effect.state);
  },

  [effectKeywords.timer.schedule]: (effect, ctx) => {
    ctx.timer.schedule(effect.id, effect.delayMs, () => {
      ctx.dispatch(effect.onExpire);
    });
  },

  [effectKeywords.timer.cancel]: (effect, ctx) => {
    ctx.timer.cancel(effect.id);
  },

  [effectKeywords.engine.reset]: (effect, ctx) => {
    ctx.randomness.reseed(effect.seed);
    ctx.engine.reset();
  },

  [effectKeywords.journal.gameEnded]: (effect, ctx) => {
    ctx.journal.gameEnded(ctx.time.date(), effect.elapsedMs, effect.steps);
  },

  [effectKeywords.runtime.dispatch]: (effect, ctx) => {
    ctx.dispatch(effect.event);
  },
} satisfies EffectExecutorMap<AllEffects, AllEvents, ExecutorContext>;

// ============================================
// Runtime Controller Resource
// ============================================

type ControllerDependencies = {
  config: ConfigResource;
  runtimeStore: StartedRuntimeStore;
  timer: TimerManager;
  engine: ArenaEngine;
  randomness: RandomnessResource;
  journal: Journal;
  time: TimeResource;
};

export type RuntimeController = ReturnType<typeof createRuntimeController>;

function createRuntimeController({
  config,
  runtimeStore,
  timer,
  engine,
  randomness,
  journal,
  time,
}: ControllerDependencies) {
  const createControlLoop = emergentSystem<
    AllEvents,
    AllEffects,
    RuntimeStore,
    HandlerContext,
    ExecutorContext
  >();

  return createControlLoop({
    getState: () => runtimeStore.store.getState(),
    handlers,
    executors,
    handlerContext: {
      config,
      now: () => time.now(),
      // draws from the stream of the game that just ended
      nextSeed: (currentSeed) => nextSeed(config.seed, currentSeed, randomness.stream()),
      nextState: (current, mutation) => {
        return produce(current, mutation);
      },
    },
    executorContext: {
      store: runtimeStore.store,
      timer,
      engine,
      randomness,
      journal,
      time,
    },
  });
}

export const runtimeController = defineResource({
  dependencies: [
    "config",
    "runtimeStore",
    "timer",
    "engine",
    "randomness",
    "journal",
    "time",
  ],
  start: (dependencies: ControllerDependencies) => {
    return createRuntimeController(dependencies);
  },
  halt: (controller) => {
    controller.dispose();
  },
});
