import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { haltSystem, startSystem } from "braided";
import { afterEach, describe, expect, it, vi } from "vitest";
import { resolveSessionConfig, type ResolveOptions } from "@/arena/sessionConfig";
import type { SessionInput } from "@/arena/vocabulary/schemas/session";
import type { GameOutcome } from "@/arena/vocabulary/schemas/state";
import { createArenaSystemConfig } from "@/system";

const running: Array<() => Promise<unknown>> = [];
const tempDirs: string[] = [];

// small arenas keep one-unit games short
const tiny = { unitsPerKind: 1, width: 120, height: 120 };

async function startArena(input: SessionInput, options?: ResolveOptions) {
  const config = resolveSessionConfig({ quiet: true, ...input }, options);
  const systemConfig = createArenaSystemConfig(config);
  const { system, errors } = await startSystem(systemConfig);
  expect(errors.size).toBe(0);
  running.push(() => haltSystem(systemConfig, system));
  return { config, system };
}

function tempDir() {
  const dir = mkdtempSync(join(tmpdir(), "rps-arena-"));
  tempDirs.push(dir);
  return dir;
}

const withoutTiming = (outcomes: GameOutcome[]) =>
  outcomes.map((outcome) => ({
    game: outcome.game,
    seed: outcome.seed,
    winner: outcome.winner,
    steps: outcome.steps,
  }));

// controller effects after the first land on later turns of the event loop
const effectsSettled = () => new Promise<void>((resolve) => setImmediate(resolve));

afterEach(async () => {
  while (running.length > 0) {
    await running.pop()?.();
  }
  for (const dir of tempDirs.splice(0)) {
    rmSync(dir, { recursive: true, force: true });
  }
  vi.useRealTimers();
  vi.restoreAllMocks();
});

describe("batch sessions", () => {
  it("plays a one-unit game until a single kind holds every unit", async () => {
    const { config, system } = await startArena({ ...tiny, seed: 11 });

    const summary = await system.session.runBatch();

    expect(summary.outcomes).toHaveLength(1);
    const [outcome] = summary.outcomes;
    expect(outcome.game).toBe(1);
    expect(outcome.seed).toBe(11);
    expect(outcome.steps).toBeGreaterThan(0);
    expect(config.kinds.ids).toContain(outcome.winner);

    const counts = system.engine.counts();
    expect(counts[config.kinds.ids.indexOf(outcome.winner)]).toBe(3);
    expect([...counts].sort()).toEqual([0, 0, 3]);
    expect(system.runtimeStore.store.getState().session.phase).toBe("finished");
  });

  it("journals settings, header, counts rows and the game end", async () => {
    const { system } = await startArena({ seed: 5, unitsPerKind: 2, width: 120, height: 120 });
    const lines: string[] = [];
    system.journal.subscribe((line) => lines.push(line));

    const summary = await system.session.runBatch();
    const steps = summary.outcomes[0].steps;

    expect(lines[0]).toMatch(
      /^start=\d{4}-\d{2}-\d{2} [\d:.]+ \| size=120x120 \| units_per_kind=2 \| total_units=6 \| delay_ms=30 \| seed=5 \| kinds=paper,rock,scissors \| fast_forward=on \| num_games=1 \| blocks=none$/
    );
    expect(lines[1]).toBe("STEP,📄,🪨,✂️");
    expect(lines.at(-1)).toMatch(
      new RegExp(`^game_end at [\\d: .-]+; elapsed=\\d+\\.\\d{3}s; steps=${steps}$`)
    );

    const rows = lines.slice(2, -1).map((row) => row.split(",").map(Number));
    expect(rows.length).toBeGreaterThan(0);
    let previousStep = 0;
    for (const [step, ...counts] of rows) {
      expect(step).toBeGreaterThan(previousStep);
      expect(counts.reduce((sum, count) => sum + count, 0)).toBe(6);
      previousStep = step;
    }
    // the game ends on a tick that converted someone
    expect(previousStep).toBe(steps);
  });

  it("replays a session from its first seed and counts fixed seeds up", async () => {
    const play = async () => {
      const { system } = await startArena({ seed: 5, games: 3, unitsPerKind: 2, width: 150, height: 150 });
      return withoutTiming((await system.session.runBatch()).outcomes);
    };

    const first = await play();
    expect(first.map((outcome) => outcome.seed)).toEqual([5, 6, 7]);
    expect(first.map((outcome) => outcome.game)).toEqual([1, 2, 3]);
    expect(await play()).toEqual(first);
  });

  it("draws later seeds from the finished game without a fixed seed", async () => {
    const play = async () => {
      const { system } = await startArena({ ...tiny, games: 2 }, { randomSeed: () => 1234 });
      return (await system.session.runBatch()).outcomes.map((outcome) => outcome.seed);
    };

    const seeds = await play();
    expect(seeds[0]).toBe(1234);
    expect(Number.isInteger(seeds[1])).toBe(true);
    expect(seeds[1]).toBeGreaterThanOrEqual(1);
    expect(seeds[1]).toBeLessThanOrEqual(1_000_000);
    expect(await play()).toEqual(seeds);
  });

  it("keeps the base delay when fast-forward is off", async () => {
    const { system } = await startArena({ ...tiny, seed: 8, fastForward: false });
    await system.session.runBatch();

    const { session } = system.runtimeStore.store.getState();
    expect(session.fastForwardActive).toBe(false);
    expect(session.delayMs).toBe(30);
  });

  it("refuses to run a paced session as a batch", async () => {
    const { system } = await startArena({ ...tiny, mode: "paced" });
    await expect(system.session.runBatch()).rejects.toThrow(
      "[session] runBatch needs batch mode, got paced"
    );
  });

  it("ends a batch run early when stopped", async () => {
    const { system } = await startArena({ ...tiny, seed: 6, games: 3 });
    system.engine.watch((event) => {
      if (event.type === "agents/moved") system.session.stop();
    });

    const summary = await system.session.runBatch();

    // placement keeps units too far apart to touch after one step
    expect(summary.outcomes).toEqual([]);
    expect(system.runtimeStore.store.getState().session).toMatchObject({
      phase: "running",
      step: 1,
    });
  });
});

describe("fast-forward", () => {
  it("latches once two matched kinds are left and holds until the next game", async () => {
    const { system } = await startArena({
      seed: 21,
      games: 3,
      unitsPerKind: 3,
      width: 200,
      height: 200,
      delayMs: 30,
    });
    const store = system.runtimeStore.store;

    let game = 0;
    const firstTwoKindSteps: Array<{ game: number; step: number }> = [];
    system.engine.watch((event) => {
      if (event.type === "agents/placed") {
        game += 1;
        return;
      }
      if (event.type !== "agents/moved") return;
      if (firstTwoKindSteps.some((entry) => entry.game === game)) return;
      if (new Set(event.agents.map((unit) => unit.kind)).size === 2) {
        firstTwoKindSteps.push({ game, step: event.step });
      }
    });

    const latches: Array<{ game: number; step: number; delayMs: number }> = [];
    const midGameChanges: number[] = [];
    store.subscribe((state, previous) => {
      const now = state.session;
      const before = previous.session;
      if (now.fastForwardActive && !before.fastForwardActive) {
        latches.push({ game: now.gamesPlayed + 1, step: now.step, delayMs: now.delayMs });
      }
      const released = !now.fastForwardActive || now.delayMs !== 1;
      if (before.fastForwardActive && released && now.step !== 0) {
        midGameChanges.push(now.step);
      }
    });

    const summary = await system.session.runBatch();

    expect(summary.outcomes).toHaveLength(3);
    expect(latches.length).toBeGreaterThan(0);
    expect(latches).toEqual(firstTwoKindSteps.map((entry) => ({ ...entry, delayMs: 1 })));
    expect(midGameChanges).toEqual([]);
  });
});

describe("runtime controller", () => {
  it("latches fast-forward once", async () => {
    const { system } = await startArena({ ...tiny, seed: 1, delayMs: 40 });
    const store = system.runtimeStore.store;

    await effectsSettled();

    system.runtimeController.dispatch({ type: "arena/fastForwarded" });
    await effectsSettled();
    expect(store.getState().session).toMatchObject({ fastForwardActive: true, delayMs: 1 });

    const latched = store.getState();
    system.runtimeController.dispatch({ type: "arena/fastForwarded" });
    await effectsSettled();
    expect(store.getState()).toBe(latched);
  });
});

describe("observers", () => {
  it("keeps running when an observer throws", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const { system } = await startArena({ ...tiny, seed: 4 });
    const seen: string[] = [];
    system.engine.watch(() => {
      throw new Error("boom");
    });
    system.engine.watch((event) => seen.push(event.type));

    const summary = await system.session.runBatch();

    expect(summary.outcomes).toHaveLength(1);
    expect(warn).toHaveBeenCalledWith(
      "[engine] Observer failed on agents/placed:",
      expect.any(Error)
    );
    expect(seen[0]).toBe("agents/placed");
    expect(seen.filter((type) => type === "agents/moved")).toHaveLength(
      summary.outcomes[0].steps
    );
  });

  it("stops watching after unsubscribe", async () => {
    const { system } = await startArena({ ...tiny, seed: 4 });
    const observer = vi.fn();
    const unwatch = system.engine.watch(observer);
    unwatch();

    await system.session.runBatch();
    expect(observer).not.toHaveBeenCalled();
  });
});

describe("journal output", () => {
  it("appends every line to the log file", async () => {
    const logFile = join(tempDir(), "arena.log");
    const { system } = await startArena({ ...tiny, seed: 2, logFile });
    const lines: string[] = [];
    system.journal.subscribe((line) => lines.push(line));

    await system.session.runBatch();

    expect(readFileSync(logFile, "utf8")).toBe(lines.map((line) => `${line}\n`).join(""));
  });

  it("reports an unwritable log file once and keeps going", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const logFile = join(tempDir(), "missing", "arena.log");
    const { system } = await startArena({ ...tiny, seed: 2, logFile });
    const lines: string[] = [];
    system.journal.subscribe((line) => lines.push(line));

    const summary = await system.session.runBatch();

    expect(summary.outcomes).toHaveLength(1);
    expect(lines.length).toBeGreaterThanOrEqual(3);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toBe(`[journal] Failed to write ${logFile}:`);
  });

  it("keeps going when a line subscriber throws", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const { system } = await startArena({ ...tiny, seed: 2 });
    system.journal.subscribe(() => {
      throw new Error("sink down");
    });
    const lines: string[] = [];
    system.journal.subscribe((line) => lines.push(line));

    const summary = await system.session.runBatch();

    expect(summary.outcomes).toHaveLength(1);
    expect(lines[1]).toBe("STEP,📄,🪨,✂️");
    expect(warn).toHaveBeenCalledTimes(lines.length);
    expect(warn).toHaveBeenCalledWith("[journal] Subscriber failed:", expect.any(Error));
  });

  it("prints lines unless quiet", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const { system } = await startArena({ ...tiny, seed: 2, quiet: false });

    await system.session.runBatch();

    expect(log).toHaveBeenCalledWith("STEP,📄,🪨,✂️");
  });
});

describe("paced sessions", () => {
  it("counts down, plays, pauses after the game and finishes", async () => {
    vi.useFakeTimers();
    const { system } = await startArena({
      ...tiny,
      mode: "paced",
      seed: 3,
      games: 1,
      delayMs: 5,
      countdownSeconds: 2,
      postgameDelayMs: 10_000,
    });
    const store = system.runtimeStore.store;

    const done = system.session.startPaced();
    await vi.advanceTimersByTimeAsync(0);
    expect(store.getState().session).toMatchObject({
      phase: "countdown",
      countdownRemaining: 2,
      step: 0,
    });

    await vi.advanceTimersByTimeAsync(1000);
    expect(store.getState().session).toMatchObject({
      phase: "countdown",
      countdownRemaining: 1,
      step: 0,
    });

    await vi.advanceTimersByTimeAsync(1000);
    expect(store.getState().session).toMatchObject({
      phase: "running",
      countdownRemaining: 0,
    });

    for (let i = 0; i < 100_000 && store.getState().session.phase === "running"; i++) {
      await vi.advanceTimersByTimeAsync(10);
    }
    expect(store.getState().session.phase).toBe("ended");
    expect(store.getState().outcomes).toHaveLength(1);

    // the game ended within the last 10 ms
    await vi.advanceTimersByTimeAsync(9_000);
    expect(store.getState().session.phase).toBe("ended");

    await vi.advanceTimersByTimeAsync(1_000);
    await vi.advanceTimersByTimeAsync(1);
    expect(store.getState().session.phase).toBe("finished");

    const summary = await done;
    expect(summary.outcomes).toHaveLength(1);
    expect(summary.outcomes[0].seed).toBe(3);
    expect(system.timer.list()).toEqual([]);
  });

  it("arms no timer when stopped right after starting", async () => {
    vi.useFakeTimers();
    const { system } = await startArena({ ...tiny, mode: "paced", seed: 3, countdownSeconds: 5 });
    const store = system.runtimeStore.store;

    const done = system.session.startPaced();
    system.session.stop();
    expect(await done).toEqual({ outcomes: [] });

    await vi.advanceTimersByTimeAsync(10_000);
    expect(system.timer.list()).toEqual([]);
    expect(store.getState().session).toMatchObject({ step: 0, countdownRemaining: 5 });
  });

  it("cancels a pending countdown when stopped", async () => {
    vi.useFakeTimers();
    const { system } = await startArena({ ...tiny, mode: "paced", seed: 3, countdownSeconds: 5 });
    const store = system.runtimeStore.store;

    const done = system.session.startPaced();
    await vi.advanceTimersByTimeAsync(1000);
    expect(system.timer.exists("countdown")).toBe(true);
    expect(store.getState().session.countdownRemaining).toBe(4);

    system.session.stop();
    expect(system.timer.list()).toEqual([]);
    expect(await done).toEqual({ outcomes: [] });

    await vi.advanceTimersByTimeAsync(10_000);
    expect(store.getState().session).toMatchObject({
      phase: "countdown",
      step: 0,
      countdownRemaining: 4,
    });
  });
});
