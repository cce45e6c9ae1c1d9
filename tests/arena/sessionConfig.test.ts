import { describe, expect, it } from "vitest";
import {
  loadObstacleLayout,
  resolveObstacleSource,
  resolveSessionConfig,
} from "@/arena/sessionConfig";
import { ConfigurationError } from "@/lib/errors";

const fixedSeed = { randomSeed: () => 99 };

function configurationError(run: () => unknown): ConfigurationError {
  try {
    run();
  } catch (error) {
    if (error instanceof ConfigurationError) return error;
    throw error;
  }
  throw new Error("expected a ConfigurationError");
}

describe("resolveSessionConfig", () => {
  it("fills everything from the classic profile", () => {
    const config = resolveSessionConfig({}, fixedSeed);

    expect(config.profileId).toBe("classic");
    expect(config.mode).toBe("batch");
    expect(config.world).toEqual({ width: 800, height: 800, unitsPerKind: 50 });
    expect(config.kinds.ids).toEqual(["paper", "rock", "scissors"]);
    expect(config.pacing).toEqual({
      delayMs: 30,
      postgameDelayMs: 5000,
      countdownSeconds: 0,
      fastForward: true,
    });
    expect(config.seed).toEqual({ fixed: null, initial: 99 });
    expect(config.obstacles).toEqual({ mode: "none" });
    expect(config.obstacleColor).toBe("white");
    expect(config.journal).toEqual({ logFile: null, quiet: false });
  });

  it("plays a single game in batch mode when the count is unlimited", () => {
    expect(resolveSessionConfig({ mode: "batch", games: 0 }).games).toBe(1);
    expect(resolveSessionConfig({ mode: "paced", games: 0 }).games).toBe(0);
    expect(resolveSessionConfig({ mode: "batch", games: 4 }).games).toBe(4);
  });

  it("raises units per kind and delay to their minimums", () => {
    const config = resolveSessionConfig({ unitsPerKind: 0, delayMs: -10 });
    expect(config.world.unitsPerKind).toBe(1);
    expect(config.pacing.delayMs).toBe(1);
  });

  it("keeps the countdown only in paced mode", () => {
    expect(resolveSessionConfig({ mode: "paced", countdownSeconds: 3 }).pacing.countdownSeconds).toBe(3);
    expect(resolveSessionConfig({ mode: "batch", countdownSeconds: 3 }).pacing.countdownSeconds).toBe(0);
  });

  it("uses a fixed seed as the first game's seed", () => {
    expect(resolveSessionConfig({ seed: 1234 }, fixedSeed).seed).toEqual({
      fixed: 1234,
      initial: 1234,
    });
  });

  it("loads another profile", () => {
    const config = resolveSessionConfig({ profile: "five-elements" });
    expect(config.kinds.ids).toEqual(["earth", "fire", "metal", "water", "wood"]);
    expect(config.obstacleColor).toBe("gray");
  });

  it("rejects an unknown profile", () => {
    expect(() => resolveSessionConfig({ profile: "lizard-spock" })).toThrow(
      "Profile not found: lizard-spock. Available profiles: classic, five-elements"
    );
  });

  it("rejects unknown settings and wrong types", () => {
    expect(() => resolveSessionConfig({ bogus: true })).toThrow(ConfigurationError);
    expect(() => resolveSessionConfig({ games: -1 })).toThrow(ConfigurationError);
    expect(() => resolveSessionConfig({ mode: "turbo" })).toThrow(ConfigurationError);
  });

  it("rejects an arena too small to place agents in", () => {
    const error = configurationError(() => resolveSessionConfig({ width: 30 }));
    expect(error.issues).toEqual(["width must be greater than 32"]);
  });
});

describe("obstacle settings", () => {
  it("reads counts given as numbers or digit strings", () => {
    expect(resolveObstacleSource(0, "white")).toEqual({ mode: "none" });
    expect(resolveObstacleSource(4, "white")).toEqual({ mode: "random", count: 4, color: "white" });
    expect(resolveObstacleSource(" 5 ", "red")).toEqual({ mode: "random", count: 5, color: "red" });
  });

  it("uses the profile color for random obstacles unless one is given", () => {
    expect(resolveSessionConfig({ blocks: 2 }).obstacles).toEqual({
      mode: "random",
      count: 2,
      color: "white",
    });
    expect(resolveSessionConfig({ blocks: 2, obstacleColor: "teal" }).obstacles).toEqual({
      mode: "random",
      count: 2,
      color: "teal",
    });
  });

  it("loads a layout file", () => {
    const layout = JSON.stringify({ blocks: [{ top: 10, left: 20, width: 30, height: 40 }] });
    const config = resolveSessionConfig({ blocks: "maze.json" }, { readFile: () => layout });
    expect(config.obstacles).toEqual({
      mode: "layout",
      source: "maze.json",
      obstacles: [{ x1: 20, y1: 10, x2: 50, y2: 50 }],
    });
  });

  it("accepts an inline layout", () => {
    const config = resolveSessionConfig({
      blocks: { blocks: [{ top: 1, left: 2, width: 3, height: 4, color: "red" }] },
    });
    expect(config.obstacles).toEqual({
      mode: "layout",
      source: "inline",
      obstacles: [{ x1: 2, y1: 1, x2: 5, y2: 5, color: "red" }],
    });
  });

  it("names the offending block field", () => {
    const error = configurationError(() =>
      resolveSessionConfig({
        blocks: {
          blocks: [
            { top: 1, left: 1, width: 5, height: 5 },
            { top: 1, left: 1, width: 0, height: 5 },
            { top: 1, left: 1, width: 5 },
          ],
        },
      })
    );
    expect(error.message.startsWith("Invalid obstacle layout (inline)")).toBe(true);
    expect(error.issues).toEqual([
      "blocks[1].width must be a positive integer",
      "blocks[2].height is required",
    ]);
  });

  it("reports a missing file", () => {
    const readFile = () => {
      throw new Error("ENOENT: no such file or directory");
    };
    const error = configurationError(() => loadObstacleLayout("missing.json", readFile));
    expect(error.issues).toEqual(["ENOENT: no such file or directory"]);
    expect(error.message.startsWith(
      "Obstacle layout must be an integer or a readable JSON file: missing.json"
    )).toBe(true);
  });

  it("reports a file that is not JSON", () => {
    expect(() => loadObstacleLayout("broken.json", () => "{ blocks: ")).toThrow(
      "Failed to parse obstacle layout: broken.json"
    );
  });
});
