import { readFileSync } from "node:fs";
import { ConfigurationError, fromZodError } from "@/lib/errors";
import { generateRandomSeed } from "@/lib/seededRandom";
import { getProfile } from "../profiles";
import { MIN_DELAY_MS } from "./fastForward";
import { compileKindTable } from "./kinds";
import { obstaclesFromLayout } from "./obstacles";
import { PLACEMENT_CONSTANTS } from "./placement";
import { modeKeywords, obstacleModeKeywords } from "./vocabulary/keywords";
import {
  obstacleLayoutSchema,
  type Obstacle,
  type ObstacleSource,
} from "./vocabulary/schemas/prelude";
import {
  sessionInputSchema,
  type SessionConfig,
} from "./vocabulary/schemas/session";

export type ResolveOptions = {
  readFile?: (path: string) => string;
  randomSeed?: () => number;
};

const readUtf8 = (path: string) => readFileSync(path, "utf8");

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Validate a parsed layout document and convert it to rectangles
 */
export function parseObstacleLayout(data: unknown, source: string): Obstacle[] {
  const result = obstacleLayoutSchema.safeParse(data);
  if (!result.success) {
    throw fromZodError(`Invalid obstacle layout (${source})`, result.error);
  }
  return obstaclesFromLayout(result.data.blocks);
}

/**
 * Read and validate a layout file
 */
export function loadObstacleLayout(
  path: string,
  readFile: (path: string) => string = readUtf8
): Obstacle[] {
  let raw: string;
  try {
    raw = readFile(path);
  } catch (error) {
    throw new ConfigurationError(
      `Obstacle layout must be an integer or a readable JSON file: ${path}`,
      [errorMessage(error)]
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Failed to parse obstacle layout: ${path}`, [
      errorMessage(error),
    ]);
  }

  return parseObstacleLayout(data, path);
}

/**
 * Interpret the `blocks` setting
 *
 * 0 → none, N → N random obstacles per game, "N" → same, other strings →
 * layout file path, object → inline layout.
 */
export function resolveObstacleSource(
  blocks: number | string | Record<string, unknown>,
  color: string,
  readFile: (path: string) => string = readUtf8
): ObstacleSource {
  if (typeof blocks === "string" && /^\s*\d+\s*$/.test(blocks)) {
    return resolveObstacleSource(Number.parseInt(blocks, 10), color, readFile);
  }
  if (typeof blocks === "number") {
    return blocks > 0
      ? { mode: obstacleModeKeywords.random, count: blocks, color }
      : { mode: obstacleModeKeywords.none };
  }
  if (typeof blocks === "string") {
    return {
      mode: obstacleModeKeywords.layout,
      source: blocks,
      obstacles: loadObstacleLayout(blocks, readFile),
    };
  }
  return {
    mode: obstacleModeKeywords.layout,
    source: "inline",
    obstacles: parseObstacleLayout(blocks, "inline"),
  };
}

/**
 * Turn user settings into the configuration the system runs with
 *
 * Throws ConfigurationError before any simulation state exists.
 */
export function resolveSessionConfig(
  input: unknown = {},
  options: ResolveOptions = {}
): SessionConfig {
  const parsed = sessionInputSchema.safeParse(input);
  if (!parsed.success) {
    throw fromZodError("Invalid session settings", parsed.error);
  }

  const settings = parsed.data;
  const profile = getProfile(settings.profile);
  const kinds = compileKindTable(profile.kinds);
  const physics = profile.physics;

  const world = {
    width: settings.width ?? profile.world.width,
    height: settings.height ?? profile.world.height,
    unitsPerKind: Math.max(1, settings.unitsPerKind ?? profile.world.unitsPerKind),
  };

  // placement samples from [r + 2, size - r - 2]
  const minSide = 2 * (physics.radius + PLACEMENT_CONSTANTS.EDGE_CLEARANCE);
  const issues: string[] = [];
  if (world.width <= minSide) issues.push(`width must be greater than ${minSide}`);
  if (world.height <= minSide) issues.push(`height must be greater than ${minSide}`);
  if (issues.length > 0) {
    throw new ConfigurationError("Invalid session settings", issues);
  }

  const batch = settings.mode === modeKeywords.batch;
  const pacing = {
    delayMs: Math.max(MIN_DELAY_MS, settings.delayMs ?? profile.pacing.delayMs),
    postgameDelayMs: settings.postgameDelayMs ?? profile.pacing.postgameDelayMs,
    // batch runs have no countdown
    countdownSeconds: batch
      ? 0
      : settings.countdownSeconds ?? profile.pacing.countdownSeconds,
    fastForward: settings.fastForward ?? profile.pacing.fastForward,
  };

  const obstacleColor = settings.obstacleColor ?? profile.obstacleColor;
  const randomSeed = options.randomSeed ?? generateRandomSeed;

  return {
    profileId: profile.id,
    mode: settings.mode,
    world,
    kinds,
    physics,
    pacing,
    seed: {
      fixed: settings.seed,
      initial: settings.seed ?? randomSeed(),
    },
    // an unbounded batch run would never return
    games: batch && settings.games === 0 ? 1 : settings.games,
    obstacles: resolveObstacleSource(settings.blocks, obstacleColor, options.readFile),
    obstacleColor,
    journal: {
      logFile: settings.logFile,
      quiet: settings.quiet,
    },
  };
}
