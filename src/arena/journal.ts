import { describeObstacleSource } from "./obstacles";
import type { SessionConfig } from "./vocabulary/schemas/session";

/**
 * Journal line formats
 *
 * settings, header, one counts row per tick with a conversion, and one
 * game-end line per game.
 */

export function formatTimestamp(date: Date): string {
  return date.toISOString().replace("T", " ").replace("Z", "");
}

export function formatSettingsLine(config: SessionConfig, startedAt: Date): string {
  const { world, kinds, pacing } = config;
  const totalUnits = world.unitsPerKind * kinds.ids.length;
  const seed = config.seed.fixed !== null ? String(config.seed.fixed) : "random";

  return [
    `start=${formatTimestamp(startedAt)}`,
    `size=${world.width}x${world.height}`,
    `units_per_kind=${world.unitsPerKind}`,
    `total_units=${totalUnits}`,
    `delay_ms=${pacing.delayMs}`,
    `seed=${seed}`,
    `kinds=${kinds.ids.join(",")}`,
    `fast_forward=${pacing.fastForward ? "on" : "off"}`,
    `num_games=${config.games}`,
    `blocks=${describeObstacleSource(config.obstacles)}`,
  ].join(" | ");
}

export function formatHeaderLine(labels: ReadonlyArray<string>): string {
  return ["STEP", ...labels].join(",");
}

export function formatCountsLine(step: number, counts: ReadonlyArray<number>): string {
  return [step, ...counts].join(",");
}

export function formatGameEndLine(
  endedAt: Date,
  elapsedMs: number,
  steps: number
): string {
  const elapsed = (elapsedMs / 1000).toFixed(3);
  return `game_end at ${formatTimestamp(endedAt)}; elapsed=${elapsed}s; steps=${steps}`;
}
