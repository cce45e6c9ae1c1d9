/**
 * Headless entry point
 *
 * Usage: main.ts [session.json]
 *
 * The optional JSON file holds session settings (see sessionInputSchema).
 * Batch mode prints the outcome of each game; paced mode runs until the
 * game count is reached or the process is interrupted.
 */

import { readFileSync } from "node:fs";
import { haltSystem, startSystem } from "braided";
import { ConfigurationError } from "@/lib/errors";
import { resolveSessionConfig } from "./arena/sessionConfig";
import { modeKeywords } from "./arena/vocabulary/keywords";
import type { SessionSummary } from "./arena/vocabulary/schemas/state";
import { createArenaSystemConfig } from "./system";

function readSessionInput(path: string | undefined): unknown {
  if (path === undefined) return {};
  try {
    return JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    throw new ConfigurationError(`Failed to read session file: ${path}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }
}

function printSummary(summary: SessionSummary) {
  for (const outcome of summary.outcomes) {
    console.log(
      `[main] Game ${outcome.game}: ${outcome.winner} won in ${outcome.steps} steps (seed ${outcome.seed})`
    );
  }
}

async function main(argv: string[]) {
  const config = resolveSessionConfig(readSessionInput(argv[2]));
  const systemConfig = createArenaSystemConfig(config);
  const { system, errors } = await startSystem(systemConfig);

  if (errors.size > 0) {
    console.error("[main] System started with errors:");
    errors.forEach((error, resourceId) => {
      console.error(`  - ${resourceId}:`, error);
    });
    await haltSystem(systemConfig, system);
    process.exitCode = 1;
    return;
  }

  const stop = () => system.session.stop();
  process.once("SIGINT", stop);

  try {
    const summary =
      config.mode === modeKeywords.batch
        ? await system.session.runBatch()
        : await system.session.startPaced();
    printSummary(summary);
  } finally {
    process.off("SIGINT", stop);
    await haltSystem(systemConfig, system);
  }
}

main(process.argv).catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    console.error(`[main] ${error.message}`);
  } else {
    console.error("[main] Session failed:", error);
  }
  process.exitCode = 1;
});
