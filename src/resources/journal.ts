import { appendFileSync } from "node:fs";
import { defineResource } from "braided";
import { createSubscription, type SubscriptionCallback } from "@/lib/state";
import {
  formatCountsLine,
  formatGameEndLine,
  formatHeaderLine,
  formatSettingsLine,
} from "../arena/journal";
import type { ConfigResource } from "./config";

export type Journal = {
  write: (line: string) => void;
  settings: (startedAt: Date) => void;
  header: () => void;
  counts: (step: number, counts: ReadonlyArray<number>) => void;
  gameEnded: (endedAt: Date, elapsedMs: number, steps: number) => void;
  /** Receive every line after it is written */
  subscribe: (listener: SubscriptionCallback<string>) => () => void;
};

/**
 * Journal Resource - the session's log
 *
 * Lines go to stdout unless quiet, and are appended to the log file when
 * one is configured. A failed write or a throwing subscriber is reported
 * and the session goes on.
 */
export const journal = defineResource({
  dependencies: ["config"],
  start: ({ config }: { config: ConfigResource }): Journal => {
    const { logFile, quiet } = config.journal;
    const lines = createSubscription<string>();
    let fileFailed = false;

    const appendToFile = (line: string) => {
      if (logFile === null || fileFailed) return;
      try {
        appendFileSync(logFile, `${line}\n`);
      } catch (error) {
        // stop retrying after the first failure
        fileFailed = true;
        console.warn(
          `[journal] Failed to write ${logFile}:`,
          error instanceof Error ? error.message : error
        );
      }
    };

    const write = (line: string) => {
      appendToFile(line);
      if (!quiet) console.log(line);
      lines.notify(line);
    };

    return {
      write,
      settings: (startedAt) => write(formatSettingsLine(config, startedAt)),
      header: () => write(formatHeaderLine(config.kinds.labels)),
      counts: (step, counts) => write(formatCountsLine(step, counts)),
      gameEnded: (endedAt, elapsedMs, steps) =>
        write(formatGameEndLine(endedAt, elapsedMs, steps)),
      subscribe: (listener) =>
        lines.subscribe((line) => {
          try {
            listener(line);
          } catch (error) {
            console.warn("[journal] Subscriber failed:", error);
          }
        }),
    };
  },
  halt: () => {
    // appendFileSync leaves nothing open
  },
});
