import { defineResource, type StartedResource } from "braided";
import type { SessionConfig } from "../arena/vocabulary/schemas/session";

/**
 * Config Resource - the resolved session configuration
 *
 * Resolution (and every validation error) happens before the system
 * starts, so this resource only hands the value to its dependents.
 */
export const createConfig = (sessionConfig: SessionConfig) =>
  defineResource({
    start: (): SessionConfig => sessionConfig,
    halt: () => {
      // No cleanup needed for config
    },
  });

export type ConfigResource = StartedResource<ReturnType<typeof createConfig>>;
