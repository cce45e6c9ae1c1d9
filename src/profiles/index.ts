/**
 * Profile Registry
 *
 * To add a profile, define an ArenaProfile in this directory and register
 * it below.
 */

import { ConfigurationError, fromZodError } from "@/lib/errors";
import { arenaProfileSchema, type ArenaProfile } from "../arena/vocabulary/schemas/world";
import { classicProfile } from "./classic";
import { fiveElementsProfile } from "./five-elements";

export const profiles: Record<string, ArenaProfile> = {
  classic: classicProfile,
  "five-elements": fiveElementsProfile,
};

export const defaultProfileId = "classic";

export function getProfile(profileId: string): ArenaProfile {
  const profile = profiles[profileId];
  if (!profile) {
    throw new ConfigurationError(
      `Profile not found: ${profileId}. Available profiles: ${getProfileIds().join(", ")}`
    );
  }
  const result = arenaProfileSchema.safeParse(profile);
  if (!result.success) {
    throw fromZodError(`Invalid profile: ${profileId}`, result.error);
  }
  return result.data;
}

export function getProfileIds(): string[] {
  return Object.keys(profiles);
}
