import type { ArenaProfile } from "../arena/vocabulary/schemas/world";
import { classicProfile } from "./classic";

/**
 * Five Elements Profile - the overcoming cycle
 *
 * wood → earth → water → fire → metal → wood. Each element only touches
 * its two neighbours on the cycle, so the other pairs pass through each
 * other and fast-forward only fires once two neighbours are left.
 */
export const fiveElementsProfile: ArenaProfile = {
  id: "five-elements",
  name: "Five Elements",
  description: "A five-kind cycle where non-adjacent kinds ignore each other",

  world: {
    width: 900,
    height: 900,
    unitsPerKind: 30,
  },

  kinds: {
    wood: { label: "🌳", beats: "earth", losesTo: "metal" },
    earth: { label: "⛰️", beats: "water", losesTo: "wood" },
    water: { label: "💧", beats: "fire", losesTo: "earth" },
    fire: { label: "🔥", beats: "metal", losesTo: "water" },
    metal: { label: "⚙️", beats: "wood", losesTo: "fire" },
  },

  physics: classicProfile.physics,
  pacing: classicProfile.pacing,
  obstacleColor: "gray",
};
