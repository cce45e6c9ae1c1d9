import type { KindTable } from "./kinds";
import * as vec from "./vector";
import type { Agent } from "./vocabulary/schemas/prelude";
import type { ArenaPhysics } from "./vocabulary/schemas/world";

export type Conversion = {
  index: number; // Store index of the converted agent
  from: number;
  to: number;
};

export function contactRadius(physics: ArenaPhysics): number {
  return physics.radius * physics.contactFactor;
}

/**
 * Contact Resolver
 *
 * Scans pairs (i < j) in store order. Touching agents of different kinds
 * convert when one beats the other; kinds not in a beats relation pass
 * through each other. Writes happen during the scan, so a conversion is
 * visible to the pairs after it in the same tick.
 */
export function resolveContacts(
  agents: Agent[],
  table: KindTable,
  physics: ArenaPhysics
): Conversion[] {
  const reach = contactRadius(physics);
  const reachSq = reach * reach;
  const conversions: Conversion[] = [];

  for (let i = 0; i < agents.length; i++) {
    const a = agents[i];
    for (let j = i + 1; j < agents.length; j++) {
      const b = agents[j];
      if (a.kind === b.kind) continue;
      if (vec.distanceSquared(a.position, b.position) > reachSq) continue;

      if (table.beats[a.kind] === b.kind) {
        conversions.push({ index: j, from: b.kind, to: a.kind });
        b.kind = a.kind;
      } else if (table.beats[b.kind] === a.kind) {
        conversions.push({ index: i, from: a.kind, to: b.kind });
        a.kind = b.kind;
      }
    }
  }

  return conversions;
}
