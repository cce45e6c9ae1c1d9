import { ConfigurationError } from "@/lib/errors";
import type { Agent } from "./vocabulary/schemas/prelude";
import type { KindRecord } from "./vocabulary/schemas/world";

/**
 * Kind table compiled to indices
 *
 * Agents carry a kind index; `beats[k]` and `losesTo[k]` are indices too,
 * so the hot loops never touch strings.
 */
export type KindTable = {
  ids: string[]; // Sorted kind ids; index = kind
  labels: string[];
  beats: number[];
  losesTo: number[];
};

/**
 * Compile a kind record into a table
 *
 * Every relation must point at a known kind other than itself. That the
 * relation forms a single cycle is assumed, not checked.
 */
export function compileKindTable(kinds: KindRecord): KindTable {
  const ids = Object.keys(kinds).sort();
  const issues: string[] = [];

  if (ids.length < 2) {
    issues.push(`at least two kinds are required, got ${ids.length}`);
  }

  const indexOf = new Map(ids.map((id, index) => [id, index]));

  const resolve = (id: string, field: "beats" | "losesTo", target: string) => {
    const index = indexOf.get(target);
    if (index === undefined) {
      issues.push(`kinds.${id}.${field} references unknown kind '${target}'`);
      return -1;
    }
    if (target === id) {
      issues.push(`kinds.${id}.${field} cannot reference itself`);
    }
    return index;
  };

  const labels: string[] = [];
  const beats: number[] = [];
  const losesTo: number[] = [];

  for (const id of ids) {
    const kind = kinds[id];
    labels.push(kind.label);
    beats.push(resolve(id, "beats", kind.beats));
    losesTo.push(resolve(id, "losesTo", kind.losesTo));
  }

  if (issues.length > 0) {
    throw new ConfigurationError("Invalid kind table", issues);
  }

  return { ids, labels, beats, losesTo };
}

export function kindIndex(table: KindTable, id: string): number {
  const index = table.ids.indexOf(id);
  if (index < 0) {
    throw new ConfigurationError(`Unknown kind: ${id}`);
  }
  return index;
}

/**
 * True when `a` converts `b` on contact
 */
export function beats(table: KindTable, a: number, b: number): boolean {
  return table.beats[a] === b;
}

/**
 * Distinct kinds present, in first-seen store order
 */
export function kindsPresent(agents: ReadonlyArray<Agent>): number[] {
  const seen = new Set<number>();
  for (const agent of agents) {
    seen.add(agent.kind);
  }
  return Array.from(seen);
}

/**
 * Live count per kind, in kind order
 */
export function countByKind(
  agents: ReadonlyArray<Agent>,
  table: KindTable
): number[] {
  const counts = table.ids.map(() => 0);
  for (const agent of agents) {
    counts[agent.kind] += 1;
  }
  return counts;
}

/**
 * Exactly two kinds left and one of them converts the other
 */
export function isResolvableMatchup(
  present: ReadonlyArray<number>,
  table: KindTable
): boolean {
  if (present.length !== 2) return false;
  const [a, b] = present;
  return beats(table, a, b) || beats(table, b, a);
}
