/**
 * Conflict detection between declared access sets
 */

import type { TaskSpec } from './core.js';

export type HazardType = 'RAW' | 'WAR' | 'WAW';

/**
 * Single-variable conflict between two tasks, oriented as if `source` runs first
 */
export type Hazard = {
  readonly type: HazardType;
  readonly source: string;
  readonly target: string;
  readonly variable: string;
};

function intersects(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  for (const key of a) {
    if (b.has(key)) return true;
  }
  return false;
}

/**
 * Bernstein's conditions: two tasks may run concurrently only if neither
 * writes what the other reads or writes.
 */
export function conflicts<S extends object>(a: TaskSpec<S>, b: TaskSpec<S>): boolean {
  return intersects(a.writes, b.reads) || intersects(a.reads, b.writes) || intersects(a.writes, b.writes);
}

export function detectHazards<S extends object>(a: TaskSpec<S>, b: TaskSpec<S>): Hazard[] {
  const hazards: Hazard[] = [];
  const aReads: ReadonlySet<string> = a.reads;
  const aWrites: ReadonlySet<string> = a.writes;
  const bReads: ReadonlySet<string> = b.reads;
  const bWrites: ReadonlySet<string> = b.writes;

  for (const variable of new Set([...aReads, ...aWrites, ...bReads, ...bWrites])) {
    // RAW: a writes, b reads (true dependency)
    if (aWrites.has(variable) && bReads.has(variable)) {
      hazards.push({ type: 'RAW', source: a.name, target: b.name, variable });
    }
    // WAW: both write (output dependency)
    if (aWrites.has(variable) && bWrites.has(variable)) {
      hazards.push({ type: 'WAW', source: a.name, target: b.name, variable });
    }
    // WAR: a reads, b writes. Already covered by WAW when a also writes.
    if (aReads.has(variable) && bWrites.has(variable) && !aWrites.has(variable)) {
      hazards.push({ type: 'WAR', source: a.name, target: b.name, variable });
    }
  }

  return hazards;
}
