/**
 * Execution graph construction
 *
 * Combines explicit precedences with the ordering inferred from conflicting
 * access sets. Two tasks without a path between them are safe to run
 * concurrently.
 */

import { z } from 'zod';

import { formatIssues } from './config.js';
import { conflicts, detectHazards, type Hazard } from './conflict.js';
import type { StateKey, TaskSpec } from './core.js';
import {
  CycleDetectedError,
  DuplicateTaskNameError,
  InvalidDeclarationError,
  UnknownTaskReferenceError,
} from './errors.js';
import { silentLogger, type Logger } from './logger.js';

/**
 * Task name → names of the tasks that must complete before it starts.
 * Tasks without an entry have no explicit prerequisites.
 */
export type Precedences = Readonly<Record<string, readonly string[]>>;

export type EdgeKind = 'explicit' | 'conflict';

export type GraphEdge = {
  readonly from: string;
  readonly to: string;
  readonly kind: EdgeKind;
  /** Why a conflict edge exists; empty for explicit edges */
  readonly hazards: readonly Hazard[];
};

export type BuildOptions = {
  logger?: Logger;
};

const PrecedencesSchema = z.record(z.string(), z.array(z.string()));

/**
 * Immutable DAG over a fixed list of tasks
 *
 * Tasks keep their declaration order; it is the tie break wherever an
 * order between unrelated tasks is needed.
 */
export class ExecutionGraph<S extends object = Record<string, unknown>> {
  readonly tasks: readonly TaskSpec<S>[];
  readonly edges: readonly GraphEdge[];
  /** Every variable some task writes, in declaration order */
  readonly writtenKeys: readonly StateKey<S>[];

  private readonly positions: ReadonlyMap<string, number>;
  private readonly successorIds: readonly (readonly number[])[];
  private readonly predecessorIds: readonly (readonly number[])[];
  private readonly reach: readonly ReadonlySet<number>[];
  private readonly order: readonly number[];

  constructor(tasks: readonly TaskSpec<S>[], edges: readonly GraphEdge[]) {
    const positions = indexTasks(tasks);
    const successors = tasks.map(() => new Set<number>());
    for (const edge of edges) {
      const from = positions.get(edge.from);
      if (from === undefined) throw new UnknownTaskReferenceError(edge.from);
      const to = positions.get(edge.to);
      if (to === undefined) throw new UnknownTaskReferenceError(edge.to);
      successors[from].add(to);
    }

    this.tasks = tasks;
    this.edges = edges;
    this.positions = positions;
    this.successorIds = successors.map((set) => [...set].sort((a, b) => a - b));
    this.predecessorIds = invert(this.successorIds);
    this.order = topologicalOrderOrThrow(tasks, this.successorIds);
    this.reach = computeReach(this.successorIds, this.order);

    const written = new Set<StateKey<S>>();
    for (const spec of tasks) {
      for (const key of spec.writes) written.add(key);
    }
    this.writtenKeys = [...written];
  }

  get size(): number {
    return this.tasks.length;
  }

  indexOf(name: string): number | undefined {
    return this.positions.get(name);
  }

  task(name: string): TaskSpec<S> | undefined {
    const index = this.positions.get(name);
    return index === undefined ? undefined : this.tasks[index];
  }

  successors(name: string): string[] {
    return this.namesOf(this.successorIds, name);
  }

  predecessors(name: string): string[] {
    return this.namesOf(this.predecessorIds, name);
  }

  /** Successor positions of the task at `index`, ascending */
  successorsAt(index: number): readonly number[] {
    return this.successorIds[index] ?? [];
  }

  inDegreeAt(index: number): number {
    return this.predecessorIds[index]?.length ?? 0;
  }

  /**
   * Whether `from` must complete before `to` starts, directly or transitively
   */
  hasPath(from: string, to: string): boolean {
    const a = this.positions.get(from);
    const b = this.positions.get(to);
    if (a === undefined || b === undefined) return false;
    return this.reach[a].has(b);
  }

  isOrdered(a: string, b: string): boolean {
    return this.hasPath(a, b) || this.hasPath(b, a);
  }

  /**
   * Topological order, ties broken by declaration order
   */
  topologicalOrder(): string[] {
    return this.order.map((index) => this.tasks[index].name);
  }

  private namesOf(adjacency: readonly (readonly number[])[], name: string): string[] {
    const index = this.positions.get(name);
    if (index === undefined) return [];
    return adjacency[index].map((i) => this.tasks[i].name);
  }
}

/**
 * Build the maximum-parallelism DAG for `tasks`
 *
 * 1. Validate names and precedences, fail on explicit cycles
 * 2. For every pair not ordered by the precedences, add one edge
 *    (earlier-declared → later-declared) when their access sets conflict
 *
 * @throws DuplicateTaskNameError, UnknownTaskReferenceError, CycleDetectedError, InvalidDeclarationError
 *
 * @example
 * const graph = buildGraph([writeX, writeY, sum], {});
 * graph.edges.map((e) => `${e.from}->${e.to}`); // ['writeX->sum', 'writeY->sum']
 */
export function buildGraph<S extends object>(
  tasks: readonly TaskSpec<S>[],
  precedences: Precedences = {},
  options: BuildOptions = {}
): ExecutionGraph<S> {
  const logger = options.logger ?? silentLogger;

  const parsed = PrecedencesSchema.safeParse(precedences);
  if (!parsed.success) {
    throw new InvalidDeclarationError('precedences', formatIssues(parsed.error));
  }

  const positions = indexTasks(tasks);
  const successors = tasks.map(() => new Set<number>());
  const edges: GraphEdge[] = [];

  for (const [name, prerequisites] of Object.entries(parsed.data)) {
    const to = positions.get(name);
    if (to === undefined) throw new UnknownTaskReferenceError(name);

    for (const prerequisite of prerequisites) {
      const from = positions.get(prerequisite);
      if (from === undefined) throw new UnknownTaskReferenceError(prerequisite, name);
      if (successors[from].has(to)) continue;
      successors[from].add(to);
      edges.push({ from: prerequisite, to: name, kind: 'explicit', hazards: [] });
    }
  }

  const adjacency = successors.map((set) => [...set]);
  const explicitOrder = topologicalOrderOrThrow(tasks, adjacency);
  const explicitReach = computeReach(adjacency, explicitOrder);
  // Grows as conflict edges are added
  const reach = explicitReach.map((set) => new Set(set));

  for (let i = 0; i < tasks.length; i++) {
    for (let j = i + 1; j < tasks.length; j++) {
      if (explicitReach[i].has(j) || explicitReach[j].has(i)) continue;

      const a = tasks[i];
      const b = tasks[j];
      if (!conflicts(a, b)) continue;

      // Hint edges against declaration order can already force b before a
      if (reach[j].has(i)) {
        logger.debug(`"${a.name}" and "${b.name}" conflict but are already ordered "${b.name}" first`);
        continue;
      }

      edges.push({ from: a.name, to: b.name, kind: 'conflict', hazards: detectHazards(a, b) });
      for (let x = 0; x < tasks.length; x++) {
        if (x !== i && !reach[x].has(i)) continue;
        reach[x].add(j);
        for (const v of reach[j]) reach[x].add(v);
      }
    }
  }

  const graph = new ExecutionGraph(tasks, edges);
  logger.debug(
    `Built graph: ${graph.size} tasks, ${edges.length} edges ` +
      `(${edges.filter((e) => e.kind === 'conflict').length} inferred)`
  );
  return graph;
}

function indexTasks<S extends object>(tasks: readonly TaskSpec<S>[]): Map<string, number> {
  const positions = new Map<string, number>();
  tasks.forEach((spec, index) => {
    if (positions.has(spec.name)) throw new DuplicateTaskNameError(spec.name);
    positions.set(spec.name, index);
  });
  return positions;
}

function invert(successors: readonly (readonly number[])[]): number[][] {
  const predecessors: number[][] = successors.map(() => []);
  successors.forEach((targets, from) => {
    for (const to of targets) predecessors[to].push(from);
  });
  return predecessors;
}

/**
 * Kahn's algorithm, always releasing the lowest ready position first.
 * Returns fewer positions than there are tasks when the graph is cyclic.
 */
function kahn(successors: readonly (readonly number[])[], predecessors: readonly (readonly number[])[]): number[] {
  const remaining = predecessors.map((preds) => preds.length);
  const ready: number[] = [];
  remaining.forEach((count, index) => {
    if (count === 0) ready.push(index);
  });

  const order: number[] = [];
  while (ready.length > 0) {
    let lowest = 0;
    for (let k = 1; k < ready.length; k++) {
      if (ready[k] < ready[lowest]) lowest = k;
    }
    const [node] = ready.splice(lowest, 1);
    order.push(node);
    for (const next of successors[node]) {
      remaining[next] -= 1;
      if (remaining[next] === 0) ready.push(next);
    }
  }
  return order;
}

function topologicalOrderOrThrow<S extends object>(
  tasks: readonly TaskSpec<S>[],
  successors: readonly (readonly number[])[]
): number[] {
  const predecessors = invert(successors);
  const order = kahn(successors, predecessors);
  if (order.length !== tasks.length) {
    throw new CycleDetectedError(findCycle(order, predecessors).map((index) => tasks[index].name));
  }
  return order;
}

/**
 * Locate one cycle among the positions Kahn's algorithm could not release.
 * Each of them has an unreleased predecessor, so walking predecessors must
 * revisit a node.
 */
function findCycle(released: readonly number[], predecessors: readonly (readonly number[])[]): number[] {
  const done = new Set(released);
  const stuck = predecessors.map((_, index) => index).filter((index) => !done.has(index));

  const seenAt = new Map<number, number>();
  const walk: number[] = [];
  let node = stuck[0];
  while (!seenAt.has(node)) {
    seenAt.set(node, walk.length);
    walk.push(node);
    node = Math.min(...predecessors[node].filter((p) => !done.has(p)));
  }
  // The walk follows edges backwards
  return walk.slice(seenAt.get(node)).reverse();
}

function computeReach(successors: readonly (readonly number[])[], order: readonly number[]): Set<number>[] {
  const reach = successors.map(() => new Set<number>());
  for (let k = order.length - 1; k >= 0; k--) {
    const node = order[k];
    for (const next of successors[node]) {
      reach[node].add(next);
      for (const v of reach[next]) reach[node].add(v);
    }
  }
  return reach;
}
