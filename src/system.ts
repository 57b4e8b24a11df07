/**
 * Task system facade
 *
 * Wires configuration, logging and the graph together behind one object.
 */

import { resolveConfig, type Env, type SystemConfig, type SystemOptions } from './config.js';
import type { ExecutionResult, TaskSpec } from './core.js';
import { buildGraph, type ExecutionGraph, type Precedences } from './graph.js';
import { createLogger, silentLogger, type Logger } from './logger.js';
import { measurePerformance, type PerformanceReport } from './measure.js';
import { runParallel } from './run.js';
import { runSequential } from './sequential.js';
import { getEdges, getTrace } from './trace.js';
import { verifyDeterminism, type VerificationResult } from './verify.js';

export type DeterminismOptions<S> = {
  trials?: number;
  seed?: number;
  workers?: number;
  snapshot?: (state: S) => unknown;
};

export type PerformanceOptions = {
  workers?: number;
  trials?: number;
};

/**
 * A fixed set of tasks and the graph derived from them
 *
 * The graph is built in the constructor, so invalid declarations throw
 * there and no partial system exists. Runs never mutate the system; a
 * failed run can be followed by another one.
 *
 * @example
 * type State = { x: number; y: number; z: number };
 *
 * const system = new TaskSystem<State>([
 *   task('writeX', { writes: ['x'] }, (s) => { s.x = 1; }),
 *   task('writeY', { writes: ['y'] }, (s) => { s.y = 2; }),
 *   task('sum', { reads: ['x', 'y'], writes: ['z'] }, (s) => { s.z = s.x + s.y; }),
 * ]);
 *
 * const result = await system.runParallel({ x: 0, y: 0, z: 0 });
 * // result.value → { x: 1, y: 2, z: 3 }
 */
export class TaskSystem<S extends object> {
  readonly graph: ExecutionGraph<S>;
  readonly config: SystemConfig;
  private readonly logger: Logger;

  constructor(tasks: readonly TaskSpec<S>[], precedences: Precedences = {}, options: SystemOptions = {}, env?: Env) {
    this.config = resolveConfig(options, env);
    this.logger =
      options.logger ?? (this.config.logLevel === undefined ? silentLogger : createLogger(this.config.logLevel));
    this.graph = buildGraph(tasks, precedences, { logger: this.logger });
  }

  runSequential(state: S): Promise<ExecutionResult<S>> {
    return runSequential(this.graph, state, {
      validateAccess: this.config.validateAccess,
      logger: this.logger,
    });
  }

  runParallel(state: S, workers: number | undefined = this.config.workers): Promise<ExecutionResult<S>> {
    return runParallel(this.graph, state, {
      workers,
      validateAccess: this.config.validateAccess,
      logger: this.logger,
    });
  }

  testDeterminism(createState: () => S, options: DeterminismOptions<S> = {}): Promise<VerificationResult> {
    return verifyDeterminism(this.graph, {
      createState,
      trials: options.trials ?? this.config.trials,
      seed: options.seed ?? this.config.seed,
      workers: options.workers ?? this.config.workers,
      snapshot: options.snapshot,
      validateAccess: this.config.validateAccess,
      logger: this.logger,
    });
  }

  measurePerformance(createState: () => S, options: PerformanceOptions = {}): Promise<PerformanceReport> {
    return measurePerformance(this.graph, {
      createState,
      workers: options.workers ?? this.config.workers,
      trials: options.trials ?? this.config.trials,
      logger: this.logger,
    });
  }

  /** [from, to] pairs for external renderers */
  edges(): Array<[string, string]> {
    return getEdges(this.graph);
  }

  trace(): string[] {
    return getTrace(this.graph);
  }
}
