/**
 * Wall-clock comparison of the sequential and parallel executors
 */

import { resolveTrialCount } from './config.js';
import type { ExecutionGraph } from './graph.js';
import { silentLogger, type Logger } from './logger.js';
import { runParallel } from './run.js';
import { runSequential } from './sequential.js';

export type MeasureOptions<S extends object> = {
  createState: () => S;
  workers?: number;
  trials?: number;
  logger?: Logger;
};

/** Durations in milliseconds, averaged over all trials */
export type PerformanceReport = {
  sequentialDuration: number;
  parallelDuration: number;
  /** sequential / parallel, 0 when the parallel average is 0 */
  speedup: number;
  samples: { sequential: number[]; parallel: number[] };
};

const average = (values: readonly number[]) =>
  values.length === 0 ? 0 : values.reduce((sum, value) => sum + value, 0) / values.length;

/**
 * Time the sequential and parallel executors on alternating fresh states
 *
 * @throws InvalidDeclarationError when `trials` is not a positive integer
 * @throws TaskExecutionError from the first run that fails
 */
export async function measurePerformance<S extends object>(
  graph: ExecutionGraph<S>,
  options: MeasureOptions<S>
): Promise<PerformanceReport> {
  const trials = resolveTrialCount(options.trials, 5);
  const logger = options.logger ?? silentLogger;
  const samples: PerformanceReport['samples'] = { sequential: [], parallel: [] };

  for (let trial = 0; trial < trials; trial++) {
    let start = performance.now();
    const sequential = await runSequential(graph, options.createState());
    const sequentialMs = performance.now() - start;
    if (!sequential.ok) throw sequential.error;

    start = performance.now();
    const parallel = await runParallel(graph, options.createState(), { workers: options.workers });
    const parallelMs = performance.now() - start;
    if (!parallel.ok) throw parallel.error;

    samples.sequential.push(sequentialMs);
    samples.parallel.push(parallelMs);
    logger.info(`Trial ${trial + 1}: sequential ${sequentialMs.toFixed(2)}ms, parallel ${parallelMs.toFixed(2)}ms`);
  }

  const sequentialDuration = average(samples.sequential);
  const parallelDuration = average(samples.parallel);
  const speedup = parallelDuration > 0 ? sequentialDuration / parallelDuration : 0;
  logger.info(`Speedup: ${speedup.toFixed(2)}x`);

  return { sequentialDuration, parallelDuration, speedup, samples };
}
