/**
 * Randomized determinism check
 *
 * Replays the graph under many seeded interleavings and compares each final
 * state with the sequential run. A mismatch means some task touches a
 * variable it did not declare, or the graph misses an ordering.
 */

import { isDeepStrictEqual } from 'node:util';

import { resolveTrialCount } from './config.js';
import { snapshot as pickWritten } from './core.js';
import type { TaskExecutionError } from './errors.js';
import type { ExecutionGraph } from './graph.js';
import { silentLogger, type Logger } from './logger.js';
import { randomOrder } from './policy.js';
import { runParallel } from './run.js';
import { runSequential } from './sequential.js';

export type VerifyOptions<S extends object> = {
  /** Fresh shared state for every run */
  createState: () => S;
  trials?: number;
  /** Trial `i` uses seed `seed + i` */
  seed?: number;
  workers?: number;
  /** What to compare between runs; every written variable by default */
  snapshot?: (state: S) => unknown;
  validateAccess?: boolean;
  logger?: Logger;
};

export type VerificationResult =
  | { deterministic: true; trials: number }
  | {
      deterministic: false;
      /** Zero-based index of the first trial whose outcome differed */
      divergingTrial: number;
      trials: number;
      expected: unknown;
      actual: unknown;
      /** Set when the diverging trial failed although the reference run succeeded */
      error?: TaskExecutionError;
    };

export const DEFAULT_TRIALS = 5;
export const DEFAULT_SEED = 12345;

/**
 * @throws InvalidDeclarationError when `trials` is not a positive integer
 * @throws TaskExecutionError when the sequential reference run itself fails
 *
 * @example
 * const result = await verifyDeterminism(graph, { createState: () => ({ x: 0, y: 0 }), trials: 100 });
 * if (!result.deterministic) console.warn(`trial ${result.divergingTrial} diverged`);
 */
export async function verifyDeterminism<S extends object>(
  graph: ExecutionGraph<S>,
  options: VerifyOptions<S>
): Promise<VerificationResult> {
  const trials = resolveTrialCount(options.trials, DEFAULT_TRIALS);
  const seed = options.seed ?? DEFAULT_SEED;
  const logger = options.logger ?? silentLogger;
  const capture = options.snapshot ?? ((state: S) => pickWritten(state, graph.writtenKeys));
  const execution = { validateAccess: options.validateAccess, logger };

  const referenceState = options.createState();
  const reference = await runSequential(graph, referenceState, execution);
  if (!reference.ok) {
    throw reference.error;
  }
  const expected = capture(referenceState);

  for (let trial = 0; trial < trials; trial++) {
    const state = options.createState();
    const result = await runParallel(graph, state, {
      ...execution,
      workers: options.workers,
      policy: randomOrder(seed + trial),
    });
    const actual = capture(state);

    if (!result.ok || !isDeepStrictEqual(actual, expected)) {
      logger.warn(`Nondeterminism detected in trial ${trial} of ${trials}`, { expected, actual });
      return {
        deterministic: false,
        divergingTrial: trial,
        trials,
        expected,
        actual,
        ...(result.ok ? {} : { error: result.error }),
      };
    }
  }

  logger.info(`Deterministic across ${trials} trials`);
  return { deterministic: true, trials };
}
