/**
 * Parallel execution runtime
 *
 * Executes an execution graph with a bounded pool of workers pulling from a
 * ready queue. A task becomes ready once every predecessor has completed.
 */

import { stateFor } from './access.js';
import { resolveWorkerCount } from './config.js';
import { err, ok, snapshot, type ExecutionResult } from './core.js';
import { TaskExecutionError } from './errors.js';
import type { ExecutionGraph } from './graph.js';
import { silentLogger, type Logger } from './logger.js';
import { declarationOrder, type ReadyPolicy } from './policy.js';

export type ParallelOptions = {
  /** Concurrent workers, defaults to the available hardware parallelism */
  workers?: number;
  /** Which ready task a free worker takes; declaration order by default */
  policy?: ReadyPolicy;
  validateAccess?: boolean;
  logger?: Logger;
};

/**
 * Execute every task of `graph` against `state`
 *
 * - Independent tasks interleave at their await points
 * - Short-circuits on first error: nothing new is dispatched, tasks already
 *   running are awaited, and their effects stay in `state`
 *
 * @throws RangeError when `policy` picks outside the ready queue, after the
 *   tasks already running have finished
 *
 * @example
 * const result = await runParallel(graph, state, { workers: 4 });
 * if (result.ok) {
 *   console.log(result.value);
 * } else {
 *   console.error(result.error.taskName, result.error.cause);
 * }
 */
export async function runParallel<S extends object>(
  graph: ExecutionGraph<S>,
  state: S,
  options: ParallelOptions = {}
): Promise<ExecutionResult<S>> {
  const workers = Math.min(resolveWorkerCount(options.workers), graph.size);
  const policy = options.policy ?? declarationOrder;
  const validateAccess = options.validateAccess ?? false;
  const logger = options.logger ?? silentLogger;

  const remaining = graph.tasks.map((_, index) => graph.inDegreeAt(index));
  const ready: number[] = [];
  remaining.forEach((count, index) => {
    if (count === 0) ready.push(index);
  });

  const completed: string[] = [];
  const status: { failure?: TaskExecutionError; policyError?: RangeError } = {};
  let idle: Array<() => void> = [];

  const wakeAll = () => {
    const waiting = idle;
    idle = [];
    for (const resume of waiting) resume();
  };

  const finished = () =>
    status.policyError !== undefined || status.failure !== undefined || completed.length === graph.size;

  // A bad choice stops dispatching; running tasks still finish
  const take = (): number | undefined => {
    const choice = policy(ready);
    if (!Number.isInteger(choice) || choice < 0 || choice >= ready.length) {
      status.policyError = new RangeError(`Ready policy chose ${choice} among ${ready.length} ready tasks`);
      wakeAll();
      return undefined;
    }
    const [index] = ready.splice(choice, 1);
    return index;
  };

  // Counters and the queue are only touched between awaits, so each
  // completion is applied as one uninterrupted step.
  const worker = async (id: number): Promise<void> => {
    while (!finished()) {
      if (ready.length === 0) {
        await new Promise<void>((resume) => idle.push(resume));
        continue;
      }

      const index = take();
      if (index === undefined) return;
      const spec = graph.tasks[index];
      logger.debug(`worker ${id}: dispatch ${spec.name}`);

      try {
        await spec.run(stateFor(state, spec, validateAccess));
      } catch (cause) {
        if (status.failure === undefined) {
          status.failure = new TaskExecutionError(spec.name, cause);
          logger.error(status.failure.message);
        }
        wakeAll();
        return;
      }

      completed.push(spec.name);
      for (const next of graph.successorsAt(index)) {
        remaining[next] -= 1;
        if (remaining[next] === 0) ready.push(next);
      }
      wakeAll();
    }
  };

  await Promise.all(Array.from({ length: workers }, (_, id) => worker(id)));

  if (status.policyError !== undefined) {
    throw status.policyError;
  }

  const { failure } = status;
  if (failure !== undefined) {
    return { ...err(failure), completed };
  }
  logger.debug(`completed ${completed.length} tasks on ${workers} workers`);
  return { ...ok(snapshot(state, graph.writtenKeys)), completed };
}
