/**
 * Reference executor
 *
 * Runs one task at a time in the graph's stable topological order. Its
 * final state is the ground truth the parallel scheduler is checked against.
 */

import { stateFor } from './access.js';
import { err, ok, snapshot, type ExecutionResult } from './core.js';
import { TaskExecutionError } from './errors.js';
import type { ExecutionGraph } from './graph.js';
import { silentLogger, type Logger } from './logger.js';

export type SequentialOptions = {
  validateAccess?: boolean;
  logger?: Logger;
};

export async function runSequential<S extends object>(
  graph: ExecutionGraph<S>,
  state: S,
  options: SequentialOptions = {}
): Promise<ExecutionResult<S>> {
  const logger = options.logger ?? silentLogger;
  const validateAccess = options.validateAccess ?? false;
  const completed: string[] = [];

  for (const name of graph.topologicalOrder()) {
    const spec = graph.task(name);
    if (spec === undefined) continue;

    logger.debug(`run ${name}`);
    try {
      await spec.run(stateFor(state, spec, validateAccess));
    } catch (cause) {
      const error = new TaskExecutionError(name, cause);
      logger.error(error.message);
      return { ...err(error), completed };
    }
    completed.push(name);
  }

  return { ...ok(snapshot(state, graph.writtenKeys)), completed };
}
