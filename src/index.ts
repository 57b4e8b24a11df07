/**
 * conflict-dag - parallel task execution from declared read/write sets
 *
 * Declare what each task reads and writes; the graph builder orders every
 * conflicting pair and leaves the rest free to run concurrently.
 *
 * @example
 * import { task, TaskSystem } from 'conflict-dag';
 *
 * type State = { x: number; y: number; z: number };
 *
 * const system = new TaskSystem<State>([
 *   task('writeX', { writes: ['x'] }, (s) => { s.x = 1; }),
 *   task('writeY', { writes: ['y'] }, (s) => { s.y = 2; }),
 *   task('sum', { reads: ['x', 'y'], writes: ['z'] }, (s) => { s.z = s.x + s.y; }),
 * ]);
 *
 * const result = await system.runParallel({ x: 0, y: 0, z: 0 }, 4);
 * const check = await system.testDeterminism(() => ({ x: 0, y: 0, z: 0 }), { trials: 100 });
 */

export type { TaskSpec, TaskRun, TaskAccess, StateKey, ExecutionResult, Result, Ok, Err } from './core.js';
export { task, ok, err, snapshot } from './core.js';
export type { Hazard, HazardType } from './conflict.js';
export { conflicts, detectHazards } from './conflict.js';
export type { Precedences, GraphEdge, EdgeKind, BuildOptions } from './graph.js';
export { ExecutionGraph, buildGraph } from './graph.js';
export type { SequentialOptions } from './sequential.js';
export { runSequential } from './sequential.js';
export type { ParallelOptions } from './run.js';
export { runParallel } from './run.js';
export type { ReadyPolicy } from './policy.js';
export { declarationOrder, randomOrder } from './policy.js';
export { SeededRandom } from './random.js';
export type { VerifyOptions, VerificationResult } from './verify.js';
export { verifyDeterminism } from './verify.js';
export type { MeasureOptions, PerformanceReport } from './measure.js';
export { measurePerformance } from './measure.js';
export { guardState } from './access.js';
export { getTrace, getEdges, toDot } from './trace.js';
export type { SystemConfig, SystemOptions, Env } from './config.js';
export { resolveConfig, defaultWorkerCount, SystemConfigSchema } from './config.js';
export type { Logger, LogLevel } from './logger.js';
export { createLogger, silentLogger } from './logger.js';
export type { DeterminismOptions, PerformanceOptions } from './system.js';
export { TaskSystem } from './system.js';
export {
  TaskSystemError,
  TaskSystemErrorCodes,
  InvalidDeclarationError,
  DuplicateTaskNameError,
  UnknownTaskReferenceError,
  CycleDetectedError,
  TaskExecutionError,
  UndeclaredAccessError,
} from './errors.js';
export type { TaskSystemErrorCode, AccessKind } from './errors.js';
