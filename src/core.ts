/**
 * Task - unit of work with declared shared-state access
 *
 * A task names the variables of the shared state it reads and writes.
 * The graph builder derives ordering from those declarations, so they
 * must cover every access the run operation performs.
 */

import { z } from 'zod';

import { formatIssues } from './config.js';
import { InvalidDeclarationError, type TaskExecutionError } from './errors.js';

/**
 * Result of a computation that can succeed or fail
 */
export type Ok<T> = { ok: true; value: T };
export type Err<E> = { ok: false; error: E };
export type Result<T, E> = Ok<T> | Err<E>;

/**
 * Variable identifiers are the string keys of the shared state
 */
export type StateKey<S> = Extract<keyof S, string>;

/**
 * Side-effecting operation on the shared state. Throwing or rejecting
 * marks the task as failed.
 */
export type TaskRun<S> = (state: S) => void | Promise<void>;

/**
 * Immutable task declaration
 *
 * @template S - Shared state the task operates on
 */
export type TaskSpec<S extends object = Record<string, unknown>> = {
  readonly name: string;
  readonly reads: ReadonlySet<StateKey<S>>;
  readonly writes: ReadonlySet<StateKey<S>>;
  readonly run: TaskRun<S>;
};

/**
 * Outcome of one run of a graph
 *
 * Success carries a snapshot of the written variables; failure carries the
 * first failing task. `completed` lists finished tasks in completion order.
 */
export type ExecutionResult<S extends object> = Result<Partial<S>, TaskExecutionError> & {
  readonly completed: readonly string[];
};

export type TaskAccess<S> = {
  reads?: Iterable<StateKey<S>>;
  writes?: Iterable<StateKey<S>>;
};

const TaskDeclarationSchema = z.object({
  name: z.string().min(1),
  reads: z.array(z.string()),
  writes: z.array(z.string()),
  run: z.custom<(...args: never[]) => unknown>((value) => typeof value === 'function', {
    message: 'run must be a function',
  }),
});

/**
 * Create a task
 *
 * @example
 * type State = { x: number; y: number; z: number };
 *
 * const sum = task<State>('sum', { reads: ['x', 'y'], writes: ['z'] }, (s) => {
 *   s.z = s.x + s.y;
 * });
 */
export function task<S extends object>(name: string, access: TaskAccess<S>, run: TaskRun<S>): TaskSpec<S> {
  const reads = [...(access.reads ?? [])];
  const writes = [...(access.writes ?? [])];

  const parsed = TaskDeclarationSchema.safeParse({ name, reads, writes, run });
  if (!parsed.success) {
    throw new InvalidDeclarationError(`task "${String(name)}"`, formatIssues(parsed.error));
  }

  return Object.freeze({
    name,
    reads: new Set(reads),
    writes: new Set(writes),
    run,
  });
}

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

/**
 * Copy the given variables out of the shared state
 */
export function snapshot<S extends object>(state: S, keys: Iterable<StateKey<S>>): Partial<S> {
  const values: Partial<S> = {};
  for (const key of keys) {
    values[key] = state[key];
  }
  return values;
}
