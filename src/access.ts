/**
 * Runtime enforcement of declared read and write sets
 */

import type { TaskSpec } from './core.js';
import { UndeclaredAccessError } from './errors.js';

// Probed by JSON.stringify and by await on any object
const PROTOCOL_KEYS: ReadonlySet<string> = new Set(['toJSON', 'then']);

/**
 * Wrap the shared state so that `spec` can only touch what it declared
 *
 * Reading a variable (including `in` checks) requires it in `reads` or
 * `writes`; assigning or deleting one requires it in `writes`. Key listing
 * only shows declared variables. Symbol keys, members inherited from
 * `Object.prototype` and the `toJSON`/`then` protocol probes pass through
 * unchecked.
 */
export function guardState<S extends object>(state: S, spec: TaskSpec<S>): S {
  const reads: ReadonlySet<string> = spec.reads;
  const writes: ReadonlySet<string> = spec.writes;

  const checked = (key: string | symbol): key is string =>
    typeof key === 'string' && !(key in Object.prototype) && !PROTOCOL_KEYS.has(key);
  const readable = (key: string | symbol) => !checked(key) || reads.has(key) || writes.has(key);

  return new Proxy(state, {
    get(target, key, receiver) {
      if (!readable(key)) {
        throw new UndeclaredAccessError(spec.name, String(key), 'read');
      }
      return Reflect.get(target, key, receiver);
    },
    has(target, key) {
      if (!readable(key)) {
        throw new UndeclaredAccessError(spec.name, String(key), 'read');
      }
      return Reflect.has(target, key);
    },
    ownKeys(target) {
      const keys = Reflect.ownKeys(target);
      // Proxy invariants forbid hiding keys of a sealed target
      if (!Reflect.isExtensible(target)) return keys;
      return keys.filter((key) => readable(key) || Reflect.getOwnPropertyDescriptor(target, key)?.configurable === false);
    },
    set(target, key, value, receiver) {
      if (checked(key) && !writes.has(key)) {
        throw new UndeclaredAccessError(spec.name, key, 'write');
      }
      return Reflect.set(target, key, value, receiver);
    },
    deleteProperty(target, key) {
      if (checked(key) && !writes.has(key)) {
        throw new UndeclaredAccessError(spec.name, key, 'write');
      }
      return Reflect.deleteProperty(target, key);
    },
  });
}

/**
 * The state object a task's run operation receives
 */
export function stateFor<S extends object>(state: S, spec: TaskSpec<S>, validateAccess: boolean): S {
  return validateAccess ? guardState(state, spec) : state;
}
