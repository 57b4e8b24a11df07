/**
 * Tests for randomized determinism verification
 */

import { describe, it, expect, vi } from 'vitest';
import {
  buildGraph,
  InvalidDeclarationError,
  measurePerformance,
  task,
  TaskExecutionError,
  verifyDeterminism,
  type Logger,
} from '../src/index.js';
import { randomSystem, zeroes, type Vars } from './helpers.js';

// Declares only `y` but also writes `x`, so nothing orders it against `second`
const underDeclared = () =>
  buildGraph([
    task<Vars>('first', { writes: ['y'] }, (s) => {
      s.y = 1;
      s.x = 1;
    }),
    task<Vars>('second', { writes: ['x'] }, (s) => {
      s.x = 2;
    }),
  ]);

describe('Verify - Correct Systems', () => {
  it('should never report nondeterminism for honest declarations', async () => {
    const variables = ['p', 'q', 'r', 's'];
    const graph = buildGraph(randomSystem(7, 8, variables));

    const result = await verifyDeterminism(graph, { createState: () => zeroes(variables), trials: 100, workers: 4 });

    expect(result).toEqual({ deterministic: true, trials: 100 });
  });

  it('should use a fresh state for every run', async () => {
    const createState = vi.fn(() => ({ n: 0 }));
    const graph = buildGraph([
      task<{ n: number }>('increment', { writes: ['n'] }, (s) => {
        s.n += 1;
      }),
    ]);

    const result = await verifyDeterminism(graph, { createState, trials: 3 });

    expect(result.deterministic).toBe(true);
    // one reference run plus one per trial
    expect(createState).toHaveBeenCalledTimes(4);
  });
});

describe('Verify - Hidden Races', () => {
  it('should detect a write the graph does not order', async () => {
    const result = await verifyDeterminism(underDeclared(), {
      createState: () => ({ x: 0, y: 0 }),
      trials: 100,
      workers: 2,
    });

    expect(result.deterministic).toBe(false);
    if (!result.deterministic) {
      expect(result.divergingTrial).toBeGreaterThanOrEqual(0);
      expect(result.divergingTrial).toBeLessThan(100);
      expect(result.expected).toEqual({ y: 1, x: 2 });
      expect(result.actual).toEqual({ y: 1, x: 1 });
      expect(result.error).toBeUndefined();
    }
  });

  it('should be reproducible for the same seed', async () => {
    const options = { createState: () => ({ x: 0, y: 0 }), trials: 100, workers: 2, seed: 99 };

    const first = await verifyDeterminism(underDeclared(), options);
    const second = await verifyDeterminism(underDeclared(), options);

    expect(second).toEqual(first);
  });

  it('should report a trial that fails where the reference run succeeded', async () => {
    const graph = buildGraph([
      task<{ ready: boolean }>('setup', {}, (s) => {
        s.ready = true;
      }),
      task<{ ready: boolean }>('check', {}, (s) => {
        if (!s.ready) throw new Error('not ready');
      }),
    ]);

    const result = await verifyDeterminism(graph, { createState: () => ({ ready: false }), trials: 100, workers: 2 });

    expect(result.deterministic).toBe(false);
    if (!result.deterministic) {
      expect(result.error).toBeInstanceOf(TaskExecutionError);
      expect(result.error?.taskName).toBe('check');
    }
  });

  it('should compare a caller-supplied snapshot', async () => {
    const result = await verifyDeterminism(underDeclared(), {
      createState: () => ({ x: 0, y: 0 }),
      trials: 100,
      workers: 2,
      snapshot: (s) => s.y,
    });

    // `y` is written by one task only, so the race on `x` is invisible here
    expect(result).toEqual({ deterministic: true, trials: 100 });
  });

  it('should warn through the logger', async () => {
    const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), setLevel: vi.fn() };

    await verifyDeterminism(underDeclared(), { createState: () => ({ x: 0, y: 0 }), trials: 100, workers: 2, logger });

    expect(logger.warn).toHaveBeenCalledTimes(1);
  });
});

describe('Verify - Reference Failures', () => {
  it('should throw when the sequential reference run fails', async () => {
    const graph = buildGraph([
      task<Vars>('broken', { writes: ['x'] }, () => {
        throw new Error('boom');
      }),
    ]);

    await expect(verifyDeterminism(graph, { createState: () => ({ x: 0 }) })).rejects.toBeInstanceOf(
      TaskExecutionError
    );
  });
});

describe('Verify - Trial Count', () => {
  it.each([0, -5, Number.NaN, 2.5])('should reject %s trials instead of reporting success', async (trials) => {
    const createState = vi.fn(() => ({ x: 0, y: 0 }));

    await expect(verifyDeterminism(underDeclared(), { createState, trials, workers: 2 })).rejects.toBeInstanceOf(
      InvalidDeclarationError
    );
    expect(createState).not.toHaveBeenCalled();
  });

  it('should apply the same check when measuring performance', async () => {
    await expect(
      measurePerformance(underDeclared(), { createState: () => ({ x: 0, y: 0 }), trials: 0 })
    ).rejects.toThrow('Invalid trial count');
  });
});
