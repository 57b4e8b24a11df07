/**
 * Tests for configuration resolution and logging
 */

import { afterEach, describe, it, expect, vi } from 'vitest';
import { createLogger, defaultWorkerCount, InvalidDeclarationError, resolveConfig } from '../src/index.js';
import { resolveWorkerCount } from '../src/config.js';

describe('Config - Resolution', () => {
  it('should fall back to defaults', () => {
    expect(resolveConfig({}, {})).toEqual({ trials: 5, seed: 12345, validateAccess: false });
  });

  it('should read the environment', () => {
    const config = resolveConfig(
      {},
      {
        CONFLICT_DAG_WORKERS: '3',
        CONFLICT_DAG_TRIALS: '50',
        CONFLICT_DAG_SEED: '7',
        CONFLICT_DAG_VALIDATE_ACCESS: 'true',
        CONFLICT_DAG_LOG_LEVEL: 'debug',
      }
    );

    expect(config).toEqual({ workers: 3, trials: 50, seed: 7, validateAccess: true, logLevel: 'debug' });
  });

  it('should let explicit options override the environment', () => {
    const config = resolveConfig({ workers: 2, validateAccess: false }, { CONFLICT_DAG_WORKERS: '3', CONFLICT_DAG_VALIDATE_ACCESS: '1' });

    expect(config.workers).toBe(2);
    expect(config.validateAccess).toBe(false);
  });

  it('should ignore empty environment values', () => {
    expect(resolveConfig({}, { CONFLICT_DAG_TRIALS: '' }).trials).toBe(5);
  });

  it('should reject malformed environment values', () => {
    expect(() => resolveConfig({}, { CONFLICT_DAG_WORKERS: 'many' })).toThrow(InvalidDeclarationError);
    expect(() => resolveConfig({}, { CONFLICT_DAG_VALIDATE_ACCESS: 'yes' })).toThrow(InvalidDeclarationError);
  });

  it('should reject invalid explicit options', () => {
    expect(() => resolveConfig({ trials: 0 }, {})).toThrow(InvalidDeclarationError);
    expect(() => resolveConfig({ workers: 1.5 }, {})).toThrow(InvalidDeclarationError);
  });
});

describe('Config - Worker Count', () => {
  it('should default to hardware parallelism', () => {
    expect(resolveWorkerCount(undefined)).toBe(defaultWorkerCount());
    expect(defaultWorkerCount()).toBeGreaterThanOrEqual(1);
  });

  it('should accept positive integers only', () => {
    expect(resolveWorkerCount(3)).toBe(3);
    expect(() => resolveWorkerCount(-1)).toThrow(InvalidDeclarationError);
  });
});

describe('Logger - Levels', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should print messages at or above the minimum level', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = createLogger('warn', '[test]');

    logger.info('hidden');
    logger.warn('careful');

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toMatch(/^\d{4}-\d{2}-\d{2}T.+Z WARN  \[test\] careful$/);
  });

  it('should change level at runtime', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const logger = createLogger('error', '[test]');

    logger.debug('before');
    logger.setLevel('debug');
    logger.debug('after', { extra: 1 });

    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug.mock.calls[0][1]).toEqual({ extra: 1 });
  });
});
