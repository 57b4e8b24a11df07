/**
 * Tests for Bernstein conflict detection
 */

import { describe, it, expect } from 'vitest';
import { conflicts, detectHazards } from '../src/index.js';
import { makeTask } from './helpers.js';

describe('Conflict - Bernstein conditions', () => {
  it('should report write/read overlap as a conflict', () => {
    expect(conflicts(makeTask('a', ['x']), makeTask('b', [], ['x']))).toBe(true);
  });

  it('should report read/write overlap as a conflict', () => {
    expect(conflicts(makeTask('a', [], ['x']), makeTask('b', ['x']))).toBe(true);
  });

  it('should report write/write overlap as a conflict', () => {
    expect(conflicts(makeTask('a', ['x']), makeTask('b', ['x']))).toBe(true);
  });

  it('should allow shared reads', () => {
    expect(conflicts(makeTask('a', ['y'], ['x']), makeTask('b', ['z'], ['x']))).toBe(false);
  });

  it('should allow disjoint access sets', () => {
    expect(conflicts(makeTask('a', ['x'], ['y']), makeTask('b', ['z'], ['w']))).toBe(false);
  });

  it('should be symmetric', () => {
    const a = makeTask('a', ['x']);
    const b = makeTask('b', [], ['x']);
    expect(conflicts(a, b)).toBe(conflicts(b, a));
  });
});

describe('Conflict - Hazard classification', () => {
  it('should classify each conflicting variable', () => {
    const a = makeTask('a', ['x'], ['y']);
    const b = makeTask('b', ['y'], ['x']);

    expect(detectHazards(a, b)).toEqual([
      { type: 'WAR', source: 'a', target: 'b', variable: 'y' },
      { type: 'RAW', source: 'a', target: 'b', variable: 'x' },
    ]);
  });

  it('should fold read-modify-write against a writer into WAW', () => {
    const a = makeTask('a', ['x'], ['x']);
    const b = makeTask('b', ['x']);

    expect(detectHazards(a, b)).toEqual([{ type: 'WAW', source: 'a', target: 'b', variable: 'x' }]);
  });

  it('should return no hazards for non-conflicting tasks', () => {
    expect(detectHazards(makeTask('a', [], ['x']), makeTask('b', [], ['x']))).toEqual([]);
  });
});
