/**
 * conflict-dag - parallel task execution from declared read/write sets
 *
 * @see ./src/index.ts
 */

export * from './src/index.js';
