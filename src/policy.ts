/**
 * Ready-queue policies for the parallel scheduler
 */

import { SeededRandom } from './random.js';

/**
 * Chooses which ready task a free worker takes next
 *
 * Receives the declaration positions of the ready tasks (never empty) and
 * returns an index into that array.
 */
export type ReadyPolicy = (ready: readonly number[]) => number;

/** Always take the earliest-declared ready task */
export const declarationOrder: ReadyPolicy = (ready) => {
  let lowest = 0;
  for (let k = 1; k < ready.length; k++) {
    if (ready[k] < ready[lowest]) lowest = k;
  }
  return lowest;
};

/** Take a uniformly random ready task; the same seed replays the same choices */
export function randomOrder(seed: number): ReadyPolicy {
  const random = new SeededRandom(seed);
  return (ready) => random.nextInt(ready.length);
}
