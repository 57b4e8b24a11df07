import { SeededRandom, task, type TaskSpec } from '../src/index.js';

export const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export type Vars = Record<string, number>;

/**
 * Task with a no-op body. Use in tests that only look at the graph.
 */
export function makeTask(name: string, writes: string[] = [], reads: string[] = []): TaskSpec<Vars> {
  return task<Vars>(name, { reads, writes }, () => {});
}

/**
 * Pseudo-random system over `variables` with deterministic, honestly
 * declared bodies that yield to the event loop between reading and writing.
 */
export function randomSystem(seed: number, size: number, variables: readonly string[]): TaskSpec<Vars>[] {
  const random = new SeededRandom(seed);
  return Array.from({ length: size }, (_, index) => {
    const reads = variables.filter(() => random.next() < 0.3);
    const writes = variables.filter(() => random.next() < 0.25);
    const pause = random.nextInt(3);

    return task<Vars>(`t${index}`, { reads, writes }, async (state) => {
      let acc = index + 1;
      for (const key of reads) acc = (acc * 31 + state[key]) % 9973;
      await delay(pause);
      for (const key of writes) state[key] = (acc + state[key] * 7) % 9973;
    });
  });
}

export function zeroes(variables: readonly string[]): Vars {
  return Object.fromEntries(variables.map((key) => [key, 0]));
}
