/**
 * Small deterministic RNG so randomized schedules can be replayed from a seed
 */
export class SeededRandom {
  private state: number;

  constructor(seed: number) {
    // Consecutive seeds must not start from neighbouring LCG states
    let h = seed >>> 0;
    h = Math.imul(h ^ (h >>> 16), 0x85ebca6b);
    h = Math.imul(h ^ (h >>> 13), 0xc2b2ae35);
    h = (h ^ (h >>> 16)) >>> 0;
    this.state = h || 0x9e3779b9;
  }

  /** Uniform value in [0, 1) */
  next(): number {
    this.state = (Math.imul(this.state, 1664525) + 1013904223) >>> 0;
    return this.state / 0x100000000;
  }

  nextInt(maxExclusive: number): number {
    if (!Number.isFinite(maxExclusive) || maxExclusive <= 1) {
      return 0;
    }
    return Math.floor(this.next() * maxExclusive);
  }
}
