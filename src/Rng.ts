/** Anything that can hand out uniform integers; the Game only needs this much. */
export interface RandomSource {
  /** Returns an integer in [0, n). */
  nextInt(n: number): number;
}

/**
 * Seeded pseudo-random number generator using the Mulberry32 algorithm.
 * Deterministic: same seed always produces the same sequence.
 */
export class Rng implements RandomSource {
  private state: number;

  constructor(seed: number) {
    // Coerce to unsigned 32-bit integer
    this.state = seed >>> 0;
  }

  /** Returns a float in [0, 1). */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) >>> 0;
    return ((t ^ (t >>> 14)) >>> 0) / 0x100000000;
  }

  nextInt(n: number): number {
    return Math.floor(this.next() * n);
  }
}

/** Uniformly picks one element of a non-empty list. */
export function pick<T>(random: RandomSource, items: readonly T[]): T {
  return items[random.nextInt(items.length)];
}
