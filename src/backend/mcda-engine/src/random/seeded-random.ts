/**
 * Seeded Pseudo-Random Source
 *
 * Every stochastic operation takes a RandomSource explicitly; there is no
 * process-wide random state. One source serves a whole run and is never
 * re-seeded between trials.
 *
 * @tested tests/property/score-intervals.property.test.ts
 */

/**
 * Uniform pseudo-random stream
 */
export interface RandomSource {
  /** Next value in [0, 1) */
  next(): number;
  /** Next value in [low, high) */
  uniform(low: number, high: number): number;
}

/**
 * Mulberry32: 32-bit state, period 2^32. Identical sequence on every
 * platform for a given seed.
 */
export class Mulberry32 implements RandomSource {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let r = Math.imul(this.state ^ (this.state >>> 15), this.state | 1);
    r ^= r + Math.imul(r ^ (r >>> 7), r | 61);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  }

  uniform(low: number, high: number): number {
    return low + (high - low) * this.next();
  }
}

export function createSeededRandom(seed: number): RandomSource {
  return new Mulberry32(seed);
}
