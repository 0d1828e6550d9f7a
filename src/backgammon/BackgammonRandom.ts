/**
 * BackgammonRandom - Injectable randomness
 *
 * Dice, rollouts and random players all draw from an `Rng`, so a game is
 * reproducible from its seed.
 */

export interface Rng {
  /** Uniform float in [0, 1) */
  next(): number;
  /** Uniform integer in [min, max] */
  int(min: number, max: number): number;
  choice<T>(items: readonly T[]): T;
  /** Uniform integer in [1, 6] */
  rollDie(): number;
}

/** Mulberry32 */
export class SeededRandom implements Rng {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  next(): number {
    let t = (this.state = (this.state + 0x6d2b79f5) >>> 0);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  int(min: number, max: number): number {
    return min + Math.floor(this.next() * (max - min + 1));
  }

  choice<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new RangeError('Cannot choose from an empty list');
    }
    return items[this.int(0, items.length - 1)];
  }

  rollDie(): number {
    return this.int(1, 6);
  }
}

export function createSeededRng(seed: number): Rng {
  return new SeededRandom(seed);
}

/** Time-seeded generator for interactive play */
export function createDefaultRng(): Rng {
  return new SeededRandom((Date.now() ^ Math.floor(Math.random() * 0x100000000)) >>> 0);
}
