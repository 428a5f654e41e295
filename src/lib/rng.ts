/**
 * Random Sources
 *
 * The generator draws every decision from a RandomSource. A seeded source
 * makes a run reproducible (same seed + same config = identical stream);
 * the unseeded source wraps Math.random.
 */

export interface RandomSource {
  /** Float in [0, 1) */
  random(): number;
  /** Integer in [0, max) */
  randomInt(max: number): number;
  /** Integer in [min, max] */
  randomRange(min: number, max: number): number;
  /** True with probability p */
  chance(p: number): boolean;
  randomChoice<T>(items: readonly T[]): T;
}

/**
 * Derived draws shared by every source; subclasses only supply random()
 */
export abstract class BaseRandomSource implements RandomSource {
  abstract random(): number;

  randomInt(max: number): number {
    return Math.floor(this.random() * max);
  }

  randomRange(min: number, max: number): number {
    return min + this.randomInt(max - min + 1);
  }

  chance(p: number): boolean {
    return this.random() < p;
  }

  randomChoice<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new RangeError("Cannot choose from an empty list");
    }
    return items[this.randomInt(items.length)];
  }
}

/**
 * Mulberry32 PRNG - 32-bit state, deterministic for a given seed
 */
export class SeededRNG extends BaseRandomSource {
  private state: number;

  constructor(seed: number) {
    super();
    this.state = seed >>> 0;
  }

  random(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }
}

export class MathRandomSource extends BaseRandomSource {
  random(): number {
    return Math.random();
  }
}

export function createRandomSource(seed?: number): RandomSource {
  return seed === undefined ? new MathRandomSource() : new SeededRNG(seed);
}
