/**
 * Seeded random source for catalog sampling and level generation
 */

export interface Rng {
  /** Uniform float in [0, 1) */
  next(): number;
}

export class Mulberry32 implements Rng {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  next(): number {
    let t = (this.state += 0x6d2b79f5) | 0;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }
}

export function createRng(seed: number): Rng {
  return new Mulberry32(seed);
}

/** Uniform integer in [0, bound) */
export function randomInt(rng: Rng, bound: number): number {
  if (!Number.isInteger(bound) || bound <= 0) {
    throw new RangeError(`randomInt bound must be a positive integer, got ${bound}`);
  }
  return Math.floor(rng.next() * bound);
}

export function randomBit(rng: Rng): boolean {
  return rng.next() < 0.5;
}

export function randomChoice<T>(rng: Rng, items: readonly T[]): T {
  if (items.length === 0) {
    throw new RangeError('randomChoice called with an empty list');
  }
  return items[randomInt(rng, items.length)];
}
