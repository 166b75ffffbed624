/**
 * Seeded pseudo-random number generation.
 *
 * Each engine owns exactly one SeededRng, so two engines built from
 * the same seed shuffle identically and never share random state.
 */

/** Same contract as Math.random: a float in [0, 1). */
export type RandomSource = () => number;

/** mulberry32: small, fast 32-bit generator. */
function mulberry32(seed: number): RandomSource {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export class SeededRng {
  readonly seed: number;
  private readonly source: RandomSource;

  constructor(seed: number) {
    if (!Number.isSafeInteger(seed)) {
      throw new RangeError(`Seed must be a safe integer, got ${seed}`);
    }
    this.seed = seed;
    this.source = mulberry32(seed);
  }

  /** Next float in [0, 1). */
  next(): number {
    return this.source();
  }

  /**
   * Integer in [min, max).
   * @throws {RangeError} if the range is empty.
   */
  nextInt(min: number, max: number): number {
    if (min >= max) {
      throw new RangeError(`min (${min}) must be less than max (${max})`);
    }
    return min + Math.floor(this.source() * (max - min));
  }

  /**
   * Fisher-Yates shuffle. Returns a new array; the input is not touched.
   */
  shuffle<T>(items: readonly T[]): T[] {
    const result = items.slice();
    for (let i = result.length - 1; i > 0; i--) {
      const j = Math.floor(this.source() * (i + 1));
      [result[i], result[j]] = [result[j], result[i]];
    }
    return result;
  }

  /**
   * Pick one element uniformly.
   * @throws {RangeError} on an empty array.
   */
  pick<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new RangeError('Cannot pick from an empty array');
    }
    return items[this.nextInt(0, items.length)];
  }

  /** Adapter for APIs that take a bare `() => number`. */
  asSource(): RandomSource {
    return () => this.source();
  }
}

export function createRng(seed: number): SeededRng {
  return new SeededRng(seed);
}

/** A fresh seed for callers that did not supply one. */
export function randomSeed(): number {
  return Math.floor(Math.random() * 0x7fffffff);
}
