// Infrastructure layer: Random number sources
// Injectable RNG so map generation, placement and shuffles are reproducible

export interface RandomSource {
  /** Uniform float in [0, 1). */
  next(): number;
  /** Uniform integer in [min, max], both inclusive. */
  int(min: number, max: number): number;
  pick<T>(items: readonly T[]): T;
  shuffle<T>(items: readonly T[]): T[];
}

abstract class BaseRandom implements RandomSource {
  abstract next(): number;

  int(min: number, max: number): number {
    if (max < min) {
      throw new Error(`Invalid range: [${min}, ${max}]`);
    }
    return min + Math.floor(this.next() * (max - min + 1));
  }

  pick<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new Error('Cannot pick from an empty list');
    }
    return items[this.int(0, items.length - 1)];
  }

  // Fisher-Yates, returns a new array
  shuffle<T>(items: readonly T[]): T[] {
    const result = [...items];
    for (let i = result.length - 1; i > 0; i--) {
      const j = this.int(0, i);
      [result[i], result[j]] = [result[j], result[i]];
    }
    return result;
  }
}

/**
 * Seeded generator for reproducible sessions.
 * Uses the glibc LCG constants over a 31-bit state, which is exposed so a
 * saved session continues the same sequence.
 */
export class SeededRandom extends BaseRandom {
  private state: number;

  constructor(seed: number) {
    super();
    this.state = seed & 0x7fffffff;
  }

  next(): number {
    this.state = (Math.imul(this.state, 1103515245) + 12345) & 0x7fffffff;
    return this.state / 0x80000000;
  }

  getState(): number {
    return this.state;
  }

  setState(state: number): void {
    this.state = state & 0x7fffffff;
  }
}

/**
 * Mix a session seed with a salt (e.g. a floor number) so each floor gets
 * an independent but stable stream.
 */
export function deriveSeed(seed: number, salt: number): number {
  return (Math.imul(seed ^ 0x5bd1e995, 31) + Math.imul(salt + 1, 0x9e3779b1)) & 0x7fffffff;
}

/**
 * Fixed source for testing
 * Returns predetermined values from an array, in order
 */
export class FixedRandom extends BaseRandom {
  private values: number[];

  constructor(values: number[]) {
    super();
    this.values = [...values];
  }

  next(): number {
    const value = this.values.shift();
    if (value === undefined) {
      throw new Error('FixedRandom: No more values available');
    }
    if (value < 0 || value >= 1) {
      throw new Error(`FixedRandom: Value ${value} outside [0, 1)`);
    }
    return value;
  }

  get remaining(): number {
    return this.values.length;
  }
}
