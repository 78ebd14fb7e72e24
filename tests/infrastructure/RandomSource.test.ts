import { describe, it, expect } from 'vitest';
import { FixedRandom, SeededRandom, deriveSeed } from '@/infrastructure/game/RandomSource.js';

function draw(rng: SeededRandom, count: number): number[] {
  return Array.from({ length: count }, () => rng.next());
}

describe('SeededRandom', () => {
  it('advances a 31-bit linear congruential state', () => {
    const rng = new SeededRandom(0);
    expect(rng.next()).toBe(12345 / 0x80000000);
    expect(rng.getState()).toBe(12345);
  });

  it('repeats the sequence for the same seed', () => {
    expect(draw(new SeededRandom(42), 20)).toEqual(draw(new SeededRandom(42), 20));
    expect(draw(new SeededRandom(1), 5)).not.toEqual(draw(new SeededRandom(2), 5));
  });

  it('continues from a restored state', () => {
    const original = new SeededRandom(9);
    draw(original, 3);

    const copy = new SeededRandom(0);
    copy.setState(original.getState());
    expect(draw(copy, 5)).toEqual(draw(original, 5));
  });

  it('keeps integers inside the inclusive range', () => {
    const rng = new SeededRandom(123);
    const values = Array.from({ length: 500 }, () => rng.int(3, 7));

    expect(Math.min(...values)).toBe(3);
    expect(Math.max(...values)).toBe(7);
    expect(values.every(Number.isInteger)).toBe(true);
  });

  it('shuffles into a permutation without touching the input', () => {
    const input = [1, 2, 3, 4, 5, 6];
    const shuffled = new SeededRandom(5).shuffle(input);

    expect(input).toEqual([1, 2, 3, 4, 5, 6]);
    expect([...shuffled].sort((a, b) => a - b)).toEqual(input);
  });
});

describe('FixedRandom', () => {
  it('maps values onto ranges and lists', () => {
    expect(new FixedRandom([0.5]).int(1, 6)).toBe(4);
    expect(new FixedRandom([0.99]).pick(['a', 'b', 'c'])).toBe('c');
  });

  it('shuffles with Fisher-Yates from the end', () => {
    // i=2 swaps with 0, then i=1 swaps with 0
    expect(new FixedRandom([0, 0]).shuffle([1, 2, 3])).toEqual([2, 3, 1]);
  });

  it('reports what is left and fails when exhausted', () => {
    const rng = new FixedRandom([0.1, 0.2]);
    rng.next();
    expect(rng.remaining).toBe(1);
    rng.next();
    expect(() => rng.next()).toThrow('FixedRandom: No more values available');
  });

  it('refuses values outside [0, 1)', () => {
    expect(() => new FixedRandom([1]).next()).toThrow('FixedRandom: Value 1 outside [0, 1)');
  });

  it('guards invalid ranges and empty lists', () => {
    expect(() => new FixedRandom([0.5]).int(5, 1)).toThrow('Invalid range: [5, 1]');
    expect(() => new FixedRandom([0.5]).pick([])).toThrow('Cannot pick from an empty list');
  });
});

describe('deriveSeed', () => {
  it('is stable, non-negative and salt dependent', () => {
    expect(deriveSeed(42, 1)).toBe(deriveSeed(42, 1));
    expect(deriveSeed(42, 1)).not.toBe(deriveSeed(42, 2));
    for (const salt of [0, 1, 2, 3, 10]) {
      const seed = deriveSeed(7, salt);
      expect(seed).toBeGreaterThanOrEqual(0);
      expect(seed).toBeLessThan(0x80000000);
    }
  });
});
