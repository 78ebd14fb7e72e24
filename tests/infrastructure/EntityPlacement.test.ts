import { describe, it, expect } from 'vitest';
import {
  EntityPlacementStrategy,
  farHalfFrom,
  fullRegion,
  nearHalfTo,
} from '@/infrastructure/game/EntityPlacement.js';
import { MapGenerator } from '@/infrastructure/game/MapGenerator.js';
import { FixedRandom, SeededRandom } from '@/infrastructure/game/RandomSource.js';
import { FLOOR_1 } from '../helpers/fixtures.js';

const { map } = new MapGenerator().parseLayout({ floor: 1, rows: FLOOR_1 });
const strategy = new EntityPlacementStrategy();

describe('EntityPlacementStrategy', () => {
  it('takes the first free authored position without drawing', () => {
    const position = strategy.place(
      map,
      new Set(['3,3']),
      { authored: [{ x: 0, y: 0 }, { x: 3, y: 3 }, { x: 2, y: 2 }] },
      new FixedRandom([])
    );
    expect(position).toEqual({ x: 2, y: 2 });
  });

  it('samples a cell inside the region', () => {
    // x = floor(0.5 * 12), y = floor(0.5 * 8)
    const position = strategy.place(map, new Set(), { region: fullRegion(map) }, new FixedRandom([0.5, 0.5]));
    expect(position).toEqual({ x: 6, y: 4 });
  });

  it('falls back to a pick over every valid cell', () => {
    const column = { minX: 10, maxX: 10, minY: 1, maxY: 6 };

    expect(strategy.place(map, new Set(), { region: column, maxAttempts: 0 }, new FixedRandom([0]))).toEqual({
      x: 10,
      y: 1,
    });
    expect(strategy.place(map, new Set(['10,1']), { region: column, maxAttempts: 0 }, new FixedRandom([0]))).toEqual({
      x: 10,
      y: 2,
    });
  });

  it('honours the minimum distance and the predicate', () => {
    const rng = new SeededRandom(3);
    for (let i = 0; i < 20; i++) {
      const position = strategy.place(
        map,
        new Set(),
        {
          minDistanceFrom: { origin: { x: 1, y: 1 }, distance: 5 },
          predicate: (candidate) => candidate.y % 2 === 0,
        },
        rng
      );
      expect(position).not.toBeNull();
      expect(Math.max(Math.abs((position?.x ?? 0) - 1), Math.abs((position?.y ?? 0) - 1))).toBeGreaterThanOrEqual(5);
      expect((position?.y ?? 1) % 2).toBe(0);
    }
  });

  it('returns null when nothing fits', () => {
    const wallColumn = { minX: 0, maxX: 0, minY: 0, maxY: 7 };
    expect(strategy.place(map, new Set(), { region: wallColumn }, new SeededRandom(1))).toBeNull();
  });

  it('splits the map into halves around an origin', () => {
    expect(farHalfFrom(map, { x: 1, y: 1 })).toEqual({ minX: 6, maxX: 11, minY: 0, maxY: 7 });
    expect(nearHalfTo(map, { x: 1, y: 1 })).toEqual({ minX: 0, maxX: 5, minY: 0, maxY: 7 });
    expect(farHalfFrom(map, { x: 10, y: 1 })).toEqual({ minX: 0, maxX: 5, minY: 0, maxY: 7 });
  });
});
