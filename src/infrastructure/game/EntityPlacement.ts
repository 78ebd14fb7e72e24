// Infrastructure layer: Entity placement
// Finds free walkable cells, authored positions first, then seeded sampling

import {
  chebyshevDistance,
  isWalkable,
  positionKey,
  type FloorMap,
  type Position,
} from '@/domain/game/types.js';
import type { RandomSource } from './RandomSource.js';

export const DEFAULT_PLACEMENT_ATTEMPTS = 100;

/** Inclusive cell bounds. */
export interface Region {
  minX: number;
  maxX: number;
  minY: number;
  maxY: number;
}

export interface PlacementRequest {
  authored?: Position[];
  region?: Region;
  minDistanceFrom?: { origin: Position; distance: number };
  predicate?: (position: Position) => boolean;
  maxAttempts?: number;
}

export function fullRegion(map: FloorMap): Region {
  return { minX: 0, maxX: map.width - 1, minY: 0, maxY: map.height - 1 };
}

export function leftHalf(map: FloorMap): Region {
  return { ...fullRegion(map), maxX: Math.floor(map.width / 2) - 1 };
}

export function rightHalf(map: FloorMap): Region {
  return { ...fullRegion(map), minX: Math.floor(map.width / 2) };
}

export function nearHalfTo(map: FloorMap, origin: Position): Region {
  return origin.x < map.width / 2 ? leftHalf(map) : rightHalf(map);
}

export function farHalfFrom(map: FloorMap, origin: Position): Region {
  return origin.x < map.width / 2 ? rightHalf(map) : leftHalf(map);
}

function clampRegion(map: FloorMap, region: Region): Region {
  return {
    minX: Math.max(0, region.minX),
    maxX: Math.min(map.width - 1, region.maxX),
    minY: Math.max(0, region.minY),
    maxY: Math.min(map.height - 1, region.maxY),
  };
}

export class EntityPlacementStrategy {
  /**
   * Returns a free cell for the request or null when none exists.
   * `excluded` holds position keys already taken on this floor.
   */
  place(
    map: FloorMap,
    excluded: ReadonlySet<string>,
    request: PlacementRequest,
    rng: RandomSource
  ): Position | null {
    const isFree = (position: Position): boolean =>
      isWalkable(map, position.x, position.y) && !excluded.has(positionKey(position));

    for (const position of request.authored ?? []) {
      if (isFree(position)) {
        return { x: position.x, y: position.y };
      }
    }

    const region = clampRegion(map, request.region ?? fullRegion(map));
    if (region.minX > region.maxX || region.minY > region.maxY) {
      return null;
    }

    const isValid = (position: Position): boolean => {
      if (!isFree(position)) return false;
      const constraint = request.minDistanceFrom;
      if (constraint && chebyshevDistance(position, constraint.origin) < constraint.distance) {
        return false;
      }
      return request.predicate ? request.predicate(position) : true;
    };

    const attempts = request.maxAttempts ?? DEFAULT_PLACEMENT_ATTEMPTS;
    for (let attempt = 0; attempt < attempts; attempt++) {
      const candidate = {
        x: rng.int(region.minX, region.maxX),
        y: rng.int(region.minY, region.maxY),
      };
      if (isValid(candidate)) {
        return candidate;
      }
    }

    // Sampling missed; fall back to a uniform pick over every valid cell
    const candidates: Position[] = [];
    for (let y = region.minY; y <= region.maxY; y++) {
      for (let x = region.minX; x <= region.maxX; x++) {
        const position = { x, y };
        if (isValid(position)) {
          candidates.push(position);
        }
      }
    }

    return candidates.length > 0 ? rng.pick(candidates) : null;
  }
}
