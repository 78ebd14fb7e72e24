// Infrastructure layer: Floor map generation
// Parses authored layouts or carves connected room/corridor maps

import type { FloorLayout } from '@/domain/content/types.js';
import { WALL, type FloorMap, type Position } from '@/domain/game/types.js';
import { invariant } from '@/utils/errors.js';
import type { RandomSource } from './RandomSource.js';

export const MIN_MAP_SIZE = 8;

export const LAYOUT_PLAYER = '@';
export const LAYOUT_UP_STAIRS = '<';
export const LAYOUT_DOWN_STAIRS = '>';
export const LAYOUT_TERMINAL = 'T';

/**
 * Positions designers marked in an authored layout. NPC glyph markers are
 * keyed by glyph, in row-major order.
 */
export interface LayoutMarkers {
  playerStart?: Position;
  upStairs?: Position;
  downStairs?: Position;
  terminals: Position[];
  npcs: Map<string, Position[]>;
}

export interface GeneratedFloor {
  map: FloorMap;
  markers: LayoutMarkers;
}

interface Room {
  x: number;
  y: number;
  width: number;
  height: number;
}

function emptyMarkers(): LayoutMarkers {
  return { terminals: [], npcs: new Map() };
}

function roomCenter(room: Room): Position {
  return {
    x: room.x + Math.floor(room.width / 2),
    y: room.y + Math.floor(room.height / 2),
  };
}

function roomsOverlap(a: Room, b: Room): boolean {
  // One cell of wall is kept between rooms
  return (
    a.x - 1 < b.x + b.width &&
    a.x + a.width + 1 > b.x &&
    a.y - 1 < b.y + b.height &&
    a.y + a.height + 1 > b.y
  );
}

export class MapGenerator {
  generate(
    width: number,
    height: number,
    floor: number,
    rng: RandomSource,
    layout?: FloorLayout
  ): GeneratedFloor {
    if (layout) {
      return this.parseLayout(layout);
    }

    invariant(width >= MIN_MAP_SIZE && height >= MIN_MAP_SIZE, `Map must be at least ${MIN_MAP_SIZE}x${MIN_MAP_SIZE}`, {
      width,
      height,
    });

    return { map: this.carve(width, height, floor, rng), markers: emptyMarkers() };
  }

  /**
   * Authored rows: `#` and blanks are walls, everything else is walkable.
   * Short rows are padded with walls and the outer border is always wall.
   */
  parseLayout(layout: FloorLayout): GeneratedFloor {
    const height = layout.rows.length;
    const width = Math.max(0, ...layout.rows.map((row) => row.length));
    invariant(width >= MIN_MAP_SIZE && height >= MIN_MAP_SIZE, `Layout for floor ${layout.floor} is smaller than ${MIN_MAP_SIZE}x${MIN_MAP_SIZE}`);

    const markers = emptyMarkers();
    const walkable: boolean[][] = [];
    let firstOpen: Position | undefined;

    for (let y = 0; y < height; y++) {
      const row: boolean[] = [];
      for (let x = 0; x < width; x++) {
        const cell = layout.rows[y][x] ?? WALL;
        const border = x === 0 || y === 0 || x === width - 1 || y === height - 1;
        const open = !border && cell !== WALL && cell !== ' ';
        row.push(open);
        if (!open) continue;

        const position = { x, y };
        firstOpen ??= position;

        if (cell === LAYOUT_PLAYER) {
          markers.playerStart ??= position;
        } else if (cell === LAYOUT_UP_STAIRS) {
          markers.upStairs ??= position;
        } else if (cell === LAYOUT_DOWN_STAIRS) {
          markers.downStairs ??= position;
        } else if (cell === LAYOUT_TERMINAL) {
          markers.terminals.push(position);
        } else if (/^[A-Za-z]$/.test(cell)) {
          const list = markers.npcs.get(cell) ?? [];
          list.push(position);
          markers.npcs.set(cell, list);
        }
      }
      walkable.push(row);
    }

    invariant(firstOpen !== undefined, `Layout for floor ${layout.floor} has no walkable cell`);
    const spawn = markers.playerStart ?? firstOpen;

    return { map: { width, height, walkable, spawn }, markers };
  }

  private carve(width: number, height: number, floor: number, rng: RandomSource): FloorMap {
    const walkable: boolean[][] = Array.from({ length: height }, () => Array<boolean>(width).fill(false));
    const rooms: Room[] = [];
    const target = Math.min(4 + floor * 2, 12);
    const maxRoomWidth = Math.min(10, width - 4);
    const maxRoomHeight = Math.min(6, height - 4);

    for (let attempt = 0; attempt < target * 10 && rooms.length < target; attempt++) {
      const roomWidth = rng.int(4, maxRoomWidth);
      const roomHeight = rng.int(3, maxRoomHeight);
      const room: Room = {
        x: rng.int(1, width - roomWidth - 1),
        y: rng.int(1, height - roomHeight - 1),
        width: roomWidth,
        height: roomHeight,
      };

      if (rooms.some((existing) => roomsOverlap(existing, room))) {
        continue;
      }

      this.carveRoom(walkable, room);
      const previous = rooms[rooms.length - 1];
      if (previous) {
        this.carveCorridor(walkable, roomCenter(previous), roomCenter(room), rng.next() < 0.5);
      }
      rooms.push(room);
    }

    // The first attempt can never overlap, so there is always a room
    invariant(rooms.length > 0, 'Map generation produced no rooms');

    const spawn = roomCenter(rooms[0]);
    this.wallOffUnreachable(walkable, spawn);

    return { width, height, walkable, spawn };
  }

  private carveRoom(walkable: boolean[][], room: Room): void {
    for (let y = room.y; y < room.y + room.height; y++) {
      for (let x = room.x; x < room.x + room.width; x++) {
        walkable[y][x] = true;
      }
    }
  }

  // L-shaped corridor between two room centers
  private carveCorridor(walkable: boolean[][], from: Position, to: Position, horizontalFirst: boolean): void {
    const corner = horizontalFirst ? { x: to.x, y: from.y } : { x: from.x, y: to.y };
    this.carveLine(walkable, from, corner);
    this.carveLine(walkable, corner, to);
  }

  private carveLine(walkable: boolean[][], from: Position, to: Position): void {
    const stepX = Math.sign(to.x - from.x);
    const stepY = Math.sign(to.y - from.y);
    let { x, y } = from;
    walkable[y][x] = true;
    while (x !== to.x || y !== to.y) {
      x += stepX;
      y += stepY;
      walkable[y][x] = true;
    }
  }

  private wallOffUnreachable(walkable: boolean[][], spawn: Position): void {
    const reachable = floodFill(walkable, spawn);
    for (let y = 0; y < walkable.length; y++) {
      for (let x = 0; x < walkable[y].length; x++) {
        if (walkable[y][x] && !reachable[y][x]) {
          walkable[y][x] = false;
        }
      }
    }
  }
}

/**
 * Four-way flood fill over walkable cells. Returns a grid of reached cells.
 */
export function floodFill(walkable: boolean[][], start: Position): boolean[][] {
  const reached = walkable.map((row) => row.map(() => false));
  if (!walkable[start.y]?.[start.x]) {
    return reached;
  }

  const queue: Position[] = [start];
  reached[start.y][start.x] = true;

  while (queue.length > 0) {
    const current = queue.shift();
    if (!current) break;
    const neighbours = [
      { x: current.x + 1, y: current.y },
      { x: current.x - 1, y: current.y },
      { x: current.x, y: current.y + 1 },
      { x: current.x, y: current.y - 1 },
    ];
    for (const next of neighbours) {
      if (walkable[next.y]?.[next.x] && !reached[next.y][next.x]) {
        reached[next.y][next.x] = true;
        queue.push(next);
      }
    }
  }

  return reached;
}
