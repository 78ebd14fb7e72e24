// Domain layer: Game types
// NO external dependencies - pure TypeScript

export interface Position {
  x: number;
  y: number;
}

export type Direction = 'up' | 'down' | 'left' | 'right';

export const DIRECTION_DELTAS: Record<Direction, Position> = {
  up: { x: 0, y: -1 },
  down: { x: 0, y: 1 },
  left: { x: -1, y: 0 },
  right: { x: 1, y: 0 },
};

export type EntityKind = 'player' | 'npc' | 'stairs' | 'terminal';

/**
 * Anything placed on the grid. The manager that spawned it owns it.
 */
export interface Entity {
  id: string;
  kind: EntityKind;
  position: Position;
  glyph: string;
  color: string;
  name: string;
  npcType?: NpcType;
}

export type StairsDirection = 'up' | 'down';

export interface StairsEntity extends Entity {
  kind: 'stairs';
  direction: StairsDirection;
}

export interface TerminalEntity extends Entity {
  kind: 'terminal';
  title: string;
  lines: string[];
}

// ============================================================================
// NPC types
// ============================================================================

export type NpcType = 'specialist' | 'helper' | 'enemy';

export interface NpcTypeBehavior {
  /** Multiplies the coherence gained from a correct answer. */
  rewardMultiplier: number;
  requiredByDefault: boolean;
  /** Which configured penalty a wrong answer costs. */
  penalty: 'standard' | 'enemy';
  /** Helpers restore coherence on first contact instead of quizzing. */
  restoresOnContact: boolean;
  /** Accepted commands to wait between two wander steps. */
  moveCooldown: number;
}

export const NPC_TYPE_BEHAVIOR: Record<NpcType, NpcTypeBehavior> = {
  specialist: {
    rewardMultiplier: 1,
    requiredByDefault: true,
    penalty: 'standard',
    restoresOnContact: false,
    moveCooldown: 2,
  },
  helper: {
    rewardMultiplier: 1,
    requiredByDefault: false,
    penalty: 'standard',
    restoresOnContact: true,
    moveCooldown: 3,
  },
  enemy: {
    rewardMultiplier: 1,
    requiredByDefault: true,
    penalty: 'enemy',
    restoresOnContact: false,
    moveCooldown: 1,
  },
};

// ============================================================================
// Grid
// ============================================================================

export const WALL = '#';
export const FLOOR = '.';

/**
 * Walkability grid for one floor, indexed `walkable[y][x]`.
 */
export interface FloorMap {
  width: number;
  height: number;
  walkable: boolean[][];
  spawn: Position;
}

export function inBounds(map: FloorMap, x: number, y: number): boolean {
  return x >= 0 && y >= 0 && x < map.width && y < map.height;
}

export function isWalkable(map: FloorMap, x: number, y: number): boolean {
  return inBounds(map, x, y) && map.walkable[y][x];
}

export function positionKey(position: Position): string {
  return `${position.x},${position.y}`;
}

export function samePosition(a: Position, b: Position): boolean {
  return a.x === b.x && a.y === b.y;
}

export function chebyshevDistance(a: Position, b: Position): number {
  return Math.max(Math.abs(a.x - b.x), Math.abs(a.y - b.y));
}

export function manhattanDistance(a: Position, b: Position): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

export function mapToRows(map: FloorMap): string[] {
  return map.walkable.map((row) => row.map((open) => (open ? FLOOR : WALL)).join(''));
}
