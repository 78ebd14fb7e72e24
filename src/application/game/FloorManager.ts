// Application layer: Floor manager
// Builds floors, places stairs and terminals, and guards floor transitions

import type { ContentBundle } from '@/domain/content/types.js';
import {
  chebyshevDistance,
  mapToRows,
  positionKey,
  samePosition,
  type FloorMap,
  type Position,
  type StairsDirection,
  type StairsEntity,
  type TerminalEntity,
} from '@/domain/game/types.js';
import {
  farHalfFrom,
  fullRegion,
  nearHalfTo,
  type EntityPlacementStrategy,
  type PlacementRequest,
} from '@/infrastructure/game/EntityPlacement.js';
import type { MapGenerator } from '@/infrastructure/game/MapGenerator.js';
import { SeededRandom, deriveSeed, type RandomSource } from '@/infrastructure/game/RandomSource.js';
import type { SessionConfig } from '@/utils/config.js';
import { invariant } from '@/utils/errors.js';
import { gameLogger } from '@/utils/logger.js';
import type { NPCManager } from './NPCManager.js';

const logger = gameLogger.child('FloorManager');

/** Down stairs must be more than this many columns from the spawn. */
export const STAIRS_MIN_COLUMN_GAP = 10;

export const STAIRS_GLYPHS: Record<StairsDirection, string> = { up: '<', down: '>' };
export const STAIRS_COLOR = 'yellow';
export const TERMINAL_GLYPH = 'T';
export const TERMINAL_COLOR = 'cyan';

export interface FloorState {
  number: number;
  map: FloorMap;
  spawn: Position;
  upStairs: StairsEntity | null;
  downStairs: StairsEntity | null;
  terminals: TerminalEntity[];
  warnings: string[];
}

export type TransitionResult =
  | { kind: 'not_on_stairs' }
  | { kind: 'blocked'; outstanding: string[] }
  | { kind: 'no_op' }
  | { kind: 'victory' }
  | { kind: 'entered'; floor: FloorState; arrival: Position };

export interface FloorManagerDeps {
  content: ContentBundle;
  config: Readonly<SessionConfig>;
  npcManager: NPCManager;
  mapGenerator: MapGenerator;
  placement: EntityPlacementStrategy;
}

export class FloorManager {
  private readonly content: ContentBundle;
  private readonly config: Readonly<SessionConfig>;
  private readonly npcManager: NPCManager;
  private readonly mapGenerator: MapGenerator;
  private readonly placement: EntityPlacementStrategy;
  private current: FloorState | null = null;

  constructor(deps: FloorManagerDeps) {
    this.content = deps.content;
    this.config = deps.config;
    this.npcManager = deps.npcManager;
    this.mapGenerator = deps.mapGenerator;
    this.placement = deps.placement;
  }

  getFloor(): FloorState {
    invariant(this.current !== null, 'No floor has been entered');
    return this.current;
  }

  /**
   * Build floor `n` from its own rng stream so the same seed always yields
   * the same layout, stairs, terminals and NPC spawns.
   */
  enterFloor(n: number): FloorState {
    invariant(n >= 1 && n <= this.config.maxFloors, 'Floor out of range', { floor: n, maxFloors: this.config.maxFloors });

    const rng = new SeededRandom(deriveSeed(this.config.seed, n));
    const { map, markers } = this.mapGenerator.generate(
      this.config.mapWidth,
      this.config.mapHeight,
      n,
      rng,
      this.content.layouts.get(n)
    );
    const spawn = markers.playerStart ?? map.spawn;
    const excluded = new Set<string>([positionKey(spawn)]);
    const warnings: string[] = [];

    // Last floor keeps a down exit; taking it wins the game
    const downPosition = this.placeWithFallback(map, excluded, rng, [
      {
        authored: markers.downStairs ? [markers.downStairs] : [],
        region: farHalfFrom(map, spawn),
        predicate: (position) => Math.abs(position.x - spawn.x) > STAIRS_MIN_COLUMN_GAP,
      },
      { region: farHalfFrom(map, spawn) },
      { region: fullRegion(map) },
    ]);
    const downStairs = downPosition ? this.createStairs(n, 'down', downPosition) : null;
    if (!downStairs) {
      warnings.push(`CRITICAL: no cell for the down stairs on floor ${n}`);
    }

    let upStairs: StairsEntity | null = null;
    if (n > 1) {
      const upPosition = this.placeWithFallback(map, excluded, rng, [
        { authored: markers.upStairs ? [markers.upStairs] : [], region: nearHalfTo(map, spawn) },
        { region: fullRegion(map) },
      ]);
      upStairs = upPosition ? this.createStairs(n, 'up', upPosition) : null;
      if (!upStairs) {
        warnings.push(`No cell for the up stairs on floor ${n}`);
      }
    }

    const terminals = this.placeTerminals(n, map, excluded, rng, markers.terminals, warnings);

    warnings.push(
      ...this.npcManager.generateForFloor(n, map, rng, {
        authoredPositions: markers.npcs,
        excluded,
        spawn,
      })
    );

    for (const warning of warnings) {
      if (warning.startsWith('CRITICAL')) {
        logger.error(warning, { floor: n });
      }
    }

    this.current = { number: n, map, spawn, upStairs, downStairs, terminals, warnings };
    logger.info('Entered floor', { floor: n, terminals: terminals.length, warnings: warnings.length });
    return this.current;
  }

  private placeWithFallback(
    map: FloorMap,
    excluded: Set<string>,
    rng: RandomSource,
    requests: PlacementRequest[]
  ): Position | null {
    for (const request of requests) {
      const position = this.placement.place(map, excluded, request, rng);
      if (position) {
        excluded.add(positionKey(position));
        return position;
      }
    }
    return null;
  }

  private createStairs(floor: number, direction: StairsDirection, position: Position): StairsEntity {
    const isExit = direction === 'down' && floor === this.config.maxFloors;
    return {
      id: `stairs-${direction}-${floor}`,
      kind: 'stairs',
      direction,
      position,
      glyph: STAIRS_GLYPHS[direction],
      color: STAIRS_COLOR,
      name: isExit ? 'Exit' : direction === 'down' ? 'Stairs down' : 'Stairs up',
    };
  }

  private placeTerminals(
    floor: number,
    map: FloorMap,
    excluded: Set<string>,
    rng: RandomSource,
    authored: Position[],
    warnings: string[]
  ): TerminalEntity[] {
    const records = Array.from(this.content.terminals.values()).filter((terminal) => terminal.floor === floor);
    const terminals: TerminalEntity[] = [];

    records.forEach((record, index) => {
      const candidates = [authored[index], record.positionHint].filter(
        (position): position is Position => position !== undefined
      );
      const position = this.placeWithFallback(map, excluded, rng, [{ authored: candidates }]);
      if (!position) {
        const warning = `Could not place terminal "${record.title}" on floor ${floor}`;
        logger.warn(warning, { terminalId: record.id });
        warnings.push(warning);
        return;
      }

      terminals.push({
        id: record.id,
        kind: 'terminal',
        position,
        glyph: TERMINAL_GLYPH,
        color: TERMINAL_COLOR,
        name: record.title,
        title: record.title,
        lines: [...record.lines],
      });
    });

    return terminals;
  }

  isComplete(n: number): boolean {
    return this.npcManager.isFloorRequirementSatisfied(n);
  }

  stairsAt(position: Position): StairsEntity | null {
    const floor = this.getFloor();
    return [floor.downStairs, floor.upStairs].find(
      (stairs): stairs is StairsEntity => stairs !== null && samePosition(stairs.position, position)
    ) ?? null;
  }

  terminalNear(position: Position): TerminalEntity | null {
    const floor = this.getFloor();
    return floor.terminals.find((terminal) => chebyshevDistance(terminal.position, position) <= 1) ?? null;
  }

  /**
   * Descend from the player's cell. The next floor is entered at its spawn;
   * descending from the last floor is victory.
   */
  descend(playerPosition: Position): TransitionResult {
    const floor = this.getFloor();
    if (!floor.downStairs || !samePosition(floor.downStairs.position, playerPosition)) {
      return { kind: 'not_on_stairs' };
    }

    const outstanding = this.npcManager.outstandingRequired(floor.number);
    if (outstanding.length > 0) {
      return { kind: 'blocked', outstanding: outstanding.map((npc) => npc.name) };
    }

    if (floor.number >= this.config.maxFloors) {
      return { kind: 'victory' };
    }

    const next = this.enterFloor(floor.number + 1);
    return { kind: 'entered', floor: next, arrival: next.spawn };
  }

  /**
   * Ascend to the previous floor, arriving on its down stairs.
   */
  ascend(playerPosition: Position): TransitionResult {
    const floor = this.getFloor();
    if (floor.number <= 1) {
      return { kind: 'no_op' };
    }
    if (!floor.upStairs || !samePosition(floor.upStairs.position, playerPosition)) {
      return { kind: 'not_on_stairs' };
    }

    const previous = this.enterFloor(floor.number - 1);
    return { kind: 'entered', floor: previous, arrival: previous.downStairs?.position ?? previous.spawn };
  }

  staticCells(): Set<string> {
    const floor = this.getFloor();
    const cells = new Set<string>();
    for (const entity of [floor.upStairs, floor.downStairs, ...floor.terminals]) {
      if (entity) cells.add(positionKey(entity.position));
    }
    return cells;
  }

  mapRows(): string[] {
    return mapToRows(this.getFloor().map);
  }
}
