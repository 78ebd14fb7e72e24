// Application layer: NPC manager
// Per-floor roster, placement, wandering and the session-wide NPC history

import type { ContentBundle, NpcRecord } from '@/domain/content/types.js';
import {
  DIRECTION_DELTAS,
  NPC_TYPE_BEHAVIOR,
  chebyshevDistance,
  isWalkable,
  manhattanDistance,
  positionKey,
  samePosition,
  type Entity,
  type FloorMap,
  type Position,
} from '@/domain/game/types.js';
import type { NpcPlacementSnapshot } from '@/domain/game/GameState.js';
import type { EntityPlacementStrategy } from '@/infrastructure/game/EntityPlacement.js';
import type { RandomSource } from '@/infrastructure/game/RandomSource.js';
import { SaveLoadError } from '@/utils/errors.js';
import { gameLogger } from '@/utils/logger.js';

const logger = gameLogger.child('NPCManager');

export const INTERACTION_DISTANCE = 1;
export const NPC_MIN_SPAWN_DISTANCE = 5;
export const WANDER_RADIUS = 3;
export const IDLE_TICKS: readonly [number, number] = [10, 20];
export const WANDER_STEPS: readonly [number, number] = [2, 3];

/**
 * Persistent per-NPC record, kept for the whole session regardless of
 * which floor is loaded.
 */
export interface NpcHistory {
  defeated: boolean;
  opinion: number;
  encounters: number;
  /** Helper already restored coherence. */
  restored: boolean;
}

export type NpcHistoryBook = Map<string, NpcHistory>;

export interface WanderState {
  mode: 'idle' | 'wandering';
  ticks: number;
  cooldown: number;
}

export interface NpcInstance {
  record: NpcRecord;
  entity: Entity;
  home: Position;
  wander: WanderState;
}

export interface FloorNpcOptions {
  authoredPositions?: ReadonlyMap<string, Position[]>;
  /** Position keys already taken; placed NPCs are added to it. */
  excluded: Set<string>;
  spawn: Position;
}

export interface WanderOptions {
  frozen: boolean;
  /** Cells NPCs never step on (stairs, terminals). */
  blocked: ReadonlySet<string>;
}

function emptyHistory(): NpcHistory {
  return { defeated: false, opinion: 0, encounters: 0, restored: false };
}

export class NPCManager {
  private roster: NpcInstance[] = [];
  private requiredByFloor = new Map<number, string[]>();

  constructor(
    private readonly content: ContentBundle,
    private readonly history: NpcHistoryBook,
    private readonly placement: EntityPlacementStrategy
  ) {}

  /**
   * Build and place the roster for a floor. Returns warnings for NPCs that
   * could not be placed.
   */
  generateForFloor(floor: number, map: FloorMap, rng: RandomSource, options: FloorNpcOptions): string[] {
    const warnings: string[] = [];
    const records = Array.from(this.content.npcs.values()).filter((npc) => npc.floor === floor);
    const roster: NpcInstance[] = [];

    for (const record of records) {
      const position = this.placement.place(
        map,
        options.excluded,
        {
          authored: options.authoredPositions?.get(record.glyph),
          minDistanceFrom: { origin: options.spawn, distance: NPC_MIN_SPAWN_DISTANCE },
        },
        rng
      );

      if (!position) {
        const warning = `Could not place ${record.name} on floor ${floor}`;
        logger.warn(warning, { npcId: record.id, floor });
        warnings.push(warning);
        continue;
      }

      options.excluded.add(positionKey(position));
      if (!this.history.has(record.id)) {
        this.history.set(record.id, emptyHistory());
      }

      roster.push({
        record,
        entity: {
          id: record.id,
          kind: 'npc',
          position,
          glyph: record.glyph,
          color: record.color,
          name: record.name,
          npcType: record.type,
        },
        home: { ...position },
        wander: { mode: 'idle', ticks: rng.int(IDLE_TICKS[0], IDLE_TICKS[1]), cooldown: 0 },
      });
    }

    if (records.length > 0 && roster.length === 0) {
      const warning = `CRITICAL: none of the ${records.length} NPCs for floor ${floor} could be placed`;
      logger.error(warning, { floor });
      warnings.push(warning);
    }

    this.roster = roster;
    this.requiredByFloor.set(
      floor,
      roster.filter((npc) => npc.record.required).map((npc) => npc.record.id)
    );

    logger.debug('Floor roster generated', { floor, placed: roster.length, defined: records.length });
    return warnings;
  }

  getRoster(): readonly NpcInstance[] {
    return this.roster;
  }

  find(npcId: string): NpcInstance | undefined {
    return this.roster.find((npc) => npc.record.id === npcId);
  }

  /**
   * Closest NPC within reach; ties go to the lower Manhattan distance, then
   * to the lexically smaller id.
   */
  eligibleForInteraction(playerPosition: Position): NpcInstance | null {
    const candidates = this.roster
      .filter((npc) => chebyshevDistance(npc.entity.position, playerPosition) <= INTERACTION_DISTANCE)
      .sort((a, b) => {
        const byDistance =
          manhattanDistance(a.entity.position, playerPosition) - manhattanDistance(b.entity.position, playerPosition);
        if (byDistance !== 0) return byDistance;
        return a.record.id < b.record.id ? -1 : a.record.id > b.record.id ? 1 : 0;
      });

    return candidates[0] ?? null;
  }

  historyOf(npcId: string): NpcHistory {
    let entry = this.history.get(npcId);
    if (!entry) {
      entry = emptyHistory();
      this.history.set(npcId, entry);
    }
    return entry;
  }

  markDefeated(npcId: string): void {
    this.historyOf(npcId).defeated = true;
  }

  opinionDelta(npcId: string, delta: number): number {
    const entry = this.historyOf(npcId);
    entry.opinion += delta;
    return entry.opinion;
  }

  recordEncounter(npcId: string): void {
    this.historyOf(npcId).encounters++;
  }

  private requiredIds(floor: number): string[] {
    const placed = this.requiredByFloor.get(floor);
    if (placed) return placed;
    return Array.from(this.content.npcs.values())
      .filter((npc) => npc.floor === floor && npc.required)
      .map((npc) => npc.id);
  }

  outstandingRequired(floor: number): NpcRecord[] {
    return this.requiredIds(floor)
      .filter((id) => !this.history.get(id)?.defeated)
      .flatMap((id) => {
        const record = this.content.npcs.get(id);
        return record ? [record] : [];
      });
  }

  isFloorRequirementSatisfied(floor: number): boolean {
    return this.outstandingRequired(floor).length === 0;
  }

  /**
   * One wander tick for every NPC on the floor. NPCs idle for a while, then
   * take a few steps around their home cell, waiting their type's cooldown
   * between steps.
   */
  advanceWandering(map: FloorMap, playerPosition: Position, rng: RandomSource, options: WanderOptions): void {
    if (options.frozen) return;

    for (const npc of this.roster) {
      const wander = npc.wander;

      if (wander.mode === 'idle') {
        wander.ticks--;
        if (wander.ticks <= 0) {
          wander.mode = 'wandering';
          wander.ticks = rng.int(WANDER_STEPS[0], WANDER_STEPS[1]);
          wander.cooldown = 0;
        }
        continue;
      }

      if (wander.cooldown > 0) {
        wander.cooldown--;
        continue;
      }

      const target = this.chooseStep(npc, map, playerPosition, rng, options.blocked);
      if (target) {
        npc.entity.position = target;
      }

      wander.ticks--;
      wander.cooldown = NPC_TYPE_BEHAVIOR[npc.record.type].moveCooldown;
      if (wander.ticks <= 0) {
        wander.mode = 'idle';
        wander.ticks = rng.int(IDLE_TICKS[0], IDLE_TICKS[1]);
        wander.cooldown = 0;
      }
    }
  }

  private chooseStep(
    npc: NpcInstance,
    map: FloorMap,
    playerPosition: Position,
    rng: RandomSource,
    blocked: ReadonlySet<string>
  ): Position | null {
    const current = npc.entity.position;
    const isFree = (position: Position): boolean =>
      isWalkable(map, position.x, position.y) &&
      !samePosition(position, playerPosition) &&
      !blocked.has(positionKey(position)) &&
      !this.roster.some((other) => other !== npc && samePosition(other.entity.position, position));

    // Strayed outside the radius: head back toward home
    if (chebyshevDistance(current, npc.home) > WANDER_RADIUS) {
      const towardHome = [
        { x: current.x + Math.sign(npc.home.x - current.x), y: current.y },
        { x: current.x, y: current.y + Math.sign(npc.home.y - current.y) },
      ].filter((position) => !samePosition(position, current));
      return towardHome.find(isFree) ?? null;
    }

    const delta = rng.pick(Object.values(DIRECTION_DELTAS));
    const target = { x: current.x + delta.x, y: current.y + delta.y };
    if (chebyshevDistance(target, npc.home) > WANDER_RADIUS || !isFree(target)) {
      return null;
    }
    return target;
  }

  toPlacementSnapshot(): NpcPlacementSnapshot[] {
    return this.roster.map((npc) => ({
      id: npc.record.id,
      x: npc.entity.position.x,
      y: npc.entity.position.y,
      mode: npc.wander.mode,
      ticks: npc.wander.ticks,
      cooldown: npc.wander.cooldown,
    }));
  }

  /**
   * Move the regenerated roster to saved positions. Fails closed on any
   * NPC or cell the current floor cannot hold.
   */
  applyPlacementSnapshot(placements: NpcPlacementSnapshot[], map: FloorMap): void {
    const taken = new Set<string>();

    for (const placement of placements) {
      const npc = this.find(placement.id);
      if (!npc) {
        throw new SaveLoadError(`Saved NPC ${placement.id} is not on this floor`);
      }
      const key = positionKey(placement);
      if (!isWalkable(map, placement.x, placement.y) || taken.has(key)) {
        throw new SaveLoadError(`Saved position for ${placement.id} is not a free walkable cell`, {
          x: placement.x,
          y: placement.y,
        });
      }
      taken.add(key);
    }

    for (const placement of placements) {
      const npc = this.find(placement.id);
      if (!npc) continue;
      npc.entity.position = { x: placement.x, y: placement.y };
      npc.wander = { mode: placement.mode, ticks: placement.ticks, cooldown: placement.cooldown };
    }
  }
}
