import { describe, it, expect } from 'vitest';
import { FloorManager } from '@/application/game/FloorManager.js';
import { NPCManager } from '@/application/game/NPCManager.js';
import type { ContentBundle } from '@/domain/content/types.js';
import { chebyshevDistance, isWalkable, samePosition } from '@/domain/game/types.js';
import { buildContentBundle } from '@/infrastructure/content/ContentLoader.js';
import { EntityPlacementStrategy } from '@/infrastructure/game/EntityPlacement.js';
import { MapGenerator, floodFill } from '@/infrastructure/game/MapGenerator.js';
import type { SessionConfig } from '@/utils/config.js';
import { InvariantViolationError } from '@/utils/errors.js';
import { makeTestBundle, makeTestConfig, rawTestContent } from '../helpers/fixtures.js';

function createFloors(content: ContentBundle, config: Readonly<SessionConfig>) {
  const placement = new EntityPlacementStrategy();
  const npcManager = new NPCManager(content, new Map(), placement);
  const floors = new FloorManager({ content, config, npcManager, mapGenerator: new MapGenerator(), placement });
  return { floors, npcManager };
}

describe('FloorManager', () => {
  describe('authored floors', () => {
    it('places stairs and terminals on their markers', () => {
      const { floors } = createFloors(makeTestBundle(), makeTestConfig());
      const floor = floors.enterFloor(1);

      expect(floor.number).toBe(1);
      expect(floor.spawn).toEqual({ x: 1, y: 1 });
      expect(floor.upStairs).toBeNull();
      expect(floor.downStairs).toMatchObject({ id: 'stairs-down-1', name: 'Stairs down', position: { x: 10, y: 6 } });
      expect(floor.terminals.map((terminal) => [terminal.id, terminal.position])).toEqual([['term-1', { x: 8, y: 4 }]]);
      expect(floor.warnings).toEqual([]);
      expect(floors.staticCells()).toEqual(new Set(['10,6', '8,4']));
      expect(floors.mapRows()).toHaveLength(8);
    });

    it('names the last floor down stairs as the exit', () => {
      const { floors } = createFloors(makeTestBundle(), makeTestConfig());
      const floor = floors.enterFloor(2);

      expect(floor.upStairs).toMatchObject({ name: 'Stairs up', position: { x: 1, y: 1 } });
      expect(floor.downStairs).toMatchObject({ name: 'Exit', position: { x: 1, y: 6 } });
    });

    it('finds stairs underfoot and terminals in reach', () => {
      const { floors } = createFloors(makeTestBundle(), makeTestConfig());
      floors.enterFloor(1);

      expect(floors.stairsAt({ x: 10, y: 6 })?.direction).toBe('down');
      expect(floors.stairsAt({ x: 10, y: 5 })).toBeNull();
      expect(floors.terminalNear({ x: 7, y: 5 })?.id).toBe('term-1');
      expect(floors.terminalNear({ x: 6, y: 4 })).toBeNull();
    });

    it('refuses floors outside the configured range', () => {
      const { floors } = createFloors(makeTestBundle(), makeTestConfig());
      expect(() => floors.enterFloor(0)).toThrow(InvariantViolationError);
      expect(() => floors.enterFloor(3)).toThrow(InvariantViolationError);
    });
  });

  describe('transitions', () => {
    it('only descends from the stairs once the floor is complete', () => {
      const { floors, npcManager } = createFloors(makeTestBundle(), makeTestConfig());
      floors.enterFloor(1);

      expect(floors.descend({ x: 1, y: 1 })).toEqual({ kind: 'not_on_stairs' });
      expect(floors.descend({ x: 10, y: 6 })).toEqual({ kind: 'blocked', outstanding: ['Sage'] });
      expect(floors.isComplete(1)).toBe(false);

      npcManager.markDefeated('spec-s');
      const result = floors.descend({ x: 10, y: 6 });
      expect(result.kind).toBe('entered');
      if (result.kind === 'entered') {
        expect(result.floor.number).toBe(2);
        expect(result.arrival).toEqual({ x: 10, y: 1 });
      }
      expect(floors.getFloor().number).toBe(2);
    });

    it('wins from the last floor and returns upward onto the down stairs', () => {
      const { floors, npcManager } = createFloors(makeTestBundle(), makeTestConfig());
      floors.enterFloor(2);

      expect(floors.descend({ x: 1, y: 6 })).toEqual({ kind: 'blocked', outstanding: ['Shade'] });
      npcManager.markDefeated('enemy-e');
      expect(floors.descend({ x: 1, y: 6 })).toEqual({ kind: 'victory' });

      expect(floors.ascend({ x: 5, y: 5 })).toEqual({ kind: 'not_on_stairs' });
      const result = floors.ascend({ x: 1, y: 1 });
      expect(result).toMatchObject({ kind: 'entered', arrival: { x: 10, y: 6 } });
      expect(floors.ascend({ x: 10, y: 6 })).toEqual({ kind: 'no_op' });
    });
  });

  describe('generated floors', () => {
    const raw = { ...rawTestContent(), levels: [], terminals: [{ id: 'term-g', title: 'Log', floor: 1, lines: [] }] };
    const content = buildContentBundle('generated', raw);
    const config = makeTestConfig({ mapWidth: 50, mapHeight: 25, maxFloors: 3, seed: 1234 });

    it('builds the same floor for the same seed', () => {
      const first = createFloors(content, config);
      const second = createFloors(content, config);
      const a = first.floors.enterFloor(1);
      const b = second.floors.enterFloor(1);

      expect(b.map).toEqual(a.map);
      expect(b.downStairs).toEqual(a.downStairs);
      expect(b.terminals).toEqual(a.terminals);
      expect(second.npcManager.toPlacementSnapshot()).toEqual(first.npcManager.toPlacementSnapshot());
    });

    it('puts every entity on a distinct reachable cell', () => {
      const { floors, npcManager } = createFloors(content, config);
      const floor = floors.enterFloor(1);
      const reached = floodFill(floor.map.walkable, floor.spawn);

      const positions = [
        floor.downStairs?.position,
        ...floor.terminals.map((terminal) => terminal.position),
        ...npcManager.getRoster().map((npc) => npc.entity.position),
      ];
      expect(positions).toHaveLength(4);

      const keys = new Set<string>();
      for (const position of positions) {
        expect(position).toBeDefined();
        if (!position) continue;
        expect(isWalkable(floor.map, position.x, position.y)).toBe(true);
        expect(reached[position.y][position.x]).toBe(true);
        expect(samePosition(position, floor.spawn)).toBe(false);
        keys.add(`${position.x},${position.y}`);
      }
      expect(keys.size).toBe(4);

      for (const npc of npcManager.getRoster()) {
        expect(chebyshevDistance(npc.entity.position, floor.spawn)).toBeGreaterThanOrEqual(5);
      }
    });
  });
});
