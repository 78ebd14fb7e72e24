// Test helpers: small hand-authored content set
// Every floor is fully authored so positions never depend on the rng

import type { ContentBundle } from '@/domain/content/types.js';
import { GameSession } from '@/application/game/GameSession.js';
import { buildContentBundle, type RawContentSet } from '@/infrastructure/content/ContentLoader.js';
import { DEFAULT_GAME_CONFIG, buildSessionConfig, type GameConfig, type SessionConfig } from '@/utils/config.js';

export const TEST_CONTENT_ID = 'test-dive';

// Floor 1: spawn (1,1), Sage S (4,3), terminal (8,4), Healer h (2,6), down stairs (10,6)
export const FLOOR_1 = [
  '############',
  '#@.........#',
  '#..........#',
  '#...S......#',
  '#.......T..#',
  '#..........#',
  '#.h.......>#',
  '############',
];

// Floor 2: spawn (10,1), up stairs (1,1), Shade E (4,3), exit (1,6)
export const FLOOR_2 = [
  '############',
  '#<........@#',
  '#..........#',
  '#...E......#',
  '#..........#',
  '#..........#',
  '#>.........#',
  '############',
];

export function rawTestContent(): RawContentSet {
  return {
    manifest: { title: 'Test Dive' },
    questions: [
      {
        id: 'q-mc-1',
        kind: 'multiple_choice',
        text: 'Pick two.',
        answers: [
          { text: 'One', correct: false, response: 'No, one.' },
          { text: 'Two', correct: true, response: 'Yes, two.', rewardKnowledge: 'Counting' },
          { text: 'Three', correct: false, response: 'No, three.' },
        ],
      },
      {
        id: 'q-mc-2',
        kind: 'multiple_choice',
        text: 'Pick red.',
        answers: [
          { text: 'Red', correct: true, response: 'Red it is.' },
          { text: 'Blue', correct: false, response: 'Not blue.' },
        ],
      },
      {
        id: 'q-ft-1',
        kind: 'short_answer',
        text: 'Six times seven?',
        acceptedAnswer: '42',
        matchType: 'numeric',
        correctResponse: 'Exactly.',
        incorrectResponse: 'Not the answer.',
      },
      {
        id: 'q-ft-2',
        kind: 'short_answer',
        text: 'Cost of a linear scan?',
        acceptedAnswer: 'O(n)',
        matchType: 'complexity',
        correctResponse: 'Linear.',
        incorrectResponse: 'Too slow.',
        rewardKnowledge: 'Scanning',
      },
      {
        id: 'q-yn-1',
        kind: 'yes_no',
        text: 'Is this a test?',
        acceptedAnswer: 'yes|y',
        correctResponse: 'It is.',
        incorrectResponse: 'It is a test.',
      },
    ],
    npcs: [
      {
        id: 'spec-s',
        name: 'Sage',
        floor: 1,
        type: 'specialist',
        glyph: 'S',
        greeting: 'Answer me three.',
        questionIds: ['q-mc-1', 'q-mc-2', 'q-ft-1'],
      },
      {
        id: 'helper-h',
        name: 'Healer',
        floor: 1,
        type: 'helper',
        glyph: 'h',
        greeting: 'Rest a moment.',
      },
      {
        id: 'enemy-e',
        name: 'Shade',
        floor: 2,
        type: 'enemy',
        glyph: 'E',
        greeting: 'You will not pass.',
        questionIds: ['q-ft-2', 'q-yn-1'],
      },
    ],
    terminals: [
      { id: 'term-1', title: 'Notice', floor: 1, lines: ['Line one', 'Line two'] },
    ],
    levels: [
      { floor: 1, rows: FLOOR_1 },
      { floor: 2, rows: FLOOR_2 },
    ],
  };
}

export function makeTestBundle(): ContentBundle {
  return buildContentBundle(TEST_CONTENT_ID, rawTestContent());
}

export const TEST_GAME_CONFIG: GameConfig = {
  ...DEFAULT_GAME_CONFIG,
  mapWidth: 12,
  mapHeight: 8,
  maxFloors: 2,
  seed: 42,
  fixed: true,
  npcWander: false,
};

export function makeTestConfig(overrides: Partial<GameConfig> = {}): Readonly<SessionConfig> {
  return buildSessionConfig(TEST_GAME_CONFIG, TEST_CONTENT_ID, overrides);
}

export function startTestSession(overrides: Partial<GameConfig> = {}): GameSession {
  return GameSession.start({ content: makeTestBundle(), config: makeTestConfig(overrides) });
}

/**
 * Apply a list of moves and fail loudly on the first rejected one.
 */
export function walk(session: GameSession, steps: Array<'up' | 'down' | 'left' | 'right'>): void {
  for (const step of steps) {
    const result = session.move(step);
    if (!result.ok) {
      throw new Error(`Move ${step} rejected: ${result.message}`);
    }
  }
}

export function repeat<T>(value: T, times: number): T[] {
  return Array.from({ length: times }, () => value);
}
