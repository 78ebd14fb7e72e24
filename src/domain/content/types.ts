// Domain layer: Content types
// NO external dependencies - pure TypeScript

import type { NpcType, Position } from '@/domain/game/types.js';

export type MatchType = 'exact' | 'numeric' | 'complexity';

export type QuestionKind = 'multiple_choice' | 'short_answer' | 'yes_no';

export interface Answer {
  text: string;
  correct: boolean;
  response: string;
  rewardKnowledge?: string;
}

interface QuestionBase {
  id: string;
  topic: string;
  text: string;
}

export interface MultipleChoiceQuestion extends QuestionBase {
  kind: 'multiple_choice';
  answers: Answer[];
}

export interface FreeTextQuestion extends QuestionBase {
  kind: 'short_answer' | 'yes_no';
  /** Pipe-delimited alternatives, e.g. "O(n)|linear". */
  acceptedAnswer: string;
  matchType: MatchType;
  caseSensitive: boolean;
  correctResponse: string;
  incorrectResponse: string;
  rewardKnowledge?: string;
}

export type Question = MultipleChoiceQuestion | FreeTextQuestion;

export interface NpcRecord {
  id: string;
  name: string;
  floor: number;
  type: NpcType;
  required: boolean;
  questionIds: string[];
  greeting: string;
  glyph: string;
  color: string;
}

export interface TerminalRecord {
  id: string;
  title: string;
  lines: string[];
  floor: number;
  positionHint?: Position;
}

/**
 * Designer-specified floor. `rows` use `#` for walls and `.` for floor;
 * markers (`@ < > T` and NPC glyphs) stand on walkable cells.
 */
export interface FloorLayout {
  floor: number;
  rows: string[];
}

export interface ContentBundle {
  readonly id: string;
  readonly title: string;
  readonly questions: ReadonlyMap<string, Question>;
  readonly npcs: ReadonlyMap<string, NpcRecord>;
  readonly terminals: ReadonlyMap<string, TerminalRecord>;
  readonly layouts: ReadonlyMap<number, FloorLayout>;
}
