// Domain layer: Game session contracts
// Outcome and read-only view shapes shared by the core and its callers

import type { QuestionKind } from '@/domain/content/types.js';
import type { EntityKind, NpcType, Position, StairsDirection } from './types.js';

export type GameStatus = 'playing' | 'victory' | 'defeat';

export type ConversationStatus = 'not_started' | 'in_progress' | 'completed';

export type OutcomeKind =
  | 'moved'
  | 'rejected'
  | 'blocked'
  | 'conversation_started'
  | 'conversation_resumed'
  | 'conversation_exited'
  | 'answered'
  | 'npc_restored'
  | 'npc_idle'
  | 'terminal'
  | 'floor_changed'
  | 'victory'
  | 'defeat'
  | 'game_over';

/**
 * Question as presented to the player. Multiple-choice answers are listed
 * in display order; free-text questions have none.
 */
export interface QuestionView {
  id: string;
  text: string;
  kind: QuestionKind;
  answers: string[];
  number: number;
  total: number;
}

export interface TerminalView {
  title: string;
  lines: string[];
}

export interface FinalStats {
  questionsAnswered: number;
  questionsCorrect: number;
  questionsWrong: number;
  accuracy: number;
  npcsDefeated: number;
  knowledgeModules: number;
  coherence: number;
  floor: number;
  score: number;
}

export interface OutcomePayload {
  position?: Position;
  stairs?: StairsDirection;
  floor?: number;
  npcId?: string;
  question?: QuestionView;
  isCorrect?: boolean;
  coherenceDelta?: number;
  knowledgeGained?: string;
  conversationCompleted?: boolean;
  npcDefeated?: boolean;
  floorComplete?: boolean;
  outstanding?: string[];
  terminal?: TerminalView;
  status?: GameStatus;
  stats?: FinalStats;
}

/**
 * Result of every player command. Gameplay rejections come back with
 * `ok: false`; nothing in the state changed when that happens.
 */
export interface CommandOutcome {
  ok: boolean;
  kind: OutcomeKind;
  message: string;
  warnings: string[];
  payload?: OutcomePayload;
}

export interface EntityView {
  id: string;
  kind: EntityKind;
  name: string;
  glyph: string;
  color: string;
  x: number;
  y: number;
  npcType?: NpcType;
}

export interface PlayerView {
  x: number;
  y: number;
  coherence: number;
  maxCoherence: number;
  knowledge: string[];
  questionsAnswered: number;
  questionsCorrect: number;
  questionsWrong: number;
  npcsDefeated: number;
}

export interface ConversationView {
  npcId: string;
  npcName: string;
  greeting: string;
  status: ConversationStatus;
  correctCount: number;
  question: QuestionView | null;
}

export interface GameView {
  contentId: string;
  floor: number;
  maxFloors: number;
  status: GameStatus;
  score: number;
  floorComplete: boolean;
  map: string[];
  entities: EntityView[];
  player: PlayerView;
  conversation: ConversationView | null;
  lastResponse: string | null;
  terminal: TerminalView | null;
  warnings: string[];
}
