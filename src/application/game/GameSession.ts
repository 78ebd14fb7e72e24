// Application layer: Game session aggregate
// Owns player, floor, NPC and conversation state and runs every player command

import type { ContentBundle, Question } from '@/domain/content/types.js';
import {
  DIRECTION_DELTAS,
  NPC_TYPE_BEHAVIOR,
  inBounds,
  isWalkable,
  samePosition,
  type Direction,
  type Entity,
  type Position,
  type StairsEntity,
} from '@/domain/game/types.js';
import type {
  CommandOutcome,
  EntityView,
  FinalStats,
  GameStatus,
  GameView,
  OutcomePayload,
  OutcomeKind,
  TerminalView,
} from '@/domain/game/session.js';
import { CURRENT_SNAPSHOT_VERSION, parseSnapshot, type GameSnapshot } from '@/domain/game/GameState.js';
import { EntityPlacementStrategy } from '@/infrastructure/game/EntityPlacement.js';
import { MapGenerator } from '@/infrastructure/game/MapGenerator.js';
import { SeededRandom } from '@/infrastructure/game/RandomSource.js';
import type { SessionConfig } from '@/utils/config.js';
import { IncompatibleSaveError, InsufficientContentError, SaveLoadError } from '@/utils/errors.js';
import { gameLogger } from '@/utils/logger.js';
import { ConversationEngine } from './ConversationEngine.js';
import { FloorManager, type FloorState } from './FloorManager.js';
import { NPCManager, type NpcHistoryBook, type NpcInstance } from './NPCManager.js';
import { PlayerManager } from './PlayerManager.js';

const logger = gameLogger.child('GameSession');

export const PLAYER_GLYPH = '@';
export const PLAYER_COLOR = 'white';

export interface GameSessionDeps {
  content: ContentBundle;
  config: Readonly<SessionConfig>;
  mapGenerator?: MapGenerator;
  placement?: EntityPlacementStrategy;
}

function outcome(
  ok: boolean,
  kind: OutcomeKind,
  message: string,
  payload?: OutcomePayload,
  warnings: string[] = []
): CommandOutcome {
  return payload ? { ok, kind, message, warnings, payload } : { ok, kind, message, warnings };
}

function rejected(message: string, warnings: string[] = []): CommandOutcome {
  return outcome(false, 'rejected', message, undefined, warnings);
}

function toEntityView(entity: Entity): EntityView {
  return {
    id: entity.id,
    kind: entity.kind,
    name: entity.name,
    glyph: entity.glyph,
    color: entity.color,
    x: entity.position.x,
    y: entity.position.y,
    ...(entity.npcType ? { npcType: entity.npcType } : {}),
  };
}

/**
 * GameSession - one single-player run
 * Every command mutates the whole state synchronously and returns an
 * outcome; gameplay rejections never throw and never change state.
 */
export class GameSession {
  private readonly content: ContentBundle;
  private readonly config: Readonly<SessionConfig>;
  private readonly rng: SeededRandom;
  private readonly history: NpcHistoryBook;
  private readonly npcs: NPCManager;
  private readonly floors: FloorManager;
  private readonly player: PlayerManager;
  private conversation: ConversationEngine | null = null;
  private lastResponse: string | null = null;
  private activeTerminal: TerminalView | null = null;
  private status: GameStatus = 'playing';

  private constructor(
    deps: GameSessionDeps,
    history: NpcHistoryBook,
    floorNumber: number,
    createPlayer: (floor: FloorState) => PlayerManager
  ) {
    this.content = deps.content;
    this.config = deps.config;
    this.rng = new SeededRandom(deps.config.seed);
    this.history = history;

    const placement = deps.placement ?? new EntityPlacementStrategy();
    this.npcs = new NPCManager(deps.content, history, placement);
    this.floors = new FloorManager({
      content: deps.content,
      config: deps.config,
      npcManager: this.npcs,
      mapGenerator: deps.mapGenerator ?? new MapGenerator(),
      placement,
    });

    const floor = this.floors.enterFloor(floorNumber);
    this.player = createPlayer(floor);
  }

  /**
   * Start a new session on floor 1.
   */
  static start(deps: GameSessionDeps): GameSession {
    const session = new GameSession(
      deps,
      new Map(),
      1,
      (floor) => new PlayerManager(floor.spawn, deps.config.startingCoherence, deps.config.maxCoherence)
    );
    logger.info('Session started', { contentId: deps.content.id, seed: deps.config.seed });
    return session;
  }

  /**
   * Rebuild a session from a saved snapshot. Throws instead of returning a
   * partial session, so a caller's live session is never touched.
   */
  static restore(raw: unknown, deps: GameSessionDeps): GameSession {
    const parsed = parseSnapshot(raw, deps.config.maxFloors);
    if (!parsed.ok) {
      if (parsed.reason === 'unsupported_version') {
        throw new IncompatibleSaveError(`Unsupported save version ${parsed.version}`, { version: parsed.version });
      }
      throw new SaveLoadError('Save snapshot is invalid', { issues: parsed.issues.join('; ') });
    }

    const snapshot = parsed.snapshot;
    if (snapshot.content_id !== deps.content.id) {
      throw new IncompatibleSaveError(`Save belongs to content set "${snapshot.content_id}"`, {
        saved: snapshot.content_id,
        loaded: deps.content.id,
      });
    }
    if (snapshot.floor > snapshot.max_floors) {
      throw new SaveLoadError('Saved floor is beyond the last floor', { floor: snapshot.floor });
    }
    if (snapshot.player.coherence > snapshot.player.max_coherence) {
      throw new SaveLoadError('Saved coherence exceeds its maximum');
    }

    const config: Readonly<SessionConfig> = Object.freeze({
      ...deps.config,
      contentId: snapshot.content_id,
      seed: snapshot.seed,
      fixed: snapshot.fixed,
      maxFloors: snapshot.max_floors,
      maxCoherence: snapshot.player.max_coherence,
    });

    const history: NpcHistoryBook = new Map(
      Object.entries(snapshot.npc_history).map(([id, entry]) => [id, { ...entry }])
    );

    const session = new GameSession({ ...deps, config }, history, snapshot.floor, () =>
      PlayerManager.fromSnapshot(snapshot.player)
    );
    session.applySnapshot(snapshot);
    logger.info('Session restored', { contentId: snapshot.content_id, floor: snapshot.floor });
    return session;
  }

  private applySnapshot(snapshot: GameSnapshot): void {
    const floor = this.floors.getFloor();
    const position = this.player.getPosition();
    if (!isWalkable(floor.map, position.x, position.y)) {
      throw new SaveLoadError('Saved player position is not walkable', { x: position.x, y: position.y });
    }

    this.npcs.applyPlacementSnapshot(snapshot.npcs, floor.map);

    if (snapshot.conversation) {
      if (!this.npcs.find(snapshot.conversation.npc_id)) {
        throw new SaveLoadError(`Saved conversation partner ${snapshot.conversation.npc_id} is not on this floor`);
      }
      const engine = ConversationEngine.restore(snapshot.conversation, this.content.questions);
      this.conversation = engine.isCompleted() ? null : engine;
    }

    this.rng.setState(snapshot.rng_state);
    this.status = snapshot.status;
  }

  // ==========================================================================
  // Commands
  // ==========================================================================

  move(direction: Direction): CommandOutcome;
  move(dx: number, dy: number): CommandOutcome;
  move(directionOrDx: Direction | number, dy = 0): CommandOutcome {
    const over = this.gameOverOutcome();
    if (over) return over;

    const delta = typeof directionOrDx === 'string'
      ? DIRECTION_DELTAS[directionOrDx]
      : { x: directionOrDx, y: dy };
    if (Math.abs(delta.x) + Math.abs(delta.y) !== 1) {
      return rejected('You can only step one cell up, down, left or right.');
    }
    if (this.conversation) {
      return rejected('Finish or leave the conversation first.');
    }

    const floor = this.floors.getFloor();
    const from = this.player.getPosition();
    const target = { x: from.x + delta.x, y: from.y + delta.y };

    if (!inBounds(floor.map, target.x, target.y)) {
      return rejected('You cannot leave the map.');
    }
    if (!isWalkable(floor.map, target.x, target.y)) {
      return rejected('A wall blocks the way.');
    }
    const occupant = this.npcs.getRoster().find((npc) => samePosition(npc.entity.position, target));
    if (occupant) {
      return rejected(`${occupant.record.name} is in the way.`);
    }

    this.player.moveTo(target);
    this.activeTerminal = null;
    this.lastResponse = null;
    this.advanceNpcs();

    const stairs = this.floors.stairsAt(target);
    if (stairs) {
      return outcome(true, 'moved', `You stand on the ${stairs.name.toLowerCase()}. Interact to use them.`, {
        position: target,
        stairs: stairs.direction,
      });
    }
    return outcome(true, 'moved', 'You move.', { position: target });
  }

  /**
   * Interact with what is around the player, in fixed precedence: an NPC,
   * then an info terminal, then the stairs underfoot.
   */
  interact(): CommandOutcome {
    const over = this.gameOverOutcome();
    if (over) return over;

    if (this.conversation) {
      const npc = this.npcs.find(this.conversation.npcId);
      return outcome(true, 'conversation_resumed', npc ? npc.record.greeting : 'The conversation continues.', {
        npcId: this.conversation.npcId,
        question: this.conversation.view() ?? undefined,
      });
    }

    const position = this.player.getPosition();

    const npc = this.npcs.eligibleForInteraction(position);
    if (npc) {
      return this.interactWithNpc(npc);
    }

    const terminal = this.floors.terminalNear(position);
    if (terminal) {
      this.activeTerminal = { title: terminal.title, lines: [...terminal.lines] };
      this.advanceNpcs();
      return outcome(true, 'terminal', terminal.title, { terminal: this.activeTerminal });
    }

    const stairs = this.floors.stairsAt(position);
    if (stairs) {
      return this.useStairs(stairs, position);
    }

    return rejected('There is nothing here to interact with.');
  }

  private interactWithNpc(npc: NpcInstance): CommandOutcome {
    const { record } = npc;
    const history = this.npcs.historyOf(record.id);
    const behavior = NPC_TYPE_BEHAVIOR[record.type];

    if (behavior.restoresOnContact) {
      if (history.restored) {
        this.npcs.recordEncounter(record.id);
        this.advanceNpcs();
        return outcome(true, 'npc_idle', `${record.name} has nothing more to share.`, { npcId: record.id });
      }

      const applied = this.player.adjustCoherence(this.config.helperRestoreAmount);
      history.restored = true;
      this.npcs.markDefeated(record.id);
      this.npcs.recordEncounter(record.id);
      this.lastResponse = record.greeting;

      if (this.player.isDepleted()) {
        this.status = 'defeat';
        logger.info('Session lost', { npcId: record.id, floor: this.floors.getFloor().number });
        return outcome(true, 'defeat', `${record.name} drains you. Your coherence collapses.`, {
          npcId: record.id,
          coherenceDelta: applied,
          status: this.status,
          stats: this.finalStats(),
        });
      }

      this.advanceNpcs();
      return outcome(true, 'npc_restored', `${record.name} restores ${applied} coherence.`, {
        npcId: record.id,
        coherenceDelta: applied,
      });
    }

    if (history.defeated) {
      this.npcs.recordEncounter(record.id);
      this.advanceNpcs();
      return outcome(true, 'npc_idle', `${record.name} has nothing more to discuss.`, { npcId: record.id });
    }

    const warnings: string[] = [];
    const pool: Question[] = [];
    for (const questionId of record.questionIds) {
      const question = this.content.questions.get(questionId);
      if (question) {
        pool.push(question);
      } else {
        warnings.push(`${record.name} references missing question ${questionId}`);
      }
    }

    if (pool.length === 0) {
      warnings.push(`${record.name} has no questions to ask`);
      logger.warn('NPC has an empty question pool', { npcId: record.id });
      return rejected(`${record.name} has nothing to ask you.`, warnings);
    }

    const engine = new ConversationEngine(record.id);
    const rng = this.config.fixed ? null : this.rng;
    try {
      engine.start(pool, this.config.questionsPerNpc, rng);
    } catch (error) {
      if (!(error instanceof InsufficientContentError)) throw error;
      warnings.push(`${record.name} only has ${error.available} of ${error.requested} questions`);
      logger.warn('Reduced conversation length', { npcId: record.id, available: error.available });
      engine.start(pool, error.available, rng);
    }

    this.npcs.recordEncounter(record.id);
    this.conversation = engine;
    this.lastResponse = null;
    this.activeTerminal = null;

    return outcome(
      true,
      'conversation_started',
      record.greeting,
      { npcId: record.id, question: engine.view() ?? undefined },
      warnings
    );
  }

  private useStairs(stairs: StairsEntity, position: Position): CommandOutcome {
    const result = stairs.direction === 'down'
      ? this.floors.descend(position)
      : this.floors.ascend(position);

    switch (result.kind) {
      case 'not_on_stairs':
        return rejected('You are not standing on the stairs.');
      case 'no_op':
        return rejected('There is no way further up.');
      case 'blocked':
        return outcome(false, 'blocked', `The way down is sealed. Still to convince: ${result.outstanding.join(', ')}.`, {
          outstanding: result.outstanding,
        });
      case 'victory':
        this.status = 'victory';
        this.conversation = null;
        logger.info('Session won', { score: this.computeScore() });
        return outcome(true, 'victory', 'You surface from the final layer. Victory!', {
          status: this.status,
          stats: this.finalStats(),
        });
      case 'entered':
        this.player.moveTo(result.arrival);
        this.activeTerminal = null;
        this.lastResponse = null;
        return outcome(
          true,
          'floor_changed',
          `You ${stairs.direction === 'down' ? 'descend' : 'climb'} to floor ${result.floor.number}.`,
          { floor: result.floor.number, position: result.arrival },
          [...result.floor.warnings]
        );
    }
  }

  /**
   * A number picks a choice by 0-based index, a numeric string by 1-based
   * index; other text is matched against the question.
   */
  answer(input: number | string): CommandOutcome {
    const over = this.gameOverOutcome();
    if (over) return over;

    const engine = this.conversation;
    if (!engine) {
      return rejected('You are not in a conversation.');
    }

    const attempt = engine.answer(input);
    if (!attempt.accepted) {
      return rejected(attempt.reason);
    }

    const npcId = engine.npcId;
    const record = this.content.npcs.get(npcId);
    const behavior = NPC_TYPE_BEHAVIOR[record?.type ?? 'specialist'];

    const requested = attempt.isCorrect
      ? Math.round(this.config.correctAnswerGain * behavior.rewardMultiplier)
      : -(behavior.penalty === 'enemy' ? this.config.enemyWrongAnswerPenalty : this.config.wrongAnswerPenalty);
    const applied = this.player.adjustCoherence(requested);
    this.player.recordAnswer(attempt.isCorrect);
    this.npcs.opinionDelta(npcId, attempt.isCorrect ? 1 : -1);

    const knowledgeGained = attempt.rewardKnowledge && this.player.addKnowledge(attempt.rewardKnowledge)
      ? attempt.rewardKnowledge
      : undefined;
    this.lastResponse = attempt.responseText;

    const payload: OutcomePayload = {
      npcId,
      isCorrect: attempt.isCorrect,
      coherenceDelta: applied,
      conversationCompleted: attempt.completed,
      ...(knowledgeGained ? { knowledgeGained } : {}),
    };

    if (this.player.isDepleted()) {
      this.status = 'defeat';
      this.conversation = null;
      logger.info('Session lost', { npcId, floor: this.floors.getFloor().number });
      return outcome(true, 'defeat', `${attempt.responseText} Your coherence collapses.`, {
        ...payload,
        status: this.status,
        stats: this.finalStats(),
      });
    }

    if (!attempt.completed) {
      return outcome(true, 'answered', attempt.responseText, { ...payload, question: engine.view() ?? undefined });
    }

    this.conversation = null;
    const ratio = engine.correct / engine.length;
    const npcDefeated = ratio >= this.config.defeatThreshold;
    if (npcDefeated) {
      this.npcs.markDefeated(npcId);
      this.player.recordDefeat(npcId);
    }

    const floorNumber = this.floors.getFloor().number;
    const floorComplete = this.floors.isComplete(floorNumber);
    const name = record?.name ?? npcId;
    const summary = npcDefeated
      ? `${name} is convinced.${floorComplete ? ' The way down is open.' : ''}`
      : `${name} is not convinced. Talk again to retry.`;

    this.advanceNpcs();
    return outcome(true, 'answered', `${attempt.responseText} ${summary}`, {
      ...payload,
      npcDefeated,
      floorComplete,
    });
  }

  exitConversation(): CommandOutcome {
    const over = this.gameOverOutcome();
    if (over) return over;

    if (!this.conversation) {
      return rejected('You are not in a conversation.');
    }

    const npcId = this.conversation.npcId;
    this.conversation = null;
    this.lastResponse = null;
    this.advanceNpcs();
    const name = this.content.npcs.get(npcId)?.name ?? npcId;
    return outcome(true, 'conversation_exited', `You step away from ${name}.`, { npcId });
  }

  private gameOverOutcome(): CommandOutcome | null {
    if (this.status === 'playing') return null;
    const message = this.status === 'victory'
      ? 'The dive is complete. Start a new session to play again.'
      : 'Your coherence is gone. Start a new session to play again.';
    return outcome(false, 'game_over', message, { status: this.status, stats: this.finalStats() });
  }

  private advanceNpcs(): void {
    if (!this.config.npcWander || this.status !== 'playing') return;
    this.npcs.advanceWandering(this.floors.getFloor().map, this.player.getPosition(), this.rng, {
      frozen: this.conversation !== null,
      blocked: this.floors.staticCells(),
    });
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  computeScore(): number {
    const weights = this.config.scoreWeights;
    return (
      this.player.correctAnswers * weights.correctAnswer +
      this.player.npcsDefeated * weights.npcDefeated +
      this.player.getKnowledge().length * weights.knowledgeModule +
      this.player.getCoherence() * weights.coherencePoint
    );
  }

  finalStats(): FinalStats {
    const player = this.player.view();
    return {
      questionsAnswered: player.questionsAnswered,
      questionsCorrect: player.questionsCorrect,
      questionsWrong: player.questionsWrong,
      accuracy: this.player.accuracy(),
      npcsDefeated: player.npcsDefeated,
      knowledgeModules: player.knowledge.length,
      coherence: player.coherence,
      floor: this.floors.getFloor().number,
      score: this.computeScore(),
    };
  }

  isOver(): boolean {
    return this.status !== 'playing';
  }

  get contentId(): string {
    return this.content.id;
  }

  view(): GameView {
    const floor = this.floors.getFloor();
    const position = this.player.getPosition();
    const statics: Entity[] = [
      ...(floor.upStairs ? [floor.upStairs] : []),
      ...(floor.downStairs ? [floor.downStairs] : []),
      ...floor.terminals,
    ];
    const player: Entity = {
      id: 'player',
      kind: 'player',
      position,
      glyph: PLAYER_GLYPH,
      color: PLAYER_COLOR,
      name: 'You',
    };

    let conversation: GameView['conversation'] = null;
    if (this.conversation) {
      const record = this.content.npcs.get(this.conversation.npcId);
      conversation = {
        npcId: this.conversation.npcId,
        npcName: record?.name ?? this.conversation.npcId,
        greeting: record?.greeting ?? '',
        status: this.conversation.getStatus(),
        correctCount: this.conversation.correct,
        question: this.conversation.view(),
      };
    }

    return {
      contentId: this.content.id,
      floor: floor.number,
      maxFloors: this.config.maxFloors,
      status: this.status,
      score: this.computeScore(),
      floorComplete: this.floors.isComplete(floor.number),
      map: this.floors.mapRows(),
      entities: [...statics, ...this.npcs.getRoster().map((npc) => npc.entity), player].map(toEntityView),
      player: this.player.view(),
      conversation,
      lastResponse: this.lastResponse,
      terminal: this.activeTerminal,
      warnings: [...floor.warnings],
    };
  }

  save(): GameSnapshot {
    return {
      version: CURRENT_SNAPSHOT_VERSION,
      content_id: this.content.id,
      seed: this.config.seed,
      rng_state: this.rng.getState(),
      fixed: this.config.fixed,
      floor: this.floors.getFloor().number,
      max_floors: this.config.maxFloors,
      status: this.status,
      player: this.player.toSnapshot(),
      npc_history: Object.fromEntries(
        Array.from(this.history.entries()).map(([id, entry]) => [id, { ...entry }])
      ),
      npcs: this.npcs.toPlacementSnapshot(),
      conversation: this.conversation ? this.conversation.toSnapshot() : null,
      saved_at: new Date().toISOString(),
    };
  }
}
