// Application layer: Session service
// Creates sessions, dispatches commands by session id and autosaves on floor changes

import type { Direction } from '@/domain/game/types.js';
import type { CommandOutcome, FinalStats, GameView } from '@/domain/game/session.js';
import type { ContentSource } from '@/infrastructure/content/ContentLoader.js';
import type { SaveSlot } from '@/infrastructure/database/lowdb/GameSaveRepository.js';
import type { SessionRegistry } from '@/infrastructure/session/SessionRegistry.js';
import { buildSessionConfig, validateGameConfig, type GameConfig } from '@/utils/config.js';
import { GameEngineError, SaveSlotNotFoundError, SessionNotFoundError } from '@/utils/errors.js';
import { gameLogger } from '@/utils/logger.js';
import { GameSession } from './GameSession.js';
import { AUTOSAVE_SLOT, type GameStateManager, type SaveResult } from './GameStateManager.js';

const logger = gameLogger.child('SessionService');

export interface SessionServiceDeps {
  registry: SessionRegistry;
  content: ContentSource;
  stateManager: GameStateManager;
  gameConfig: GameConfig;
  defaultContentSet: string;
  autosave: boolean;
}

/** A stored slot, addressed by the session that wrote it. */
export interface SaveReference {
  sessionId: string;
  slotName: string;
}

export interface CreateSessionOptions {
  contentId?: string;
  seed?: number;
  fixed?: boolean;
  maxFloors?: number;
  /** Resume from a stored slot; the other options are then ignored. */
  fromSave?: SaveReference;
}

export interface CommandResponse {
  outcome: CommandOutcome;
  view: GameView;
}

export interface LoadResponse {
  slotName: string;
  loadedAt: number;
  view: GameView;
}

export class SessionService {
  private readonly registry: SessionRegistry;
  private readonly content: ContentSource;
  private readonly stateManager: GameStateManager;
  private readonly gameConfig: GameConfig;
  private readonly defaultContentSet: string;
  private readonly autosave: boolean;

  constructor(deps: SessionServiceDeps) {
    this.registry = deps.registry;
    this.content = deps.content;
    this.stateManager = deps.stateManager;
    this.gameConfig = deps.gameConfig;
    this.defaultContentSet = deps.defaultContentSet;
    this.autosave = deps.autosave;
  }

  async createSession(options: CreateSessionOptions = {}): Promise<{ sessionId: string; view: GameView }> {
    if (options.fromSave) {
      return this.resumeSession(options.fromSave);
    }

    const contentId = options.contentId ?? this.defaultContentSet;
    const overrides: Partial<GameConfig> = {};
    if (options.seed !== undefined) overrides.seed = options.seed;
    if (options.fixed !== undefined) overrides.fixed = options.fixed;
    if (options.maxFloors !== undefined) overrides.maxFloors = options.maxFloors;

    const config = buildSessionConfig(this.gameConfig, contentId, overrides);
    const errors = validateGameConfig(config);
    if (errors.length > 0) {
      throw new GameEngineError('Invalid session options', { errors: errors.join('; ') });
    }

    const content = await this.content.load(contentId);
    const session = GameSession.start({ content, config });
    const entry = this.registry.create(session);

    logger.info('Session created', { sessionId: entry.id, contentId, seed: config.seed });
    return { sessionId: entry.id, view: session.view() };
  }

  /**
   * Start a new live session from a slot written by any earlier session,
   * including one that has quit or lived in another server process.
   */
  private async resumeSession(from: SaveReference): Promise<{ sessionId: string; view: GameView }> {
    const slot = await this.stateManager.findSlot(from.sessionId, from.slotName);
    if (!slot) {
      throw new SaveSlotNotFoundError(from.sessionId, from.slotName);
    }

    const content = await this.content.load(slot.contentId);
    const config = buildSessionConfig(this.gameConfig, slot.contentId);
    const result = await this.stateManager.load(from.sessionId, from.slotName, { content, config });
    if (!result) {
      throw new SaveSlotNotFoundError(from.sessionId, from.slotName);
    }

    const entry = this.registry.create(result.session);
    logger.info('Session resumed', { sessionId: entry.id, fromSession: from.sessionId, slotName: from.slotName });
    return { sessionId: entry.id, view: result.session.view() };
  }

  private require(sessionId: string): GameSession {
    const entry = this.registry.get(sessionId);
    if (!entry) {
      throw new SessionNotFoundError(sessionId);
    }
    return entry.session;
  }

  async getView(sessionId: string): Promise<GameView> {
    return this.registry.run(sessionId, () => this.require(sessionId).view());
  }

  move(sessionId: string, direction: Direction): Promise<CommandResponse> {
    return this.dispatch(sessionId, (session) => session.move(direction));
  }

  interact(sessionId: string): Promise<CommandResponse> {
    return this.dispatch(sessionId, (session) => session.interact());
  }

  answer(sessionId: string, input: number | string): Promise<CommandResponse> {
    return this.dispatch(sessionId, (session) => session.answer(input));
  }

  exitConversation(sessionId: string): Promise<CommandResponse> {
    return this.dispatch(sessionId, (session) => session.exitConversation());
  }

  private dispatch(sessionId: string, command: (session: GameSession) => CommandOutcome): Promise<CommandResponse> {
    return this.registry.run(sessionId, async () => {
      const session = this.require(sessionId);
      const outcome = command(session);

      if (outcome.kind === 'floor_changed' && this.autosave) {
        try {
          await this.stateManager.save(sessionId, session, AUTOSAVE_SLOT);
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          logger.error('Autosave failed', { sessionId, error: message });
          outcome.warnings.push(`Autosave failed: ${message}`);
        }
      }

      return { outcome, view: session.view() };
    });
  }

  async quit(sessionId: string): Promise<{ sessionId: string; stats: FinalStats }> {
    return this.registry.run(sessionId, () => {
      const session = this.require(sessionId);
      const stats = session.finalStats();
      this.registry.delete(sessionId);
      logger.info('Session ended', { sessionId, score: stats.score });
      return { sessionId, stats };
    });
  }

  async save(sessionId: string, slotName = 'manual'): Promise<SaveResult> {
    return this.registry.run(sessionId, () => this.stateManager.save(sessionId, this.require(sessionId), slotName));
  }

  /**
   * Replace the live session with a saved one. A failed load throws and
   * the live session keeps running unchanged.
   */
  async load(sessionId: string, slotName: string): Promise<LoadResponse> {
    return this.registry.run(sessionId, async () => {
      const live = this.require(sessionId);
      const content = await this.content.load(live.contentId);
      const config = buildSessionConfig(this.gameConfig, live.contentId);

      const result = await this.stateManager.load(sessionId, slotName, { content, config });
      if (!result) {
        throw new SaveSlotNotFoundError(sessionId, slotName);
      }

      this.registry.replace(sessionId, result.session);
      return { slotName, loadedAt: result.loadedAt, view: result.session.view() };
    });
  }

  async listSaves(sessionId: string): Promise<SaveSlot[]> {
    this.require(sessionId);
    return this.stateManager.listSlots(sessionId);
  }

  async deleteSave(sessionId: string, slotName: string): Promise<boolean> {
    this.require(sessionId);
    return this.stateManager.deleteSlot(sessionId, slotName);
  }
}
