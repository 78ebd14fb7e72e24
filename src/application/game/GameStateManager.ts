// Application layer: GameStateManager
// Handles save/load orchestration for game sessions

import type { GameSaveRepository, SaveSlot } from '@/infrastructure/database/lowdb/GameSaveRepository.js';
import { SaveLoadError } from '@/utils/errors.js';
import { storageLogger } from '@/utils/logger.js';
import { GameSession, type GameSessionDeps } from './GameSession.js';

export const AUTOSAVE_SLOT = 'autosave';

export interface SaveResult {
  slotName: string;
  isAutoSave: boolean;
  floor: number;
  score: number;
  savedAt: string;
}

export interface LoadResult {
  slotName: string;
  session: GameSession;
  loadedAt: number;
}

export class GameStateManager {
  constructor(private saves: GameSaveRepository) {}

  async save(sessionId: string, session: GameSession, slotName = AUTOSAVE_SLOT): Promise<SaveResult> {
    const snapshot = session.save();
    const isAutoSave = slotName === AUTOSAVE_SLOT;
    const slot = await this.saves.saveSnapshot(sessionId, slotName, snapshot, {
      contentId: snapshot.content_id,
      floor: snapshot.floor,
      score: session.computeScore(),
      isAutoSave,
    });

    storageLogger.info('Session saved', { sessionId, slotName, floor: slot.floor });
    return { slotName, isAutoSave, floor: slot.floor, score: slot.score, savedAt: slot.updatedAt };
  }

  /**
   * Restore a slot into a new session. Null when the slot does not exist;
   * corrupt or incompatible saves throw and leave the caller's session alone.
   */
  async load(sessionId: string, slotName: string, deps: GameSessionDeps): Promise<LoadResult | null> {
    const text = await this.saves.loadSnapshot(sessionId, slotName);
    if (text === null) return null;

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new SaveLoadError(`Save slot "${slotName}" is corrupt`, {
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    const session = GameSession.restore(raw, deps);
    storageLogger.info('Session loaded', { sessionId, slotName });
    return { slotName, session, loadedAt: Date.now() };
  }

  async findSlot(sessionId: string, slotName: string): Promise<SaveSlot | null> {
    return this.saves.getSlot(sessionId, slotName);
  }

  async listSlots(sessionId: string): Promise<SaveSlot[]> {
    return this.saves.listSlots(sessionId);
  }

  async deleteSlot(sessionId: string, slotName: string): Promise<boolean> {
    return this.saves.deleteSlot(sessionId, slotName);
  }
}
