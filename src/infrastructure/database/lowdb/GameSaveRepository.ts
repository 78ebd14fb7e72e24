// Infrastructure layer: Save slot repository using LowDB
// Stores serialized game snapshots per session and slot

import type { GameSnapshot } from '@/domain/game/GameState.js';
import type { DatabaseConnection, GameSaveRecord } from './connection.js';

export interface SaveSlotMeta {
  contentId: string;
  floor: number;
  score: number;
  isAutoSave: boolean;
}

export interface SaveSlot {
  sessionId: string;
  slotName: string;
  contentId: string;
  floor: number;
  score: number;
  isAutoSave: boolean;
  createdAt: string;
  updatedAt: string;
}

function toSlot(record: GameSaveRecord): SaveSlot {
  return {
    sessionId: record.session_id,
    slotName: record.slot_name,
    contentId: record.content_id,
    floor: record.floor,
    score: record.score,
    isAutoSave: record.is_auto_save === 1,
    createdAt: record.created_at,
    updatedAt: record.updated_at,
  };
}

export class GameSaveRepository {
  constructor(private db: DatabaseConnection) {}

  /**
   * Create or overwrite a slot. The original creation time is kept.
   */
  async saveSnapshot(sessionId: string, slotName: string, snapshot: GameSnapshot, meta: SaveSlotMeta): Promise<SaveSlot> {
    return this.db.atomicUpdate((data) => {
      const now = new Date().toISOString();
      const existingIndex = data.saves.findIndex(
        (s) => s.session_id === sessionId && s.slot_name === slotName
      );

      const record: GameSaveRecord = {
        session_id: sessionId,
        slot_name: slotName,
        content_id: meta.contentId,
        floor: meta.floor,
        score: meta.score,
        snapshot: JSON.stringify(snapshot),
        is_auto_save: meta.isAutoSave ? 1 : 0,
        created_at: existingIndex >= 0 ? data.saves[existingIndex].created_at : now,
        updated_at: now,
      };

      if (existingIndex >= 0) {
        data.saves[existingIndex] = record;
      } else {
        data.saves.push(record);
      }

      return toSlot(record);
    });
  }

  /**
   * Raw snapshot text of a slot, or null if the slot does not exist
   */
  async loadSnapshot(sessionId: string, slotName: string): Promise<string | null> {
    await this.db.read();
    const record = this.db.getData().saves.find(
      (s) => s.session_id === sessionId && s.slot_name === slotName
    );
    return record ? record.snapshot : null;
  }

  async listSlots(sessionId: string): Promise<SaveSlot[]> {
    await this.db.read();
    return this.db
      .getData()
      .saves.filter((s) => s.session_id === sessionId)
      .sort((a, b) => b.updated_at.localeCompare(a.updated_at))
      .map(toSlot);
  }

  async getSlot(sessionId: string, slotName: string): Promise<SaveSlot | null> {
    await this.db.read();
    const record = this.db.getData().saves.find(
      (s) => s.session_id === sessionId && s.slot_name === slotName
    );
    return record ? toSlot(record) : null;
  }

  async deleteSlot(sessionId: string, slotName: string): Promise<boolean> {
    return this.db.atomicUpdate((data) => {
      const before = data.saves.length;
      data.saves = data.saves.filter(
        (s) => !(s.session_id === sessionId && s.slot_name === slotName)
      );
      return data.saves.length < before;
    });
  }

  getStats(): { totalSaves: number; sessions: number } {
    const saves = this.db.getData().saves;
    return {
      totalSaves: saves.length,
      sessions: new Set(saves.map((s) => s.session_id)).size,
    };
  }
}
