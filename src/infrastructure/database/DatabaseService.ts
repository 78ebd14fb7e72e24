// Database Service - Main entry point for database operations
// Provides access to the repositories and handles initialization

import {
  DatabaseConnection,
  closeDatabase,
  getDatabase,
  type DatabaseConfig,
} from './lowdb/connection.js';
import { GameSaveRepository } from './lowdb/GameSaveRepository.js';

export class DatabaseService {
  public readonly saves: GameSaveRepository;

  private constructor(db: DatabaseConnection) {
    this.saves = new GameSaveRepository(db);
  }

  /**
   * Initialize the shared database
   */
  static async initialize(config: DatabaseConfig): Promise<DatabaseService> {
    const db = await getDatabase(config);
    if (!instance) {
      instance = new DatabaseService(db);
    }
    return instance;
  }

  /**
   * Standalone service over its own connection (tests, tools)
   */
  static async open(config: DatabaseConfig): Promise<DatabaseService> {
    const db = new DatabaseConnection(config);
    await db.init();
    return new DatabaseService(db);
  }

  static async close(): Promise<void> {
    await closeDatabase();
    instance = null;
  }

  getStats() {
    return {
      saves: this.saves.getStats(),
    };
  }
}

// Singleton instance
let instance: DatabaseService | null = null;

export async function initDatabaseService(dbPath: string): Promise<DatabaseService> {
  return DatabaseService.initialize({ path: dbPath });
}
