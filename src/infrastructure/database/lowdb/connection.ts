// LowDB connection and database instance management
// JSON file storage for save slots; any lowdb adapter can be injected

import { Low, type Adapter } from 'lowdb';
import { JSONFile } from 'lowdb/node';
import { dirname } from 'path';
import { mkdirSync } from 'fs';

// Database schema definition with version field for optimistic locking
export interface DatabaseSchema {
  _version: number;           // Incremented on every checked write
  saves: GameSaveRecord[];
}

// One save slot of one session
export interface GameSaveRecord {
  session_id: string;
  slot_name: string;
  content_id: string;
  floor: number;
  score: number;
  snapshot: string;           // JSON stringified GameSnapshot
  is_auto_save: number;
  created_at: string;
  updated_at: string;
}

// Error class for version conflicts
export class VersionConflictError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'VersionConflictError';
  }
}

function createDefaultData(): DatabaseSchema {
  return { _version: 1, saves: [] };
}

export interface DatabaseConfig {
  path: string;
  /** Replaces the JSON file adapter, e.g. lowdb's Memory adapter in tests. */
  adapter?: Adapter<DatabaseSchema>;
}

export class DatabaseConnection {
  private db: Low<DatabaseSchema>;

  constructor(config: DatabaseConfig) {
    let adapter = config.adapter;
    if (!adapter) {
      mkdirSync(dirname(config.path), { recursive: true });
      adapter = new JSONFile<DatabaseSchema>(config.path);
    }
    this.db = new Low(adapter, createDefaultData());
  }

  /**
   * Initialize by reading data
   */
  async init(): Promise<void> {
    await this.db.read();

    // Files written before the version field existed
    if (this.db.data._version === undefined) {
      this.db.data._version = 1;
    }
    if (!Array.isArray(this.db.data.saves)) {
      this.db.data.saves = [];
    }
    await this.db.write();
  }

  getData(): DatabaseSchema {
    return this.db.data;
  }

  async write(): Promise<void> {
    await this.db.write();
  }

  /**
   * Read data from disk before modifying it
   */
  async read(): Promise<void> {
    await this.db.read();
  }

  /**
   * Write with version check for optimistic locking
   * Throws VersionConflictError if version has changed
   */
  async writeWithVersionCheck(expectedVersion: number): Promise<void> {
    const currentVersion = this.db.data._version;
    if (currentVersion !== expectedVersion) {
      throw new VersionConflictError(
        `Version conflict: expected ${expectedVersion}, got ${currentVersion}`
      );
    }
    this.db.data._version = currentVersion + 1;
    await this.db.write();
  }

  /**
   * Atomic update with optimistic locking and retry
   */
  async atomicUpdate<T>(
    updater: (data: DatabaseSchema) => T,
    options?: { maxRetries?: number }
  ): Promise<T> {
    const maxRetries = options?.maxRetries ?? 3;

    for (let attempt = 0; attempt < maxRetries; attempt++) {
      await this.read();
      const data = this.getData();
      const version = data._version;

      try {
        const result = updater(data);
        await this.writeWithVersionCheck(version);
        return result;
      } catch (e) {
        if (e instanceof VersionConflictError && attempt < maxRetries - 1) {
          continue;
        }
        throw e;
      }
    }

    throw new Error('Max retries exceeded in atomicUpdate');
  }

  async close(): Promise<void> {
    await this.write();
  }
}

// Singleton instance
let instance: DatabaseConnection | null = null;

export async function getDatabase(config?: DatabaseConfig): Promise<DatabaseConnection> {
  if (!instance) {
    if (!config) {
      throw new Error('Database config required for first initialization');
    }
    instance = new DatabaseConnection(config);
    await instance.init();
  }
  return instance;
}

export async function closeDatabase(): Promise<void> {
  if (instance) {
    await instance.close();
    instance = null;
  }
}
