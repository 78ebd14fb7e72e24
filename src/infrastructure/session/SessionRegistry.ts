// Infrastructure: In-memory session registry
// Holds live sessions by id and serializes the commands sent to each one

import { v4 as uuidv4 } from 'uuid';
import type { GameSession } from '@/application/game/GameSession.js';
import { gameLogger } from '@/utils/logger.js';

const logger = gameLogger.child('SessionRegistry');

export interface SessionRegistryConfig {
  idleTtlMs: number;          // Sessions untouched this long are dropped
  cleanupIntervalMs: number;  // How often the sweep runs once started
}

export const DEFAULT_REGISTRY_CONFIG: SessionRegistryConfig = {
  idleTtlMs: 60 * 60 * 1000,
  cleanupIntervalMs: 60 * 1000,
};

export interface SessionEntry {
  id: string;
  session: GameSession;
  createdAt: Date;
  lastActivityAt: Date;
}

export class SessionRegistry {
  private sessions = new Map<string, SessionEntry>();
  // Tail of each session's command queue; never rejects
  private queues = new Map<string, Promise<void>>();
  private cleanupTimer: NodeJS.Timeout | null = null;
  private readonly config: SessionRegistryConfig;

  constructor(config: Partial<SessionRegistryConfig> = {}) {
    this.config = { ...DEFAULT_REGISTRY_CONFIG, ...config };
  }

  create(session: GameSession): SessionEntry {
    const now = new Date();
    const entry: SessionEntry = { id: uuidv4(), session, createdAt: now, lastActivityAt: now };
    this.sessions.set(entry.id, entry);
    return entry;
  }

  get(id: string): SessionEntry | undefined {
    return this.sessions.get(id);
  }

  /**
   * Swap the live session under an id, e.g. after loading a save.
   */
  replace(id: string, session: GameSession): boolean {
    const entry = this.sessions.get(id);
    if (!entry) return false;
    entry.session = session;
    entry.lastActivityAt = new Date();
    return true;
  }

  delete(id: string): boolean {
    this.queues.delete(id);
    return this.sessions.delete(id);
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Drop every session idle for longer than the TTL. Returns how many went.
   */
  evictIdle(now: number = Date.now()): number {
    let evicted = 0;
    for (const [id, entry] of this.sessions) {
      if (now - entry.lastActivityAt.getTime() > this.config.idleTtlMs) {
        this.delete(id);
        evicted++;
      }
    }

    if (evicted > 0) {
      logger.info('Evicted idle sessions', { count: evicted, remaining: this.sessions.size });
    }
    return evicted;
  }

  startCleanup(): void {
    if (this.cleanupTimer) return;
    this.cleanupTimer = setInterval(() => {
      this.evictIdle();
    }, this.config.cleanupIntervalMs);
    this.cleanupTimer.unref();

    logger.debug('Started idle session cleanup', {
      idleTtlMs: this.config.idleTtlMs,
      intervalMs: this.config.cleanupIntervalMs,
    });
  }

  stopCleanup(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
  }

  /**
   * Run a task after every task already queued for the same session.
   * One session never has two commands in flight.
   */
  run<T>(id: string, task: () => Promise<T> | T): Promise<T> {
    const previous = this.queues.get(id) ?? Promise.resolve();
    const result = previous.then(() => {
      const entry = this.sessions.get(id);
      if (entry) entry.lastActivityAt = new Date();
      return task();
    });
    this.queues.set(
      id,
      result.then(
        () => undefined,
        () => undefined
      )
    );
    return result;
  }
}
