// Server entry point
// Bootstrap and start the HTTP server

import 'dotenv/config';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { createApp } from '@/api/app.js';
import { GameStateManager } from '@/application/game/GameStateManager.js';
import { SessionService } from '@/application/game/SessionService.js';
import { ContentLoader } from '@/infrastructure/content/ContentLoader.js';
import { initDatabaseService, DatabaseService } from '@/infrastructure/database/DatabaseService.js';
import { SessionRegistry } from '@/infrastructure/session/SessionRegistry.js';
import { buildAppConfig, validateConfig } from '@/utils/config.js';
import { Logger } from '@/utils/logger.js';

const logger = new Logger('Server');

async function main(): Promise<void> {
  // Build configuration from environment
  const config = buildAppConfig(process.env);

  // Validate configuration
  const errors = validateConfig(config);
  if (errors.length > 0) {
    errors.forEach((err) => logger.error('Configuration error', { error: err }));
    process.exit(1);
  }

  // Ensure data directory exists
  mkdirSync(dirname(config.storage.dbPath), { recursive: true });

  let dbService: DatabaseService;
  try {
    dbService = await initDatabaseService(config.storage.dbPath);
    const stats = dbService.getStats();
    logger.info('Database ready', { path: config.storage.dbPath, saves: stats.saves.totalSaves });
  } catch (error) {
    logger.error('Failed to initialize database', { error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
  }

  // Fail fast on a broken default content set
  const content = new ContentLoader(config.storage.contentDir);
  await content.load(config.storage.defaultContentSet);

  const registry = new SessionRegistry({
    idleTtlMs: config.storage.sessionIdleTtlMs,
    cleanupIntervalMs: config.storage.sessionCleanupIntervalMs,
  });
  registry.startCleanup();

  const sessionService = new SessionService({
    registry,
    content,
    stateManager: new GameStateManager(dbService.saves),
    gameConfig: config.game,
    defaultContentSet: config.storage.defaultContentSet,
    autosave: config.storage.autosave,
  });

  const app = createApp({
    sessionService,
    content,
    trustProxy: config.server.nodeEnv === 'production',
    logFormat: config.server.nodeEnv === 'production' ? 'combined' : 'dev',
  });

  const server = app.listen(config.server.port, config.server.host, () => {
    logger.info('Server running', {
      url: `http://${config.server.host}:${config.server.port}`,
      nodeEnv: config.server.nodeEnv,
      contentSet: config.storage.defaultContentSet,
    });
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info('Starting graceful shutdown', { signal });
    registry.stopCleanup();
    server.close(() => {
      DatabaseService.close().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error('Database close failed', { error: error instanceof Error ? error.message : String(error) });
          process.exit(1);
        }
      );
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  process.on('uncaughtException', (err) => {
    logger.error('Uncaught exception', { error: err.message, stack: err.stack });
    shutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', { reason: reason instanceof Error ? reason.message : String(reason) });
  });
}

main().catch((error: unknown) => {
  logger.error('Fatal error during startup', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
