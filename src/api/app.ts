// API layer: Express app configuration
// Composes all middleware and routes

import express, { type Application, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import type { SessionService } from '@/application/game/SessionService.js';
import type { ContentLoader } from '@/infrastructure/content/ContentLoader.js';
import { errorHandler } from './middleware/errorHandler.js';
import { createSessionRouter } from './routes/sessions.js';
import { createSaveRouter } from './routes/saves.js';

export interface AppConfig {
  sessionService: SessionService;
  content?: Pick<ContentLoader, 'listAvailable'>;
  corsOrigins: string[];
  trustProxy: boolean;
  logFormat: string;
}

export function createApp(config: Partial<AppConfig> & Pick<AppConfig, 'sessionService'>): Application {
  const app = express();

  const {
    corsOrigins = ['http://localhost:3000', 'http://127.0.0.1:3000'],
    trustProxy = false,
    logFormat = process.env.NODE_ENV === 'production' ? 'combined' : 'dev',
  } = config;

  // Trust proxy (for proper client IP behind reverse proxy)
  if (trustProxy) {
    app.set('trust proxy', 1);
  }

  // Security middleware
  app.use(helmet({
    contentSecurityPolicy: false, // Disable for API-only server
  }));

  // CORS
  app.use(cors({
    origin: corsOrigins,
    credentials: true,
  }));

  // Request logging stays quiet under test
  if (process.env.NODE_ENV !== 'test') {
    app.use(morgan(logFormat));
  }

  // Body parsing
  app.use(express.json({ limit: '1mb' }));

  // Health check (before routes)
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  const content = config.content;
  if (content) {
    app.get('/api/content', (_req: Request, res: Response, next: NextFunction) => {
      content.listAvailable().then((sets) => res.json({ success: true, contentSets: sets }), next);
    });
  }

  app.use('/api/sessions', createSessionRouter(config.sessionService));
  app.use('/api/saves', createSaveRouter(config.sessionService));

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: {
        code: 'NOT_FOUND',
        message: 'Resource not found',
      },
    });
  });

  // Global error handler (must be last)
  app.use(errorHandler);

  return app;
}
