// API layer: Express app configuration
// Composes all middleware and routes

import express, { type Application, type Request, type Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import type { ContentLookup } from '@/domain/content/registry.js';
import type { GameStateManager } from '@/application/game/GameStateManager.js';
import { errorHandler } from './middleware/errorHandler.js';
import { createCampaignRouter } from './routes/campaigns.js';
import { createCharacterRouter } from './routes/characters.js';
import { createGameRouter } from './routes/games.js';

export interface AppConfig {
  corsOrigins: string[];
  trustProxy: boolean;
  /** morgan format; false disables access logs */
  logFormat: string | false;
}

export interface AppDependencies {
  registry: ContentLookup;
  manager: GameStateManager;
}

export function createApp(deps: AppDependencies, config: Partial<AppConfig> = {}): Application {
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
  }));

  // Logging
  if (logFormat) {
    app.use(morgan(logFormat));
  }

  // Body parsing
  app.use(express.json({ limit: '100kb' }));

  // Health check (before routes)
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      liveGames: deps.manager.liveSessionCount,
    });
  });

  // API routes
  app.use('/api/campaigns', createCampaignRouter(deps.registry));
  app.use('/api/characters', createCharacterRouter(deps.manager));
  app.use('/api/games', createGameRouter(deps.manager, deps.registry));

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
