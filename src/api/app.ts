// API layer: Express app configuration
// Composes all middleware and routes

import express, { type Application, type Request, type Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { errorHandler } from './middleware/errorHandler.js';
import { createCategoryRouter } from './routes/categories.js';
import { createScoringRouter } from './routes/scoring.js';
import { createScoresheetRouter } from './routes/scoresheets/index.js';
import { ScoringService } from '@/application/scoring/ScoringService.js';
import { ScoresheetStore } from '@/application/scoring/ScoresheetStore.js';

export interface AppConfig {
  corsOrigins: string[];
  trustProxy: boolean;
  logFormat: string | null;
  scoringService: ScoringService;
  store: ScoresheetStore;
}

export function createApp(config: Partial<AppConfig> = {}): Application {
  const app = express();

  const {
    corsOrigins = ['http://localhost:3000', 'http://127.0.0.1:3000'],
    trustProxy = false,
    logFormat = process.env.NODE_ENV === 'production' ? 'combined' : 'dev',
    scoringService = new ScoringService(),
    store = new ScoresheetStore(),
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

  // Logging (null disables access logs)
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
      scoresheets: store.size,
    });
  });

  // API routes
  app.use('/api/categories', createCategoryRouter(scoringService));
  app.use('/api/scoring', createScoringRouter(scoringService));
  app.use('/api/scoresheets', createScoresheetRouter(scoringService, store));

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
