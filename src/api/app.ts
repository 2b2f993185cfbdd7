// API layer: Express app configuration
// Composes all middleware and routes

import express, { type Application, type Request, type Response } from 'express';
import cookieParser from 'cookie-parser';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { errorHandler } from './middleware/errorHandler.js';
import { createAuthRouter } from './routes/auth.js';
import type { IAuthService } from '@/domain/user/repository.js';
import { authMetrics } from '@/utils/auth-logger.js';

export interface AppOptions {
  authService: IAuthService;
  corsOrigins: string[];
  trustProxy: boolean;
  logFormat: string | null;      // null disables access logs
}

export function createApp(options: Pick<AppOptions, 'authService'> & Partial<AppOptions>): Application {
  const app = express();

  const {
    authService,
    corsOrigins = ['http://localhost:3000', 'http://127.0.0.1:3000'],
    trustProxy = false,
    logFormat = process.env.NODE_ENV === 'production' ? 'combined' : 'dev',
  } = options;

  // Trust proxy (for proper client IP behind reverse proxy)
  if (trustProxy) {
    app.set('trust proxy', 1);
  }

  // Security middleware
  app.use(helmet({
    contentSecurityPolicy: false, // API-only server
  }));

  // CORS
  app.use(cors({
    origin: corsOrigins,
    credentials: true,
  }));

  // Logging
  if (logFormat && process.env.NODE_ENV !== 'test') {
    app.use(morgan(logFormat));
  }

  // Body parsing
  app.use(express.json({ limit: '100kb' }));

  // Cookie parser for session management
  app.use(cookieParser());

  // Health check (before routes)
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      counters: authMetrics.getAll(),
    });
  });

  app.use('/auth', createAuthRouter(authService));

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
