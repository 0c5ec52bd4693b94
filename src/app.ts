/**
 * Express Application Configuration
 */

import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { env } from './config/env';
import { errorHandler } from './middleware/error-handler';
import { rateLimitMiddleware } from './middleware/rate-limit.middleware';
import { RateLimitConfig } from './lib/rate-limit';
import { allTools } from './modules/tools/definitions';
import { createToolContext } from './modules/tools/tools.context';
import { ToolRegistry } from './modules/tools/tools.registry';
import { createToolsRouter } from './modules/tools/tools.router';
import { RegisteredTool, ToolContext } from './modules/tools/tools.types';

export interface AppOptions {
  context?: ToolContext;
  tools?: RegisteredTool[];
  /** null disables rate limiting; defaults come from the environment */
  rateLimit?: RateLimitConfig | null;
}

const defaultRateLimit = (): RateLimitConfig | null =>
  env.RATE_LIMIT_ENABLED
    ? {
        windowMs: env.RATE_LIMIT_WINDOW_MS,
        maxRequests: env.RATE_LIMIT_MAX_REQUESTS,
        message: 'Too many requests, please try again later.',
        standardHeaders: true,
        legacyHeaders: true,
      }
    : null;

export const createApp = (options: AppOptions = {}): Application => {
  const app = express();
  const registry = new ToolRegistry(options.context ?? createToolContext(), options.tools ?? allTools);

  // ============================================================================
  // Security & Middleware
  // ============================================================================

  app.use(helmet());

  app.use(
    cors({
      origin: env.CLIENT_URL,
      credentials: true,
      methods: ['GET', 'POST'],
      allowedHeaders: ['Content-Type', 'Authorization'],
    })
  );

  app.use(express.json({ limit: '1mb' }));

  const rateLimit = options.rateLimit === undefined ? defaultRateLimit() : options.rateLimit;
  if (rateLimit) {
    app.use('/api/tools', rateLimitMiddleware(rateLimit));
  }

  // ============================================================================
  // Routes
  // ============================================================================

  app.get('/health', (req: Request, res: Response) => {
    res.json({
      success: true,
      message: 'Site Audit Tools API is running',
      timestamp: new Date().toISOString(),
      environment: env.NODE_ENV,
      tools: registry.list().length,
    });
  });

  app.use('/api/tools', createToolsRouter(registry));

  // 404 Handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: 'Route not found',
      path: req.path,
    });
  });

  // Error handler must be last
  app.use(errorHandler);

  return app;
};
