// Express application setup

import express from 'express';
import type { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import type { AppContext } from './context.js';
import { createAuthRoutes } from './routes/auth-routes.js';
import { createTodoRoutes } from './routes/todo-routes.js';
import { AppError } from './utils/errors.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('http');

/**
 * Status of a client error raised by Express itself (body-parser and friends)
 */
const clientErrorStatus = (err: Error): number | undefined => {
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return undefined;
};

export function createApp(ctx: AppContext): express.Application {
  const { config } = ctx;
  const app = express();

  app.use(cors({
    origin: [...config.corsOrigins],
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization']
  }));
  app.use(express.json()); // Parse JSON request bodies
  app.use(express.urlencoded({ extended: false })); // Login also accepts form posts

  app.use((req, res, next) => {
    const started = Date.now();
    res.on('finish', () => {
      log.debug('Request handled', {
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        durationMs: Date.now() - started
      });
    });
    next();
  });

  app.get('/', (_req, res) => {
    res.json({
      message: `Welcome to ${config.appName}`,
      status: 'healthy'
    });
  });

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({ status: 'healthy' });
  });

  app.use('/auth', createAuthRoutes(ctx));
  app.use('/todos', createTodoRoutes(ctx));

  // 404 handler - must come after all other routes
  app.use((_req, res) => {
    res.status(404).json({
      error: 'Not Found',
      message: 'The requested resource was not found'
    });
  });

  // Global error handling middleware
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof AppError) {
      log.debug(`${err.name}: ${err.message}`, { method: req.method, path: req.originalUrl });

      if (err.statusCode === 401) {
        res.setHeader('WWW-Authenticate', 'Bearer');
      }

      res.status(err.statusCode).json({
        error: err.message,
        message: err.message
      });
      return;
    }

    const clientStatus = clientErrorStatus(err);
    if (clientStatus !== undefined) {
      res.status(clientStatus).json({
        error: clientStatus === 400 ? 'Bad Request' : err.message,
        message: err.message
      });
      return;
    }

    log.error('Unhandled error', { method: req.method, path: req.originalUrl, error: err.message, stack: err.stack });

    // Handle unexpected errors (500)
    res.status(500).json({
      error: 'Internal Server Error',
      message: config.nodeEnv === 'production'
        ? 'An unexpected error occurred'
        : err.message
    });
  });

  return app;
}
