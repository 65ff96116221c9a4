import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import * as Sentry from '@sentry/node';
import { ERROR_CODES } from '@yahrzeit-reminders/shared-types';
import type { ApiResponse } from '@yahrzeit-reminders/shared-types';
import type { Container } from './container';
import { requestIdMiddleware } from './middleware';
import { createHooksRouter } from './modules/hooks';
import { createHealthRouter } from './routes/health.routes';
import { AppError } from './utils/errors';
import { logger } from './utils/logger';

export function createApp(container: Container): Express {
  const { config } = container;
  const app: Express = express();

  // ===========================================
  // Middleware
  // ===========================================

  app.use(helmet());

  // Server-to-server only; no browser origin needs access
  app.use(cors({ origin: false }));

  app.use(express.json({ limit: '10kb' }));

  app.use(compression());

  app.use(requestIdMiddleware);

  // Request logging
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = Date.now() - start;
      logger.info(`${req.method} ${req.path} ${res.statusCode} - ${duration}ms`, { requestId: req.id });
    });

    next();
  });

  // ===========================================
  // Routes
  // ===========================================

  app.use('/health', createHealthRouter(container.db));

  app.use(
    '/api/v1/hooks',
    createHooksRouter(container.hooks, {
      secret: config.auth.serviceTokenSecret,
      issuer: config.auth.serviceTokenIssuer,
    })
  );

  // ===========================================
  // Error Handling
  // ===========================================

  // 404 handler
  app.use((req: Request, res: Response) => {
    const response: ApiResponse = {
      success: false,
      error: {
        code: ERROR_CODES.NOT_FOUND,
        message: 'The requested resource was not found',
      },
      meta: {
        timestamp: new Date().toISOString(),
        requestId: req.id,
      },
    };
    res.status(404).json(response);
  });

  // Global error handler
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    const statusCode = err instanceof AppError ? err.statusCode : 500;
    const errorCode = err instanceof AppError ? err.code : ERROR_CODES.INTERNAL_ERROR;

    if (statusCode >= 500) {
      logger.error('[Http] Unhandled error', { error: err, requestId: req.id });
      Sentry.captureException(err);
    } else {
      logger.warn('[Http] Request rejected', { code: errorCode, message: err.message, requestId: req.id });
    }

    const response: ApiResponse = {
      success: false,
      error: {
        code: errorCode,
        message:
          statusCode >= 500 && config.nodeEnv === 'production' ? 'An unexpected error occurred' : err.message,
        details: config.nodeEnv === 'development' ? err.stack : undefined,
      },
      meta: {
        timestamp: new Date().toISOString(),
        requestId: req.id,
      },
    };

    res.status(statusCode).json(response);
  });

  return app;
}
