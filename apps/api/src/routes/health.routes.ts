// =====================================================
// Health Check Routes
// =====================================================

import { Router, Request, Response } from 'express';
import type { ApiResponse } from '@yahrzeit-reminders/shared-types';
import type { SqliteDatabase } from '../lib/database';
import { logger } from '../utils/logger';

interface HealthStatus {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  uptime: number;
  version: string;
  services: {
    api: 'up';
    database: 'up' | 'down';
  };
}

function databaseIsUp(db: SqliteDatabase): boolean {
  try {
    db.prepare('SELECT 1').get();
    return true;
  } catch (error) {
    logger.error('[Health] Database check failed', { error });
    return false;
  }
}

export function createHealthRouter(db: SqliteDatabase): Router {
  const router: Router = Router();

  // GET /health
  router.get('/', (_req: Request, res: Response) => {
    const databaseUp = databaseIsUp(db);
    const healthStatus: HealthStatus = {
      status: databaseUp ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      version: '0.1.0',
      services: {
        api: 'up',
        database: databaseUp ? 'up' : 'down',
      },
    };

    const response: ApiResponse<HealthStatus> = {
      success: databaseUp,
      data: healthStatus,
    };

    res.status(databaseUp ? 200 : 503).json(response);
  });

  // GET /health/ready (readiness check)
  router.get('/ready', (_req: Request, res: Response) => {
    const ready = databaseIsUp(db);
    res.status(ready ? 200 : 503).json({ ready });
  });

  // GET /health/live (liveness check)
  router.get('/live', (_req: Request, res: Response) => {
    res.status(200).json({ alive: true });
  });

  return router;
}
