import './instrument';
import * as Sentry from '@sentry/node';
import { createApp } from './app';
import { config, validateConfig } from './config';
import { createContainer } from './container';
import {
  closeRedisConnections,
  scheduleAnniversarySweep,
  scheduleNotificationDispatchJobs,
  startAnniversarySweepWorker,
  startNotificationDispatchWorker,
  stopAnniversarySweepWorker,
  stopNotificationDispatchWorker,
} from './queues';
import { logger } from './utils/logger';

async function main(): Promise<void> {
  const missing = validateConfig();
  if (missing.length > 0) {
    logger.warn('[Startup] Missing environment variables, using defaults', { missing });
  }

  const container = createContainer();

  startAnniversarySweepWorker(container);
  startNotificationDispatchWorker(container);
  await scheduleAnniversarySweep(container);
  await scheduleNotificationDispatchJobs(container);

  const app = createApp(container);
  const server = app.listen(config.port, () => {
    logger.info(`[Startup] Yahrzeit reminder service listening on port ${config.port}`, {
      environment: config.nodeEnv,
      calendarSource: config.calendar.source,
    });
  });

  // Graceful shutdown
  let shuttingDown = false;
  const gracefulShutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`[Shutdown] ${signal} received, shutting down gracefully`);

    // Force close after 10 seconds
    const forceExit = setTimeout(() => {
      logger.error('[Shutdown] Could not close connections in time, forcing exit');
      process.exit(1);
    }, 10_000);
    forceExit.unref();

    await new Promise<void>((resolve) => server.close(() => resolve()));
    await stopAnniversarySweepWorker();
    await stopNotificationDispatchWorker();
    await closeRedisConnections();
    container.close();
    await Sentry.close(2000);

    logger.info('[Shutdown] Complete');
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    gracefulShutdown(signal).catch((error: unknown) => {
      logger.error('[Shutdown] Failed', { error });
      process.exit(1);
    });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));
}

main().catch((error: unknown) => {
  logger.error('[Startup] Failed to start', { error });
  Sentry.captureException(error);
  process.exit(1);
});
