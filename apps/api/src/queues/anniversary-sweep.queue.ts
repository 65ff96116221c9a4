// =====================================================
// Anniversary Sweep Queue
// =====================================================
// One repeatable job a day runs the scheduler sweep. Worker
// concurrency is 1 and the sweep also takes a Redis run-lock,
// so a manual run racing the cron never overlaps it.

import { Queue, Worker } from 'bullmq';
import type { Job } from 'bullmq';
import type { Container } from '../container';
import { logger } from '../utils/logger';
import { getRedisConnection, getSubscriberConnection } from './connection';

// =====================================================
// Queue Name Constant
// =====================================================

export const ANNIVERSARY_SWEEP_QUEUE_NAME = 'anniversary-sweep';

const SWEEP_JOB_NAME = 'run-sweep';
const SWEEP_REPEAT_JOB_ID = 'scheduled-anniversary-sweep';

// =====================================================
// Job Types
// =====================================================

export interface AnniversarySweepJobData {
  triggeredBy: 'scheduled' | 'manual';
  receivedAt: string;
}

export interface AnniversarySweepJobResult {
  success: boolean;
  acquired: boolean;
  today: string;
  subjectsScanned: number;
  entriesCreated: number;
  rolledOver: number;
  failed: number;
  durationMs: number;
}

// =====================================================
// Queue Instance (Singleton)
// =====================================================

let sweepQueue: Queue<AnniversarySweepJobData, AnniversarySweepJobResult> | null = null;
let sweepWorker: Worker<AnniversarySweepJobData, AnniversarySweepJobResult> | null = null;

export function getAnniversarySweepQueue(): Queue<AnniversarySweepJobData, AnniversarySweepJobResult> {
  if (!sweepQueue) {
    sweepQueue = new Queue<AnniversarySweepJobData, AnniversarySweepJobResult>(ANNIVERSARY_SWEEP_QUEUE_NAME, {
      connection: getRedisConnection(),
      defaultJobOptions: {
        attempts: 3,
        backoff: {
          type: 'exponential',
          delay: 60_000,
        },
        removeOnComplete: {
          age: 7 * 24 * 60 * 60,
          count: 100,
        },
        removeOnFail: {
          age: 30 * 24 * 60 * 60,
        },
      },
    });

    logger.info(`[AnniversarySweep] Queue initialized: ${ANNIVERSARY_SWEEP_QUEUE_NAME}`);
  }

  return sweepQueue;
}

// =====================================================
// Job Processor
// =====================================================

/**
 * Per-subject failures are absorbed by the sweep itself; only an
 * infrastructure failure (database, lock) reaches BullMQ's retry.
 */
export async function processAnniversarySweepJob(
  container: Container,
  job: Pick<Job<AnniversarySweepJobData>, 'id' | 'data' | 'attemptsMade'>
): Promise<AnniversarySweepJobResult> {
  logger.info(`[AnniversarySweep] Processing job ${job.id}`, {
    triggeredBy: job.data.triggeredBy,
    attempt: job.attemptsMade + 1,
  });

  try {
    const result = await container.scheduler.runSweep();
    return {
      success: result.success,
      acquired: result.acquired,
      today: result.today,
      subjectsScanned: result.subjectsScanned,
      entriesCreated: result.entriesCreated,
      rolledOver: result.rolledOver,
      failed: result.failed,
      durationMs: result.durationMs,
    };
  } catch (error) {
    logger.error(`[AnniversarySweep] Job ${job.id} failed`, { error, attempt: job.attemptsMade + 1 });
    throw error;
  }
}

// =====================================================
// Worker Management
// =====================================================

export function startAnniversarySweepWorker(
  container: Container
): Worker<AnniversarySweepJobData, AnniversarySweepJobResult> {
  if (sweepWorker) {
    logger.warn('[AnniversarySweep] Worker already running');
    return sweepWorker;
  }

  sweepWorker = new Worker<AnniversarySweepJobData, AnniversarySweepJobResult>(
    ANNIVERSARY_SWEEP_QUEUE_NAME,
    (job) => processAnniversarySweepJob(container, job),
    {
      connection: getSubscriberConnection(),
      concurrency: 1,
    }
  );

  sweepWorker.on('completed', (job, result) => {
    logger.debug(`[AnniversarySweep] Job ${job.id} completed`, {
      entriesCreated: result.entriesCreated,
      rolledOver: result.rolledOver,
      durationMs: result.durationMs,
    });
  });

  sweepWorker.on('failed', (job, error) => {
    logger.error(`[AnniversarySweep] Job ${job?.id} failed`, {
      error: error.message,
      attempt: job?.attemptsMade,
    });
  });

  sweepWorker.on('error', (error) => {
    logger.error('[AnniversarySweep] Worker error', { error });
  });

  logger.info('[AnniversarySweep] Worker started');
  return sweepWorker;
}

export async function stopAnniversarySweepWorker(): Promise<void> {
  if (sweepWorker) {
    await sweepWorker.close();
    sweepWorker = null;
    logger.info('[AnniversarySweep] Worker stopped');
  }

  if (sweepQueue) {
    await sweepQueue.close();
    sweepQueue = null;
  }
}

// =====================================================
// Job Scheduling
// =====================================================

/**
 * Registers the daily sweep. Existing repeatables are removed
 * first so a changed cron pattern takes effect on restart.
 */
export async function scheduleAnniversarySweep(container: Container): Promise<void> {
  const { enabled, cron, timezone } = container.config.scheduler;
  if (!enabled) {
    logger.info('[AnniversarySweep] Sweep disabled (FEATURE_ANNIVERSARY_SWEEP_ENABLED=false)');
    return;
  }

  const queue = getAnniversarySweepQueue();

  const existing = await queue.getRepeatableJobs();
  for (const job of existing) {
    if (job.name === SWEEP_JOB_NAME) {
      await queue.removeRepeatableByKey(job.key);
    }
  }

  await queue.add(
    SWEEP_JOB_NAME,
    { triggeredBy: 'scheduled', receivedAt: new Date().toISOString() },
    {
      repeat: { pattern: cron, tz: timezone },
      jobId: SWEEP_REPEAT_JOB_ID,
    }
  );

  logger.info(`[AnniversarySweep] Registered repeatable sweep (${cron}, ${timezone})`);
}
