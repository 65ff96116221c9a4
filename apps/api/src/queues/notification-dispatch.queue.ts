// =====================================================
// Notification Dispatch Queue
// =====================================================
// One queue, one worker, three job types:
//
//   poll            repeatable; fans out one dispatch-pass job
//                   per worker slot
//   dispatch-pass   claims and sends a batch of due entries
//   recover-claims  repeatable; requeues claims abandoned by a
//                   crashed worker
//
// Passes run concurrently. The ledger claim is what keeps two
// passes from sending the same entry, not the queue.

import { Queue, Worker } from 'bullmq';
import type { Job } from 'bullmq';
import type { Container } from '../container';
import { logger } from '../utils/logger';
import { getRedisConnection, getSubscriberConnection } from './connection';

// =====================================================
// Queue Name Constant
// =====================================================

export const NOTIFICATION_DISPATCH_QUEUE_NAME = 'notification-dispatch';

// =====================================================
// Job Types
// =====================================================

export type NotificationDispatchJobType = 'poll' | 'dispatch-pass' | 'recover-claims';

export interface NotificationDispatchJobData {
  type: NotificationDispatchJobType;
  triggeredBy: 'scheduled' | 'poll' | 'manual';
  receivedAt: string;
}

export interface NotificationDispatchJobResult {
  success: boolean;
  type: NotificationDispatchJobType;
  processed: number;
  skipped: number;
  message: string;
  durationMs: number;
}

type DispatchQueue = Queue<NotificationDispatchJobData, NotificationDispatchJobResult>;
type DispatchWorker = Worker<NotificationDispatchJobData, NotificationDispatchJobResult>;

/** Where the poll job puts the passes it fans out */
export type PassEnqueuer = Pick<DispatchQueue, 'addBulk'>;

// =====================================================
// Queue Instance (Singleton)
// =====================================================

let dispatchQueue: DispatchQueue | null = null;
let dispatchWorker: DispatchWorker | null = null;

export function getNotificationDispatchQueue(): DispatchQueue {
  if (!dispatchQueue) {
    dispatchQueue = new Queue<NotificationDispatchJobData, NotificationDispatchJobResult>(
      NOTIFICATION_DISPATCH_QUEUE_NAME,
      {
        connection: getRedisConnection(),
        defaultJobOptions: {
          // Channel retries live in the ledger; a failed job is an infrastructure fault
          attempts: 1,
          removeOnComplete: {
            age: 60 * 60,
            count: 1000,
          },
          removeOnFail: {
            age: 7 * 24 * 60 * 60,
          },
        },
      }
    );

    logger.info(`[NotificationDispatch] Queue initialized: ${NOTIFICATION_DISPATCH_QUEUE_NAME}`);
  }

  return dispatchQueue;
}

// =====================================================
// Job Processor
// =====================================================

export async function processNotificationDispatchJob(
  container: Container,
  job: Pick<Job<NotificationDispatchJobData>, 'id' | 'data'>,
  enqueuer: PassEnqueuer
): Promise<NotificationDispatchJobResult> {
  const startTime = Date.now();
  const { type } = job.data;

  try {
    let result: Omit<NotificationDispatchJobResult, 'type' | 'durationMs'>;

    switch (type) {
      case 'poll':
        result = await fanOutPasses(container, enqueuer, container.clock.now());
        break;

      case 'dispatch-pass': {
        const pass = await container.dispatcher.runPass();
        result = {
          success: true,
          processed: pass.sent + pass.retried + pass.failed + pass.cancelled,
          skipped: pass.lostClaims,
          message: `${pass.sent} sent, ${pass.retried} retrying, ${pass.failed} failed, ${pass.cancelled} cancelled`,
        };
        break;
      }

      case 'recover-claims': {
        const recovery = container.dispatcher.recoverStaleClaims();
        result = {
          success: true,
          processed: recovery.requeued + recovery.failed,
          skipped: 0,
          message: `${recovery.requeued} requeued, ${recovery.failed} failed`,
        };
        break;
      }

      default: {
        const exhaustive: never = type;
        throw new Error(`[NotificationDispatch] Unknown job type: ${String(exhaustive)}`);
      }
    }

    return { ...result, type, durationMs: Date.now() - startTime };
  } catch (error) {
    logger.error(`[NotificationDispatch] Job ${job.id} failed`, { type, error });
    throw error;
  }
}

async function fanOutPasses(
  container: Container,
  enqueuer: PassEnqueuer,
  now: Date
): Promise<Omit<NotificationDispatchJobResult, 'type' | 'durationMs'>> {
  const passes = Math.max(1, container.config.dispatch.workerConcurrency);
  // One set of passes per poll tick; a slow tick does not pile up duplicates
  const tick = now.toISOString().slice(0, 16);

  await enqueuer.addBulk(
    Array.from({ length: passes }, (_, slot) => ({
      name: 'dispatch-pass',
      data: { type: 'dispatch-pass' as const, triggeredBy: 'poll' as const, receivedAt: now.toISOString() },
      opts: { jobId: `dispatch-pass-${tick}-${slot}` },
    }))
  );

  return { success: true, processed: passes, skipped: 0, message: `${passes} dispatch passes queued` };
}

// =====================================================
// Worker Management
// =====================================================

export function startNotificationDispatchWorker(container: Container): DispatchWorker {
  if (dispatchWorker) {
    logger.warn('[NotificationDispatch] Worker already running');
    return dispatchWorker;
  }

  const queue = getNotificationDispatchQueue();

  dispatchWorker = new Worker<NotificationDispatchJobData, NotificationDispatchJobResult>(
    NOTIFICATION_DISPATCH_QUEUE_NAME,
    (job) => processNotificationDispatchJob(container, job, queue),
    {
      connection: getSubscriberConnection(),
      concurrency: container.config.dispatch.workerConcurrency,
    }
  );

  dispatchWorker.on('completed', (job, result) => {
    if (result.processed > 0) {
      logger.debug(`[NotificationDispatch] Job ${job.id} completed`, {
        type: result.type,
        message: result.message,
        durationMs: result.durationMs,
      });
    }
  });

  dispatchWorker.on('failed', (job, error) => {
    logger.error(`[NotificationDispatch] Job ${job?.id} failed`, {
      type: job?.data.type,
      error: error.message,
    });
  });

  dispatchWorker.on('error', (error) => {
    logger.error('[NotificationDispatch] Worker error', { error });
  });

  dispatchWorker.on('stalled', (jobId) => {
    logger.warn(`[NotificationDispatch] Job ${jobId} stalled`);
  });

  logger.info('[NotificationDispatch] Worker started', {
    concurrency: container.config.dispatch.workerConcurrency,
  });
  return dispatchWorker;
}

export async function stopNotificationDispatchWorker(): Promise<void> {
  if (dispatchWorker) {
    await dispatchWorker.close();
    dispatchWorker = null;
    logger.info('[NotificationDispatch] Worker stopped');
  }

  if (dispatchQueue) {
    await dispatchQueue.close();
    dispatchQueue = null;
  }
}

// =====================================================
// Job Scheduling (Repeatable Cron Jobs)
// =====================================================

interface RepeatableJobDef {
  name: NotificationDispatchJobType;
  pattern: string;
  /** Stable job ID, prevents duplicate repeatable registrations */
  jobId: string;
}

export async function scheduleNotificationDispatchJobs(container: Container): Promise<void> {
  const { pollCron, recoveryCron } = container.config.dispatch;
  const defs: RepeatableJobDef[] = [
    { name: 'poll', pattern: pollCron, jobId: 'scheduled-dispatch-poll' },
    { name: 'recover-claims', pattern: recoveryCron, jobId: 'scheduled-recover-claims' },
  ];

  const queue = getNotificationDispatchQueue();

  const existingJobs = await queue.getRepeatableJobs();
  for (const existing of existingJobs) {
    if (defs.some((def) => def.name === existing.name)) {
      await queue.removeRepeatableByKey(existing.key);
      logger.debug(`[NotificationDispatch] Removed stale repeatable: ${existing.name}`);
    }
  }

  for (const def of defs) {
    await queue.add(
      def.name,
      { type: def.name, triggeredBy: 'scheduled', receivedAt: new Date().toISOString() },
      {
        repeat: { pattern: def.pattern, tz: 'UTC' },
        jobId: def.jobId,
      }
    );
    logger.info(`[NotificationDispatch] Registered repeatable job: ${def.name} (${def.pattern})`);
  }
}
