// =====================================================
// Redis Connection for BullMQ
// =====================================================
// Shared by the queues, the workers and the sweep run-lock.

import { Redis } from 'ioredis';
import type { RedisOptions } from 'ioredis';
import { config } from '../config';
import { logger } from '../utils/logger';

// ===========================================
// Connection Configuration
// ===========================================

const DEFAULT_REDIS_URL = 'redis://localhost:6379';

function usesRedisUrl(): boolean {
  return Boolean(config.redis.url) && config.redis.url !== DEFAULT_REDIS_URL;
}

const getRedisOptions = (): RedisOptions => {
  const baseOptions: RedisOptions = {
    maxRetriesPerRequest: null, // Required by BullMQ
    enableReadyCheck: false,
    retryStrategy: (times: number) => {
      if (times > 10) {
        logger.error('[Redis] Connection failed after 10 retries');
        return null;
      }
      const delay = Math.min(times * 100, 3000);
      logger.warn(`[Redis] Connection retry #${times} in ${delay}ms`);
      return delay;
    },
  };

  if (usesRedisUrl()) {
    logger.info(`[Redis] Using REDIS_URL: ${config.redis.url.replace(/:[^:@]+@/, ':***@')}`);
    return baseOptions;
  }

  return {
    ...baseOptions,
    host: config.redis.host,
    port: config.redis.port,
    password: config.redis.password,
  };
};

function createConnection(label: string): Redis {
  const options = getRedisOptions();
  const redis = usesRedisUrl() ? new Redis(config.redis.url, options) : new Redis(options);

  redis.on('connect', () => {
    logger.info(`[Redis] ${label} connection established`);
  });

  redis.on('error', (error) => {
    logger.error(`[Redis] ${label} connection error`, { error });
  });

  return redis;
}

// ===========================================
// Singleton Connections
// ===========================================

let connection: Redis | null = null;
let subscriberConnection: Redis | null = null;

/** Main connection for queues and the run-lock (lazy). */
export function getRedisConnection(): Redis {
  if (!connection) {
    connection = createConnection('main');
  }
  return connection;
}

/** Workers block on their own connection. */
export function getSubscriberConnection(): Redis {
  if (!subscriberConnection) {
    subscriberConnection = createConnection('subscriber');
  }
  return subscriberConnection;
}

export async function closeRedisConnections(): Promise<void> {
  const closing: Promise<void>[] = [];

  if (connection) {
    const main = connection;
    connection = null;
    closing.push(main.quit().then(() => logger.info('[Redis] main connection closed')));
  }

  if (subscriberConnection) {
    const subscriber = subscriberConnection;
    subscriberConnection = null;
    closing.push(subscriber.quit().then(() => logger.info('[Redis] subscriber connection closed')));
  }

  await Promise.all(closing);
}
