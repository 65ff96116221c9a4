// =====================================================
// Run Lock
// =====================================================
// Keeps two anniversary sweeps from overlapping, whether the
// second comes from a BullMQ retry, a manual trigger or a
// second worker process. The lock expires on its own so a
// crashed holder cannot block sweeps forever.

import { randomUUID } from 'node:crypto';
import type { Redis } from 'ioredis';
import { logger } from '../utils/logger';

export interface RunLock {
  /** Returns the holder token, or null when someone else holds the lock. */
  acquire(key: string, ttlMs: number): Promise<string | null>;
  /** Releases only if `token` still holds the lock. */
  release(key: string, token: string): Promise<boolean>;
}

// Compare-and-delete so an expired holder cannot free a newer lock
const RELEASE_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
else
  return 0
end`;

/** The Redis commands the lock needs */
export type RunLockRedis = Pick<Redis, 'set' | 'eval'>;

export class RedisRunLock implements RunLock {
  constructor(private readonly redis: RunLockRedis) {}

  async acquire(key: string, ttlMs: number): Promise<string | null> {
    const token = randomUUID();
    const result = await this.redis.set(key, token, 'PX', ttlMs, 'NX');
    return result === 'OK' ? token : null;
  }

  async release(key: string, token: string): Promise<boolean> {
    const deleted = await this.redis.eval(RELEASE_SCRIPT, 1, key, token);
    return deleted === 1;
  }
}

/** Single-process lock for tests and local runs without Redis. */
export class InMemoryRunLock implements RunLock {
  private readonly holders = new Map<string, { token: string; expiresAt: number }>();

  constructor(private readonly now: () => number = Date.now) {}

  async acquire(key: string, ttlMs: number): Promise<string | null> {
    const current = this.holders.get(key);
    if (current && current.expiresAt > this.now()) return null;

    const token = randomUUID();
    this.holders.set(key, { token, expiresAt: this.now() + ttlMs });
    return token;
  }

  async release(key: string, token: string): Promise<boolean> {
    const current = this.holders.get(key);
    if (!current || current.token !== token) return false;
    this.holders.delete(key);
    return true;
  }
}

export type LockedRun<T> = { acquired: true; result: T } | { acquired: false };

export async function withRunLock<T>(
  lock: RunLock,
  key: string,
  ttlMs: number,
  run: () => Promise<T>
): Promise<LockedRun<T>> {
  const token = await lock.acquire(key, ttlMs);
  if (token === null) {
    return { acquired: false };
  }

  try {
    return { acquired: true, result: await run() };
  } finally {
    const released = await lock.release(key, token);
    if (!released) {
      logger.warn('[RunLock] Lock expired before release', { key, ttlMs });
    }
  }
}
