// =====================================================
// Application Configuration
// =====================================================

import 'dotenv/config';

function intFromEnv(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined || raw === '') return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function floatFromEnv(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined || raw === '') return fallback;
  const parsed = parseFloat(raw);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function calendarSourceFromEnv(): 'computed' | 'hebcal' {
  return process.env.CALENDAR_SOURCE === 'hebcal' ? 'hebcal' : 'computed';
}

export const config = {
  // Server
  nodeEnv: process.env.NODE_ENV || 'development',
  port: intFromEnv('PORT', 3000),
  logLevel: process.env.LOG_LEVEL || 'info',

  // Database
  database: {
    path: process.env.DATABASE_PATH || './data/reminders.db',
  },

  // Redis (BullMQ + sweep run-lock)
  redis: {
    url: process.env.REDIS_URL || 'redis://localhost:6379',
    host: process.env.REDIS_HOST || 'localhost',
    port: intFromEnv('REDIS_PORT', 6379),
    password: process.env.REDIS_PASSWORD || undefined,
  },

  // Lunisolar date tables
  calendar: {
    source: calendarSourceFromEnv(),
    hebcalBaseUrl: process.env.HEBCAL_BASE_URL || 'https://www.hebcal.com',
    requestTimeoutMs: intFromEnv('CALENDAR_REQUEST_TIMEOUT_MS', 10_000),
    cacheTtlMs: intFromEnv('CALENDAR_CACHE_TTL_MS', 24 * 60 * 60 * 1000),
  },

  anniversary: {
    // One-off first observance this many months after death; 0 = none, 11 = azkara
    offsetMonths: intFromEnv('ANNIVERSARY_OFFSET_MONTHS', 0),
  },

  scheduler: {
    enabled: process.env.FEATURE_ANNIVERSARY_SWEEP_ENABLED !== 'false',
    cron: process.env.ANNIVERSARY_SWEEP_CRON || '15 3 * * *',
    leadDays: intFromEnv('REMINDER_LEAD_DAYS', 14),
    lookaheadDays: intFromEnv('REMINDER_LOOKAHEAD_DAYS', 1),
    graceDays: intFromEnv('REMINDER_GRACE_DAYS', 3),
    runLockTtlMs: intFromEnv('ANNIVERSARY_SWEEP_LOCK_TTL_MS', 15 * 60 * 1000),
    timezone: process.env.REMINDER_TIMEZONE || 'UTC',
    sendHourUtc: intFromEnv('REMINDER_SEND_HOUR_UTC', 8),
  },

  dispatch: {
    workerConcurrency: intFromEnv('DISPATCH_WORKER_CONCURRENCY', 4),
    batchSize: intFromEnv('DISPATCH_BATCH_SIZE', 25),
    maxAttempts: intFromEnv('DISPATCH_MAX_ATTEMPTS', 5),
    backoffBaseMs: intFromEnv('DISPATCH_BACKOFF_BASE_MS', 5 * 60 * 1000),
    backoffMaxMs: intFromEnv('DISPATCH_BACKOFF_MAX_MS', 6 * 60 * 60 * 1000),
    backoffJitter: floatFromEnv('DISPATCH_BACKOFF_JITTER', 0.2),
    claimTimeoutMs: intFromEnv('DISPATCH_CLAIM_TIMEOUT_MS', 10 * 60 * 1000),
    pollCron: process.env.DISPATCH_POLL_CRON || '* * * * *',
    recoveryCron: process.env.DISPATCH_RECOVERY_CRON || '*/5 * * * *',
  },

  email: {
    resendApiKey: process.env.RESEND_API_KEY || '',
    fromAddress: process.env.EMAIL_FROM_ADDRESS || 'reminders@localhost',
    fromName: process.env.EMAIL_FROM_NAME || 'Yahrzeit Reminders',
  },

  groupMessage: {
    apiBaseUrl: process.env.GROUP_MESSAGE_API_URL || 'https://graph.facebook.com/v20.0',
    accessToken: process.env.GROUP_MESSAGE_ACCESS_TOKEN || '',
    senderId: process.env.GROUP_MESSAGE_SENDER_ID || '',
    requestTimeoutMs: intFromEnv('GROUP_MESSAGE_TIMEOUT_MS', 10_000),
  },

  auth: {
    serviceTokenSecret: process.env.SERVICE_TOKEN_SECRET || 'dev-service-secret',
    serviceTokenIssuer: process.env.SERVICE_TOKEN_ISSUER || 'record-management',
  },

  sentry: {
    dsn: process.env.SENTRY_DSN || '',
    environment: process.env.SENTRY_ENVIRONMENT || process.env.NODE_ENV || 'development',
  },
} as const;

export type AppConfig = typeof config;

// Validate required environment variables
export function validateConfig(): string[] {
  const required = ['DATABASE_PATH', 'SERVICE_TOKEN_SECRET'];
  const missing = required.filter((key) => !process.env[key]);

  if (config.nodeEnv === 'production') {
    if (!config.email.resendApiKey) missing.push('RESEND_API_KEY');
    if (!config.groupMessage.accessToken) missing.push('GROUP_MESSAGE_ACCESS_TOKEN');
  }

  return missing;
}
