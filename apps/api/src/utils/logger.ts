// =====================================================
// Logger
// =====================================================
// pino under a small facade so call sites keep the
// `logger.info('[Component] message', context)` shape.

import pino from 'pino';

const isDevelopment = process.env.NODE_ENV === 'development';

export const baseLogger = pino({
  level: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'silent' : 'info'),
  base: { service: 'yahrzeit-reminders' },
  timestamp: pino.stdTimeFunctions.isoTime,
  ...(isDevelopment
    ? {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true, translateTime: 'SYS:standard' },
        },
      }
    : {}),
});

type LogContext = Record<string, unknown>;

function toContext(context: unknown): LogContext {
  if (context === undefined) return {};
  if (context instanceof Error) return { err: context };
  if (typeof context === 'object' && context !== null && !Array.isArray(context)) {
    const entries = Object.entries(context).map(([key, value]) =>
      // pino only serializes errors found under `err`
      key === 'error' && value instanceof Error ? ['err', value] : [key, value],
    );
    return Object.fromEntries(entries);
  }
  return { detail: context };
}

export const logger = {
  debug(message: string, context?: unknown): void {
    baseLogger.debug(toContext(context), message);
  },

  info(message: string, context?: unknown): void {
    baseLogger.info(toContext(context), message);
  },

  warn(message: string, context?: unknown): void {
    baseLogger.warn(toContext(context), message);
  },

  error(message: string, context?: unknown): void {
    baseLogger.error(toContext(context), message);
  },
};

export type Logger = typeof logger;
