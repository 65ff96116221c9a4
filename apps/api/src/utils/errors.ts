// =====================================================
// Custom Error Classes
// =====================================================

import { ErrorCode, ERROR_CODES } from '@yahrzeit-reminders/shared-types';

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    statusCode: number = 500,
    code: ErrorCode = ERROR_CODES.INTERNAL_ERROR,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }
}

export class BadRequestError extends AppError {
  constructor(message: string, code: ErrorCode = ERROR_CODES.VALIDATION_ERROR) {
    super(message, 400, code);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message: string = 'Unauthorized', code: ErrorCode = ERROR_CODES.TOKEN_INVALID) {
    super(message, 401, code);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, code: ErrorCode = ERROR_CODES.NOT_FOUND) {
    super(message, 404, code);
  }
}

export class ConflictError extends AppError {
  constructor(message: string, code: ErrorCode) {
    super(message, 409, code);
  }
}

// ---- Calendar ----

export class UnsupportedDateRangeError extends AppError {
  constructor(message: string) {
    super(message, 422, ERROR_CODES.UNSUPPORTED_DATE_RANGE);
  }
}

export class InvalidLunisolarDateError extends AppError {
  constructor(message: string) {
    super(message, 422, ERROR_CODES.INVALID_LUNISOLAR_DATE);
  }
}

/** The year table could not be produced and no last-known-good copy exists. */
export class DateComputationError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 503, ERROR_CODES.DATE_COMPUTATION_FAILED);
    this.cause = cause;
  }
}

export class CalendarSourceResponseError extends AppError {
  constructor(message: string) {
    super(message, 502, ERROR_CODES.CALENDAR_SOURCE_INVALID_RESPONSE);
  }
}

// ---- Ledger ----

export class DuplicateLedgerEntryError extends ConflictError {
  constructor(message: string) {
    super(message, ERROR_CODES.DUPLICATE_LEDGER_ENTRY);
  }
}

export class InvalidLedgerTransitionError extends AppError {
  constructor(from: string, to: string) {
    super(`Illegal ledger transition ${from} -> ${to}`, 409, ERROR_CODES.INVALID_LEDGER_TRANSITION, false);
  }
}

// ---- Channels ----

/** Retryable delivery failure (rate limit, timeout, upstream 5xx). */
export class ChannelTransientError extends AppError {
  constructor(message: string) {
    super(message, 502, ERROR_CODES.CHANNEL_TRANSIENT);
  }
}

/** The recipient address is invalid or gone. Never retried. */
export class ChannelPermanentError extends AppError {
  constructor(message: string) {
    super(message, 422, ERROR_CODES.CHANNEL_PERMANENT);
  }
}

export class ChannelNotConfiguredError extends AppError {
  constructor(channel: string) {
    super(`No adapter registered for channel "${channel}"`, 500, ERROR_CODES.CHANNEL_NOT_CONFIGURED, false);
  }
}
