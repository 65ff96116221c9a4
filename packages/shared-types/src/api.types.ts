// =====================================================
// API Types - Request/Response Contracts
// =====================================================

// Standard API response envelope
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: ApiError;
  meta?: ResponseMeta;
}

export interface ApiError {
  code: string;
  message: string;
  details?: unknown;
}

export interface ResponseMeta {
  timestamp: string;
  requestId: string;
}

// Error codes
export const ERROR_CODES = {
  // Auth errors
  TOKEN_EXPIRED: 'AUTH_002',
  TOKEN_INVALID: 'AUTH_003',

  // Record errors
  SUBJECT_NOT_FOUND: 'RECORD_001',
  RECIPIENT_NOT_FOUND: 'RECORD_002',
  SUBJECT_DELETED: 'RECORD_003',

  // Calendar errors
  UNSUPPORTED_DATE_RANGE: 'CALENDAR_001',
  INVALID_LUNISOLAR_DATE: 'CALENDAR_002',
  DATE_COMPUTATION_FAILED: 'CALENDAR_003',
  CALENDAR_SOURCE_INVALID_RESPONSE: 'CALENDAR_004',

  // Ledger errors
  DUPLICATE_LEDGER_ENTRY: 'LEDGER_001',
  INVALID_LEDGER_TRANSITION: 'LEDGER_002',

  // Channel errors
  CHANNEL_TRANSIENT: 'CHANNEL_001',
  CHANNEL_PERMANENT: 'CHANNEL_002',
  CHANNEL_NOT_CONFIGURED: 'CHANNEL_003',

  // Generic errors
  VALIDATION_ERROR: 'VALIDATION_001',
  INTERNAL_ERROR: 'INTERNAL_001',
  NOT_FOUND: 'NOT_FOUND',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];
