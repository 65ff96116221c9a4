// =====================================================
// Notification Ledger Types
// =====================================================
// One ledger entry per (subject, recipient, cycle year).
// The status field is a closed state machine; see
// services/ledger/ledger-state.ts for the transition table.

export enum ChannelKind {
  EMAIL = 'email',
  GROUP_MESSAGE = 'group_message',
}

export enum LedgerStatus {
  PENDING = 'pending',
  DUE = 'due',
  IN_FLIGHT = 'in_flight',
  SENT = 'sent',
  FAILED = 'failed',
  CANCELLED = 'cancelled',
}

/** Statuses that accept no further transitions */
export const TERMINAL_LEDGER_STATUSES: readonly LedgerStatus[] = [
  LedgerStatus.SENT,
  LedgerStatus.FAILED,
  LedgerStatus.CANCELLED,
] as const;

export type CancellationReason =
  | 'subject_deleted'
  | 'recipient_deactivated'
  | 'recipient_opted_out'
  | 'death_date_changed';

/**
 * Channel-agnostic reminder content, rendered when the entry
 * is created so every retry sends the same text.
 */
export interface RenderedPayload {
  templateId: string;
  locale: 'en' | 'he';
  subject: string;
  body: string;
  variables: Record<string, string | number>;
}

export interface LedgerEntryDto {
  id: string;
  subjectId: string;
  recipientId: string;
  /** Lunisolar year of the occurrence the entry was created for */
  cycleYear: number;
  status: LedgerStatus;
  channelKind: ChannelKind;
  scheduledFor: string;
  attemptCount: number;
  lastAttemptAt: string | null;
  nextRetryAt: string | null;
  lastError: string | null;
  cancellationReason: CancellationReason | null;
  createdAt: string;
  updatedAt: string;
}
