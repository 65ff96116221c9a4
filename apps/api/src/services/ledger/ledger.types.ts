// =====================================================
// Ledger domain types
// =====================================================

import type {
  CancellationReason,
  ChannelKind,
  LedgerStatus,
  RenderedPayload,
} from '@yahrzeit-reminders/shared-types';

export interface LedgerEntry {
  id: string;
  subjectId: string;
  recipientId: string;
  cycleYear: number;
  status: LedgerStatus;
  channelKind: ChannelKind;
  payload: RenderedPayload;
  scheduledFor: Date;
  attemptCount: number;
  lastAttemptAt: Date | null;
  nextRetryAt: Date | null;
  claimedAt: Date | null;
  claimToken: string | null;
  lastError: string | null;
  providerMessageId: string | null;
  cancellationReason: CancellationReason | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewLedgerEntry {
  subjectId: string;
  recipientId: string;
  cycleYear: number;
  status: LedgerStatus.PENDING | LedgerStatus.DUE;
  channelKind: ChannelKind;
  payload: RenderedPayload;
  scheduledFor: Date;
}

export interface RecoveredClaim {
  entry: LedgerEntry;
  outcome: 'requeued' | 'failed';
}
