// =====================================================
// Notification Dispatcher Service
// =====================================================
// Drains due ledger entries. Every entry is claimed
// (due -> in_flight) under a per-pass token before any channel
// is called, so an entry is handed to a channel by at most one
// worker per attempt, and the claim is confirmed again right
// before each send. Results are written back with the same
// token; a write that finds the token gone means the claim was
// recovered or cancelled meanwhile and is only logged.

import { randomUUID } from 'node:crypto';
import type { CancellationReason } from '@yahrzeit-reminders/shared-types';
import type { Clock } from '../../utils/clock';
import { ChannelPermanentError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import type { NotificationEventBus } from '../events/notification-events';
import type { LedgerRepository } from '../ledger/ledger.repository';
import type { LedgerEntry } from '../ledger/ledger.types';
import type { RecipientRepository } from '../records/recipient.repository';
import type { Recipient } from '../records/record.types';
import type { SubjectRepository } from '../records/subject.repository';
import { nextRetryAt } from './backoff';
import type { BackoffPolicy } from './backoff';
import type { ChannelRegistry } from './channels/channel-registry';
import type { ChannelSendResult } from './channels/channel.types';

// =====================================================
// Types
// =====================================================

export interface DispatchOptions {
  batchSize: number;
  maxAttempts: number;
  claimTimeoutMs: number;
  backoff: BackoffPolicy;
}

export interface DispatcherDependencies {
  ledger: LedgerRepository;
  subjects: SubjectRepository;
  recipients: RecipientRepository;
  channels: ChannelRegistry;
  events: NotificationEventBus;
  clock: Clock;
  options: DispatchOptions;
  /** Source of jitter for retry delays */
  random?: () => number;
}

export type DispatchOutcome = 'sent' | 'retry_scheduled' | 'failed' | 'cancelled' | 'lost_claim';

export interface DispatchPassResult {
  claimToken: string;
  promoted: number;
  claimed: number;
  sent: number;
  retried: number;
  failed: number;
  cancelled: number;
  lostClaims: number;
}

export interface RecoveryResult {
  requeued: number;
  failed: number;
}

// =====================================================
// Service
// =====================================================

export class NotificationDispatcherService {
  constructor(private readonly deps: DispatcherDependencies) {}

  async runPass(): Promise<DispatchPassResult> {
    const { ledger, clock, options } = this.deps;
    const claimToken = randomUUID();

    const promoted = ledger.promoteDue(clock.now());
    const claimed = ledger.claimDue(clock.now(), options.batchSize, claimToken);

    const result: DispatchPassResult = {
      claimToken,
      promoted,
      claimed: claimed.length,
      sent: 0,
      retried: 0,
      failed: 0,
      cancelled: 0,
      lostClaims: 0,
    };

    for (const entry of claimed) {
      const outcome = await this.dispatchEntry(entry, claimToken);
      switch (outcome) {
        case 'sent':
          result.sent++;
          break;
        case 'retry_scheduled':
          result.retried++;
          break;
        case 'failed':
          result.failed++;
          break;
        case 'cancelled':
          result.cancelled++;
          break;
        case 'lost_claim':
          result.lostClaims++;
          break;
      }
    }

    if (claimed.length > 0 || promoted > 0) {
      logger.info('[NotificationDispatch] Pass complete', { ...result });
    }

    return result;
  }

  /**
   * Returns claims abandoned by a crashed worker to the queue.
   * Recovery counts the lost attempt, so an entry that keeps
   * crashing its worker still fails at the attempt limit.
   */
  recoverStaleClaims(): RecoveryResult {
    const { ledger, clock, options } = this.deps;
    const recovered = ledger.recoverStaleClaims(clock.now(), options.claimTimeoutMs, options.maxAttempts);

    let failed = 0;
    for (const { entry, outcome } of recovered) {
      if (outcome === 'failed') {
        failed++;
        this.emitTerminalFailure(entry, 'dispatch claim timed out', false);
      }
    }

    if (recovered.length > 0) {
      logger.warn('[NotificationDispatch] Recovered stale claims', {
        requeued: recovered.length - failed,
        failed,
      });
    }

    return { requeued: recovered.length - failed, failed };
  }

  // ===========================================
  // Single entry
  // ===========================================

  private async dispatchEntry(entry: LedgerEntry, claimToken: string): Promise<DispatchOutcome> {
    const { ledger, recipients, clock } = this.deps;

    // Records may have changed since the entry was created
    const recipient = recipients.findById(entry.recipientId);
    const cancellation = this.cancellationReason(entry, recipient);
    if (cancellation !== null || recipient === null) {
      const reason = cancellation ?? 'recipient_deactivated';
      if (!ledger.cancelClaimed(entry.id, claimToken, clock.now(), reason)) {
        return this.lostClaim(entry, 'cancel');
      }
      logger.info('[NotificationDispatch] Entry cancelled before send', { entryId: entry.id, reason });
      return 'cancelled';
    }

    // Earlier sends in the batch may have outlasted the claim timeout
    if (!ledger.touchClaim(entry.id, claimToken, clock.now())) {
      return this.lostClaim(entry, 'send');
    }

    const sendResult = await this.send(entry, recipient);

    switch (sendResult.outcome) {
      case 'accepted':
        return this.recordSent(entry, claimToken, sendResult.providerMessageId);
      case 'transient_error':
        return this.recordTransient(entry, claimToken, sendResult.reason);
      case 'rejected':
        return this.recordRejected(entry, recipient, claimToken, sendResult.reason);
    }
  }

  private cancellationReason(entry: LedgerEntry, recipient: Recipient | null): CancellationReason | null {
    const subject = this.deps.subjects.findById(entry.subjectId);
    if (subject === null || subject.deletedAt !== null) return 'subject_deleted';
    if (recipient === null || !recipient.active) return 'recipient_deactivated';
    if (recipient.optedOut) return 'recipient_opted_out';
    return null;
  }

  private async send(entry: LedgerEntry, recipient: Recipient): Promise<ChannelSendResult> {
    try {
      // The channel captured on the entry wins over the recipient's current one
      const channel = this.deps.channels.get(entry.channelKind);
      return await channel.send(recipient.address, entry.payload);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      if (error instanceof ChannelPermanentError) {
        return { outcome: 'rejected', reason };
      }
      return { outcome: 'transient_error', reason };
    }
  }

  private recordSent(entry: LedgerEntry, claimToken: string, providerMessageId: string | null): DispatchOutcome {
    const { ledger, clock, events } = this.deps;

    if (!ledger.markSent(entry.id, claimToken, clock.now(), providerMessageId)) {
      // Delivered, but the claim was taken away meanwhile
      return this.lostClaim(entry, 'sent');
    }

    logger.info('[NotificationDispatch] Reminder sent', {
      entryId: entry.id,
      channelKind: entry.channelKind,
      attempt: entry.attemptCount + 1,
    });
    events.emit('notification_sent', {
      entryId: entry.id,
      subjectId: entry.subjectId,
      recipientId: entry.recipientId,
      cycleYear: entry.cycleYear,
      channelKind: entry.channelKind,
      attemptCount: entry.attemptCount + 1,
      providerMessageId,
    });
    return 'sent';
  }

  private recordTransient(entry: LedgerEntry, claimToken: string, reason: string): DispatchOutcome {
    const { ledger, clock, options } = this.deps;
    const attempts = entry.attemptCount + 1;
    const now = clock.now();

    if (attempts >= options.maxAttempts) {
      if (!ledger.markFailed(entry.id, claimToken, now, reason)) {
        return this.lostClaim(entry, 'failed');
      }
      logger.error('[NotificationDispatch] Retries exhausted', { entryId: entry.id, attempts, reason });
      this.emitTerminalFailure({ ...entry, attemptCount: attempts }, reason, false);
      return 'failed';
    }

    const retryAt = nextRetryAt(options.backoff, attempts, now, this.deps.random);
    if (!ledger.markRetry(entry.id, claimToken, now, retryAt, reason)) {
      return this.lostClaim(entry, 'retry');
    }
    logger.warn('[NotificationDispatch] Send failed, retry scheduled', {
      entryId: entry.id,
      attempts,
      nextRetryAt: retryAt.toISOString(),
      reason,
    });
    return 'retry_scheduled';
  }

  private recordRejected(
    entry: LedgerEntry,
    recipient: Recipient,
    claimToken: string,
    reason: string
  ): DispatchOutcome {
    const { ledger, recipients, clock, events } = this.deps;
    const now = clock.now();

    if (!ledger.markFailed(entry.id, claimToken, now, reason)) {
      return this.lostClaim(entry, 'failed');
    }
    this.emitTerminalFailure({ ...entry, attemptCount: entry.attemptCount + 1 }, reason, true);

    // The address is bad for every subject it serves, not just this one
    recipients.deactivate(recipient.id, reason, now);
    const cancelled = ledger.cancelForRecipient(recipient.id, 'recipient_deactivated', now);

    logger.warn('[NotificationDispatch] Recipient rejected by channel, deactivated', {
      entryId: entry.id,
      recipientId: recipient.id,
      channelKind: recipient.channelKind,
      cancelledEntries: cancelled,
      reason,
    });
    events.emit('recipient_deactivated', {
      recipientId: recipient.id,
      subjectId: recipient.subjectId,
      channelKind: recipient.channelKind,
      reason,
    });
    return 'failed';
  }

  private emitTerminalFailure(entry: LedgerEntry, reason: string, permanent: boolean): void {
    this.deps.events.emit('notification_failed_terminal', {
      entryId: entry.id,
      subjectId: entry.subjectId,
      recipientId: entry.recipientId,
      cycleYear: entry.cycleYear,
      channelKind: entry.channelKind,
      attemptCount: entry.attemptCount,
      reason,
      permanent,
    });
  }

  private lostClaim(entry: LedgerEntry, step: string): DispatchOutcome {
    logger.warn('[NotificationDispatch] Claim no longer held, entry left alone', {
      entryId: entry.id,
      step,
    });
    return 'lost_claim';
  }
}
