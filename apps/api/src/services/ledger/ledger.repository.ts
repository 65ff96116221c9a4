// =====================================================
// Notification Ledger Repository
// =====================================================
// Every status change is a compare-and-set on (id, status)
// and, for results of a dispatch attempt, the claim token of
// the worker holding the entry. A write that loses the race
// changes zero rows and the caller is told so; nothing is
// ever blindly overwritten.

import Database from 'better-sqlite3';
import { randomUUID } from 'node:crypto';
import { LedgerStatus } from '@yahrzeit-reminders/shared-types';
import type { CancellationReason, RenderedPayload } from '@yahrzeit-reminders/shared-types';
import type { SqliteDatabase } from '../../lib/database';
import { DuplicateLedgerEntryError } from '../../utils/errors';
import { parseChannelKind } from '../records/record.types';
import { CANCELLABLE_STATUSES, assertTransition, parseLedgerStatus } from './ledger-state';
import type { LedgerEntry, NewLedgerEntry, RecoveredClaim } from './ledger.types';

interface LedgerRow {
  id: string;
  subject_id: string;
  recipient_id: string;
  cycle_year: number;
  status: string;
  channel_kind: string;
  rendered_payload: string;
  scheduled_for: string;
  attempt_count: number;
  last_attempt_at: string | null;
  next_retry_at: string | null;
  claimed_at: string | null;
  claim_token: string | null;
  last_error: string | null;
  provider_message_id: string | null;
  cancellation_reason: string | null;
  created_at: string;
  updated_at: string;
}

const CANCELLABLE_SQL = CANCELLABLE_STATUSES.map((status) => `'${status}'`).join(', ');

export class LedgerRepository {
  constructor(private readonly db: SqliteDatabase) {}

  // ===========================================
  // Creation
  // ===========================================

  /**
   * Inserts a new entry. A live entry for the same
   * (subject, recipient, cycle) raises DuplicateLedgerEntryError.
   */
  create(input: NewLedgerEntry, now: Date): LedgerEntry {
    const id = randomUUID();
    const timestamp = now.toISOString();

    try {
      this.db
        .prepare(
          `INSERT INTO ledger_entries (
             id, subject_id, recipient_id, cycle_year, status, channel_kind,
             rendered_payload, scheduled_for, attempt_count, created_at, updated_at
           ) VALUES (
             @id, @subjectId, @recipientId, @cycleYear, @status, @channelKind,
             @payload, @scheduledFor, 0, @timestamp, @timestamp
           )`
        )
        .run({
          id,
          subjectId: input.subjectId,
          recipientId: input.recipientId,
          cycleYear: input.cycleYear,
          status: input.status,
          channelKind: input.channelKind,
          payload: JSON.stringify(input.payload),
          scheduledFor: input.scheduledFor.toISOString(),
          timestamp,
        });
    } catch (error) {
      if (error instanceof Database.SqliteError && error.code === 'SQLITE_CONSTRAINT_UNIQUE') {
        throw new DuplicateLedgerEntryError(
          `Ledger entry exists for subject ${input.subjectId}, recipient ${input.recipientId}, cycle ${input.cycleYear}`
        );
      }
      throw error;
    }

    return this.getById(id);
  }

  /** Conditional insert: null when the cycle already has a live entry. */
  createIfAbsent(input: NewLedgerEntry, now: Date): LedgerEntry | null {
    try {
      return this.create(input, now);
    } catch (error) {
      if (error instanceof DuplicateLedgerEntryError) return null;
      throw error;
    }
  }

  // ===========================================
  // Reads
  // ===========================================

  findById(id: string): LedgerEntry | null {
    const row = this.db
      .prepare<[string], LedgerRow>('SELECT * FROM ledger_entries WHERE id = ?')
      .get(id);
    return row ? toEntry(row) : null;
  }

  getById(id: string): LedgerEntry {
    const entry = this.findById(id);
    if (!entry) throw new Error(`Ledger entry ${id} disappeared`);
    return entry;
  }

  listBySubject(subjectId: string): LedgerEntry[] {
    return this.db
      .prepare<[string], LedgerRow>(
        'SELECT * FROM ledger_entries WHERE subject_id = ? ORDER BY cycle_year DESC, created_at ASC'
      )
      .all(subjectId)
      .map(toEntry);
  }

  /** Live (non-cancelled) entries for one subject's cycle */
  countLiveForCycle(subjectId: string, cycleYear: number): number {
    const row = this.db
      .prepare<[string, number], { total: number }>(
        `SELECT COUNT(*) AS total FROM ledger_entries
         WHERE subject_id = ? AND cycle_year = ? AND status != 'cancelled'`
      )
      .get(subjectId, cycleYear);
    return row?.total ?? 0;
  }

  // ===========================================
  // Dispatch lifecycle
  // ===========================================

  /** pending -> due for every entry whose scheduled time has come. */
  promoteDue(now: Date): number {
    assertTransition(LedgerStatus.PENDING, LedgerStatus.DUE);
    const result = this.db
      .prepare(
        `UPDATE ledger_entries
         SET status = 'due', updated_at = @now
         WHERE status = 'pending' AND scheduled_for <= @now`
      )
      .run({ now: now.toISOString() });
    return result.changes;
  }

  /**
   * Atomically moves up to `limit` ready entries from due to
   * in_flight under `claimToken`. Two workers can never claim the
   * same row: the status guard is re-checked inside the UPDATE.
   */
  claimDue(now: Date, limit: number, claimToken: string): LedgerEntry[] {
    assertTransition(LedgerStatus.DUE, LedgerStatus.IN_FLIGHT);
    return this.db
      .prepare<{ now: string; limit: number; token: string }, LedgerRow>(
        `UPDATE ledger_entries
         SET status = 'in_flight', claimed_at = @now, claim_token = @token, updated_at = @now
         WHERE status = 'due'
           AND id IN (
             SELECT id FROM ledger_entries
             WHERE status = 'due'
               AND scheduled_for <= @now
               AND (next_retry_at IS NULL OR next_retry_at <= @now)
             ORDER BY scheduled_for ASC, created_at ASC
             LIMIT @limit
           )
         RETURNING *`
      )
      .all({ now: now.toISOString(), limit, token: claimToken })
      .map(toEntry);
  }

  /**
   * Confirms the claim is still held and restarts its timeout.
   * False once recovery or cancellation has taken the entry.
   */
  touchClaim(id: string, claimToken: string, now: Date): boolean {
    const result = this.db
      .prepare(
        `UPDATE ledger_entries SET claimed_at = @now, updated_at = @now
         WHERE id = @id AND status = 'in_flight' AND claim_token = @token`
      )
      .run({ id, token: claimToken, now: now.toISOString() });
    return result.changes === 1;
  }

  markSent(id: string, claimToken: string, now: Date, providerMessageId: string | null): boolean {
    assertTransition(LedgerStatus.IN_FLIGHT, LedgerStatus.SENT);
    const result = this.db
      .prepare(
        `UPDATE ledger_entries
         SET status = 'sent', attempt_count = attempt_count + 1, last_attempt_at = @now,
             provider_message_id = @providerMessageId, last_error = NULL,
             claim_token = NULL, claimed_at = NULL, updated_at = @now
         WHERE id = @id AND status = 'in_flight' AND claim_token = @token`
      )
      .run({ id, token: claimToken, now: now.toISOString(), providerMessageId });
    return result.changes === 1;
  }

  /** Retryable failure: back to due, eligible again at `nextRetryAt`. */
  markRetry(id: string, claimToken: string, now: Date, nextRetryAt: Date, error: string): boolean {
    assertTransition(LedgerStatus.IN_FLIGHT, LedgerStatus.DUE);
    const result = this.db
      .prepare(
        `UPDATE ledger_entries
         SET status = 'due', attempt_count = attempt_count + 1, last_attempt_at = @now,
             next_retry_at = @nextRetryAt, last_error = @error,
             claim_token = NULL, claimed_at = NULL, updated_at = @now
         WHERE id = @id AND status = 'in_flight' AND claim_token = @token`
      )
      .run({ id, token: claimToken, now: now.toISOString(), nextRetryAt: nextRetryAt.toISOString(), error });
    return result.changes === 1;
  }

  markFailed(id: string, claimToken: string, now: Date, error: string): boolean {
    assertTransition(LedgerStatus.IN_FLIGHT, LedgerStatus.FAILED);
    const result = this.db
      .prepare(
        `UPDATE ledger_entries
         SET status = 'failed', attempt_count = attempt_count + 1, last_attempt_at = @now,
             next_retry_at = NULL, last_error = @error,
             claim_token = NULL, claimed_at = NULL, updated_at = @now
         WHERE id = @id AND status = 'in_flight' AND claim_token = @token`
      )
      .run({ id, token: claimToken, now: now.toISOString(), error });
    return result.changes === 1;
  }

  /** Cancels an entry this worker holds, without counting an attempt. */
  cancelClaimed(id: string, claimToken: string, now: Date, reason: CancellationReason): boolean {
    assertTransition(LedgerStatus.IN_FLIGHT, LedgerStatus.CANCELLED);
    const result = this.db
      .prepare(
        `UPDATE ledger_entries
         SET status = 'cancelled', cancellation_reason = @reason,
             claim_token = NULL, claimed_at = NULL, updated_at = @now
         WHERE id = @id AND status = 'in_flight' AND claim_token = @token`
      )
      .run({ id, token: claimToken, now: now.toISOString(), reason });
    return result.changes === 1;
  }

  // ===========================================
  // Cancellation
  // ===========================================

  cancelForSubject(subjectId: string, reason: CancellationReason, now: Date): number {
    return this.cancelWhere('subject_id', subjectId, reason, now);
  }

  cancelForRecipient(recipientId: string, reason: CancellationReason, now: Date): number {
    return this.cancelWhere('recipient_id', recipientId, reason, now);
  }

  private cancelWhere(
    column: 'subject_id' | 'recipient_id',
    value: string,
    reason: CancellationReason,
    now: Date
  ): number {
    const result = this.db
      .prepare(
        `UPDATE ledger_entries
         SET status = 'cancelled', cancellation_reason = @reason,
             claim_token = NULL, claimed_at = NULL, updated_at = @now
         WHERE ${column} = @value AND status IN (${CANCELLABLE_SQL})`
      )
      .run({ value, reason, now: now.toISOString() });
    return result.changes;
  }

  // ===========================================
  // Recovery
  // ===========================================

  /**
   * Claims older than `claimTimeoutMs` belong to a worker that
   * died between claim and result. Each counts as an attempt:
   * requeued as due, or failed once `maxAttempts` is reached.
   */
  recoverStaleClaims(now: Date, claimTimeoutMs: number, maxAttempts: number): RecoveredClaim[] {
    const cutoff = new Date(now.getTime() - claimTimeoutMs).toISOString();
    const timestamp = now.toISOString();

    const recover = this.db.transaction((): RecoveredClaim[] => {
      const stale = this.db
        .prepare<[string], LedgerRow>(
          `SELECT * FROM ledger_entries WHERE status = 'in_flight' AND claimed_at <= ?`
        )
        .all(cutoff);

      const recovered: RecoveredClaim[] = [];
      for (const row of stale) {
        const exhausted = row.attempt_count + 1 >= maxAttempts;
        const result = this.db
          .prepare(
            `UPDATE ledger_entries
             SET status = @status, attempt_count = attempt_count + 1,
                 next_retry_at = @nextRetryAt, last_error = 'dispatch claim timed out',
                 claim_token = NULL, claimed_at = NULL, updated_at = @now
             WHERE id = @id AND status = 'in_flight' AND claim_token IS @token`
          )
          .run({
            id: row.id,
            token: row.claim_token,
            status: exhausted ? LedgerStatus.FAILED : LedgerStatus.DUE,
            nextRetryAt: exhausted ? null : timestamp,
            now: timestamp,
          });

        if (result.changes === 1) {
          recovered.push({ entry: this.getById(row.id), outcome: exhausted ? 'failed' : 'requeued' });
        }
      }
      return recovered;
    });

    return recover();
  }
}

// ===========================================
// Row mapping
// ===========================================

function toDate(value: string | null): Date | null {
  return value === null ? null : new Date(value);
}

const CANCELLATION_REASONS: readonly CancellationReason[] = [
  'subject_deleted',
  'recipient_deactivated',
  'recipient_opted_out',
  'death_date_changed',
];

function toCancellationReason(value: string | null): CancellationReason | null {
  return CANCELLATION_REASONS.find((reason) => reason === value) ?? null;
}

function toPayload(raw: string): RenderedPayload {
  const value: unknown = JSON.parse(raw);
  if (
    typeof value !== 'object' ||
    value === null ||
    !('templateId' in value) ||
    !('subject' in value) ||
    !('body' in value) ||
    !('locale' in value) ||
    typeof value.templateId !== 'string' ||
    typeof value.subject !== 'string' ||
    typeof value.body !== 'string'
  ) {
    throw new Error('Malformed rendered payload');
  }

  const variables: Record<string, string | number> = {};
  if ('variables' in value && typeof value.variables === 'object' && value.variables !== null) {
    for (const [key, item] of Object.entries(value.variables)) {
      if (typeof item === 'string' || typeof item === 'number') variables[key] = item;
    }
  }

  return {
    templateId: value.templateId,
    locale: value.locale === 'he' ? 'he' : 'en',
    subject: value.subject,
    body: value.body,
    variables,
  };
}

function toEntry(row: LedgerRow): LedgerEntry {
  return {
    id: row.id,
    subjectId: row.subject_id,
    recipientId: row.recipient_id,
    cycleYear: row.cycle_year,
    status: parseLedgerStatus(row.status),
    channelKind: parseChannelKind(row.channel_kind),
    payload: toPayload(row.rendered_payload),
    scheduledFor: new Date(row.scheduled_for),
    attemptCount: row.attempt_count,
    lastAttemptAt: toDate(row.last_attempt_at),
    nextRetryAt: toDate(row.next_retry_at),
    claimedAt: toDate(row.claimed_at),
    claimToken: row.claim_token,
    lastError: row.last_error,
    providerMessageId: row.provider_message_id,
    cancellationReason: toCancellationReason(row.cancellation_reason),
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}
