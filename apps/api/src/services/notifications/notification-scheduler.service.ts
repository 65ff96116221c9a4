// =====================================================
// Notification Scheduler Service
// =====================================================
// The anniversary sweep. One run:
//
//   1. Reads live subjects whose next occurrence, less the lead
//      time, falls on or before today + lookahead (elapsed
//      occurrences included).
//   2. Creates one ledger entry per eligible recipient for the
//      occurrence's cycle (its lunisolar year, stored on the
//      subject); the (subject, recipient, cycle) unique index
//      turns repeats into no-ops.
//   3. Rolls an elapsed occurrence forward in the same SQLite
//      transaction as step 2.
//
// A subject that fails is marked stale and skipped; the sweep
// goes on with the rest. Overlapping runs are refused by the
// run lock.

import { randomUUID } from 'node:crypto';
import { LedgerStatus } from '@yahrzeit-reminders/shared-types';
import type { SqliteDatabase } from '../../lib/database';
import { RunLock, withRunLock } from '../../lib/run-lock';
import type { Clock } from '../../utils/clock';
import { logger } from '../../utils/logger';
import type { AnniversaryCalculator } from '../anniversary/anniversary-calculator';
import { addDays, atUtcHour, daysBetween } from '../calendar/solar-date';
import type { NotificationEventBus } from '../events/notification-events';
import type { LedgerRepository } from '../ledger/ledger.repository';
import type { NewLedgerEntry } from '../ledger/ledger.types';
import type { RecipientRepository } from '../records/recipient.repository';
import type { Subject } from '../records/record.types';
import type { SubjectRepository } from '../records/subject.repository';
import { renderYahrzeitReminder } from './notification-templates';
import { getLocalDate, resolveTimezone } from './timezone.utils';

// =====================================================
// Types
// =====================================================

export interface SweepOptions {
  /** Days before the occurrence that reminders go out */
  leadDays: number;
  /** Extra days of look-ahead so a daily sweep never misses a send day */
  lookaheadDays: number;
  /** How long after an elapsed occurrence a missed cycle is still notified */
  graceDays: number;
  timezone: string;
  sendHourUtc: number;
  runLockTtlMs: number;
}

export interface SchedulerDependencies {
  db: SqliteDatabase;
  subjects: SubjectRepository;
  recipients: RecipientRepository;
  ledger: LedgerRepository;
  calculator: AnniversaryCalculator;
  events: NotificationEventBus;
  runLock: RunLock;
  clock: Clock;
  options: SweepOptions;
}

export interface SweepResult {
  success: boolean;
  runId: string;
  /** False when another sweep held the run lock */
  acquired: boolean;
  today: string;
  subjectsScanned: number;
  entriesCreated: number;
  rolledOver: number;
  failed: number;
  durationMs: number;
}

interface SubjectOutcome {
  created: number;
  rolledOver: boolean;
}

export const SWEEP_LOCK_KEY = 'locks:anniversary-sweep';

class OccurrenceChangedError extends Error {
  constructor(subjectId: string) {
    super(`Subject ${subjectId} changed during the sweep`);
  }
}

// =====================================================
// Service
// =====================================================

export class NotificationSchedulerService {
  private readonly timezone: string;

  constructor(private readonly deps: SchedulerDependencies) {
    this.timezone = resolveTimezone(deps.options.timezone);
  }

  async runSweep(): Promise<SweepResult> {
    const runId = randomUUID();
    const startedAt = Date.now();
    const today = getLocalDate(this.timezone, this.deps.clock.now());

    const locked = await withRunLock(
      this.deps.runLock,
      SWEEP_LOCK_KEY,
      this.deps.options.runLockTtlMs,
      () => this.sweep(runId, today)
    );

    if (!locked.acquired) {
      logger.warn('[AnniversarySweep] Another sweep is running, skipping', { runId, today });
      return {
        success: true,
        runId,
        acquired: false,
        today,
        subjectsScanned: 0,
        entriesCreated: 0,
        rolledOver: 0,
        failed: 0,
        durationMs: Date.now() - startedAt,
      };
    }

    const result = { ...locked.result, durationMs: Date.now() - startedAt };
    logger.info('[AnniversarySweep] Sweep complete', { ...result });
    return result;
  }

  private async sweep(runId: string, today: string): Promise<SweepResult> {
    const { leadDays, lookaheadDays } = this.deps.options;
    const horizon = addDays(today, lookaheadDays + leadDays);
    const subjects = this.deps.subjects.findWithOccurrenceOnOrBefore(horizon);

    logger.info('[AnniversarySweep] Starting sweep', { runId, today, horizon, candidates: subjects.length });

    let entriesCreated = 0;
    let rolledOver = 0;
    let failed = 0;

    for (const subject of subjects) {
      try {
        const outcome = await this.processSubject(subject, today);
        entriesCreated += outcome.created;
        if (outcome.rolledOver) rolledOver++;
      } catch (error) {
        failed++;
        this.flagStale(subject, error);
      }
    }

    return {
      success: failed === 0,
      runId,
      acquired: true,
      today,
      subjectsScanned: subjects.length,
      entriesCreated,
      rolledOver,
      failed,
      durationMs: 0,
    };
  }

  private async processSubject(subject: Subject, today: string): Promise<SubjectOutcome> {
    const { ledger, subjects, calculator, clock, db } = this.deps;
    const occurrence = subject.nextOccurrenceSolar;
    const cycleYear = subject.nextOccurrenceCycle;
    const elapsed = occurrence < today;

    // Computed before the transaction: the table source may be remote
    const nextOccurrence = elapsed
      ? await calculator.nextCycle(subject.anniversaryDateLunisolar, addDays(today, -1))
      : null;

    const now = clock.now();
    const pending = this.shouldNotify(subject, today, elapsed, cycleYear)
      ? this.buildEntries(subject, occurrence, cycleYear, now)
      : [];

    const commit = db.transaction((): SubjectOutcome => {
      let created = 0;
      for (const entry of pending) {
        if (ledger.createIfAbsent(entry, now)) created++;
      }

      if (nextOccurrence !== null) {
        if (!subjects.advanceOccurrence(subject.id, occurrence, nextOccurrence, now)) {
          // Rolls back the entries created above
          throw new OccurrenceChangedError(subject.id);
        }
      } else if (subject.scheduleStale) {
        subjects.clearStale(subject.id, now);
      }

      return { created, rolledOver: nextOccurrence !== null };
    });

    let outcome: SubjectOutcome;
    try {
      outcome = commit();
    } catch (error) {
      if (error instanceof OccurrenceChangedError) {
        logger.info('[AnniversarySweep] Subject changed concurrently, skipping', { subjectId: subject.id });
        return { created: 0, rolledOver: false };
      }
      throw error;
    }

    if (outcome.created > 0) {
      logger.info('[AnniversarySweep] Ledger entries created', {
        subjectId: subject.id,
        cycleYear,
        created: outcome.created,
      });
    }

    if (nextOccurrence !== null) {
      this.deps.events.emit('occurrence_rolled_over', {
        subjectId: subject.id,
        previousOccurrence: occurrence,
        nextOccurrence: nextOccurrence.solar,
        anniversary: subject.anniversaryDateLunisolar,
        notifiedCycle: ledger.countLiveForCycle(subject.id, cycleYear) > 0,
      });
    }

    return outcome;
  }

  /**
   * Upcoming occurrences are notified once inside the lead window.
   * An elapsed one only when it is within the grace period and no
   * entry was ever created for its cycle (the sweep did not run).
   */
  private shouldNotify(subject: Subject, today: string, elapsed: boolean, cycleYear: number): boolean {
    // The horizon query already bounds upcoming occurrences
    if (!elapsed) return true;

    const occurrence = subject.nextOccurrenceSolar;

    if (daysBetween(occurrence, today) > this.deps.options.graceDays) {
      logger.warn('[AnniversarySweep] Occurrence elapsed beyond grace period, not notifying', {
        subjectId: subject.id,
        occurrence,
        today,
      });
      return false;
    }
    return this.deps.ledger.countLiveForCycle(subject.id, cycleYear) === 0;
  }

  private buildEntries(subject: Subject, occurrence: string, cycleYear: number, now: Date): NewLedgerEntry[] {
    const { leadDays, sendHourUtc } = this.deps.options;
    const scheduledFor = atUtcHour(addDays(occurrence, -leadDays), sendHourUtc);
    const status: NewLedgerEntry['status'] =
      scheduledFor.getTime() <= now.getTime() ? LedgerStatus.DUE : LedgerStatus.PENDING;

    return this.deps.recipients.listEligibleForSubject(subject.id).map(
      (recipient): NewLedgerEntry => ({
        subjectId: subject.id,
        recipientId: recipient.id,
        cycleYear,
        status,
        channelKind: recipient.channelKind,
        scheduledFor,
        payload: renderYahrzeitReminder({
          subjectName: subject.displayName,
          recipientName: recipient.displayName,
          locale: recipient.locale,
          kind: subject.nextOccurrenceKind,
          anniversary: subject.anniversaryDateLunisolar,
          occurrenceSolar: occurrence,
        }),
      })
    );
  }

  private flagStale(subject: Subject, error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    logger.error('[AnniversarySweep] Subject failed, keeping last known occurrence', {
      subjectId: subject.id,
      nextOccurrence: subject.nextOccurrenceSolar,
      error: message,
    });

    this.deps.subjects.markStale(subject.id, message, this.deps.clock.now());
    this.deps.events.emit('subject_schedule_stale', {
      subjectId: subject.id,
      lastKnownOccurrence: subject.nextOccurrenceSolar,
      error: message,
    });
  }
}
