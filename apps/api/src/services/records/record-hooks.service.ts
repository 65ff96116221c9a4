// =====================================================
// Record Hooks Service
// =====================================================
// Entry points for the record-management component. Schedule
// changes and the cancellations they imply are written in one
// SQLite transaction, so no dispatch pass can see a deleted
// subject or a deactivated recipient with live entries.

import { ERROR_CODES } from '@yahrzeit-reminders/shared-types';
import type {
  CalendarConversionResponse,
  CancellationReason,
  LedgerEntryDto,
  RecipientDto,
  SolarDateString,
  SubjectDto,
} from '@yahrzeit-reminders/shared-types';
import type { SqliteDatabase } from '../../lib/database';
import type { Clock } from '../../utils/clock';
import { ConflictError, NotFoundError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import type { AnniversaryCalculator } from '../anniversary/anniversary-calculator';
import type { CalendarConverter } from '../calendar/calendar-converter';
import { formatLunisolarEnglish, formatLunisolarHebrew } from '../calendar/hebrew-date.format';
import type { LedgerRepository } from '../ledger/ledger.repository';
import type { LedgerEntry } from '../ledger/ledger.types';
import { getLocalDate } from '../notifications/timezone.utils';
import type { RecipientRepository } from './recipient.repository';
import type { Recipient, RecipientInput, Subject } from './record.types';
import type { SubjectRepository } from './subject.repository';

export interface RecordHooksDependencies {
  db: SqliteDatabase;
  subjects: SubjectRepository;
  recipients: RecipientRepository;
  ledger: LedgerRepository;
  calculator: AnniversaryCalculator;
  converter: CalendarConverter;
  clock: Clock;
  /** Zone that decides which day "today" is */
  timezone: string;
}

export interface SubjectInput {
  id: string;
  displayName: string;
  deathDateSolar: SolarDateString;
}

export interface CancellationResult {
  changed: boolean;
  cancelledEntries: number;
}

export interface SubjectLedgerView {
  subject: SubjectDto;
  recipients: RecipientDto[];
  entries: LedgerEntryDto[];
}

export class RecordHooksService {
  constructor(private readonly deps: RecordHooksDependencies) {}

  // ===========================================
  // Subjects
  // ===========================================

  /** Fixes the anniversary and the first occurrence of a new subject. */
  async onSubjectCreated(input: SubjectInput): Promise<SubjectDto> {
    const schedule = await this.deps.calculator.scheduleFor(input.deathDateSolar, this.today());
    const subject = this.deps.subjects.upsert(
      input.id,
      input.displayName,
      { deathDateSolar: input.deathDateSolar, ...schedule },
      this.deps.clock.now()
    );

    logger.info('[RecordHooks] Subject scheduled', {
      subjectId: subject.id,
      anniversary: subject.anniversaryDateLunisolar,
      nextOccurrence: subject.nextOccurrenceSolar,
    });
    return toSubjectDto(subject);
  }

  /**
   * Recomputes the anniversary from the corrected date. Live
   * entries were rendered for the old date and are cancelled.
   */
  async onSubjectDeathDateChanged(id: string, deathDateSolar: SolarDateString): Promise<SubjectDto> {
    const { db, subjects, ledger, calculator, clock } = this.deps;
    const existing = this.requireLiveSubject(id);

    if (existing.deathDateSolar === deathDateSolar) {
      return toSubjectDto(existing);
    }

    const schedule = await calculator.scheduleFor(deathDateSolar, this.today());
    const now = clock.now();

    const apply = db.transaction(() => {
      const cancelled = ledger.cancelForSubject(id, 'death_date_changed', now);
      const updated = subjects.upsert(id, existing.displayName, { deathDateSolar, ...schedule }, now);
      return { updated, cancelled };
    });
    const { updated, cancelled } = apply();

    logger.info('[RecordHooks] Death date corrected, schedule recomputed', {
      subjectId: id,
      previousDeathDate: existing.deathDateSolar,
      deathDate: deathDateSolar,
      nextOccurrence: updated.nextOccurrenceSolar,
      cancelledEntries: cancelled,
    });
    return toSubjectDto(updated);
  }

  /** Freezes scheduling; the subject row is kept for the audit trail. */
  onSubjectDeleted(id: string): CancellationResult {
    const { db, subjects, ledger, clock } = this.deps;
    if (!subjects.findById(id)) {
      throw new NotFoundError(`Subject ${id} not found`, ERROR_CODES.SUBJECT_NOT_FOUND);
    }

    const now = clock.now();
    const apply = db.transaction((): CancellationResult => {
      const changed = subjects.softDelete(id, now);
      const cancelledEntries = ledger.cancelForSubject(id, 'subject_deleted', now);
      return { changed, cancelledEntries };
    });
    const result = apply();

    logger.info('[RecordHooks] Subject deleted', { subjectId: id, ...result });
    return result;
  }

  // ===========================================
  // Recipients
  // ===========================================

  /**
   * Creates or replaces a recipient. Saving one as inactive or
   * opted out cancels its live entries in the same transaction.
   */
  upsertRecipient(input: RecipientInput): RecipientDto {
    const { db, recipients, ledger, clock } = this.deps;
    this.requireLiveSubject(input.subjectId);

    const now = clock.now();
    const apply = db.transaction(() => {
      const recipient = recipients.upsert(input, now);
      const reason = ineligibilityReason(recipient);
      const cancelled = reason ? ledger.cancelForRecipient(recipient.id, reason, now) : 0;
      return { recipient, cancelled };
    });
    const { recipient, cancelled } = apply();

    if (cancelled > 0) {
      logger.info('[RecordHooks] Recipient no longer eligible, entries cancelled', {
        recipientId: recipient.id,
        cancelledEntries: cancelled,
      });
    }
    return toRecipientDto(recipient);
  }

  onRecipientDeactivated(id: string, reason = 'deactivated by record management'): CancellationResult {
    return this.withdrawRecipient(id, 'recipient_deactivated', (now) =>
      this.deps.recipients.deactivate(id, reason, now)
    );
  }

  onRecipientOptedOut(id: string): CancellationResult {
    return this.withdrawRecipient(id, 'recipient_opted_out', (now) => this.deps.recipients.optOut(id, now));
  }

  private withdrawRecipient(
    id: string,
    reason: CancellationReason,
    update: (now: Date) => boolean
  ): CancellationResult {
    const { db, recipients, ledger, clock } = this.deps;
    if (!recipients.findById(id)) {
      throw new NotFoundError(`Recipient ${id} not found`, ERROR_CODES.RECIPIENT_NOT_FOUND);
    }

    const now = clock.now();
    const apply = db.transaction((): CancellationResult => {
      const changed = update(now);
      const cancelledEntries = ledger.cancelForRecipient(id, reason, now);
      return { changed, cancelledEntries };
    });
    const result = apply();

    logger.info('[RecordHooks] Recipient withdrawn', { recipientId: id, reason, ...result });
    return result;
  }

  // ===========================================
  // Read side
  // ===========================================

  getSubjectLedger(id: string): SubjectLedgerView {
    const subject = this.deps.subjects.findById(id);
    if (!subject) {
      throw new NotFoundError(`Subject ${id} not found`, ERROR_CODES.SUBJECT_NOT_FOUND);
    }

    return {
      subject: toSubjectDto(subject),
      recipients: this.deps.recipients.listBySubject(id).map(toRecipientDto),
      entries: this.deps.ledger.listBySubject(id).map(toLedgerEntryDto),
    };
  }

  async convertDate(solar: SolarDateString): Promise<CalendarConversionResponse> {
    const lunisolar = await this.deps.converter.toLunisolar(solar);
    return {
      solar,
      lunisolar,
      formatted: {
        english: formatLunisolarEnglish(lunisolar),
        hebrew: formatLunisolarHebrew(lunisolar),
      },
    };
  }

  private requireLiveSubject(id: string): Subject {
    const subject = this.deps.subjects.findById(id);
    if (!subject) {
      throw new NotFoundError(`Subject ${id} not found`, ERROR_CODES.SUBJECT_NOT_FOUND);
    }
    if (subject.deletedAt !== null) {
      throw new ConflictError(`Subject ${id} is deleted`, ERROR_CODES.SUBJECT_DELETED);
    }
    return subject;
  }

  private today(): SolarDateString {
    return getLocalDate(this.deps.timezone, this.deps.clock.now());
  }
}

function ineligibilityReason(recipient: Recipient): CancellationReason | null {
  if (!recipient.active) return 'recipient_deactivated';
  if (recipient.optedOut) return 'recipient_opted_out';
  return null;
}

// ===========================================
// DTO mapping
// ===========================================

export function toSubjectDto(subject: Subject): SubjectDto {
  return {
    id: subject.id,
    displayName: subject.displayName,
    deathDateSolar: subject.deathDateSolar,
    deathDateLunisolar: subject.deathDateLunisolar,
    anniversaryDateLunisolar: subject.anniversaryDateLunisolar,
    nextOccurrenceSolar: subject.nextOccurrenceSolar,
    nextOccurrenceKind: subject.nextOccurrenceKind,
    scheduleStale: subject.scheduleStale,
    deletedAt: subject.deletedAt ? subject.deletedAt.toISOString() : null,
  };
}

export function toRecipientDto(recipient: Recipient): RecipientDto {
  return {
    id: recipient.id,
    subjectId: recipient.subjectId,
    displayName: recipient.displayName,
    channelKind: recipient.channelKind,
    address: recipient.address,
    locale: recipient.locale,
    active: recipient.active,
    optedOut: recipient.optedOut,
    deactivationReason: recipient.deactivationReason,
  };
}

export function toLedgerEntryDto(entry: LedgerEntry): LedgerEntryDto {
  return {
    id: entry.id,
    subjectId: entry.subjectId,
    recipientId: entry.recipientId,
    cycleYear: entry.cycleYear,
    status: entry.status,
    channelKind: entry.channelKind,
    scheduledFor: entry.scheduledFor.toISOString(),
    attemptCount: entry.attemptCount,
    lastAttemptAt: entry.lastAttemptAt ? entry.lastAttemptAt.toISOString() : null,
    nextRetryAt: entry.nextRetryAt ? entry.nextRetryAt.toISOString() : null,
    lastError: entry.lastError,
    cancellationReason: entry.cancellationReason,
    createdAt: entry.createdAt.toISOString(),
    updatedAt: entry.updatedAt.toISOString(),
  };
}
