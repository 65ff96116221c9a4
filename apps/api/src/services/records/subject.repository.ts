// =====================================================
// Subject Repository
// =====================================================
// Local projection of memorial records plus the columns this
// service owns: the cached lunisolar dates, the next occurrence
// with its ledger cycle and the stale flag.

import { LunisolarMonth } from '@yahrzeit-reminders/shared-types';
import type { SolarDateString } from '@yahrzeit-reminders/shared-types';
import type { Occurrence } from '../anniversary/anniversary-calculator';
import type { SqliteDatabase } from '../../lib/database';
import { parseOccurrenceKind } from './record.types';
import type { Subject, SubjectScheduleFields } from './record.types';

interface SubjectRow {
  id: string;
  display_name: string;
  death_date_solar: string;
  death_lunisolar_year: number;
  death_lunisolar_month: string;
  death_lunisolar_day: number;
  anniversary_month: string;
  anniversary_day: number;
  next_occurrence_solar: string;
  next_occurrence_cycle: number;
  next_occurrence_kind: string;
  schedule_stale: number;
  last_schedule_error: string | null;
  deleted_at: string | null;
  created_at: string;
  updated_at: string;
}

function scheduleParams(schedule: SubjectScheduleFields) {
  return {
    deathDateSolar: schedule.deathDateSolar,
    deathYear: schedule.deathDateLunisolar.year,
    deathMonth: schedule.deathDateLunisolar.month,
    deathDay: schedule.deathDateLunisolar.day,
    anniversaryMonth: schedule.anniversaryDateLunisolar.month,
    anniversaryDay: schedule.anniversaryDateLunisolar.day,
    nextOccurrence: schedule.nextOccurrenceSolar,
    nextCycle: schedule.nextOccurrenceCycle,
    nextKind: schedule.nextOccurrenceKind,
  };
}

export class SubjectRepository {
  constructor(private readonly db: SqliteDatabase) {}

  findById(id: string): Subject | null {
    const row = this.db.prepare<[string], SubjectRow>('SELECT * FROM subjects WHERE id = ?').get(id);
    return row ? toSubject(row) : null;
  }

  /** Insert or refresh a subject together with its computed schedule. */
  upsert(id: string, displayName: string, schedule: SubjectScheduleFields, now: Date): Subject {
    this.db
      .prepare(
        `INSERT INTO subjects (
           id, display_name, death_date_solar,
           death_lunisolar_year, death_lunisolar_month, death_lunisolar_day,
           anniversary_month, anniversary_day,
           next_occurrence_solar, next_occurrence_cycle, next_occurrence_kind,
           schedule_stale, last_schedule_error, deleted_at, created_at, updated_at
         ) VALUES (
           @id, @displayName, @deathDateSolar,
           @deathYear, @deathMonth, @deathDay,
           @anniversaryMonth, @anniversaryDay,
           @nextOccurrence, @nextCycle, @nextKind,
           0, NULL, NULL, @now, @now
         )
         ON CONFLICT(id) DO UPDATE SET
           display_name = excluded.display_name,
           death_date_solar = excluded.death_date_solar,
           death_lunisolar_year = excluded.death_lunisolar_year,
           death_lunisolar_month = excluded.death_lunisolar_month,
           death_lunisolar_day = excluded.death_lunisolar_day,
           anniversary_month = excluded.anniversary_month,
           anniversary_day = excluded.anniversary_day,
           next_occurrence_solar = excluded.next_occurrence_solar,
           next_occurrence_cycle = excluded.next_occurrence_cycle,
           next_occurrence_kind = excluded.next_occurrence_kind,
           schedule_stale = 0,
           last_schedule_error = NULL,
           updated_at = excluded.updated_at`
      )
      .run({ id, displayName, ...scheduleParams(schedule), now: now.toISOString() });

    return this.getById(id);
  }

  getById(id: string): Subject {
    const subject = this.findById(id);
    if (!subject) throw new Error(`Subject ${id} disappeared`);
    return subject;
  }

  /**
   * Live subjects whose next occurrence is on or before `horizon`,
   * which covers both upcoming and already elapsed occurrences.
   */
  findWithOccurrenceOnOrBefore(horizon: SolarDateString): Subject[] {
    return this.db
      .prepare<[string], SubjectRow>(
        `SELECT * FROM subjects
         WHERE deleted_at IS NULL AND next_occurrence_solar <= ?
         ORDER BY next_occurrence_solar ASC, id ASC`
      )
      .all(horizon)
      .map(toSubject);
  }

  /** Compare-and-set on the occurrence the caller last read. */
  advanceOccurrence(id: string, expected: SolarDateString, next: Occurrence, now: Date): boolean {
    const result = this.db
      .prepare(
        `UPDATE subjects
         SET next_occurrence_solar = @next, next_occurrence_cycle = @cycle, next_occurrence_kind = @kind,
             schedule_stale = 0, last_schedule_error = NULL, updated_at = @now
         WHERE id = @id AND next_occurrence_solar = @expected AND deleted_at IS NULL`
      )
      .run({ id, expected, next: next.solar, cycle: next.cycleYear, kind: next.kind, now: now.toISOString() });
    return result.changes === 1;
  }

  markStale(id: string, error: string, now: Date): void {
    this.db
      .prepare(
        `UPDATE subjects SET schedule_stale = 1, last_schedule_error = @error, updated_at = @now
         WHERE id = @id`
      )
      .run({ id, error, now: now.toISOString() });
  }

  clearStale(id: string, now: Date): void {
    this.db
      .prepare(
        `UPDATE subjects SET schedule_stale = 0, last_schedule_error = NULL, updated_at = @now
         WHERE id = @id AND schedule_stale = 1`
      )
      .run({ id, now: now.toISOString() });
  }

  softDelete(id: string, now: Date): boolean {
    const result = this.db
      .prepare(
        `UPDATE subjects SET deleted_at = @now, updated_at = @now
         WHERE id = @id AND deleted_at IS NULL`
      )
      .run({ id, now: now.toISOString() });
    return result.changes === 1;
  }
}

function toMonth(value: string): LunisolarMonth {
  const month = Object.values(LunisolarMonth).find((candidate) => candidate === value);
  if (month === undefined) throw new Error(`Unknown lunisolar month "${value}"`);
  return month;
}

function toSubject(row: SubjectRow): Subject {
  return {
    id: row.id,
    displayName: row.display_name,
    deathDateSolar: row.death_date_solar,
    deathDateLunisolar: {
      year: row.death_lunisolar_year,
      month: toMonth(row.death_lunisolar_month),
      day: row.death_lunisolar_day,
    },
    anniversaryDateLunisolar: { month: toMonth(row.anniversary_month), day: row.anniversary_day },
    nextOccurrenceSolar: row.next_occurrence_solar,
    nextOccurrenceCycle: row.next_occurrence_cycle,
    nextOccurrenceKind: parseOccurrenceKind(row.next_occurrence_kind),
    scheduleStale: row.schedule_stale === 1,
    lastScheduleError: row.last_schedule_error,
    deletedAt: row.deleted_at === null ? null : new Date(row.deleted_at),
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}
