// =====================================================
// Year Table Repository
// =====================================================
// Persists the last-known-good table for each year so the
// converter keeps working while the live source is down.

import type { LunisolarYearTable } from '@yahrzeit-reminders/shared-types';
import type { SqliteDatabase } from '../../lib/database';

interface YearTableRow {
  year: number;
  is_leap_year: number;
  new_year_solar: string;
  month_lengths: string;
  source: string;
  fetched_at: string;
}

export interface StoredYearTable {
  table: LunisolarYearTable;
  source: string;
  fetchedAt: Date;
}

export class YearTableRepository {
  constructor(private readonly db: SqliteDatabase) {}

  find(year: number): StoredYearTable | null {
    const row = this.db
      .prepare<[number], YearTableRow>('SELECT * FROM calendar_year_tables WHERE year = ?')
      .get(year);
    if (!row) return null;

    return {
      table: {
        year: row.year,
        isLeapYear: row.is_leap_year === 1,
        newYearSolar: row.new_year_solar,
        monthLengths: parseMonthLengths(row.month_lengths),
      },
      source: row.source,
      fetchedAt: new Date(row.fetched_at),
    };
  }

  save(table: LunisolarYearTable, source: string, fetchedAt: Date): void {
    this.db
      .prepare(
        `INSERT INTO calendar_year_tables (year, is_leap_year, new_year_solar, month_lengths, source, fetched_at)
         VALUES (@year, @isLeapYear, @newYearSolar, @monthLengths, @source, @fetchedAt)
         ON CONFLICT(year) DO UPDATE SET
           is_leap_year = excluded.is_leap_year,
           new_year_solar = excluded.new_year_solar,
           month_lengths = excluded.month_lengths,
           source = excluded.source,
           fetched_at = excluded.fetched_at`
      )
      .run({
        year: table.year,
        isLeapYear: table.isLeapYear ? 1 : 0,
        newYearSolar: table.newYearSolar,
        monthLengths: JSON.stringify(table.monthLengths),
        source,
        fetchedAt: fetchedAt.toISOString(),
      });
  }
}

function parseMonthLengths(raw: string): number[] {
  const value: unknown = JSON.parse(raw);
  if (!Array.isArray(value)) return [];
  return value.filter((n): n is number => typeof n === 'number');
}
