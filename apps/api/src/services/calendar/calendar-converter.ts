// =====================================================
// Calendar Converter
// =====================================================
// Solar <-> lunisolar conversion and month arithmetic over
// a pluggable year-table source. Month lengths always come
// from the table of the specific year being read, since a
// year may have 12 or 13 months and Cheshvan/Kislev vary.

import {
  LunisolarDate,
  LunisolarMonth,
  LunisolarMonthDay,
  LunisolarYearTable,
  SolarDateString,
} from '@yahrzeit-reminders/shared-types';
import { InvalidLunisolarDateError, UnsupportedDateRangeError } from '../../utils/errors';
import { fromFixedDay, parseSolarDate, toFixedDay } from './solar-date';
import { MAX_SUPPORTED_YEAR, MIN_SUPPORTED_YEAR, monthsOfYear } from './hebrew-year';
import type { YearTableSource } from './year-table.source';

// Hebrew year = solar year + 3760 until 1 Tishrei, + 3761 after
const YEAR_OFFSET_AFTER_NEW_YEAR = 3761;

export class CalendarConverter {
  constructor(private readonly source: YearTableSource) {}

  // ===========================================
  // Conversion
  // ===========================================

  /**
   * Starts from the later of the two candidate years (clamped to the
   * top of the range) and steps back one year when the date precedes
   * its 1 Tishrei. Only the year actually read is range-checked.
   */
  async toLunisolar(solar: SolarDateString): Promise<LunisolarDate> {
    const fixed = toFixedDay(solar);
    let year = Math.min(parseSolarDate(solar).year + YEAR_OFFSET_AFTER_NEW_YEAR, MAX_SUPPORTED_YEAR);
    this.assertSupportedYear(year, solar);

    let table = await this.source.getYearTable(year);
    if (fixed < toFixedDay(table.newYearSolar)) {
      year -= 1;
      this.assertSupportedYear(year, solar);
      table = await this.source.getYearTable(year);
    }

    let offset = fixed - toFixedDay(table.newYearSolar);
    if (offset < 0) {
      // Tables from a live source disagree with the year guess; should not happen
      throw new UnsupportedDateRangeError(`${solar} precedes 1 Tishrei ${year}`);
    }

    const months = monthsOfYear(table.isLeapYear);
    for (let i = 0; i < months.length; i++) {
      const length = table.monthLengths[i] ?? 0;
      if (offset < length) {
        return { year, month: months[i] ?? LunisolarMonth.TISHREI, day: offset + 1 };
      }
      offset -= length;
    }

    throw new UnsupportedDateRangeError(`${solar} does not fall inside lunisolar year ${year}`);
  }

  async toSolar(date: LunisolarDate): Promise<SolarDateString> {
    const solar = await this.tryToSolar(date.year, date);
    if (solar === null) {
      throw new InvalidLunisolarDateError(
        `${date.day} ${date.month} does not exist in lunisolar year ${date.year}`
      );
    }
    return solar;
  }

  /**
   * Solar date of `monthDay` in lunisolar `year`, or null when that
   * month/day does not exist in the year (Adar II in a common year,
   * 30 Cheshvan in a deficient year and so on).
   */
  async tryToSolar(year: number, monthDay: LunisolarMonthDay): Promise<SolarDateString | null> {
    this.assertSupportedYear(year);
    const table = await this.source.getYearTable(year);
    const index = monthsOfYear(table.isLeapYear).indexOf(monthDay.month);
    if (index < 0) return null;

    const length = table.monthLengths[index] ?? 0;
    if (monthDay.day < 1 || monthDay.day > length) return null;

    const before = sumOf(table.monthLengths.slice(0, index));
    return fromFixedDay(toFixedDay(table.newYearSolar) + before + monthDay.day - 1);
  }

  // ===========================================
  // Month arithmetic
  // ===========================================

  /**
   * Moves `n` months by position in each year's month list and
   * clamps the day to the target month's length. Adar II of a leap
   * year stepping into a common year lands on the month at the same
   * position (Nisan).
   */
  async addMonths(date: LunisolarDate, n: number): Promise<LunisolarDate> {
    let year = date.year;
    let table = await this.getYearTable(year);
    let months = monthsOfYear(table.isLeapYear);

    let index = months.indexOf(date.month);
    if (index < 0) {
      throw new InvalidLunisolarDateError(`${date.month} does not exist in lunisolar year ${year}`);
    }

    index += n;
    while (index >= months.length) {
      index -= months.length;
      year += 1;
      table = await this.getYearTable(year);
      months = monthsOfYear(table.isLeapYear);
    }
    while (index < 0) {
      year -= 1;
      table = await this.getYearTable(year);
      months = monthsOfYear(table.isLeapYear);
      index += months.length;
    }

    const month = months[index] ?? LunisolarMonth.TISHREI;
    const length = table.monthLengths[index] ?? 29;
    return { year, month, day: Math.min(date.day, length) };
  }

  // ===========================================
  // Tables
  // ===========================================

  async getYearTable(year: number): Promise<LunisolarYearTable> {
    this.assertSupportedYear(year);
    return this.source.getYearTable(year);
  }

  isSupportedYear(year: number): boolean {
    return year >= MIN_SUPPORTED_YEAR && year <= MAX_SUPPORTED_YEAR;
  }

  private assertSupportedYear(year: number, input?: SolarDateString): void {
    if (!this.isSupportedYear(year)) {
      const subject = input ?? `lunisolar year ${year}`;
      throw new UnsupportedDateRangeError(
        `${subject} is outside the supported range (${MIN_SUPPORTED_YEAR}-${MAX_SUPPORTED_YEAR})`
      );
    }
  }
}

function sumOf(values: readonly number[]): number {
  return values.reduce((total, value) => total + value, 0);
}
