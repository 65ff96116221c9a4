// =====================================================
// Computed Year Table Source
// =====================================================

import type { LunisolarYearTable } from '@yahrzeit-reminders/shared-types';
import { fromFixedDay } from './solar-date';
import { daysInYear, isLeapYear, monthLengthsForYearLength, newYearFixedDay } from './hebrew-year';
import type { YearTableSource } from './year-table.source';

export class ComputedYearTableSource implements YearTableSource {
  readonly name = 'computed';

  async getYearTable(year: number): Promise<LunisolarYearTable> {
    return computeYearTable(year);
  }
}

export function computeYearTable(year: number): LunisolarYearTable {
  return {
    year,
    isLeapYear: isLeapYear(year),
    newYearSolar: fromFixedDay(newYearFixedDay(year)),
    monthLengths: monthLengthsForYearLength(daysInYear(year)),
  };
}
