// =====================================================
// Calendar Types
// =====================================================
// Lunisolar (Hebrew) calendar dates as exchanged with the
// record-management component. Solar dates travel as
// ISO-8601 calendar dates ("YYYY-MM-DD").

/**
 * Lunisolar months in civil-year order, starting at Tishrei.
 * In a leap year ADAR is Adar I and ADAR_II follows it;
 * ADAR_II does not exist in common years.
 */
export enum LunisolarMonth {
  TISHREI = 'TISHREI',
  CHESHVAN = 'CHESHVAN',
  KISLEV = 'KISLEV',
  TEVET = 'TEVET',
  SHEVAT = 'SHEVAT',
  ADAR = 'ADAR',
  ADAR_II = 'ADAR_II',
  NISAN = 'NISAN',
  IYAR = 'IYAR',
  SIVAN = 'SIVAN',
  TAMUZ = 'TAMUZ',
  AV = 'AV',
  ELUL = 'ELUL',
}

/** ISO-8601 calendar date, e.g. "2023-01-15" */
export type SolarDateString = string;

export interface LunisolarDate {
  year: number;
  month: LunisolarMonth;
  day: number;
}

/** Recurring month/day, independent of year */
export interface LunisolarMonthDay {
  month: LunisolarMonth;
  day: number;
}

/**
 * Month-length table for one lunisolar year.
 * `monthLengths` is ordered like the year's months
 * (12 entries in a common year, 13 in a leap year).
 */
export interface LunisolarYearTable {
  year: number;
  isLeapYear: boolean;
  /** Solar date of 1 Tishrei */
  newYearSolar: SolarDateString;
  monthLengths: number[];
}

export interface CalendarConversionResponse {
  solar: SolarDateString;
  lunisolar: LunisolarDate;
  formatted: {
    english: string;
    hebrew: string;
  };
}

/**
 * FIRST_OBSERVANCE is the one-off memorial a configured number of
 * months after death; every later occurrence is an ANNIVERSARY on
 * the death date's month/day.
 */
export enum OccurrenceKind {
  ANNIVERSARY = 'anniversary',
  FIRST_OBSERVANCE = 'first_observance',
}
