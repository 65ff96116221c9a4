// =====================================================
// Hebrew year arithmetic
// =====================================================
// Molad-based computation of 1 Tishrei with the four
// postponement rules, expressed on fixed day numbers
// (see solar-date.ts).

import { LunisolarMonth } from '@yahrzeit-reminders/shared-types';

// Fixed day number of 1 Tishrei AM 1
const HEBREW_EPOCH_FIXED = -1373427;

// Years the service will convert; outside them conversions
// raise UnsupportedDateRangeError
export const MIN_SUPPORTED_YEAR = 5600;
export const MAX_SUPPORTED_YEAR = 6200;

export const VALID_YEAR_LENGTHS: readonly number[] = [353, 354, 355, 383, 384, 385];

const COMMON_YEAR_MONTHS: readonly LunisolarMonth[] = [
  LunisolarMonth.TISHREI,
  LunisolarMonth.CHESHVAN,
  LunisolarMonth.KISLEV,
  LunisolarMonth.TEVET,
  LunisolarMonth.SHEVAT,
  LunisolarMonth.ADAR,
  LunisolarMonth.NISAN,
  LunisolarMonth.IYAR,
  LunisolarMonth.SIVAN,
  LunisolarMonth.TAMUZ,
  LunisolarMonth.AV,
  LunisolarMonth.ELUL,
];

const LEAP_YEAR_MONTHS: readonly LunisolarMonth[] = [
  ...COMMON_YEAR_MONTHS.slice(0, 6),
  LunisolarMonth.ADAR_II,
  ...COMMON_YEAR_MONTHS.slice(6),
];

export function isLeapYear(year: number): boolean {
  return (7 * year + 1) % 19 < 7;
}

export function monthsOfYear(leap: boolean): readonly LunisolarMonth[] {
  return leap ? LEAP_YEAR_MONTHS : COMMON_YEAR_MONTHS;
}

function elapsedDays(year: number): number {
  const monthsElapsed = Math.floor((235 * year - 234) / 19);
  const partsElapsed = 12084 + 13753 * monthsElapsed;
  const day = 29 * monthsElapsed + Math.floor(partsElapsed / 25920);
  // Lo ADU Rosh
  return (3 * (day + 1)) % 7 < 3 ? day + 1 : day;
}

function yearLengthCorrection(year: number): number {
  const ny0 = elapsedDays(year - 1);
  const ny1 = elapsedDays(year);
  const ny2 = elapsedDays(year + 1);
  if (ny2 - ny1 === 356) return 2;
  if (ny1 - ny0 === 382) return 1;
  return 0;
}

/** Fixed day number of 1 Tishrei of `year`. */
export function newYearFixedDay(year: number): number {
  return HEBREW_EPOCH_FIXED + elapsedDays(year) + yearLengthCorrection(year);
}

export function daysInYear(year: number): number {
  return newYearFixedDay(year + 1) - newYearFixedDay(year);
}

/**
 * Month lengths in civil order for a year of the given length.
 * Cheshvan and Kislev are the only months whose length varies
 * (deficient / regular / complete years); Adar I is always 30.
 */
export function monthLengthsForYearLength(yearLength: number): number[] {
  const leap = yearLength > 380;
  const cheshvan = yearLength % 10 === 5 ? 30 : 29;
  const kislev = yearLength % 10 === 3 ? 29 : 30;
  const adar = leap ? [30, 29] : [29];
  return [30, cheshvan, kislev, 29, 30, ...adar, 30, 29, 30, 29, 30, 29];
}
