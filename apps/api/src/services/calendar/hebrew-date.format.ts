// =====================================================
// Lunisolar date formatting
// =====================================================

import { LunisolarDate, LunisolarMonth, LunisolarMonthDay } from '@yahrzeit-reminders/shared-types';
import { isLeapYear } from './hebrew-year';

const ENGLISH_MONTH_NAMES: Record<LunisolarMonth, string> = {
  [LunisolarMonth.TISHREI]: 'Tishrei',
  [LunisolarMonth.CHESHVAN]: 'Cheshvan',
  [LunisolarMonth.KISLEV]: 'Kislev',
  [LunisolarMonth.TEVET]: 'Tevet',
  [LunisolarMonth.SHEVAT]: 'Shevat',
  [LunisolarMonth.ADAR]: 'Adar',
  [LunisolarMonth.ADAR_II]: 'Adar II',
  [LunisolarMonth.NISAN]: 'Nisan',
  [LunisolarMonth.IYAR]: 'Iyar',
  [LunisolarMonth.SIVAN]: 'Sivan',
  [LunisolarMonth.TAMUZ]: 'Tamuz',
  [LunisolarMonth.AV]: 'Av',
  [LunisolarMonth.ELUL]: 'Elul',
};

const HEBREW_MONTH_NAMES: Record<LunisolarMonth, string> = {
  [LunisolarMonth.TISHREI]: 'תשרי',
  [LunisolarMonth.CHESHVAN]: 'חשון',
  [LunisolarMonth.KISLEV]: 'כסלו',
  [LunisolarMonth.TEVET]: 'טבת',
  [LunisolarMonth.SHEVAT]: 'שבט',
  [LunisolarMonth.ADAR]: 'אדר',
  [LunisolarMonth.ADAR_II]: 'אדר ב׳',
  [LunisolarMonth.NISAN]: 'ניסן',
  [LunisolarMonth.IYAR]: 'אייר',
  [LunisolarMonth.SIVAN]: 'סיון',
  [LunisolarMonth.TAMUZ]: 'תמוז',
  [LunisolarMonth.AV]: 'אב',
  [LunisolarMonth.ELUL]: 'אלול',
};

// 15 and 16 are written 9+6 and 9+7 to avoid spelling a divine name
const HEBREW_NUMERALS: ReadonlyArray<readonly [number, string]> = [
  [400, 'ת'], [300, 'ש'], [200, 'ר'], [100, 'ק'],
  [90, 'צ'], [80, 'פ'], [70, 'ע'], [60, 'ס'], [50, 'נ'],
  [40, 'מ'], [30, 'ל'], [20, 'כ'],
  [19, 'יט'], [18, 'יח'], [17, 'יז'], [16, 'טז'], [15, 'טו'], [10, 'י'],
  [9, 'ט'], [8, 'ח'], [7, 'ז'], [6, 'ו'], [5, 'ה'],
  [4, 'ד'], [3, 'ג'], [2, 'ב'], [1, 'א'],
];

const GERESH = '׳';
const GERSHAYIM = '״';

/**
 * Hebrew numeral for 1-999 with geresh (single letter) or
 * gershayim before the last letter. Years drop the thousands.
 */
export function toHebrewNumeral(value: number): string {
  let remaining = value >= 1000 ? value % 1000 : value;
  if (remaining <= 0) return String(value);

  let letters = '';
  for (const [amount, glyph] of HEBREW_NUMERALS) {
    while (remaining >= amount) {
      letters += glyph;
      remaining -= amount;
    }
  }

  const chars = Array.from(letters);
  if (chars.length === 1) return `${letters}${GERESH}`;
  return `${chars.slice(0, -1).join('')}${GERSHAYIM}${chars[chars.length - 1] ?? ''}`;
}

/** "Adar I" rather than "Adar" when the year has two. */
export function englishMonthName(month: LunisolarMonth, leapYear: boolean): string {
  if (month === LunisolarMonth.ADAR && leapYear) return 'Adar I';
  return ENGLISH_MONTH_NAMES[month];
}

export function hebrewMonthName(month: LunisolarMonth, leapYear: boolean): string {
  if (month === LunisolarMonth.ADAR && leapYear) return 'אדר א׳';
  return HEBREW_MONTH_NAMES[month];
}

export function formatLunisolarEnglish(date: LunisolarDate): string {
  return `${date.day} ${englishMonthName(date.month, isLeapYear(date.year))} ${date.year}`;
}

export function formatLunisolarHebrew(date: LunisolarDate): string {
  const month = hebrewMonthName(date.month, isLeapYear(date.year));
  return `${toHebrewNumeral(date.day)} ${month} ${toHebrewNumeral(date.year)}`;
}

/** Year-less anniversary label, e.g. "22 Tevet". */
export function formatMonthDayEnglish(monthDay: LunisolarMonthDay): string {
  return `${monthDay.day} ${ENGLISH_MONTH_NAMES[monthDay.month]}`;
}

export function formatMonthDayHebrew(monthDay: LunisolarMonthDay): string {
  return `${toHebrewNumeral(monthDay.day)} ${HEBREW_MONTH_NAMES[monthDay.month]}`;
}
