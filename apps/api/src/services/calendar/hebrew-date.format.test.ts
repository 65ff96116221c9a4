import { describe, it, expect } from 'vitest';
import { LunisolarMonth } from '@yahrzeit-reminders/shared-types';
import {
  formatLunisolarEnglish,
  formatLunisolarHebrew,
  formatMonthDayEnglish,
  toHebrewNumeral,
} from './hebrew-date.format';

describe('toHebrewNumeral', () => {
  it('adds a geresh to single letters', () => {
    expect(toHebrewNumeral(1)).toBe('א׳');
    expect(toHebrewNumeral(30)).toBe('ל׳');
  });

  it('writes 15 and 16 as tet-vav and tet-zayin', () => {
    expect(toHebrewNumeral(15)).toBe('ט״ו');
    expect(toHebrewNumeral(16)).toBe('ט״ז');
    expect(toHebrewNumeral(17)).toBe('י״ז');
  });

  it('drops the thousands of a year', () => {
    expect(toHebrewNumeral(5783)).toBe('תשפ״ג');
    expect(toHebrewNumeral(5787)).toBe('תשפ״ז');
  });
});

describe('lunisolar date formatting', () => {
  it('formats English dates with Adar I in leap years', () => {
    expect(formatLunisolarEnglish({ year: 5784, month: LunisolarMonth.ADAR, day: 5 })).toBe('5 Adar I 5784');
    expect(formatLunisolarEnglish({ year: 5785, month: LunisolarMonth.ADAR, day: 5 })).toBe('5 Adar 5785');
  });

  it('formats Hebrew dates with numerals', () => {
    expect(formatLunisolarHebrew({ year: 5783, month: LunisolarMonth.TEVET, day: 22 })).toBe('כ״ב טבת תשפ״ג');
  });

  it('formats year-less anniversaries', () => {
    expect(formatMonthDayEnglish({ month: LunisolarMonth.ADAR_II, day: 10 })).toBe('10 Adar II');
  });
});
