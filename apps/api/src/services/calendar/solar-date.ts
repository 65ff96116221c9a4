// =====================================================
// Solar (Gregorian) date helpers
// =====================================================
// Solar dates are plain "YYYY-MM-DD" strings; arithmetic goes
// through fixed day numbers (day 1 = 0001-01-01, proleptic
// Gregorian) so no local timezone ever leaks in.

import type { SolarDateString } from '@yahrzeit-reminders/shared-types';
import { BadRequestError } from '../../utils/errors';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

// Fixed day number of 1970-01-01
const UNIX_EPOCH_FIXED = 719163;

const SOLAR_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export interface SolarDateParts {
  year: number;
  month: number;
  day: number;
}

export function isSolarDateString(value: string): boolean {
  const match = SOLAR_DATE_PATTERN.exec(value);
  if (!match) return false;

  const [, y, m, d] = match;
  const year = Number(y);
  const month = Number(m);
  const day = Number(d);
  if (month < 1 || month > 12 || day < 1) return false;

  // Date.UTC rolls 2023-02-30 over into March; a round trip catches it
  const candidate = new Date(Date.UTC(year, month - 1, day));
  return candidate.getUTCMonth() === month - 1 && candidate.getUTCDate() === day;
}

export function parseSolarDate(value: SolarDateString): SolarDateParts {
  const match = SOLAR_DATE_PATTERN.exec(value);
  if (!match || !isSolarDateString(value)) {
    throw new BadRequestError(`Invalid solar date "${value}", expected YYYY-MM-DD`);
  }
  return { year: Number(match[1]), month: Number(match[2]), day: Number(match[3]) };
}

export function formatSolarDate(parts: SolarDateParts): SolarDateString {
  const y = String(parts.year).padStart(4, '0');
  const m = String(parts.month).padStart(2, '0');
  const d = String(parts.day).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

export function toFixedDay(value: SolarDateString): number {
  const { year, month, day } = parseSolarDate(value);
  const utc = new Date(0);
  utc.setUTCFullYear(year, month - 1, day);
  return Math.floor(utc.getTime() / MS_PER_DAY) + UNIX_EPOCH_FIXED;
}

export function fromFixedDay(fixed: number): SolarDateString {
  const utc = new Date((fixed - UNIX_EPOCH_FIXED) * MS_PER_DAY);
  return formatSolarDate({
    year: utc.getUTCFullYear(),
    month: utc.getUTCMonth() + 1,
    day: utc.getUTCDate(),
  });
}

export function addDays(value: SolarDateString, days: number): SolarDateString {
  return fromFixedDay(toFixedDay(value) + days);
}

/** Whole days from `from` to `to` (negative when `to` is earlier). */
export function daysBetween(from: SolarDateString, to: SolarDateString): number {
  return toFixedDay(to) - toFixedDay(from);
}

/** UTC instant of `hour`:00 on the given solar date. */
export function atUtcHour(value: SolarDateString, hour: number): Date {
  const { year, month, day } = parseSolarDate(value);
  const utc = new Date(0);
  utc.setUTCFullYear(year, month - 1, day);
  utc.setUTCHours(hour, 0, 0, 0);
  return utc;
}
