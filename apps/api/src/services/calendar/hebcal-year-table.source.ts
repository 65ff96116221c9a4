// =====================================================
// Hebcal Year Table Source
// =====================================================
// Live date-table lookup against the Hebcal converter API.
// Two requests per year: 1 Tishrei of `year` and of `year + 1`.
// The distance between them fixes the leap flag and the
// Cheshvan/Kislev lengths, so nothing else is trusted.

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { LunisolarYearTable, SolarDateString } from '@yahrzeit-reminders/shared-types';
import { logger } from '../../utils/logger';
import { CalendarSourceResponseError, DateComputationError } from '../../utils/errors';
import { daysBetween, formatSolarDate, isSolarDateString } from './solar-date';
import { monthLengthsForYearLength, VALID_YEAR_LENGTHS } from './hebrew-year';
import type { YearTableSource } from './year-table.source';

const converterResponseSchema = z.object({
  gy: z.number().int(),
  gm: z.number().int().min(1).max(12),
  gd: z.number().int().min(1).max(31),
  hy: z.number().int().optional(),
  hm: z.string().optional(),
  hd: z.number().int().optional(),
});

export type HebcalHttpClient = Pick<AxiosInstance, 'get'>;

export interface HebcalSourceOptions {
  baseUrl: string;
  timeoutMs: number;
  client?: HebcalHttpClient;
}

export class HebcalYearTableSource implements YearTableSource {
  readonly name = 'hebcal';

  private readonly client: HebcalHttpClient;

  constructor(options: HebcalSourceOptions) {
    this.client =
      options.client ??
      axios.create({
        baseURL: options.baseUrl,
        timeout: options.timeoutMs,
        headers: { Accept: 'application/json' },
      });
  }

  async getYearTable(year: number): Promise<LunisolarYearTable> {
    const [newYear, nextNewYear] = await Promise.all([
      this.fetchNewYear(year),
      this.fetchNewYear(year + 1),
    ]);

    const yearLength = daysBetween(newYear, nextNewYear);
    if (!VALID_YEAR_LENGTHS.includes(yearLength)) {
      throw new CalendarSourceResponseError(
        `Hebcal returned an impossible length of ${yearLength} days for year ${year}`
      );
    }

    return {
      year,
      isLeapYear: yearLength > 380,
      newYearSolar: newYear,
      monthLengths: monthLengthsForYearLength(yearLength),
    };
  }

  private async fetchNewYear(year: number): Promise<SolarDateString> {
    let data: unknown;
    try {
      const response = await this.client.get<unknown>('/converter', {
        params: { cfg: 'json', hy: year, hm: 'Tishrei', hd: 1, h2g: 1, strict: 1 },
      });
      data = response.data;
    } catch (error) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      logger.warn('[Hebcal] Converter request failed', { year, status });
      throw new DateComputationError(`Hebcal lookup for year ${year} failed`, error);
    }

    const parsed = converterResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new CalendarSourceResponseError(
        `Unexpected Hebcal response for year ${year}: ${parsed.error.issues[0]?.message ?? 'invalid'}`
      );
    }

    const solar = formatSolarDate({ year: parsed.data.gy, month: parsed.data.gm, day: parsed.data.gd });
    if (!isSolarDateString(solar)) {
      throw new CalendarSourceResponseError(`Hebcal returned a non-existent date ${solar}`);
    }
    return solar;
  }
}
