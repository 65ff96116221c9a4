// =====================================================
// Hebcal Year Table Source Test Suite
// =====================================================

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { HebcalYearTableSource } from './hebcal-year-table.source';
import { CalendarSourceResponseError, DateComputationError } from '../../utils/errors';

vi.mock('../../utils/logger', () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

// 1 Tishrei of each year as the converter API reports it
const NEW_YEARS: Record<number, { gy: number; gm: number; gd: number }> = {
  5784: { gy: 2023, gm: 9, gd: 16 },
  5785: { gy: 2024, gm: 10, gd: 3 },
  5786: { gy: 2025, gm: 9, gd: 23 },
};

interface ConverterRequest {
  params: { hy: number };
}

describe('HebcalYearTableSource', () => {
  const get = vi.fn();
  let source: HebcalYearTableSource;

  beforeEach(() => {
    get.mockReset();
    get.mockImplementation(async (_url: string, request: ConverterRequest) => ({
      data: { ...NEW_YEARS[request.params.hy], hy: request.params.hy, hm: 'Tishrei', hd: 1 },
    }));
    source = new HebcalYearTableSource({ baseUrl: 'https://calendar.test', timeoutMs: 1000, client: { get } });
  });

  it('derives a leap year table from two new-year lookups', async () => {
    const table = await source.getYearTable(5784);

    expect(table).toEqual({
      year: 5784,
      isLeapYear: true,
      newYearSolar: '2023-09-16',
      monthLengths: [30, 29, 29, 29, 30, 30, 29, 30, 29, 30, 29, 30, 29],
    });
    expect(get).toHaveBeenCalledTimes(2);
    expect(get).toHaveBeenCalledWith('/converter', {
      params: { cfg: 'json', hy: 5785, hm: 'Tishrei', hd: 1, h2g: 1, strict: 1 },
    });
  });

  it('derives a common year table', async () => {
    const table = await source.getYearTable(5785);

    expect(table.isLeapYear).toBe(false);
    expect(table.monthLengths).toEqual([30, 30, 30, 29, 30, 29, 30, 29, 30, 29, 30, 29]);
  });

  it('wraps transport failures in DateComputationError', async () => {
    get.mockRejectedValue(new Error('socket hang up'));

    await expect(source.getYearTable(5784)).rejects.toBeInstanceOf(DateComputationError);
  });

  it('rejects a response without solar fields', async () => {
    get.mockResolvedValue({ data: { error: 'bad request' } });

    await expect(source.getYearTable(5784)).rejects.toBeInstanceOf(CalendarSourceResponseError);
  });

  it('rejects an impossible year length', async () => {
    get.mockImplementation(async (_url: string, request: ConverterRequest) => ({
      data: request.params.hy === 5784 ? NEW_YEARS[5784] : { gy: 2024, gm: 9, gd: 1 },
    }));

    await expect(source.getYearTable(5784)).rejects.toBeInstanceOf(CalendarSourceResponseError);
  });
});
