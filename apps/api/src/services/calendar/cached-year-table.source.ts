// =====================================================
// Cached Year Table Source
// =====================================================
// Wraps a (possibly remote) source with an in-memory TTL
// cache and a persisted last-known-good copy. When the
// primary fails, the persisted table is served with a
// staleness warning; with nothing stored the failure is a
// DateComputationError so callers retry on the next sweep.

import type { LunisolarYearTable } from '@yahrzeit-reminders/shared-types';
import { logger } from '../../utils/logger';
import { DateComputationError } from '../../utils/errors';
import type { Clock } from '../../utils/clock';
import type { YearTableSource } from './year-table.source';
import type { YearTableRepository } from './year-table.repository';

interface CacheEntry {
  table: LunisolarYearTable;
  expiresAt: number;
}

export interface CachedSourceOptions {
  ttlMs: number;
  clock: Clock;
}

export class CachedYearTableSource implements YearTableSource {
  readonly name: string;

  private readonly memory = new Map<number, CacheEntry>();

  constructor(
    private readonly primary: YearTableSource,
    private readonly repository: YearTableRepository,
    private readonly options: CachedSourceOptions
  ) {
    this.name = `cached(${primary.name})`;
  }

  async getYearTable(year: number): Promise<LunisolarYearTable> {
    const now = this.options.clock.now();
    const cached = this.memory.get(year);
    if (cached && cached.expiresAt > now.getTime()) {
      return cached.table;
    }

    try {
      const table = await this.primary.getYearTable(year);
      this.memory.set(year, { table, expiresAt: now.getTime() + this.options.ttlMs });
      this.repository.save(table, this.primary.name, now);
      return table;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const stored = this.repository.find(year);

      if (stored) {
        logger.warn('[CalendarTables] Primary source unavailable, serving last-known-good table', {
          year,
          source: stored.source,
          fetchedAt: stored.fetchedAt.toISOString(),
          error: message,
        });
        return stored.table;
      }

      logger.error('[CalendarTables] No table available', { year, error: message });
      throw new DateComputationError(`No date table available for year ${year}: ${message}`, error);
    }
  }
}
