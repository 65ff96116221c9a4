// =====================================================
// Year Table Source
// =====================================================

import type { LunisolarYearTable } from '@yahrzeit-reminders/shared-types';

/**
 * Read-only lookup of one lunisolar year's month lengths and
 * leap flag. Implementations may be remote and may fail.
 */
export interface YearTableSource {
  readonly name: string;
  getYearTable(year: number): Promise<LunisolarYearTable>;
}
