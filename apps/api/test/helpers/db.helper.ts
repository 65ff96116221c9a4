// =====================================================
// Database Helper for Tests
// =====================================================
// Each test gets its own in-memory SQLite database with the
// production schema applied.

import { openDatabase } from '../../src/lib/database';
import type { SqliteDatabase } from '../../src/lib/database';

export function createTestDatabase(): SqliteDatabase {
  return openDatabase(':memory:');
}

export function countRows(db: SqliteDatabase, table: 'subjects' | 'recipients' | 'ledger_entries'): number {
  const row = db.prepare<[], { total: number }>(`SELECT COUNT(*) AS total FROM ${table}`).get();
  return row?.total ?? 0;
}
