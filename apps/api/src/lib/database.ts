// =====================================================
// SQLite Connection
// =====================================================
// better-sqlite3 is synchronous, so a single connection per
// process is shared by the repositories. WAL mode lets the
// HTTP server, the sweep worker and dispatch workers read
// while one of them writes.

import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { logger } from '../utils/logger';

export type SqliteDatabase = Database.Database;

// Resolves to apps/api/db from both src/lib and dist/lib
const SCHEMA_PATH = path.resolve(__dirname, '../../db/schema.sql');

export function openDatabase(filePath: string): SqliteDatabase {
  if (filePath !== ':memory:') {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  }

  const db = new Database(filePath);
  db.pragma('journal_mode = WAL');
  db.pragma('busy_timeout = 5000');
  db.pragma('foreign_keys = ON');

  db.exec(fs.readFileSync(SCHEMA_PATH, 'utf8'));

  logger.debug('[Database] Opened', { filePath });
  return db;
}

export function closeDatabase(db: SqliteDatabase): void {
  if (db.open) {
    db.close();
    logger.info('[Database] Connection closed');
  }
}
