/**
 * SQLite connection setup for the database result store.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { logger } from '../shared/logger.js';

/**
 * Open (or create) the results database with WAL journaling.
 * ":memory:" opens a private in-memory database.
 */
export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);

  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  db.pragma('busy_timeout = 5000');

  logger.debug({ dbPath }, 'Results database opened');

  return db;
}
