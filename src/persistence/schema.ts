/**
 * Results database schema, versioned through PRAGMA user_version.
 */

import type Database from 'better-sqlite3';
import { logger } from '../shared/logger.js';

const MIGRATIONS: readonly string[] = [
  // 1: item results and run summaries
  `
  CREATE TABLE IF NOT EXISTS item_results (
    item_id TEXT PRIMARY KEY,
    source_ref TEXT NOT NULL,
    item_index INTEGER NOT NULL,
    status TEXT NOT NULL,
    attempts INTEGER NOT NULL,
    payload TEXT,
    error TEXT,
    credential_id TEXT,
    attempt_log TEXT NOT NULL,
    completed_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_item_results_status ON item_results(status);

  CREATE TABLE IF NOT EXISTS batch_runs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    status TEXT NOT NULL,
    start_index INTEGER NOT NULL,
    run_limit INTEGER,
    total INTEGER NOT NULL,
    processed INTEGER NOT NULL,
    succeeded INTEGER NOT NULL,
    skipped INTEGER NOT NULL,
    failed INTEGER NOT NULL,
    failed_permanent INTEGER NOT NULL,
    failed_retryable INTEGER NOT NULL,
    dispatches INTEGER NOT NULL,
    next_index INTEGER NOT NULL,
    pause_reason TEXT,
    output_location TEXT NOT NULL,
    started_at TEXT NOT NULL,
    finished_at TEXT NOT NULL,
    duration_ms INTEGER NOT NULL
  );
  `,
  // 2: lookup of results by backlog position
  `
  CREATE INDEX IF NOT EXISTS idx_item_results_index ON item_results(item_index);
  `,
];

/** Current schema version once all migrations ran. */
export const SCHEMA_VERSION = MIGRATIONS.length;

/** Bring the database up to the latest schema version. */
export function migrateSchema(db: Database.Database): void {
  const currentVersion = db.pragma('user_version', { simple: true }) as number;

  for (let version = currentVersion; version < MIGRATIONS.length; version++) {
    logger.info({ from: version, to: version + 1 }, 'Running results database migration');
    db.transaction(() => {
      db.exec(MIGRATIONS[version] ?? '');
      db.pragma(`user_version = ${version + 1}`);
    })();
  }
}
