/**
 * SQLite-backed result store. One row per item keyed by item id, one row
 * per run summary. better-sqlite3 is synchronous, so each write is atomic
 * with respect to other workers on the event loop.
 */

import type Database from 'better-sqlite3';
import { logger } from '../shared/logger.js';
import { openDatabase } from './db.js';
import { migrateSchema } from './schema.js';
import { ItemResultSchema } from './record.js';
import type { ResultStore } from './types.js';
import type { BatchSummary, ItemResult } from '../batch/types.js';

interface ItemResultRow {
  item_id: string;
  source_ref: string;
  item_index: number;
  status: string;
  attempts: number;
  payload: string | null;
  error: string | null;
  credential_id: string | null;
  attempt_log: string;
  completed_at: string;
}

function parseJsonColumn(value: string | null): unknown {
  return value === null ? null : JSON.parse(value);
}

export class SqliteResultStore implements ResultStore {
  public readonly location: string;
  private readonly db: Database.Database;
  private readonly upsertItem: Database.Statement<[ItemResultRow]>;
  private readonly selectItem: Database.Statement<[string], ItemResultRow>;
  private readonly insertRun: Database.Statement<[Record<string, string | number | null>]>;

  constructor(dbPath: string) {
    this.location = dbPath;
    this.db = openDatabase(dbPath);
    migrateSchema(this.db);

    this.upsertItem = this.db.prepare<[ItemResultRow]>(`
      INSERT INTO item_results (
        item_id, source_ref, item_index, status, attempts,
        payload, error, credential_id, attempt_log, completed_at
      ) VALUES (
        @item_id, @source_ref, @item_index, @status, @attempts,
        @payload, @error, @credential_id, @attempt_log, @completed_at
      )
      ON CONFLICT(item_id) DO UPDATE SET
        source_ref = excluded.source_ref,
        item_index = excluded.item_index,
        status = excluded.status,
        attempts = excluded.attempts,
        payload = excluded.payload,
        error = excluded.error,
        credential_id = excluded.credential_id,
        attempt_log = excluded.attempt_log,
        completed_at = excluded.completed_at
    `);

    this.selectItem = this.db.prepare<[string], ItemResultRow>(
      'SELECT * FROM item_results WHERE item_id = ?',
    );

    this.insertRun = this.db.prepare<[Record<string, string | number | null>]>(`
      INSERT INTO batch_runs (
        status, start_index, run_limit, total, processed, succeeded, skipped,
        failed, failed_permanent, failed_retryable, dispatches, next_index,
        pause_reason, output_location, started_at, finished_at, duration_ms
      ) VALUES (
        @status, @start_index, @run_limit, @total, @processed, @succeeded, @skipped,
        @failed, @failed_permanent, @failed_retryable, @dispatches, @next_index,
        @pause_reason, @output_location, @started_at, @finished_at, @duration_ms
      )
    `);
  }

  async writeItemResult(result: ItemResult): Promise<void> {
    this.upsertItem.run({
      item_id: result.itemId,
      source_ref: result.sourceRef,
      item_index: result.index,
      status: result.status,
      attempts: result.attempts,
      payload: result.payload === null ? null : JSON.stringify(result.payload),
      error: result.error === null ? null : JSON.stringify(result.error),
      credential_id: result.credentialId,
      attempt_log: JSON.stringify(result.attemptLog),
      completed_at: result.completedAt,
    });
  }

  async readItemResult(itemId: string): Promise<ItemResult | null> {
    const row = this.selectItem.get(itemId);
    if (row === undefined) {
      return null;
    }

    let candidate: unknown;
    try {
      candidate = {
        itemId: row.item_id,
        sourceRef: row.source_ref,
        index: row.item_index,
        status: row.status,
        attempts: row.attempts,
        payload: parseJsonColumn(row.payload),
        error: parseJsonColumn(row.error),
        credentialId: row.credential_id,
        attemptLog: parseJsonColumn(row.attempt_log),
        completedAt: row.completed_at,
      };
    } catch {
      logger.warn({ itemId, location: this.location }, 'Stored result has corrupt JSON columns, treating item as not processed');
      return null;
    }

    const parsed = ItemResultSchema.safeParse(candidate);
    if (!parsed.success) {
      logger.warn({ itemId, location: this.location }, 'Stored result failed validation, treating item as not processed');
      return null;
    }
    return parsed.data;
  }

  async writeSummary(summary: BatchSummary): Promise<void> {
    this.insertRun.run({
      status: summary.status,
      start_index: summary.startIndex,
      run_limit: summary.limit,
      total: summary.total,
      processed: summary.processed,
      succeeded: summary.succeeded,
      skipped: summary.skipped,
      failed: summary.failed,
      failed_permanent: summary.failedPermanent,
      failed_retryable: summary.failedRetryable,
      dispatches: summary.dispatches,
      next_index: summary.nextIndex,
      pause_reason: summary.pauseReason,
      output_location: summary.outputLocation,
      started_at: summary.startedAt,
      finished_at: summary.finishedAt,
      duration_ms: summary.durationMs,
    });
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
