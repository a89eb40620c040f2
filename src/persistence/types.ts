/**
 * Result store contract.
 * Each item writes under its own key, so concurrent workers never collide.
 * `readItemResult` is the resume check: an item whose stored result has
 * status "succeeded" is never dispatched again.
 */

import type { BatchSummary, ItemResult } from '../batch/types.js';

export interface ResultStore {
  /** Where results go (directory or database path), for logs and the summary. */
  readonly location: string;

  /** Persist (create or overwrite) the result of one item. */
  writeItemResult(result: ItemResult): Promise<void>;

  /** Stored result for an item, or null when there is none. */
  readItemResult(itemId: string): Promise<ItemResult | null>;

  /** Persist the summary of a finished (or stopped/paused) run. */
  writeSummary(summary: BatchSummary): Promise<void>;

  /** Release resources (database handles). */
  close(): Promise<void>;
}
