/**
 * Batch run types: work items, persisted item results and run summaries.
 */

import type { AttemptRecord, ClassifiedError, ExtractedPayload } from '../shared/types.js';

/**
 * Statuses an item can end a run in (and be persisted with). An item with no
 * stored result is pending; one a worker has claimed is counted in
 * `RunProgress.inFlight` until its result is written.
 */
export type TerminalStatus = 'succeeded' | 'failed_retryable' | 'failed_permanent';

/** One backlog entry, materialized when a worker claims its index. */
export interface WorkItem {
  /** Opaque document reference (a path). */
  sourceRef: string;
  /** Position in the ordered backlog. */
  index: number;
  /** Stable identity used as the persistence key. */
  itemId: string;
}

/** What the store keeps for an item once it reached a terminal status. */
export interface ItemResult {
  itemId: string;
  sourceRef: string;
  index: number;
  status: TerminalStatus;
  attempts: number;
  payload: ExtractedPayload | null;
  error: ClassifiedError | null;
  credentialId: string | null;
  attemptLog: AttemptRecord[];
  /** ISO-8601 timestamp. */
  completedAt: string;
}

/** How a run ended. */
export type RunStatus = 'completed' | 'stopped' | 'paused';

export interface BatchSummary {
  status: RunStatus;
  startIndex: number;
  /** Requested limit; null means "all remaining". */
  limit: number | null;
  /** Items in the requested slice. */
  total: number;
  /** Items that reached a terminal status in this run (succeeded + skipped + failed). */
  processed: number;
  /** Dispatched and succeeded in this run. */
  succeeded: number;
  /** Already succeeded in an earlier run; not dispatched. */
  skipped: number;
  failed: number;
  failedPermanent: number;
  failedRetryable: number;
  /** Dispatcher calls made (items, not attempts). */
  dispatches: number;
  /** Lowest backlog index not processed in this run: the resume point. */
  nextIndex: number;
  /** Why the run paused, when it did. */
  pauseReason: string | null;
  outputLocation: string;
  /** ISO-8601 timestamps. */
  startedAt: string;
  finishedAt: string;
  durationMs: number;
}

/** A batch run: the requested slice and, once finished, its summary. */
export interface BatchRun {
  startIndex: number;
  limit: number | null;
  outputLocation: string;
  summary: BatchSummary;
}

/** Live progress of the current (or last) run, for observability. */
export interface RunProgress {
  running: boolean;
  startIndex: number;
  total: number;
  processed: number;
  succeeded: number;
  skipped: number;
  failed: number;
  inFlight: number;
  /** Index most recently claimed by a worker; null before the first claim. */
  currentIndex: number | null;
  nextIndex: number;
  status: RunStatus | 'running' | 'idle';
}
