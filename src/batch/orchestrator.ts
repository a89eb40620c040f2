/**
 * Batch orchestrator: drives a slice of the backlog through the dispatcher.
 *
 * Workers share one cursor; claiming an index is a synchronous increment, so
 * no index is handed to two workers. Each item's result is persisted before
 * its worker claims another. Items that already succeeded in an earlier run
 * are counted as skipped and never dispatched again.
 */

import { logger } from '../shared/logger.js';
import { RETRYABLE_KINDS } from '../dispatch/retry-policy.js';
import { itemIdFor } from '../backlog/backlog.js';
import type { Dispatcher, DispatchItem } from '../dispatch/dispatcher.js';
import type { ResultStore } from '../persistence/types.js';
import type { ClassifiedError } from '../shared/types.js';
import type { BatchRun, BatchSummary, ItemResult, RunProgress, RunStatus, TerminalStatus } from './types.js';

export interface BatchOrchestratorOptions {
  dispatcher: Dispatcher;
  store: ResultStore;
  /** Number of workers; default 1. */
  concurrency?: number;
  /** Wall clock for timestamps. */
  now?: () => number;
}

export interface RunOptions {
  startIndex?: number;
  /** Items to process from startIndex; null or absent means all remaining. */
  limit?: number | null;
  /** Aborting requests a cooperative stop before the next claim. */
  signal?: AbortSignal;
}

interface RunState {
  startIndex: number;
  end: number;
  cursor: number;
  processed: Set<number>;
  succeeded: number;
  skipped: number;
  failedPermanent: number;
  failedRetryable: number;
  dispatches: number;
  inFlight: number;
  currentIndex: number | null;
  pauseReason: string | null;
  fatal: unknown;
  status: RunStatus | 'running';
}

/** Terminal status for a failed dispatch. */
export function failureStatus(error: ClassifiedError): TerminalStatus {
  return RETRYABLE_KINDS.has(error.kind) ? 'failed_retryable' : 'failed_permanent';
}

export class BatchOrchestrator {
  private readonly dispatcher: Dispatcher;
  private readonly store: ResultStore;
  private readonly concurrency: number;
  private readonly now: () => number;
  private state: RunState | null = null;

  constructor(options: BatchOrchestratorOptions) {
    const concurrency = options.concurrency ?? 1;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error(`concurrency must be a positive integer, got ${concurrency}`);
    }
    this.dispatcher = options.dispatcher;
    this.store = options.store;
    this.concurrency = concurrency;
    this.now = options.now ?? Date.now;
  }

  get running(): boolean {
    return this.state?.status === 'running';
  }

  /**
   * Process `backlog[startIndex, startIndex + limit)`.
   * Resolves with the run summary once every worker has stopped; rejects when
   * the result store fails or the dispatcher throws instead of returning a result.
   */
  async run(backlog: readonly string[], options: RunOptions = {}): Promise<BatchRun> {
    if (this.running) {
      throw new Error('A batch run is already in progress');
    }

    const startIndex = options.startIndex ?? 0;
    const limit = options.limit ?? null;
    if (!Number.isInteger(startIndex) || startIndex < 0) {
      throw new Error(`startIndex must be a non-negative integer, got ${startIndex}`);
    }
    if (limit !== null && (!Number.isInteger(limit) || limit < 0)) {
      throw new Error(`limit must be a non-negative integer, got ${limit}`);
    }

    const end = Math.max(startIndex, Math.min(backlog.length, limit === null ? backlog.length : startIndex + limit));
    const state: RunState = {
      startIndex,
      end,
      cursor: startIndex,
      processed: new Set(),
      succeeded: 0,
      skipped: 0,
      failedPermanent: 0,
      failedRetryable: 0,
      dispatches: 0,
      inFlight: 0,
      currentIndex: null,
      pauseReason: null,
      fatal: undefined,
      status: 'running',
    };
    this.state = state;

    const startedAt = this.now();
    logger.info(
      { startIndex, limit, total: end - startIndex, concurrency: this.concurrency, output: this.store.location },
      `Batch run started: items ${startIndex}..${end - 1} (${end - startIndex} total)`,
    );

    const workerCount = Math.min(this.concurrency, Math.max(1, end - startIndex));
    const workers: Promise<void>[] = [];
    for (let i = 0; i < workerCount; i++) {
      workers.push(this.work(backlog, state, options.signal));
    }
    await Promise.all(workers);

    if (state.fatal !== undefined) {
      state.status = 'stopped';
      throw state.fatal;
    }

    state.status = state.pauseReason !== null
      ? 'paused'
      : state.processed.size < end - startIndex
        ? 'stopped'
        : 'completed';

    const finishedAt = this.now();
    const summary = this.buildSummary(state, limit, startedAt, finishedAt);
    await this.store.writeSummary(summary);

    logger.info(
      { ...summary },
      `Batch run ${summary.status}: ${summary.succeeded} succeeded, ${summary.skipped} skipped, ${summary.failed} failed; next index ${summary.nextIndex}`,
    );

    return { startIndex, limit, outputLocation: this.store.location, summary };
  }

  /** Live counters of the current (or last) run. */
  getProgress(): RunProgress {
    const state = this.state;
    if (state === null) {
      return {
        running: false,
        startIndex: 0,
        total: 0,
        processed: 0,
        succeeded: 0,
        skipped: 0,
        failed: 0,
        inFlight: 0,
        currentIndex: null,
        nextIndex: 0,
        status: 'idle',
      };
    }
    return {
      running: state.status === 'running',
      startIndex: state.startIndex,
      total: state.end - state.startIndex,
      processed: state.processed.size,
      succeeded: state.succeeded,
      skipped: state.skipped,
      failed: state.failedPermanent + state.failedRetryable,
      inFlight: state.inFlight,
      currentIndex: state.currentIndex,
      nextIndex: nextUnprocessed(state),
      status: state.status,
    };
  }

  private async work(backlog: readonly string[], state: RunState, signal: AbortSignal | undefined): Promise<void> {
    while (true) {
      if (signal?.aborted || state.pauseReason !== null || state.fatal !== undefined) {
        return;
      }
      if (state.cursor >= state.end) {
        return;
      }

      // Claim: read and advance in one synchronous step
      const index = state.cursor++;
      state.currentIndex = index;
      state.inFlight++;

      try {
        await this.processItem(backlog, state, index);
      } catch (error: unknown) {
        // Store and dispatcher failures alike end the run; the item stays pending
        logger.error({ index, err: error }, `Item ${index} failed unexpectedly, stopping run`);
        if (state.fatal === undefined) {
          state.fatal = error;
        }
      } finally {
        state.inFlight--;
      }
    }
  }

  private async processItem(backlog: readonly string[], state: RunState, index: number): Promise<void> {
    const sourceRef = backlog[index];
    if (sourceRef === undefined) {
      return;
    }
    const item: DispatchItem = { index, sourceRef, itemId: itemIdFor(sourceRef) };

    const existing = await this.store.readItemResult(item.itemId);
    if (existing?.status === 'succeeded') {
      state.skipped++;
      state.processed.add(index);
      logger.debug({ item: item.itemId, index }, `Item ${index} already succeeded, skipping`);
      return;
    }

    state.dispatches++;
    const result = await this.dispatcher.dispatch(item);

    if (!result.ok && result.error.kind === 'no_usable_credential') {
      // Stays pending; a later run picks it up
      if (state.pauseReason === null) {
        state.pauseReason = result.error.message;
        logger.warn({ index, reason: result.error.message }, `No usable credential at item ${index}, pausing run`);
      }
      return;
    }

    const lastAttempt = result.attempts[result.attempts.length - 1];
    const record: ItemResult = result.ok
      ? {
          itemId: item.itemId,
          sourceRef,
          index,
          status: 'succeeded',
          attempts: result.attempts.length,
          payload: result.payload,
          error: null,
          credentialId: result.credentialId,
          attemptLog: result.attempts,
          completedAt: new Date(this.now()).toISOString(),
        }
      : {
          itemId: item.itemId,
          sourceRef,
          index,
          status: failureStatus(result.error),
          attempts: result.attempts.length,
          payload: null,
          error: result.error,
          credentialId: lastAttempt?.credentialId ?? null,
          attemptLog: result.attempts,
          completedAt: new Date(this.now()).toISOString(),
        };

    await this.store.writeItemResult(record);
    state.processed.add(index);

    switch (record.status) {
      case 'succeeded':
        state.succeeded++;
        break;
      case 'failed_retryable':
        state.failedRetryable++;
        break;
      case 'failed_permanent':
        state.failedPermanent++;
        break;
    }
  }

  private buildSummary(state: RunState, limit: number | null, startedAt: number, finishedAt: number): BatchSummary {
    const failed = state.failedPermanent + state.failedRetryable;
    return {
      status: state.status === 'running' ? 'stopped' : state.status,
      startIndex: state.startIndex,
      limit,
      total: state.end - state.startIndex,
      processed: state.succeeded + state.skipped + failed,
      succeeded: state.succeeded,
      skipped: state.skipped,
      failed,
      failedPermanent: state.failedPermanent,
      failedRetryable: state.failedRetryable,
      dispatches: state.dispatches,
      nextIndex: nextUnprocessed(state),
      pauseReason: state.pauseReason,
      outputLocation: this.store.location,
      startedAt: new Date(startedAt).toISOString(),
      finishedAt: new Date(finishedAt).toISOString(),
      durationMs: finishedAt - startedAt,
    };
  }
}

/** Lowest index in the slice without a terminal result in this run. */
function nextUnprocessed(state: RunState): number {
  for (let index = state.startIndex; index < state.end; index++) {
    if (!state.processed.has(index)) {
      return index;
    }
  }
  return state.end;
}
