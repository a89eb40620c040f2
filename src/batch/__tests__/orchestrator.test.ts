import { describe, it, expect, vi } from 'vitest';
import { BatchOrchestrator, failureStatus } from '../orchestrator.js';
import { itemIdFor } from '../../backlog/backlog.js';
import type { Dispatcher, DispatchItem, DispatchResult } from '../../dispatch/dispatcher.js';
import type { ResultStore } from '../../persistence/types.js';
import type { BatchSummary, ItemResult } from '../types.js';
import type { ClassifiedError } from '../../shared/types.js';

// --- Test helpers ---

/** In-memory result store keyed by item id. */
class MemoryStore implements ResultStore {
  readonly location = 'memory://results';
  readonly items = new Map<string, ItemResult>();
  readonly summaries: BatchSummary[] = [];

  async writeItemResult(result: ItemResult): Promise<void> {
    this.items.set(result.itemId, result);
  }
  async readItemResult(itemId: string): Promise<ItemResult | null> {
    return this.items.get(itemId) ?? null;
  }
  async writeSummary(summary: BatchSummary): Promise<void> {
    this.summaries.push(summary);
  }
  async close(): Promise<void> {}

  resultAt(backlog: readonly string[], index: number): ItemResult | undefined {
    return this.items.get(itemIdFor(backlog[index]!));
  }
}

type Script = (item: DispatchItem) => DispatchResult | Promise<DispatchResult>;

/** Dispatcher that answers from a script and records which indices it saw. */
class ScriptedDispatcher implements Dispatcher {
  readonly dispatched: number[] = [];
  constructor(private readonly script: Script = succeed) {}

  async dispatch(item: DispatchItem): Promise<DispatchResult> {
    this.dispatched.push(item.index);
    return this.script(item);
  }
}

function succeed(item: DispatchItem): DispatchResult {
  return {
    ok: true,
    payload: { SOURCE: item.sourceRef },
    credentialId: 'key-1',
    attempts: [{ attempt: 1, credentialId: 'key-1', outcome: 'success', latencyMs: 3 }],
  };
}

function fail(error: ClassifiedError, attempts = 1): DispatchResult {
  return {
    ok: false,
    error,
    attempts: Array.from({ length: attempts }, (_, i) => ({
      attempt: i + 1,
      credentialId: `key-${i + 1}`,
      outcome: error.kind,
      latencyMs: 3,
      error: error.message,
    })),
  };
}

function makeBacklog(count: number): string[] {
  return Array.from({ length: count }, (_, i) => `input/doc-${String(i).padStart(3, '0')}.pdf`);
}

const fixedNow = () => Date.UTC(2024, 0, 1, 12, 0, 0);

describe('BatchOrchestrator', () => {
  it('processes the requested slice and persists each item', async () => {
    const backlog = makeBacklog(10);
    const store = new MemoryStore();
    const dispatcher = new ScriptedDispatcher();
    const orchestrator = new BatchOrchestrator({ dispatcher, store, now: fixedNow });

    const run = await orchestrator.run(backlog, { startIndex: 2, limit: 5 });

    expect(dispatcher.dispatched).toEqual([2, 3, 4, 5, 6]);
    expect(run.startIndex).toBe(2);
    expect(run.limit).toBe(5);
    expect(run.outputLocation).toBe('memory://results');
    expect(run.summary).toMatchObject({
      status: 'completed',
      total: 5,
      processed: 5,
      succeeded: 5,
      skipped: 0,
      failed: 0,
      dispatches: 5,
      nextIndex: 7,
      pauseReason: null,
      startedAt: '2024-01-01T12:00:00.000Z',
      durationMs: 0,
    });
    expect(store.items.size).toBe(5);
    expect(store.resultAt(backlog, 4)).toEqual({
      itemId: itemIdFor(backlog[4]!),
      sourceRef: 'input/doc-004.pdf',
      index: 4,
      status: 'succeeded',
      attempts: 1,
      payload: { SOURCE: 'input/doc-004.pdf' },
      error: null,
      credentialId: 'key-1',
      attemptLog: [{ attempt: 1, credentialId: 'key-1', outcome: 'success', latencyMs: 3 }],
      completedAt: '2024-01-01T12:00:00.000Z',
    });
    expect(store.summaries).toEqual([run.summary]);
  });

  it('processes everything remaining when no limit is given', async () => {
    const backlog = makeBacklog(4);
    const dispatcher = new ScriptedDispatcher();
    const run = await new BatchOrchestrator({ dispatcher, store: new MemoryStore() }).run(backlog, { startIndex: 1 });

    expect(dispatcher.dispatched).toEqual([1, 2, 3]);
    expect(run.summary.limit).toBeNull();
    expect(run.summary.nextIndex).toBe(4);
  });

  it('does not dispatch anything on a second run over the same slice', async () => {
    const backlog = makeBacklog(5);
    const store = new MemoryStore();

    await new BatchOrchestrator({ dispatcher: new ScriptedDispatcher(), store }).run(backlog);
    const before = new Map(store.items);

    const second = new ScriptedDispatcher();
    const run = await new BatchOrchestrator({ dispatcher: second, store }).run(backlog);

    expect(second.dispatched).toEqual([]);
    expect(run.summary).toMatchObject({ status: 'completed', succeeded: 0, skipped: 5, processed: 5, dispatches: 0 });
    expect(store.items).toEqual(before);
  });

  it('records a permanent failure and carries on', async () => {
    const backlog = makeBacklog(5);
    const store = new MemoryStore();
    const dispatcher = new ScriptedDispatcher((item) =>
      item.index === 2 ? fail({ kind: 'permanent', message: 'Inference service fake returned 400: bad' }) : succeed(item),
    );

    const run = await new BatchOrchestrator({ dispatcher, store }).run(backlog);

    expect(run.summary).toMatchObject({
      status: 'completed',
      succeeded: 4,
      failed: 1,
      failedPermanent: 1,
      failedRetryable: 0,
      processed: 5,
    });
    expect(store.resultAt(backlog, 2)).toMatchObject({
      status: 'failed_permanent',
      payload: null,
      error: { kind: 'permanent', message: 'Inference service fake returned 400: bad' },
      credentialId: 'key-1',
    });

    // Only the failed item is attempted again
    const rerun = new ScriptedDispatcher();
    const second = await new BatchOrchestrator({ dispatcher: rerun, store }).run(backlog);
    expect(rerun.dispatched).toEqual([2]);
    expect(second.summary).toMatchObject({ skipped: 4, succeeded: 1, failed: 0 });
  });

  it('marks an item failed_retryable once its retries are used up', async () => {
    const backlog = makeBacklog(1);
    const store = new MemoryStore();
    const dispatcher = new ScriptedDispatcher(() => fail({ kind: 'transient', message: 'fetch failed' }, 3));

    const run = await new BatchOrchestrator({ dispatcher, store }).run(backlog);

    expect(run.summary).toMatchObject({ failedRetryable: 1, failedPermanent: 0, status: 'completed' });
    const stored = store.resultAt(backlog, 0)!;
    expect(stored.status).toBe('failed_retryable');
    expect(stored.attempts).toBe(3);
    expect(stored.credentialId).toBe('key-3');
  });

  it('records unreadable documents as permanent failures without attempts', async () => {
    const backlog = makeBacklog(1);
    const store = new MemoryStore();
    const dispatcher = new ScriptedDispatcher(() => ({
      ok: false,
      error: { kind: 'unreadable', message: 'Cannot read "input/doc-000.pdf": invalid PDF' },
      attempts: [],
    }));

    await new BatchOrchestrator({ dispatcher, store }).run(backlog);

    expect(store.resultAt(backlog, 0)).toMatchObject({
      status: 'failed_permanent',
      attempts: 0,
      credentialId: null,
    });
  });

  it('resumes from nextIndex after a stop', async () => {
    const backlog = makeBacklog(10);
    const store = new MemoryStore();
    const controller = new AbortController();
    const first = new ScriptedDispatcher((item) => {
      if (item.index === 5) controller.abort();
      return succeed(item);
    });

    const stopped = await new BatchOrchestrator({ dispatcher: first, store }).run(backlog, {
      signal: controller.signal,
    });

    expect(first.dispatched).toEqual([0, 1, 2, 3, 4, 5]);
    expect(stopped.summary).toMatchObject({ status: 'stopped', processed: 6, nextIndex: 6 });

    const second = new ScriptedDispatcher();
    const resumed = await new BatchOrchestrator({ dispatcher: second, store }).run(backlog, {
      startIndex: stopped.summary.nextIndex,
    });

    expect(second.dispatched).toEqual([6, 7, 8, 9]);
    expect(resumed.summary).toMatchObject({ status: 'completed', succeeded: 4, nextIndex: 10 });
    expect(store.items.size).toBe(10);
  });

  it('skips the already-succeeded prefix when rerun from the start after a crash', async () => {
    const backlog = makeBacklog(10);
    const store = new MemoryStore();
    await new BatchOrchestrator({ dispatcher: new ScriptedDispatcher(), store }).run(backlog, { limit: 6 });

    const second = new ScriptedDispatcher();
    const run = await new BatchOrchestrator({ dispatcher: second, store }).run(backlog);

    expect(second.dispatched).toEqual([6, 7, 8, 9]);
    expect(run.summary).toMatchObject({ skipped: 6, succeeded: 4, processed: 10 });
  });

  it('pauses when no credential is usable and leaves the item pending', async () => {
    const backlog = makeBacklog(6);
    const store = new MemoryStore();
    const dispatcher = new ScriptedDispatcher((item) =>
      item.index === 3
        ? fail({ kind: 'no_usable_credential', message: 'No usable credential among 2 configured' })
        : succeed(item),
    );

    const run = await new BatchOrchestrator({ dispatcher, store }).run(backlog);

    expect(dispatcher.dispatched).toEqual([0, 1, 2, 3]);
    expect(run.summary).toMatchObject({
      status: 'paused',
      processed: 3,
      succeeded: 3,
      failed: 0,
      nextIndex: 3,
      pauseReason: 'No usable credential among 2 configured',
    });
    expect(store.resultAt(backlog, 3)).toBeUndefined();
  });

  it('never hands one item to two workers', async () => {
    const backlog = makeBacklog(20);
    const store = new MemoryStore();
    let inFlight = 0;
    let maxInFlight = 0;
    const dispatcher = new ScriptedDispatcher(async (item) => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await new Promise((resolve) => setTimeout(resolve, (item.index % 3) * 2));
      inFlight--;
      return succeed(item);
    });

    const run = await new BatchOrchestrator({ dispatcher, store, concurrency: 3 }).run(backlog);

    expect([...dispatcher.dispatched].sort((a, b) => a - b)).toEqual(backlog.map((_, i) => i));
    expect(maxInFlight).toBe(3);
    expect(run.summary).toMatchObject({ status: 'completed', succeeded: 20, dispatches: 20, nextIndex: 20 });
  });

  it('finishes in-flight items when another worker pauses the run', async () => {
    const backlog = makeBacklog(10);
    const store = new MemoryStore();
    const dispatcher = new ScriptedDispatcher(async (item) => {
      if (item.index === 0) {
        return fail({ kind: 'no_usable_credential', message: 'No usable credential among 1 configured' });
      }
      await new Promise((resolve) => setTimeout(resolve, 5));
      return succeed(item);
    });

    const run = await new BatchOrchestrator({ dispatcher, store, concurrency: 2 }).run(backlog);

    expect(dispatcher.dispatched).toEqual([0, 1]);
    expect(run.summary).toMatchObject({ status: 'paused', succeeded: 1, nextIndex: 0 });
    expect(store.resultAt(backlog, 1)?.status).toBe('succeeded');
  });

  it('returns an empty completed run for a start beyond the backlog', async () => {
    const dispatcher = new ScriptedDispatcher();
    const run = await new BatchOrchestrator({ dispatcher, store: new MemoryStore() }).run(makeBacklog(3), {
      startIndex: 7,
    });

    expect(dispatcher.dispatched).toEqual([]);
    expect(run.summary).toMatchObject({ status: 'completed', total: 0, processed: 0, nextIndex: 7 });
  });

  it('rejects invalid slice bounds', async () => {
    const orchestrator = new BatchOrchestrator({ dispatcher: new ScriptedDispatcher(), store: new MemoryStore() });
    await expect(orchestrator.run(makeBacklog(3), { startIndex: -1 })).rejects.toThrow(
      'startIndex must be a non-negative integer, got -1',
    );
    await expect(orchestrator.run(makeBacklog(3), { limit: 1.5 })).rejects.toThrow(
      'limit must be a non-negative integer, got 1.5',
    );
  });

  it('rejects the run when the store cannot persist a result', async () => {
    const store = new MemoryStore();
    vi.spyOn(store, 'writeItemResult').mockRejectedValue(new Error('disk full'));
    const dispatcher = new ScriptedDispatcher();

    await expect(new BatchOrchestrator({ dispatcher, store }).run(makeBacklog(3))).rejects.toThrow('disk full');
    expect(dispatcher.dispatched).toEqual([0]);
    expect(store.summaries).toEqual([]);
  });

  it('rejects the run when the dispatcher throws instead of returning a result', async () => {
    const store = new MemoryStore();
    const dispatcher = new ScriptedDispatcher((item) => {
      if (item.index === 1) throw new Error('pool misconfigured');
      return succeed(item);
    });
    const backlog = makeBacklog(4);

    await expect(new BatchOrchestrator({ dispatcher, store }).run(backlog)).rejects.toThrow('pool misconfigured');
    expect(dispatcher.dispatched).toEqual([0, 1]);
    expect(store.resultAt(backlog, 0)?.status).toBe('succeeded');
    expect(store.resultAt(backlog, 1)).toBeUndefined();
    expect(store.summaries).toEqual([]);
  });

  it('reports progress while running and after', async () => {
    const backlog = makeBacklog(3);
    const store = new MemoryStore();
    let orchestrator: BatchOrchestrator | undefined;
    const seen: number[] = [];
    const dispatcher = new ScriptedDispatcher((item) => {
      const progress = orchestrator!.getProgress();
      expect(progress.running).toBe(true);
      expect(progress.currentIndex).toBe(item.index);
      expect(progress.inFlight).toBe(1);
      seen.push(progress.processed);
      return succeed(item);
    });
    orchestrator = new BatchOrchestrator({ dispatcher, store });

    expect(orchestrator.getProgress().status).toBe('idle');

    await orchestrator.run(backlog);

    expect(seen).toEqual([0, 1, 2]);
    expect(orchestrator.getProgress()).toMatchObject({
      running: false,
      status: 'completed',
      processed: 3,
      succeeded: 3,
      inFlight: 0,
      nextIndex: 3,
    });
  });
});

describe('failureStatus', () => {
  it('separates retryable from permanent kinds', () => {
    expect(failureStatus({ kind: 'rate_limited', message: '' })).toBe('failed_retryable');
    expect(failureStatus({ kind: 'quota_exhausted', message: '' })).toBe('failed_retryable');
    expect(failureStatus({ kind: 'permanent', message: '' })).toBe('failed_permanent');
    expect(failureStatus({ kind: 'unreadable', message: '' })).toBe('failed_permanent');
  });
});
