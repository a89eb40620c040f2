/**
 * Usage statistics over the credential pool.
 * Passive: it only reads pool snapshots and aggregates them; every
 * mutation goes through CredentialPool.report.
 */

import type { CredentialPool } from '../credentials/pool.js';
import type { CredentialSnapshot } from '../credentials/types.js';

/** Pool-wide totals. */
export interface UsageTotals {
  credentials: number;
  active: number;
  coolingDown: number;
  exhausted: number;
  revoked: number;
  totalRequests: number;
  totalSuccesses: number;
  totalRateLimited: number;
  totalFailures: number;
}

/** Per-credential snapshots plus totals, as served to the status API. */
export interface UsageSnapshot {
  credentials: CredentialSnapshot[];
  totals: UsageTotals;
  /** Wall-clock time the snapshot was taken (Unix ms). */
  takenAt: number;
}

/** Narrow read surface the tracker needs from the pool. */
export type SnapshotSource = Pick<CredentialPool, 'snapshot'>;

export class UsageStatsTracker {
  constructor(private readonly source: SnapshotSource) {}

  snapshot(): UsageSnapshot {
    const credentials = this.source.snapshot();
    return {
      credentials,
      totals: summarize(credentials),
      takenAt: Date.now(),
    };
  }

  /** Totals only, for log lines and the run summary. */
  totals(): UsageTotals {
    return summarize(this.source.snapshot());
  }
}

export function summarize(credentials: readonly CredentialSnapshot[]): UsageTotals {
  const totals: UsageTotals = {
    credentials: credentials.length,
    active: 0,
    coolingDown: 0,
    exhausted: 0,
    revoked: 0,
    totalRequests: 0,
    totalSuccesses: 0,
    totalRateLimited: 0,
    totalFailures: 0,
  };

  for (const c of credentials) {
    if (c.state === 'active') totals.active++;
    else if (c.state === 'cooling_down') totals.coolingDown++;
    else if (c.state === 'exhausted') totals.exhausted++;
    else totals.revoked++;

    totals.totalRequests += c.totalRequests;
    totals.totalSuccesses += c.totalSuccesses;
    totals.totalRateLimited += c.totalRateLimited;
    totals.totalFailures += c.totalFailures;
  }

  return totals;
}
