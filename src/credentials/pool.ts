/**
 * In-memory credential pool with per-credential health state.
 * Hands out credentials in round-robin order and moves them between
 * active, cooling_down, exhausted and revoked based on reported call outcomes.
 *
 * Every public method is synchronous and does no I/O, so on the event loop
 * each call runs to completion before any other pool call starts: acquire,
 * report, resetDaily and snapshot form a single exclusive-access region.
 * The inference call itself always happens outside the pool.
 */

import { createHash } from 'node:crypto';
import { logger } from '../shared/logger.js';
import { NoUsableCredentialError } from '../shared/errors.js';
import { monotonicClock } from './types.js';
import type {
  CallOutcome,
  Clock,
  CredentialEntry,
  CredentialLease,
  CredentialSnapshot,
} from './types.js';

export interface CredentialPoolOptions {
  /** Cooldown applied after a rate limit when the service gives no hint. */
  cooldownMs: number;
  /**
   * Consecutive transient failures tolerated on one credential. Exceeding it
   * moves the credential to cooling_down.
   */
  transientFailureThreshold?: number;
  clock?: Clock;
}

/** Derive the short, non-reversible fingerprint used to tell keys apart in logs. */
export function fingerprintSecret(secret: string): string {
  return createHash('sha256').update(secret).digest('hex').slice(0, 8);
}

export class CredentialPool {
  private readonly entries: CredentialEntry[];
  private readonly cooldownMs: number;
  private readonly transientFailureThreshold: number;
  private readonly clock: Clock;
  /** Slot to consider first on the next acquire. */
  private cursor = 0;

  constructor(secrets: readonly string[], options: CredentialPoolOptions) {
    if (secrets.length === 0) {
      throw new Error('CredentialPool needs at least one credential');
    }

    this.cooldownMs = options.cooldownMs;
    this.transientFailureThreshold = options.transientFailureThreshold ?? 3;
    this.clock = options.clock ?? monotonicClock;
    this.entries = secrets.map((secret, i) => ({
      id: `key-${i + 1}`,
      fingerprint: fingerprintSecret(secret),
      secret,
      state: 'active',
      cooldownUntil: null,
      consecutiveFailures: 0,
      totalRequests: 0,
      totalSuccesses: 0,
      totalRateLimited: 0,
      totalFailures: 0,
      lastError: null,
    }));

    logger.info(
      { credentials: this.entries.map((e) => ({ id: e.id, fingerprint: e.fingerprint })) },
      `Credential pool initialized with ${this.entries.length} credential(s)`,
    );
  }

  /** Number of credentials in the pool, whatever their state. */
  get size(): number {
    return this.entries.length;
  }

  /**
   * Hand out the next active credential in round-robin order.
   * Cooling credentials whose cooldown has elapsed are reclaimed first.
   * @throws NoUsableCredentialError when nothing is active after reclaiming.
   */
  acquire(): CredentialLease {
    this.reclaimExpired();

    const n = this.entries.length;
    for (let i = 0; i < n; i++) {
      const slot = (this.cursor + i) % n;
      const entry = this.entries[slot];
      if (entry !== undefined && entry.state === 'active') {
        this.cursor = (slot + 1) % n;
        return { id: entry.id, slot, secret: entry.secret };
      }
    }

    const retryInMs = this.earliestCooldownRemaining();
    logger.warn(
      { credentials: n, retryInMs },
      'No usable credential: all are cooling down, exhausted or revoked',
    );
    throw new NoUsableCredentialError(n, retryInMs);
  }

  /** Record the outcome of a call made with the given lease. */
  report(lease: CredentialLease, outcome: CallOutcome): void {
    const entry = this.entries[lease.slot];
    if (entry === undefined || entry.id !== lease.id) {
      throw new Error(`Unknown credential lease ${lease.id}`);
    }

    entry.totalRequests++;

    switch (outcome.type) {
      case 'success':
        entry.totalSuccesses++;
        entry.consecutiveFailures = 0;
        return;

      case 'rate_limited': {
        entry.totalRateLimited++;
        const cooldownMs = outcome.retryAfterMs ?? this.cooldownMs;
        this.coolDown(entry, cooldownMs, 'rate limited');
        return;
      }

      case 'quota_exhausted':
        entry.totalRateLimited++;
        entry.lastError = 'daily quota exhausted';
        if (entry.state !== 'revoked') {
          entry.state = 'exhausted';
          entry.cooldownUntil = null;
          logger.warn(
            { credential: entry.id, fingerprint: entry.fingerprint },
            `Credential ${entry.id} exhausted its daily quota`,
          );
        }
        return;

      case 'transient_failure':
        entry.totalFailures++;
        entry.consecutiveFailures++;
        entry.lastError = outcome.error ?? 'transient failure';
        if (entry.consecutiveFailures > this.transientFailureThreshold) {
          entry.consecutiveFailures = 0;
          this.coolDown(entry, this.cooldownMs, 'transient failures exceeded threshold');
        }
        return;

      case 'invalid_credential':
        entry.totalFailures++;
        entry.lastError = outcome.error ?? 'invalid credential';
        if (entry.state !== 'revoked') {
          entry.state = 'revoked';
          entry.cooldownUntil = null;
          logger.error(
            { credential: entry.id, fingerprint: entry.fingerprint },
            `Credential ${entry.id} rejected by the service, retired for this run`,
          );
        }
        return;

      case 'permanent_failure':
        // Not the credential's fault: count it, leave the state alone.
        entry.totalFailures++;
        entry.lastError = outcome.error ?? 'permanent failure';
        return;
    }
  }

  /**
   * Restore every exhausted credential to active.
   * Triggered externally at the quota day boundary. Revoked credentials stay revoked.
   * @returns Number of credentials restored.
   */
  resetDaily(): number {
    let restored = 0;
    for (const entry of this.entries) {
      if (entry.state === 'exhausted') {
        entry.state = 'active';
        entry.consecutiveFailures = 0;
        restored++;
      }
    }

    logger.info({ restored }, `Daily quota reset restored ${restored} credential(s)`);
    return restored;
  }

  /** Read-only copies of every credential's state and counters. No secrets. */
  snapshot(): CredentialSnapshot[] {
    this.reclaimExpired();

    const now = this.clock.now();
    const wallNow = Date.now();

    return this.entries.map((entry) => {
      const remaining =
        entry.state === 'cooling_down' && entry.cooldownUntil !== null
          ? Math.max(0, entry.cooldownUntil - now)
          : null;

      return {
        id: entry.id,
        fingerprint: entry.fingerprint,
        state: entry.state,
        cooldownRemainingMs: remaining,
        cooldownUntil: remaining === null ? null : Math.round(wallNow + remaining),
        consecutiveFailures: entry.consecutiveFailures,
        totalRequests: entry.totalRequests,
        totalSuccesses: entry.totalSuccesses,
        totalRateLimited: entry.totalRateLimited,
        totalFailures: entry.totalFailures,
        lastError: entry.lastError,
      };
    });
  }

  private coolDown(entry: CredentialEntry, cooldownMs: number, reason: string): void {
    if (entry.state === 'revoked' || entry.state === 'exhausted') {
      return;
    }

    entry.state = 'cooling_down';
    entry.cooldownUntil = this.clock.now() + cooldownMs;
    entry.lastError = reason;

    logger.info(
      { credential: entry.id, fingerprint: entry.fingerprint, cooldownMs, reason },
      `Credential ${entry.id} cooling down for ${cooldownMs}ms (${reason})`,
    );
  }

  /** Promote cooling credentials whose cooldown has elapsed. */
  private reclaimExpired(): void {
    const now = this.clock.now();

    for (const entry of this.entries) {
      if (
        entry.state === 'cooling_down' &&
        entry.cooldownUntil !== null &&
        now >= entry.cooldownUntil
      ) {
        entry.state = 'active';
        entry.cooldownUntil = null;
        logger.debug({ credential: entry.id }, `Credential ${entry.id} available again`);
      }
    }
  }

  private earliestCooldownRemaining(): number | null {
    const now = this.clock.now();
    let earliest: number | null = null;

    for (const entry of this.entries) {
      if (entry.state === 'cooling_down' && entry.cooldownUntil !== null) {
        const remaining = Math.max(0, entry.cooldownUntil - now);
        if (earliest === null || remaining < earliest) {
          earliest = remaining;
        }
      }
    }

    return earliest;
  }
}
