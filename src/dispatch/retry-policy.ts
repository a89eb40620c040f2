/**
 * Reusable retry policy: attempt bound, backoff and which error kinds are
 * worth another attempt. Kept apart from the dispatcher so retry semantics
 * are tested once, independent of the batch driver.
 */

import type { ClassifiedError, ErrorKind } from '../shared/types.js';

/** Kinds that a later run can still fix; an item failing with one stays retryable. */
export const RETRYABLE_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>([
  'rate_limited',
  'quota_exhausted',
  'invalid_credential',
  'transient',
]);

/**
 * Failures that belong to the credential, not the item. The dispatcher moves
 * on to another credential without spending the item's attempt budget.
 */
export const CREDENTIAL_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>([
  'rate_limited',
  'quota_exhausted',
  'invalid_credential',
]);

export function isCredentialFailure(error: ClassifiedError): boolean {
  return CREDENTIAL_KINDS.has(error.kind);
}

export interface RetryPolicyOptions {
  /** Total attempts including the first one. */
  maxAttempts: number;
  /** Delay before the second attempt. */
  baseDelayMs: number;
  /** Multiplier applied per further attempt (1 = constant delay). */
  backoffFactor?: number;
  /** Upper bound on a single delay. */
  maxDelayMs?: number;
  /** Extra random delay as a fraction of the computed delay, 0..1. */
  jitterRatio?: number;
  randomFn?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

export class RetryPolicy {
  public readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly backoffFactor: number;
  private readonly maxDelayMs: number;
  private readonly jitterRatio: number;
  private readonly randomFn: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: RetryPolicyOptions) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new Error(`maxAttempts must be a positive integer, got ${options.maxAttempts}`);
    }

    this.maxAttempts = options.maxAttempts;
    this.baseDelayMs = Math.max(0, options.baseDelayMs);
    this.backoffFactor = Math.max(1, options.backoffFactor ?? 1);
    this.maxDelayMs = options.maxDelayMs ?? Number.POSITIVE_INFINITY;
    this.jitterRatio = Math.min(1, Math.max(0, options.jitterRatio ?? 0));
    this.randomFn = options.randomFn ?? Math.random;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Whether another attempt should follow the `attempt`-th (1-based) failure
   * that counts against the budget. Only transient failures do; credential
   * failures rotate instead and everything else is final.
   */
  shouldRetry(error: ClassifiedError, attempt: number): boolean {
    return attempt < this.maxAttempts && error.kind === 'transient';
  }

  /** Delay to wait after failed `attempt` (1-based) before the next one. */
  delayFor(attempt: number): number {
    const exponent = Math.max(0, attempt - 1);
    const backoff = Math.min(this.maxDelayMs, this.baseDelayMs * Math.pow(this.backoffFactor, exponent));
    const random = Math.min(1, Math.max(0, this.randomFn()));
    return Math.round(backoff + backoff * this.jitterRatio * random);
  }

  /** Sleep for `delayFor(attempt)`; resolves with the delay used. */
  async wait(attempt: number): Promise<number> {
    const delayMs = this.delayFor(attempt);
    if (delayMs > 0) {
      await this.sleep(delayMs);
    }
    return delayMs;
  }
}
