/**
 * Credential pool types.
 * Defines the per-credential state model and the outcomes the dispatcher
 * reports after each call.
 */

/** Health state of a single credential. */
export type CredentialState = 'active' | 'cooling_down' | 'exhausted' | 'revoked';

/** Outcome of one call made through a credential, as reported to the pool. */
export type CallOutcome =
  | { type: 'success' }
  | { type: 'rate_limited'; retryAfterMs?: number }
  | { type: 'quota_exhausted' }
  | { type: 'transient_failure'; error?: string }
  | { type: 'invalid_credential'; error?: string }
  | { type: 'permanent_failure'; error?: string };

/** Source of monotonic time in milliseconds. Wall-clock jumps must not affect it. */
export interface Clock {
  now(): number;
}

/** Default clock backed by performance.now(). */
export const monotonicClock: Clock = {
  now: () => performance.now(),
};

/**
 * A credential borrowed for the duration of one call.
 * The secret is only reachable through a lease and is never logged.
 */
export interface CredentialLease {
  /** Stable label, e.g. "key-2". */
  readonly id: string;
  /** Position of the credential in the pool. */
  readonly slot: number;
  /** Opaque secret to hand to the inference client. */
  readonly secret: string;
}

/** Read-only view of one credential for observability. */
export interface CredentialSnapshot {
  id: string;
  /** First 8 hex chars of the SHA-256 of the secret. */
  fingerprint: string;
  state: CredentialState;
  /** Milliseconds until the cooldown ends; null unless cooling down. */
  cooldownRemainingMs: number | null;
  /** Wall-clock estimate (Unix ms) of the cooldown end; null unless cooling down. */
  cooldownUntil: number | null;
  consecutiveFailures: number;
  totalRequests: number;
  totalSuccesses: number;
  totalRateLimited: number;
  totalFailures: number;
  lastError: string | null;
}

/** Internal mutable entry held by the pool. */
export interface CredentialEntry {
  id: string;
  fingerprint: string;
  secret: string;
  state: CredentialState;
  /** Monotonic timestamp; meaningful only while cooling down. */
  cooldownUntil: number | null;
  consecutiveFailures: number;
  totalRequests: number;
  totalSuccesses: number;
  totalRateLimited: number;
  totalFailures: number;
  lastError: string | null;
}
