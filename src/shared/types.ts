/**
 * Shared type definitions used across the pool, dispatcher and orchestrator.
 */

/**
 * Normalized failure categories.
 * The dispatcher decides retry and rotation behaviour from the kind alone,
 * never from provider-specific error shapes.
 */
export type ErrorKind =
  | 'no_usable_credential'
  | 'rate_limited'
  | 'quota_exhausted'
  | 'transient'
  | 'permanent'
  | 'invalid_credential'
  | 'unreadable';

/** A failure after classification. */
export interface ClassifiedError {
  kind: ErrorKind;
  message: string;
  /** Service-provided hint for how long the credential should rest, in ms. */
  retryAfterMs?: number;
  /** HTTP status returned by the service, when there was one. */
  statusCode?: number;
}

/** Field name to extracted (cleaned) string value. */
export type ExtractedPayload = Record<string, string>;

/** Record of a single dispatch attempt, kept for logs and persisted results. */
export interface AttemptRecord {
  attempt: number;
  credentialId: string | null;
  outcome: 'success' | ErrorKind;
  latencyMs: number;
  error?: string;
}
