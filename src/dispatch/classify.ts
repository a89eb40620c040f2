/**
 * Error classification.
 * Maps whatever an attempt threw onto an ErrorKind, and an ErrorKind onto
 * the outcome reported to the credential pool.
 */

import {
  ContentRejectedError,
  InferenceError,
  InvalidCredentialError,
  MalformedResponseError,
  NoUsableCredentialError,
  QuotaExhaustedError,
  RateLimitedError,
  UnreadableSourceError,
} from '../shared/errors.js';
import type { CallOutcome } from '../credentials/types.js';
import type { ClassifiedError } from '../shared/types.js';

/** HTTP statuses that say "try again later" rather than "this request is wrong". */
const TRANSIENT_STATUSES = new Set([408, 409, 425, 500, 502, 503, 504]);

export function classifyError(error: unknown): ClassifiedError {
  // Order matters: the specific InferenceError subclasses come before the base class
  if (error instanceof RateLimitedError) {
    return {
      kind: 'rate_limited',
      message: error.message,
      statusCode: error.statusCode,
      retryAfterMs: error.retryAfterMs,
    };
  }

  if (error instanceof QuotaExhaustedError) {
    return { kind: 'quota_exhausted', message: error.message, statusCode: error.statusCode };
  }

  if (error instanceof InvalidCredentialError) {
    return { kind: 'invalid_credential', message: error.message, statusCode: error.statusCode };
  }

  if (error instanceof InferenceError) {
    const transient = TRANSIENT_STATUSES.has(error.statusCode) || error.statusCode >= 500;
    return {
      kind: transient ? 'transient' : 'permanent',
      message: `${error.message}: ${error.responseBody.slice(0, 200)}`,
      statusCode: error.statusCode,
    };
  }

  if (error instanceof ContentRejectedError) {
    return { kind: 'permanent', message: error.message };
  }

  // Models occasionally return broken JSON; another attempt usually fixes it
  if (error instanceof MalformedResponseError) {
    return { kind: 'transient', message: error.message };
  }

  if (error instanceof UnreadableSourceError) {
    return { kind: 'unreadable', message: error.message };
  }

  if (error instanceof NoUsableCredentialError) {
    return {
      kind: 'no_usable_credential',
      message: error.message,
      retryAfterMs: error.retryInMs ?? undefined,
    };
  }

  // Deadline hit: transient, never a reason to blame the document
  if (error instanceof Error && error.name === 'TimeoutError') {
    return { kind: 'transient', message: 'Inference request timed out' };
  }

  // Network failures (fetch TypeError, ECONNRESET, DNS) and anything unexpected
  const message = error instanceof Error ? error.message : String(error);
  return { kind: 'transient', message };
}

/** Translate a classified failure into the outcome the pool records for the credential used. */
export function toCallOutcome(error: ClassifiedError): CallOutcome {
  switch (error.kind) {
    case 'rate_limited':
      return { type: 'rate_limited', retryAfterMs: error.retryAfterMs };
    case 'quota_exhausted':
      return { type: 'quota_exhausted' };
    case 'invalid_credential':
      return { type: 'invalid_credential', error: error.message };
    case 'transient':
      return { type: 'transient_failure', error: error.message };
    case 'permanent':
    case 'unreadable':
    case 'no_usable_credential':
      return { type: 'permanent_failure', error: error.message };
  }
}
