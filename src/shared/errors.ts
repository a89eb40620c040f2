/**
 * Custom error classes.
 * Inference clients throw the specific subclasses; the dispatcher classifies
 * them into an ErrorKind (see dispatch/classify.ts).
 */

/** Error thrown when config validation or loading fails. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Generic inference service failure carrying the HTTP status and body. */
export class InferenceError extends Error {
  public readonly statusCode: number;
  public readonly responseBody: string;

  constructor(provider: string, statusCode: number, responseBody: string) {
    super(`Inference service ${provider} returned ${statusCode}`);
    this.name = 'InferenceError';
    this.statusCode = statusCode;
    this.responseBody = responseBody;
  }
}

/** The service refused the call because the credential hit its short-term rate limit. */
export class RateLimitedError extends InferenceError {
  public readonly retryAfterMs?: number;

  constructor(provider: string, responseBody: string = '', retryAfterMs?: number) {
    super(provider, 429, responseBody);
    this.name = 'RateLimitedError';
    this.retryAfterMs = retryAfterMs;
  }
}

/** The credential used up its daily quota; it stays unusable until the daily reset. */
export class QuotaExhaustedError extends InferenceError {
  constructor(provider: string, statusCode: number, responseBody: string = '') {
    super(provider, statusCode, responseBody);
    this.name = 'QuotaExhaustedError';
  }
}

/** The service rejected the credential itself (malformed, revoked or unknown key). */
export class InvalidCredentialError extends InferenceError {
  constructor(provider: string, statusCode: number, responseBody: string = '') {
    super(provider, statusCode, responseBody);
    this.name = 'InvalidCredentialError';
  }
}

/** The model answered, but the answer holds no parseable JSON object. */
export class MalformedResponseError extends Error {
  public readonly responseText: string;

  constructor(message: string, responseText: string) {
    super(message);
    this.name = 'MalformedResponseError';
    this.responseText = responseText;
  }
}

/** The document could not be turned into text. */
export class UnreadableSourceError extends Error {
  public readonly sourceRef: string;

  constructor(sourceRef: string, reason: string) {
    super(`Cannot read "${sourceRef}": ${reason}`);
    this.name = 'UnreadableSourceError';
    this.sourceRef = sourceRef;
  }
}

/** Thrown by the pool when every credential is cooling down, exhausted or revoked. */
export class NoUsableCredentialError extends Error {
  /** Milliseconds until the earliest cooldown ends, or null if none will end on its own. */
  public readonly retryInMs: number | null;

  constructor(total: number, retryInMs: number | null) {
    const hint =
      retryInMs === null
        ? 'no credential will recover before the daily reset'
        : `earliest cooldown ends in ${Math.ceil(retryInMs)}ms`;
    super(`No usable credential among ${total} configured (${hint})`);
    this.name = 'NoUsableCredentialError';
    this.retryInMs = retryInMs;
  }
}

/** The service refused to answer for reasons tied to the document (safety block, content filter). */
export class ContentRejectedError extends Error {
  constructor(provider: string, reason: string) {
    super(`Inference service ${provider} rejected the content: ${reason}`);
    this.name = 'ContentRejectedError';
  }
}
