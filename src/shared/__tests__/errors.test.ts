import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  ContentRejectedError,
  InferenceError,
  InvalidCredentialError,
  MalformedResponseError,
  NoUsableCredentialError,
  QuotaExhaustedError,
  RateLimitedError,
  UnreadableSourceError,
} from '../errors.js';

describe('ConfigError', () => {
  it('creates an error with the correct name and message', () => {
    const err = new ConfigError('Bad config');
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('ConfigError');
    expect(err.message).toBe('Bad config');
  });
});

describe('InferenceError family', () => {
  it('carries status and body', () => {
    const err = new InferenceError('gemini', 500, '{"error":"internal"}');
    expect(err.name).toBe('InferenceError');
    expect(err.message).toBe('Inference service gemini returned 500');
    expect(err.statusCode).toBe(500);
    expect(err.responseBody).toBe('{"error":"internal"}');
  });

  it('makes rate limits 429 with an optional retry hint', () => {
    const err = new RateLimitedError('gemini', 'slow down', 4000);
    expect(err).toBeInstanceOf(InferenceError);
    expect(err.name).toBe('RateLimitedError');
    expect(err.statusCode).toBe(429);
    expect(err.retryAfterMs).toBe(4000);
    expect(new RateLimitedError('gemini').retryAfterMs).toBeUndefined();
  });

  it('keeps quota and credential errors distinct', () => {
    const quota = new QuotaExhaustedError('gemini', 429);
    const invalid = new InvalidCredentialError('gemini', 403, 'denied');
    expect(quota).toBeInstanceOf(InferenceError);
    expect(quota.name).toBe('QuotaExhaustedError');
    expect(quota.responseBody).toBe('');
    expect(invalid.name).toBe('InvalidCredentialError');
    expect(invalid).not.toBeInstanceOf(RateLimitedError);
  });
});

describe('NoUsableCredentialError', () => {
  it('names the earliest cooldown', () => {
    const err = new NoUsableCredentialError(3, 1500.2);
    expect(err.message).toBe('No usable credential among 3 configured (earliest cooldown ends in 1501ms)');
    expect(err.retryInMs).toBe(1500.2);
  });

  it('says when nothing recovers before the daily reset', () => {
    const err = new NoUsableCredentialError(2, null);
    expect(err.message).toBe(
      'No usable credential among 2 configured (no credential will recover before the daily reset)',
    );
  });
});

describe('document errors', () => {
  it('formats unreadable sources', () => {
    const err = new UnreadableSourceError('input/a.pdf', 'ENOENT');
    expect(err.message).toBe('Cannot read "input/a.pdf": ENOENT');
    expect(err.sourceRef).toBe('input/a.pdf');
  });

  it('keeps the raw text of a malformed response', () => {
    const err = new MalformedResponseError('No JSON object found in response', 'Sorry');
    expect(err.name).toBe('MalformedResponseError');
    expect(err.responseText).toBe('Sorry');
  });

  it('formats content rejection', () => {
    expect(new ContentRejectedError('gemini', 'finish reason SAFETY').message).toBe(
      'Inference service gemini rejected the content: finish reason SAFETY',
    );
  });
});
