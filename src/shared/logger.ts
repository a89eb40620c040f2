/**
 * Process-wide pino logger.
 * Import it before anything logs: the redaction paths keep API keys out of
 * every line. Code refers to credentials by id and fingerprint only.
 */

import pino, { type DestinationStream, type Logger } from 'pino';

/** Object paths whose values are replaced with "[REDACTED]". */
export const REDACT_PATHS = [
  'req.headers.authorization',
  'req.headers["x-goog-api-key"]',
  'apiKey',
  'secret',
  'apiKeys',
  '*.apiKey',
  '*.secret',
  '*.apiKeys',
];

export type LogFormat = 'json' | 'pretty';

export interface LoggerOptions {
  level?: string;
  format?: LogFormat;
  /** Write here instead of stdout (JSON only). */
  destination?: DestinationStream;
}

/** LOG_FORMAT wins; otherwise pretty output on an interactive terminal outside production. */
export function resolveLogFormat(env: NodeJS.ProcessEnv = process.env): LogFormat {
  const explicit = env['LOG_FORMAT'];
  if (explicit === 'json' || explicit === 'pretty') {
    return explicit;
  }
  return env['NODE_ENV'] !== 'production' && process.stdout.isTTY === true ? 'pretty' : 'json';
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const base: pino.LoggerOptions = {
    name: 'doc-extract',
    level: options.level ?? 'info',
    redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
  };

  if (options.destination) {
    return pino(base, options.destination);
  }

  if (options.format === 'pretty') {
    return pino({
      ...base,
      transport: {
        target: 'pino-pretty',
        options: { translateTime: 'HH:MM:ss.l', ignore: 'pid,hostname', colorize: true },
      },
    });
  }

  return pino(base);
}

export const logger = createLogger({
  level: process.env['LOG_LEVEL'] ?? 'info',
  format: resolveLogFormat(),
});
