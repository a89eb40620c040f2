/**
 * Error handler for the status API: every failure becomes
 * `{ error: { message, code } }` JSON.
 */

import type { ErrorHandler, NotFoundHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { logger } from '../../shared/logger.js';
import { ConfigError } from '../../shared/errors.js';

export const errorHandler: ErrorHandler = (err, c) => {
  if (err instanceof HTTPException) {
    return c.json({ error: { message: err.message, code: `http_${err.status}` } }, err.status);
  }

  if (err instanceof ConfigError) {
    logger.error({ err }, 'Configuration error');
    return c.json({ error: { message: 'Internal configuration error', code: 'config_error' } }, 500);
  }

  // Full details go to the log only
  logger.error({ err }, 'Unhandled error');
  return c.json({ error: { message: 'Internal server error', code: 'internal_error' } }, 500);
};

export const notFoundHandler: NotFoundHandler = (c) => {
  return c.json({ error: { message: `No route for ${c.req.method} ${c.req.path}`, code: 'not_found' } }, 404);
};
