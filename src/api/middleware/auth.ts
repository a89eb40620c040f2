/**
 * Bearer token check for the status API.
 * An empty key list leaves the API open (it only ever reads state).
 */

import { createMiddleware } from 'hono/factory';

export function createAuthMiddleware(apiKeys: readonly string[]) {
  const keySet = new Set(apiKeys);

  return createMiddleware(async (c, next) => {
    if (keySet.size === 0) {
      await next();
      return;
    }

    const authorization = c.req.header('authorization');

    if (!authorization || !authorization.startsWith('Bearer ')) {
      return c.json(
        {
          error: {
            message: 'Missing API key. Send it in the Authorization header as Bearer <key>.',
            code: 'missing_api_key',
          },
        },
        401,
      );
    }

    if (!keySet.has(authorization.slice('Bearer '.length))) {
      return c.json({ error: { message: 'Invalid API key.', code: 'invalid_api_key' } }, 401);
    }

    await next();
  });
}
