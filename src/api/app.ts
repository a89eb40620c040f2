/**
 * Status API application: /health open, /v1 behind the optional bearer check.
 */

import { Hono } from 'hono';
import { createAuthMiddleware } from './middleware/auth.js';
import { errorHandler, notFoundHandler } from './middleware/error-handler.js';
import { createHealthRoutes } from './routes/health.js';
import { createStatusRoutes } from './routes/status.js';
import type { UsageStatsTracker } from '../stats/tracker.js';
import type { RunProgress } from '../batch/types.js';

export interface StatusAppDeps {
  version: string;
  apiKeys: readonly string[];
  stats: Pick<UsageStatsTracker, 'snapshot'>;
  progress: () => RunProgress;
}

export function createStatusApp(deps: StatusAppDeps): Hono {
  const app = new Hono();

  app.onError(errorHandler);
  app.notFound(notFoundHandler);

  app.route(
    '/health',
    createHealthRoutes({
      version: deps.version,
      credentials: () => deps.stats.snapshot().totals.credentials,
      progress: deps.progress,
    }),
  );

  const v1 = new Hono();
  v1.use('*', createAuthMiddleware(deps.apiKeys));
  v1.route('/', createStatusRoutes({ stats: deps.stats, progress: deps.progress }));

  app.route('/v1', v1);

  return app;
}
