/**
 * Read-only run status: credential pool usage and batch progress.
 */

import { Hono } from 'hono';
import type { UsageStatsTracker } from '../../stats/tracker.js';
import type { RunProgress } from '../../batch/types.js';

export interface StatusRouteDeps {
  stats: Pick<UsageStatsTracker, 'snapshot'>;
  progress: () => RunProgress;
}

export function createStatusRoutes(deps: StatusRouteDeps) {
  const app = new Hono();

  // GET /credentials - per-credential state and counters (never secrets)
  app.get('/credentials', (c) => c.json(deps.stats.snapshot()));

  // GET /progress - the current or last batch run
  app.get('/progress', (c) => c.json(deps.progress()));

  return app;
}
