/**
 * GET /health. No authentication required.
 */

import { Hono } from 'hono';
import type { RunProgress } from '../../batch/types.js';

export interface HealthDeps {
  version: string;
  credentials: () => number;
  progress: () => RunProgress;
}

export function createHealthRoutes(deps: HealthDeps) {
  const app = new Hono();

  app.get('/', (c) => {
    const progress = deps.progress();
    return c.json({
      status: 'ok',
      version: deps.version,
      uptime: process.uptime(),
      credentials: deps.credentials(),
      run: progress.status,
    });
  });

  return app;
}
