/**
 * Batch runner: wires configuration into the credential pool, dispatcher,
 * result store and orchestrator, optionally serves the status API, and
 * runs one batch.
 */

import { serve, type ServerType } from '@hono/node-server';
import { logger } from './shared/logger.js';
import { ConfigError } from './shared/errors.js';
import { CredentialPool } from './credentials/pool.js';
import { DailyResetScheduler } from './credentials/daily-reset.js';
import { createInferenceClient } from './inference/registry.js';
import { ExtensionTextSource } from './sources/text-source.js';
import { RetryPolicy } from './dispatch/retry-policy.js';
import { RequestDispatcher } from './dispatch/dispatcher.js';
import { createResultStore } from './persistence/factory.js';
import { BatchOrchestrator } from './batch/orchestrator.js';
import { listBacklog } from './backlog/backlog.js';
import { UsageStatsTracker } from './stats/tracker.js';
import { createStatusApp } from './api/app.js';
import type { ExtractionProfile, LoadedConfig } from './config/types.js';
import type { BatchRun } from './batch/types.js';
import type { TextSource } from './sources/text-source.js';
import type { InferenceClient } from './inference/types.js';

export const VERSION = '0.1.0';

/** Command-line values that take precedence over the config file. */
export interface BatchOverrides {
  inputDir?: string;
  outputLocation?: string;
  startIndex?: number;
  limit?: number | null;
  profile?: string;
  concurrency?: number;
  statusPort?: number;
}

/** Replaceable collaborators, mainly for tests. */
export interface RunnerDeps {
  client?: InferenceClient;
  textSource?: TextSource;
}

export function findProfile(config: LoadedConfig, name: string): ExtractionProfile {
  const profile = config.profiles.find((p) => p.name === name);
  if (!profile) {
    const known = config.profiles.map((p) => p.name).join(', ');
    throw new ConfigError(`Unknown profile "${name}" (configured: ${known})`);
  }
  return profile;
}

/**
 * Run one batch with the given config and overrides.
 * Aborting `signal` stops claiming new items; in-flight items still finish.
 */
export async function runBatch(
  config: LoadedConfig,
  overrides: BatchOverrides = {},
  signal?: AbortSignal,
  deps: RunnerDeps = {},
): Promise<BatchRun> {
  const { settings } = config;
  const profile = findProfile(config, overrides.profile ?? config.batch.profile);

  const pool = new CredentialPool(config.apiKeys, {
    cooldownMs: settings.cooldownMs,
    transientFailureThreshold: settings.transientFailureThreshold,
  });
  const resetScheduler = new DailyResetScheduler(pool, settings.quotaResetHourUtc);
  resetScheduler.start();

  const dispatcher = new RequestDispatcher({
    pool,
    client: deps.client ?? createInferenceClient(config.inference),
    textSource: deps.textSource ?? new ExtensionTextSource(),
    profile,
    policy: new RetryPolicy({
      maxAttempts: settings.maxAttempts,
      baseDelayMs: settings.retryDelayMs,
      backoffFactor: settings.retryBackoffFactor,
      maxDelayMs: settings.retryMaxDelayMs,
      jitterRatio: 0.1,
    }),
    requestTimeoutMs: settings.requestTimeoutMs,
    minTextLength: settings.minTextLength,
  });

  const store = createResultStore({
    type: config.batch.output.type,
    location: overrides.outputLocation ?? config.batch.output.location,
  });

  const orchestrator = new BatchOrchestrator({
    dispatcher,
    store,
    concurrency: overrides.concurrency ?? settings.concurrency,
  });
  const stats = new UsageStatsTracker(pool);

  let server: ServerType | undefined;
  const statusPort = overrides.statusPort ?? (config.status.enabled ? config.status.port : undefined);
  if (statusPort !== undefined) {
    const app = createStatusApp({
      version: VERSION,
      apiKeys: config.status.apiKeys,
      stats,
      progress: () => orchestrator.getProgress(),
    });
    server = serve({ fetch: app.fetch, port: statusPort }, (info) => {
      logger.info({ port: info.port }, `Status API listening on port ${info.port}`);
    });
  }

  try {
    const inputDir = overrides.inputDir ?? config.batch.inputDir;
    const backlog = await listBacklog(inputDir, config.batch.extensions);
    logger.info(
      { inputDir, items: backlog.length, profile: profile.name, model: config.inference.model, credentials: pool.size },
      `Found ${backlog.length} document(s) in ${inputDir}, ${pool.size} credential(s) in rotation`,
    );

    const run = await orchestrator.run(backlog, {
      startIndex: overrides.startIndex ?? 0,
      limit: overrides.limit ?? null,
      signal,
    });

    logger.info({ usage: stats.totals() }, 'Credential usage for this run');
    return run;
  } finally {
    resetScheduler.stop();
    await store.close();
    if (server) {
      await closeServer(server);
    }
  }
}

function closeServer(server: ServerType): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => {
      if (err) {
        reject(err);
        return;
      }
      logger.debug('Status API closed');
      resolve();
    });
  });
}
