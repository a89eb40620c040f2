/**
 * Library entry point. The CLI lives in cli.ts.
 */

export { CredentialPool, fingerprintSecret } from './credentials/pool.js';
export type { CredentialPoolOptions } from './credentials/pool.js';
export { DailyResetScheduler, msUntilNextReset } from './credentials/daily-reset.js';
export type {
  CallOutcome,
  Clock,
  CredentialLease,
  CredentialSnapshot,
  CredentialState,
} from './credentials/types.js';

export { RequestDispatcher } from './dispatch/dispatcher.js';
export type { Dispatcher, DispatchItem, DispatchResult, RequestDispatcherDeps } from './dispatch/dispatcher.js';
export { RetryPolicy, RETRYABLE_KINDS, CREDENTIAL_KINDS, isCredentialFailure } from './dispatch/retry-policy.js';
export { classifyError, toCallOutcome } from './dispatch/classify.js';

export { BatchOrchestrator } from './batch/orchestrator.js';
export type { BatchOrchestratorOptions, RunOptions } from './batch/orchestrator.js';
export type { BatchRun, BatchSummary, ItemResult, RunProgress, WorkItem } from './batch/types.js';
export { itemIdFor, listBacklog } from './backlog/backlog.js';

export { UsageStatsTracker } from './stats/tracker.js';
export type { UsageSnapshot, UsageTotals } from './stats/tracker.js';

export { FileResultStore } from './persistence/file-store.js';
export { SqliteResultStore } from './persistence/sqlite-store.js';
export { createResultStore } from './persistence/factory.js';
export type { ResultStore } from './persistence/types.js';

export { GeminiClient } from './inference/clients/gemini.js';
export { OpenAICompatibleClient } from './inference/clients/openai-compatible.js';
export { createInferenceClient } from './inference/registry.js';
export type { InferenceClient, InferenceResponse } from './inference/types.js';

export { ExtensionTextSource, PdfTextSource, PlainTextSource } from './sources/text-source.js';
export type { TextSource } from './sources/text-source.js';

export { loadConfig, resolveConfigPath } from './config/loader.js';
export type { ExtractionProfile, LoadedConfig } from './config/types.js';

export { createStatusApp } from './api/app.js';
export { runBatch, VERSION } from './runner.js';
export type { BatchOverrides } from './runner.js';
export * from './shared/errors.js';
export type { ClassifiedError, ErrorKind } from './shared/types.js';
