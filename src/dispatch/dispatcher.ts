/**
 * Request dispatcher: runs one work item through the inference service.
 * Reads the document text, builds the prompt, then loops over attempts,
 * each with a freshly acquired credential, reporting every outcome to the
 * credential pool. A rate-limited, exhausted or rejected credential is
 * swapped for the next one at once and does not count as an attempt; only
 * transient failures use the retry budget. Callers only see the final result.
 */

import { logger } from '../shared/logger.js';
import { NoUsableCredentialError, UnreadableSourceError } from '../shared/errors.js';
import { buildExtractionPrompt } from '../extraction/prompt.js';
import { parseModelJson } from '../extraction/response.js';
import { normalizeFields } from '../extraction/normalize.js';
import { classifyError, toCallOutcome } from './classify.js';
import { isCredentialFailure, type RetryPolicy } from './retry-policy.js';
import type { ExtractionProfile } from '../config/types.js';
import type { CredentialPool } from '../credentials/pool.js';
import type { CredentialLease } from '../credentials/types.js';
import type { InferenceClient } from '../inference/types.js';
import type { TextSource } from '../sources/text-source.js';
import type { AttemptRecord, ClassifiedError, ExtractedPayload } from '../shared/types.js';
import type { WorkItem } from '../batch/types.js';

export type DispatchResult =
  | { ok: true; payload: ExtractedPayload; credentialId: string; attempts: AttemptRecord[] }
  | { ok: false; error: ClassifiedError; attempts: AttemptRecord[] };

/** The work item the dispatcher processes. */
export type DispatchItem = WorkItem;

/** Anything that can process one item (the orchestrator depends on this, not the class). */
export interface Dispatcher {
  dispatch(item: DispatchItem): Promise<DispatchResult>;
}

export interface RequestDispatcherDeps {
  pool: Pick<CredentialPool, 'acquire' | 'report'>;
  client: InferenceClient;
  textSource: TextSource;
  profile: ExtractionProfile;
  policy: RetryPolicy;
  /** Deadline for a single attempt. */
  requestTimeoutMs: number;
  /** Documents with less extracted text than this are unreadable. */
  minTextLength?: number;
  /**
   * Credential failures tolerated for one item before it is given up as
   * failed_retryable. Normally the pool runs dry first. Default 100.
   */
  maxRotations?: number;
}

export class RequestDispatcher implements Dispatcher {
  private readonly deps: RequestDispatcherDeps;
  private readonly minTextLength: number;
  private readonly maxRotations: number;

  constructor(deps: RequestDispatcherDeps) {
    this.deps = deps;
    this.minTextLength = deps.minTextLength ?? 0;
    this.maxRotations = deps.maxRotations ?? 100;
  }

  async dispatch(item: DispatchItem): Promise<DispatchResult> {
    const { pool, client, profile, policy, requestTimeoutMs } = this.deps;
    const attempts: AttemptRecord[] = [];

    const text = await this.readText(item);
    if (typeof text !== 'string') {
      logger.warn(
        { item: item.itemId, index: item.index, error: text.message },
        `Item ${item.index} unreadable, not dispatching`,
      );
      return { ok: false, error: text, attempts };
    }

    const prompt = buildExtractionPrompt(profile, text);
    let budgetUsed = 0;
    let rotations = 0;

    for (let attempt = 1; ; attempt++) {
      let lease: CredentialLease;
      try {
        lease = pool.acquire();
      } catch (error: unknown) {
        if (error instanceof NoUsableCredentialError) {
          // No credential will appear synchronously; let the orchestrator pause
          const classified = classifyError(error);
          attempts.push({ attempt, credentialId: null, outcome: classified.kind, latencyMs: 0, error: classified.message });
          return { ok: false, error: classified, attempts };
        }
        throw error;
      }

      const attemptStart = performance.now();

      try {
        // Network call happens with no pool state held
        const response = await client.infer(prompt, lease.secret, AbortSignal.timeout(requestTimeoutMs));
        const payload = normalizeFields(parseModelJson(response.text), profile);
        const latencyMs = Math.round(performance.now() - attemptStart);

        pool.report(lease, { type: 'success' });
        attempts.push({ attempt, credentialId: lease.id, outcome: 'success', latencyMs });

        logger.info(
          { item: item.itemId, index: item.index, credential: lease.id, attempt, latencyMs },
          `Item ${item.index} extracted via ${lease.id} (${attempt} attempt(s), ${latencyMs}ms)`,
        );

        return { ok: true, payload, credentialId: lease.id, attempts };
      } catch (error: unknown) {
        const latencyMs = Math.round(performance.now() - attemptStart);
        const classified = classifyError(error);

        pool.report(lease, toCallOutcome(classified));
        attempts.push({
          attempt,
          credentialId: lease.id,
          outcome: classified.kind,
          latencyMs,
          error: classified.message,
        });

        if (isCredentialFailure(classified)) {
          rotations++;
          if (rotations > this.maxRotations) {
            logger.warn(
              { item: item.itemId, index: item.index, rotations, kind: classified.kind },
              `Item ${item.index} gave up after ${rotations} credential rotations`,
            );
            return { ok: false, error: classified, attempts };
          }
          logger.info(
            { item: item.itemId, index: item.index, credential: lease.id, attempt, kind: classified.kind },
            `Item ${item.index}: ${lease.id} unavailable (${classified.kind}), rotating to the next credential`,
          );
          continue;
        }

        budgetUsed++;
        if (!policy.shouldRetry(classified, budgetUsed)) {
          logger.warn(
            { item: item.itemId, index: item.index, credential: lease.id, attempt, kind: classified.kind, error: classified.message },
            `Item ${item.index} failed (${classified.kind}) after ${attempt} attempt(s)`,
          );
          return { ok: false, error: classified, attempts };
        }

        const delayMs = await policy.wait(budgetUsed);
        logger.info(
          { item: item.itemId, index: item.index, credential: lease.id, attempt, kind: classified.kind, delayMs },
          `Item ${item.index} attempt ${attempt} via ${lease.id} failed (${classified.kind}), retried after ${delayMs}ms`,
        );
      }
    }
  }

  /** Read and check the document text; returns the classified error instead of throwing. */
  private async readText(item: DispatchItem): Promise<string | ClassifiedError> {
    let text: string;
    try {
      text = await this.deps.textSource.getText(item.sourceRef);
    } catch (error: unknown) {
      if (error instanceof UnreadableSourceError) {
        return classifyError(error);
      }
      const message = error instanceof Error ? error.message : String(error);
      return { kind: 'unreadable', message: `Cannot read "${item.sourceRef}": ${message}` };
    }

    if (text.trim().length < this.minTextLength) {
      return {
        kind: 'unreadable',
        message: `Extracted text too short (${text.trim().length} < ${this.minTextLength} chars)`,
      };
    }

    return text;
  }
}
