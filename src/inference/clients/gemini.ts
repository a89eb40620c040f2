/**
 * Gemini client (Generative Language REST API).
 * Distinguishes per-minute rate limits from the daily request cap, both of
 * which arrive as 429 RESOURCE_EXHAUSTED, by the quota id in the error details.
 */

import { z } from 'zod';
import { BaseInferenceClient } from '../base-client.js';
import type { ParsedBody, PreparedRequest } from '../base-client.js';
import {
  ContentRejectedError,
  InferenceError,
  InvalidCredentialError,
  MalformedResponseError,
  QuotaExhaustedError,
  RateLimitedError,
} from '../../shared/errors.js';
import { parseDurationToMs, parseRetryAfterHeader } from '../utils.js';

const DEFAULT_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta';

const GenerateContentResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).optional(),
          })
          .optional(),
        finishReason: z.string().optional(),
      }),
    )
    .optional(),
  promptFeedback: z.object({ blockReason: z.string().optional() }).optional(),
  usageMetadata: z
    .object({
      promptTokenCount: z.number().optional(),
      candidatesTokenCount: z.number().optional(),
      totalTokenCount: z.number().optional(),
    })
    .optional(),
});

/** Finish reasons that mean the model refused rather than failed. */
const REJECTING_FINISH_REASONS = new Set(['SAFETY', 'RECITATION', 'BLOCKLIST', 'PROHIBITED_CONTENT', 'SPII']);

export class GeminiClient extends BaseInferenceClient {
  constructor(model: string, baseUrl?: string, temperature?: number) {
    super('gemini', model, baseUrl ?? DEFAULT_BASE_URL, temperature);
  }

  protected override prepareRequest(prompt: string, apiKey: string): PreparedRequest {
    return {
      url: `${this.baseUrl}/models/${encodeURIComponent(this.model)}:generateContent`,
      // Header rather than ?key= so the secret never lands in a logged URL
      headers: { 'x-goog-api-key': apiKey },
      body: {
        contents: [{ role: 'user', parts: [{ text: prompt }] }],
        generationConfig: {
          temperature: this.temperature,
          responseMimeType: 'application/json',
        },
      },
    };
  }

  protected override parseBody(body: unknown): ParsedBody {
    const result = GenerateContentResponseSchema.safeParse(body);
    if (!result.success) {
      throw new MalformedResponseError('Unexpected generateContent response shape', JSON.stringify(body));
    }

    const { candidates, promptFeedback, usageMetadata } = result.data;

    if (promptFeedback?.blockReason) {
      throw new ContentRejectedError(this.providerType, `prompt blocked (${promptFeedback.blockReason})`);
    }

    const candidate = candidates?.[0];
    const text = (candidate?.content?.parts ?? [])
      .map((part) => part.text ?? '')
      .join('');

    if (text.trim() === '') {
      if (candidate?.finishReason && REJECTING_FINISH_REASONS.has(candidate.finishReason)) {
        throw new ContentRejectedError(this.providerType, `finish reason ${candidate.finishReason}`);
      }
      throw new MalformedResponseError('Response contained no text', JSON.stringify(body));
    }

    return {
      text,
      usage: usageMetadata
        ? {
            promptTokens: usageMetadata.promptTokenCount ?? 0,
            completionTokens: usageMetadata.candidatesTokenCount ?? 0,
            totalTokens: usageMetadata.totalTokenCount ?? 0,
          }
        : undefined,
    };
  }

  /**
   * Gemini error mapping:
   *   429 + quota id containing "PerDay"  -> daily cap, QuotaExhaustedError
   *   429 otherwise                        -> RateLimitedError (retry-after header or RetryInfo.retryDelay)
   *   400 API_KEY_INVALID, 401, 403        -> InvalidCredentialError
   */
  protected override toError(status: number, headers: Headers, body: string): InferenceError {
    if (status === 429) {
      if (/PerDay/i.test(body)) {
        return new QuotaExhaustedError(this.providerType, status, body);
      }
      return new RateLimitedError(
        this.providerType,
        body,
        parseRetryAfterHeader(headers.get('retry-after')) ?? parseRetryDelay(body),
      );
    }

    if (
      status === 401 ||
      status === 403 ||
      (status === 400 && /API_KEY_INVALID|API key not valid/i.test(body))
    ) {
      return new InvalidCredentialError(this.providerType, status, body);
    }

    return new InferenceError(this.providerType, status, body);
  }
}

/** Pull `"retryDelay": "37s"` out of a google.rpc.RetryInfo error detail. */
export function parseRetryDelay(body: string): number | undefined {
  const match = body.match(/"retryDelay"\s*:\s*"([^"]+)"/);
  return match?.[1] !== undefined ? parseDurationToMs(match[1]) : undefined;
}
