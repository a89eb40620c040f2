/**
 * OpenAI-compatible chat completions client.
 * Works against any endpoint exposing POST {baseUrl}/chat/completions.
 */

import { z } from 'zod';
import { BaseInferenceClient } from '../base-client.js';
import type { ParsedBody, PreparedRequest } from '../base-client.js';
import {
  ContentRejectedError,
  InferenceError,
  MalformedResponseError,
  QuotaExhaustedError,
  RateLimitedError,
} from '../../shared/errors.js';
import { parseDurationToMs, parseRetryAfterHeader } from '../utils.js';

const DEFAULT_BASE_URL = 'https://api.openai.com/v1';

const ChatCompletionResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({ content: z.string().nullable().optional() }),
      finish_reason: z.string().nullable().optional(),
    }),
  ),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .optional(),
});

export class OpenAICompatibleClient extends BaseInferenceClient {
  constructor(model: string, baseUrl?: string, temperature?: number) {
    super('openai-compatible', model, baseUrl ?? DEFAULT_BASE_URL, temperature);
  }

  protected override prepareRequest(prompt: string, apiKey: string): PreparedRequest {
    return {
      url: `${this.baseUrl}/chat/completions`,
      headers: { Authorization: `Bearer ${apiKey}` },
      body: {
        model: this.model,
        messages: [{ role: 'user', content: prompt }],
        temperature: this.temperature,
        response_format: { type: 'json_object' },
        stream: false,
      },
    };
  }

  protected override parseBody(body: unknown): ParsedBody {
    const result = ChatCompletionResponseSchema.safeParse(body);
    if (!result.success) {
      throw new MalformedResponseError('Unexpected chat completion response shape', JSON.stringify(body));
    }

    const choice = result.data.choices[0];
    const text = choice?.message.content ?? '';

    if (text.trim() === '') {
      if (choice?.finish_reason === 'content_filter') {
        throw new ContentRejectedError(this.providerType, 'finish reason content_filter');
      }
      throw new MalformedResponseError('Response contained no text', JSON.stringify(body));
    }

    const usage = result.data.usage;
    return {
      text,
      usage: usage
        ? {
            promptTokens: usage.prompt_tokens,
            completionTokens: usage.completion_tokens,
            totalTokens: usage.total_tokens,
          }
        : undefined,
    };
  }

  /**
   * 429 with code "insufficient_quota" is a spent quota, not a rate limit.
   * Otherwise the cooldown hint comes from retry-after, then x-ratelimit-reset-requests.
   */
  protected override toError(status: number, headers: Headers, body: string): InferenceError {
    if (status === 429) {
      if (body.includes('insufficient_quota')) {
        return new QuotaExhaustedError(this.providerType, status, body);
      }

      const resetRequests = headers.get('x-ratelimit-reset-requests');
      return new RateLimitedError(
        this.providerType,
        body,
        parseRetryAfterHeader(headers.get('retry-after')) ??
          (resetRequests !== null ? parseDurationToMs(resetRequests) : undefined),
      );
    }

    return super.toError(status, headers, body);
  }
}
