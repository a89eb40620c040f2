/**
 * Abstract base client with shared HTTP request logic.
 * Concrete clients build the provider-specific request, pull the model text
 * out of the response body and map error responses onto the error classes
 * the dispatcher classifies.
 */

import { logger } from '../shared/logger.js';
import {
  InferenceError,
  InvalidCredentialError,
  RateLimitedError,
} from '../shared/errors.js';
import { parseRetryAfterHeader } from './utils.js';
import type { InferenceClient, InferenceResponse, TokenUsage } from './types.js';

/** Provider-specific HTTP request. */
export interface PreparedRequest {
  url: string;
  headers: Record<string, string>;
  body: Record<string, unknown>;
}

/** Text and usage pulled out of a successful response body. */
export interface ParsedBody {
  text: string;
  usage?: TokenUsage;
}

export abstract class BaseInferenceClient implements InferenceClient {
  public readonly providerType: string;
  public readonly model: string;
  public readonly baseUrl: string;
  protected readonly temperature: number;

  constructor(providerType: string, model: string, baseUrl: string, temperature: number = 0) {
    this.providerType = providerType;
    this.model = model;
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.temperature = temperature;
  }

  /**
   * Send one prompt to the service.
   * Handles headers, latency measurement, and error detection.
   */
  async infer(prompt: string, apiKey: string, signal?: AbortSignal): Promise<InferenceResponse> {
    const request = this.prepareRequest(prompt, apiKey);

    logger.debug(
      { provider: this.providerType, model: this.model, url: request.url },
      'Sending inference request',
    );

    const start = performance.now();

    const response = await fetch(request.url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...request.headers,
      },
      body: JSON.stringify(request.body),
      signal,
    });

    const latencyMs = Math.round(performance.now() - start);

    if (!response.ok) {
      const responseBody = await response.text();
      const error = this.toError(response.status, response.headers, responseBody);
      logger.warn(
        { provider: this.providerType, model: this.model, status: response.status, latencyMs, error: error.name },
        'Inference service returned error',
      );
      throw error;
    }

    const body: unknown = await response.json();
    const parsed = this.parseBody(body);

    logger.debug(
      { provider: this.providerType, model: this.model, latencyMs, usage: parsed.usage },
      'Inference request succeeded',
    );

    return { text: parsed.text, usage: parsed.usage, latencyMs };
  }

  /**
   * Map an error response onto an error class.
   * Default: 429 is a rate limit (honouring retry-after), 401/403 reject the
   * credential, anything else is a plain InferenceError classified by status.
   */
  protected toError(status: number, headers: Headers, body: string): InferenceError {
    if (status === 429) {
      return new RateLimitedError(
        this.providerType,
        body,
        parseRetryAfterHeader(headers.get('retry-after')),
      );
    }

    if (status === 401 || status === 403) {
      return new InvalidCredentialError(this.providerType, status, body);
    }

    return new InferenceError(this.providerType, status, body);
  }

  /** Build the provider-specific request for a prompt. */
  protected abstract prepareRequest(prompt: string, apiKey: string): PreparedRequest;

  /**
   * Extract the model text from a successful response body.
   * @throws MalformedResponseError when there is no text.
   * @throws ContentRejectedError when the provider refused the content.
   */
  protected abstract parseBody(body: unknown): ParsedBody;
}
