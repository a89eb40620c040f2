/**
 * Inference client types.
 * The dispatcher works exclusively through InferenceClient and never sees
 * provider-specific request or error shapes.
 */

/** Token usage reported by the service, when it reports any. */
export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/** Normalized answer from one inference call. */
export interface InferenceResponse {
  /** Raw text produced by the model. */
  text: string;
  /** Time taken for the request in milliseconds. */
  latencyMs: number;
  usage?: TokenUsage;
}

/**
 * Uniform interface for inference services.
 */
export interface InferenceClient {
  /** Provider type discriminator (e.g., 'gemini'). */
  readonly providerType: string;
  /** Model the client asks for. */
  readonly model: string;

  /**
   * Run one prompt through the service with the given credential.
   * @param prompt - Full prompt text.
   * @param apiKey - Secret from a CredentialLease.
   * @param signal - Deadline / cancellation signal for this attempt.
   * @throws RateLimitedError on short-term rate limits.
   * @throws QuotaExhaustedError when the credential's daily quota is used up.
   * @throws InvalidCredentialError when the service rejects the credential.
   * @throws ContentRejectedError when the service refuses the content.
   * @throws MalformedResponseError when the answer carries no text.
   * @throws InferenceError on other non-OK responses.
   */
  infer(prompt: string, apiKey: string, signal?: AbortSignal): Promise<InferenceResponse>;
}
