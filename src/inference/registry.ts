/**
 * Inference client factory: builds the configured client once at startup.
 */

import { logger } from '../shared/logger.js';
import { ConfigError } from '../shared/errors.js';
import type { InferenceConfig } from '../config/types.js';
import type { InferenceClient } from './types.js';
import { GeminiClient } from './clients/gemini.js';
import { OpenAICompatibleClient } from './clients/openai-compatible.js';

/**
 * Create the correct client instance based on the configured type.
 * @throws ConfigError if the type is unknown.
 */
export function createInferenceClient(config: InferenceConfig): InferenceClient {
  let client: InferenceClient;

  switch (config.type) {
    case 'gemini':
      client = new GeminiClient(config.model, config.baseUrl, config.temperature);
      break;
    case 'openai-compatible':
      client = new OpenAICompatibleClient(config.model, config.baseUrl, config.temperature);
      break;
    default:
      throw new ConfigError(
        `Unknown inference type '${String(config.type)}'. Supported types: gemini, openai-compatible`,
      );
  }

  logger.info(
    { provider: client.providerType, model: client.model },
    `Using ${client.providerType} inference with model ${client.model}`,
  );

  return client;
}
