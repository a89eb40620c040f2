/**
 * YAML config loading and Zod validation.
 * Reads a YAML file, validates it against the config schema, merges
 * credential secrets from the environment, and returns a LoadedConfig
 * or throws a ConfigError.
 */

import { readFileSync, existsSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigSchema } from './schema.js';
import { ConfigError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { CredentialsConfig, LoadedConfig } from './types.js';

/**
 * Load and validate a YAML config file.
 *
 * @param path - Absolute or relative path to the YAML config file
 * @param env - Environment used to resolve `credentials.fromEnv`
 * @throws ConfigError if the file cannot be read, validation fails,
 *   or no credential is configured
 */
export function loadConfig(
  path: string,
  env: NodeJS.ProcessEnv = process.env,
): LoadedConfig {
  if (!existsSync(path)) {
    throw new ConfigError(
      `Failed to read config file at "${path}": file not found (run "doc-extract --init" to create one)`,
    );
  }

  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to read config file at "${path}": ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to parse YAML in config file "${path}": ${message}`);
  }

  const result = ConfigSchema.safeParse(parsed);

  if (!result.success) {
    const prettyError = z.prettifyError(result.error);
    logger.error({ configPath: path }, 'Config validation failed');
    throw new ConfigError(`Config validation failed for "${path}":\n${prettyError}`);
  }

  const apiKeys = resolveApiKeys(result.data.credentials, env);
  if (apiKeys.length === 0) {
    throw new ConfigError(
      `No API keys configured in "${path}": set credentials.apiKeys or the variable named by credentials.fromEnv`,
    );
  }

  logger.info(
    {
      configPath: path,
      credentials: apiKeys.length,
      profiles: result.data.profiles.length,
      inference: result.data.inference.type,
    },
    'Config loaded successfully',
  );

  return { ...result.data, apiKeys };
}

/**
 * Merge configured secrets with those from the environment variable named by
 * `fromEnv` (comma or newline separated). Blank entries are dropped and
 * duplicates removed, keeping first-seen order.
 */
export function resolveApiKeys(
  credentials: CredentialsConfig,
  env: NodeJS.ProcessEnv = process.env,
): string[] {
  const fromEnv = credentials.fromEnv ? (env[credentials.fromEnv] ?? '') : '';
  const candidates = [...credentials.apiKeys, ...fromEnv.split(/[\n,]/)];

  const keys: string[] = [];
  const seen = new Set<string>();
  for (const candidate of candidates) {
    const key = candidate.trim();
    if (key === '' || seen.has(key)) continue;
    seen.add(key);
    keys.push(key);
  }
  return keys;
}

/**
 * Resolve the config file path.
 *
 * Priority:
 * 1. explicit path (the --config CLI argument)
 * 2. CONFIG_PATH environment variable
 * 3. ./config/config.yaml (default)
 */
export function resolveConfigPath(
  explicit?: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  if (explicit) {
    return explicit;
  }

  const envPath = env['CONFIG_PATH'];
  if (envPath) {
    return envPath;
  }

  return './config/config.yaml';
}
