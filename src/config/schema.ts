/**
 * Zod schemas for YAML config file validation.
 * These schemas are the single source of truth for config structure.
 * TypeScript types are inferred from these schemas in types.ts.
 */

import { z } from 'zod';

/** Schema for dispatch, rotation and batch settings. */
export const SettingsSchema = z.object({
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  cooldownMs: z.number().int().min(1000).default(60000),
  transientFailureThreshold: z.number().int().min(1).default(3),
  requestTimeoutMs: z.number().int().min(1000).default(60000),
  maxAttempts: z.number().int().min(1).max(20).default(3),
  retryDelayMs: z.number().int().min(0).default(2000),
  retryBackoffFactor: z.number().min(1).default(2),
  retryMaxDelayMs: z.number().int().min(0).default(30000),
  concurrency: z.number().int().min(1).max(32).default(1),
  quotaResetHourUtc: z.number().int().min(0).max(23).default(8),
  minTextLength: z.number().int().min(0).default(50),
});

/** Schema for the inference service connection. */
export const InferenceSchema = z.object({
  type: z.enum(['gemini', 'openai-compatible']),
  model: z.string().min(1, { message: 'inference.model must not be empty' }),
  baseUrl: z.url({ message: 'inference.baseUrl must be a valid URL' }).optional(),
  temperature: z.number().min(0).max(2).default(0),
});

/** Schema for the credential list. Secrets may also come from an environment variable. */
export const CredentialsSchema = z.object({
  apiKeys: z.array(z.string()).default([]),
  fromEnv: z.string().min(1).optional(),
});

/** Schema for where per-item results and the summary are written. */
export const OutputSchema = z.object({
  type: z.enum(['file', 'sqlite']).default('file'),
  location: z.string().min(1).default('./output'),
});

/** Schema for the backlog and its output. */
export const BatchSchema = z.object({
  inputDir: z.string().min(1).default('./input'),
  extensions: z.array(z.string().regex(/^\.[a-z0-9]+$/i)).min(1).default(['.pdf']),
  profile: z.string().min(1, { message: 'batch.profile must not be empty' }),
  output: OutputSchema.default({ type: 'file', location: './output' }),
});

/** Schema for the read-only status API. */
export const StatusSchema = z.object({
  enabled: z.boolean().default(false),
  port: z.number().int().min(1).max(65535).default(3430),
  apiKeys: z.array(z.string().min(1)).default([]),
});

/** Schema for an extraction profile: which fields to ask for and how to find them. */
export const ProfileSchema = z.object({
  name: z.string().min(1, { message: 'Profile name must not be empty' }),
  /** Field that must name the issuing company; corrected when the model gets it wrong. */
  company: z
    .object({
      field: z.string().min(1),
      name: z.string().min(1),
      match: z.string().min(1).optional(),
    })
    .optional(),
  fields: z
    .array(z.string().min(1))
    .min(1, { message: 'Profile must list at least one field' }),
  rules: z.string().default(''),
});

/** Top-level config schema with cross-reference validation. */
export const ConfigSchema = z
  .object({
    version: z.literal(1),
    settings: SettingsSchema.default(SettingsSchema.parse({})),
    inference: InferenceSchema,
    credentials: CredentialsSchema.default({ apiKeys: [] }),
    batch: BatchSchema,
    status: StatusSchema.default(StatusSchema.parse({})),
    profiles: z
      .array(ProfileSchema)
      .min(1, { message: 'At least one profile is required' }),
  })
  .refine(
    (config) => config.profiles.some((p) => p.name === config.batch.profile),
    { message: 'batch.profile must reference an existing profile name' },
  )
  .refine(
    (config) => new Set(config.profiles.map((p) => p.name)).size === config.profiles.length,
    { message: 'Profile names must be unique' },
  )
  .refine(
    (config) => config.settings.retryMaxDelayMs >= config.settings.retryDelayMs,
    { message: 'settings.retryMaxDelayMs must be at least settings.retryDelayMs' },
  );
