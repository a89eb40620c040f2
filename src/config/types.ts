/**
 * TypeScript types inferred from Zod schemas.
 * These types are the compile-time companions to the runtime validation schemas.
 */

import { z } from 'zod';
import {
  ConfigSchema,
  SettingsSchema,
  InferenceSchema,
  CredentialsSchema,
  BatchSchema,
  OutputSchema,
  StatusSchema,
  ProfileSchema,
} from './schema.js';

/** Fully validated configuration as written in the YAML file. */
export type Config = z.infer<typeof ConfigSchema>;

/** Dispatch, rotation and batch settings. */
export type Settings = z.infer<typeof SettingsSchema>;

/** Inference service connection. */
export type InferenceConfig = z.infer<typeof InferenceSchema>;

/** Credential sources as written in the file (secrets not yet merged). */
export type CredentialsConfig = z.infer<typeof CredentialsSchema>;

/** Backlog and output configuration. */
export type BatchConfig = z.infer<typeof BatchSchema>;

/** Result store selection. */
export type OutputConfig = z.infer<typeof OutputSchema>;

/** Read-only status API configuration. */
export type StatusConfig = z.infer<typeof StatusSchema>;

/** An extraction profile. */
export type ExtractionProfile = z.infer<typeof ProfileSchema>;

/** Config after loading: the credential secrets resolved into one ordered list. */
export interface LoadedConfig extends Config {
  apiKeys: string[];
}

// Re-export schemas for convenience
export {
  ConfigSchema,
  SettingsSchema,
  InferenceSchema,
  CredentialsSchema,
  BatchSchema,
  OutputSchema,
  StatusSchema,
  ProfileSchema,
} from './schema.js';
