/**
 * Zod schema for stored item results.
 * Anything read back from disk or the database is validated before the
 * resume check trusts it.
 */

import { z } from 'zod';

const ErrorKindSchema = z.enum([
  'no_usable_credential',
  'rate_limited',
  'quota_exhausted',
  'transient',
  'permanent',
  'invalid_credential',
  'unreadable',
]);

export const ClassifiedErrorSchema = z.object({
  kind: ErrorKindSchema,
  message: z.string(),
  retryAfterMs: z.number().optional(),
  statusCode: z.number().optional(),
});

export const AttemptRecordSchema = z.object({
  attempt: z.number().int(),
  credentialId: z.string().nullable(),
  outcome: z.union([z.literal('success'), ErrorKindSchema]),
  latencyMs: z.number(),
  error: z.string().optional(),
});

export const ItemResultSchema = z.object({
  itemId: z.string().min(1),
  sourceRef: z.string(),
  index: z.number().int().min(0),
  status: z.enum(['succeeded', 'failed_retryable', 'failed_permanent']),
  attempts: z.number().int().min(0),
  payload: z.record(z.string(), z.string()).nullable(),
  error: ClassifiedErrorSchema.nullable(),
  credentialId: z.string().nullable(),
  attemptLog: z.array(AttemptRecordSchema),
  completedAt: z.string(),
});
