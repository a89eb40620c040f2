/**
 * Pure functions for cleaning the fields a model returned.
 * Every profile field is present in the output, every value is a
 * single-spaced string, and placeholder values become empty strings.
 */

import type { ExtractionProfile } from '../config/types.js';
import type { ExtractedPayload } from '../shared/types.js';

/** Values models use to mean "not found". Compared case-insensitively. */
const EMPTY_MARKERS = new Set(['none', 'null', 'n/a', 'na']);

/** Turn any JSON value into a single-spaced string. */
export function cleanValue(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }

  let text: string;
  if (typeof value === 'string') {
    text = value;
  } else if (typeof value === 'number' || typeof value === 'boolean') {
    text = String(value);
  } else {
    text = JSON.stringify(value);
  }

  const collapsed = text.split(/\s+/).filter(Boolean).join(' ');
  return EMPTY_MARKERS.has(collapsed.toLowerCase()) ? '' : collapsed;
}

/**
 * Clean a raw model object against a profile.
 * Extra keys the model added are kept (cleaned); missing profile fields become "".
 * When the profile names the issuing company and the extracted value does not
 * mention it, the canonical company name is written instead.
 */
export function normalizeFields(
  raw: Record<string, unknown>,
  profile: ExtractionProfile,
): ExtractedPayload {
  const payload: ExtractedPayload = {};

  for (const field of profile.fields) {
    payload[field] = cleanValue(raw[field]);
  }

  for (const [key, value] of Object.entries(raw)) {
    if (!(key in payload)) {
      payload[key] = cleanValue(value);
    }
  }

  const company = profile.company;
  if (company) {
    const match = (company.match ?? company.name).toLowerCase();
    const current = payload[company.field] ?? '';
    if (!current.toLowerCase().includes(match)) {
      payload[company.field] = company.name;
    }
  }

  return payload;
}
