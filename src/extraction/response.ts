/**
 * Pull the JSON object out of a model answer.
 * Models sometimes wrap the object in prose or a markdown fence, so the
 * outermost {...} span is taken rather than the whole text.
 */

import { MalformedResponseError } from '../shared/errors.js';

/**
 * Parse the outermost JSON object in `text`.
 * @throws MalformedResponseError when there is no object or it does not parse.
 */
export function parseModelJson(text: string): Record<string, unknown> {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');

  if (start === -1 || end <= start) {
    throw new MalformedResponseError('No JSON object found in response', text.slice(0, 500));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text.slice(start, end + 1));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new MalformedResponseError(`Failed to parse JSON: ${message}`, text.slice(0, 500));
  }

  if (!isPlainObject(parsed)) {
    throw new MalformedResponseError('Response JSON is not an object', text.slice(0, 500));
  }

  return parsed;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
