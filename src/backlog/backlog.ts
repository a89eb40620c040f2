/**
 * Backlog discovery: the ordered list of documents a run works through.
 * Order is lexicographic by file name so that indices are stable between
 * runs over the same directory.
 */

import { createHash } from 'node:crypto';
import { readdir } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import { UnreadableSourceError } from '../shared/errors.js';

/**
 * Stable item id for a source reference.
 * The identity is the file name within the backlog directory, so the same
 * document keeps its id whether the directory is given as a relative or an
 * absolute path, or has moved. Readable prefix from the name, plus a short
 * hash of the exact name so names that sanitize alike stay distinct.
 */
export function itemIdFor(sourceRef: string): string {
  const name = basename(sourceRef);
  const stem = basename(name, extname(name))
    .replace(/[^A-Za-z0-9._-]+/g, '_')
    .replace(/^[^A-Za-z0-9]+/, '')
    .slice(0, 80);
  const hash = createHash('sha1').update(name).digest('hex').slice(0, 8);
  return stem.length > 0 ? `${stem}-${hash}` : `item-${hash}`;
}

/** List the files in `dir` whose extension is in `extensions`, sorted by name. */
export async function listBacklog(dir: string, extensions: readonly string[]): Promise<string[]> {
  const wanted = new Set(extensions.map((ext) => ext.toLowerCase()));

  let entries;
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new UnreadableSourceError(dir, `input directory not readable: ${reason}`);
  }

  return entries
    .filter((entry) => entry.isFile() && wanted.has(extname(entry.name).toLowerCase()))
    .map((entry) => entry.name)
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
    .map((name) => join(dir, name));
}
