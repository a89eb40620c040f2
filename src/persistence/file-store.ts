/**
 * File-backed result store: one JSON document per item plus a run summary,
 * all in one output directory. Writes go to a temp file first and are
 * renamed into place, so a crash never leaves a half-written result.
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { logger } from '../shared/logger.js';
import { ItemResultSchema } from './record.js';
import type { ResultStore } from './types.js';
import type { BatchSummary, ItemResult } from '../batch/types.js';

/** Name of the summary document; item ids never start with "_". */
export const SUMMARY_FILE = '_summary.json';

const SAFE_ID = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

let tempCounter = 0;

async function writeAtomic(path: string, content: string): Promise<void> {
  const tempPath = `${path}.${process.pid}.${++tempCounter}.tmp`;
  await writeFile(tempPath, content, 'utf-8');
  await rename(tempPath, path);
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class FileResultStore implements ResultStore {
  public readonly location: string;
  private ready: Promise<unknown> | undefined;

  constructor(directory: string) {
    this.location = directory;
  }

  async writeItemResult(result: ItemResult): Promise<void> {
    await this.ensureDirectory();
    await writeAtomic(this.pathFor(result.itemId), JSON.stringify(result, null, 2) + '\n');
  }

  async readItemResult(itemId: string): Promise<ItemResult | null> {
    let raw: string;
    try {
      raw = await readFile(this.pathFor(itemId), 'utf-8');
    } catch (err) {
      if (isNotFound(err)) {
        return null;
      }
      throw err;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      logger.warn({ itemId, location: this.location }, 'Stored result is not valid JSON, treating item as not processed');
      return null;
    }

    const result = ItemResultSchema.safeParse(parsed);
    if (!result.success) {
      logger.warn({ itemId, location: this.location }, 'Stored result failed validation, treating item as not processed');
      return null;
    }
    return result.data;
  }

  async writeSummary(summary: BatchSummary): Promise<void> {
    await this.ensureDirectory();
    await writeAtomic(join(this.location, SUMMARY_FILE), JSON.stringify(summary, null, 2) + '\n');
  }

  async close(): Promise<void> {
    // Nothing held open between writes
  }

  private pathFor(itemId: string): string {
    if (!SAFE_ID.test(itemId)) {
      throw new Error(`Item id "${itemId}" is not safe to use as a file name`);
    }
    return join(this.location, `${itemId}.json`);
  }

  private ensureDirectory(): Promise<unknown> {
    if (this.ready === undefined) {
      this.ready = mkdir(this.location, { recursive: true });
    }
    return this.ready;
  }
}
