import { FileResultStore } from './file-store.js';
import { SqliteResultStore } from './sqlite-store.js';
import type { ResultStore } from './types.js';
import type { OutputConfig } from '../config/types.js';

/** Build the result store named by the output config. */
export function createResultStore(output: OutputConfig): ResultStore {
  switch (output.type) {
    case 'file':
      return new FileResultStore(output.location);
    case 'sqlite':
      return new SqliteResultStore(output.location);
  }
}
