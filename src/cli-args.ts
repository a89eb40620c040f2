/**
 * Command-line parsing, kept free of side effects so it can be tested.
 */

import { parseArgs } from 'node:util';
import type { BatchOverrides } from './runner.js';
import type { BatchSummary } from './batch/types.js';

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface CliOptions {
  help: boolean;
  init: boolean;
  config?: string;
  overrides: BatchOverrides;
}

export const USAGE = `
doc-extract - batch field extraction with a rotating pool of API keys

Usage:
  doc-extract [options]

Options:
  -c, --config <path>       Path to config file (default: ./config/config.yaml)
  -i, --input <dir>         Directory of documents to process (overrides config)
  -o, --output <location>   Output directory or database file (overrides config)
  -s, --start <index>       First backlog index to process (default: 0)
  -n, --limit <count>       Number of documents to process (default: all remaining)
  -p, --profile <name>      Extraction profile (overrides config)
  --concurrency <n>         Parallel workers (overrides config)
  --status-port <port>      Serve the status API on this port
  --init                    Create config/config.yaml from the example
  -h, --help                Show this help message

Examples:
  doc-extract --start 0 --limit 100
  doc-extract --config ./config/shriram.yaml --start 250
  doc-extract --init
`;

function parseInteger(name: string, value: string | undefined, min: number): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!/^\d+$/.test(value.trim())) {
    throw new UsageError(`--${name} must be a whole number, got "${value}"`);
  }
  const parsed = Number(value.trim());
  if (parsed < min) {
    throw new UsageError(`--${name} must be at least ${min}, got ${parsed}`);
  }
  return parsed;
}

function parseRaw(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      options: {
        config: { type: 'string', short: 'c' },
        input: { type: 'string', short: 'i' },
        output: { type: 'string', short: 'o' },
        start: { type: 'string', short: 's' },
        limit: { type: 'string', short: 'n' },
        profile: { type: 'string', short: 'p' },
        concurrency: { type: 'string' },
        'status-port': { type: 'string' },
        init: { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
      },
      strict: true,
      allowPositionals: false,
    });
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

export function parseCliArgs(argv: readonly string[]): CliOptions {
  const { values } = parseRaw(argv);

  const overrides: BatchOverrides = {};
  if (values.input !== undefined) overrides.inputDir = values.input;
  if (values.output !== undefined) overrides.outputLocation = values.output;
  if (values.profile !== undefined) overrides.profile = values.profile;

  const startIndex = parseInteger('start', values.start, 0);
  if (startIndex !== undefined) overrides.startIndex = startIndex;

  const limit = parseInteger('limit', values.limit, 0);
  if (limit !== undefined) overrides.limit = limit;

  const concurrency = parseInteger('concurrency', values.concurrency, 1);
  if (concurrency !== undefined) overrides.concurrency = concurrency;

  const statusPort = parseInteger('status-port', values['status-port'], 1);
  if (statusPort !== undefined) {
    if (statusPort > 65535) {
      throw new UsageError(`--status-port must be at most 65535, got ${statusPort}`);
    }
    overrides.statusPort = statusPort;
  }

  return {
    help: values.help === true,
    init: values.init === true,
    ...(values.config !== undefined && { config: values.config }),
    overrides,
  };
}

/** Human-readable run summary, ending with the resume command when there is work left. */
export function formatSummary(summary: BatchSummary): string {
  const lines = [
    `Run ${summary.status}: items ${summary.startIndex}..${summary.startIndex + summary.total - 1} (${summary.total} total)`,
    `  succeeded: ${summary.succeeded}`,
    `  skipped:   ${summary.skipped} (already done)`,
    `  failed:    ${summary.failed} (${summary.failedPermanent} permanent, ${summary.failedRetryable} retryable)`,
    `  output:    ${summary.outputLocation}`,
    `  duration:  ${(summary.durationMs / 1000).toFixed(1)}s`,
  ];
  if (summary.pauseReason !== null) {
    lines.push(`  paused:    ${summary.pauseReason}`);
  }
  if (summary.status !== 'completed' || summary.failedRetryable > 0) {
    lines.push(`Resume with: doc-extract --start ${summary.status === 'completed' ? summary.startIndex : summary.nextIndex}`);
  }
  return lines.join('\n');
}
