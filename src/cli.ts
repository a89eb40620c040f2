#!/usr/bin/env node
/**
 * CLI entry point: parses arguments, handles --init, runs one batch and
 * prints its summary with the command to resume from.
 */

import { existsSync, mkdirSync, copyFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join, resolve } from 'node:path';
import { logger } from './shared/logger.js';
import { ConfigError } from './shared/errors.js';
import { loadConfig, resolveConfigPath } from './config/loader.js';
import { formatSummary, parseCliArgs, UsageError, USAGE } from './cli-args.js';
import { runBatch, VERSION } from './runner.js';

const EXIT_OK = 0;
const EXIT_ERROR = 1;
const EXIT_USAGE = 2;
const EXIT_PAUSED = 3;

function initConfig(): number {
  const targetPath = resolve(process.cwd(), 'config', 'config.yaml');

  // Compiled to dist/src/cli.js and run from src/cli.ts; both sit two levels below the package root
  const here = dirname(fileURLToPath(import.meta.url));
  const candidates = [
    join(here, '..', 'config', 'config.example.yaml'),
    join(here, '..', '..', 'config', 'config.example.yaml'),
  ];
  const sourcePath = candidates.find((candidate) => existsSync(candidate));

  if (existsSync(targetPath)) {
    console.error(`Error: Config file already exists at ${targetPath}`);
    return EXIT_ERROR;
  }
  if (sourcePath === undefined) {
    console.error('Error: Example config not found (package may be corrupted)');
    return EXIT_ERROR;
  }

  mkdirSync(dirname(targetPath), { recursive: true });
  copyFileSync(sourcePath, targetPath);

  console.log(`Created config file: ${targetPath}`);
  console.log('');
  console.log('Next steps:');
  console.log('  1. Add your API keys (or set GEMINI_API_KEYS)');
  console.log('  2. Put documents in the input directory');
  console.log('  3. Run: doc-extract --start 0 --limit 100');
  console.log('');
  return EXIT_OK;
}

async function main(argv: readonly string[]): Promise<number> {
  const options = parseCliArgs(argv);

  if (options.help) {
    console.log(USAGE);
    return EXIT_OK;
  }
  if (options.init) {
    return initConfig();
  }

  logger.info(`doc-extract v${VERSION} starting...`);

  const config = loadConfig(resolveConfigPath(options.config));
  if (process.env['LOG_LEVEL'] === undefined) {
    logger.level = config.settings.logLevel;
  }

  // First signal: finish in-flight items and stop. Second: exit now.
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      logger.warn({ signal }, 'Second signal received, exiting immediately');
      process.exit(130);
    }
    logger.info({ signal }, 'Stop requested, finishing in-flight items...');
    controller.abort();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    const run = await runBatch(config, options.overrides, controller.signal);
    console.log(formatSummary(run.summary));
    return run.summary.status === 'paused' ? EXIT_PAUSED : EXIT_OK;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled rejection');
});

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    if (err instanceof UsageError) {
      console.error(`Error: ${err.message}\n${USAGE}`);
      process.exitCode = EXIT_USAGE;
      return;
    }
    if (err instanceof ConfigError) {
      console.error(`Error: ${err.message}`);
      process.exitCode = EXIT_ERROR;
      return;
    }
    logger.error({ err }, 'Batch run failed');
    process.exitCode = EXIT_ERROR;
  },
);
