import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync, readFileSync, readdirSync } from 'node:fs';
import { join, relative } from 'node:path';
import { tmpdir } from 'node:os';
import { runBatch, findProfile } from '../runner.js';
import { ConfigSchema, type LoadedConfig } from '../config/types.js';
import { ConfigError, RateLimitedError } from '../shared/errors.js';
import { itemIdFor } from '../backlog/backlog.js';
import { SUMMARY_FILE } from '../persistence/file-store.js';
import type { InferenceClient } from '../inference/types.js';
import type { TextSource } from '../sources/text-source.js';

// --- Test helpers ---

const DOCUMENT_TEXT = 'Policy No: P-100 issued to a test holder for one year of motor cover.';

class StubTextSource implements TextSource {
  async getText(): Promise<string> {
    return DOCUMENT_TEXT;
  }
}

class StubClient implements InferenceClient {
  readonly providerType = 'stub';
  readonly model = 'stub-model';
  readonly keysSeen: string[] = [];

  constructor(private readonly answer: (apiKey: string) => string) {}

  async infer(_prompt: string, apiKey: string) {
    this.keysSeen.push(apiKey);
    return { text: this.answer(apiKey), latencyMs: 1 };
  }
}

function makeConfig(inputDir: string, outputDir: string): LoadedConfig {
  const config = ConfigSchema.parse({
    version: 1,
    settings: { retryDelayMs: 0, retryMaxDelayMs: 0 },
    inference: { type: 'gemini', model: 'gemini-2.0-flash' },
    batch: {
      inputDir,
      extensions: ['.txt'],
      profile: 'basic',
      output: { type: 'file', location: outputDir },
    },
    profiles: [{ name: 'basic', fields: ['POLICY_NO'] }],
  });
  return { ...config, apiKeys: ['test-secret-1', 'test-secret-2'] };
}

describe('runBatch', () => {
  let workDir: string;
  let inputDir: string;
  let outputDir: string;

  beforeEach(() => {
    workDir = mkdtempSync(join(tmpdir(), 'runner-test-'));
    inputDir = join(workDir, 'input');
    outputDir = join(workDir, 'output');
    mkdirSync(inputDir);
    for (const name of ['a.txt', 'b.txt', 'c.txt', 'notes.md']) {
      writeFileSync(join(inputDir, name), DOCUMENT_TEXT);
    }
  });

  afterEach(() => {
    rmSync(workDir, { recursive: true, force: true });
  });

  it('processes the requested slice and writes results to the output directory', async () => {
    const client = new StubClient(() => '{"POLICY_NO": "P-100"}');

    const run = await runBatch(makeConfig(inputDir, outputDir), { startIndex: 1, limit: 1 }, undefined, {
      client,
      textSource: new StubTextSource(),
    });

    expect(run.summary).toMatchObject({
      status: 'completed',
      startIndex: 1,
      total: 1,
      succeeded: 1,
      nextIndex: 2,
      outputLocation: outputDir,
    });
    expect(client.keysSeen).toEqual(['test-secret-1']);

    const itemId = itemIdFor(join(inputDir, 'b.txt'));
    expect(readdirSync(outputDir).sort()).toEqual([SUMMARY_FILE, `${itemId}.json`].sort());
    const stored = JSON.parse(readFileSync(join(outputDir, `${itemId}.json`), 'utf-8'));
    expect(stored).toMatchObject({ status: 'succeeded', index: 1, payload: { POLICY_NO: 'P-100' }, credentialId: 'key-1' });
  });

  it('applies command-line overrides over the config file', async () => {
    const client = new StubClient(() => '{"POLICY_NO": "P-100"}');
    const otherOutput = join(workDir, 'elsewhere');

    const run = await runBatch(
      makeConfig(inputDir, outputDir),
      { outputLocation: otherOutput, concurrency: 2 },
      undefined,
      { client, textSource: new StubTextSource() },
    );

    expect(run.outputLocation).toBe(otherOutput);
    expect(run.summary.total).toBe(3);
    expect(run.summary.succeeded).toBe(3);
    expect(client.keysSeen).toHaveLength(3);
  });

  it('resumes the same documents when the input directory is spelled differently', async () => {
    const client = new StubClient(() => '{"POLICY_NO": "P-100"}');
    const config = makeConfig(inputDir, outputDir);

    const first = await runBatch(config, {}, undefined, { client, textSource: new StubTextSource() });
    const second = await runBatch(config, { inputDir: relative(process.cwd(), inputDir) }, undefined, {
      client,
      textSource: new StubTextSource(),
    });

    expect(first.summary.dispatches).toBe(3);
    expect(second.summary).toMatchObject({ status: 'completed', skipped: 3, dispatches: 0, succeeded: 0 });
    expect(client.keysSeen).toHaveLength(3);
  });

  it('pauses when every credential is rate limited', async () => {
    const client: InferenceClient = {
      providerType: 'stub',
      model: 'stub-model',
      infer: async () => {
        throw new RateLimitedError('stub', '', 60_000);
      },
    };

    const run = await runBatch(makeConfig(inputDir, outputDir), {}, undefined, {
      client,
      textSource: new StubTextSource(),
    });

    expect(run.summary.status).toBe('paused');
    expect(run.summary.nextIndex).toBe(0);
    expect(run.summary.processed).toBe(0);
  });

  it('rejects an unknown profile before touching the backlog', async () => {
    await expect(
      runBatch(makeConfig(join(workDir, 'missing'), outputDir), { profile: 'other' }),
    ).rejects.toThrow(ConfigError);
  });
});

describe('findProfile', () => {
  it('lists configured profiles when the name is unknown', () => {
    const config = makeConfig('./input', './output');

    expect(() => findProfile(config, 'shriram')).toThrow('Unknown profile "shriram" (configured: basic)');
  });
});
