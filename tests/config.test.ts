import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { loadConfig, configFromEnv, validateCredentials } from '../src/lib/config';
import { ConfigurationError } from '../src/lib/errors';
import { ModelProvider } from '../src/lib/types';

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'query-optimizer-config-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('applies defaults', () => {
    const config = loadConfig({ env: {} });

    expect(config).toMatchObject({
      provider: ModelProvider.OPENAI,
      embeddingProvider: ModelProvider.OPENAI,
      embeddingModel: 'text-embedding-3-small',
      generationModel: 'gpt-4.1-nano',
      judgeModel: 'gpt-4.1-mini',
      trainingSampleSize: 6000,
      testSampleSize: 100,
      neighborCount: 10,
      numTrials: 1,
      maxTokens: 1000,
      temperature: 0.7,
      judgeTemperature: 0.1,
      concurrency: 1,
      seed: 42,
      dataDir: 'data',
      outputDir: 'results',
      retry: { maxAttempts: 6, baseDelayMs: 1000, maxDelayMs: 60000 },
    });
    expect(config.datasetPath).toBeUndefined();
  });

  it('layers file, environment and overrides', async () => {
    const file = path.join(dir, 'config.json');
    await fs.writeFile(file, JSON.stringify({ neighborCount: 5, testSampleSize: 20, retry: { maxAttempts: 2 } }));

    const config = loadConfig({
      file,
      env: { QUERY_OPTIMIZER_NEIGHBOR_COUNT: '7', QUERY_OPTIMIZER_PROVIDER: 'mock' },
      overrides: { neighborCount: 3, outputDir: undefined },
    });

    expect(config.neighborCount).toBe(3);
    expect(config.testSampleSize).toBe(20);
    expect(config.provider).toBe(ModelProvider.MOCK);
    expect(config.outputDir).toBe('results');
    expect(config.retry).toEqual({ maxAttempts: 2, baseDelayMs: 1000, maxDelayMs: 60000 });
  });

  it('rejects invalid values with the offending path', () => {
    expect(() => loadConfig({ env: {}, overrides: { neighborCount: 0 } })).toThrow(ConfigurationError);
    expect(() => loadConfig({ env: {}, overrides: { temperature: 3 } })).toThrow(/^Invalid configuration: temperature:/);
  });

  it('refuses Anthropic as the embedding provider', () => {
    expect(() => loadConfig({ env: { QUERY_OPTIMIZER_EMBEDDING_PROVIDER: 'anthropic' } })).toThrow(
      'Invalid configuration: embeddingProvider: Anthropic does not offer embeddings'
    );
  });

  it('reports unreadable config files', () => {
    expect(() => loadConfig({ env: {}, file: path.join(dir, 'missing.json') })).toThrow(/^Cannot read config file/);
  });

  it('requires the config file to hold an object', async () => {
    const file = path.join(dir, 'list.json');
    await fs.writeFile(file, '[1, 2]');
    expect(() => loadConfig({ env: {}, file })).toThrow(`Config file ${file} must contain a JSON object`);
  });
});

describe('configFromEnv', () => {
  it('reads numbers and strings and ignores empty values', () => {
    expect(
      configFromEnv({
        QUERY_OPTIMIZER_CONCURRENCY: '4',
        QUERY_OPTIMIZER_DATASET_PATH: 'data/feedback.jsonl',
        QUERY_OPTIMIZER_JUDGE_MODEL: '',
        UNRELATED: 'x',
      })
    ).toEqual({ concurrency: 4, datasetPath: 'data/feedback.jsonl' });
  });

  it('rejects non-numeric numbers', () => {
    expect(() => configFromEnv({ QUERY_OPTIMIZER_SEED: 'abc' })).toThrow(
      'QUERY_OPTIMIZER_SEED must be a number, got "abc"'
    );
  });
});

describe('validateCredentials', () => {
  it('requires a key for each remote provider', () => {
    const config = loadConfig({ env: {}, overrides: { provider: ModelProvider.ANTHROPIC } });
    expect(() => validateCredentials(config, {})).toThrow(
      'Missing credentials: ANTHROPIC_API_KEY, OPENAI_API_KEY environment variable(s) required'
    );
    expect(() => validateCredentials(config, { ANTHROPIC_API_KEY: 'test-key', OPENAI_API_KEY: 'test-key' })).not.toThrow();
  });

  it('needs nothing for the mock provider', () => {
    const config = loadConfig({ env: {}, overrides: { provider: ModelProvider.MOCK, embeddingProvider: ModelProvider.MOCK } });
    expect(() => validateCredentials(config, {})).not.toThrow();
  });
});
