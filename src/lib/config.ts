/**
 * Configuration loading and validation
 *
 * Values are merged in order: defaults, JSON config file, environment
 * (`QUERY_OPTIMIZER_*`), explicit overrides. The merged object is validated
 * with zod before anything else runs.
 */
import * as fs from 'fs';
import { z } from 'zod';
import { ModelProvider } from './types';
import { ConfigurationError, errorMessage } from './errors';
import { DEFAULT_RETRY_POLICY } from './retry';
import { debug } from './utils/debug';

export const RetryPolicySchema = z.object({
  maxAttempts: z.number().int().positive().default(DEFAULT_RETRY_POLICY.maxAttempts),
  baseDelayMs: z.number().nonnegative().default(DEFAULT_RETRY_POLICY.baseDelayMs),
  maxDelayMs: z.number().nonnegative().default(DEFAULT_RETRY_POLICY.maxDelayMs),
});

export const ConfigSchema = z.object({
  /** Provider for generation and judging */
  provider: z.nativeEnum(ModelProvider).default(ModelProvider.OPENAI),
  /** Provider for embeddings; Anthropic has none */
  embeddingProvider: z
    .nativeEnum(ModelProvider)
    .refine(provider => provider !== ModelProvider.ANTHROPIC, 'Anthropic does not offer embeddings')
    .default(ModelProvider.OPENAI),
  embeddingModel: z.string().min(1).default('text-embedding-3-small'),
  generationModel: z.string().min(1).default('gpt-4.1-nano'),
  judgeModel: z.string().min(1).default('gpt-4.1-mini'),

  trainingSampleSize: z.number().int().positive().default(6000),
  testSampleSize: z.number().int().positive().default(100),
  /** K, the number of neighbours used as few-shot context */
  neighborCount: z.number().int().positive().default(10),
  /** Passes over the held-out set */
  numTrials: z.number().int().positive().default(1),

  maxTokens: z.number().int().positive().default(1000),
  temperature: z.number().min(0).max(2).default(0.7),
  judgeTemperature: z.number().min(0).max(2).default(0.1),

  /** Queries evaluated at the same time */
  concurrency: z.number().int().positive().default(1),
  /** Seed for dataset sampling */
  seed: z.number().int().default(42),

  datasetPath: z.string().min(1).optional(),
  dataDir: z.string().min(1).default('data'),
  outputDir: z.string().min(1).default('results'),

  retry: RetryPolicySchema.default({}),
});

export type QueryOptimizerConfig = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;

const ENV_PREFIX = 'QUERY_OPTIMIZER_';

type ScalarKind = 'string' | 'number';

/**
 * Environment variable suffix → config key and how to read it
 */
const ENV_KEYS: Record<string, { key: keyof ConfigInput; kind: ScalarKind }> = {
  PROVIDER: { key: 'provider', kind: 'string' },
  EMBEDDING_PROVIDER: { key: 'embeddingProvider', kind: 'string' },
  EMBEDDING_MODEL: { key: 'embeddingModel', kind: 'string' },
  GENERATION_MODEL: { key: 'generationModel', kind: 'string' },
  JUDGE_MODEL: { key: 'judgeModel', kind: 'string' },
  TRAINING_SAMPLE_SIZE: { key: 'trainingSampleSize', kind: 'number' },
  TEST_SAMPLE_SIZE: { key: 'testSampleSize', kind: 'number' },
  NEIGHBOR_COUNT: { key: 'neighborCount', kind: 'number' },
  NUM_TRIALS: { key: 'numTrials', kind: 'number' },
  MAX_TOKENS: { key: 'maxTokens', kind: 'number' },
  TEMPERATURE: { key: 'temperature', kind: 'number' },
  JUDGE_TEMPERATURE: { key: 'judgeTemperature', kind: 'number' },
  CONCURRENCY: { key: 'concurrency', kind: 'number' },
  SEED: { key: 'seed', kind: 'number' },
  DATASET_PATH: { key: 'datasetPath', kind: 'string' },
  DATA_DIR: { key: 'dataDir', kind: 'string' },
  OUTPUT_DIR: { key: 'outputDir', kind: 'string' },
};

export interface LoadConfigOptions {
  /** Environment to read from (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
  /** Path of a JSON config file */
  file?: string;
  /** Highest-priority values, e.g. from CLI options */
  overrides?: ConfigInput;
}

/**
 * Read `QUERY_OPTIMIZER_*` variables into a partial config
 */
export function configFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [suffix, { key, kind }] of Object.entries(ENV_KEYS)) {
    const raw = env[ENV_PREFIX + suffix];
    if (raw === undefined || raw === '') continue;

    if (kind === 'number') {
      const value = Number(raw);
      if (Number.isNaN(value)) {
        throw new ConfigurationError(`${ENV_PREFIX + suffix} must be a number, got "${raw}"`);
      }
      result[key] = value;
    } else {
      result[key] = raw;
    }
  }

  return result;
}

function readConfigFile(file: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read config file ${file}: ${errorMessage(error)}`, { cause: error });
  }

  const asObject = z.record(z.unknown()).safeParse(parsed);
  if (!asObject.success) {
    throw new ConfigurationError(`Config file ${file} must contain a JSON object`);
  }
  return asObject.data;
}

/**
 * Build and validate the run configuration
 */
export function loadConfig(options: LoadConfigOptions = {}): QueryOptimizerConfig {
  const fromFile = options.file ? readConfigFile(options.file) : {};
  const fromEnv = configFromEnv(options.env ?? process.env);

  const overrides = Object.fromEntries(
    Object.entries(options.overrides ?? {}).filter(([, value]) => value !== undefined)
  );

  const merged = { ...fromFile, ...fromEnv, ...overrides };
  debug('config', 'Merged configuration input: %o', merged);

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${details}`, { cause: result.error });
  }

  return result.data;
}

const CREDENTIAL_VARS: Partial<Record<ModelProvider, string>> = {
  [ModelProvider.OPENAI]: 'OPENAI_API_KEY',
  [ModelProvider.ANTHROPIC]: 'ANTHROPIC_API_KEY',
};

/**
 * Fail fast when a configured provider has no API key
 */
export function validateCredentials(config: QueryOptimizerConfig, env: NodeJS.ProcessEnv = process.env): void {
  const providers = new Set<ModelProvider>([config.provider, config.embeddingProvider]);
  const missing: string[] = [];

  for (const provider of providers) {
    const variable = CREDENTIAL_VARS[provider];
    if (variable && !env[variable]) missing.push(variable);
  }

  if (missing.length > 0) {
    throw new ConfigurationError(`Missing credentials: ${missing.join(', ')} environment variable(s) required`);
  }
}
