/**
 * Wiring: builds every pipeline component from a validated configuration
 */
import { ModelRegistry, defineModel } from './models';
import { Store } from './storage';
import { QueryOptimizerConfig } from './config';
import { ConfigurationError } from './errors';
import { RetryOptions } from './retry';
import { EmbeddingCache } from './embeddings/cache';
import { EmbeddingClient } from './embeddings/client';
import { PromptSynthesizer } from './optimize/synthesizer';
import { ResponseGenerator } from './optimize/generator';
import { Judge } from './optimize/judge';
import { DatasetLoader, DatasetSplits } from './evaluation/dataset';
import { EvaluationRunner, EvaluationReport, RunnerState } from './evaluation/runner';
import { buildResultsArtifact } from './evaluation/report';
import { debug } from './utils/debug';

/** Aliases under which the pipeline looks up its models. */
export const MODEL_ALIASES = {
  generation: 'generation',
  judge: 'judge',
  embedding: 'embedding',
} as const;

export const RESULTS_NAME = 'evaluation';

export interface QueryOptimizerDeps {
  /** Models already registered under an alias are used as they are */
  registry?: ModelRegistry;
  /** Caches: sampled splits and embeddings (defaults to `config.dataDir`) */
  dataStore?: Store;
  /** Results artifacts (defaults to `config.outputDir`) */
  resultsStore?: Store;
  /** Extra retry settings, merged over `config.retry` */
  retry?: Omit<RetryOptions, 'policy'>;
}

export interface QueryOptimizer {
  readonly config: QueryOptimizerConfig;
  readonly registry: ModelRegistry;
  /** Load the configured dataset and its sampled splits */
  loadDataset(): Promise<DatasetSplits>;
  createRunner(options?: { onStateChange?: (state: RunnerState, previous: RunnerState) => void }): EvaluationRunner;
  /** Persist a finished run; returns its version id */
  saveReport(report: EvaluationReport): Promise<string>;
  loadReport(version?: string): Promise<unknown>;
  listReports(): Promise<string[]>;
}

/**
 * Create a query optimizer from configuration
 *
 * @example
 * ```typescript
 * const optimizer = createQueryOptimizer(loadConfig());
 * const { training, test } = await optimizer.loadDataset();
 * const report = await optimizer.createRunner().evaluate(training, test.map(t => t.query));
 * await optimizer.saveReport(report);
 * ```
 */
export function createQueryOptimizer(config: QueryOptimizerConfig, deps: QueryOptimizerDeps = {}): QueryOptimizer {
  const registry = deps.registry ?? new ModelRegistry();
  const dataStore = deps.dataStore ?? new Store(config.dataDir);
  const resultsStore = deps.resultsStore ?? new Store(config.outputDir);

  const defaults = {
    [MODEL_ALIASES.generation]: defineModel(config.provider, config.generationModel),
    [MODEL_ALIASES.judge]: defineModel(config.provider, config.judgeModel),
    [MODEL_ALIASES.embedding]: defineModel(config.embeddingProvider, config.embeddingModel),
  };
  for (const [alias, definition] of Object.entries(defaults)) {
    if (!registry.getModel(alias)) {
      registry.registerModels({ [alias]: definition });
    }
  }

  const retry: RetryOptions = { ...deps.retry, policy: config.retry };

  function createRunner(options: { onStateChange?: (state: RunnerState, previous: RunnerState) => void } = {}): EvaluationRunner {
    const embeddingAdapter = registry.getEmbeddingAdapter(MODEL_ALIASES.embedding);
    const cacheName = `embeddings-${embeddingAdapter.embeddingModel.replace(/[^a-zA-Z0-9_-]/g, '_')}`;
    const generation = registry.getAdapter(MODEL_ALIASES.generation);
    const settings = { temperature: config.temperature, maxTokens: config.maxTokens };

    debug('runner', 'Creating runner (K=%d, trials=%d, concurrency=%d)', config.neighborCount, config.numTrials, config.concurrency);

    return new EvaluationRunner(
      {
        embeddings: new EmbeddingClient(embeddingAdapter, {
          cache: new EmbeddingCache(dataStore, cacheName, embeddingAdapter.embeddingModel),
          retry,
        }),
        synthesizer: new PromptSynthesizer(generation, { settings, retry }),
        generator: new ResponseGenerator(generation, { settings, retry }),
        judge: new Judge(registry.getAdapter(MODEL_ALIASES.judge), {
          settings: { temperature: config.judgeTemperature, maxTokens: config.maxTokens },
          retry,
        }),
      },
      {
        neighborCount: config.neighborCount,
        numTrials: config.numTrials,
        concurrency: config.concurrency,
        onStateChange: options.onStateChange,
      }
    );
  }

  return {
    config,
    registry,

    async loadDataset(): Promise<DatasetSplits> {
      if (!config.datasetPath) {
        throw new ConfigurationError('No dataset configured: set datasetPath or QUERY_OPTIMIZER_DATASET_PATH');
      }
      const loader = new DatasetLoader(dataStore, {
        path: config.datasetPath,
        seed: config.seed,
        trainingSize: config.trainingSampleSize,
        testSize: config.testSampleSize,
      });
      return loader.load();
    },

    createRunner,

    saveReport(report: EvaluationReport): Promise<string> {
      return resultsStore.save('run', RESULTS_NAME, buildResultsArtifact(report, config));
    },

    loadReport(version?: string): Promise<unknown> {
      return resultsStore.load('run', RESULTS_NAME, version);
    },

    listReports(): Promise<string[]> {
      return resultsStore.listVersions('run', RESULTS_NAME);
    },
  };
}
