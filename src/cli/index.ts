#!/usr/bin/env node
/**
 * query-optimizer CLI - run evaluations, try single queries, inspect past runs
 */
import 'dotenv/config';
import * as fs from 'fs';
import * as path from 'path';
import { program, Command, InvalidArgumentError } from 'commander';
import { z } from 'zod';
import {
  ConfigInput,
  ConfigurationError,
  ModelProvider,
  QueryOptimizerConfig,
  createQueryOptimizer,
  errorMessage,
  formatStatistics,
  formatTrace,
  loadConfig,
  parseDebugString,
  validateCredentials,
  debug,
  warn,
} from '../index';

const DEMO_QUERIES = [
  'How do I reset my password?',
  "What is the company's vacation policy?",
  'How to improve team productivity?',
  'Explain machine learning in simple terms',
  'What are the best practices for remote work?',
];

// Get version from package.json
function readVersion(): string {
  try {
    const raw: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, '../../package.json'), 'utf-8'));
    return z.object({ version: z.string() }).parse(raw).version;
  } catch (error) {
    debug('cli', 'Could not read package version: %s', errorMessage(error));
    return '0.0.0';
  }
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function parseProvider(value: string): ModelProvider {
  const parsed = z.nativeEnum(ModelProvider).safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(`Expected one of: ${Object.values(ModelProvider).join(', ')}.`);
  }
  return parsed.data;
}

interface RunOptions {
  config?: string;
  dataset?: string;
  provider?: ModelProvider;
  embeddingProvider?: ModelProvider;
  neighbors?: number;
  trials?: number;
  concurrency?: number;
  output?: string;
  debug?: string | boolean;
}

function resolveConfig(options: RunOptions): QueryOptimizerConfig {
  if (options.debug) {
    parseDebugString(options.debug === true ? '*' : options.debug);
  }

  const overrides: ConfigInput = {
    datasetPath: options.dataset,
    provider: options.provider,
    embeddingProvider: options.embeddingProvider,
    neighborCount: options.neighbors,
    numTrials: options.trials,
    concurrency: options.concurrency,
    outputDir: options.output,
  };
  const config = loadConfig({ file: options.config, overrides });
  validateCredentials(config);
  return config;
}

function handleError(error: unknown): never {
  if (error instanceof ConfigurationError) {
    console.error(`Configuration error: ${error.message}`);
  } else {
    console.error(`Error: ${errorMessage(error)}`);
  }
  process.exit(1);
}

function withRunOptions(command: Command): Command {
  return command
    .option('-c, --config <file>', 'JSON config file')
    .option('-d, --dataset <path>', 'Feedback dataset (.json or .jsonl)')
    .option('-p, --provider <provider>', 'Provider for generation and judging', parseProvider)
    .option('-e, --embedding-provider <provider>', 'Provider for embeddings', parseProvider)
    .option('-k, --neighbors <count>', 'Neighbours used as few-shot context', parseInteger)
    .option('-t, --trials <count>', 'Passes over the test set', parseInteger)
    .option('--concurrency <count>', 'Queries evaluated at the same time', parseInteger)
    .option('-o, --output <dir>', 'Directory for results')
    .option('--debug [namespaces]', 'Enable debug output (comma-separated namespaces, default all)');
}

// Setup CLI
program
  .name('query-optimizer')
  .description('Evaluate feedback-driven few-shot prompt optimization')
  .version(readVersion());

// Evaluate command
withRunOptions(
  program
    .command('evaluate')
    .description('Run the full evaluation over the held-out test set and save the results')
).action(async (options: RunOptions) => {
  try {
    const config = resolveConfig(options);
    const optimizer = createQueryOptimizer(config);

    const { training, test } = await optimizer.loadDataset();
    console.log(`Training samples: ${training.length}, test samples: ${test.length}`);

    const runner = optimizer.createRunner({
      onStateChange: state => console.log(`Stage: ${state}`),
    });
    const report = await runner.evaluate(training, test.map(example => example.query));

    console.log(formatStatistics(report.statistics));
    if (report.failures.length > 0) {
      warn('cli', `${report.failures.length} queries were skipped; see "failures" in the results file`);
    }

    const version = await optimizer.saveReport(report);
    console.log(`Results saved to ${path.join(config.outputDir, 'runs', 'evaluation', `${version}.json`)}`);
  } catch (error) {
    handleError(error);
  }
});

// Demo command
withRunOptions(
  program
    .command('demo [queries...]')
    .description('Optimize and judge a few queries against the training set')
).action(async (queries: string[], options: RunOptions) => {
  try {
    const config = resolveConfig(options);
    const optimizer = createQueryOptimizer(config);

    const { training } = await optimizer.loadDataset();
    const runner = optimizer.createRunner();
    await runner.prepare(training);

    for (const query of queries.length > 0 ? queries : DEMO_QUERIES) {
      try {
        console.log('\n' + formatTrace(await runner.optimizeQuery(query)));
      } catch (error) {
        console.error(`Error processing query "${query}": ${errorMessage(error)}`);
      }
    }
  } catch (error) {
    handleError(error);
  }
});

// Runs command
program
  .command('runs')
  .description('List saved evaluation runs, newest first')
  .option('-c, --config <file>', 'JSON config file')
  .option('-o, --output <dir>', 'Directory for results')
  .action(async (options: RunOptions) => {
    try {
      const optimizer = createQueryOptimizer(loadConfig({ file: options.config, overrides: { outputDir: options.output } }));
      const versions = await optimizer.listReports();

      if (versions.length === 0) {
        console.log('No saved runs found');
        return;
      }
      console.log('\nSaved runs:');
      versions.forEach((version, index) => {
        console.log(index === 0 ? `- ${version} (latest)` : `- ${version}`);
      });
    } catch (error) {
      handleError(error);
    }
  });

// Show command
program
  .command('show [version]')
  .description('Print a saved run (latest by default)')
  .option('-c, --config <file>', 'JSON config file')
  .option('-o, --output <dir>', 'Directory for results')
  .action(async (version: string | undefined, options: RunOptions) => {
    try {
      const optimizer = createQueryOptimizer(loadConfig({ file: options.config, overrides: { outputDir: options.output } }));
      console.log(JSON.stringify(await optimizer.loadReport(version), null, 2));
    } catch (error) {
      handleError(error);
    }
  });

program.parseAsync(process.argv).catch(handleError);
