/**
 * Feedback dataset loading and sampling
 *
 * A dataset is a local `.json` array or `.jsonl` file of feedback records.
 * Records use either `{ query, response, label }` or the unified-feedback
 * column names `{ conv_A_user, conv_A_assistant, conv_A_rating }`.
 */
import * as fsPromises from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { Store } from '../storage';
import { ConfigurationError, errorMessage } from '../errors';
import { LabeledExample, PreferenceLabel } from '../optimize/types';
import { seededShuffle } from '../utils/random';
import { debug, warn } from '../utils/debug';

const LabelSchema = z
  .union([z.number(), z.boolean(), z.string().regex(/^\s*-?\d+(\.\d+)?\s*$/)])
  .transform((value): PreferenceLabel => (Number(value) > 0 ? 1 : 0));

const SimpleRecordSchema = z.object({
  query: z.string(),
  response: z.string(),
  label: LabelSchema,
});

const UnifiedFeedbackRecordSchema = z.object({
  conv_A_user: z.string(),
  conv_A_assistant: z.string(),
  conv_A_rating: LabelSchema,
});

export const FeedbackRecordSchema = z
  .union([SimpleRecordSchema, UnifiedFeedbackRecordSchema])
  .transform((record): LabeledExample =>
    'query' in record
      ? { query: record.query, response: record.response, preferenceLabel: record.label }
      : { query: record.conv_A_user, response: record.conv_A_assistant, preferenceLabel: record.conv_A_rating }
  );

const LabeledExampleSchema = z.object({
  query: z.string(),
  response: z.string(),
  preferenceLabel: z.union([z.literal(0), z.literal(1)]),
});

const SplitsSchema = z.object({
  source: z.string(),
  seed: z.number(),
  /** Size and modification time of the source when the splits were drawn */
  size: z.number().optional(),
  modifiedAt: z.number().optional(),
  training: z.array(LabeledExampleSchema),
  test: z.array(LabeledExampleSchema),
});

export interface DatasetSplits {
  training: LabeledExample[];
  test: LabeledExample[];
}

export interface SplitSizes {
  trainingSize: number;
  testSize: number;
}

interface ParsedRecords {
  records: unknown[];
  /** `.jsonl` lines that are not valid JSON */
  invalidLines: number;
}

function parseRecords(content: string, filePath: string): ParsedRecords {
  if (filePath.endsWith('.jsonl')) {
    const records: unknown[] = [];
    let invalidLines = 0;
    content.split('\n').forEach((line, i) => {
      const trimmed = line.trim();
      if (!trimmed) return;
      try {
        records.push(JSON.parse(trimmed));
      } catch (error) {
        invalidLines++;
        debug('dataset', 'Invalid JSON on line %d of %s: %s', i + 1, filePath, errorMessage(error));
      }
    });
    return { records, invalidLines };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Invalid JSON in ${filePath}: ${errorMessage(error)}`, { cause: error });
  }
  const asArray = z.array(z.unknown()).safeParse(parsed);
  if (!asArray.success) {
    throw new ConfigurationError(`${filePath} must contain a JSON array of records`);
  }
  return { records: asArray.data, invalidLines: 0 };
}

/**
 * Read a feedback file. Records that do not match either shape, whose query
 * is blank, or that sit on a `.jsonl` line that is not JSON are skipped with
 * a warning.
 *
 * @throws ConfigurationError when the file is missing, unreadable or has no usable record
 */
export async function loadFeedbackFile(filePath: string): Promise<LabeledExample[]> {
  let content: string;
  try {
    content = await fsPromises.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read dataset ${filePath}: ${errorMessage(error)}`, { cause: error });
  }

  const { records, invalidLines } = parseRecords(content, filePath);
  const examples: LabeledExample[] = [];
  let skipped = invalidLines;
  for (const raw of records) {
    const result = FeedbackRecordSchema.safeParse(raw);
    if (result.success && result.data.query.trim()) {
      examples.push(result.data);
    } else {
      skipped++;
    }
  }

  if (skipped > 0) {
    warn('dataset', `Skipped ${skipped} malformed record(s) in ${filePath}`);
  }
  if (examples.length === 0) {
    throw new ConfigurationError(`Dataset ${filePath} contains no usable records`);
  }

  debug('dataset', 'Loaded %d records from %s', examples.length, filePath);
  return examples;
}

/**
 * Shuffle with a fixed seed and split: test is the tail, training the head.
 * The two never overlap; the test split is filled first when records are short.
 */
export function sampleSplits(records: readonly LabeledExample[], sizes: SplitSizes, seed: number): DatasetSplits {
  const shuffled = seededShuffle(records, seed);
  const testSize = Math.min(sizes.testSize, shuffled.length);
  const trainingSize = Math.min(sizes.trainingSize, shuffled.length - testSize);

  return {
    training: shuffled.slice(0, trainingSize),
    test: shuffled.slice(shuffled.length - testSize),
  };
}

export interface DatasetLoaderOptions extends SplitSizes {
  path: string;
  seed: number;
}

/**
 * Loads a dataset and keeps its sampled splits in the store, so repeated
 * runs evaluate the same queries without re-sampling.
 */
export class DatasetLoader {
  private store: Store;
  private options: DatasetLoaderOptions;

  constructor(store: Store, options: DatasetLoaderOptions) {
    this.store = store;
    this.options = options;
  }

  /**
   * Name of the stored splits for these options
   */
  get cacheName(): string {
    const { path: filePath, seed, trainingSize, testSize } = this.options;
    const base = path.basename(filePath, path.extname(filePath)).replace(/[^a-zA-Z0-9_-]/g, '_');
    return `${base}-seed${seed}-train${trainingSize}-test${testSize}`;
  }

  /**
   * Stored splits are reused while the source file keeps its size and
   * modification time, or when the source is gone.
   */
  async load(): Promise<DatasetSplits> {
    const source = await this.sourceFingerprint();

    const cached = await this.store.get('dataset', this.cacheName);
    if (cached !== undefined) {
      const parsed = SplitsSchema.safeParse(cached);
      if (!parsed.success) {
        warn('dataset', `Stored splits "${this.cacheName}" are malformed; re-sampling`);
      } else if (source && (parsed.data.size !== source.size || parsed.data.modifiedAt !== source.modifiedAt)) {
        debug('dataset', '%s changed since splits "%s" were stored; re-sampling', this.options.path, this.cacheName);
      } else {
        debug('dataset', 'Using stored splits "%s"', this.cacheName);
        return { training: parsed.data.training, test: parsed.data.test };
      }
    }

    const records = await loadFeedbackFile(this.options.path);
    const splits = sampleSplits(records, this.options, this.options.seed);
    debug('dataset', 'Sampled %d training and %d test records', splits.training.length, splits.test.length);

    await this.store.put('dataset', this.cacheName, {
      source: this.options.path,
      seed: this.options.seed,
      ...source,
      ...splits,
    });
    return splits;
  }

  private async sourceFingerprint(): Promise<{ size: number; modifiedAt: number } | undefined> {
    try {
      const stats = await fsPromises.stat(this.options.path);
      return { size: stats.size, modifiedAt: stats.mtimeMs };
    } catch (error) {
      debug('dataset', 'Cannot stat %s: %s', this.options.path, errorMessage(error));
      return undefined;
    }
  }
}
