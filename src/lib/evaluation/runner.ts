/**
 * Evaluation runner
 *
 * Drives every held-out query through embed → retrieve → synthesize →
 * generate → judge and aggregates the paired scores. Lifecycle:
 *
 *   idle → preparing → ready → running → aggregating → done
 *
 * `failed` is entered from any working state when a stage throws. Calls made
 * in the wrong state throw `InvalidStateError`.
 */
import pLimit from 'p-limit';
import { InvalidStateError, errorMessage } from '../errors';
import { EmbeddingClient } from '../embeddings/client';
import { findNeighbors } from '../search/similarity';
import { PromptSynthesizer } from '../optimize/synthesizer';
import { ResponseGenerator } from '../optimize/generator';
import { Judge } from '../optimize/judge';
import { LabeledExample, Neighbor, OptimizationResult, ResponsePair, JudgmentPair } from '../optimize/types';
import { AggregateStatistics, calculateStatistics } from './statistics';
import { debug, warn } from '../utils/debug';

export type RunnerState = 'idle' | 'preparing' | 'ready' | 'running' | 'aggregating' | 'done' | 'failed';

const TRANSITIONS: Record<RunnerState, readonly RunnerState[]> = {
  idle: ['preparing'],
  preparing: ['ready', 'failed'],
  ready: ['running'],
  running: ['aggregating', 'failed'],
  aggregating: ['done', 'failed'],
  done: [],
  failed: [],
};

/** Full trace of one query through the pipeline. */
export interface QueryTrace {
  query: string;
  neighbors: Neighbor[];
  optimization: OptimizationResult;
  responses: ResponsePair;
  judgment: JudgmentPair;
}

export interface EvaluationRecord extends QueryTrace {
  /** Position of the query in the held-out set */
  index: number;
  /** 1-based pass over the held-out set */
  trial: number;
}

/** A query that was skipped because a stage failed. */
export interface QueryFailure {
  index: number;
  trial: number;
  query: string;
  error: string;
}

export interface EvaluationReport {
  records: EvaluationRecord[];
  failures: QueryFailure[];
  statistics: AggregateStatistics;
  startedAt: string;
  finishedAt: string;
}

export interface EvaluationRunnerDeps {
  embeddings: EmbeddingClient;
  synthesizer: PromptSynthesizer;
  generator: ResponseGenerator;
  judge: Judge;
}

export interface EvaluationRunnerOptions {
  /** K, neighbours retrieved per query (default 10) */
  neighborCount?: number;
  /** Passes over the held-out set (default 1) */
  numTrials?: number;
  /** Queries in flight at once (default 1) */
  concurrency?: number;
  onStateChange?: (state: RunnerState, previous: RunnerState) => void;
}

export class EvaluationRunner {
  private deps: EvaluationRunnerDeps;
  private neighborCount: number;
  private numTrials: number;
  private concurrency: number;
  private onStateChange?: (state: RunnerState, previous: RunnerState) => void;

  private _state: RunnerState = 'idle';
  private training: readonly LabeledExample[] = [];
  private _report?: EvaluationReport;

  constructor(deps: EvaluationRunnerDeps, options: EvaluationRunnerOptions = {}) {
    this.deps = deps;
    this.neighborCount = options.neighborCount ?? 10;
    this.numTrials = options.numTrials ?? 1;
    this.concurrency = options.concurrency ?? 1;
    this.onStateChange = options.onStateChange;

    if (!Number.isInteger(this.concurrency) || this.concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${this.concurrency}`);
    }
    if (!Number.isInteger(this.numTrials) || this.numTrials < 1) {
      throw new RangeError(`numTrials must be a positive integer, got ${this.numTrials}`);
    }
  }

  get state(): RunnerState {
    return this._state;
  }

  /** Embedded training set, available once prepared */
  get trainingSet(): readonly LabeledExample[] {
    return this.training;
  }

  /**
   * Result of the run
   * @throws InvalidStateError before the run is done
   */
  get report(): EvaluationReport {
    if (this._state !== 'done' || !this._report) {
      throw new InvalidStateError(`Report is not available in state "${this._state}"`);
    }
    return this._report;
  }

  private transition(next: RunnerState): void {
    const previous = this._state;
    if (!TRANSITIONS[previous].includes(next)) {
      throw new InvalidStateError(`Cannot move from "${previous}" to "${next}"`);
    }
    this._state = next;
    debug('runner', 'State %s -> %s', previous, next);
    this.onStateChange?.(next, previous);
  }

  /**
   * Attach embeddings to the training examples. Examples that already carry
   * one are kept as they are.
   */
  async prepare(training: readonly LabeledExample[]): Promise<void> {
    this.transition('preparing');

    try {
      const missing = training.filter(example => !example.embedding);
      debug('runner', 'Preparing %d training examples (%d need embeddings)', training.length, missing.length);

      const vectors = await this.deps.embeddings.embedBatch(missing.map(example => example.query));
      const byQuery = new Map<string, number[]>();
      missing.forEach((example, i) => byQuery.set(example.query, vectors[i]));

      this.training = Object.freeze(
        training.map(example =>
          Object.freeze(example.embedding ? { ...example } : { ...example, embedding: byQuery.get(example.query) })
        )
      );
    } catch (error) {
      this.transition('failed');
      throw error;
    }

    this.transition('ready');
  }

  /**
   * Run the full pipeline for a single query against the prepared training set
   */
  async optimizeQuery(query: string): Promise<QueryTrace> {
    if (this._state !== 'ready' && this._state !== 'running' && this._state !== 'done') {
      throw new InvalidStateError(`Cannot optimize queries in state "${this._state}"`);
    }

    const queryVector = await this.deps.embeddings.embed(query);
    const neighbors = findNeighbors(queryVector, this.training, this.neighborCount);
    const optimization = await this.deps.synthesizer.synthesize(query, neighbors);
    const responses = await this.deps.generator.generate(query, optimization.optimizedPrompt);
    const judgment = await this.deps.judge.judgePair(
      query,
      responses.optimizedResponse,
      responses.baselineResponse,
      neighbors
    );

    return { query, neighbors, optimization, responses, judgment };
  }

  /**
   * Evaluate every test query `numTrials` times. A failing query is recorded
   * and skipped; it never stops the run.
   */
  async run(testQueries: readonly string[]): Promise<EvaluationReport> {
    this.transition('running');
    const startedAt = new Date().toISOString();

    const limit = pLimit(this.concurrency);
    const slots: Array<EvaluationRecord | undefined> = new Array(this.numTrials * testQueries.length);
    const failures: QueryFailure[] = [];

    const tasks: Array<Promise<void>> = [];
    for (let trial = 1; trial <= this.numTrials; trial++) {
      testQueries.forEach((query, index) => {
        const slot = (trial - 1) * testQueries.length + index;
        tasks.push(
          limit(async () => {
            try {
              const trace = await this.optimizeQuery(query);
              slots[slot] = { index, trial, ...trace };
              debug('runner', 'Query %d (trial %d) scored %d vs %d', index, trial, trace.judgment.optimizedScore, trace.judgment.baselineScore);
            } catch (error) {
              debug('runner', 'Query %d (trial %d) failed: %s', index, trial, errorMessage(error));
              failures.push({ index, trial, query, error: errorMessage(error) });
            }
          })
        );
      });
    }
    await Promise.all(tasks);
    await this.deps.embeddings.flush();

    const records = slots.filter((record): record is EvaluationRecord => record !== undefined);
    failures.sort((a, b) => a.trial - b.trial || a.index - b.index);
    if (failures.length > 0) {
      warn('runner', `Skipped ${failures.length} of ${slots.length} queries after errors`);
    }

    this.transition('aggregating');
    let statistics: AggregateStatistics;
    try {
      statistics = calculateStatistics(
        records.map(record => record.judgment.optimizedScore),
        records.map(record => record.judgment.baselineScore)
      );
    } catch (error) {
      this.transition('failed');
      throw error;
    }

    this._report = { records, failures, statistics, startedAt, finishedAt: new Date().toISOString() };
    this.transition('done');
    return this._report;
  }

  /**
   * Prepare and run in one call
   */
  async evaluate(training: readonly LabeledExample[], testQueries: readonly string[]): Promise<EvaluationReport> {
    await this.prepare(training);
    return this.run(testQueries);
  }
}
