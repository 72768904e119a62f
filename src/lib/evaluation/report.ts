/**
 * Console output and the persisted results artifact
 */
import { QueryOptimizerConfig } from '../config';
import { AggregateStatistics } from './statistics';
import { EvaluationReport, EvaluationRecord, QueryTrace } from './runner';

const RULE = '='.repeat(50);

/**
 * Human-readable summary of the aggregate statistics
 */
export function formatStatistics(stats: AggregateStatistics): string {
  return [
    RULE,
    'EVALUATION RESULTS',
    RULE,
    `Queries Evaluated: ${stats.sampleSize}`,
    `Optimized Mean Score: ${stats.meanOptimizedScore.toFixed(4)}`,
    `Baseline Mean Score: ${stats.meanBaselineScore.toFixed(4)}`,
    `Absolute Improvement: ${stats.absoluteImprovement.toFixed(4)}`,
    `Percentage Improvement: ${stats.percentImprovement.toFixed(2)}%`,
    `T-statistic: ${stats.pairedTestStatistic.toFixed(4)}`,
    `P-value: ${stats.pValue.toFixed(6)}`,
    `Statistically Significant: ${stats.isSignificant ? 'Yes' : 'No'}`,
    RULE,
  ].join('\n');
}

/**
 * Summary of one query's trace, as printed by the demo command
 */
export function formatTrace(trace: QueryTrace): string {
  return [
    '='.repeat(60),
    `Query: ${trace.query}`,
    '='.repeat(60),
    `Optimized Response Score: ${trace.judgment.optimizedScore}`,
    `Baseline Response Score: ${trace.judgment.baselineScore}`,
    '',
    'Optimized Response:',
    trace.responses.optimizedResponse,
    '',
    'Baseline Response:',
    trace.responses.baselineResponse,
  ].join('\n');
}

/** JSON cannot hold NaN or Infinity; those become null. */
function finiteOrNull(value: number): number | null {
  return Number.isFinite(value) ? value : null;
}

function recordToJson(record: EvaluationRecord): Record<string, unknown> {
  return {
    index: record.index,
    trial: record.trial,
    query: record.query,
    optimized_prompt: record.optimization.optimizedPrompt,
    optimization_reasoning: record.optimization.rationale,
    optimization_source: record.optimization.source,
    optimized_response: record.responses.optimizedResponse,
    baseline_response: record.responses.baselineResponse,
    optimized_score: record.judgment.optimizedScore,
    baseline_score: record.judgment.baselineScore,
    optimized_reasoning: record.judgment.optimizedRationale,
    baseline_reasoning: record.judgment.baselineRationale,
    similar_examples_count: record.neighbors.length,
    neighbors: record.neighbors.map(neighbor => ({
      query: neighbor.query,
      response: neighbor.response,
      preference_label: neighbor.preferenceLabel,
      similarity: neighbor.similarity,
    })),
  };
}

export type ResultsArtifact = {
  statistics: Record<string, number | boolean | null>;
  detailed_results: Array<Record<string, unknown>>;
  failures: Array<{ index: number; trial: number; query: string; error: string }>;
  config: Record<string, unknown>;
  started_at: string;
  finished_at: string;
};

/**
 * Build the machine-readable artifact written at the end of a run
 */
export function buildResultsArtifact(report: EvaluationReport, config: QueryOptimizerConfig): ResultsArtifact {
  const { statistics } = report;
  return {
    statistics: {
      optimized_mean: statistics.meanOptimizedScore,
      baseline_mean: statistics.meanBaselineScore,
      improvement: statistics.absoluteImprovement,
      improvement_percent: statistics.percentImprovement,
      t_statistic: finiteOrNull(statistics.pairedTestStatistic),
      p_value: finiteOrNull(statistics.pValue),
      is_significant: statistics.isSignificant,
      sample_size: statistics.sampleSize,
    },
    detailed_results: report.records.map(recordToJson),
    failures: report.failures.map(failure => ({ ...failure })),
    config: {
      provider: config.provider,
      training_sample_size: config.trainingSampleSize,
      test_sample_size: config.testSampleSize,
      similarity_k: config.neighborCount,
      num_trials: config.numTrials,
      embedding_model: config.embeddingModel,
      response_model: config.generationModel,
      judge_model: config.judgeModel,
      temperature: config.temperature,
      judge_temperature: config.judgeTemperature,
      max_tokens: config.maxTokens,
      seed: config.seed,
    },
    started_at: report.startedAt,
    finished_at: report.finishedAt,
  };
}
