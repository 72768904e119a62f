import { describe, it, expect } from 'vitest';
import { formatStatistics, formatTrace, buildResultsArtifact } from '../../src/lib/evaluation/report';
import { calculateStatistics } from '../../src/lib/evaluation/statistics';
import { EvaluationReport, EvaluationRecord } from '../../src/lib/evaluation/runner';
import { loadConfig } from '../../src/lib/config';

const record: EvaluationRecord = {
  index: 0,
  trial: 1,
  query: 'how do I recover my account',
  neighbors: [
    { query: 'reset password', response: 'click forgot password', preferenceLabel: 1, embedding: [0.9, 0.1], similarity: 0.99 },
  ],
  optimization: { optimizedPrompt: 'Be helpful.', rationale: 'direct answers were liked', source: 'structured' },
  responses: { optimizedResponse: 'Use the recovery link.', baselineResponse: 'Contact support.' },
  judgment: { optimizedScore: 1, optimizedRationale: 'direct', baselineScore: 0, baselineRationale: 'generic' },
};

describe('formatStatistics', () => {
  it('prints the summary table', () => {
    expect(formatStatistics(calculateStatistics([1, 1, 0, 1], [0, 0, 0, 1]))).toBe(
      [
        '='.repeat(50),
        'EVALUATION RESULTS',
        '='.repeat(50),
        'Queries Evaluated: 4',
        'Optimized Mean Score: 0.7500',
        'Baseline Mean Score: 0.2500',
        'Absolute Improvement: 0.5000',
        'Percentage Improvement: 200.00%',
        'T-statistic: 1.7321',
        'P-value: 0.181690',
        'Statistically Significant: No',
        '='.repeat(50),
      ].join('\n')
    );
  });
});

describe('formatTrace', () => {
  it('shows scores and both responses', () => {
    const lines = formatTrace(record).split('\n');
    expect(lines[1]).toBe('Query: how do I recover my account');
    expect(lines[3]).toBe('Optimized Response Score: 1');
    expect(lines[4]).toBe('Baseline Response Score: 0');
    expect(lines.slice(6)).toEqual(['Optimized Response:', 'Use the recovery link.', '', 'Baseline Response:', 'Contact support.']);
  });
});

describe('buildResultsArtifact', () => {
  const config = loadConfig({ env: {}, overrides: { neighborCount: 1 } });

  it('writes statistics, records, failures and config', () => {
    const report: EvaluationReport = {
      records: [record],
      failures: [{ index: 1, trial: 1, query: '', error: 'Cannot embed empty text (position 0)' }],
      statistics: calculateStatistics([1], [0]),
      startedAt: '2026-01-01T00:00:00.000Z',
      finishedAt: '2026-01-01T00:01:00.000Z',
    };

    const artifact = buildResultsArtifact(report, config);

    expect(artifact.statistics).toEqual({
      optimized_mean: 1,
      baseline_mean: 0,
      improvement: 1,
      improvement_percent: 0,
      t_statistic: null,
      p_value: null,
      is_significant: false,
      sample_size: 1,
    });
    expect(artifact.detailed_results).toEqual([
      {
        index: 0,
        trial: 1,
        query: 'how do I recover my account',
        optimized_prompt: 'Be helpful.',
        optimization_reasoning: 'direct answers were liked',
        optimization_source: 'structured',
        optimized_response: 'Use the recovery link.',
        baseline_response: 'Contact support.',
        optimized_score: 1,
        baseline_score: 0,
        optimized_reasoning: 'direct',
        baseline_reasoning: 'generic',
        similar_examples_count: 1,
        neighbors: [{ query: 'reset password', response: 'click forgot password', preference_label: 1, similarity: 0.99 }],
      },
    ]);
    expect(artifact.failures).toEqual(report.failures);
    expect(artifact.config).toMatchObject({
      similarity_k: 1,
      training_sample_size: 6000,
      test_sample_size: 100,
      embedding_model: 'text-embedding-3-small',
      response_model: 'gpt-4.1-nano',
      judge_model: 'gpt-4.1-mini',
    });
    expect(artifact.started_at).toBe('2026-01-01T00:00:00.000Z');
    expect(JSON.parse(JSON.stringify(artifact))).toEqual(artifact);
  });
});
