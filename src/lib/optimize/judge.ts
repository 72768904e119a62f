/**
 * LLM-as-judge scoring
 *
 * The judge sees the same neighbours used for synthesis as calibration and
 * answers with a binary verdict. Anything other than a clean 0 or 1 scores 0.
 */
import { z } from 'zod';
import { ModelAdapter } from '../types';
import { errorMessage } from '../errors';
import { withRetry, RetryOptions } from '../retry';
import { LenientText, parseStructured } from '../utils/json';
import { debug, warn } from '../utils/debug';
import { buildFewShotBlock } from './few-shot';
import { Neighbor, PreferenceLabel, Judgment, JudgmentPair, GenerationSettings } from './types';

const NumericString = z
  .string()
  .regex(/^\s*-?\d+(\.\d+)?\s*$/, 'score must be numeric')
  .transform(Number);

const JudgeOutputSchema = z.object({
  score: z.union([z.number(), NumericString]),
  reasoning: LenientText,
});

export const UNPARSEABLE_RATIONALE = 'unparseable judge output';

export interface JudgeOptions {
  settings?: GenerationSettings;
  retry?: RetryOptions;
}

export class Judge {
  private adapter: ModelAdapter;
  private options: JudgeOptions;

  /**
   * @param adapter - Judge model
   */
  constructor(adapter: ModelAdapter, options: JudgeOptions = {}) {
    this.adapter = adapter;
    this.options = options;
  }

  buildPrompt(query: string, response: string, neighbors: readonly Neighbor[]): string {
    return (
      'You are an expert evaluator. Based on the examples provided, ' +
      'evaluate if the response satisfies the user query and would likely ' +
      'receive positive feedback from the user.\n\n' +
      'Look at the patterns in the examples below to understand what makes ' +
      'a good vs bad response:\n\n' +
      buildFewShotBlock(neighbors) +
      'Now, evaluate the following response based on the patterns above:\n\n' +
      `User Query: ${query}\n` +
      `Response: ${response}\n\n` +
      'Return a JSON with:\n' +
      "- 'score': 1 if the response is good (likely to be liked), 0 if bad (likely to be disliked)\n" +
      "- 'reasoning': Brief explanation of your evaluation\n\n" +
      'JSON Response:'
    );
  }

  /**
   * Score one response. Never rejects and never returns a score outside {0, 1}.
   */
  async judge(query: string, response: string, neighbors: readonly Neighbor[]): Promise<Judgment> {
    const prompt = this.buildPrompt(query, response, neighbors);

    let output: string;
    try {
      output = await withRetry(
        () => this.adapter.complete(prompt, this.options.settings),
        { label: 'judge', ...this.options.retry }
      );
    } catch (error) {
      warn('judge', `Error in judge evaluation: ${errorMessage(error)}`);
      return { score: 0, rationale: `Error in evaluation: ${errorMessage(error)}`, source: 'error' };
    }

    const parsed = parseStructured(output, JudgeOutputSchema);
    if (!parsed.ok) {
      debug('judge', 'Unparseable judge output: %s', parsed.error.message);
      return { score: 0, rationale: UNPARSEABLE_RATIONALE, source: 'unparseable' };
    }

    const { score, reasoning } = parsed.value;
    const label: PreferenceLabel | undefined = score === 1 ? 1 : score === 0 ? 0 : undefined;
    if (label === undefined) {
      debug('judge', 'Judge score out of range: %s', score);
      return { score: 0, rationale: UNPARSEABLE_RATIONALE, source: 'unparseable' };
    }

    return { score: label, rationale: reasoning, source: 'structured' };
  }

  /**
   * Judge both candidates independently with the same neighbour context
   */
  async judgePair(
    query: string,
    optimizedResponse: string,
    baselineResponse: string,
    neighbors: readonly Neighbor[]
  ): Promise<JudgmentPair> {
    const optimized = await this.judge(query, optimizedResponse, neighbors);
    const baseline = await this.judge(query, baselineResponse, neighbors);
    return {
      optimizedScore: optimized.score,
      optimizedRationale: optimized.rationale,
      baselineScore: baseline.score,
      baselineRationale: baseline.rationale,
    };
  }
}
