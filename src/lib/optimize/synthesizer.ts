/**
 * Prompt synthesis from retrieved neighbours
 *
 * Shows the generation model similar past queries with their responses and
 * feedback, and asks it for an instruction prompt that reproduces what users
 * liked.
 */
import { z } from 'zod';
import { ModelAdapter } from '../types';
import { errorMessage } from '../errors';
import { withRetry, RetryOptions } from '../retry';
import { LenientText, parseStructured } from '../utils/json';
import { debug, warn } from '../utils/debug';
import { buildFewShotBlock } from './few-shot';
import { Neighbor, OptimizationResult, GenerationSettings } from './types';

const SynthesisOutputSchema = z.object({
  optimized_prompt: z.string().trim().min(1),
  reasoning: LenientText,
});

export const FALLBACK_RATIONALE = 'Fallback prompt due to generation error';

/**
 * Prompt used when synthesis fails entirely
 */
export function fallbackPrompt(query: string): string {
  return `Please provide a helpful and accurate response to: ${query}`;
}

export interface PromptSynthesizerOptions {
  settings?: GenerationSettings;
  retry?: RetryOptions;
}

export class PromptSynthesizer {
  private adapter: ModelAdapter;
  private options: PromptSynthesizerOptions;

  /**
   * @param adapter - Generation model that writes the optimised prompt
   */
  constructor(adapter: ModelAdapter, options: PromptSynthesizerOptions = {}) {
    this.adapter = adapter;
    this.options = options;
  }

  /**
   * Build the instruction sent to the generation model
   */
  buildPrompt(query: string, neighbors: readonly Neighbor[]): string {
    return (
      'You are an expert prompt optimizer. Given a user query and examples of ' +
      'similar queries with user feedback, create an optimized prompt that will ' +
      'generate better responses based on the patterns you observe.\n\n' +
      'Analyze the examples where users gave positive feedback (👍) vs negative feedback (👎) ' +
      'and create a prompt that incorporates the successful patterns.\n\n' +
      'Examples of user queries, responses, and feedback:\n\n' +
      buildFewShotBlock(neighbors, { includeSimilarity: true }) +
      'Based on the patterns above, create an optimized prompt that will generate ' +
      'a better response for the following user query. Focus on the characteristics ' +
      'that led to positive feedback in the examples.\n\n' +
      `Target User Query: ${query}\n\n` +
      'Please provide:\n' +
      '1. An optimized prompt that incorporates successful patterns\n' +
      '2. Brief reasoning for your optimization choices\n\n' +
      "Format your response as JSON with 'optimized_prompt' and 'reasoning' fields."
    );
  }

  /**
   * Produce an optimised prompt for `query`. Never rejects on provider errors;
   * the returned prompt is always non-empty.
   */
  async synthesize(query: string, neighbors: readonly Neighbor[]): Promise<OptimizationResult> {
    const prompt = this.buildPrompt(query, neighbors);
    debug('synthesizer', 'Synthesizing prompt for "%s" from %d neighbours', query, neighbors.length);

    let output: string;
    try {
      output = await withRetry(
        () => this.adapter.complete(prompt, this.options.settings),
        { label: 'synthesize', ...this.options.retry }
      );
    } catch (error) {
      warn('synthesizer', `Error generating optimized prompt: ${errorMessage(error)}`);
      return this.fallback(query);
    }

    const text = output.trim();
    if (!text) {
      debug('synthesizer', 'Model returned empty output, using fallback prompt');
      return this.fallback(query);
    }

    const parsed = parseStructured(text, SynthesisOutputSchema);
    if (parsed.ok) {
      return {
        optimizedPrompt: parsed.value.optimized_prompt.trim(),
        rationale: parsed.value.reasoning,
        source: 'structured',
      };
    }

    debug('synthesizer', 'Using raw text as prompt: %s', parsed.error.message);
    return { optimizedPrompt: text, rationale: '', source: 'raw_text' };
  }

  private fallback(query: string): OptimizationResult {
    return { optimizedPrompt: fallbackPrompt(query), rationale: FALLBACK_RATIONALE, source: 'fallback' };
  }
}
