/**
 * Optimised and baseline answer generation
 */
import { ModelAdapter } from '../types';
import { errorMessage } from '../errors';
import { withRetry, RetryOptions } from '../retry';
import { debug, warn } from '../utils/debug';
import { ResponsePair, GenerationSettings } from './types';

export function optimizedInput(optimizedPrompt: string, query: string): string {
  return `${optimizedPrompt}\n\nUser Query: ${query}\n\nResponse:`;
}

export function baselineInput(query: string): string {
  return `Please provide a helpful response to the following query:\n\nUser Query: ${query}\n\nResponse:`;
}

/**
 * Text substituted for a response whose generation failed
 */
export function errorMarker(error: unknown): string {
  return `Error generating response: ${errorMessage(error)}`;
}

export interface ResponseGeneratorOptions {
  settings?: GenerationSettings;
  retry?: RetryOptions;
}

/**
 * Generates both candidate answers. The two calls are independent: one
 * failing yields an error marker and leaves the other untouched.
 */
export class ResponseGenerator {
  private adapter: ModelAdapter;
  private options: ResponseGeneratorOptions;

  constructor(adapter: ModelAdapter, options: ResponseGeneratorOptions = {}) {
    this.adapter = adapter;
    this.options = options;
  }

  async generate(query: string, optimizedPrompt: string): Promise<ResponsePair> {
    const [optimizedResponse, baselineResponse] = await Promise.all([
      this.call('optimized', optimizedInput(optimizedPrompt, query)),
      this.call('baseline', baselineInput(query)),
    ]);
    return { optimizedResponse, baselineResponse };
  }

  private async call(kind: 'optimized' | 'baseline', input: string): Promise<string> {
    try {
      const output = await withRetry(
        () => this.adapter.complete(input, this.options.settings),
        { label: `generate ${kind}`, ...this.options.retry }
      );
      debug('generator', 'Generated %s response (%d chars)', kind, output.length);
      return output.trim();
    } catch (error) {
      warn('generator', `Error generating ${kind} response: ${errorMessage(error)}`);
      return errorMarker(error);
    }
  }
}
