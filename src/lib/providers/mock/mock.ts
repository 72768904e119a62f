/**
 * Mock LLM provider for testing and offline runs
 */
import { ModelDefinition, ModelAdapter, EmbeddingAdapter, ApiClientConfig, ChatMessage, CompletionOptions } from '../../types';
import { ProviderError, ProviderErrorKind } from '../../errors';

export type MockChatResponder = (messages: ChatMessage[], options: CompletionOptions) => string;

/**
 * Predefined responses for the mock adapter
 */
export interface MockResponses {
  /** Default response for chat and completions */
  chat?: string | MockChatResponder;
  /** Response map keyed by the exact text of the last user message */
  promptMap?: Record<string, string>;
}

/**
 * Mock-specific configuration options
 */
export interface MockConfig extends ApiClientConfig {
  responses?: MockResponses;
  /** Fixed embeddings keyed by exact input text */
  vectors?: Record<string, number[]>;
  /** Dimensionality of generated embeddings (default 64) */
  dimensions?: number;
  /** Fail every request */
  shouldFail?: boolean;
  /** Fail only the first N requests, then recover */
  failTimes?: number;
  /** Kind of provider error raised when failing (default 'unavailable') */
  failWith?: ProviderErrorKind;
  /** Delay responses to simulate network latency (ms) */
  responseDelay?: number;
}

/**
 * One recorded call, for assertions in tests
 */
export interface MockCall {
  kind: 'chat' | 'embed';
  messages?: ChatMessage[];
  options?: CompletionOptions;
  texts?: string[];
}

/**
 * Adapter for mock models. Chat answers come from the configured responses;
 * embeddings are fixed vectors or a hashed bag of words.
 */
export class MockModelAdapter implements ModelAdapter, EmbeddingAdapter {
  private modelDef: ModelDefinition<MockConfig>;
  private config: MockConfig;
  private failuresLeft: number;

  /** Every request received, in order */
  readonly calls: MockCall[] = [];

  /**
   * Create a new Mock adapter
   *
   * @param modelDef - The model definition
   */
  constructor(modelDef: ModelDefinition<MockConfig>) {
    this.modelDef = modelDef;
    this.config = { ...(modelDef.config ?? {}) };
    this.failuresLeft = this.config.failTimes ?? 0;
  }

  get embeddingModel(): string {
    return this.modelDef.model;
  }

  /**
   * Set the mock responses for testing
   */
  setResponses(responses: MockResponses): void {
    this.config.responses = { ...this.config.responses, ...responses };
  }

  private async delay(): Promise<void> {
    const ms = this.config.responseDelay ?? 0;
    if (ms > 0) {
      await new Promise(resolve => setTimeout(resolve, ms));
    }
  }

  private maybeFail(operation: string): void {
    const failing = this.config.shouldFail === true || this.failuresLeft > 0;
    if (!failing) return;
    if (this.failuresLeft > 0) this.failuresLeft--;
    throw new ProviderError(
      this.config.failWith ?? 'unavailable',
      'mock',
      `Mock ${operation} failed (intentional test error)`
    );
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    return this.chat([{ role: 'user', content: prompt }], options);
  }

  async chat(messages: ChatMessage[], options: CompletionOptions = {}): Promise<string> {
    this.calls.push({ kind: 'chat', messages, options });
    await this.delay();
    this.maybeFail('chat');

    const maxLength = options.maxTokens ?? 1000;
    const lastUserMessage = [...messages].reverse().find(m => m.role === 'user');

    const mapped = lastUserMessage && this.config.responses?.promptMap?.[lastUserMessage.content];
    if (mapped !== undefined) {
      return mapped.substring(0, maxLength);
    }

    const chat = this.config.responses?.chat;
    if (typeof chat === 'function') {
      return chat(messages, options);
    }
    if (chat !== undefined) {
      return chat.substring(0, maxLength);
    }

    let response = `Mock chat response for model ${this.modelDef.model}`;
    if (lastUserMessage) {
      const content = lastUserMessage.content;
      const preview = content.substring(0, 30) + (content.length > 30 ? '...' : '');
      response += ` responding to: "${preview}"`;
    }
    return response.substring(0, maxLength);
  }

  async embed(texts: string[]): Promise<number[][]> {
    this.calls.push({ kind: 'embed', texts });
    await this.delay();
    this.maybeFail('embedding');

    const dimensions = this.config.dimensions ?? 64;
    return texts.map(text => this.config.vectors?.[text] ?? hashedEmbedding(text, dimensions));
  }
}

/**
 * Deterministic bag-of-words embedding: each lowercase token is hashed
 * (FNV-1a) into a bucket, and the vector is L2-normalised.
 */
export function hashedEmbedding(text: string, dimensions: number): number[] {
  const vector = new Array<number>(dimensions).fill(0);
  const tokens = text.toLowerCase().match(/[a-z0-9]+/g) ?? [];

  for (const token of tokens) {
    let hash = 0x811c9dc5;
    for (let i = 0; i < token.length; i++) {
      hash ^= token.charCodeAt(i);
      hash = Math.imul(hash, 0x01000193) >>> 0;
    }
    vector[hash % dimensions] += 1;
  }

  const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
  return norm === 0 ? vector : vector.map(v => v / norm);
}
