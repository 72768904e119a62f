/**
 * Type definitions shared by the provider layer
 */

/**
 * Supported model providers
 */
export enum ModelProvider {
  OPENAI = 'openai',
  ANTHROPIC = 'anthropic',
  MOCK = 'mock',
}

/**
 * Common configuration options for API clients
 */
export interface ApiClientConfig {
  /** API key to use for authentication */
  apiKey?: string;

  /** Base URL to use for API requests */
  baseUrl?: string;

  /** Maximum number of retries the vendor SDK performs on its own */
  maxRetries?: number;

  /** Timeout in milliseconds for requests */
  timeout?: number;
}

/**
 * Definition of a model including provider and model ID
 */
export interface ModelDefinition<TConfig extends ApiClientConfig = ApiClientConfig> {
  /** The LLM provider (OpenAI, Anthropic, etc.) */
  provider: ModelProvider;

  /** The specific model identifier */
  model: string;

  /** Optional configuration for the model */
  config?: TConfig;
}

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

/**
 * Sampling options understood by every adapter
 */
export interface CompletionOptions {
  temperature?: number;
  maxTokens?: number;
  topP?: number;
  stop?: string[];
  /** System instruction; prepended to the conversation */
  system?: string;
}

/**
 * Generic model adapter that handles communication with LLM APIs
 */
export interface ModelAdapter {
  /** Send a single prompt and return the text answer */
  complete(prompt: string, options?: CompletionOptions): Promise<string>;

  /** Send a conversation and return the assistant's text answer */
  chat(messages: ChatMessage[], options?: CompletionOptions): Promise<string>;
}

/**
 * Adapter for providers that expose an embeddings endpoint
 */
export interface EmbeddingAdapter {
  /** Embedding model identifier, used to key caches */
  readonly embeddingModel: string;

  /** Embed each text; the result is index-aligned with the input */
  embed(texts: string[]): Promise<number[][]>;
}
