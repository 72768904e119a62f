/**
 * OpenAI provider adapter
 */
import OpenAI from 'openai';
import { ModelDefinition, ModelAdapter, EmbeddingAdapter, ApiClientConfig, ChatMessage, CompletionOptions } from '../types';
import { ProviderError } from '../errors';
import { debug } from '../utils/debug';
import { toProviderError } from './errors';

/**
 * OpenAI-specific configuration options
 */
export interface OpenAIConfig extends ApiClientConfig {
  /** Override organization ID */
  organization?: string;
}

/**
 * Adapter for OpenAI chat and embedding models
 */
export class OpenAIModelAdapter implements ModelAdapter, EmbeddingAdapter {
  private client: OpenAI;
  private modelDef: ModelDefinition<OpenAIConfig>;

  /**
   * Create a new OpenAI adapter
   *
   * @param modelDef - The model definition
   * @param client - Pre-built SDK client; one is created from the config when omitted
   */
  constructor(modelDef: ModelDefinition<OpenAIConfig>, client?: OpenAI) {
    this.modelDef = modelDef;
    debug('llm', 'Creating OpenAI adapter for model: %s', modelDef.model);

    const config = modelDef.config ?? {};

    // Retries are owned by the caller's retry policy, so the SDK's are off by default
    this.client = client ?? new OpenAI({
      apiKey: config.apiKey ?? process.env.OPENAI_API_KEY,
      organization: config.organization ?? process.env.OPENAI_ORGANIZATION,
      baseURL: config.baseUrl,
      timeout: config.timeout,
      maxRetries: config.maxRetries ?? 0,
    });
  }

  get embeddingModel(): string {
    return this.modelDef.model;
  }

  /**
   * Send a single prompt as a user message
   */
  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    debug('llm', 'Prompt length: %d characters', prompt.length);
    return this.chat([{ role: 'user', content: prompt }], options);
  }

  /**
   * Generate a chat completion and return the assistant's text
   */
  async chat(messages: ChatMessage[], options: CompletionOptions = {}): Promise<string> {
    debug('llm', 'Sending chat request to OpenAI model: %s', this.modelDef.model);
    debug('llm', 'Chat options: %o', options);
    debug('llm', 'Messages count: %d', messages.length);

    const params: OpenAI.Chat.ChatCompletionMessageParam[] = messages.map(toOpenAIMessage);
    if (options.system) {
      params.unshift({ role: 'system', content: options.system });
    }

    try {
      const response = await this.client.chat.completions.create({
        model: this.modelDef.model,
        messages: params,
        max_tokens: options.maxTokens,
        temperature: options.temperature ?? 0.7,
        top_p: options.topP,
        stop: options.stop,
      });

      const content = response.choices[0]?.message?.content ?? '';
      debug('llm', 'Received chat response of %d characters', content.length);
      return content;
    } catch (error) {
      debug('llm', 'OpenAI chat completion error: %o', error);
      throw toProviderError(error, 'openai', OpenAI);
    }
  }

  /**
   * Embed a batch of texts with the configured embedding model
   */
  async embed(texts: string[]): Promise<number[][]> {
    debug('embedding', 'Requesting %d embeddings from OpenAI model: %s', texts.length, this.modelDef.model);

    let response: OpenAI.CreateEmbeddingResponse;
    try {
      response = await this.client.embeddings.create({
        model: this.modelDef.model,
        input: texts,
      });
    } catch (error) {
      debug('embedding', 'OpenAI embedding error: %o', error);
      throw toProviderError(error, 'openai', OpenAI);
    }

    if (response.data.length !== texts.length) {
      throw new ProviderError(
        'malformed',
        'openai',
        `expected ${texts.length} embeddings, received ${response.data.length}`
      );
    }

    return [...response.data]
      .sort((a, b) => a.index - b.index)
      .map(item => item.embedding);
  }
}

function toOpenAIMessage(message: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    default:
      return { role: 'user', content: message.content };
  }
}
