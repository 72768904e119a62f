/**
 * Anthropic provider adapter
 */
import Anthropic from '@anthropic-ai/sdk';
import { ModelDefinition, ModelAdapter, ApiClientConfig, ChatMessage, CompletionOptions } from '../types';
import { debug } from '../utils/debug';
import { toProviderError } from './errors';

/**
 * Anthropic-specific configuration options
 */
export type AnthropicConfig = ApiClientConfig;

const DEFAULT_SYSTEM = 'You are a helpful assistant.';

/**
 * Adapter for Anthropic models.
 * Anthropic has no embeddings endpoint, so this adapter only generates text.
 */
export class AnthropicModelAdapter implements ModelAdapter {
  private client: Anthropic;
  private modelDef: ModelDefinition<AnthropicConfig>;

  /**
   * Create a new Anthropic adapter
   *
   * @param modelDef - The model definition
   * @param client - Pre-built SDK client; one is created from the config when omitted
   */
  constructor(modelDef: ModelDefinition<AnthropicConfig>, client?: Anthropic) {
    this.modelDef = modelDef;
    debug('llm', 'Creating Anthropic adapter for model: %s', modelDef.model);

    const config = modelDef.config ?? {};

    this.client = client ?? new Anthropic({
      apiKey: config.apiKey ?? process.env.ANTHROPIC_API_KEY,
      baseURL: config.baseUrl,
      timeout: config.timeout,
      maxRetries: config.maxRetries ?? 0,
    });
  }

  /**
   * Send a single prompt as a user message
   */
  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    return this.chat([{ role: 'user', content: prompt }], options);
  }

  /**
   * Generate a message and return its concatenated text blocks
   */
  async chat(messages: ChatMessage[], options: CompletionOptions = {}): Promise<string> {
    debug('llm', 'Sending chat request to Anthropic model: %s', this.modelDef.model);
    debug('llm', 'Messages count: %d', messages.length);

    // System turns move into the top-level system parameter
    const systemParts = messages.filter(m => m.role === 'system').map(m => m.content);
    if (options.system) systemParts.unshift(options.system);

    const conversation: Anthropic.MessageParam[] = messages
      .filter(m => m.role !== 'system')
      .map((m): Anthropic.MessageParam => ({ role: m.role === 'assistant' ? 'assistant' : 'user', content: m.content }));

    try {
      const response = await this.client.messages.create({
        model: this.modelDef.model,
        system: systemParts.length > 0 ? systemParts.join('\n\n') : DEFAULT_SYSTEM,
        messages: conversation,
        max_tokens: options.maxTokens ?? 1024,
        temperature: options.temperature ?? 0.7,
        top_p: options.topP,
        stop_sequences: options.stop,
      });

      const text = response.content
        .map(block => (block.type === 'text' ? block.text : ''))
        .join('');
      debug('llm', 'Received chat response of %d characters', text.length);
      return text;
    } catch (error) {
      debug('llm', 'Anthropic chat completion error: %o', error);
      throw toProviderError(error, 'anthropic', Anthropic);
    }
  }
}
