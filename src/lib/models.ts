/**
 * Model registry and adapters for different LLM providers
 */
import { ModelDefinition, ModelProvider, ModelAdapter, EmbeddingAdapter, ApiClientConfig } from './types';
import { OpenAIModelAdapter, OpenAIConfig, AnthropicModelAdapter, AnthropicConfig, MockModelAdapter, MockConfig } from './providers';
import { ConfigurationError } from './errors';
import { debug } from './utils/debug';

type AnyAdapter = OpenAIModelAdapter | AnthropicModelAdapter | MockModelAdapter;

/**
 * Create an OpenAI model definition
 *
 * @example
 * ```typescript
 * const nano = openai('gpt-4.1-nano');
 * ```
 */
export function openai(model: string, config: OpenAIConfig = {}): ModelDefinition<OpenAIConfig> {
  return { provider: ModelProvider.OPENAI, model, config };
}

/**
 * Create an Anthropic model definition
 */
export function anthropic(model: string, config: AnthropicConfig = {}): ModelDefinition<AnthropicConfig> {
  return { provider: ModelProvider.ANTHROPIC, model, config };
}

/**
 * Create a mock model definition (for testing)
 *
 * @example
 * ```typescript
 * const judge = mock('judge', { responses: { chat: '{"score": 1}' } });
 * ```
 */
export function mock(model: string, config: MockConfig = {}): ModelDefinition<MockConfig> {
  return { provider: ModelProvider.MOCK, model, config };
}

/**
 * Build a definition for a provider chosen at runtime (e.g. from configuration)
 */
export function defineModel(provider: ModelProvider, model: string, config: ApiClientConfig = {}): ModelDefinition {
  return { provider, model, config };
}

/**
 * Registry for model definitions and adapters.
 * Each instance owns its adapters; pass it to whatever needs models.
 */
export class ModelRegistry {
  private registeredModels = new Map<string, ModelDefinition>();
  private adapters = new Map<string, AnyAdapter>();

  /**
   * Register multiple models with aliases
   *
   * @param modelMap - Object mapping aliases to model definitions
   * @returns The registry for chaining
   */
  registerModels(modelMap: Record<string, ModelDefinition>): this {
    Object.entries(modelMap).forEach(([alias, definition]) => {
      this.registeredModels.set(alias, definition);
    });
    return this;
  }

  /**
   * Get a model definition by its alias
   */
  getModel(alias: string): ModelDefinition | undefined {
    return this.registeredModels.get(alias);
  }

  /**
   * List all registered models with their aliases and definitions
   */
  listModels(): Array<{ alias: string; definition: ModelDefinition }> {
    return [...this.registeredModels.entries()].map(([alias, definition]) => ({ alias, definition }));
  }

  /**
   * Get or create the text-generation adapter for a model
   *
   * @param model - A definition or a registered alias
   */
  getAdapter(model: ModelDefinition | string): ModelAdapter {
    return this.resolveAdapter(this.resolve(model));
  }

  /**
   * Get or create the embedding adapter for a model
   *
   * @param model - A definition or a registered alias
   */
  getEmbeddingAdapter(model: ModelDefinition | string): EmbeddingAdapter {
    const definition = this.resolve(model);
    const adapter = this.resolveAdapter(definition);
    if (adapter instanceof AnthropicModelAdapter) {
      throw new ConfigurationError(`Provider ${definition.provider} does not offer embeddings`);
    }
    return adapter;
  }

  /**
   * Clear all registered models and adapters
   */
  clear(): void {
    this.registeredModels.clear();
    this.adapters.clear();
  }

  private resolve(model: ModelDefinition | string): ModelDefinition {
    if (typeof model !== 'string') return model;
    const found = this.registeredModels.get(model);
    if (!found) throw new ConfigurationError(`Model alias not found: ${model}`);
    return found;
  }

  private resolveAdapter(modelDef: ModelDefinition): AnyAdapter {
    const cacheKey = `${modelDef.provider}:${modelDef.model}`;

    const cached = this.adapters.get(cacheKey);
    if (cached) return cached;

    let adapter: AnyAdapter;
    switch (modelDef.provider) {
      case ModelProvider.OPENAI:
        adapter = new OpenAIModelAdapter(modelDef);
        break;

      case ModelProvider.ANTHROPIC:
        adapter = new AnthropicModelAdapter(modelDef);
        break;

      case ModelProvider.MOCK:
        adapter = new MockModelAdapter(modelDef);
        break;

      default:
        throw new ConfigurationError(`Unsupported model provider: ${String(modelDef.provider)}`);
    }

    debug('llm', 'Created %s adapter for %s', modelDef.provider, modelDef.model);
    this.adapters.set(cacheKey, adapter);
    return adapter;
  }
}
