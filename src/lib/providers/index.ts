/**
 * Provider adapters for different LLM services
 */

export * from './openai';
export * from './anthropic';
export * from './mock/mock';
export * from './errors';
