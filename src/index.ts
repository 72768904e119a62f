/**
 * query-optimizer – root export
 */

export * from './lib/types';
export * from './lib/errors';
export * from './lib/retry';
export * from './lib/config';
export * from './lib/core';
export { ModelRegistry, openai, anthropic, mock, defineModel } from './lib/models';
export * from './lib/providers';
export { Store } from './lib/storage';
export type { ArtifactType, ArtifactMetadata } from './lib/storage';

export * from './lib/optimize/types';
export { buildFewShotBlock, feedbackLabel } from './lib/optimize/few-shot';
export * from './lib/optimize/synthesizer';
export * from './lib/optimize/generator';
export * from './lib/optimize/judge';

export { EmbeddingClient, DEFAULT_BATCH_SIZE } from './lib/embeddings/client';
export type { EmbeddingClientOptions } from './lib/embeddings/client';
export { EmbeddingCache } from './lib/embeddings/cache';
export { cosineSimilarity, findNeighbors } from './lib/search/similarity';

export * from './lib/evaluation/statistics';
export * from './lib/evaluation/dataset';
export * from './lib/evaluation/runner';
export * from './lib/evaluation/report';

export { debug, warn, enableDebug, enableNamespace, parseDebugString, resetDebug } from './lib/utils/debug';
