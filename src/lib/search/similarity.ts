/**
 * Nearest-neighbour search over labelled examples by cosine similarity
 */
import { DimensionMismatchError, MissingEmbeddingError } from '../errors';
import { LabeledExample, Neighbor } from '../optimize/types';
import { debug } from '../utils/debug';

/**
 * Cosine similarity of two vectors. A zero vector has similarity 0 with anything.
 *
 * @throws DimensionMismatchError when the lengths differ
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new DimensionMismatchError(a.length, b.length);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Return the `k` candidates most similar to `queryVector`, most similar
 * first. Equal similarities keep their candidate order.
 *
 * @throws MissingEmbeddingError when a candidate was never embedded
 * @throws DimensionMismatchError when a candidate's embedding has another length
 */
export function findNeighbors(
  queryVector: readonly number[],
  candidates: readonly LabeledExample[],
  k: number
): Neighbor[] {
  if (k <= 0) return [];

  const scored: Neighbor[] = candidates.map((candidate, position) => {
    const { embedding } = candidate;
    if (!embedding) {
      throw new MissingEmbeddingError(position);
    }
    if (embedding.length !== queryVector.length) {
      throw new DimensionMismatchError(queryVector.length, embedding.length);
    }
    return { ...candidate, embedding, similarity: cosineSimilarity(queryVector, embedding) };
  });

  // Array.prototype.sort is stable, so ties stay in candidate order
  scored.sort((a, b) => b.similarity - a.similarity);

  const neighbors = scored.slice(0, Math.floor(k));
  debug('similarity', 'Selected %d of %d candidates (top similarity %s)', neighbors.length, candidates.length, neighbors[0]?.similarity);
  return neighbors;
}
