import { describe, it, expect } from 'vitest';
import { cosineSimilarity, findNeighbors } from '../../src/lib/search/similarity';
import { DimensionMismatchError, MissingEmbeddingError } from '../../src/lib/errors';
import { LabeledExample } from '../../src/lib/optimize/types';

function example(query: string, embedding?: number[], preferenceLabel: 0 | 1 = 1): LabeledExample {
  return { query, response: `answer to ${query}`, preferenceLabel, embedding };
}

describe('cosineSimilarity', () => {
  it('is 1 for parallel, 0 for orthogonal and -1 for opposite vectors', () => {
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1, 12);
    expect(cosineSimilarity([1, 0], [0, 3])).toBe(0);
    expect(cosineSimilarity([1, 1], [-1, -1])).toBeCloseTo(-1, 12);
  });

  it('is 0 when either vector is all zeros', () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it('throws on different lengths', () => {
    expect(() => cosineSimilarity([1, 2, 3], [1, 2])).toThrow(DimensionMismatchError);
    expect(() => cosineSimilarity([1, 2, 3], [1, 2])).toThrow('Vector dimension mismatch: expected 3, got 2');
  });
});

describe('findNeighbors', () => {
  const candidates = [
    example('a', [1, 0]),
    example('b', [0.6, 0.8]),
    example('c', [0, 1]),
    example('d', [-1, 0]),
  ];

  it('returns the most similar candidates first', () => {
    const neighbors = findNeighbors([1, 0], candidates, 3);

    expect(neighbors.map(n => n.query)).toEqual(['a', 'b', 'c']);
    expect(neighbors[0].similarity).toBeCloseTo(1, 12);
    expect(neighbors[1].similarity).toBeCloseTo(0.6, 12);
    expect(neighbors[2].similarity).toBe(0);
  });

  it('returns a sequence sorted by descending similarity', () => {
    const neighbors = findNeighbors([0.3, 0.7], candidates, candidates.length);
    for (let i = 1; i < neighbors.length; i++) {
      expect(neighbors[i - 1].similarity).toBeGreaterThanOrEqual(neighbors[i].similarity);
    }
  });

  it('returns every candidate when k exceeds the collection', () => {
    expect(findNeighbors([1, 0], candidates, 10)).toHaveLength(4);
  });

  it('returns nothing for k of zero or less', () => {
    expect(findNeighbors([1, 0], candidates, 0)).toEqual([]);
    expect(findNeighbors([1, 0], candidates, -2)).toEqual([]);
  });

  it('keeps candidate order for equal similarities', () => {
    const tied = [example('first', [2, 0]), example('second', [1, 0]), example('third', [3, 0])];
    expect(findNeighbors([1, 0], tied, 3).map(n => n.query)).toEqual(['first', 'second', 'third']);
  });

  it('is deterministic for the same inputs', () => {
    expect(findNeighbors([0.5, 0.5], candidates, 2)).toEqual(findNeighbors([0.5, 0.5], candidates, 2));
  });

  it('does not modify the candidates', () => {
    findNeighbors([1, 0], candidates, 2);
    expect(candidates[0]).toEqual(example('a', [1, 0]));
    expect('similarity' in candidates[0]).toBe(false);
  });

  it('throws when a candidate has another dimensionality', () => {
    expect(() => findNeighbors([1, 0, 0], candidates, 1)).toThrow(DimensionMismatchError);
  });

  it('throws when a candidate has no embedding', () => {
    const withGap = [example('a', [1, 0]), example('b')];
    expect(() => findNeighbors([1, 0], withGap, 1)).toThrow(MissingEmbeddingError);
    expect(() => findNeighbors([1, 0], withGap, 1)).toThrow('Candidate at position 1 has no embedding');
  });

  it('picks the password example for an account-recovery query', () => {
    // Pre-computed embeddings: the recovery query sits close to "reset password"
    const training = [
      { query: 'reset password', response: 'click forgot password', preferenceLabel: 1 as const, embedding: [0.9, 0.1, 0.2] },
      { query: 'refund policy', response: 'no refunds', preferenceLabel: 0 as const, embedding: [0.1, 0.95, 0.1] },
    ];
    const queryVector = [0.85, 0.15, 0.25];

    const neighbors = findNeighbors(queryVector, training, 1);

    expect(neighbors).toHaveLength(1);
    expect(neighbors[0]).toMatchObject({ query: 'reset password', response: 'click forgot password', preferenceLabel: 1 });
  });
});
