import { describe, it, expect } from 'vitest';
import { cosineSimilarity } from '@factsift/shared/src/utils/math.js';
import { DimensionMismatchError } from '@factsift/shared/src/utils/errors.js';
import { createMockEmbeddingClient } from './mock-embedding-client.js';
import { assertEmbeddingDimensions } from './embedding-client.js';

describe('MockEmbeddingClient', () => {
  it('should generate embedding with the configured dimension', async () => {
    const client = createMockEmbeddingClient({ dimension: 32 });
    const embedding = await client.generateEmbedding('test input');

    expect(client.dimension).toBe(32);
    expect(embedding).toHaveLength(32);
  });

  it('should generate deterministic embeddings for same input', async () => {
    const client = createMockEmbeddingClient();
    const e1 = await client.generateEmbedding('office address');
    const e2 = await client.generateEmbedding('office address');

    expect(e1).toEqual(e2);
  });

  it('should place texts sharing words closer than unrelated texts', async () => {
    const client = createMockEmbeddingClient({ dimension: 256 });
    const [query, related, unrelated] = await client.generateEmbeddings([
      'office address street',
      'our office address is on main street',
      'jury verdict amount',
    ]);

    expect(cosineSimilarity(query, related)).toBeGreaterThan(cosineSimilarity(query, unrelated));
  });

  it('should generate normalized unit vectors', async () => {
    const client = createMockEmbeddingClient();
    const embedding = await client.generateEmbedding('test');

    const magnitude = Math.sqrt(embedding.reduce((sum, v) => sum + v * v, 0));
    expect(magnitude).toBeCloseTo(1.0, 5);
  });

  it('should return a unit vector for text without tokens', async () => {
    const client = createMockEmbeddingClient({ dimension: 4 });
    expect(await client.generateEmbedding('...')).toEqual([1, 0, 0, 0]);
  });
});

describe('assertEmbeddingDimensions', () => {
  it('should throw DimensionMismatchError for a wrong length', () => {
    expect(() => assertEmbeddingDimensions([[0.1, 0.2]], 3, 'test')).toThrow(
      DimensionMismatchError,
    );
  });

  it('should accept vectors of the expected length', () => {
    expect(() => assertEmbeddingDimensions([[1, 0, 0]], 3, 'test')).not.toThrow();
  });
});
