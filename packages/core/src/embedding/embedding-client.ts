import { DimensionMismatchError } from '@factsift/shared/src/utils/errors.js';

export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-005';

export interface EmbeddingClient {
  readonly model: string;
  readonly dimension: number;
  generateEmbedding(text: string): Promise<number[]>;
  generateEmbeddings(texts: readonly string[]): Promise<number[][]>;
}

export function assertEmbeddingDimensions(
  vectors: readonly (readonly number[])[],
  dimension: number,
  context: string,
): void {
  for (const vector of vectors) {
    if (vector.length !== dimension) {
      throw new DimensionMismatchError(dimension, vector.length, context);
    }
  }
}
