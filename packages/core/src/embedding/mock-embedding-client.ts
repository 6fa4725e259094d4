import type { EmbeddingClient } from './embedding-client.js';

export interface MockEmbeddingOptions {
  readonly dimension?: number;
  readonly model?: string;
}

function hashCode(str: string): number {
  let hash = 0;
  for (let i = 0; i < str.length; i++) {
    const char = str.charCodeAt(i);
    hash = ((hash << 5) - hash + char) | 0;
  }
  return hash;
}

function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
}

/**
 * Hashed bag of words: texts sharing tokens land close together, so retrieval
 * over the mock still ranks by lexical overlap.
 */
function generateDeterministicVector(text: string, dimension: number): number[] {
  const vector = new Array<number>(dimension).fill(0);
  for (const token of tokenize(text)) {
    const hash = hashCode(token);
    const index = Math.abs(hash) % dimension;
    vector[index] += hash < 0 ? -1 : 1;
  }

  const magnitude = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
  if (magnitude === 0) {
    vector[0] = 1;
    return vector;
  }
  return vector.map((v) => v / magnitude);
}

export function createMockEmbeddingClient(options: MockEmbeddingOptions = {}): EmbeddingClient {
  const { dimension = 64, model = 'mock-embedding' } = options;

  return {
    model,
    dimension,

    generateEmbedding(text: string): Promise<number[]> {
      return Promise.resolve(generateDeterministicVector(text, dimension));
    },

    generateEmbeddings(texts: readonly string[]): Promise<number[][]> {
      return Promise.resolve(texts.map((t) => generateDeterministicVector(t, dimension)));
    },
  };
}
