import type { EmbeddingProviderConfig } from '@factsift/schemas/src/provider-config.js';
import type { EmbeddingClient } from './embedding-client.js';
import { createMockEmbeddingClient } from './mock-embedding-client.js';
import { createVertexEmbeddingClient } from './vertex-embedding-client.js';

export function createEmbeddingClient(config: EmbeddingProviderConfig): EmbeddingClient {
  if (config.kind === 'mock') {
    return createMockEmbeddingClient({ dimension: config.dimension });
  }
  return createVertexEmbeddingClient(config);
}
