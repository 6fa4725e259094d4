import type { Chunk } from '@factsift/shared/src/types/document.types.js';
import type { DocumentScope } from '@factsift/shared/src/types/extraction.types.js';
import type { FactType } from '@factsift/shared/src/types/fact.types.js';
import type { FactTypeCatalog, PipelineConfig } from '@factsift/schemas/src/pipeline-config.schema.js';
import { createChildLogger } from '@factsift/shared/src/logger.js';
import { InvalidConfigurationError } from '@factsift/shared/src/utils/errors.js';
import type { EmbeddingClient } from '../embedding/embedding-client.js';
import type { ChunkRepository } from '../repositories/chunk.repository.js';
import { compareRecencyThenId } from '../repositories/chunk.repository.js';

const log = createChildLogger('rag:retriever');

export interface RetrievalRequest {
  readonly scope: DocumentScope;
  readonly factType: FactType;
  readonly k: number;
}

export interface RetrievedChunk {
  readonly chunk: Chunk;
  readonly similarity: number;
  readonly boost: number;
  readonly combinedScore: number;
}

export interface RetrieverDeps {
  readonly embeddingClient: EmbeddingClient;
  readonly chunkRepository: ChunkRepository;
  readonly catalog: FactTypeCatalog;
  readonly retrieval: PipelineConfig['retrieval'];
}

export interface Retriever {
  retrieve(request: RetrievalRequest): Promise<readonly RetrievedChunk[]>;
}

function compareRetrieved(a: RetrievedChunk, b: RetrievedChunk): number {
  return b.combinedScore - a.combinedScore || compareRecencyThenId(a.chunk, b.chunk);
}

export function createRetriever(deps: RetrieverDeps): Retriever {
  const { embeddingClient, chunkRepository, catalog, retrieval } = deps;
  const queryEmbeddings = new Map<FactType, Promise<number[]>>();

  function queryEmbedding(factType: FactType): Promise<number[]> {
    const cached = queryEmbeddings.get(factType);
    if (cached) {
      return cached;
    }
    const settings = catalog.factTypes[factType];
    if (!settings) {
      return Promise.reject(
        new InvalidConfigurationError(`No search query configured for fact type ${factType}`),
      );
    }
    const pending = embeddingClient
      .generateEmbedding(settings.searchQuery)
      .catch((error: unknown) => {
        // not cached: the next retrieval asks again
        queryEmbeddings.delete(factType);
        throw error;
      });
    queryEmbeddings.set(factType, pending);
    return pending;
  }

  return {
    async retrieve(request: RetrievalRequest): Promise<readonly RetrievedChunk[]> {
      const { scope, factType, k } = request;
      const embedding = await queryEmbedding(factType);

      const candidates = await chunkRepository.search({
        embedding,
        limit: k * retrieval.candidatePoolFactor,
        filter: { domain: scope.domain, documentIds: scope.documentIds },
      });

      const ranked = candidates
        .map(({ chunk, similarity }) => {
          const boost = chunk.patternBoosts[factType] ?? 0;
          return {
            chunk,
            similarity,
            boost,
            combinedScore: boost * retrieval.boostWeight + similarity,
          };
        })
        .sort(compareRetrieved)
        .slice(0, k);

      log.debug(
        {
          factType,
          candidates: candidates.length,
          returned: ranked.length,
          boosted: ranked.filter((r) => r.boost > 0).length,
        },
        'Retrieved chunks',
      );
      return ranked;
    },
  };
}
