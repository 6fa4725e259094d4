import { createChunker } from '@factsift/ingestion/src/text/chunker.js';
import { createPatternDetector } from '@factsift/ingestion/src/patterns/pattern-detector.js';
import type { AppConfig } from '@factsift/schemas/src/config-loader.js';
import type { ProviderConfig, VectorStoreConfig } from '@factsift/schemas/src/provider-config.js';
import { createChildLogger } from '@factsift/shared/src/logger.js';
import type { EmbeddingClient } from '../embedding/embedding-client.js';
import { createEmbeddingClient } from '../embedding/create-embedding-client.js';
import type { FactExtractor } from '../extraction/fact-extractor.js';
import { createFactExtractor } from '../extraction/fact-extractor.js';
import type { DocumentIngestor } from '../ingestion/document-ingestor.js';
import { createDocumentIngestor } from '../ingestion/document-ingestor.js';
import type { LlmClient } from '../llm/llm-client.js';
import { createLlmClient } from '../llm/llm-client.js';
import type { ExtractionBatchRunner } from '../orchestration/extraction-batch.js';
import { createExtractionBatchRunner } from '../orchestration/extraction-batch.js';
import { createRetriever } from '../rag/retriever.js';
import type { ChunkRepository } from '../repositories/chunk.repository.js';
import type { ExtractionResultRepository } from '../repositories/extraction-result.repository.js';
import type { IngestionStatsRepository } from '../repositories/ingestion-stats.repository.js';
import { createInMemoryChunkRepository } from '../repositories/in-memory-chunk.repository.js';
import { createInMemoryExtractionResultRepository } from '../repositories/in-memory-extraction-result.repository.js';
import { createInMemoryIngestionStatsRepository } from '../repositories/in-memory-ingestion-stats.repository.js';
import { createFirestoreChunkRepository } from './firestore-chunk.repository.js';
import { createFirestoreClient } from './firestore-client.js';
import { createFirestoreExtractionResultRepository } from './firestore-extraction-result.repository.js';
import { createFirestoreIngestionStatsRepository } from './firestore-ingestion-stats.repository.js';

const log = createChildLogger('infrastructure:services');

export interface Repositories {
  readonly chunkRepository: ChunkRepository;
  readonly resultRepository: ExtractionResultRepository;
  readonly statsRepository: IngestionStatsRepository;
}

export interface PipelineServices extends Repositories {
  readonly embeddingClient: EmbeddingClient;
  readonly llmClient: LlmClient;
  readonly ingestor: DocumentIngestor;
  readonly extractor: FactExtractor;
  readonly batchRunner: ExtractionBatchRunner;
}

export function createRepositories(store: VectorStoreConfig): Repositories {
  if (store.kind === 'memory') {
    log.info('Using in-memory repositories');
    return {
      chunkRepository: createInMemoryChunkRepository(),
      resultRepository: createInMemoryExtractionResultRepository(),
      statsRepository: createInMemoryIngestionStatsRepository(),
    };
  }

  log.info({ projectId: store.projectId, databaseId: store.databaseId }, 'Using Firestore repositories');
  const db = createFirestoreClient(store);
  return {
    chunkRepository: createFirestoreChunkRepository(db),
    resultRepository: createFirestoreExtractionResultRepository(db),
    statsRepository: createFirestoreIngestionStatsRepository(db),
  };
}

/** Wires every component from configuration built once at process start. */
export async function createPipelineServices(
  config: AppConfig,
  providers: ProviderConfig,
): Promise<PipelineServices> {
  const { pipeline, catalog } = config;
  // Chunk sizing is rejected here, before any provider is touched.
  const chunker = createChunker(pipeline.chunking);
  const repositories = createRepositories(providers.store);
  const embeddingClient = createEmbeddingClient(providers.embedding);
  const llmClient = await createLlmClient(providers.llm);

  const ingestor = createDocumentIngestor({
    chunker,
    patternDetector: createPatternDetector({ flagThreshold: pipeline.patterns.flagThreshold }),
    embeddingClient,
    chunkRepository: repositories.chunkRepository,
    statsRepository: repositories.statsRepository,
  });

  const extractor = createFactExtractor({
    retriever: createRetriever({
      embeddingClient,
      chunkRepository: repositories.chunkRepository,
      catalog,
      retrieval: pipeline.retrieval,
    }),
    llmClient,
    catalog,
    extraction: pipeline.extraction,
    dedup: pipeline.dedup,
  });

  const batchRunner = createExtractionBatchRunner({
    extractor,
    resultRepository: repositories.resultRepository,
    concurrency: pipeline.extraction.concurrency,
  });

  return { ...repositories, embeddingClient, llmClient, ingestor, extractor, batchRunner };
}
