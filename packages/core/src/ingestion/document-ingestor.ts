import type { Chunker } from '@factsift/ingestion/src/text/chunker.js';
import type { PatternDetector } from '@factsift/ingestion/src/patterns/pattern-detector.js';
import type { DocumentInput, NewChunk } from '@factsift/shared/src/types/document.types.js';
import { createChildLogger } from '@factsift/shared/src/logger.js';
import { createSemaphore } from '@factsift/shared/src/utils/concurrency.js';
import { FactsiftError, IngestionError, toError } from '@factsift/shared/src/utils/errors.js';
import { stableId } from '@factsift/shared/src/utils/hash.js';
import type { EmbeddingClient } from '../embedding/embedding-client.js';
import { assertEmbeddingDimensions } from '../embedding/embedding-client.js';
import type { ChunkRepository, IngestOutcome } from '../repositories/chunk.repository.js';
import { isVersionComplete, utf8Length } from '../repositories/chunk.repository.js';
import type {
  IngestionDelta,
  IngestionStatsRepository,
} from '../repositories/ingestion-stats.repository.js';
import { toSourceDocument } from './document-source.js';

const log = createChildLogger('ingestion:document');

export interface DocumentIngestorDeps {
  readonly chunker: Chunker;
  readonly patternDetector: PatternDetector;
  readonly embeddingClient: EmbeddingClient;
  readonly chunkRepository: ChunkRepository;
  readonly statsRepository: IngestionStatsRepository;
}

export interface DocumentIngestionReport {
  readonly documentId: string;
  readonly domain: string;
  readonly contentHash: string;
  /** True when the active version already had this content. */
  readonly unchanged: boolean;
  readonly chunksCreated: number;
  readonly chunksSuperseded: number;
}

export interface IngestionFailure {
  readonly documentId: string;
  readonly kind: string;
  readonly message: string;
}

export interface BatchIngestionReport {
  readonly ingested: readonly DocumentIngestionReport[];
  readonly failures: readonly IngestionFailure[];
}

export interface IngestDocumentsOptions {
  readonly concurrency: number;
}

export interface DocumentIngestor {
  ingestDocument(input: DocumentInput): Promise<DocumentIngestionReport>;
  ingestDocuments(
    inputs: readonly DocumentInput[],
    options: IngestDocumentsOptions,
  ): Promise<BatchIngestionReport>;
}

interface MutableDelta {
  documents: number;
  chunks: number;
  bytes: number;
}

/**
 * Turns write outcomes into per-domain statistic deltas. Only writes that
 * actually changed the active set contribute.
 */
export function deltasFromOutcomes(
  domain: string,
  outcomes: readonly IngestOutcome[],
  sizes: ReadonlyMap<string, number>,
): Map<string, MutableDelta> {
  const deltas = new Map<string, MutableDelta>();
  const deltaFor = (key: string): MutableDelta => {
    const existing = deltas.get(key);
    if (existing) {
      return existing;
    }
    const created: MutableDelta = { documents: 0, chunks: 0, bytes: 0 };
    deltas.set(key, created);
    return created;
  };

  for (const outcome of outcomes) {
    if (!outcome.created) {
      continue;
    }
    const delta = deltaFor(domain);
    delta.chunks += 1;
    delta.bytes += sizes.get(outcome.chunkId) ?? 0;

    if (!outcome.activatedVersion) {
      continue;
    }
    const previous = outcome.supersededVersion;
    if (previous) {
      const previousDelta = deltaFor(previous.domain);
      previousDelta.chunks -= previous.chunkCount;
      previousDelta.bytes -= previous.sizeBytes;
      previousDelta.documents -= 1;
    }
    delta.documents += 1;
  }
  return deltas;
}

function errorKind(error: Error): string {
  return error instanceof FactsiftError ? error.code : 'INGESTION_ERROR';
}

export function createDocumentIngestor(deps: DocumentIngestorDeps): DocumentIngestor {
  const { chunker, patternDetector, embeddingClient, chunkRepository, statsRepository } = deps;

  async function applyStatistics(
    domain: string,
    outcomes: readonly IngestOutcome[],
    chunks: readonly NewChunk[],
  ): Promise<void> {
    const sizes = new Map(chunks.map((chunk) => [chunk.chunkId, utf8Length(chunk.text)]));
    const deltas = deltasFromOutcomes(domain, outcomes, sizes);
    for (const [deltaDomain, delta] of deltas) {
      const update: IngestionDelta =
        deltaDomain === domain
          ? {
              ...delta,
              embeddingModel: embeddingClient.model,
              embeddingDimension: embeddingClient.dimension,
            }
          : delta;
      await statsRepository.applyIngestion(deltaDomain, update);
    }
  }

  async function ingestDocument(input: DocumentInput): Promise<DocumentIngestionReport> {
    const document = toSourceDocument(input);
    const { domain, contentHash } = document.metadata;

    const active = await chunkRepository.getActiveVersion(document.documentId);
    if (active && active.contentHash === contentHash && !isVersionComplete(active)) {
      log.warn(
        {
          documentId: document.documentId,
          storedChunks: active.chunkCount,
          totalChunks: active.totalChunks,
        },
        'Resuming interrupted document version',
      );
    } else if (active && active.contentHash === contentHash) {
      log.debug({ documentId: document.documentId }, 'Document unchanged, skipping');
      return {
        documentId: document.documentId,
        domain,
        contentHash,
        unchanged: true,
        chunksCreated: 0,
        chunksSuperseded: 0,
      };
    }

    const spans = chunker.split(document.sourceText);
    const embeddings = await embeddingClient.generateEmbeddings(spans.map((span) => span.text));
    if (embeddings.length !== spans.length) {
      throw new IngestionError(
        `Embedding count mismatch for ${document.documentId}: expected ${String(spans.length)}, got ${String(embeddings.length)}`,
      );
    }
    assertEmbeddingDimensions(embeddings, embeddingClient.dimension, `document ${document.documentId}`);

    const chunks: NewChunk[] = spans.map((span, i) => {
      const detection = patternDetector.detectAll(span.text);
      return {
        chunkId: stableId([document.documentId, contentHash, String(span.index)]),
        documentId: document.documentId,
        contentHash,
        domain,
        text: span.text,
        startOffset: span.startOffset,
        endOffset: span.endOffset,
        chunkIndex: span.index,
        totalChunks: spans.length,
        patternFlags: detection.flags,
        patternBoosts: detection.boosts,
        patternCounts: detection.counts,
        embedding: embeddings[i],
        embeddingModel: embeddingClient.model,
        embeddingDimension: embeddingClient.dimension,
        metadata: { path: document.metadata.path },
      };
    });

    // In order: the first write activates the new version and supersedes the old one.
    const outcomes: IngestOutcome[] = [];
    try {
      for (const chunk of chunks) {
        outcomes.push(await chunkRepository.ingest(chunk));
      }
    } finally {
      // Writes that landed before a failure are counted too.
      await applyStatistics(domain, outcomes, chunks);
    }

    const report: DocumentIngestionReport = {
      documentId: document.documentId,
      domain,
      contentHash,
      unchanged: false,
      chunksCreated: outcomes.filter((outcome) => outcome.created).length,
      chunksSuperseded: outcomes.reduce((sum, outcome) => sum + outcome.supersededChunks, 0),
    };
    log.info(
      {
        documentId: report.documentId,
        domain,
        chunksCreated: report.chunksCreated,
        chunksSuperseded: report.chunksSuperseded,
      },
      'Document ingested',
    );
    return report;
  }

  return {
    ingestDocument,

    async ingestDocuments(
      inputs: readonly DocumentInput[],
      options: IngestDocumentsOptions,
    ): Promise<BatchIngestionReport> {
      const semaphore = createSemaphore(options.concurrency);
      const ingested: DocumentIngestionReport[] = [];
      const failures: IngestionFailure[] = [];

      await Promise.all(
        inputs.map((input) =>
          semaphore.run(async () => {
            try {
              ingested.push(await ingestDocument(input));
            } catch (error) {
              const err = toError(error);
              log.warn(
                { documentId: input.documentId, kind: errorKind(err), err },
                'Document ingestion failed',
              );
              failures.push({ documentId: input.documentId, kind: errorKind(err), message: err.message });
            }
          }),
        ),
      );

      log.info(
        { documents: inputs.length, ingested: ingested.length, failed: failures.length },
        'Batch ingestion completed',
      );
      return { ingested, failures };
    },
  };
}
