import type { Chunk, ChunkSearchResult, NewChunk } from '@factsift/shared/src/types/document.types.js';
import { DimensionMismatchError } from '@factsift/shared/src/utils/errors.js';
import { cosineSimilarity } from '@factsift/shared/src/utils/math.js';
import type {
  ChunkRepository,
  ChunkSearchParams,
  IngestOutcome,
  SupersededVersion,
} from './chunk.repository.js';
import { compareSearchResults, matchesFilter, utf8Length } from './chunk.repository.js';

interface StoredChunk {
  chunk: Chunk;
  superseded: boolean;
}

export interface InMemoryChunkRepositoryOptions {
  readonly now?: () => Date;
}

export function createInMemoryChunkRepository(
  options: InMemoryChunkRepositoryOptions = {},
): ChunkRepository {
  const now = options.now ?? (() => new Date());
  const chunks = new Map<string, StoredChunk>();
  const activeVersions = new Map<string, SupersededVersion>();
  let indexDimension: number | null = null;

  function dimensionMismatch(actual: number, context: string): DimensionMismatchError | null {
    if (indexDimension !== null && actual !== indexDimension) {
      return new DimensionMismatchError(indexDimension, actual, context);
    }
    return null;
  }

  function supersedeVersion(version: SupersededVersion): void {
    for (const stored of chunks.values()) {
      if (stored.chunk.documentId === version.documentId && !stored.superseded) {
        stored.superseded = true;
      }
    }
  }

  return {
    getActiveVersion(documentId: string): Promise<SupersededVersion | null> {
      return Promise.resolve(activeVersions.get(documentId) ?? null);
    },

    ingest(input: NewChunk): Promise<IngestOutcome> {
      if (input.embedding.length !== input.embeddingDimension) {
        return Promise.reject(
          new DimensionMismatchError(
            input.embeddingDimension,
            input.embedding.length,
            `chunk ${input.chunkId}`,
          ),
        );
      }
      const mismatch = dimensionMismatch(input.embedding.length, `ingest of chunk ${input.chunkId}`);
      if (mismatch) {
        return Promise.reject(mismatch);
      }
      if (indexDimension === null) {
        indexDimension = input.embedding.length;
      }

      const active = activeVersions.get(input.documentId);
      const existing = chunks.get(input.chunkId);
      const sizeBytes = utf8Length(input.text);

      if (active && active.contentHash === input.contentHash) {
        if (existing && !existing.superseded) {
          return Promise.resolve({
            chunkId: input.chunkId,
            created: false,
            activatedVersion: false,
            supersededChunks: 0,
            supersededVersion: null,
          });
        }
        chunks.set(input.chunkId, { chunk: { ...input, ingestedAt: now() }, superseded: false });
        activeVersions.set(input.documentId, {
          ...active,
          chunkCount: active.chunkCount + 1,
          sizeBytes: active.sizeBytes + sizeBytes,
        });
        return Promise.resolve({
          chunkId: input.chunkId,
          created: true,
          activatedVersion: false,
          supersededChunks: 0,
          supersededVersion: null,
        });
      }

      if (active) {
        supersedeVersion(active);
      }
      chunks.set(input.chunkId, { chunk: { ...input, ingestedAt: now() }, superseded: false });
      activeVersions.set(input.documentId, {
        documentId: input.documentId,
        contentHash: input.contentHash,
        domain: input.domain,
        chunkCount: 1,
        totalChunks: input.totalChunks,
        sizeBytes,
      });

      return Promise.resolve({
        chunkId: input.chunkId,
        created: true,
        activatedVersion: true,
        supersededChunks: active?.chunkCount ?? 0,
        supersededVersion: active ?? null,
      });
    },

    search(params: ChunkSearchParams): Promise<readonly ChunkSearchResult[]> {
      if (indexDimension === null) {
        return Promise.resolve([]);
      }
      const mismatch = dimensionMismatch(params.embedding.length, 'chunk search');
      if (mismatch) {
        return Promise.reject(mismatch);
      }

      const results = [...chunks.values()]
        .filter((stored) => !stored.superseded && matchesFilter(stored.chunk, params.filter))
        .map((stored) => ({
          chunk: stored.chunk,
          similarity: cosineSimilarity(params.embedding, stored.chunk.embedding),
        }))
        .sort(compareSearchResults)
        .slice(0, params.limit);

      return Promise.resolve(results);
    },

    getActiveChunks(documentId: string): Promise<readonly Chunk[]> {
      return Promise.resolve(
        [...chunks.values()]
          .filter((stored) => stored.chunk.documentId === documentId && !stored.superseded)
          .map((stored) => stored.chunk)
          .sort((a, b) => a.chunkIndex - b.chunkIndex),
      );
    },

    getIndexDimension(): Promise<number | null> {
      return Promise.resolve(indexDimension);
    },
  };
}
