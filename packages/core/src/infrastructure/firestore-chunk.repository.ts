import type { Firestore, Query, Transaction, VectorValue } from '@google-cloud/firestore';
import { FieldValue, Timestamp } from '@google-cloud/firestore';
import type {
  Chunk,
  ChunkSearchResult,
  NewChunk,
  PatternBoosts,
  PatternCounts,
} from '@factsift/shared/src/types/document.types.js';
import type { FactType } from '@factsift/shared/src/types/fact.types.js';
import { createChildLogger } from '@factsift/shared/src/logger.js';
import { DimensionMismatchError } from '@factsift/shared/src/utils/errors.js';
import type {
  ChunkRepository,
  ChunkSearchParams,
  IngestOutcome,
  SupersededVersion,
} from '../repositories/chunk.repository.js';
import { compareSearchResults, utf8Length } from '../repositories/chunk.repository.js';
import { stripUndefined, toPersistenceError } from './firestore-converters.js';

const log = createChildLogger('firestore:chunks');

const CHUNKS_COLLECTION = 'chunks';
const VERSIONS_COLLECTION = 'documentVersions';
const INDEX_COLLECTION = 'vectorIndex';
const INDEX_DOC_ID = 'chunks';
const MAX_IN_FILTER_VALUES = 30;

interface ChunkDocument {
  documentId: string;
  contentHash: string;
  domain: string;
  text: string;
  startOffset: number;
  endOffset: number;
  chunkIndex: number;
  totalChunks: number;
  patternFlags: FactType[];
  patternBoosts: PatternBoosts;
  patternCounts: PatternCounts;
  embedding: VectorValue;
  embeddingModel: string;
  embeddingDimension: number;
  metadata: Record<string, unknown>;
  ingestedAt: Timestamp;
  superseded: boolean;
}

interface VersionDocument {
  documentId: string;
  contentHash: string;
  domain: string;
  chunkCount: number;
  totalChunks: number;
  sizeBytes: number;
}

interface IndexDocument {
  dimension: number;
  embeddingModel: string;
}

function chunkFromDoc(id: string, data: ChunkDocument): Chunk {
  return {
    chunkId: id,
    documentId: data.documentId,
    contentHash: data.contentHash,
    domain: data.domain,
    text: data.text,
    startOffset: data.startOffset,
    endOffset: data.endOffset,
    chunkIndex: data.chunkIndex,
    totalChunks: data.totalChunks,
    patternFlags: data.patternFlags,
    patternBoosts: data.patternBoosts,
    patternCounts: data.patternCounts,
    embedding: data.embedding.toArray(),
    embeddingModel: data.embeddingModel,
    embeddingDimension: data.embeddingDimension,
    metadata: data.metadata,
    ingestedAt: data.ingestedAt.toDate(),
  };
}

function chunkToDoc(chunk: NewChunk, ingestedAt: Timestamp): Record<string, unknown> {
  return stripUndefined({
    documentId: chunk.documentId,
    contentHash: chunk.contentHash,
    domain: chunk.domain,
    text: chunk.text,
    startOffset: chunk.startOffset,
    endOffset: chunk.endOffset,
    chunkIndex: chunk.chunkIndex,
    totalChunks: chunk.totalChunks,
    patternFlags: [...chunk.patternFlags],
    patternBoosts: { ...chunk.patternBoosts },
    patternCounts: { ...chunk.patternCounts },
    embedding: FieldValue.vector([...chunk.embedding]),
    embeddingModel: chunk.embeddingModel,
    embeddingDimension: chunk.embeddingDimension,
    metadata: chunk.metadata,
    ingestedAt,
    superseded: false,
  });
}

function inGroups<T>(values: readonly T[], size: number): T[][] {
  const groups: T[][] = [];
  for (let i = 0; i < values.length; i += size) {
    groups.push(values.slice(i, i + size));
  }
  return groups;
}

export function createFirestoreChunkRepository(db: Firestore): ChunkRepository {
  const chunksRef = db.collection(CHUNKS_COLLECTION);
  const versionsRef = db.collection(VERSIONS_COLLECTION);
  const indexRef = db.collection(INDEX_COLLECTION).doc(INDEX_DOC_ID);

  let cachedDimension: number | null = null;

  async function readIndexDimension(tx?: Transaction): Promise<number | null> {
    const snapshot = tx ? await tx.get(indexRef) : await indexRef.get();
    if (!snapshot.exists) {
      return null;
    }
    return (snapshot.data() as IndexDocument).dimension;
  }

  async function indexDimension(): Promise<number | null> {
    if (cachedDimension === null) {
      cachedDimension = await readIndexDimension();
    }
    return cachedDimension;
  }

  async function nearest(
    params: ChunkSearchParams,
    documentIds: readonly string[] | undefined,
  ): Promise<ChunkSearchResult[]> {
    let query: Query = chunksRef.where('superseded', '==', false);
    if (params.filter?.domain !== undefined) {
      query = query.where('domain', '==', params.filter.domain);
    }
    if (params.filter?.documentId !== undefined) {
      query = query.where('documentId', '==', params.filter.documentId);
    }
    if (documentIds !== undefined) {
      query = query.where('documentId', 'in', [...documentIds]);
    }

    const snapshot = await query
      .findNearest({
        vectorField: 'embedding',
        queryVector: [...params.embedding],
        limit: params.limit,
        distanceMeasure: 'COSINE',
        distanceResultField: '__distance',
      })
      .get();

    return snapshot.docs.map((doc) => {
      const distance: unknown = doc.get('__distance');
      // COSINE distance: 0 = identical, 2 = opposite
      const similarity = typeof distance === 'number' ? 1 - distance : 0;
      return { chunk: chunkFromDoc(doc.id, doc.data() as ChunkDocument), similarity };
    });
  }

  return {
    async getActiveVersion(documentId: string): Promise<SupersededVersion | null> {
      try {
        const snapshot = await versionsRef.doc(documentId).get();
        return snapshot.exists ? (snapshot.data() as VersionDocument) : null;
      } catch (error) {
        throw toPersistenceError(error, `Failed to read version of ${documentId}`);
      }
    },

    async ingest(chunk: NewChunk): Promise<IngestOutcome> {
      if (chunk.embedding.length !== chunk.embeddingDimension) {
        throw new DimensionMismatchError(
          chunk.embeddingDimension,
          chunk.embedding.length,
          `chunk ${chunk.chunkId}`,
        );
      }

      const chunkRef = chunksRef.doc(chunk.chunkId);
      const versionRef = versionsRef.doc(chunk.documentId);
      const sizeBytes = utf8Length(chunk.text);

      try {
        const outcome = await db.runTransaction(async (tx): Promise<IngestOutcome> => {
          const dimension = await readIndexDimension(tx);
          if (dimension !== null && dimension !== chunk.embedding.length) {
            throw new DimensionMismatchError(dimension, chunk.embedding.length, `ingest of chunk ${chunk.chunkId}`);
          }
          const versionSnapshot = await tx.get(versionRef);
          const chunkSnapshot = await tx.get(chunkRef);
          const active = versionSnapshot.exists ? (versionSnapshot.data() as VersionDocument) : null;
          const existing = chunkSnapshot.exists ? (chunkSnapshot.data() as ChunkDocument) : null;

          if (active && active.contentHash === chunk.contentHash) {
            if (existing && !existing.superseded) {
              return {
                chunkId: chunk.chunkId,
                created: false,
                activatedVersion: false,
                supersededChunks: 0,
                supersededVersion: null,
              };
            }
            tx.set(chunkRef, chunkToDoc(chunk, Timestamp.now()));
            tx.update(versionRef, {
              chunkCount: FieldValue.increment(1),
              sizeBytes: FieldValue.increment(sizeBytes),
            });
            return {
              chunkId: chunk.chunkId,
              created: true,
              activatedVersion: false,
              supersededChunks: 0,
              supersededVersion: null,
            };
          }

          const staleChunks = active
            ? await tx.get(
                chunksRef
                  .where('documentId', '==', chunk.documentId)
                  .where('superseded', '==', false),
              )
            : null;

          if (dimension === null) {
            const index: IndexDocument = {
              dimension: chunk.embedding.length,
              embeddingModel: chunk.embeddingModel,
            };
            tx.set(indexRef, index);
          }
          for (const doc of staleChunks?.docs ?? []) {
            tx.update(doc.ref, { superseded: true });
          }
          tx.set(chunkRef, chunkToDoc(chunk, Timestamp.now()));
          const version: VersionDocument = {
            documentId: chunk.documentId,
            contentHash: chunk.contentHash,
            domain: chunk.domain,
            chunkCount: 1,
            totalChunks: chunk.totalChunks,
            sizeBytes,
          };
          tx.set(versionRef, version);

          return {
            chunkId: chunk.chunkId,
            created: true,
            activatedVersion: true,
            supersededChunks: active?.chunkCount ?? 0,
            supersededVersion: active,
          };
        });

        if (outcome.supersededChunks > 0) {
          log.info(
            { documentId: chunk.documentId, supersededChunks: outcome.supersededChunks },
            'Superseded previous document version',
          );
        }
        return outcome;
      } catch (error) {
        throw toPersistenceError(error, `Failed to ingest chunk ${chunk.chunkId}`);
      }
    },

    async search(params: ChunkSearchParams): Promise<readonly ChunkSearchResult[]> {
      const dimension = await indexDimension();
      if (dimension === null) {
        return [];
      }
      if (dimension !== params.embedding.length) {
        throw new DimensionMismatchError(dimension, params.embedding.length, 'chunk search');
      }

      try {
        const documentIds = params.filter?.documentIds;
        const groups = documentIds ? inGroups(documentIds, MAX_IN_FILTER_VALUES) : [undefined];
        const results = (await Promise.all(groups.map((group) => nearest(params, group)))).flat();

        log.debug({ resultCount: results.length, limit: params.limit }, 'Vector search completed');
        return results.sort(compareSearchResults).slice(0, params.limit);
      } catch (error) {
        throw toPersistenceError(error, 'Vector search failed');
      }
    },

    async getActiveChunks(documentId: string): Promise<readonly Chunk[]> {
      try {
        const snapshot = await chunksRef
          .where('documentId', '==', documentId)
          .where('superseded', '==', false)
          .orderBy('chunkIndex', 'asc')
          .get();
        return snapshot.docs.map((doc) => chunkFromDoc(doc.id, doc.data() as ChunkDocument));
      } catch (error) {
        throw toPersistenceError(error, `Failed to read chunks of ${documentId}`);
      }
    },

    async getIndexDimension(): Promise<number | null> {
      return indexDimension();
    },
  };
}
