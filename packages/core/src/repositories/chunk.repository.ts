import type {
  Chunk,
  ChunkFilter,
  ChunkSearchResult,
  DocumentVersion,
  NewChunk,
} from '@factsift/shared/src/types/document.types.js';

export interface SupersededVersion extends DocumentVersion {
  readonly domain: string;
  readonly sizeBytes: number;
}

export interface IngestOutcome {
  readonly chunkId: string;
  /** False when an identical active chunk already existed. */
  readonly created: boolean;
  /** True when this chunk made a new content version the active one. */
  readonly activatedVersion: boolean;
  readonly supersededChunks: number;
  readonly supersededVersion: SupersededVersion | null;
}

export interface ChunkSearchParams {
  readonly embedding: readonly number[];
  readonly limit: number;
  readonly filter?: ChunkFilter;
}

export interface ChunkRepository {
  getActiveVersion(documentId: string): Promise<SupersededVersion | null>;
  ingest(chunk: NewChunk): Promise<IngestOutcome>;
  search(params: ChunkSearchParams): Promise<readonly ChunkSearchResult[]>;
  getActiveChunks(documentId: string): Promise<readonly Chunk[]>;
  getIndexDimension(): Promise<number | null>;
}

export function isVersionComplete(version: DocumentVersion): boolean {
  return version.chunkCount >= version.totalChunks;
}

/** Most recently ingested first, then chunk id for a stable order. */
export function compareRecencyThenId(a: Chunk, b: Chunk): number {
  const byRecency = b.ingestedAt.getTime() - a.ingestedAt.getTime();
  if (byRecency !== 0) {
    return byRecency;
  }
  return a.chunkId < b.chunkId ? -1 : a.chunkId > b.chunkId ? 1 : 0;
}

export function compareSearchResults(a: ChunkSearchResult, b: ChunkSearchResult): number {
  return b.similarity - a.similarity || compareRecencyThenId(a.chunk, b.chunk);
}

export function matchesFilter(chunk: Chunk, filter: ChunkFilter | undefined): boolean {
  if (!filter) {
    return true;
  }
  if (filter.domain !== undefined && chunk.domain !== filter.domain) {
    return false;
  }
  if (filter.documentId !== undefined && chunk.documentId !== filter.documentId) {
    return false;
  }
  if (filter.documentIds !== undefined && !filter.documentIds.includes(chunk.documentId)) {
    return false;
  }
  return true;
}

export function utf8Length(text: string): number {
  return Buffer.byteLength(text, 'utf8');
}
