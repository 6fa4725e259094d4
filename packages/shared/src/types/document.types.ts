import type { FactType } from './fact.types.js';

export interface DocumentMetadata {
  readonly domain: string;
  readonly path: string;
  readonly contentHash: string;
}

export interface SourceDocument {
  readonly documentId: string;
  readonly sourceText: string;
  readonly metadata: DocumentMetadata;
}

export interface DocumentInput {
  readonly documentId: string;
  readonly sourceText: string;
  readonly domain?: string;
  readonly path?: string;
}

export interface TextSpan {
  readonly index: number;
  readonly text: string;
  readonly startOffset: number;
  readonly endOffset: number;
}

export interface PatternCounts {
  readonly addressCount: number;
  readonly emailCount: number;
  readonly phoneCount: number;
  readonly moneyCount: number;
}

/** Fact types without a matching signal are absent and score 0. */
export type PatternBoosts = Readonly<Partial<Record<FactType, number>>>;

export interface Chunk {
  readonly chunkId: string;
  readonly documentId: string;
  readonly contentHash: string;
  readonly domain: string;
  readonly text: string;
  readonly startOffset: number;
  readonly endOffset: number;
  readonly chunkIndex: number;
  readonly totalChunks: number;
  readonly patternFlags: readonly FactType[];
  readonly patternBoosts: PatternBoosts;
  readonly patternCounts: PatternCounts;
  readonly embedding: readonly number[];
  readonly embeddingModel: string;
  readonly embeddingDimension: number;
  readonly metadata: Record<string, unknown>;
  readonly ingestedAt: Date;
}

export type NewChunk = Omit<Chunk, 'ingestedAt'>;

export interface ChunkFilter {
  readonly domain?: string;
  readonly documentId?: string;
  readonly documentIds?: readonly string[];
}

export interface ChunkSearchResult {
  readonly chunk: Chunk;
  readonly similarity: number;
}

export interface DocumentVersion {
  readonly documentId: string;
  readonly contentHash: string;
  readonly chunkCount: number;
  /** Chunks the version was split into; fewer stored means an interrupted write. */
  readonly totalChunks: number;
}

export interface IngestionStats {
  readonly domain: string;
  readonly documentCount: number;
  readonly chunkCount: number;
  readonly totalSizeBytes: number;
  readonly embeddingModel?: string;
  readonly embeddingDimension?: number;
  readonly lastUpdated: Date;
}
