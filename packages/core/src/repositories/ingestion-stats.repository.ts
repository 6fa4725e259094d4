import type { IngestionStats } from '@factsift/shared/src/types/document.types.js';

export interface IngestionDelta {
  readonly documents: number;
  readonly chunks: number;
  readonly bytes: number;
  readonly embeddingModel?: string;
  readonly embeddingDimension?: number;
}

export interface IngestionStatsRepository {
  applyIngestion(domain: string, delta: IngestionDelta): Promise<IngestionStats>;
  getByDomain(domain: string): Promise<IngestionStats | null>;
  getAll(): Promise<readonly IngestionStats[]>;
}

export function emptyStats(domain: string, now: Date): IngestionStats {
  return {
    domain,
    documentCount: 0,
    chunkCount: 0,
    totalSizeBytes: 0,
    lastUpdated: now,
  };
}

export function applyDelta(stats: IngestionStats, delta: IngestionDelta, now: Date): IngestionStats {
  return {
    domain: stats.domain,
    documentCount: stats.documentCount + delta.documents,
    chunkCount: stats.chunkCount + delta.chunks,
    totalSizeBytes: stats.totalSizeBytes + delta.bytes,
    embeddingModel: delta.embeddingModel ?? stats.embeddingModel,
    embeddingDimension: delta.embeddingDimension ?? stats.embeddingDimension,
    lastUpdated: now,
  };
}
