import type { IngestionStats } from '@factsift/shared/src/types/document.types.js';
import type { IngestionDelta, IngestionStatsRepository } from './ingestion-stats.repository.js';
import { applyDelta, emptyStats } from './ingestion-stats.repository.js';

export function createInMemoryIngestionStatsRepository(): IngestionStatsRepository {
  const statsByDomain = new Map<string, IngestionStats>();

  return {
    applyIngestion(domain: string, delta: IngestionDelta): Promise<IngestionStats> {
      const now = new Date();
      const current = statsByDomain.get(domain) ?? emptyStats(domain, now);
      const updated = applyDelta(current, delta, now);
      statsByDomain.set(domain, updated);
      return Promise.resolve(updated);
    },

    getByDomain(domain: string): Promise<IngestionStats | null> {
      return Promise.resolve(statsByDomain.get(domain) ?? null);
    },

    getAll(): Promise<readonly IngestionStats[]> {
      return Promise.resolve(
        [...statsByDomain.values()].sort((a, b) => a.domain.localeCompare(b.domain)),
      );
    },
  };
}
