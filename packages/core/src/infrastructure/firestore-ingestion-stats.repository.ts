import type { Firestore } from '@google-cloud/firestore';
import { Timestamp } from '@google-cloud/firestore';
import type { IngestionStats } from '@factsift/shared/src/types/document.types.js';
import type {
  IngestionDelta,
  IngestionStatsRepository,
} from '../repositories/ingestion-stats.repository.js';
import { applyDelta, emptyStats } from '../repositories/ingestion-stats.repository.js';
import { stripUndefined, toPersistenceError } from './firestore-converters.js';

const COLLECTION = 'ingestionStats';

interface IngestionStatsDocument {
  domain: string;
  documentCount: number;
  chunkCount: number;
  totalSizeBytes: number;
  embeddingModel?: string;
  embeddingDimension?: number;
  lastUpdated: Timestamp;
}

function statsFromDoc(data: IngestionStatsDocument): IngestionStats {
  return {
    domain: data.domain,
    documentCount: data.documentCount,
    chunkCount: data.chunkCount,
    totalSizeBytes: data.totalSizeBytes,
    embeddingModel: data.embeddingModel,
    embeddingDimension: data.embeddingDimension,
    lastUpdated: data.lastUpdated.toDate(),
  };
}

function statsToDoc(stats: IngestionStats): Record<string, unknown> {
  return stripUndefined({
    domain: stats.domain,
    documentCount: stats.documentCount,
    chunkCount: stats.chunkCount,
    totalSizeBytes: stats.totalSizeBytes,
    embeddingModel: stats.embeddingModel,
    embeddingDimension: stats.embeddingDimension,
    lastUpdated: Timestamp.fromDate(stats.lastUpdated),
  });
}

export function createFirestoreIngestionStatsRepository(db: Firestore): IngestionStatsRepository {
  const collectionRef = db.collection(COLLECTION);

  return {
    async applyIngestion(domain: string, delta: IngestionDelta): Promise<IngestionStats> {
      const docRef = collectionRef.doc(domain);
      try {
        return await db.runTransaction(async (tx) => {
          const snapshot = await tx.get(docRef);
          const now = new Date();
          const current = snapshot.exists
            ? statsFromDoc(snapshot.data() as IngestionStatsDocument)
            : emptyStats(domain, now);
          const next = applyDelta(current, delta, now);
          tx.set(docRef, statsToDoc(next));
          return next;
        });
      } catch (error) {
        throw toPersistenceError(error, `Failed to update ingestion stats for ${domain}`);
      }
    },

    async getByDomain(domain: string): Promise<IngestionStats | null> {
      try {
        const snapshot = await collectionRef.doc(domain).get();
        return snapshot.exists ? statsFromDoc(snapshot.data() as IngestionStatsDocument) : null;
      } catch (error) {
        throw toPersistenceError(error, `Failed to read ingestion stats for ${domain}`);
      }
    },

    async getAll(): Promise<readonly IngestionStats[]> {
      try {
        const snapshot = await collectionRef.orderBy('domain', 'asc').get();
        return snapshot.docs.map((doc) => statsFromDoc(doc.data() as IngestionStatsDocument));
      } catch (error) {
        throw toPersistenceError(error, 'Failed to read ingestion stats');
      }
    },
  };
}
