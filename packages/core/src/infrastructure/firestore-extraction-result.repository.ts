import type { Firestore } from '@google-cloud/firestore';
import { Timestamp } from '@google-cloud/firestore';
import type {
  DocumentScope,
  ExtractionConfidence,
  ExtractionResult,
} from '@factsift/shared/src/types/extraction.types.js';
import type { FactType } from '@factsift/shared/src/types/fact.types.js';
import { PersistenceError } from '@factsift/shared/src/utils/errors.js';
import type { ExtractionResultRepository } from '../repositories/extraction-result.repository.js';
import { stripUndefined, toPersistenceError } from './firestore-converters.js';

const COLLECTION = 'extractionResults';

interface ExtractionResultDocument {
  factType: FactType;
  scope: DocumentScope;
  scopeKey: string;
  payload: unknown;
  rawPayload: unknown;
  confidence: ExtractionConfidence;
  retrievedChunkIds: string[];
  extractedAt: Timestamp;
}

function resultFromDoc(id: string, data: ExtractionResultDocument): ExtractionResult {
  return {
    id,
    factType: data.factType,
    scope: data.scope,
    scopeKey: data.scopeKey,
    payload: data.payload,
    rawPayload: data.rawPayload,
    confidence: data.confidence,
    retrievedChunkIds: data.retrievedChunkIds,
    extractedAt: data.extractedAt.toDate(),
  };
}

export function createFirestoreExtractionResultRepository(
  db: Firestore,
): ExtractionResultRepository {
  const collectionRef = db.collection(COLLECTION);

  function historyQuery(scopeKey: string, factType: FactType) {
    return collectionRef
      .where('scopeKey', '==', scopeKey)
      .where('factType', '==', factType)
      .orderBy('extractedAt', 'desc');
  }

  return {
    async save(result: ExtractionResult): Promise<void> {
      try {
        await collectionRef.doc(result.id).create(
          stripUndefined({
            factType: result.factType,
            scope: stripUndefined({
              domain: result.scope.domain,
              documentIds: result.scope.documentIds ? [...result.scope.documentIds] : undefined,
            }),
            scopeKey: result.scopeKey,
            payload: result.payload,
            rawPayload: result.rawPayload,
            confidence: { ...result.confidence },
            retrievedChunkIds: [...result.retrievedChunkIds],
            extractedAt: Timestamp.fromDate(result.extractedAt),
          }),
        );
      } catch (error) {
        // create() rejects with ALREADY_EXISTS (gRPC 6) for a duplicate id
        if (Reflect.get(Object(error), 'code') === 6) {
          throw new PersistenceError(`Extraction result already exists: ${result.id}`);
        }
        throw toPersistenceError(error, `Failed to save extraction result ${result.id}`);
      }
    },

    async getLatest(scopeKey: string, factType: FactType): Promise<ExtractionResult | null> {
      try {
        const snapshot = await historyQuery(scopeKey, factType).limit(1).get();
        const doc = snapshot.docs[0];
        return doc ? resultFromDoc(doc.id, doc.data() as ExtractionResultDocument) : null;
      } catch (error) {
        throw toPersistenceError(error, `Failed to read latest ${factType} result`);
      }
    },

    async getHistory(scopeKey: string, factType: FactType): Promise<readonly ExtractionResult[]> {
      try {
        const snapshot = await historyQuery(scopeKey, factType).get();
        return snapshot.docs.map((doc) =>
          resultFromDoc(doc.id, doc.data() as ExtractionResultDocument),
        );
      } catch (error) {
        throw toPersistenceError(error, `Failed to read ${factType} history`);
      }
    },
  };
}
