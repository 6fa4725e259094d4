import { Firestore } from '@google-cloud/firestore';
import type { VectorStoreConfig } from '@factsift/schemas/src/provider-config.js';

export type FirestoreStoreConfig = Extract<VectorStoreConfig, { kind: 'firestore' }>;

export function createFirestoreClient(config: FirestoreStoreConfig): Firestore {
  return new Firestore({
    projectId: config.projectId,
    databaseId: config.databaseId,
    ignoreUndefinedProperties: true,
  });
}
