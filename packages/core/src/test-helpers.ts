import type { NewChunk } from '@factsift/shared/src/types/document.types.js';
import type { ExtractionResult } from '@factsift/shared/src/types/extraction.types.js';

export function makeChunk(overrides: Partial<NewChunk> & Pick<NewChunk, 'chunkId'>): NewChunk {
  const text = overrides.text ?? `text of ${overrides.chunkId}`;
  const embedding = overrides.embedding ?? [1, 0, 0];
  return {
    documentId: 'doc-1',
    contentHash: 'hash-1',
    domain: 'example.com',
    text,
    startOffset: 0,
    endOffset: text.length,
    chunkIndex: 0,
    totalChunks: 1,
    patternFlags: [],
    patternBoosts: {},
    patternCounts: { addressCount: 0, emailCount: 0, phoneCount: 0, moneyCount: 0 },
    embeddingModel: 'mock-embedding',
    embeddingDimension: embedding.length,
    metadata: {},
    ...overrides,
    embedding,
  };
}

export function makeResult(overrides: Partial<ExtractionResult> & Pick<ExtractionResult, 'id'>): ExtractionResult {
  return {
    factType: 'office_locations',
    scope: { domain: 'example.com' },
    scopeKey: 'domain:example.com',
    payload: { offices: [] },
    rawPayload: { offices: [] },
    confidence: { attempts: 1, topSimilarity: 0.9, meanCombinedScore: 1.1, boostedChunkCount: 1 },
    retrievedChunkIds: ['chunk-1'],
    extractedAt: new Date('2024-01-01T00:00:00Z'),
    ...overrides,
  };
}
