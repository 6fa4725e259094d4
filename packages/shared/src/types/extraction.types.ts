import type { FactType } from './fact.types.js';

/** Either a whole domain or an explicit set of documents; both narrow when given together. */
export interface DocumentScope {
  readonly domain?: string;
  readonly documentIds?: readonly string[];
}

export type ExtractionPhase =
  | 'RETRIEVING'
  | 'PROMPTING'
  | 'VALIDATING'
  | 'RETRYING'
  | 'SUCCEEDED'
  | 'FAILED';

export interface ExtractionConfidence {
  readonly attempts: number;
  readonly topSimilarity: number;
  readonly meanCombinedScore: number;
  readonly boostedChunkCount: number;
}

export interface ExtractionResult<TPayload = unknown> {
  readonly id: string;
  readonly factType: FactType;
  readonly scope: DocumentScope;
  readonly scopeKey: string;
  readonly payload: TPayload;
  readonly rawPayload: TPayload;
  readonly confidence: ExtractionConfidence;
  readonly retrievedChunkIds: readonly string[];
  readonly extractedAt: Date;
}

export interface CanonicalFact<T> {
  readonly value: T;
  readonly normalized: string;
  readonly variants: readonly T[];
}

export interface ExtractionJob {
  readonly scope: DocumentScope;
  readonly factType: FactType;
}

export interface ExtractionFailureRecord {
  readonly scope: DocumentScope;
  readonly scopeKey: string;
  readonly factType: FactType;
  readonly kind: string;
  readonly message: string;
}

export function scopeKeyOf(scope: DocumentScope): string {
  const parts: string[] = [];
  if (scope.domain) {
    parts.push(`domain:${scope.domain}`);
  }
  if (scope.documentIds && scope.documentIds.length > 0) {
    parts.push(`docs:${[...scope.documentIds].sort().join(',')}`);
  }
  return parts.length > 0 ? parts.join('|') : 'all';
}
