import type { ExtractionResult } from '@factsift/shared/src/types/extraction.types.js';
import type { FactType } from '@factsift/shared/src/types/fact.types.js';

export interface ExtractionResultRepository {
  save(result: ExtractionResult): Promise<void>;
  /** The newest result for the key; earlier ones stay in the history. */
  getLatest(scopeKey: string, factType: FactType): Promise<ExtractionResult | null>;
  getHistory(scopeKey: string, factType: FactType): Promise<readonly ExtractionResult[]>;
}
