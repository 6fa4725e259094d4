import type { ExtractionResult } from '@factsift/shared/src/types/extraction.types.js';
import type { FactType } from '@factsift/shared/src/types/fact.types.js';
import { PersistenceError } from '@factsift/shared/src/utils/errors.js';
import type { ExtractionResultRepository } from './extraction-result.repository.js';

function keyOf(scopeKey: string, factType: FactType): string {
  return `${scopeKey}::${factType}`;
}

export function createInMemoryExtractionResultRepository(): ExtractionResultRepository {
  // Per key, oldest first.
  const histories = new Map<string, ExtractionResult[]>();
  const ids = new Set<string>();

  function newestFirst(scopeKey: string, factType: FactType): ExtractionResult[] {
    const history = histories.get(keyOf(scopeKey, factType)) ?? [];
    return history
      .map((result, position) => ({ result, position }))
      .sort(
        (a, b) =>
          b.result.extractedAt.getTime() - a.result.extractedAt.getTime() ||
          b.position - a.position,
      )
      .map(({ result }) => result);
  }

  return {
    save(result: ExtractionResult): Promise<void> {
      if (ids.has(result.id)) {
        return Promise.reject(new PersistenceError(`Extraction result already exists: ${result.id}`));
      }
      ids.add(result.id);
      const key = keyOf(result.scopeKey, result.factType);
      const history = histories.get(key) ?? [];
      history.push(result);
      histories.set(key, history);
      return Promise.resolve();
    },

    getLatest(scopeKey: string, factType: FactType): Promise<ExtractionResult | null> {
      return Promise.resolve(newestFirst(scopeKey, factType)[0] ?? null);
    },

    getHistory(scopeKey: string, factType: FactType): Promise<readonly ExtractionResult[]> {
      return Promise.resolve(newestFirst(scopeKey, factType));
    },
  };
}
