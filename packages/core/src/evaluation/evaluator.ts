import type {
  EvaluationSummary,
  GroundTruthSample,
  SampleEvaluation,
} from '@factsift/shared/src/types/evaluation.types.js';
import type { ExtractionResult } from '@factsift/shared/src/types/extraction.types.js';
import { scopeKeyOf } from '@factsift/shared/src/types/extraction.types.js';
import type { FactType } from '@factsift/shared/src/types/fact.types.js';
import { createChildLogger } from '@factsift/shared/src/logger.js';
import { SchemaValidationError } from '@factsift/shared/src/utils/errors.js';
import { createEntityMatcher } from '../dedup/deduplicator.js';
import { FACT_TYPE_DEFINITIONS } from '../extraction/fact-type-registry.js';
import type { FactTypeDefinition } from '../extraction/fact-type-registry.js';

const log = createChildLogger('evaluation:evaluator');

export interface EvaluateOptions {
  readonly maxEditDistance: number;
  readonly definitions?: Readonly<Record<FactType, FactTypeDefinition>>;
}

export function predictionKey(scopeKey: string, factType: FactType): string {
  return `${scopeKey}::${factType}`;
}

/** Payload of the newest result per (scope, fact type). */
export function indexPredictions(results: readonly ExtractionResult[]): Map<string, unknown> {
  const newest = new Map<string, ExtractionResult>();
  for (const result of results) {
    const key = predictionKey(result.scopeKey, result.factType);
    const current = newest.get(key);
    if (!current || result.extractedAt.getTime() >= current.extractedAt.getTime()) {
      newest.set(key, result);
    }
  }
  return new Map([...newest].map(([key, result]) => [key, result.payload]));
}

interface Matching {
  readonly matched: number;
  readonly missing: string[];
  readonly unexpected: string[];
}

/** Greedy one-to-one matching in expected order. */
function matchEntities(
  expected: readonly string[],
  predicted: readonly string[],
  matches: (a: string, b: string) => boolean,
): Matching {
  const used = new Set<number>();
  const missing: string[] = [];
  for (const entity of expected) {
    const index = predicted.findIndex((candidate, i) => !used.has(i) && matches(entity, candidate));
    if (index === -1) {
      missing.push(entity);
    } else {
      used.add(index);
    }
  }
  return {
    matched: used.size,
    missing,
    unexpected: predicted.filter((_, i) => !used.has(i)),
  };
}

function ratio(numerator: number, denominator: number): number {
  return denominator === 0 ? 1 : numerator / denominator;
}

export function evaluate(
  samples: readonly GroundTruthSample[],
  predictions: ReadonlyMap<string, unknown>,
  options: EvaluateOptions,
): EvaluationSummary {
  const definitions = options.definitions ?? FACT_TYPE_DEFINITIONS;
  const perSample: SampleEvaluation[] = [];
  const failures: string[] = [];
  let truePositives = 0;
  let predictedTotal = 0;
  let expectedTotal = 0;

  for (const sample of samples) {
    const definition = definitions[sample.factType];
    const scopeKey = scopeKeyOf(sample.scope);
    const key = predictionKey(scopeKey, sample.factType);

    const check = definition.check(sample.expectedPayload, options.maxEditDistance);
    if (!check.valid) {
      throw new SchemaValidationError(`Invalid expected payload for ${key}`, check.errors);
    }

    const expected = definition.listEntities(check.payload);
    let predicted: string[] = [];
    if (predictions.has(key)) {
      predicted = definition.listEntities(predictions.get(key));
    } else {
      failures.push(key);
    }

    const matches = createEntityMatcher(definition.entityKind, options.maxEditDistance);
    const matching = matchEntities(expected, predicted, matches);

    if (expected.length === 0 && predicted.length === 0) {
      // both empty: one correct "nothing here"
      truePositives += 1;
      predictedTotal += 1;
      expectedTotal += 1;
    } else {
      truePositives += matching.matched;
      predictedTotal += predicted.length;
      expectedTotal += expected.length;
    }

    perSample.push({
      scopeKey,
      factType: sample.factType,
      predictedCount: predicted.length,
      expectedCount: expected.length,
      matchedCount: matching.matched,
      missing: matching.missing,
      unexpected: matching.unexpected,
    });
  }

  // An empty side only scores when the other side is empty too.
  const precision = predictedTotal === 0 && expectedTotal > 0 ? 0 : ratio(truePositives, predictedTotal);
  const recall = expectedTotal === 0 && predictedTotal > 0 ? 0 : ratio(truePositives, expectedTotal);
  const f1 = precision + recall === 0 ? 0 : (2 * precision * recall) / (precision + recall);

  log.info(
    { samples: samples.length, precision, recall, f1, failures: failures.length },
    'Evaluation completed',
  );
  return { precision, recall, f1, perSample, failures };
}
