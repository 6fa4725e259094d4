import { FACT_TYPES } from '@factsift/shared/src/types/fact.types.js';
import type { FactType } from '@factsift/shared/src/types/fact.types.js';
import type { PatternBoosts, PatternCounts } from '@factsift/shared/src/types/document.types.js';
import {
  CURRENCY_PATTERN,
  EMAIL_PATTERN,
  FACT_TYPE_SIGNALS,
  findAll,
  findPhoneNumbers,
  PO_BOX_PATTERN,
  SCALED_AMOUNT_PATTERN,
  STREET_ADDRESS_PATTERN,
} from './signals.js';
import type { Signal } from './signals.js';

export interface PatternDetection {
  readonly boosts: PatternBoosts;
  readonly flags: FactType[];
  readonly counts: PatternCounts;
}

export interface PatternDetectorOptions {
  /** Minimum boost for a fact type to be flagged on a chunk. */
  readonly flagThreshold: number;
  readonly signals?: Partial<Record<FactType, readonly Signal[]>>;
}

export interface PatternDetector {
  detect(text: string, factType: FactType): number;
  matchedSignals(text: string, factType: FactType): string[];
  detectAll(text: string): PatternDetection;
}

/**
 * `1 - Π(1 - w)` over distinct signals: each further signal closes part of the
 * remaining gap to 1, so the score saturates instead of growing with repeats.
 */
export function combineSignalWeights(weights: readonly number[]): number {
  const miss = weights.reduce((product, weight) => product * (1 - weight), 1);
  return 1 - miss;
}

function uniqueCount(values: readonly string[], normalize: (value: string) => string): number {
  return new Set(values.map(normalize)).size;
}

const collapseWhitespace = (value: string): string => value.replace(/\s+/g, ' ').trim().toLowerCase();
const digitsOnly = (value: string): string => value.replace(/\D/g, '');

export function countPatterns(text: string): PatternCounts {
  return {
    addressCount: uniqueCount(
      [...findAll(text, STREET_ADDRESS_PATTERN), ...findAll(text, PO_BOX_PATTERN)],
      collapseWhitespace,
    ),
    emailCount: uniqueCount(findAll(text, EMAIL_PATTERN), (email) => email.toLowerCase()),
    phoneCount: uniqueCount(findPhoneNumbers(text), digitsOnly),
    moneyCount: uniqueCount(
      [...findAll(text, CURRENCY_PATTERN), ...findAll(text, SCALED_AMOUNT_PATTERN)],
      collapseWhitespace,
    ),
  };
}

export function createPatternDetector(options: PatternDetectorOptions): PatternDetector {
  const { flagThreshold, signals = FACT_TYPE_SIGNALS } = options;

  function matching(text: string, factType: FactType): readonly Signal[] {
    return (signals[factType] ?? []).filter((signal) => signal.matches(text));
  }

  function detect(text: string, factType: FactType): number {
    return combineSignalWeights(matching(text, factType).map((signal) => signal.weight));
  }

  return {
    detect,

    matchedSignals(text: string, factType: FactType): string[] {
      return matching(text, factType).map((signal) => signal.name);
    },

    detectAll(text: string): PatternDetection {
      const entries = FACT_TYPES.map((factType) => [factType, detect(text, factType)] as const);
      const boosts: PatternBoosts = Object.fromEntries(entries.filter(([, boost]) => boost > 0));
      const flags = entries
        .filter(([, boost]) => boost > 0 && boost >= flagThreshold)
        .map(([factType]) => factType);

      return { boosts, flags, counts: countPatterns(text) };
    },
  };
}
