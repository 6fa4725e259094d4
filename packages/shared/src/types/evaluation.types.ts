import type { DocumentScope } from './extraction.types.js';
import type { FactType } from './fact.types.js';

export interface GroundTruthSample {
  readonly scope: DocumentScope;
  readonly factType: FactType;
  readonly expectedPayload: unknown;
}

export interface SampleEvaluation {
  readonly scopeKey: string;
  readonly factType: FactType;
  readonly predictedCount: number;
  readonly expectedCount: number;
  readonly matchedCount: number;
  readonly missing: readonly string[];
  readonly unexpected: readonly string[];
}

export interface EvaluationSummary {
  readonly precision: number;
  readonly recall: number;
  readonly f1: number;
  readonly perSample: readonly SampleEvaluation[];
  readonly failures: readonly string[];
}
