import { z } from 'zod';
import type { GroundTruthSample } from '@factsift/shared/src/types/evaluation.types.js';
import { SchemaValidationError } from '@factsift/shared/src/utils/errors.js';
import { FactTypeSchema } from './fact-payload.schema.js';
import { formatZodErrors } from './validators.js';

export const DocumentScopeSchema = z
  .object({
    domain: z.string().min(1).optional(),
    documentIds: z.array(z.string().min(1)).min(1).optional(),
  })
  .strict();

export const GroundTruthSampleSchema = z.object({
  scope: DocumentScopeSchema,
  factType: FactTypeSchema,
  expectedPayload: z.unknown(),
});

export const GroundTruthSchema = z.array(GroundTruthSampleSchema);

export function validateGroundTruth(data: unknown): GroundTruthSample[] {
  const result = GroundTruthSchema.safeParse(data);
  if (!result.success) {
    throw new SchemaValidationError('Invalid ground truth file', formatZodErrors(result.error));
  }
  // z.unknown() infers an optional key
  return result.data.map((sample) => ({
    scope: sample.scope,
    factType: sample.factType,
    expectedPayload: sample.expectedPayload,
  }));
}
