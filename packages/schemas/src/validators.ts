import type { ZodError } from 'zod';
import {
  InvalidConfigurationError,
  SchemaValidationError,
} from '@factsift/shared/src/utils/errors.js';
import { FactTypeCatalogSchema, PipelineConfigSchema } from './pipeline-config.schema.js';
import type { ChunkingConfig, FactTypeCatalog, PipelineConfig } from './pipeline-config.schema.js';

export function formatZodErrors(error: ZodError): readonly string[] {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
}

export function assertChunkingOptions(options: ChunkingConfig): void {
  const { chunkSize, chunkOverlap, breakpointTolerance } = options;
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new InvalidConfigurationError(`chunkSize must be a positive integer, got ${String(chunkSize)}`);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap <= 0) {
    throw new InvalidConfigurationError(
      `chunkOverlap must be a positive integer, got ${String(chunkOverlap)}`,
    );
  }
  if (chunkOverlap >= chunkSize) {
    throw new InvalidConfigurationError(
      `chunkOverlap (${String(chunkOverlap)}) must be less than chunkSize (${String(chunkSize)})`,
    );
  }
  if (!Number.isInteger(breakpointTolerance) || breakpointTolerance < 0) {
    throw new InvalidConfigurationError(
      `breakpointTolerance must be a non-negative integer, got ${String(breakpointTolerance)}`,
    );
  }
}

export function validatePipelineConfig(data: unknown): PipelineConfig {
  const result = PipelineConfigSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid pipeline configuration', formatZodErrors(result.error));
  }

  assertChunkingOptions(result.data.chunking);
  return result.data;
}

export function validateFactTypeCatalog(data: unknown): FactTypeCatalog {
  const result = FactTypeCatalogSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError(
      'Invalid fact type configuration',
      formatZodErrors(result.error),
    );
  }

  return result.data;
}
