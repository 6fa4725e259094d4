import { z } from 'zod';
import { FactTypeSchema } from './fact-payload.schema.js';

export const ChunkingConfigSchema = z.object({
  chunkSize: z.number().int(),
  chunkOverlap: z.number().int(),
  breakpointTolerance: z.number().int().default(100),
});

export const PipelineConfigSchema = z.object({
  chunking: ChunkingConfigSchema,
  patterns: z
    .object({
      flagThreshold: z.number().min(0).max(1).default(0.5),
    })
    .default({}),
  retrieval: z
    .object({
      boostWeight: z.number().min(0).default(0.5),
      candidatePoolFactor: z.number().int().min(1).default(3),
    })
    .default({}),
  extraction: z
    .object({
      retryAttempts: z.number().int().min(1).default(3),
      timeoutMs: z.number().int().positive().default(60_000),
      concurrency: z.number().int().positive().default(4),
    })
    .default({}),
  ingestion: z
    .object({
      concurrency: z.number().int().positive().default(4),
    })
    .default({}),
  dedup: z
    .object({
      maxEditDistance: z.number().int().min(0).default(2),
    })
    .default({}),
});

export type ChunkingConfig = z.infer<typeof ChunkingConfigSchema>;
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

export const FactTypeSettingsSchema = z.object({
  label: z.string().min(1),
  searchQuery: z.string().min(1),
  k: z.number().int().positive(),
  promptTemplate: z
    .string()
    .refine((template) => template.includes('{{context}}'), {
      message: 'promptTemplate must contain the {{context}} placeholder',
    }),
});

export const FactTypeCatalogSchema = z.object({
  systemPrompt: z.string().min(1),
  factTypes: z.record(FactTypeSchema, FactTypeSettingsSchema),
});

export type FactTypeSettings = z.infer<typeof FactTypeSettingsSchema>;
export type FactTypeCatalog = z.infer<typeof FactTypeCatalogSchema>;
