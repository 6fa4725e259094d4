import { z } from 'zod';
import { InvalidConfigurationError } from '@factsift/shared/src/utils/errors.js';
import { formatZodErrors } from './validators.js';

const DEFAULT_LOCATION = 'europe-west1';

const ProviderEnvSchema = z.object({
  LLM_PROVIDER: z.enum(['mock', 'vertex']).default('vertex'),
  EMBEDDING_PROVIDER: z.enum(['mock', 'vertex']).default('vertex'),
  VECTOR_STORE: z.enum(['memory', 'firestore']).default('firestore'),
  GCP_PROJECT_ID: z.string().min(1).optional(),
  VERTEX_AI_LOCATION: z.string().min(1).default(DEFAULT_LOCATION),
  LLM_MODEL: z.string().min(1).default('gemini-2.0-flash'),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
  EMBEDDING_MODEL: z.string().min(1).default('text-embedding-005'),
  EMBEDDING_DIMENSION: z.coerce.number().int().positive().default(768),
  FIRESTORE_DATABASE_ID: z.string().min(1).optional(),
});

export type LlmProviderConfig =
  | { readonly kind: 'mock' }
  | {
      readonly kind: 'vertex';
      readonly projectId: string;
      readonly location: string;
      readonly model: string;
      readonly temperature: number;
    };

export type EmbeddingProviderConfig =
  | { readonly kind: 'mock'; readonly dimension: number }
  | {
      readonly kind: 'vertex';
      readonly projectId: string;
      readonly location: string;
      readonly model: string;
      readonly dimension: number;
    };

export type VectorStoreConfig =
  | { readonly kind: 'memory' }
  | { readonly kind: 'firestore'; readonly projectId: string; readonly databaseId?: string };

export interface ProviderConfig {
  readonly llm: LlmProviderConfig;
  readonly embedding: EmbeddingProviderConfig;
  readonly store: VectorStoreConfig;
}

function requireProjectId(projectId: string | undefined, purpose: string): string {
  if (!projectId) {
    throw new InvalidConfigurationError(`GCP_PROJECT_ID is required for ${purpose}`);
  }
  return projectId;
}

/**
 * Builds the provider configuration once at process start. Nothing below the
 * scripts reads the environment.
 */
export function loadProviderConfig(env: Record<string, string | undefined>): ProviderConfig {
  const result = ProviderEnvSchema.safeParse(env);
  if (!result.success) {
    throw new InvalidConfigurationError(
      `Invalid provider environment: ${formatZodErrors(result.error).join(', ')}`,
    );
  }
  const parsed = result.data;

  const llm: LlmProviderConfig =
    parsed.LLM_PROVIDER === 'mock'
      ? { kind: 'mock' }
      : {
          kind: 'vertex',
          projectId: requireProjectId(parsed.GCP_PROJECT_ID, 'the Vertex AI LLM client'),
          location: parsed.VERTEX_AI_LOCATION,
          model: parsed.LLM_MODEL,
          temperature: parsed.LLM_TEMPERATURE,
        };

  const embedding: EmbeddingProviderConfig =
    parsed.EMBEDDING_PROVIDER === 'mock'
      ? { kind: 'mock', dimension: parsed.EMBEDDING_DIMENSION }
      : {
          kind: 'vertex',
          projectId: requireProjectId(parsed.GCP_PROJECT_ID, 'the Vertex AI embedding client'),
          location: parsed.VERTEX_AI_LOCATION,
          model: parsed.EMBEDDING_MODEL,
          dimension: parsed.EMBEDDING_DIMENSION,
        };

  const store: VectorStoreConfig =
    parsed.VECTOR_STORE === 'memory'
      ? { kind: 'memory' }
      : {
          kind: 'firestore',
          projectId: requireProjectId(parsed.GCP_PROJECT_ID, 'the Firestore vector store'),
          databaseId: parsed.FIRESTORE_DATABASE_ID,
        };

  return { llm, embedding, store };
}
