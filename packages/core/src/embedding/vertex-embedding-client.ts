import { helpers, v1 } from '@google-cloud/aiplatform';
import { z } from 'zod';
import { createChildLogger } from '@factsift/shared/src/logger.js';
import { ProviderUnavailableError, toError } from '@factsift/shared/src/utils/errors.js';
import type { EmbeddingClient } from './embedding-client.js';
import { assertEmbeddingDimensions } from './embedding-client.js';

const log = createChildLogger('embedding:vertex');

const MAX_INSTANCES_PER_REQUEST = 16;

const PredictionSchema = z.object({
  embeddings: z.object({
    values: z.array(z.number()),
  }),
});

export interface VertexEmbeddingOptions {
  readonly projectId: string;
  readonly location: string;
  readonly model: string;
  readonly dimension: number;
}

export function createVertexEmbeddingClient(options: VertexEmbeddingOptions): EmbeddingClient {
  const { projectId, location, model, dimension } = options;
  const endpoint = `projects/${projectId}/locations/${location}/publishers/google/models/${model}`;

  log.info({ projectId, location, model, dimension }, 'Initializing Vertex AI embedding client');

  let clientInstance: v1.PredictionServiceClient | undefined;

  function getClient(): v1.PredictionServiceClient {
    if (!clientInstance) {
      clientInstance = new v1.PredictionServiceClient({
        apiEndpoint: `${location}-aiplatform.googleapis.com`,
        projectId,
      });
    }
    return clientInstance;
  }

  async function embedBatch(texts: readonly string[]): Promise<number[][]> {
    const instances = texts.map((text) => ({
      structValue: {
        fields: {
          content: { stringValue: text },
        },
      },
    }));

    let predictions;
    try {
      const [response] = await getClient().predict({
        endpoint,
        instances,
        parameters: {
          structValue: {
            fields: {
              outputDimensionality: { numberValue: dimension },
            },
          },
        },
      });
      predictions = response.predictions ?? [];
    } catch (error) {
      const cause = toError(error);
      throw new ProviderUnavailableError(
        `Vertex AI embedding failed: ${cause.message}`,
        'embedding',
        true,
        cause,
      );
    }

    if (predictions.length !== texts.length) {
      log.error({ expected: texts.length, received: predictions.length }, 'Unexpected embedding response');
      throw new ProviderUnavailableError(
        `Unexpected embedding response: expected ${String(texts.length)} predictions, got ${String(predictions.length)}`,
        'embedding',
        false,
      );
    }

    return predictions.map((raw) => {
      // The prediction and helper protobuf typings disagree on nullValue.
      const value = helpers.fromValue(raw as Parameters<typeof helpers.fromValue>[0]);
      const parsed = PredictionSchema.safeParse(value);
      if (!parsed.success) {
        log.error({ issues: parsed.error.issues }, 'Unexpected embedding structure');
        throw new ProviderUnavailableError(
          'Unexpected embedding structure in Vertex AI response',
          'embedding',
          false,
        );
      }
      return parsed.data.embeddings.values;
    });
  }

  async function embed(texts: readonly string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let offset = 0; offset < texts.length; offset += MAX_INSTANCES_PER_REQUEST) {
      vectors.push(...(await embedBatch(texts.slice(offset, offset + MAX_INSTANCES_PER_REQUEST))));
    }
    assertEmbeddingDimensions(vectors, dimension, `Vertex AI model ${model}`);
    return vectors;
  }

  return {
    model,
    dimension,

    async generateEmbedding(text: string): Promise<number[]> {
      log.debug({ textLength: text.length }, 'Generating single embedding');
      const [result] = await embed([text]);
      return result;
    },

    async generateEmbeddings(texts: readonly string[]): Promise<number[][]> {
      log.debug({ count: texts.length }, 'Generating batch embeddings');
      return embed(texts);
    },
  };
}
