import type { LlmProviderConfig } from '@factsift/schemas/src/provider-config.js';
import { createChildLogger } from '@factsift/shared/src/logger.js';
import { ProviderUnavailableError, toError } from '@factsift/shared/src/utils/errors.js';
import { synthesizeFromJsonSchema } from './schema-synthesis.js';

const log = createChildLogger('llm:client');

const MAX_TRANSIENT_RETRIES = 3;
const BASE_DELAY_MS = 1000;

export interface LlmRequest {
  readonly systemPrompt: string;
  readonly userMessage: string;
  readonly jsonSchema?: Record<string, unknown>;
}

export interface LlmResponse {
  readonly content: string;
  readonly tokenUsage?: {
    readonly input: number;
    readonly output: number;
  };
}

export interface LlmClient {
  invoke(request: LlmRequest): Promise<LlmResponse>;
}

/** Answers every request with the smallest value the schema allows: "nothing found". */
export function createMockLlmClient(): LlmClient {
  log.info('Using mock LLM client');

  return {
    invoke(request: LlmRequest): Promise<LlmResponse> {
      log.debug({ systemPromptLength: request.systemPrompt.length }, 'Mock LLM invocation');

      const content = request.jsonSchema
        ? JSON.stringify(synthesizeFromJsonSchema(request.jsonSchema))
        : '{}';

      return Promise.resolve({
        content,
        tokenUsage: { input: request.userMessage.length, output: content.length },
      });
    },
  };
}

function readStatusCode(error: Error): number | undefined {
  for (const key of ['status', 'statusCode', 'code'] as const) {
    const value: unknown = Reflect.get(error, key);
    if (typeof value === 'number') {
      return value;
    }
  }
  return undefined;
}

export function isTransientError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  const statusCode = readStatusCode(error);
  if (statusCode !== undefined && (statusCode === 429 || statusCode >= 500)) {
    return true;
  }

  const message = error.message.toLowerCase();
  const transientPatterns = [
    '429', 'rate limit', 'too many requests', 'resource exhausted',
    '500', '502', '503', 'internal server error', 'bad gateway', 'service unavailable',
    'econnreset', 'etimedout', 'timeout', 'network',
    'socket hang up', 'econnrefused',
  ];

  return transientPatterns.some((pattern) => message.includes(pattern));
}

async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function computeBackoffMs(attempt: number): number {
  const exponential = BASE_DELAY_MS * Math.pow(2, attempt);
  const jitter = Math.random() * BASE_DELAY_MS;
  return exponential + jitter;
}

function withSchemaInstruction(request: LlmRequest): string {
  if (!request.jsonSchema) {
    return request.systemPrompt;
  }
  return `${request.systemPrompt}\n\nThe response must be JSON conforming to this JSON schema:\n${JSON.stringify(request.jsonSchema)}`;
}

export interface VertexLlmOptions {
  readonly projectId: string;
  readonly location: string;
  readonly model: string;
  readonly temperature: number;
}

export async function createVertexLlmClient(options: VertexLlmOptions): Promise<LlmClient> {
  const { projectId, location, model: modelName, temperature } = options;
  const { ChatVertexAI } = await import('@langchain/google-vertexai');

  const model = new ChatVertexAI({
    model: modelName,
    location,
    temperature,
    authOptions: { projectId },
    responseMimeType: 'application/json',
  });

  log.info({ projectId, location, model: modelName }, 'Using Vertex AI LLM client');

  return {
    async invoke(request: LlmRequest): Promise<LlmResponse> {
      log.debug({ systemPromptLength: request.systemPrompt.length }, 'Vertex AI LLM invocation');

      let lastError: Error | undefined;

      for (let attempt = 0; attempt < MAX_TRANSIENT_RETRIES; attempt++) {
        try {
          const response = await model.invoke([
            ['system', withSchemaInstruction(request)],
            ['human', request.userMessage],
          ]);

          const content =
            typeof response.content === 'string'
              ? response.content
              : JSON.stringify(response.content);

          return {
            content,
            tokenUsage: response.usage_metadata
              ? {
                  input: response.usage_metadata.input_tokens,
                  output: response.usage_metadata.output_tokens,
                }
              : undefined,
          };
        } catch (error) {
          lastError = toError(error);

          if (!isTransientError(error)) {
            throw new ProviderUnavailableError(
              `Vertex AI invocation failed: ${lastError.message}`,
              'llm',
              false,
              lastError,
            );
          }

          log.warn(
            { attempt: attempt + 1, maxRetries: MAX_TRANSIENT_RETRIES, error: lastError.message },
            'Transient LLM error, retrying',
          );

          if (attempt < MAX_TRANSIENT_RETRIES - 1) {
            await sleep(computeBackoffMs(attempt));
          }
        }
      }

      throw new ProviderUnavailableError(
        `Vertex AI invocation failed after ${String(MAX_TRANSIENT_RETRIES)} retries: ${lastError?.message ?? 'unknown error'}`,
        'llm',
        true,
        lastError,
      );
    },
  };
}

export async function createLlmClient(config: LlmProviderConfig): Promise<LlmClient> {
  if (config.kind === 'mock') {
    return createMockLlmClient();
  }

  return createVertexLlmClient(config);
}
