import { describe, it, expect, vi } from 'vitest';
import type { FactTypeCatalog } from '@factsift/schemas/src/pipeline-config.schema.js';
import { factPayloadJsonSchema } from '@factsift/schemas/src/fact-payload.schema.js';
import {
  DimensionMismatchError,
  ExtractionCancelledError,
  InsufficientContextError,
  InvalidConfigurationError,
  ProviderTimeoutError,
  ProviderUnavailableError,
  SchemaValidationError,
} from '@factsift/shared/src/utils/errors.js';
import type { LlmClient, LlmResponse } from '../llm/llm-client.js';
import type { RetrievedChunk, Retriever } from '../rag/retriever.js';
import { makeChunk } from '../test-helpers.js';
import { createFactExtractor } from './fact-extractor.js';
import type { FactExtractorDeps } from './fact-extractor.js';

const catalog: FactTypeCatalog = {
  systemPrompt: 'You extract facts.',
  factTypes: {
    office_locations: {
      label: 'Office locations',
      searchQuery: 'office address',
      k: 3,
      promptTemplate: 'Find offices.\n{{context}}',
    },
  },
};

const FULL_ADDRESS = '123 Main St, Suite 400, Springfield, IL 62701';
const SHORT_ADDRESS = '123 Main St Springfield, IL 62701';
const VALID_CONTENT = JSON.stringify({ offices: [FULL_ADDRESS, SHORT_ADDRESS] });
const EXTRACTED_AT = new Date('2024-03-01T12:00:00Z');

function retrieved(chunkId: string, similarity: number, boost: number, combinedScore: number): RetrievedChunk {
  return {
    chunk: { ...makeChunk({ chunkId }), ingestedAt: new Date('2024-01-01T00:00:00Z') },
    similarity,
    boost,
    combinedScore,
  };
}

const CHUNKS = [retrieved('c1', 0.9, 0.6, 1.2), retrieved('c2', 0.7, 0, 0.7)];

function never(): Promise<LlmResponse> {
  return new Promise(() => undefined);
}

function setup(overrides: Partial<FactExtractorDeps> = {}) {
  const retriever = { retrieve: vi.fn<Retriever['retrieve']>().mockResolvedValue(CHUNKS) };
  const llmClient = {
    invoke: vi.fn<LlmClient['invoke']>().mockResolvedValue({ content: VALID_CONTENT }),
  };
  const extractor = createFactExtractor({
    retriever,
    llmClient,
    catalog,
    extraction: { retryAttempts: 3, timeoutMs: 20, concurrency: 1 },
    dedup: { maxEditDistance: 2 },
    now: () => EXTRACTED_AT,
    generateId: () => 'result-1',
    ...overrides,
  });
  return { extractor, retriever, llmClient };
}

const request = { scope: { domain: 'example.com' }, factType: 'office_locations' } as const;

describe('createFactExtractor', () => {
  it('should retrieve, prompt and emit a deduplicated result', async () => {
    const { extractor, retriever, llmClient } = setup();

    const outcome = await extractor.extract(request);

    expect(retriever.retrieve).toHaveBeenCalledWith({
      scope: { domain: 'example.com' },
      factType: 'office_locations',
      k: 3,
    });
    expect(llmClient.invoke).toHaveBeenCalledWith({
      systemPrompt: 'You extract facts.',
      userMessage: 'Find offices.\ntext of c1\n---\ntext of c2',
      jsonSchema: factPayloadJsonSchema('office_locations'),
    });

    expect(outcome.status).toBe('succeeded');
    if (outcome.status !== 'succeeded') return;
    expect(outcome.transitions).toEqual(['RETRIEVING', 'PROMPTING', 'VALIDATING', 'SUCCEEDED']);
    expect(outcome.result).toMatchObject({
      id: 'result-1',
      factType: 'office_locations',
      scope: { domain: 'example.com' },
      scopeKey: 'domain:example.com',
      payload: { offices: [FULL_ADDRESS] },
      rawPayload: { offices: [FULL_ADDRESS, SHORT_ADDRESS] },
      retrievedChunkIds: ['c1', 'c2'],
      extractedAt: EXTRACTED_AT,
    });
    expect(outcome.result.confidence.attempts).toBe(1);
    expect(outcome.result.confidence.topSimilarity).toBe(0.9);
    expect(outcome.result.confidence.meanCombinedScore).toBeCloseTo(0.95, 10);
    expect(outcome.result.confidence.boostedChunkCount).toBe(1);
  });

  it('should fail after exactly retryAttempts attempts on malformed output', async () => {
    const { extractor, llmClient } = setup();
    llmClient.invoke.mockResolvedValue({ content: 'not json' });

    const outcome = await extractor.extract(request);

    expect(llmClient.invoke).toHaveBeenCalledTimes(3);
    expect(outcome.status).toBe('failed');
    if (outcome.status !== 'failed') return;
    expect(outcome.error).toBeInstanceOf(SchemaValidationError);
    expect(outcome.attempts).toBe(3);
    expect(outcome.transitions).toEqual([
      'RETRIEVING',
      'PROMPTING',
      'VALIDATING',
      'RETRYING',
      'PROMPTING',
      'VALIDATING',
      'RETRYING',
      'PROMPTING',
      'VALIDATING',
      'FAILED',
    ]);
    expect(llmClient.invoke.mock.calls[1][0].userMessage).toContain('[CORRECTION]');
  });

  it('should send the validation errors back with the next attempt', async () => {
    const { extractor, llmClient } = setup();
    llmClient.invoke
      .mockResolvedValueOnce({ content: '{"offices": "somewhere"}' })
      .mockResolvedValueOnce({ content: VALID_CONTENT });

    const outcome = await extractor.extract(request);

    expect(outcome.status).toBe('succeeded');
    expect(llmClient.invoke.mock.calls[1][0].userMessage).toContain(
      '- offices: Expected array, received string',
    );
  });

  it('should never call the model when nothing is retrieved', async () => {
    const { extractor, retriever, llmClient } = setup();
    retriever.retrieve.mockResolvedValue([]);

    const outcome = await extractor.extract(request);

    expect(llmClient.invoke).not.toHaveBeenCalled();
    expect(retriever.retrieve).toHaveBeenCalledTimes(1);
    expect(outcome.status).toBe('failed');
    if (outcome.status !== 'failed') return;
    expect(outcome.error).toBeInstanceOf(InsufficientContextError);
    expect(outcome.attempts).toBe(0);
    expect(outcome.transitions).toEqual(['RETRIEVING', 'FAILED']);
  });

  it('should count timeouts as attempts', async () => {
    const { extractor, llmClient } = setup();
    llmClient.invoke.mockImplementation(never);

    const outcome = await extractor.extract(request);

    expect(llmClient.invoke).toHaveBeenCalledTimes(3);
    expect(outcome.status).toBe('failed');
    if (outcome.status !== 'failed') return;
    expect(outcome.error).toBeInstanceOf(ProviderTimeoutError);
    expect(outcome.transitions).toEqual([
      'RETRIEVING',
      'PROMPTING',
      'RETRYING',
      'PROMPTING',
      'RETRYING',
      'PROMPTING',
      'FAILED',
    ]);
  });

  it('should recover when a timed-out attempt is followed by a good one', async () => {
    const { extractor, llmClient } = setup();
    llmClient.invoke.mockImplementationOnce(never);

    const outcome = await extractor.extract(request);

    expect(outcome.status).toBe('succeeded');
    if (outcome.status !== 'succeeded') return;
    expect(outcome.result.confidence.attempts).toBe(2);
    expect(outcome.transitions).toEqual([
      'RETRIEVING',
      'PROMPTING',
      'RETRYING',
      'PROMPTING',
      'VALIDATING',
      'SUCCEEDED',
    ]);
  });

  it('should fail at once when an unexpected model error is wrapped as non-transient', async () => {
    const { extractor, llmClient } = setup();
    llmClient.invoke.mockRejectedValue(new Error('quota exceeded'));

    const outcome = await extractor.extract(request);

    expect(llmClient.invoke).toHaveBeenCalledTimes(1);
    expect(outcome.status).toBe('failed');
    if (outcome.status !== 'failed') return;
    expect(outcome.error).toBeInstanceOf(ProviderUnavailableError);
    expect(outcome.error.message).toBe('quota exceeded');
    expect(outcome.attempts).toBe(1);
    expect(outcome.transitions).toEqual(['RETRIEVING', 'PROMPTING', 'FAILED']);
  });

  it('should retry transient model outages up to retryAttempts', async () => {
    const { extractor, llmClient } = setup();
    llmClient.invoke.mockRejectedValue(new ProviderUnavailableError('rate limited', 'llm', true));

    const outcome = await extractor.extract(request);

    expect(llmClient.invoke).toHaveBeenCalledTimes(3);
    expect(outcome.status).toBe('failed');
    if (outcome.status !== 'failed') return;
    expect(outcome.error).toBeInstanceOf(ProviderUnavailableError);
    expect(outcome.attempts).toBe(3);
  });

  it('should stop before any work when already cancelled', async () => {
    const { extractor, retriever, llmClient } = setup();
    const controller = new AbortController();
    controller.abort();

    const outcome = await extractor.extract({ ...request, signal: controller.signal });

    expect(retriever.retrieve).not.toHaveBeenCalled();
    expect(llmClient.invoke).not.toHaveBeenCalled();
    expect(outcome.status).toBe('failed');
    if (outcome.status !== 'failed') return;
    expect(outcome.error).toBeInstanceOf(ExtractionCancelledError);
    expect(outcome.transitions).toEqual(['RETRIEVING', 'FAILED']);
  });

  it('should let a dispatched call finish but issue no further calls after cancellation', async () => {
    const { extractor, llmClient } = setup();
    const controller = new AbortController();
    llmClient.invoke.mockImplementation(() => {
      controller.abort();
      return Promise.resolve({ content: 'not json' });
    });

    const outcome = await extractor.extract({ ...request, signal: controller.signal });

    expect(llmClient.invoke).toHaveBeenCalledTimes(1);
    expect(outcome.status).toBe('failed');
    if (outcome.status !== 'failed') return;
    expect(outcome.error).toBeInstanceOf(ExtractionCancelledError);
    expect(outcome.transitions).toEqual([
      'RETRIEVING',
      'PROMPTING',
      'VALIDATING',
      'RETRYING',
      'PROMPTING',
      'FAILED',
    ]);
  });

  it('should retry retrieval after a provider failure', async () => {
    const { extractor, retriever } = setup();
    retriever.retrieve.mockRejectedValueOnce(
      new ProviderUnavailableError('embedding backend down', 'embedding', true),
    );

    const outcome = await extractor.extract(request);

    expect(retriever.retrieve).toHaveBeenCalledTimes(2);
    expect(outcome.status).toBe('succeeded');
    expect(outcome.transitions).toEqual([
      'RETRIEVING',
      'RETRIEVING',
      'PROMPTING',
      'VALIDATING',
      'SUCCEEDED',
    ]);
  });

  it('should give up on retrieval after retryAttempts failures', async () => {
    const { extractor, retriever, llmClient } = setup();
    retriever.retrieve.mockRejectedValue(
      new ProviderUnavailableError('embedding backend down', 'embedding', true),
    );

    const outcome = await extractor.extract(request);

    expect(retriever.retrieve).toHaveBeenCalledTimes(3);
    expect(llmClient.invoke).not.toHaveBeenCalled();
    expect(outcome.status).toBe('failed');
    if (outcome.status !== 'failed') return;
    expect(outcome.error).toBeInstanceOf(ProviderUnavailableError);
  });

  it('should not retry retrieval after a non-transient provider failure', async () => {
    const { extractor, retriever, llmClient } = setup();
    retriever.retrieve.mockRejectedValue(
      new ProviderUnavailableError('invalid embedding request', 'embedding', false),
    );

    const outcome = await extractor.extract(request);

    expect(retriever.retrieve).toHaveBeenCalledTimes(1);
    expect(llmClient.invoke).not.toHaveBeenCalled();
    expect(outcome.status).toBe('failed');
    if (outcome.status !== 'failed') return;
    expect(outcome.transitions).toEqual(['RETRIEVING', 'FAILED']);
  });

  it('should propagate a dimension mismatch', async () => {
    const { extractor, retriever } = setup();
    retriever.retrieve.mockRejectedValue(new DimensionMismatchError(768, 64, 'chunk search'));

    await expect(extractor.extract(request)).rejects.toThrow(DimensionMismatchError);
  });

  it('should reject a fact type missing from the catalog', async () => {
    const { extractor } = setup();

    await expect(
      extractor.extract({ scope: { domain: 'example.com' }, factType: 'attorneys' }),
    ).rejects.toThrow(InvalidConfigurationError);
  });
});
