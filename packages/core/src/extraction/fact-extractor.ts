import { randomUUID } from 'node:crypto';
import { END, START, StateGraph } from '@langchain/langgraph';
import type {
  FactTypeCatalog,
  FactTypeSettings,
  PipelineConfig,
} from '@factsift/schemas/src/pipeline-config.schema.js';
import type {
  ExtractionPhase,
  ExtractionResult,
} from '@factsift/shared/src/types/extraction.types.js';
import { scopeKeyOf } from '@factsift/shared/src/types/extraction.types.js';
import type { FactType } from '@factsift/shared/src/types/fact.types.js';
import { createChildLogger } from '@factsift/shared/src/logger.js';
import { withTimeout } from '@factsift/shared/src/utils/concurrency.js';
import {
  ExtractionCancelledError,
  FactsiftError,
  InsufficientContextError,
  InvalidConfigurationError,
  isProviderError,
  PersistenceError,
  ProviderTimeoutError,
  ProviderUnavailableError,
  SchemaValidationError,
  toError,
} from '@factsift/shared/src/utils/errors.js';
import { mean } from '@factsift/shared/src/utils/math.js';
import type { LlmClient } from '../llm/llm-client.js';
import { extractJson } from '../llm/json-extraction.js';
import type { Retriever } from '../rag/retriever.js';
import { ExtractionGraphAnnotation } from './extraction-state.js';
import type { ExtractionGraphState, ExtractionRequest, StepOutcome } from './extraction-state.js';
import { FACT_TYPE_DEFINITIONS } from './fact-type-registry.js';
import type { FactTypeDefinition } from './fact-type-registry.js';
import { buildExtractionRequest } from './prompt-builder.js';

const log = createChildLogger('extraction:fact-extractor');

export interface FactExtractorDeps {
  readonly retriever: Retriever;
  readonly llmClient: LlmClient;
  readonly catalog: FactTypeCatalog;
  readonly extraction: PipelineConfig['extraction'];
  readonly dedup: PipelineConfig['dedup'];
  readonly definitions?: Readonly<Record<FactType, FactTypeDefinition>>;
  readonly now?: () => Date;
  readonly generateId?: () => string;
}

export type ExtractionOutcome =
  | {
      readonly status: 'succeeded';
      readonly result: ExtractionResult;
      readonly transitions: readonly ExtractionPhase[];
    }
  | {
      readonly status: 'failed';
      readonly error: FactsiftError;
      readonly attempts: number;
      readonly transitions: readonly ExtractionPhase[];
    };

export interface FactExtractor {
  extract(request: ExtractionRequest): Promise<ExtractionOutcome>;
}

type Update = Partial<ExtractionGraphState>;

function cancelled(request: ExtractionRequest): ExtractionCancelledError {
  return new ExtractionCancelledError(
    `Extraction of ${request.factType} for ${scopeKeyOf(request.scope)} was cancelled`,
  );
}

/** Store and embedder failures are worth another retrieval; anything else is not. */
function asRetryableRetrievalError(error: Error): FactsiftError | null {
  if (isProviderError(error)) {
    return error;
  }
  if (error instanceof PersistenceError) {
    return new ProviderUnavailableError(error.message, 'vector-store', true, error);
  }
  return null;
}

/** Timeouts and transient outages earn another attempt; a rejected request does not. */
function stepAfter(failure: FactsiftError): StepOutcome {
  return failure instanceof ProviderUnavailableError && !failure.isTransient ? 'fail' : 'retry';
}

function asLlmError(error: Error): FactsiftError {
  if (isProviderError(error)) {
    return error;
  }
  return new ProviderUnavailableError(error.message, 'llm', false, error);
}

export function createFactExtractor(deps: FactExtractorDeps): FactExtractor {
  const { retriever, llmClient, catalog, extraction, dedup } = deps;
  const definitions = deps.definitions ?? FACT_TYPE_DEFINITIONS;
  const now = deps.now ?? (() => new Date());
  const generateId = deps.generateId ?? randomUUID;
  const { retryAttempts, timeoutMs } = extraction;

  async function retrievingNode(state: ExtractionGraphState): Promise<Update> {
    const { request, settings } = state;
    const transitions: ExtractionPhase[] = ['RETRIEVING'];
    if (request.signal?.aborted) {
      return { step: 'fail', failure: cancelled(request), transitions };
    }

    const retrievalAttempts = state.retrievalAttempts + 1;
    try {
      const chunks = await retriever.retrieve({
        scope: request.scope,
        factType: request.factType,
        k: settings.k,
      });
      if (chunks.length === 0) {
        return {
          step: 'fail',
          retrievalAttempts,
          failure: new InsufficientContextError(
            `No chunks found for ${request.factType} in ${scopeKeyOf(request.scope)}`,
          ),
          transitions,
        };
      }
      return { step: 'continue', retrievalAttempts, chunks, transitions };
    } catch (error) {
      const err = toError(error);
      const retryable = asRetryableRetrievalError(err);
      if (!retryable) {
        throw err;
      }
      log.warn(
        { factType: request.factType, retrievalAttempts, err: retryable },
        'Retrieval failed',
      );
      return { step: stepAfter(retryable), retrievalAttempts, failure: retryable, transitions };
    }
  }

  async function promptingNode(state: ExtractionGraphState): Promise<Update> {
    const { request, settings } = state;
    const transitions: ExtractionPhase[] = ['PROMPTING'];
    // Checked before every dispatch; a call already in flight runs to completion.
    if (request.signal?.aborted) {
      return { step: 'fail', failure: cancelled(request), transitions };
    }

    const attempts = state.attempts + 1;
    const llmRequest = buildExtractionRequest({
      systemPrompt: catalog.systemPrompt,
      settings,
      chunks: state.chunks,
      jsonSchema: definitions[request.factType].jsonSchema(),
      previousErrors: state.validationErrors,
    });

    try {
      const response = await withTimeout(
        llmClient.invoke(llmRequest),
        timeoutMs,
        () => new ProviderTimeoutError('llm', timeoutMs),
      );
      return { step: 'continue', attempts, rawContent: response.content, transitions };
    } catch (error) {
      const failure = asLlmError(toError(error));
      log.warn({ factType: request.factType, attempts, err: failure }, 'Model call failed');
      return { step: stepAfter(failure), attempts, failure, transitions };
    }
  }

  function validatingNode(state: ExtractionGraphState): Update {
    const { request } = state;
    const transitions: ExtractionPhase[] = ['VALIDATING'];

    let parsed: unknown;
    try {
      parsed = extractJson(state.rawContent);
    } catch (error) {
      const errors = [`Failed to parse JSON: ${toError(error).message}`];
      return validationFailure(request, state.attempts, errors, transitions);
    }

    const check = definitions[request.factType].check(parsed, dedup.maxEditDistance);
    if (!check.valid) {
      return validationFailure(request, state.attempts, check.errors, transitions);
    }
    return {
      step: 'continue',
      rawPayload: check.payload,
      payload: check.canonical,
      transitions,
    };
  }

  function validationFailure(
    request: ExtractionRequest,
    attempts: number,
    errors: readonly string[],
    transitions: ExtractionPhase[],
  ): Update {
    log.warn({ factType: request.factType, attempts, errors }, 'Model output failed validation');
    return {
      step: 'retry',
      validationErrors: errors,
      failure: new SchemaValidationError(
        `${request.factType} output failed validation after ${String(attempts)} attempt(s)`,
        errors,
      ),
      transitions,
    };
  }

  function retryingNode(): Update {
    return { transitions: ['RETRYING'] };
  }

  function succeededNode(state: ExtractionGraphState): Update {
    const { request, chunks } = state;
    const result: ExtractionResult = {
      id: generateId(),
      factType: request.factType,
      scope: request.scope,
      scopeKey: scopeKeyOf(request.scope),
      payload: state.payload,
      rawPayload: state.rawPayload,
      confidence: {
        attempts: state.attempts,
        topSimilarity: Math.max(...chunks.map((c) => c.similarity)),
        meanCombinedScore: mean(chunks.map((c) => c.combinedScore)),
        boostedChunkCount: chunks.filter((c) => c.boost > 0).length,
      },
      retrievedChunkIds: chunks.map((c) => c.chunk.chunkId),
      extractedAt: now(),
    };
    return { result, transitions: ['SUCCEEDED'] };
  }

  function failedNode(): Update {
    return { transitions: ['FAILED'] };
  }

  function routeAfterRetrieving(state: ExtractionGraphState): string {
    if (state.step === 'continue') return 'prompting';
    if (state.step === 'retry' && state.retrievalAttempts < retryAttempts) return 'retrieving';
    return 'failed';
  }

  function routeAfterPrompting(state: ExtractionGraphState): string {
    if (state.step === 'continue') return 'validating';
    if (state.step === 'retry' && state.attempts < retryAttempts) return 'retrying';
    return 'failed';
  }

  function routeAfterValidating(state: ExtractionGraphState): string {
    if (state.step === 'continue') return 'succeeded';
    if (state.attempts < retryAttempts) return 'retrying';
    return 'failed';
  }

  const graph = new StateGraph(ExtractionGraphAnnotation)
    .addNode('retrieving', retrievingNode)
    .addNode('prompting', promptingNode)
    .addNode('validating', validatingNode)
    .addNode('retrying', retryingNode)
    .addNode('succeeded', succeededNode)
    .addNode('failed', failedNode)
    .addEdge(START, 'retrieving')
    .addConditionalEdges('retrieving', routeAfterRetrieving, {
      prompting: 'prompting',
      retrieving: 'retrieving',
      failed: 'failed',
    })
    .addConditionalEdges('prompting', routeAfterPrompting, {
      validating: 'validating',
      retrying: 'retrying',
      failed: 'failed',
    })
    .addConditionalEdges('validating', routeAfterValidating, {
      succeeded: 'succeeded',
      retrying: 'retrying',
      failed: 'failed',
    })
    .addEdge('retrying', 'prompting')
    .addEdge('succeeded', END)
    .addEdge('failed', END)
    .compile();

  // prompting, validating and retrying per attempt, plus retrieval retries
  const recursionLimit = retryAttempts * 4 + 10;

  function settingsFor(factType: FactType): FactTypeSettings {
    const settings = catalog.factTypes[factType];
    if (!settings) {
      throw new InvalidConfigurationError(`Fact type ${factType} is not configured`);
    }
    return settings;
  }

  return {
    async extract(request: ExtractionRequest): Promise<ExtractionOutcome> {
      const settings = settingsFor(request.factType);
      log.info(
        { factType: request.factType, scopeKey: scopeKeyOf(request.scope) },
        'Starting extraction',
      );

      const final = await graph.invoke(
        {
          request,
          settings,
          step: 'continue',
          chunks: [],
          retrievalAttempts: 0,
          attempts: 0,
          rawContent: '',
          validationErrors: [],
          payload: null,
          rawPayload: null,
          failure: undefined,
          result: undefined,
        },
        { recursionLimit },
      );

      if (final.result) {
        log.info(
          { factType: request.factType, attempts: final.attempts, resultId: final.result.id },
          'Extraction succeeded',
        );
        return { status: 'succeeded', result: final.result, transitions: final.transitions };
      }

      const error =
        final.failure ??
        new SchemaValidationError(`${request.factType} extraction ended without a result`, []);
      log.warn(
        { factType: request.factType, attempts: final.attempts, kind: error.code },
        'Extraction failed',
      );
      return {
        status: 'failed',
        error,
        attempts: final.attempts,
        transitions: final.transitions,
      };
    },
  };
}
