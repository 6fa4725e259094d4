import { Annotation } from '@langchain/langgraph';
import type { FactTypeSettings } from '@factsift/schemas/src/pipeline-config.schema.js';
import type {
  DocumentScope,
  ExtractionPhase,
  ExtractionResult,
} from '@factsift/shared/src/types/extraction.types.js';
import type { FactType } from '@factsift/shared/src/types/fact.types.js';
import type { FactsiftError } from '@factsift/shared/src/utils/errors.js';
import type { RetrievedChunk } from '../rag/retriever.js';

export interface ExtractionRequest {
  readonly scope: DocumentScope;
  readonly factType: FactType;
  readonly signal?: AbortSignal;
}

/** How the node that just ran wants the graph to continue. */
export type StepOutcome = 'continue' | 'retry' | 'fail';

export const ExtractionGraphAnnotation = Annotation.Root({
  request: Annotation<ExtractionRequest>,
  settings: Annotation<FactTypeSettings>,
  step: Annotation<StepOutcome>,
  chunks: Annotation<readonly RetrievedChunk[]>,
  retrievalAttempts: Annotation<number>,
  attempts: Annotation<number>,
  rawContent: Annotation<string>,
  validationErrors: Annotation<readonly string[]>,
  payload: Annotation<unknown>,
  rawPayload: Annotation<unknown>,
  failure: Annotation<FactsiftError | undefined>,
  result: Annotation<ExtractionResult | undefined>,
  transitions: Annotation<ExtractionPhase[]>({
    reducer: (current, update) => current.concat(update),
    default: () => [],
  }),
});

export type ExtractionGraphState = typeof ExtractionGraphAnnotation.State;
