import type { FactTypeSettings } from '@factsift/schemas/src/pipeline-config.schema.js';
import type { LlmRequest } from '../llm/llm-client.js';
import type { RetrievedChunk } from '../rag/retriever.js';

export const CONTEXT_SEPARATOR = '\n---\n';

export function renderTemplate(template: string, chunks: readonly RetrievedChunk[]): string {
  const context = chunks.map((retrieved) => retrieved.chunk.text).join(CONTEXT_SEPARATOR);
  return template.replaceAll('{{context}}', context);
}

export function correctionNote(errors: readonly string[]): string {
  return `[CORRECTION] Your previous response had validation errors. Please fix these issues and respond with valid JSON:\n${errors.map((e) => `- ${e}`).join('\n')}`;
}

export interface ExtractionPromptInput {
  readonly systemPrompt: string;
  readonly settings: FactTypeSettings;
  readonly chunks: readonly RetrievedChunk[];
  readonly jsonSchema: Record<string, unknown>;
  /** Validation errors of the previous attempt, empty on the first one. */
  readonly previousErrors: readonly string[];
}

export function buildExtractionRequest(input: ExtractionPromptInput): LlmRequest {
  const prompt = renderTemplate(input.settings.promptTemplate, input.chunks);
  return {
    systemPrompt: input.systemPrompt,
    userMessage:
      input.previousErrors.length === 0
        ? prompt
        : `${prompt}\n\n${correctionNote(input.previousErrors)}`,
    jsonSchema: input.jsonSchema,
  };
}
