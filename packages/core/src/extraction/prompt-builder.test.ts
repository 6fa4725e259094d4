import { describe, it, expect } from 'vitest';
import type { RetrievedChunk } from '../rag/retriever.js';
import { makeChunk } from '../test-helpers.js';
import { buildExtractionRequest, renderTemplate } from './prompt-builder.js';

function retrieved(chunkId: string, text: string): RetrievedChunk {
  return {
    chunk: { ...makeChunk({ chunkId, text }), ingestedAt: new Date('2024-01-01T00:00:00Z') },
    similarity: 0.5,
    boost: 0,
    combinedScore: 0.5,
  };
}

const settings = {
  label: 'Year founded',
  searchQuery: 'founded',
  k: 2,
  promptTemplate: 'When was the firm founded?\n{{context}}',
};

describe('renderTemplate', () => {
  it('should join chunk texts with separators in retrieval order', () => {
    expect(renderTemplate('A {{context}} Z', [retrieved('c1', 'one'), retrieved('c2', 'two')])).toBe(
      'A one\n---\ntwo Z',
    );
  });
});

describe('buildExtractionRequest', () => {
  it('should send the bare prompt on the first attempt', () => {
    const request = buildExtractionRequest({
      systemPrompt: 'system',
      settings,
      chunks: [retrieved('c1', 'Since 1998.')],
      jsonSchema: { type: 'object' },
      previousErrors: [],
    });

    expect(request).toEqual({
      systemPrompt: 'system',
      userMessage: 'When was the firm founded?\nSince 1998.',
      jsonSchema: { type: 'object' },
    });
  });

  it('should append a correction note listing previous errors', () => {
    const request = buildExtractionRequest({
      systemPrompt: 'system',
      settings,
      chunks: [retrieved('c1', 'Since 1998.')],
      jsonSchema: { type: 'object' },
      previousErrors: ['yearFounded: Required'],
    });

    expect(request.userMessage).toBe(
      'When was the firm founded?\nSince 1998.\n\n[CORRECTION] Your previous response had validation errors. Please fix these issues and respond with valid JSON:\n- yearFounded: Required',
    );
  });
});
