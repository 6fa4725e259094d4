import { createChildLogger } from '@factsift/shared/src/logger.js';
import { IngestionError } from '@factsift/shared/src/utils/errors.js';
import type { TextSpan } from '@factsift/shared/src/types/document.types.js';
import type { ChunkingConfig } from '@factsift/schemas/src/pipeline-config.schema.js';
import { assertChunkingOptions } from '@factsift/schemas/src/validators.js';

const log = createChildLogger('ingestion:chunker');

type BreakpointKind = 'paragraph' | 'line' | 'sentence' | 'word';

/** Highest priority first. */
const BREAKPOINT_PRIORITY: readonly BreakpointKind[] = ['paragraph', 'line', 'sentence', 'word'];

const SENTENCE_TERMINATORS = new Set(['.', '!', '?']);

export interface Chunker {
  readonly options: ChunkingConfig;
  split(text: string): TextSpan[];
}

/** True when cutting at `position` leaves the separator at the end of the earlier chunk. */
function isBreakpointAt(text: string, position: number, kind: BreakpointKind): boolean {
  switch (kind) {
    case 'paragraph':
      return position >= 2 && text[position - 1] === '\n' && text[position - 2] === '\n';
    case 'line':
      return position >= 1 && text[position - 1] === '\n';
    case 'sentence':
      return (
        position >= 2 &&
        text[position - 1] === ' ' &&
        SENTENCE_TERMINATORS.has(text[position - 2])
      );
    case 'word':
      return position >= 1 && text[position - 1] === ' ';
  }
}

function findBreakpoint(text: string, lowest: number, target: number): number {
  for (const kind of BREAKPOINT_PRIORITY) {
    for (let position = target; position >= lowest; position--) {
      if (isBreakpointAt(text, position, kind)) {
        return position;
      }
    }
  }
  return target;
}

export function createChunker(options: ChunkingConfig): Chunker {
  assertChunkingOptions(options);
  const { chunkSize, chunkOverlap, breakpointTolerance } = options;

  return {
    options,

    split(text: string): TextSpan[] {
      if (text.trim().length === 0) {
        throw new IngestionError('Cannot chunk an empty document');
      }

      const spans: TextSpan[] = [];
      let start = 0;

      for (;;) {
        const target = start + chunkSize;
        if (target >= text.length) {
          spans.push({
            index: spans.length,
            text: text.slice(start),
            startOffset: start,
            endOffset: text.length,
          });
          break;
        }

        const lowest = Math.max(target - breakpointTolerance, start + chunkOverlap + 1);
        const end = findBreakpoint(text, lowest, target);
        spans.push({
          index: spans.length,
          text: text.slice(start, end),
          startOffset: start,
          endOffset: end,
        });
        start = end - chunkOverlap;
      }

      log.debug(
        { textLength: text.length, chunkCount: spans.length, chunkSize, chunkOverlap },
        'Split text into chunks',
      );

      return spans;
    },
  };
}
