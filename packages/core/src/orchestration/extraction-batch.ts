import type {
  ExtractionFailureRecord,
  ExtractionJob,
  ExtractionResult,
} from '@factsift/shared/src/types/extraction.types.js';
import { scopeKeyOf } from '@factsift/shared/src/types/extraction.types.js';
import { createChildLogger } from '@factsift/shared/src/logger.js';
import { createSemaphore } from '@factsift/shared/src/utils/concurrency.js';
import {
  ExtractionCancelledError,
  FactsiftError,
  toError,
} from '@factsift/shared/src/utils/errors.js';
import type { FactExtractor } from '../extraction/fact-extractor.js';
import type { ExtractionResultRepository } from '../repositories/extraction-result.repository.js';

const log = createChildLogger('orchestration:extraction-batch');

export interface ExtractionBatchDeps {
  readonly extractor: FactExtractor;
  readonly resultRepository: ExtractionResultRepository;
  readonly concurrency: number;
}

export interface ExtractionBatchOptions {
  readonly signal?: AbortSignal;
}

export interface ExtractionBatchReport {
  readonly results: readonly ExtractionResult[];
  readonly failures: readonly ExtractionFailureRecord[];
  readonly cancelled: readonly ExtractionJob[];
}

export interface ExtractionBatchRunner {
  run(jobs: readonly ExtractionJob[], options?: ExtractionBatchOptions): Promise<ExtractionBatchReport>;
}

function failureRecord(job: ExtractionJob, error: Error): ExtractionFailureRecord {
  return {
    scope: job.scope,
    scopeKey: scopeKeyOf(job.scope),
    factType: job.factType,
    kind: error instanceof FactsiftError ? error.code : 'UNEXPECTED_ERROR',
    message: error.message,
  };
}

export function createExtractionBatchRunner(deps: ExtractionBatchDeps): ExtractionBatchRunner {
  const { extractor, resultRepository, concurrency } = deps;

  return {
    async run(
      jobs: readonly ExtractionJob[],
      options: ExtractionBatchOptions = {},
    ): Promise<ExtractionBatchReport> {
      const { signal } = options;
      const semaphore = createSemaphore(concurrency);
      const results: ExtractionResult[] = [];
      const failures: ExtractionFailureRecord[] = [];
      const cancelled: ExtractionJob[] = [];

      log.info({ jobs: jobs.length, concurrency }, 'Starting extraction batch');

      async function runJob(job: ExtractionJob): Promise<void> {
        if (signal?.aborted) {
          cancelled.push(job);
          return;
        }
        try {
          const outcome = await extractor.extract({ ...job, signal });
          if (outcome.status === 'succeeded') {
            await resultRepository.save(outcome.result);
            results.push(outcome.result);
            return;
          }
          if (outcome.error instanceof ExtractionCancelledError) {
            cancelled.push(job);
            return;
          }
          failures.push(failureRecord(job, outcome.error));
        } catch (error) {
          const err = toError(error);
          log.error(
            { factType: job.factType, scopeKey: scopeKeyOf(job.scope), err },
            'Extraction job crashed',
          );
          failures.push(failureRecord(job, err));
        }
      }

      await Promise.all(jobs.map((job) => semaphore.run(() => runJob(job))));

      log.info(
        {
          succeeded: results.length,
          failed: failures.length,
          cancelled: cancelled.length,
        },
        'Extraction batch completed',
      );
      return { results, failures, cancelled };
    },
  };
}
