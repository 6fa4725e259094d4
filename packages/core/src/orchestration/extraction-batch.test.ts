import { describe, it, expect, vi } from 'vitest';
import type { ExtractionJob } from '@factsift/shared/src/types/extraction.types.js';
import {
  DimensionMismatchError,
  ExtractionCancelledError,
  InsufficientContextError,
} from '@factsift/shared/src/utils/errors.js';
import type { ExtractionOutcome, FactExtractor } from '../extraction/fact-extractor.js';
import type { ExtractionRequest } from '../extraction/extraction-state.js';
import { createInMemoryExtractionResultRepository } from '../repositories/in-memory-extraction-result.repository.js';
import { makeResult } from '../test-helpers.js';
import { createExtractionBatchRunner } from './extraction-batch.js';

const OFFICES: ExtractionJob = { scope: { domain: 'a.example' }, factType: 'office_locations' };
const ATTORNEYS: ExtractionJob = { scope: { domain: 'a.example' }, factType: 'attorneys' };
const LANGUAGES: ExtractionJob = { scope: { domain: 'b.example' }, factType: 'languages_spoken' };

function succeeded(request: ExtractionRequest): ExtractionOutcome {
  return {
    status: 'succeeded',
    result: makeResult({
      id: `${request.factType}-${request.scope.domain ?? 'all'}`,
      factType: request.factType,
      scope: request.scope,
      scopeKey: `domain:${request.scope.domain ?? ''}`,
    }),
    transitions: ['RETRIEVING', 'PROMPTING', 'VALIDATING', 'SUCCEEDED'],
  };
}

function stubExtractor(impl: FactExtractor['extract']) {
  return { extract: vi.fn<FactExtractor['extract']>(impl) };
}

describe('createExtractionBatchRunner', () => {
  it('should persist every successful result', async () => {
    const extractor = stubExtractor((request) => Promise.resolve(succeeded(request)));
    const resultRepository = createInMemoryExtractionResultRepository();
    const runner = createExtractionBatchRunner({ extractor, resultRepository, concurrency: 2 });

    const report = await runner.run([OFFICES, LANGUAGES]);

    expect(report.results.map((r) => r.id).sort()).toEqual([
      'languages_spoken-b.example',
      'office_locations-a.example',
    ]);
    expect(report.failures).toEqual([]);
    const latest = await resultRepository.getLatest('domain:b.example', 'languages_spoken');
    expect(latest?.id).toBe('languages_spoken-b.example');
  });

  it('should record a failing pair and keep going', async () => {
    const extractor = stubExtractor((request) => {
      if (request.factType === 'attorneys') {
        return Promise.resolve({
          status: 'failed',
          error: new InsufficientContextError('No chunks found'),
          attempts: 0,
          transitions: ['RETRIEVING', 'FAILED'],
        });
      }
      if (request.factType === 'languages_spoken') {
        return Promise.reject(new DimensionMismatchError(768, 64, 'chunk search'));
      }
      return Promise.resolve(succeeded(request));
    });
    const runner = createExtractionBatchRunner({
      extractor,
      resultRepository: createInMemoryExtractionResultRepository(),
      concurrency: 1,
    });

    const report = await runner.run([OFFICES, ATTORNEYS, LANGUAGES]);

    expect(report.results.map((r) => r.factType)).toEqual(['office_locations']);
    expect(report.failures).toEqual([
      {
        scope: { domain: 'a.example' },
        scopeKey: 'domain:a.example',
        factType: 'attorneys',
        kind: 'INSUFFICIENT_CONTEXT',
        message: 'No chunks found',
      },
      {
        scope: { domain: 'b.example' },
        scopeKey: 'domain:b.example',
        factType: 'languages_spoken',
        kind: 'DIMENSION_MISMATCH',
        message: 'Embedding dimension mismatch in chunk search: expected 768, got 64',
      },
    ]);
  });

  it('should record a persistence failure against its job', async () => {
    const extractor = stubExtractor((request) => Promise.resolve(succeeded(request)));
    const resultRepository = createInMemoryExtractionResultRepository();
    await resultRepository.save(makeResult({ id: 'office_locations-a.example' }));
    const runner = createExtractionBatchRunner({ extractor, resultRepository, concurrency: 1 });

    const report = await runner.run([OFFICES]);

    expect(report.results).toEqual([]);
    expect(report.failures.map((f) => f.kind)).toEqual(['PERSISTENCE_ERROR']);
  });

  it('should stop starting jobs once cancelled', async () => {
    const controller = new AbortController();
    const extractor = stubExtractor((request) => {
      controller.abort();
      return Promise.resolve(succeeded(request));
    });
    const runner = createExtractionBatchRunner({
      extractor,
      resultRepository: createInMemoryExtractionResultRepository(),
      concurrency: 1,
    });

    const report = await runner.run([OFFICES, ATTORNEYS, LANGUAGES], { signal: controller.signal });

    expect(extractor.extract).toHaveBeenCalledTimes(1);
    expect(report.results.map((r) => r.factType)).toEqual(['office_locations']);
    expect(report.cancelled).toEqual([ATTORNEYS, LANGUAGES]);
  });

  it('should list jobs the extractor reports as cancelled', async () => {
    const extractor = stubExtractor(() =>
      Promise.resolve({
        status: 'failed',
        error: new ExtractionCancelledError('cancelled'),
        attempts: 1,
        transitions: ['RETRIEVING', 'PROMPTING', 'FAILED'],
      }),
    );
    const runner = createExtractionBatchRunner({
      extractor,
      resultRepository: createInMemoryExtractionResultRepository(),
      concurrency: 1,
    });

    const report = await runner.run([OFFICES]);

    expect(report.cancelled).toEqual([OFFICES]);
    expect(report.failures).toEqual([]);
  });

  it('should pass the signal through to the extractor', async () => {
    const controller = new AbortController();
    const extractor = stubExtractor((request) => Promise.resolve(succeeded(request)));
    const runner = createExtractionBatchRunner({
      extractor,
      resultRepository: createInMemoryExtractionResultRepository(),
      concurrency: 1,
    });

    await runner.run([OFFICES], { signal: controller.signal });

    expect(extractor.extract).toHaveBeenCalledWith({ ...OFFICES, signal: controller.signal });
  });

  it('should keep no more jobs in flight than the concurrency limit', async () => {
    let active = 0;
    let peak = 0;
    const extractor = stubExtractor(async (request) => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active--;
      return succeeded(request);
    });
    const runner = createExtractionBatchRunner({
      extractor,
      resultRepository: createInMemoryExtractionResultRepository(),
      concurrency: 2,
    });

    const jobs: ExtractionJob[] = ['a', 'b', 'c', 'd'].map((name) => ({
      scope: { domain: `${name}.example` },
      factType: 'office_locations',
    }));
    const report = await runner.run(jobs);

    expect(report.results).toHaveLength(4);
    expect(peak).toBe(2);
  });
});
