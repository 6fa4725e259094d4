import { resolve } from 'node:path';
import { readJsonFile } from '@factsift/schemas/src/config-loader.js';
import { validateGroundTruth } from '@factsift/schemas/src/ground-truth.schema.js';
import { evaluate, predictionKey } from '@factsift/core/src/evaluation/evaluator.js';
import type { ExtractionJob } from '@factsift/shared/src/types/extraction.types.js';
import { scopeKeyOf } from '@factsift/shared/src/types/extraction.types.js';
import { parseArgs } from './lib/args.js';
import { bootstrap, defaultConfigDir, readDocuments } from './lib/bootstrap.js';

function formatScore(value: number): string {
  return value.toFixed(3);
}

async function main(): Promise<void> {
  const { flags, positional } = parseArgs(process.argv.slice(2));
  const groundTruthFile = positional[0];
  if (!groundTruthFile) {
    console.error('Usage: evaluate <groundTruthFile> [configDir] [--input=<dir>]');
    process.exit(1);
  }
  const configDir = positional[1] ?? defaultConfigDir();
  const inputDir = flags.get('input');

  console.log('=== Extraction Evaluation ===\n');
  const samples = validateGroundTruth(await readJsonFile(resolve(groundTruthFile)));
  console.log(`Ground truth samples: ${String(samples.length)}`);

  const { config, services } = await bootstrap(configDir);

  // Extract fresh predictions when documents are supplied; otherwise score what is stored.
  if (inputDir) {
    const documents = await readDocuments(resolve(inputDir));
    await services.ingestor.ingestDocuments(documents, {
      concurrency: config.pipeline.ingestion.concurrency,
    });
    const jobs = new Map<string, ExtractionJob>();
    for (const sample of samples) {
      jobs.set(predictionKey(scopeKeyOf(sample.scope), sample.factType), {
        scope: sample.scope,
        factType: sample.factType,
      });
    }
    const report = await services.batchRunner.run([...jobs.values()]);
    console.log(
      `Extracted ${String(report.results.length)} of ${String(jobs.size)} jobs (${String(report.failures.length)} failed)`,
    );
  }

  const predictions = new Map<string, unknown>();
  for (const sample of samples) {
    const scopeKey = scopeKeyOf(sample.scope);
    const latest = await services.resultRepository.getLatest(scopeKey, sample.factType);
    if (latest) {
      predictions.set(predictionKey(scopeKey, sample.factType), latest.payload);
    }
  }

  const summary = evaluate(samples, predictions, {
    maxEditDistance: config.pipeline.dedup.maxEditDistance,
  });

  console.log('\n--- Per sample ---');
  for (const sample of summary.perSample) {
    console.log(
      `  ${sample.scopeKey} ${sample.factType}: ${String(sample.matchedCount)}/${String(sample.expectedCount)} matched, ${String(sample.predictedCount)} predicted`,
    );
    if (sample.missing.length > 0) {
      console.log(`    missing: ${sample.missing.join('; ')}`);
    }
    if (sample.unexpected.length > 0) {
      console.log(`    unexpected: ${sample.unexpected.join('; ')}`);
    }
  }

  if (summary.failures.length > 0) {
    console.log('\n--- Missing predictions ---');
    for (const failure of summary.failures) {
      console.log(`  ${failure}`);
    }
  }

  console.log('\n--- Summary ---');
  console.log(`  Precision: ${formatScore(summary.precision)}`);
  console.log(`  Recall: ${formatScore(summary.recall)}`);
  console.log(`  F1: ${formatScore(summary.f1)}`);
}

main().catch((error: unknown) => {
  console.error('Evaluation failed:', error);
  process.exit(1);
});
