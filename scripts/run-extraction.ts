import { resolve } from 'node:path';
import type { DocumentScope, ExtractionJob } from '@factsift/shared/src/types/extraction.types.js';
import { FACT_TYPES, isFactType } from '@factsift/shared/src/types/fact.types.js';
import type { FactType } from '@factsift/shared/src/types/fact.types.js';
import { parseArgs } from './lib/args.js';
import { bootstrap, defaultConfigDir, readDocuments } from './lib/bootstrap.js';

function parseFactTypes(value: string | undefined): FactType[] {
  if (!value) {
    return [...FACT_TYPES];
  }
  const requested = value.split(',').map((s) => s.trim());
  const unknown = requested.filter((s) => !isFactType(s));
  if (unknown.length > 0) {
    throw new Error(`Unknown fact types: ${unknown.join(', ')}`);
  }
  return requested.filter(isFactType);
}

async function main(): Promise<void> {
  const { flags, positional } = parseArgs(process.argv.slice(2));
  const configDir = positional[0] ?? defaultConfigDir();
  const factTypes = parseFactTypes(flags.get('fact-types'));
  const inputDir = flags.get('input');

  console.log('=== Fact Extraction ===\n');
  const { config, providers, services } = await bootstrap(configDir);

  if (inputDir) {
    const documents = await readDocuments(resolve(inputDir));
    const ingestion = await services.ingestor.ingestDocuments(documents, {
      concurrency: config.pipeline.ingestion.concurrency,
    });
    console.log(
      `Ingested ${String(ingestion.ingested.length)} documents (${String(ingestion.failures.length)} failed)\n`,
    );
  } else if (providers.store.kind === 'memory') {
    console.log('Warning: in-memory store without --input=<dir>; nothing to retrieve from\n');
  }

  const domainFlag = flags.get('domain');
  const scopes: DocumentScope[] = domainFlag
    ? [{ domain: domainFlag }]
    : (await services.statsRepository.getAll()).map((stats) => ({ domain: stats.domain }));

  const jobs: ExtractionJob[] = scopes.flatMap((scope) =>
    factTypes.map((factType) => ({ scope, factType })),
  );
  console.log(`Jobs: ${String(jobs.length)} (${String(scopes.length)} scopes x ${String(factTypes.length)} fact types)`);

  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.log('\nCancelling remaining jobs...');
    controller.abort();
  });

  const startTime = Date.now();
  const report = await services.batchRunner.run(jobs, { signal: controller.signal });
  const elapsed = Date.now() - startTime;

  console.log('\n--- Results ---');
  for (const result of report.results) {
    const { attempts, topSimilarity } = result.confidence;
    console.log(
      `  ${result.scopeKey} ${result.factType}: ${String(result.retrievedChunkIds.length)} chunks, ` +
        `${String(attempts)} attempts, top similarity ${topSimilarity.toFixed(3)}`,
    );
    console.log(`    ${JSON.stringify(result.payload)}`);
  }

  if (report.failures.length > 0) {
    console.log('\n--- Failures ---');
    for (const failure of report.failures) {
      console.log(`  ${failure.scopeKey} ${failure.factType} [${failure.kind}]: ${failure.message}`);
    }
  }
  if (report.cancelled.length > 0) {
    console.log(`\nCancelled: ${String(report.cancelled.length)} jobs`);
  }

  console.log(`\n=== Extraction completed in ${String(elapsed)}ms ===`);
  if (report.failures.length > 0) {
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  console.error('Extraction failed:', error);
  process.exit(1);
});
