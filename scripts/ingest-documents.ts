import { resolve } from 'node:path';
import { bootstrap, defaultConfigDir, readDocuments } from './lib/bootstrap.js';

async function main(): Promise<void> {
  const inputDir = process.argv[2];
  if (!inputDir) {
    console.error('Usage: ingest-documents <inputDir> [configDir]');
    process.exit(1);
  }
  const configDir = process.argv[3] ?? defaultConfigDir();

  console.log('=== Document Ingestion ===\n');
  const { config, services } = await bootstrap(configDir);

  const documents = await readDocuments(resolve(inputDir));
  console.log(`Documents found: ${String(documents.length)}`);

  const startTime = Date.now();
  const report = await services.ingestor.ingestDocuments(documents, {
    concurrency: config.pipeline.ingestion.concurrency,
  });
  const elapsed = Date.now() - startTime;

  const unchanged = report.ingested.filter((r) => r.unchanged).length;
  const created = report.ingested.reduce((sum, r) => sum + r.chunksCreated, 0);
  const superseded = report.ingested.reduce((sum, r) => sum + r.chunksSuperseded, 0);

  console.log('\n--- Ingestion ---');
  console.log(`  Ingested: ${String(report.ingested.length)} (${String(unchanged)} unchanged)`);
  console.log(`  Chunks created: ${String(created)}`);
  console.log(`  Chunks superseded: ${String(superseded)}`);

  if (report.failures.length > 0) {
    console.log('\n--- Failures ---');
    for (const failure of report.failures) {
      console.log(`  ${failure.documentId} [${failure.kind}]: ${failure.message}`);
    }
  }

  console.log('\n--- Statistics ---');
  for (const stats of await services.statsRepository.getAll()) {
    console.log(
      `  ${stats.domain}: ${String(stats.documentCount)} documents, ${String(stats.chunkCount)} chunks, ${String(stats.totalSizeBytes)} bytes`,
    );
  }

  console.log(`\n=== Ingestion completed in ${String(elapsed)}ms ===`);
  if (report.failures.length > 0) {
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  console.error('Ingestion failed:', error);
  process.exit(1);
});
