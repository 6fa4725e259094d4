import { readdir, readFile } from 'node:fs/promises';
import { extname, join, relative, resolve, sep } from 'node:path';
import { loadConfig } from '@factsift/schemas/src/config-loader.js';
import type { AppConfig } from '@factsift/schemas/src/config-loader.js';
import { loadProviderConfig } from '@factsift/schemas/src/provider-config.js';
import type { ProviderConfig } from '@factsift/schemas/src/provider-config.js';
import { createPipelineServices } from '@factsift/core/src/infrastructure/pipeline-services.js';
import type { PipelineServices } from '@factsift/core/src/infrastructure/pipeline-services.js';
import type { DocumentInput } from '@factsift/shared/src/types/document.types.js';

const DOCUMENT_EXTENSIONS = new Set(['.txt', '.md', '.html', '.htm']);

export interface Bootstrap {
  readonly config: AppConfig;
  readonly providers: ProviderConfig;
  readonly services: PipelineServices;
}

export function defaultConfigDir(): string {
  return resolve(process.cwd(), 'config');
}

export async function bootstrap(configDir: string): Promise<Bootstrap> {
  const config = await loadConfig(configDir);
  const providers = loadProviderConfig(process.env);
  const services = await createPipelineServices(config, providers);

  console.log(`Config directory: ${configDir}`);
  console.log(`LLM provider: ${providers.llm.kind}`);
  console.log(`Embedding provider: ${providers.embedding.kind}`);
  console.log(`Vector store: ${providers.store.kind}\n`);

  return { config, providers, services };
}

async function listFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  const nested = await Promise.all(
    entries.map(async (entry) => {
      const fullPath = join(dir, entry.name);
      if (entry.isDirectory()) {
        return listFiles(fullPath);
      }
      return entry.isFile() && DOCUMENT_EXTENSIONS.has(extname(entry.name).toLowerCase())
        ? [fullPath]
        : [];
    }),
  );
  return nested.flat();
}

/**
 * Reads every text document below `inputDir`. The document id is the path
 * relative to the directory, so `acme-law.example/about.html` carries its
 * domain in the first segment.
 */
export async function readDocuments(inputDir: string): Promise<DocumentInput[]> {
  const files = (await listFiles(inputDir)).sort();
  return Promise.all(
    files.map(async (file) => ({
      documentId: relative(inputDir, file).split(sep).join('/'),
      sourceText: await readFile(file, 'utf-8'),
    })),
  );
}
