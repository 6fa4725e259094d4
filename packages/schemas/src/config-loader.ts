import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { InvalidConfigurationError } from '@factsift/shared/src/utils/errors.js';
import { validateFactTypeCatalog, validatePipelineConfig } from './validators.js';
import type { FactTypeCatalog, PipelineConfig } from './pipeline-config.schema.js';

export interface AppConfig {
  readonly pipeline: PipelineConfig;
  readonly catalog: FactTypeCatalog;
}

export async function readJsonFile(filePath: string): Promise<unknown> {
  try {
    const content = await readFile(filePath, 'utf-8');
    return JSON.parse(content) as unknown;
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new InvalidConfigurationError(`Invalid JSON in ${filePath}: ${error.message}`);
    }
    const nodeError = error as NodeJS.ErrnoException;
    if (nodeError.code === 'ENOENT') {
      throw new InvalidConfigurationError(`Configuration file not found: ${filePath}`);
    }
    throw new InvalidConfigurationError(
      `Failed to read configuration file ${filePath}: ${nodeError.message}`,
    );
  }
}

export async function loadConfig(configDir: string): Promise<AppConfig> {
  const pipelinePath = join(configDir, 'pipeline.json');
  const catalogPath = join(configDir, 'fact-types.json');

  const [pipelineRaw, catalogRaw] = await Promise.all([
    readJsonFile(pipelinePath),
    readJsonFile(catalogPath),
  ]);

  const pipeline = validatePipelineConfig(pipelineRaw);
  const catalog = validateFactTypeCatalog(catalogRaw);

  return { pipeline, catalog };
}
