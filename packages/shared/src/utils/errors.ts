export class FactsiftError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'FactsiftError';
  }
}

export type ProviderKind = 'llm' | 'embedding' | 'vector-store';

export class InvalidConfigurationError extends FactsiftError {
  constructor(message: string) {
    super(message, 'INVALID_CONFIGURATION');
    this.name = 'InvalidConfigurationError';
  }
}

export class DimensionMismatchError extends FactsiftError {
  constructor(
    public readonly expected: number,
    public readonly actual: number,
    context: string,
  ) {
    super(
      `Embedding dimension mismatch in ${context}: expected ${String(expected)}, got ${String(actual)}`,
      'DIMENSION_MISMATCH',
    );
    this.name = 'DimensionMismatchError';
  }
}

export class InsufficientContextError extends FactsiftError {
  constructor(message: string) {
    super(message, 'INSUFFICIENT_CONTEXT');
    this.name = 'InsufficientContextError';
  }
}

export class SchemaValidationError extends FactsiftError {
  constructor(
    message: string,
    public readonly validationErrors: readonly string[],
  ) {
    super(message, 'SCHEMA_VALIDATION_ERROR');
    this.name = 'SchemaValidationError';
  }
}

export class ProviderTimeoutError extends FactsiftError {
  constructor(
    public readonly provider: ProviderKind,
    public readonly timeoutMs: number,
  ) {
    super(`${provider} call timed out after ${String(timeoutMs)}ms`, 'PROVIDER_TIMEOUT');
    this.name = 'ProviderTimeoutError';
  }
}

export class ProviderUnavailableError extends FactsiftError {
  constructor(
    message: string,
    public readonly provider: ProviderKind,
    public readonly isTransient: boolean,
    cause?: Error,
  ) {
    super(message, 'PROVIDER_UNAVAILABLE', cause);
    this.name = 'ProviderUnavailableError';
  }
}

export class ExtractionCancelledError extends FactsiftError {
  constructor(message: string) {
    super(message, 'EXTRACTION_CANCELLED');
    this.name = 'ExtractionCancelledError';
  }
}

export class IngestionError extends FactsiftError {
  constructor(message: string, cause?: Error) {
    super(message, 'INGESTION_ERROR', cause);
    this.name = 'IngestionError';
  }
}

export class PersistenceError extends FactsiftError {
  constructor(message: string, cause?: Error) {
    super(message, 'PERSISTENCE_ERROR', cause);
    this.name = 'PersistenceError';
  }
}

export function isProviderError(
  error: unknown,
): error is ProviderTimeoutError | ProviderUnavailableError {
  return error instanceof ProviderTimeoutError || error instanceof ProviderUnavailableError;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
