import { FactsiftError, PersistenceError, toError } from '@factsift/shared/src/utils/errors.js';

export function stripUndefined(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

/** Domain errors pass through; anything else from the client becomes a PersistenceError. */
export function toPersistenceError(error: unknown, message: string): Error {
  if (error instanceof FactsiftError) {
    return error;
  }
  const cause = toError(error);
  return new PersistenceError(`${message}: ${cause.message}`, cause);
}
