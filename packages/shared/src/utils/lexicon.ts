import { readFileSync } from 'node:fs';

function readJson(relativePath: string): unknown {
  return JSON.parse(readFileSync(new URL(relativePath, import.meta.url), 'utf-8')) as unknown;
}

function loadStateNames(): ReadonlyMap<string, string> {
  const raw = readJson('../data/us-states.json');
  if (typeof raw !== 'object' || raw === null) {
    throw new Error('us-states.json must contain an object');
  }
  const entries = Object.entries(raw).filter(
    (entry): entry is [string, string] => typeof entry[1] === 'string',
  );
  return new Map(entries);
}

function loadLanguageNames(): readonly string[] {
  const raw = readJson('../data/languages.json');
  if (!Array.isArray(raw)) {
    throw new Error('languages.json must contain an array');
  }
  return raw.filter((name): name is string => typeof name === 'string');
}

/** Lower-cased full state name → lower-cased two-letter abbreviation. */
export const US_STATE_NAMES: ReadonlyMap<string, string> = loadStateNames();

export const US_STATE_ABBREVIATIONS: ReadonlySet<string> = new Set(US_STATE_NAMES.values());

export const LANGUAGE_NAMES: readonly string[] = loadLanguageNames();

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
