import type { EntityKind } from '@factsift/shared/src/types/fact.types.js';
import { escapeRegExp, US_STATE_NAMES } from '@factsift/shared/src/utils/lexicon.js';

// Abbreviations that double as state codes (CT, FL) are left alone.
const STREET_TYPES: Readonly<Record<string, string>> = {
  st: 'street',
  str: 'street',
  rd: 'road',
  dr: 'drive',
  ave: 'avenue',
  av: 'avenue',
  blvd: 'boulevard',
  ln: 'lane',
  hwy: 'highway',
  pkwy: 'parkway',
  pky: 'parkway',
  cir: 'circle',
  plz: 'plaza',
  sq: 'square',
  ter: 'terrace',
  trl: 'trail',
  tpke: 'turnpike',
  expy: 'expressway',
  twp: 'township',
  ctr: 'center',
};

const STREET_TYPE_PATTERN = new RegExp(`\\b(${Object.keys(STREET_TYPES).join('|')})\\b`, 'g');

const UNIT_QUALIFIER_PATTERN =
  /\b(?:suite|ste|unit|apt|apartment|room|rm|floor|flr|bldg|building)\s+[a-z0-9]+\b|\b\d+(?:st|nd|rd|th)\s+(?:floor|flr)\b/g;

const STATE_NAME_PATTERN = new RegExp(
  `\\b(${[...US_STATE_NAMES.keys()]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join('|')})\\b`,
  'g',
);

const NAME_AFFIXES = new Set(['mr', 'mrs', 'ms', 'dr', 'hon', 'esq', 'esquire', 'atty', 'attorney']);

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function stripPunctuation(text: string): string {
  return text.replace(/[^\p{L}\p{N}\s]/gu, ' ');
}

export function normalizeAddress(address: string): string {
  let normalized = stripPunctuation(address.toLowerCase().replace(/#\s*[a-z0-9-]+/g, ' '));
  normalized = normalized.replace(UNIT_QUALIFIER_PATTERN, ' ');
  normalized = normalized.replace(STATE_NAME_PATTERN, (name) => US_STATE_NAMES.get(name) ?? name);
  normalized = normalized.replace(STREET_TYPE_PATTERN, (abbreviation) => STREET_TYPES[abbreviation] ?? abbreviation);
  return collapse(normalized);
}

export function normalizeName(name: string): string {
  const tokens = collapse(stripPunctuation(name.toLowerCase())).split(' ');
  return tokens.filter((token) => token.length > 0 && !NAME_AFFIXES.has(token)).join(' ');
}

export function normalizeText(text: string): string {
  return collapse(stripPunctuation(text.toLowerCase()));
}

export function normalizeEntity(text: string, kind: EntityKind): string {
  switch (kind) {
    case 'address':
      return normalizeAddress(text);
    case 'name':
      return normalizeName(text);
    case 'text':
      return normalizeText(text);
  }
}

export function numericTokens(normalized: string): string[] {
  return normalized.match(/\d+/g) ?? [];
}
