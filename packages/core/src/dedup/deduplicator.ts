import type { CanonicalFact } from '@factsift/shared/src/types/extraction.types.js';
import type { EntityKind } from '@factsift/shared/src/types/fact.types.js';
import { editDistance } from '@factsift/shared/src/utils/math.js';
import { normalizeEntity, numericTokens } from './normalizers.js';

export interface DeduplicateOptions<T> {
  readonly kind: EntityKind;
  readonly textOf: (item: T) => string;
  readonly maxEditDistance: number;
}

interface Candidate<T> {
  readonly item: T;
  readonly literal: string;
  readonly normalized: string;
  /** Normalized form without its postal code. */
  readonly core: string;
  readonly hasPostalCode: boolean;
}

// Never the leading token, which is the street number.
const NORMALIZED_POSTAL_CODE = /(?<=\S) \d{5}(?: \d{4})?(?=\s|$)/g;

/** Shortest form that may absorb one fuzzy edit. */
const CHARS_PER_EDIT = 10;

const POSTAL_CODE = /\b\d{5}(?:-\d{4})?\b/;
const SUITE = /\b(?:suite|ste|unit|apt|room|floor|flr)\b|#\s*\d/i;
const STREET_NUMBER = /^\s*\d+/;

/** Postal code, then suite, then street number, then literal length. */
function completeness(literal: string): number[] {
  return [
    POSTAL_CODE.test(literal) ? 1 : 0,
    SUITE.test(literal) ? 1 : 0,
    STREET_NUMBER.test(literal) ? 1 : 0,
    literal.length,
  ];
}

function isMoreComplete(candidate: string, current: string): boolean {
  const a = completeness(candidate);
  const b = completeness(current);
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) {
      return a[i] > b[i];
    }
  }
  return false;
}

/** Short forms (state codes, short names) only match exactly. */
export function editBudget(a: string, b: string, maxEditDistance: number): number {
  const shorter = Math.min(a.length, b.length);
  return Math.min(maxEditDistance, Math.floor(shorter / CHARS_PER_EDIT));
}

function sameEntity<T>(a: Candidate<T>, b: Candidate<T>, maxEditDistance: number): boolean {
  if (a.normalized === b.normalized) {
    return true;
  }
  // A postal code only tells addresses apart when both carry one.
  const bothPostal = a.hasPostalCode && b.hasPostalCode;
  const left = bothPostal ? a.normalized : a.core;
  const right = bothPostal ? b.normalized : b.core;
  if (left === right) {
    return true;
  }
  // Numbers never fuzzy-match: 123 vs 124 Main St are different places.
  if (numericTokens(left).join(' ') !== numericTokens(right).join(' ')) {
    return false;
  }
  const budget = editBudget(left, right, maxEditDistance);
  return editDistance(left, right, budget) <= budget;
}

function toCandidate<T>(item: T, options: DeduplicateOptions<T>): Candidate<T> {
  const literal = options.textOf(item);
  const normalized = normalizeEntity(literal, options.kind);
  if (options.kind !== 'address') {
    return { item, literal, normalized, core: normalized, hasPostalCode: false };
  }
  const core = normalized.replace(NORMALIZED_POSTAL_CODE, '');
  return { item, literal, normalized, core, hasPostalCode: core !== normalized };
}

export function createEntityMatcher(
  kind: EntityKind,
  maxEditDistance: number,
): (a: string, b: string) => boolean {
  const options: DeduplicateOptions<string> = { kind, textOf: (text) => text, maxEditDistance };
  return (a, b) => sameEntity(toCandidate(a, options), toCandidate(b, options), maxEditDistance);
}

/**
 * Groups equivalent items and keeps the most complete variant of each group.
 * Groups come out in the order of their first member.
 */
export function deduplicate<T>(
  items: readonly T[],
  options: DeduplicateOptions<T>,
): CanonicalFact<T>[] {
  const groups: { representative: Candidate<T>; members: Candidate<T>[] }[] = [];

  for (const item of items) {
    const candidate = toCandidate(item, options);
    if (candidate.normalized.length === 0) {
      continue;
    }
    const group = groups.find((g) =>
      g.members.some((member) => sameEntity(member, candidate, options.maxEditDistance)),
    );
    if (!group) {
      groups.push({ representative: candidate, members: [candidate] });
      continue;
    }
    group.members.push(candidate);
    if (isMoreComplete(candidate.literal, group.representative.literal)) {
      group.representative = candidate;
    }
  }

  return groups.map((group) => ({
    value: group.representative.item,
    normalized: group.representative.normalized,
    variants: group.members.map((member) => member.item),
  }));
}
