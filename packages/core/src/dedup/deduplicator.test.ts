import { describe, it, expect } from 'vitest';
import { createEntityMatcher, deduplicate, editBudget } from './deduplicator.js';

const addressOptions = { kind: 'address', textOf: (s: string) => s, maxEditDistance: 2 } as const;

describe('deduplicate', () => {
  it('should merge an address written with and without its suite', () => {
    const full = '123 Main St, Suite 400, Springfield, IL 62701';
    const short = '123 Main St Springfield, IL 62701';

    const facts = deduplicate([full, short], addressOptions);

    expect(facts).toEqual([
      { value: full, normalized: '123 main street springfield il 62701', variants: [full, short] },
    ]);
  });

  it('should pick the more complete variant even when it comes second', () => {
    const full = '123 Main St, Suite 400, Springfield, IL 62701';
    const short = '123 Main St Springfield, IL 62701';

    const facts = deduplicate([short, full], addressOptions);

    expect(facts).toHaveLength(1);
    expect(facts[0].value).toBe(full);
    expect(facts[0].variants).toEqual([short, full]);
  });

  it('should keep addresses whose street numbers differ apart', () => {
    const facts = deduplicate(
      ['123 Main St, Springfield, IL 62701', '124 Main St, Springfield, IL 62701'],
      addressOptions,
    );

    expect(facts.map((f) => f.value)).toEqual([
      '123 Main St, Springfield, IL 62701',
      '124 Main St, Springfield, IL 62701',
    ]);
  });

  it('should merge small spelling differences', () => {
    const facts = deduplicate(
      ['123 Main St, Springfield, IL 62701', '123 Main St, Springfeld, IL 62701'],
      addressOptions,
    );

    expect(facts).toHaveLength(1);
    expect(facts[0].value).toBe('123 Main St, Springfield, IL 62701');
  });

  it('should order groups by first appearance', () => {
    const facts = deduplicate(
      ['9 Oak Ave, Austin, TX 78701', '1 Elm Rd, Denver, CO 80202', '9 Oak Avenue, Austin, Texas 78701'],
      addressOptions,
    );

    expect(facts.map((f) => f.normalized)).toEqual([
      '9 oak avenue austin tx 78701',
      '1 elm road denver co 80202',
    ]);
  });

  it('should prefer the longer literal on a completeness tie', () => {
    const facts = deduplicate(
      [{ name: 'John Smith' }, { name: 'John Smith, Esq.' }, { name: 'Jane Doe' }],
      { kind: 'name', textOf: (a) => a.name, maxEditDistance: 2 },
    );

    expect(facts.map((f) => f.value.name)).toEqual(['John Smith, Esq.', 'Jane Doe']);
  });

  it('should only merge exact normalized forms when the distance is zero', () => {
    const facts = deduplicate(['Jon Smith', 'John Smith'], {
      kind: 'name',
      textOf: (s: string) => s,
      maxEditDistance: 0,
    });

    expect(facts).toHaveLength(2);
  });

  it('should keep distinct state codes apart', () => {
    const facts = deduplicate(['California', 'Texas', 'New York', 'CA'], addressOptions);

    expect(facts.map((f) => f.normalized)).toEqual(['ca', 'tx', 'ny']);
    expect(facts[0].variants).toEqual(['California', 'CA']);
  });

  it('should keep short names one letter apart distinct', () => {
    const facts = deduplicate(['Mark Chen', 'Mary Chen'], {
      kind: 'name',
      textOf: (s: string) => s,
      maxEditDistance: 2,
    });

    expect(facts.map((f) => f.value)).toEqual(['Mark Chen', 'Mary Chen']);
  });

  it('should merge an address missing its postal code into the one that has it', () => {
    const bare = '123 Main St, Springfield, IL';
    const full = '123 Main St, Suite 400, Springfield, IL 62701';

    const facts = deduplicate([bare, full], addressOptions);

    expect(facts).toEqual([
      { value: full, normalized: '123 main street springfield il 62701', variants: [bare, full] },
    ]);
  });

  it('should keep addresses with different postal codes apart', () => {
    const facts = deduplicate(['1 Elm Rd, Denver, CO 80202', '1 Elm Rd, Denver, CO 80203'], addressOptions);

    expect(facts).toHaveLength(2);
  });

  it('should drop items that normalize to nothing', () => {
    expect(deduplicate(['', ' , '], addressOptions)).toEqual([]);
  });
});

describe('createEntityMatcher', () => {
  it('should compare strings by normalized address equality', () => {
    const matches = createEntityMatcher('address', 2);

    expect(
      matches('123 Main St, Springfield, IL 62701', '123 Main Street Springfield Illinois 62701'),
    ).toBe(true);
    expect(matches('123 Main St, Springfield, IL 62701', '124 Main St, Springfield, IL 62701')).toBe(
      false,
    );
  });

  it('should not match near-identical short names', () => {
    expect(createEntityMatcher('name', 2)('Mark Chen', 'Mary Chen')).toBe(false);
  });
});

describe('editBudget', () => {
  it('should scale the allowed distance with the shorter form', () => {
    expect(editBudget('ca', 'tx', 2)).toBe(0);
    expect(editBudget('mark chen', 'mary chen', 2)).toBe(0);
    expect(editBudget('jonathan smithers', 'jonathon smithers', 2)).toBe(1);
    expect(editBudget('123 main street springfield il 62701', '123 main street springfeld il 62701', 2)).toBe(2);
  });
});
