import { describe, it, expect } from 'vitest';
import { FACT_TYPES } from '@factsift/shared/src/types/fact.types.js';
import { synthesizeFromJsonSchema } from '../llm/schema-synthesis.js';
import { FACT_TYPE_DEFINITIONS } from './fact-type-registry.js';

describe('FACT_TYPE_DEFINITIONS', () => {
  it('should accept the empty answer synthesized from every JSON schema', () => {
    for (const factType of FACT_TYPES) {
      const definition = FACT_TYPE_DEFINITIONS[factType];
      const check = definition.check(synthesizeFromJsonSchema(definition.jsonSchema()), 2);
      expect(check.valid, factType).toBe(true);
    }
  });

  it('should report field paths for invalid payloads', () => {
    const check = FACT_TYPE_DEFINITIONS.social_media.check(
      { profiles: [{ platform: 'myspace', url: 'https://example.com/firm' }] },
      2,
    );

    expect(check.valid).toBe(false);
    if (check.valid) return;
    expect(check.errors[0]).toMatch(/^profiles\.0\.platform: Invalid enum value/);
  });

  it('should merge duplicate attorneys and keep the raw payload', () => {
    const check = FACT_TYPE_DEFINITIONS.attorneys.check(
      {
        attorneys: [
          { name: 'Jane Doe', title: null },
          { name: 'Jane Doe, Esq.', title: 'Partner' },
        ],
      },
      2,
    );

    expect(check).toEqual({
      valid: true,
      payload: {
        attorneys: [
          { name: 'Jane Doe', title: null },
          { name: 'Jane Doe, Esq.', title: 'Partner' },
        ],
      },
      canonical: { attorneys: [{ name: 'Jane Doe, Esq.', title: 'Partner' }] },
    });
  });

  it('should keep every distinct state served', () => {
    const check = FACT_TYPE_DEFINITIONS.states_served.check(
      { states: ['California', 'Texas', 'New York', 'CA'], nationwide: false },
      2,
    );

    expect(check.valid && check.canonical).toEqual({
      states: ['California', 'Texas', 'New York'],
      nationwide: false,
    });
  });

  it('should leave fact types without merging untouched', () => {
    const payload = { phoneNumbers: ['(555) 010-0000', '555-010-0000'], emails: [], available24x7: true };
    const check = FACT_TYPE_DEFINITIONS.contact_info.check(payload, 2);

    expect(FACT_TYPE_DEFINITIONS.contact_info.dedupe).toBe(false);
    expect(check.valid && check.canonical).toEqual(payload);
  });

  it('should list entities per fact type', () => {
    expect(FACT_TYPE_DEFINITIONS.year_founded.listEntities({ yearFounded: 1998 })).toEqual(['1998']);
    expect(FACT_TYPE_DEFINITIONS.year_founded.listEntities({ yearFounded: null })).toEqual([]);
    expect(
      FACT_TYPE_DEFINITIONS.law_firm_confirmation.listEntities({
        isLawFirm: true,
        isPersonalInjuryFirm: false,
      }),
    ).toEqual(['law firm']);
    expect(FACT_TYPE_DEFINITIONS.office_locations.listEntities({ offices: 'x' })).toEqual([]);
  });
});
