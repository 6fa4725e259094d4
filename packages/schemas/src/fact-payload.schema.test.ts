import { describe, it, expect } from 'vitest';
import {
  FactPayloadSchemas,
  FactTypeSchema,
  factPayloadJsonSchema,
} from './fact-payload.schema.js';

describe('FactPayloadSchemas', () => {
  it('should accept a conformant office list', () => {
    const result = FactPayloadSchemas.office_locations.safeParse({
      offices: ['123 Main St, Springfield, IL 62701'],
    });
    expect(result.success).toBe(true);
  });

  it('should accept an empty answer as a valid payload', () => {
    expect(FactPayloadSchemas.year_founded.safeParse({ yearFounded: null }).success).toBe(true);
    expect(FactPayloadSchemas.attorneys.safeParse({ attorneys: [] }).success).toBe(true);
  });

  it('should reject values outside an enumeration', () => {
    const result = FactPayloadSchemas.social_media.safeParse({
      profiles: [{ platform: 'myspace', url: 'https://example.com/firm' }],
    });
    expect(result.success).toBe(false);
  });

  it('should reject missing required fields', () => {
    const result = FactPayloadSchemas.law_firm_confirmation.safeParse({ isLawFirm: true });
    expect(result.success).toBe(false);
  });
});

describe('FactTypeSchema', () => {
  it('should list every fact type', () => {
    expect(FactTypeSchema.options).toHaveLength(11);
  });
});

describe('factPayloadJsonSchema', () => {
  it('should name the definition after the fact type', () => {
    const jsonSchema = factPayloadJsonSchema('office_locations');
    expect(jsonSchema['$ref']).toBe('#/definitions/OfficeLocations');
    expect(jsonSchema['definitions']).toEqual({
      OfficeLocations: {
        type: 'object',
        properties: {
          offices: { type: 'array', items: { type: 'string', minLength: 1 } },
        },
        required: ['offices'],
        additionalProperties: false,
      },
    });
  });

  it('should return the cached instance on repeated calls', () => {
    expect(factPayloadJsonSchema('attorneys')).toBe(factPayloadJsonSchema('attorneys'));
  });
});
