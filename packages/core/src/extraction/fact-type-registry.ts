import type { z } from 'zod';
import type { EntityKind, FactType } from '@factsift/shared/src/types/fact.types.js';
import {
  factPayloadJsonSchema,
  FactPayloadSchemas,
} from '@factsift/schemas/src/fact-payload.schema.js';
import { formatZodErrors } from '@factsift/schemas/src/validators.js';
import { deduplicate } from '../dedup/deduplicator.js';

export type PayloadCheck =
  | { readonly valid: true; readonly payload: unknown; readonly canonical: unknown }
  | { readonly valid: false; readonly errors: readonly string[] };

/**
 * Everything the pipeline knows about one fact type, with the payload type
 * erased so definitions can live in a single record.
 */
export interface FactTypeDefinition {
  readonly factType: FactType;
  readonly entityKind: EntityKind;
  /** Whether a successful payload has equivalent entities merged. */
  readonly dedupe: boolean;
  jsonSchema(): Record<string, unknown>;
  check(value: unknown, maxEditDistance: number): PayloadCheck;
  /** Entity literals of a payload; an invalid payload has none. */
  listEntities(payload: unknown): string[];
}

interface EntitySpec<P, E> {
  readonly kind: EntityKind;
  readonly entities: (payload: P) => readonly E[];
  readonly textOf: (entity: E) => string;
  /** Rebuilds the payload from merged entities; absent when the fact type is not deduplicated. */
  readonly withEntities?: (payload: P, entities: E[]) => P;
}

function defineFactType<S extends z.ZodTypeAny, E>(
  factType: FactType,
  schema: S,
  entity: EntitySpec<z.infer<S>, E>,
): FactTypeDefinition {
  return {
    factType,
    entityKind: entity.kind,
    dedupe: entity.withEntities !== undefined,

    jsonSchema: () => factPayloadJsonSchema(factType),

    check(value: unknown, maxEditDistance: number): PayloadCheck {
      const result = schema.safeParse(value);
      if (!result.success) {
        return { valid: false, errors: formatZodErrors(result.error) };
      }
      const payload: z.infer<S> = result.data;
      if (!entity.withEntities) {
        return { valid: true, payload, canonical: payload };
      }
      const merged = deduplicate(entity.entities(payload), {
        kind: entity.kind,
        textOf: entity.textOf,
        maxEditDistance,
      }).map((fact) => fact.value);
      return { valid: true, payload, canonical: entity.withEntities(payload, merged) };
    },

    listEntities(payload: unknown): string[] {
      const result = schema.safeParse(payload);
      if (!result.success) {
        return [];
      }
      return entity.entities(result.data).map(entity.textOf);
    },
  };
}

const identity = (text: string): string => text;

export const FACT_TYPE_DEFINITIONS: Readonly<Record<FactType, FactTypeDefinition>> = {
  office_locations: defineFactType('office_locations', FactPayloadSchemas.office_locations, {
    kind: 'address',
    entities: (p) => p.offices,
    textOf: identity,
    withEntities: (p, offices) => ({ ...p, offices }),
  }),
  attorneys: defineFactType('attorneys', FactPayloadSchemas.attorneys, {
    kind: 'name',
    entities: (p) => p.attorneys,
    textOf: (attorney) => attorney.name,
    withEntities: (p, attorneys) => ({ ...p, attorneys }),
  }),
  languages_spoken: defineFactType('languages_spoken', FactPayloadSchemas.languages_spoken, {
    kind: 'text',
    entities: (p) => p.languages,
    textOf: identity,
    withEntities: (p, languages) => ({ ...p, languages }),
  }),
  total_settlements: defineFactType('total_settlements', FactPayloadSchemas.total_settlements, {
    kind: 'text',
    entities: (p) => p.settlements,
    textOf: (settlement) => String(settlement.amountUsd),
  }),
  year_founded: defineFactType('year_founded', FactPayloadSchemas.year_founded, {
    kind: 'text',
    entities: (p) => (p.yearFounded === null ? [] : [String(p.yearFounded)]),
    textOf: identity,
  }),
  contact_info: defineFactType('contact_info', FactPayloadSchemas.contact_info, {
    kind: 'text',
    entities: (p) => [...p.phoneNumbers, ...p.emails],
    textOf: identity,
  }),
  practice_areas: defineFactType('practice_areas', FactPayloadSchemas.practice_areas, {
    kind: 'text',
    entities: (p) => p.practiceAreas,
    textOf: identity,
    withEntities: (p, practiceAreas) => ({ ...p, practiceAreas }),
  }),
  social_media: defineFactType('social_media', FactPayloadSchemas.social_media, {
    kind: 'text',
    entities: (p) => p.profiles,
    textOf: (profile) => profile.url,
    withEntities: (p, profiles) => ({ ...p, profiles }),
  }),
  // State names and codes normalize the way address parts do.
  states_served: defineFactType('states_served', FactPayloadSchemas.states_served, {
    kind: 'address',
    entities: (p) => p.states,
    textOf: identity,
    withEntities: (p, states) => ({ ...p, states }),
  }),
  company_description: defineFactType('company_description', FactPayloadSchemas.company_description, {
    kind: 'text',
    entities: (p) => (p.description.trim() === '' ? [] : [p.description]),
    textOf: identity,
  }),
  law_firm_confirmation: defineFactType(
    'law_firm_confirmation',
    FactPayloadSchemas.law_firm_confirmation,
    {
      kind: 'text',
      entities: (p) => [
        ...(p.isLawFirm ? ['law firm'] : []),
        ...(p.isPersonalInjuryFirm ? ['personal injury firm'] : []),
      ],
      textOf: identity,
    },
  ),
};
