import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { FACT_TYPES } from '@factsift/shared/src/types/fact.types.js';
import type { FactType } from '@factsift/shared/src/types/fact.types.js';

export const FactTypeSchema = z.enum(FACT_TYPES);

export const OfficeLocationsSchema = z.object({
  offices: z.array(z.string().min(1)),
});

export const AttorneysSchema = z.object({
  attorneys: z.array(
    z.object({
      name: z.string().min(1),
      title: z.string().nullable(),
    }),
  ),
});

export const LanguagesSpokenSchema = z.object({
  languages: z.array(z.string().min(1)),
  hasInterpreterServices: z.boolean(),
});

export const TotalSettlementsSchema = z.object({
  settlements: z.array(
    z.object({
      amountUsd: z.number().nonnegative(),
      description: z.string(),
    }),
  ),
  totalRecoveredUsd: z.number().nonnegative().nullable(),
});

export const YearFoundedSchema = z.object({
  yearFounded: z.number().int().min(1700).max(2100).nullable(),
});

export const ContactInfoSchema = z.object({
  phoneNumbers: z.array(z.string().min(1)),
  emails: z.array(z.string().min(1)),
  available24x7: z.boolean(),
});

export const PracticeAreasSchema = z.object({
  practiceAreas: z.array(z.string().min(1)),
});

export const SocialPlatformSchema = z.enum([
  'facebook',
  'twitter',
  'linkedin',
  'instagram',
  'youtube',
  'tiktok',
  'avvo',
  'justia',
  'other',
]);

export const SocialMediaSchema = z.object({
  profiles: z.array(
    z.object({
      platform: SocialPlatformSchema,
      url: z.string().min(1),
    }),
  ),
});

export const StatesServedSchema = z.object({
  states: z.array(z.string().min(2)),
  nationwide: z.boolean(),
});

export const CompanyDescriptionSchema = z.object({
  description: z.string(),
});

export const LawFirmConfirmationSchema = z.object({
  isLawFirm: z.boolean(),
  isPersonalInjuryFirm: z.boolean(),
});

export const FactPayloadSchemas = {
  office_locations: OfficeLocationsSchema,
  attorneys: AttorneysSchema,
  languages_spoken: LanguagesSpokenSchema,
  total_settlements: TotalSettlementsSchema,
  year_founded: YearFoundedSchema,
  contact_info: ContactInfoSchema,
  practice_areas: PracticeAreasSchema,
  social_media: SocialMediaSchema,
  states_served: StatesServedSchema,
  company_description: CompanyDescriptionSchema,
  law_firm_confirmation: LawFirmConfirmationSchema,
} as const satisfies Record<FactType, z.ZodTypeAny>;

export type FactPayloads = {
  [K in FactType]: z.infer<(typeof FactPayloadSchemas)[K]>;
};

export type OfficeLocations = FactPayloads['office_locations'];
export type Attorneys = FactPayloads['attorneys'];
export type SocialMedia = FactPayloads['social_media'];

function toPascalCase(factType: FactType): string {
  return factType
    .split('_')
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join('');
}

const jsonSchemaCache = new Map<FactType, Record<string, unknown>>();

/** JSON Schema handed to the model as its output constraint. */
export function factPayloadJsonSchema(factType: FactType): Record<string, unknown> {
  const cached = jsonSchemaCache.get(factType);
  if (cached) {
    return cached;
  }
  const jsonSchema = zodToJsonSchema(FactPayloadSchemas[factType], {
    name: toPascalCase(factType),
    $refStrategy: 'none',
  }) as Record<string, unknown>;
  jsonSchemaCache.set(factType, jsonSchema);
  return jsonSchema;
}
