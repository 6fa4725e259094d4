export const FACT_TYPES = [
  'office_locations',
  'attorneys',
  'languages_spoken',
  'total_settlements',
  'year_founded',
  'contact_info',
  'practice_areas',
  'social_media',
  'states_served',
  'company_description',
  'law_firm_confirmation',
] as const;

export type FactType = (typeof FACT_TYPES)[number];

export type EntityKind = 'address' | 'name' | 'text';

export function isFactType(value: string): value is FactType {
  return FACT_TYPES.some((factType) => factType === value);
}
