import type { FactType } from '@factsift/shared/src/types/fact.types.js';
import {
  escapeRegExp,
  LANGUAGE_NAMES,
  US_STATE_ABBREVIATIONS,
  US_STATE_NAMES,
} from '@factsift/shared/src/utils/lexicon.js';

export interface Signal {
  readonly name: string;
  /** Specificity in (0, 1). */
  readonly weight: number;
  matches(text: string): boolean;
}

function regexSignal(name: string, weight: number, pattern: RegExp): Signal {
  return {
    name,
    weight,
    matches: (text) => pattern.test(text),
  };
}

function globalCopy(pattern: RegExp): RegExp {
  return new RegExp(pattern.source, pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`);
}

export function findAll(text: string, pattern: RegExp): string[] {
  return Array.from(text.matchAll(globalCopy(pattern)), (match) => match[0]);
}

export const STREET_ADDRESS_PATTERN =
  /\b\d{1,5}\s+(?:[NSEW]\.?\s+)?(?:[A-Za-z0-9.'-]+\s+){0,4}(?:Street|St|Avenue|Ave|Boulevard|Blvd|Drive|Dr|Lane|Ln|Road|Rd|Way|Court|Ct|Plaza|Parkway|Pkwy|Highway|Hwy|Place|Pl|Circle|Cir|Terrace|Trail|Square)\b\.?/i;
export const PO_BOX_PATTERN = /\bP\.?\s?O\.?\s*Box\s+\d+/i;
export const ZIP_CODE_PATTERN = /\b\d{5}(?:-\d{4})?\b/;
const STATE_ZIP_PATTERN = /\b([A-Z]{2})\s+\d{5}(?:-\d{4})?\b/g;
const SUITE_FLOOR_PATTERN = /\b(?:(?:Suite|Ste\.?|Unit)\s*#?\s*\d+|\d+(?:st|nd|rd|th)\s+Floor)\b/i;

export const EMAIL_PATTERN = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/;
export const PHONE_PATTERN = /(?:\+1[\s.-]?)?(?:\(\d{3}\)|\b\d{3})[\s.-]?\d{3}[\s.-]\d{4}\b/;
const YEAR_PREFIX_PATTERN = /^(?:19|20)\d{2}/;
const AVAILABILITY_PATTERN = /\b24\s*\/\s*7\b|\b24 hours a day\b|\baround the clock\b/i;
const TOLL_FREE_PATTERN = /\b(?:1-)?8(?:00|33|44|55|66|77|88)-\d{3}-\d{4}\b|\btoll[- ]free\b/i;

export const CURRENCY_PATTERN =
  /\$\s?\d[\d,]*(?:\.\d+)?(?:\s*(?:million|billion|thousand)\b|[MBK]\b)?/i;
export const SCALED_AMOUNT_PATTERN = /\b\d+(?:\.\d+)?\s*(?:million|billion)\b/i;
const SETTLEMENT_PATTERN =
  /\b(?:settlements?|verdicts?|jury awards?|recovered|recoveries|judgments?)\b/i;
const DOLLARS_WORD_PATTERN = /\bdollars?\b/i;

const FOUNDED_YEAR_PATTERN =
  /\b(?:founded|established|since|est\.?|opened|began practicing)\s+(?:in\s+)?(?:1[7-9]\d{2}|20\d{2})\b/i;
const EXPERIENCE_PATTERN = /\b\d{1,3}\+?\s+years\s+(?:of\s+)?(?:experience|serving|in practice)\b/i;
const FOUR_DIGIT_YEAR_PATTERN = /\b(?:1[89]\d{2}|20\d{2})\b/;

const BILINGUAL_PATTERN =
  /\b(?:bilingual|multilingual|interpreters?|translators?|translation services|hablamos|se habla)\b/i;
const SPEAKS_PATTERN = /\b(?:speaks?|fluent in|spoken)\b/i;

const ATTORNEY_TITLE_PATTERN = /\b(?:attorneys?|lawyers?|partners?|associates?|of counsel)\b/i;
const ESQUIRE_PATTERN = /\b(?:Esq\.?|Esquire)(?!\w)/;
const LAW_DEGREE_PATTERN = /\bJ\.D\.|\bJuris Doctor\b/i;
const BAR_ADMISSION_PATTERN =
  /\b(?:admitted to practice|admitted to the bar|bar admissions?|state bar)\b/i;

const PRACTICE_AREA_PATTERN =
  /\b(?:personal injury|criminal defense|family law|divorce|bankruptcy|immigration|real estate|estate planning|workers'? compensation|medical malpractice|employment law|intellectual property|wrongful death|product liability|premises liability|car accidents?|truck accidents?|motorcycle accidents?|slip and fall)\b/i;
const PRACTICE_HEADING_PATTERN =
  /\b(?:practice areas?|areas of practice|cases we handle|our services|legal services)\b/i;

const SOCIAL_URL_PATTERN =
  /\b(?:https?:\/\/)?(?:www\.)?(?:facebook|twitter|x|linkedin|instagram|youtube|tiktok|avvo|justia|martindale)\.com\/\S+/i;
const FOLLOW_PATTERN = /\b(?:follow us|connect with us|find us on)\b/i;

const LICENSED_PATTERN =
  /\b(?:licensed (?:to practice )?in|admitted in|serving clients (?:in|throughout)|serves? clients in)\b/i;
const NATIONWIDE_PATTERN =
  /\b(?:nationwide|across the (?:country|United States)|all 50 states|multi-state|tri-state)\b/i;

const ABOUT_PATTERN = /\b(?:about us|who we are|our (?:firm|mission|story|history)|mission statement)\b/i;

const LAW_FIRM_PATTERN = /\b(?:law (?:firm|office|group)s?|attorneys? at law|legal representation)\b/i;
const INJURY_PATTERN = /\b(?:personal injury|injured|accidents?)\b/i;

function alternation(words: Iterable<string>): string {
  return Array.from(words, escapeRegExp).join('|');
}

const LANGUAGE_PATTERN = new RegExp(
  `\\b(?:${alternation(LANGUAGE_NAMES.filter((name) => name.toLowerCase() !== 'english'))})\\b`,
  'i',
);
const STATE_NAME_PATTERN = new RegExp(`\\b(?:${alternation(US_STATE_NAMES.keys())})\\b`, 'i');

/** Phone-shaped tokens, minus the ones that start like a year. */
export function findPhoneNumbers(text: string): string[] {
  return findAll(text, PHONE_PATTERN).filter((candidate) => !YEAR_PREFIX_PATTERN.test(candidate));
}

function hasStateFollowedByZip(text: string): boolean {
  for (const match of text.matchAll(STATE_ZIP_PATTERN)) {
    if (US_STATE_ABBREVIATIONS.has(match[1].toLowerCase())) {
      return true;
    }
  }
  return false;
}

export const FACT_TYPE_SIGNALS: Readonly<Record<FactType, readonly Signal[]>> = {
  office_locations: [
    regexSignal('street_address', 0.6, STREET_ADDRESS_PATTERN),
    { name: 'state_zip', weight: 0.5, matches: hasStateFollowedByZip },
    regexSignal('po_box', 0.4, PO_BOX_PATTERN),
    regexSignal('zip_code', 0.3, ZIP_CODE_PATTERN),
    regexSignal('suite_floor', 0.2, SUITE_FLOOR_PATTERN),
  ],
  attorneys: [
    regexSignal('esquire', 0.5, ESQUIRE_PATTERN),
    regexSignal('attorney_title', 0.4, ATTORNEY_TITLE_PATTERN),
    regexSignal('law_degree', 0.4, LAW_DEGREE_PATTERN),
    regexSignal('bar_admission', 0.3, BAR_ADMISSION_PATTERN),
  ],
  languages_spoken: [
    regexSignal('language_name', 0.5, LANGUAGE_PATTERN),
    regexSignal('bilingual_phrase', 0.4, BILINGUAL_PATTERN),
    regexSignal('speaks_phrase', 0.3, SPEAKS_PATTERN),
  ],
  total_settlements: [
    regexSignal('currency_amount', 0.4, CURRENCY_PATTERN),
    regexSignal('settlement_phrase', 0.4, SETTLEMENT_PATTERN),
    regexSignal('scaled_amount', 0.3, SCALED_AMOUNT_PATTERN),
    regexSignal('dollars_word', 0.2, DOLLARS_WORD_PATTERN),
  ],
  year_founded: [
    regexSignal('founded_year', 0.7, FOUNDED_YEAR_PATTERN),
    regexSignal('years_of_experience', 0.3, EXPERIENCE_PATTERN),
    regexSignal('four_digit_year', 0.1, FOUR_DIGIT_YEAR_PATTERN),
  ],
  contact_info: [
    { name: 'phone', weight: 0.5, matches: (text) => findPhoneNumbers(text).length > 0 },
    regexSignal('email', 0.5, EMAIL_PATTERN),
    regexSignal('availability_24_7', 0.3, AVAILABILITY_PATTERN),
    regexSignal('toll_free', 0.2, TOLL_FREE_PATTERN),
  ],
  practice_areas: [
    regexSignal('practice_area_keyword', 0.5, PRACTICE_AREA_PATTERN),
    regexSignal('practice_area_heading', 0.4, PRACTICE_HEADING_PATTERN),
  ],
  social_media: [
    regexSignal('social_url', 0.7, SOCIAL_URL_PATTERN),
    regexSignal('follow_phrase', 0.3, FOLLOW_PATTERN),
  ],
  states_served: [
    regexSignal('nationwide', 0.5, NATIONWIDE_PATTERN),
    regexSignal('state_name', 0.4, STATE_NAME_PATTERN),
    regexSignal('licensed_phrase', 0.4, LICENSED_PATTERN),
  ],
  company_description: [regexSignal('about_phrase', 0.4, ABOUT_PATTERN)],
  law_firm_confirmation: [
    regexSignal('law_firm_phrase', 0.5, LAW_FIRM_PATTERN),
    regexSignal('injury_phrase', 0.4, INJURY_PATTERN),
  ],
};
