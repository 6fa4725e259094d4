import { describe, it, expect } from 'vitest';
import { escapeRegExp, LANGUAGE_NAMES, US_STATE_ABBREVIATIONS, US_STATE_NAMES } from './lexicon.js';

describe('lexicon', () => {
  it('should map full state names to abbreviations', () => {
    expect(US_STATE_NAMES.get('illinois')).toBe('il');
    expect(US_STATE_NAMES.get('new york')).toBe('ny');
    expect(US_STATE_ABBREVIATIONS.has('ca')).toBe(true);
  });

  it('should list language names', () => {
    expect(LANGUAGE_NAMES).toContain('Spanish');
  });

  it('should escape regular expression metacharacters', () => {
    expect(escapeRegExp('a.b(c)')).toBe('a\\.b\\(c\\)');
  });
});
