import { describe, it, expect } from 'vitest';
import {
  compareSpecificity,
  formatCfrCitation,
  isCitationPrefix,
  parseCfrCitation,
  regulationKey,
} from '../services/ingestion/cfr.js';
import { collapseWhitespace, normalizeText } from '../services/ingestion/normalization.js';

const canonical = (text: string) => {
  const citation = parseCfrCitation(text);
  return citation ? formatCfrCitation(citation) : null;
};

describe('normalizeText', () => {
  it('lowercases, drops punctuation and collapses whitespace', () => {
    expect(normalizeText('  Replace   Valve-Seal. ')).toBe('replace valve seal');
  });

  it('returns an empty key for punctuation-only text', () => {
    expect(normalizeText(' ... ')).toBe('');
  });

  it('collapseWhitespace keeps case and punctuation', () => {
    expect(collapseWhitespace(' Seal\t\nwear, noted ')).toBe('Seal wear, noted');
  });
});

describe('CFR citations', () => {
  it('formats spaced and unspaced citations the same way', () => {
    expect(canonical('10 CFR 50.72')).toBe('10 CFR 50.72');
    expect(canonical('10CFR50.72')).toBe('10 CFR 50.72');
    expect(canonical('50.72')).toBe('10 CFR 50.72');
  });

  it('strips leading zeros and normalizes paragraph case', () => {
    expect(canonical('10 C.F.R. § 050.73(A)(2)(IV)(b)')).toBe('10 CFR 50.73(a)(2)(iv)(B)');
    expect(canonical('50.72(b)(3)(v)(A)')).toBe('10 CFR 50.72(b)(3)(v)(A)');
  });

  it('keeps section letter suffixes', () => {
    expect(canonical('10 CFR 50.55a')).toBe('10 CFR 50.55a');
    expect(canonical('50.55A')).toBe('10 CFR 50.55a');
  });

  it('rejects text that is not a section citation', () => {
    expect(parseCfrCitation('Technical Specification 3.0.3')).toBeNull();
    expect(parseCfrCitation('10 CFR 21')).toBeNull();
    expect(parseCfrCitation('3.4.1')).toBeNull();
  });

  it('falls back to the text key for unparsable codes', () => {
    expect(regulationKey('Tech Spec 3.4.1')).toBe('tech spec 3 4 1');
    expect(regulationKey('10cfr50.73(a)(2)(i)(b)')).toBe('10 CFR 50.73(a)(2)(i)(B)');
  });

  it('detects citation prefixes', () => {
    const broad = parseCfrCitation('10 CFR 50.72');
    const narrow = parseCfrCitation('10 CFR 50.72(b)(3)');
    const other = parseCfrCitation('10 CFR 50.73(b)(3)');
    if (!broad || !narrow || !other) throw new Error('fixture citations must parse');

    expect(isCitationPrefix(broad, narrow)).toBe(true);
    expect(isCitationPrefix(narrow, broad)).toBe(false);
    expect(isCitationPrefix(broad, broad)).toBe(false);
    expect(isCitationPrefix(broad, other)).toBe(false);
  });

  it('ranks citations by paragraph depth', () => {
    const broad = parseCfrCitation('10 CFR 50.72');
    const narrow = parseCfrCitation('10 CFR 50.72(b)(3)');
    if (!broad || !narrow) throw new Error('fixture citations must parse');

    expect(compareSpecificity(narrow, broad)).toBeGreaterThan(0);
    expect(compareSpecificity(broad, narrow)).toBeLessThan(0);
    expect(compareSpecificity(broad, broad)).toBe(0);
  });
});
