import { describe, it, expect } from 'vitest';
import {
  normalizeText,
  tokenize,
  tokenizeQuery,
  normalizeCodeIdentifier,
  compareCodeIdentifiers,
  trigrams,
  trigramSimilarity,
} from '@codeplan/shared/utils/text-normalize.utils.js';

describe('normalizeText', () => {
  it('lowercases and strips diacritics', () => {
    expect(normalizeText('Anesthésie Générale')).toBe('anesthesie generale');
  });

  it('collapses punctuation and whitespace runs into single spaces', () => {
    expect(normalizeText("  Drainage d'un abcès -- péritonéal ")).toBe(
      'drainage d un abces peritoneal',
    );
  });

  it('keeps digits', () => {
    expect(normalizeText('Code HHFA016')).toBe('code hhfa016');
  });

  it('returns an empty string for null, undefined and blank input', () => {
    expect(normalizeText(null)).toBe('');
    expect(normalizeText(undefined)).toBe('');
    expect(normalizeText(' ,; ')).toBe('');
  });

  it('is idempotent', () => {
    for (const input of ['Exérèse de lésion cutanée', 'ℌépatique', 'Œdème  (aigu)', 'Cæcum']) {
      const once = normalizeText(input);
      expect(normalizeText(once)).toBe(once);
    }
  });

  it('lowercases compatibility characters that decompose to upper case', () => {
    expect(normalizeText('ℌ')).toBe('h');
  });

  it('spells out ligatures', () => {
    expect(normalizeText('Œsophage')).toBe('oesophage');
    expect(normalizeText('cœlioscopie')).toBe('coelioscopie');
    expect(normalizeText('Cæcum')).toBe('caecum');
    expect(normalizeText('Straße')).toBe('strasse');
  });
});

describe('tokenize', () => {
  it('splits normalized text into tokens', () => {
    expect(tokenize('Appendicectomie par cœlioscopie')).toEqual([
      'appendicectomie',
      'par',
      'coelioscopie',
    ]);
  });

  it('returns no tokens for empty text', () => {
    expect(tokenize('')).toEqual([]);
  });
});

describe('tokenizeQuery', () => {
  it('drops short tokens from multi-token queries', () => {
    expect(tokenizeQuery("drainage d'un abcès")).toEqual(['drainage', 'abces']);
  });

  it('keeps short tokens when nothing else remains', () => {
    expect(tokenizeQuery('de la')).toEqual(['de', 'la']);
  });

  it('keeps a single short token', () => {
    expect(tokenizeQuery('os')).toEqual(['os']);
  });

  it('removes duplicate tokens, keeping first-occurrence order', () => {
    expect(tokenizeQuery('Exérèse exerese lésion')).toEqual(['exerese', 'lesion']);
  });
});

describe('normalizeCodeIdentifier', () => {
  it('trims and upper-cases', () => {
    expect(normalizeCodeIdentifier(' hhfa016 ')).toBe('HHFA016');
  });
});

describe('compareCodeIdentifiers', () => {
  it('orders by code unit, digits before letters', () => {
    expect(['ZZLP025', 'HHFA016', 'HHFA011', '0AAA001'].sort(compareCodeIdentifiers)).toEqual([
      '0AAA001',
      'HHFA011',
      'HHFA016',
      'ZZLP025',
    ]);
  });

  it('returns 0 for equal identifiers', () => {
    expect(compareCodeIdentifiers('HHFA016', 'HHFA016')).toBe(0);
  });

  it('puts upper case before lower case', () => {
    expect(compareCodeIdentifiers('Z', 'a')).toBe(-1);
  });
});

describe('trigrams', () => {
  it('pads with two leading blanks and one trailing blank', () => {
    expect(trigrams('abc')).toEqual(new Set(['  a', ' ab', 'abc', 'bc ']));
  });

  it('keeps each trigram once', () => {
    expect(trigrams('aaaa').size).toBe(4);
  });
});

describe('trigramSimilarity', () => {
  it('is 1 for equal words and 0 when either is empty', () => {
    expect(trigramSimilarity('anesthesie', 'anesthesie')).toBe(1);
    expect(trigramSimilarity('', 'anesthesie')).toBe(0);
    expect(trigramSimilarity('anesthesie', '')).toBe(0);
  });

  it('shares most trigrams across a one-letter typo', () => {
    expect(trigramSimilarity('apendicectomie', 'appendicectomie')).toBeCloseTo(14 / 17, 10);
  });

  it('is symmetric', () => {
    expect(trigramSimilarity('appendicectomy', 'appendicectomie')).toBe(
      trigramSimilarity('appendicectomie', 'appendicectomy'),
    );
  });

  it('is 0 for words with no trigram in common', () => {
    expect(trigramSimilarity('abc', 'xyz')).toBe(0);
  });
});
