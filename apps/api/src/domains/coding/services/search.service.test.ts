import { describe, it, expect } from 'vitest';
import {
  conjunctiveStrategy,
  disjunctiveStrategy,
  fuzzyMatches,
  matchInOrder,
  searchCodes,
  substringStrategy,
} from './search.service.js';
import { CodingMetrics } from './metrics.service.js';
import {
  fixtureCodes,
  makeFixtureSnapshot,
  makeSnapshot,
  FIXTURE_VERSION,
} from '../../../../test/fixtures/coding.fixtures.js';

const snapshot = makeFixtureSnapshot();

function codesOf(result: { results: Array<{ code: string }> }): string[] {
  return result.results.map((r) => r.code);
}

// ---------------------------------------------------------------------------
// Cascade
// ---------------------------------------------------------------------------

describe('searchCodes', () => {
  it('matches every token through the conjunctive stage', () => {
    const result = searchCodes(snapshot, 'Appendicectomie par coelioscopie');

    expect(result.dataVersion).toBe(FIXTURE_VERSION);
    expect(result.normalizedQuery).toBe('appendicectomie par coelioscopie');
    expect(result.stage).toBe('conjunctive');
    expect(result.reason).toBeNull();
    expect(codesOf(result)).toEqual(['HHFA016']);
    expect(result.results[0]?.matchedTokens).toEqual([
      'appendicectomie',
      'par',
      'coelioscopie',
    ]);
  });

  it('ignores case and accents in the query', () => {
    const result = searchCodes(snapshot, 'APPENDICÉCTOMIE Coelioscopie');
    expect(result.stage).toBe('conjunctive');
    expect(codesOf(result)).toEqual(['HHFA016']);
  });

  it('ranks shorter documents first for the same term frequency', () => {
    const result = searchCodes(snapshot, 'appendicectomie');

    expect(codesOf(result)).toEqual(['HHFA016', 'HHFA011']);
    // tf 2 (label), idf ln(1 + 8/3), length 10
    expect(result.results[0]?.score).toBeCloseTo((2 * Math.log(1 + 8 / 3)) / Math.sqrt(10), 10);
  });

  it('falls back to the disjunctive stage, ranking by matched token count', () => {
    const result = searchCodes(snapshot, 'exerese laparotomie drainage');

    expect(result.stage).toBe('disjunctive');
    expect(codesOf(result)).toEqual(['HPPA002', 'HHFA011', 'QZFA001', 'HHFA016']);
    expect(result.results[0]?.matchedTokens).toEqual(['laparotomie', 'drainage']);
    expect(result.results[1]?.matchedTokens).toEqual(['exerese', 'laparotomie']);
  });

  it('falls back to substring matching for a truncated word', () => {
    const result = searchCodes(snapshot, 'appendicectomi');

    expect(result.stage).toBe('substring');
    expect(codesOf(result)).toEqual(['HHFA011', 'HHFA016']);
    expect(result.results[0]?.score).toBe(1);
  });

  it('scores substring matches by position', () => {
    const result = searchCodes(snapshot, 'coelio');

    expect(codesOf(result)).toEqual(['HHFA016']);
    // "appendicectomie par " precedes the match
    expect(result.results[0]?.score).toBeCloseTo(1 / 21, 10);
  });

  it('requires substring tokens in query order', () => {
    expect(codesOf(searchCodes(snapshot, 'append lapar'))).toEqual(['HHFA011']);
    expect(searchCodes(snapshot, 'lapar append').results[0]?.score).toBeCloseTo(1 / 21, 10);
  });

  it('returns EMPTY_QUERY for blank or punctuation-only input', () => {
    const metrics = new CodingMetrics();

    for (const query of ['', '   ', "?! -- '"]) {
      const result = searchCodes(snapshot, query, { metrics });
      expect(result.reason).toBe('EMPTY_QUERY');
      expect(result.stage).toBeNull();
      expect(result.results).toEqual([]);
    }
    expect(metrics.snapshot().emptyQueries).toBe(3);
  });

  it('returns NO_MATCH when no stage finds anything', () => {
    const metrics = new CodingMetrics();
    const result = searchCodes(snapshot, 'xylophone', { metrics });

    expect(result.reason).toBe('NO_MATCH');
    expect(result.results).toEqual([]);
    expect(metrics.snapshot().searchStageHits.none).toBe(1);
  });

  it('excludes retired codes unless asked', () => {
    expect(searchCodes(snapshot, 'ancienne technique').reason).toBe('NO_MATCH');
    expect(codesOf(searchCodes(snapshot, 'ancienne technique', { includeRetired: true }))).toEqual([
      'HHFA999',
    ]);
  });

  it('matches a ligature label from its spelled-out form', () => {
    const ligatures = makeSnapshot(
      'ligatures',
      [
        {
          code: 'HHFA016',
          label: 'Appendicectomie, par cœlioscopie',
          workValue: 150.5,
          status: 'active',
          chapter: '07',
        },
      ],
      { official: [], incompatible: [], frequency: [] },
    );

    const result = searchCodes(ligatures, 'coelioscopie');
    expect(result.stage).toBe('conjunctive');
    expect(codesOf(result)).toEqual(['HHFA016']);
    expect(codesOf(searchCodes(ligatures, 'CŒLIOSCOPIE'))).toEqual(['HHFA016']);
    expect(codesOf(searchCodes(ligatures, 'apendicectomie'))).toEqual(['HHFA016']);
    expect(codesOf(searchCodes(ligatures, 'appendicectomy'))).toEqual(['HHFA016']);
  });

  it('truncates after ranking', () => {
    expect(codesOf(searchCodes(snapshot, 'appendicectomie', { limit: 1 }))).toEqual(['HHFA016']);
  });

  it('counts compatible neighbours on each result', () => {
    const result = searchCodes(snapshot, 'appendicectomie');
    expect(result.results.map((r) => r.associationCount)).toEqual([6, 0]);
  });

  it('records the stage that answered', () => {
    const metrics = new CodingMetrics();
    searchCodes(snapshot, 'appendicectomie', { metrics });
    searchCodes(snapshot, 'appendicectomi', { metrics });

    expect(metrics.snapshot().searchStageHits).toEqual({
      conjunctive: 1,
      disjunctive: 0,
      substring: 1,
      none: 0,
    });
  });

  it('runs a custom strategy list', () => {
    const result = searchCodes(snapshot, 'appendicectomie', {}, [substringStrategy]);
    expect(result.stage).toBe('substring');
    expect(codesOf(result)).toEqual(['HHFA011', 'HHFA016']);
  });

  it('finds every code by its exact label', () => {
    for (const code of fixtureCodes) {
      const result = searchCodes(snapshot, code.label, { includeRetired: true });
      expect(codesOf(result)).toContain(code.code);
    }
  });
});

// ---------------------------------------------------------------------------
// Typo tolerance
// ---------------------------------------------------------------------------

describe('searchCodes with misspelled words', () => {
  it('finds a word with a missing letter', () => {
    const result = searchCodes(snapshot, 'apendicectomie');

    expect(result.stage).toBe('substring');
    expect(codesOf(result)).toEqual(['HHFA011', 'HHFA016']);
    expect(result.results[0]?.score).toBeCloseTo(14 / 17, 10);
    expect(result.results[0]?.matchedTokens).toEqual(['apendicectomie']);
  });

  it('finds a word with a substituted letter', () => {
    const result = searchCodes(snapshot, 'appendicectomy');

    expect(result.stage).toBe('substring');
    expect(codesOf(result)).toEqual(['HHFA011', 'HHFA016']);
    expect(result.results[0]?.score).toBeCloseTo(13 / 18, 10);
  });

  it('finds a word with an extra letter', () => {
    const result = searchCodes(snapshot, 'laparotommie');

    expect(codesOf(result)).toEqual(['HHFA011', 'HPPA002']);
    expect(result.results[0]?.score).toBeCloseTo(11 / 14, 10);
  });

  it('scores each code by its closest word', () => {
    const result = searchCodes(snapshot, 'anesthesia');

    expect(codesOf(result)).toEqual(['ZZLP025', 'ZZQP004']);
    expect(result.results[0]?.score).toBeCloseTo(9 / 13, 10);
    expect(result.results[1]?.score).toBeCloseTo(3 / 5, 10);
  });

  it('averages the best similarity of each token, ranking before identifier', () => {
    const result = searchCodes(snapshot, 'apendicectomie coelioscopie');

    expect(codesOf(result)).toEqual(['HHFA016', 'HHFA011']);
    expect(result.results[0]?.score).toBeCloseTo((14 / 17 + 1) / 2, 10);
    expect(result.results[0]?.matchedTokens).toEqual(['apendicectomie', 'coelioscopie']);
    expect(result.results[1]?.matchedTokens).toEqual(['apendicectomie']);
  });

  it('keeps retired codes out of typo matches', () => {
    const codes = fuzzyMatches(snapshot.catalog, ['apendicectomie'], false).map((h) => h.code);
    expect(codes).toEqual(['HHFA011', 'HHFA016']);

    const withRetired = fuzzyMatches(snapshot.catalog, ['apendicectomie'], true);
    expect(withRetired.map((h) => h.code)).toEqual(['HHFA011', 'HHFA016', 'HHFA999']);
  });

  it('prefers exact substrings over similar words', () => {
    expect(codesOf(searchCodes(snapshot, 'appendicectomi'))).toEqual(['HHFA011', 'HHFA016']);
    expect(searchCodes(snapshot, 'appendicectomi').results[0]?.score).toBe(1);
  });
});

// ---------------------------------------------------------------------------
// Strategies in isolation
// ---------------------------------------------------------------------------

describe('search strategies', () => {
  const { catalog } = snapshot;

  it('conjunctive returns nothing when a token has no posting', () => {
    expect(conjunctiveStrategy.run(catalog, ['appendicectomie', 'absent'], false)).toEqual([]);
  });

  it('disjunctive lists matched tokens in query order', () => {
    const hits = disjunctiveStrategy.run(catalog, ['absent', 'guidage'], false);
    expect(hits).toHaveLength(1);
    expect(hits[0]?.code).toBe('YYYY028');
    expect(hits[0]?.matchedTokens).toEqual(['guidage']);
  });

  it('substring includes retired codes when asked', () => {
    const hits = substringStrategy.run(catalog, ['ancien'], true);
    expect(hits.map((h) => h.code)).toEqual(['HHFA999']);
  });
});

describe('matchInOrder', () => {
  it('returns the index of the first token', () => {
    expect(matchInOrder('drainage d un abces', ['abc'])).toBe(14);
    expect(matchInOrder('drainage d un abces', ['drain', 'abc'])).toBe(0);
  });

  it('returns -1 when tokens appear out of order', () => {
    expect(matchInOrder('drainage d un abces', ['abc', 'drain'])).toBe(-1);
  });
});
