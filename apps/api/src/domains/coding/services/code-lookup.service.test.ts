import { describe, it, expect } from 'vitest';
import { getCodeDetail, getCodingStats, listAssociations } from './code-lookup.service.js';
import { CodingMetrics } from './metrics.service.js';
import { searchCodes } from './search.service.js';
import { NotFoundError } from '../../../lib/errors.js';
import {
  makeFixtureSnapshot,
  FIXTURE_VERSION,
} from '../../../../test/fixtures/coding.fixtures.js';

const snapshot = makeFixtureSnapshot();

describe('getCodeDetail', () => {
  it('returns attributes, tier counts and incompatibilities', () => {
    const detail = getCodeDetail(snapshot, 'hhfa016');

    expect(detail.code).toBe('HHFA016');
    expect(detail.dataVersion).toBe(FIXTURE_VERSION);
    expect(detail.chapter).toBe('07');
    expect(detail.associationCounts).toEqual({
      verified: 1,
      official: 1,
      same_region: 2,
      cross_region: 2,
    });
    expect(detail.incompatibleWith).toEqual(['HHFA011']);
  });

  it('returns retired codes', () => {
    const detail = getCodeDetail(snapshot, 'HHFA999');
    expect(detail.status).toBe('retired');
    expect(detail.effectiveTo).toBe('2023-12-31');
  });

  it('throws NotFoundError for unknown codes', () => {
    expect(() => getCodeDetail(snapshot, 'ZZZZ999')).toThrow(NotFoundError);
  });
});

describe('listAssociations', () => {
  it('enriches neighbours with catalog attributes', () => {
    const listing = listAssociations(snapshot, 'ZZLP025');

    expect(listing).toEqual({
      dataVersion: FIXTURE_VERSION,
      code: 'ZZLP025',
      minTier: 'cross_region',
      associations: [
        {
          code: 'HHFA016',
          tier: 'verified',
          supportCount: 40,
          associationTypes: ['complementary_anesthesia'],
          label: 'Appendicectomie par coelioscopie',
          workValue: 150.5,
          status: 'active',
        },
        {
          code: 'ZZQP004',
          tier: 'same_region',
          supportCount: 9,
          associationTypes: [],
          label: 'Surveillance post-anesthésique',
          workValue: 12,
          status: 'active',
        },
        {
          code: 'ZZZZ998',
          tier: 'cross_region',
          supportCount: 1,
          associationTypes: [],
          label: null,
          workValue: null,
          status: null,
        },
      ],
    });
  });

  it('filters by minimum tier', () => {
    const listing = listAssociations(snapshot, 'HHFA016', 'official');
    expect(listing.associations.map((a) => a.code)).toEqual(['ZZLP025', 'YYYY028']);
  });

  it('throws NotFoundError for unknown codes', () => {
    expect(() => listAssociations(snapshot, 'ZZZZ998')).toThrow('Code ZZZZ998 not found');
  });
});

describe('getCodingStats', () => {
  it('summarises the snapshot and the counters', () => {
    const metrics = new CodingMetrics();
    searchCodes(snapshot, 'appendicectomie', { metrics });

    expect(getCodingStats(snapshot, metrics)).toEqual({
      dataVersion: FIXTURE_VERSION,
      versionLabel: 'v2024-01',
      loadedAt: '2026-01-15T08:00:00.000Z',
      codes: { total: 8, active: 7, retired: 1 },
      associations: { verified: 1, official: 1, same_region: 3, cross_region: 3 },
      incompatibilities: 2,
      mergeStats: {
        verified: 1,
        official: 1,
        sameRegion: 3,
        crossRegion: 3,
        incompatible: 2,
        selfReferences: 1,
        scrubbedByIncompatibility: 1,
      },
      counters: {
        staleReferenceSkips: 0,
        searchStageHits: { conjunctive: 1, disjunctive: 0, substring: 0, none: 0 },
        emptyQueries: 0,
        plansBuilt: 0,
        invalidPrincipals: 0,
        snapshotReloads: 0,
      },
    });
  });
});
