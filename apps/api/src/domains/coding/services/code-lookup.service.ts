// ============================================================================
// Procedure Coding — Code Lookup
// Detail, association listing and stats over the live snapshot.
// ============================================================================

import {
  AssociationTier,
  type AssociationType,
  type CodeStatus,
} from '@codeplan/shared/constants/coding.constants.js';
import { NotFoundError } from '../../../lib/errors.js';
import { countByStatus, getCode, type CatalogCode } from './catalog.service.js';
import type { MergeStats } from './compatibility-graph.service.js';
import type { CodingMetrics, CodingMetricsSnapshot } from './metrics.service.js';
import type { CodingSnapshot } from './snapshot.service.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type TierCounts = Record<AssociationTier, number>;

export interface CodeDetail extends CatalogCode {
  dataVersion: string;
  associationCounts: TierCounts;
  incompatibleWith: string[];
}

export interface AssociationListItem {
  code: string;
  tier: AssociationTier;
  supportCount: number | null;
  associationTypes: AssociationType[];
  /** Null when the associated code is missing from the catalog. */
  label: string | null;
  workValue: number | null;
  status: CodeStatus | null;
}

export interface AssociationListing {
  dataVersion: string;
  code: string;
  minTier: AssociationTier;
  associations: AssociationListItem[];
}

export interface CodingStats {
  dataVersion: string;
  versionLabel: string;
  loadedAt: string;
  codes: { total: number } & Record<CodeStatus, number>;
  associations: TierCounts;
  incompatibilities: number;
  mergeStats: MergeStats;
  counters: CodingMetricsSnapshot;
}

function emptyTierCounts(): TierCounts {
  return { verified: 0, official: 0, same_region: 0, cross_region: 0 };
}

// ---------------------------------------------------------------------------
// Operations
// ---------------------------------------------------------------------------

/** Attributes of one code, retired codes included. */
export function getCodeDetail(snapshot: CodingSnapshot, code: string): CodeDetail {
  const entry = getCode(snapshot.catalog, code);
  if (!entry) {
    throw new NotFoundError(`Code ${code}`);
  }

  const associationCounts = emptyTierCounts();
  for (const neighbor of snapshot.graph.neighbors(entry.code)) {
    associationCounts[neighbor.tier] += 1;
  }

  return {
    ...entry,
    dataVersion: snapshot.version,
    associationCounts,
    incompatibleWith: snapshot.graph.incompatibleWith(entry.code),
  };
}

export function listAssociations(
  snapshot: CodingSnapshot,
  code: string,
  minTier: AssociationTier = AssociationTier.CROSS_REGION,
): AssociationListing {
  const entry = getCode(snapshot.catalog, code);
  if (!entry) {
    throw new NotFoundError(`Code ${code}`);
  }

  const associations = snapshot.graph.neighbors(entry.code, minTier).map((neighbor) => {
    const other = getCode(snapshot.catalog, neighbor.code);
    return {
      code: neighbor.code,
      tier: neighbor.tier,
      supportCount: neighbor.supportCount,
      associationTypes: [...neighbor.associationTypes],
      label: other?.label ?? null,
      workValue: other?.workValue ?? null,
      status: other?.status ?? null,
    };
  });

  return { dataVersion: snapshot.version, code: entry.code, minTier, associations };
}

export function getCodingStats(
  snapshot: CodingSnapshot,
  metrics: CodingMetrics,
): CodingStats {
  const byStatus = countByStatus(snapshot.catalog);
  const { mergeStats } = snapshot;

  const associations: TierCounts = {
    verified: mergeStats.verified,
    official: mergeStats.official,
    same_region: mergeStats.sameRegion,
    cross_region: mergeStats.crossRegion,
  };

  return {
    dataVersion: snapshot.version,
    versionLabel: snapshot.versionLabel,
    loadedAt: snapshot.loadedAt.toISOString(),
    codes: { total: snapshot.catalog.identifiers.length, ...byStatus },
    associations,
    incompatibilities: mergeStats.incompatible,
    mergeStats,
    counters: metrics.snapshot(),
  };
}
