// ============================================================================
// Procedure Coding — Counters
// The only state mutated at query time. Exported through /coding/stats.
// ============================================================================

import { type SearchStage } from '@codeplan/shared/constants/coding.constants.js';

export type SearchStageHits = Record<SearchStage | 'none', number>;

export interface CodingMetricsSnapshot {
  staleReferenceSkips: number;
  searchStageHits: SearchStageHits;
  emptyQueries: number;
  plansBuilt: number;
  invalidPrincipals: number;
  snapshotReloads: number;
}

export class CodingMetrics {
  private staleReferenceSkips = 0;
  private emptyQueries = 0;
  private plansBuilt = 0;
  private invalidPrincipals = 0;
  private snapshotReloads = 0;
  private readonly searchStageHits: SearchStageHits = {
    conjunctive: 0,
    disjunctive: 0,
    substring: 0,
    none: 0,
  };

  recordStaleReferences(count: number): void {
    this.staleReferenceSkips += count;
  }

  recordSearch(stage: SearchStage | null): void {
    this.searchStageHits[stage ?? 'none'] += 1;
  }

  recordEmptyQuery(): void {
    this.emptyQueries += 1;
  }

  recordPlanBuilt(): void {
    this.plansBuilt += 1;
  }

  recordInvalidPrincipal(): void {
    this.invalidPrincipals += 1;
  }

  recordSnapshotReload(): void {
    this.snapshotReloads += 1;
  }

  snapshot(): CodingMetricsSnapshot {
    return {
      staleReferenceSkips: this.staleReferenceSkips,
      searchStageHits: { ...this.searchStageHits },
      emptyQueries: this.emptyQueries,
      plansBuilt: this.plansBuilt,
      invalidPrincipals: this.invalidPrincipals,
      snapshotReloads: this.snapshotReloads,
    };
  }
}
