// ============================================================================
// Procedure Coding — Compatibility Graph
// Merges official associations, official incompatibilities and observed
// co-occurrences into one tiered, undirected relation over code pairs.
// ============================================================================

import {
  ASSOCIATION_TIER_TRUST,
  ASSOCIATION_TYPES,
  AssociationTier,
  PairStatus,
  type AssociationType,
} from '@codeplan/shared/constants/coding.constants.js';
import {
  compareCodeIdentifiers,
  normalizeCodeIdentifier,
} from '@codeplan/shared/utils/text-normalize.utils.js';

// ---------------------------------------------------------------------------
// Source record types (one per collaborator feed)
// ---------------------------------------------------------------------------

export interface OfficialAssociationRecord {
  code: string;
  associatedCode: string;
  associationType: AssociationType | null;
}

export interface IncompatibilityRecord {
  code: string;
  incompatibleCode: string;
}

export interface FrequencyAssociationRecord {
  code: string;
  associatedCode: string;
  supportCount: number;
}

export interface AssociationSources {
  official: readonly OfficialAssociationRecord[];
  incompatible: readonly IncompatibilityRecord[];
  frequency: readonly FrequencyAssociationRecord[];
}

// ---------------------------------------------------------------------------
// Merge output
// ---------------------------------------------------------------------------

export interface MergedAssociation {
  readonly codes: readonly [string, string];
  readonly tier: AssociationTier;
  /** Corroborating observations; null for official-only pairs. */
  readonly supportCount: number | null;
  readonly associationTypes: readonly AssociationType[];
}

export interface MergeStats {
  verified: number;
  official: number;
  sameRegion: number;
  crossRegion: number;
  incompatible: number;
  selfReferences: number;
  scrubbedByIncompatibility: number;
}

export interface MergeResult {
  readonly associations: readonly MergedAssociation[];
  readonly incompatibilities: readonly (readonly [string, string])[];
  readonly stats: MergeStats;
}

/** Chapter (region) tag of a code, or null/undefined when unknown. */
export type RegionLookup = (code: string) => string | null | undefined;

export interface Neighbor {
  code: string;
  tier: AssociationTier;
  supportCount: number | null;
  associationTypes: readonly AssociationType[];
}

// ---------------------------------------------------------------------------
// Pair helpers
// ---------------------------------------------------------------------------

const PAIR_SEPARATOR = '|';

function canonicalPair(a: string, b: string): [string, string] {
  const left = normalizeCodeIdentifier(a);
  const right = normalizeCodeIdentifier(b);
  return left <= right ? [left, right] : [right, left];
}

export function pairKey(a: string, b: string): string {
  return canonicalPair(a, b).join(PAIR_SEPARATOR);
}

export function compareTierTrust(a: AssociationTier, b: AssociationTier): number {
  return ASSOCIATION_TIER_TRUST[b] - ASSOCIATION_TIER_TRUST[a];
}

function frequencyTier(
  [left, right]: readonly [string, string],
  regionOf: RegionLookup,
): AssociationTier {
  const leftRegion = regionOf(left);
  const rightRegion = regionOf(right);
  if (leftRegion && rightRegion && leftRegion === rightRegion) {
    return AssociationTier.SAME_REGION;
  }
  return AssociationTier.CROSS_REGION;
}

// ---------------------------------------------------------------------------
// Tier merge
// ---------------------------------------------------------------------------

/**
 * Resolve every recorded pair to exactly one status. Runs once per data
 * version, never at query time.
 *
 * - official + frequency → verified
 * - official only        → official
 * - frequency only       → same_region when both codes carry the same
 *                          chapter tag, cross_region otherwise (including
 *                          codes missing from the catalog)
 * - incompatible         → removed from every tier above
 *
 * Self-pairs are dropped. A pair observed in both directions keeps the
 * larger support count.
 */
export function mergeAssociationTiers(
  sources: AssociationSources,
  regionOf: RegionLookup,
): MergeResult {
  const stats: MergeStats = {
    verified: 0,
    official: 0,
    sameRegion: 0,
    crossRegion: 0,
    incompatible: 0,
    selfReferences: 0,
    scrubbedByIncompatibility: 0,
  };

  const official = new Map<string, { pair: [string, string]; types: Set<AssociationType> }>();
  for (const record of sources.official) {
    const pair = canonicalPair(record.code, record.associatedCode);
    if (pair[0] === pair[1]) {
      stats.selfReferences += 1;
      continue;
    }
    const key = pair.join(PAIR_SEPARATOR);
    const entry = official.get(key) ?? { pair, types: new Set<AssociationType>() };
    if (record.associationType) {
      entry.types.add(record.associationType);
    }
    official.set(key, entry);
  }

  const frequency = new Map<string, { pair: [string, string]; supportCount: number }>();
  for (const record of sources.frequency) {
    const pair = canonicalPair(record.code, record.associatedCode);
    if (pair[0] === pair[1]) {
      stats.selfReferences += 1;
      continue;
    }
    const key = pair.join(PAIR_SEPARATOR);
    const existing = frequency.get(key);
    frequency.set(key, {
      pair,
      supportCount: Math.max(existing?.supportCount ?? 0, record.supportCount),
    });
  }

  const incompatible = new Map<string, [string, string]>();
  for (const record of sources.incompatible) {
    const pair = canonicalPair(record.code, record.incompatibleCode);
    if (pair[0] === pair[1]) {
      stats.selfReferences += 1;
      continue;
    }
    incompatible.set(pair.join(PAIR_SEPARATOR), pair);
  }

  const merged = new Map<string, MergedAssociation>();

  for (const [key, { pair, types }] of official) {
    const observed = frequency.get(key);
    const associationTypes = ASSOCIATION_TYPES.filter((t) => types.has(t));
    merged.set(key, {
      codes: pair,
      tier: observed ? AssociationTier.VERIFIED : AssociationTier.OFFICIAL,
      supportCount: observed ? observed.supportCount : null,
      associationTypes,
    });
  }

  for (const [key, { pair, supportCount }] of frequency) {
    if (merged.has(key)) continue;
    merged.set(key, {
      codes: pair,
      tier: frequencyTier(pair, regionOf),
      supportCount,
      associationTypes: [],
    });
  }

  // Incompatibility always wins.
  for (const key of incompatible.keys()) {
    if (merged.delete(key)) {
      stats.scrubbedByIncompatibility += 1;
    }
  }
  stats.incompatible = incompatible.size;

  const associations = [...merged.keys()]
    .sort(compareCodeIdentifiers)
    .map((key) => merged.get(key))
    .filter((a): a is MergedAssociation => a !== undefined);

  for (const association of associations) {
    switch (association.tier) {
      case AssociationTier.VERIFIED:
        stats.verified += 1;
        break;
      case AssociationTier.OFFICIAL:
        stats.official += 1;
        break;
      case AssociationTier.SAME_REGION:
        stats.sameRegion += 1;
        break;
      case AssociationTier.CROSS_REGION:
        stats.crossRegion += 1;
        break;
    }
  }

  const incompatibilities = [...incompatible.keys()]
    .sort(compareCodeIdentifiers)
    .map((key) => incompatible.get(key))
    .filter((p): p is [string, string] => p !== undefined);

  return { associations, incompatibilities, stats };
}

// ---------------------------------------------------------------------------
// Graph
// ---------------------------------------------------------------------------

/**
 * Read-only view over a merge result. Built once per data version and
 * shared by every concurrent query.
 */
export class CompatibilityGraph {
  private readonly adjacency = new Map<string, Map<string, MergedAssociation>>();
  private readonly exclusions = new Map<string, Set<string>>();

  constructor(
    readonly version: string,
    private readonly merge: MergeResult,
  ) {
    for (const association of merge.associations) {
      const [a, b] = association.codes;
      this.link(a, b, association);
      this.link(b, a, association);
    }
    for (const [a, b] of merge.incompatibilities) {
      this.exclude(a, b);
      this.exclude(b, a);
    }
  }

  private link(from: string, to: string, association: MergedAssociation): void {
    const edges = this.adjacency.get(from) ?? new Map<string, MergedAssociation>();
    edges.set(to, association);
    this.adjacency.set(from, edges);
  }

  private exclude(from: string, to: string): void {
    const set = this.exclusions.get(from) ?? new Set<string>();
    set.add(to);
    this.exclusions.set(from, set);
  }

  /**
   * Status of an unordered pair. Incompatibility takes precedence;
   * unrecorded pairs (and a code paired with itself) are `unknown`.
   */
  tierOf(codeA: string, codeB: string): PairStatus {
    const a = normalizeCodeIdentifier(codeA);
    const b = normalizeCodeIdentifier(codeB);
    if (a === b) {
      return PairStatus.UNKNOWN;
    }
    if (this.exclusions.get(a)?.has(b)) {
      return PairStatus.INCOMPATIBLE;
    }
    return this.adjacency.get(a)?.get(b)?.tier ?? PairStatus.UNKNOWN;
  }

  isIncompatible(codeA: string, codeB: string): boolean {
    return this.tierOf(codeA, codeB) === PairStatus.INCOMPATIBLE;
  }

  /**
   * Codes associated with `code` at `minTier` or a more trusted tier,
   * ordered by tier trust then identifier.
   */
  neighbors(
    code: string,
    minTier: AssociationTier = AssociationTier.CROSS_REGION,
  ): Neighbor[] {
    const edges = this.adjacency.get(normalizeCodeIdentifier(code));
    if (!edges) {
      return [];
    }

    const threshold = ASSOCIATION_TIER_TRUST[minTier];
    const result: Neighbor[] = [];
    for (const [other, association] of edges) {
      if (ASSOCIATION_TIER_TRUST[association.tier] < threshold) continue;
      result.push({
        code: other,
        tier: association.tier,
        supportCount: association.supportCount,
        associationTypes: association.associationTypes,
      });
    }

    return result.sort(
      (x, y) => compareTierTrust(x.tier, y.tier) || compareCodeIdentifiers(x.code, y.code),
    );
  }

  incompatibleWith(code: string): string[] {
    const set = this.exclusions.get(normalizeCodeIdentifier(code));
    return set ? [...set].sort(compareCodeIdentifiers) : [];
  }

  stats(): MergeStats {
    return { ...this.merge.stats };
  }
}

/**
 * Merge the three sources and wrap the result in a graph tagged with the
 * data version it was built for.
 */
export function buildCompatibilityGraph(
  version: string,
  sources: AssociationSources,
  regionOf: RegionLookup,
): CompatibilityGraph {
  return new CompatibilityGraph(version, mergeAssociationTiers(sources, regionOf));
}
