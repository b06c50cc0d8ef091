// ============================================================================
// Procedure Coding — Plan Assembler
// Principal code → ordered, pairwise-compatible billing plan with a reason
// for every inclusion and every rejection.
// ============================================================================

import {
  ASSOCIATION_TIER_TRUST,
  AssociationTier,
  CompatibilityIssueType,
  INCLUSION_SOURCE_FOR_TIER,
  InclusionSource,
  InvalidPrincipalReason,
  PairStatus,
  RejectionReason,
  UnknownPairPolicy,
  DEFAULT_MAX_UNKNOWN_SUGGESTIONS,
  type AssociationType,
  type PlanEntryTier,
} from '@codeplan/shared/constants/coding.constants.js';
import type {
  BillingPlan,
  InclusionReason,
  PlanEntry,
  PlanRejection,
  PlanSuggestion,
} from '@codeplan/shared/schemas/coding.schema.js';
import { roundWorkValue } from '@codeplan/shared/utils/plan.utils.js';
import {
  compareCodeIdentifiers,
  normalizeCodeIdentifier,
} from '@codeplan/shared/utils/text-normalize.utils.js';
import { InvalidPrincipalError } from '../../../lib/errors.js';
import { getCode, isActive, type CatalogCode } from './catalog.service.js';
import type { CodingMetrics } from './metrics.service.js';
import type { CodingSnapshot } from './snapshot.service.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PlanOptions {
  /** Codes the user never wants in the plan. */
  excluded?: readonly string[];
  /** Codes the user wants despite having no recorded association. */
  forced?: readonly string[];
  unknownPairPolicy?: UnknownPairPolicy;
  maxSuggestions?: number;
  metrics?: CodingMetrics;
}

export interface CompatibilityIssue {
  type: CompatibilityIssueType;
  codes: string[];
  tier?: AssociationTier;
  message: string;
}

export interface CompatibilityReport {
  dataVersion: string;
  codes: string[];
  ok: boolean;
  issues: CompatibilityIssue[];
}

interface Candidate {
  code: CatalogCode;
  tier: PlanEntryTier;
  reason: InclusionReason;
}

// ---------------------------------------------------------------------------
// Inclusion reasons
// ---------------------------------------------------------------------------

function describeTypes(types: readonly AssociationType[]): string {
  return types.map((t) => t.replace(/_/g, ' ')).join(' and ');
}

function inclusionReason(
  tier: AssociationTier,
  principal: string,
  supportCount: number | null,
  associationTypes: readonly AssociationType[],
): InclusionReason {
  const official = associationTypes.length > 0
    ? `Official ${describeTypes(associationTypes)} association with ${principal}`
    : `Official association with ${principal}`;
  const observations = supportCount ?? 0;

  let message: string;
  switch (tier) {
    case AssociationTier.VERIFIED:
      message = `${official}, corroborated by ${observations} observations`;
      break;
    case AssociationTier.OFFICIAL:
      message = official;
      break;
    case AssociationTier.SAME_REGION:
      message = `Observed with ${principal} in ${observations} billed stays; same chapter`;
      break;
    case AssociationTier.CROSS_REGION:
      message = `Observed with ${principal} in ${observations} billed stays; different chapter`;
      break;
  }

  return {
    source: INCLUSION_SOURCE_FOR_TIER[tier],
    associationTypes: [...associationTypes],
    supportCount,
    message,
  };
}

function forcedReason(principal: string): InclusionReason {
  return {
    source: InclusionSource.USER_FORCED,
    associationTypes: [],
    supportCount: null,
    message: `Added by user override; no recorded association with ${principal}`,
  };
}

// ---------------------------------------------------------------------------
// Ordering
// ---------------------------------------------------------------------------

function trustOf(tier: PlanEntryTier): number {
  return tier === PairStatus.UNKNOWN ? 0 : ASSOCIATION_TIER_TRUST[tier];
}

function compareCandidates(a: Candidate, b: Candidate): number {
  return (
    trustOf(b.tier) - trustOf(a.tier) ||
    b.code.workValue - a.code.workValue ||
    compareCodeIdentifiers(a.code.code, b.code.code)
  );
}

function uniqueIdentifiers(codes: readonly string[] | undefined): string[] {
  return [...new Set((codes ?? []).map(normalizeCodeIdentifier))];
}

// ---------------------------------------------------------------------------
// Build plan
// ---------------------------------------------------------------------------

/**
 * Assemble the billing plan rooted at `principalCode`.
 *
 * Candidates are ranked by tier trust (forced unknown-tier codes last),
 * then work value, then identifier, and accepted greedily. Each candidate
 * is checked against the principal and every entry accepted before it, so
 * the plan never holds an incompatible pair.
 *
 * Throws InvalidPrincipalError when the principal is absent or retired.
 */
export function buildPlan(
  snapshot: CodingSnapshot,
  principalCode: string,
  options: PlanOptions = {},
): BillingPlan {
  const { catalog, graph } = snapshot;
  const principalId = normalizeCodeIdentifier(principalCode);
  const principal = getCode(catalog, principalId);

  if (!principal) {
    options.metrics?.recordInvalidPrincipal();
    throw new InvalidPrincipalError(principalId, InvalidPrincipalReason.NOT_FOUND);
  }
  if (!isActive(principal)) {
    options.metrics?.recordInvalidPrincipal();
    throw new InvalidPrincipalError(principalId, InvalidPrincipalReason.RETIRED);
  }

  const excluded = new Set(uniqueIdentifiers(options.excluded));
  const forced = uniqueIdentifiers(options.forced).filter((c) => c !== principal.code);

  const candidates: Candidate[] = [];
  const rejected: PlanRejection[] = [];
  const considered = new Set<string>([principal.code]);
  let staleReferences = 0;

  const reject = (code: string, reason: RejectionReason, conflictsWith: string[] = []) => {
    rejected.push({ code, reason, conflictsWith });
  };

  // --- Associated codes ---
  for (const neighbor of graph.neighbors(principal.code, AssociationTier.CROSS_REGION)) {
    considered.add(neighbor.code);
    const code = getCode(catalog, neighbor.code);
    if (!code) {
      staleReferences += 1;
      continue;
    }
    if (excluded.has(code.code)) {
      reject(code.code, RejectionReason.EXCLUDED_BY_USER);
      continue;
    }
    if (!isActive(code)) {
      reject(code.code, RejectionReason.RETIRED);
      continue;
    }
    candidates.push({
      code,
      tier: neighbor.tier,
      reason: inclusionReason(
        neighbor.tier,
        principal.code,
        neighbor.supportCount,
        neighbor.associationTypes,
      ),
    });
  }

  // --- User overrides ---
  for (const forcedCode of forced) {
    if (considered.has(forcedCode)) continue;
    considered.add(forcedCode);

    if (excluded.has(forcedCode)) {
      reject(forcedCode, RejectionReason.EXCLUDED_BY_USER);
      continue;
    }
    const code = getCode(catalog, forcedCode);
    if (!code) {
      reject(forcedCode, RejectionReason.UNKNOWN_CODE);
      continue;
    }
    if (!isActive(code)) {
      reject(code.code, RejectionReason.RETIRED);
      continue;
    }
    if (graph.isIncompatible(principal.code, code.code)) {
      reject(code.code, RejectionReason.INCOMPATIBLE, [principal.code]);
      continue;
    }
    candidates.push({
      code,
      tier: PairStatus.UNKNOWN,
      reason: forcedReason(principal.code),
    });
  }

  // --- Greedy acceptance ---
  candidates.sort(compareCandidates);

  const entries: PlanEntry[] = [];
  const planCodes: string[] = [principal.code];

  for (const candidate of candidates) {
    const conflicts = planCodes.filter((c) => graph.isIncompatible(c, candidate.code.code));
    if (conflicts.length > 0) {
      reject(candidate.code.code, RejectionReason.INCOMPATIBLE, conflicts);
      continue;
    }
    planCodes.push(candidate.code.code);
    entries.push({
      code: candidate.code.code,
      label: candidate.code.label,
      workValue: candidate.code.workValue,
      tier: candidate.tier,
      enabled: true,
      reason: candidate.reason,
    });
  }

  // --- Second-degree suggestions ---
  let suggestions: PlanSuggestion[] = [];
  if (options.unknownPairPolicy === UnknownPairPolicy.SUGGEST) {
    const found = collectSuggestions(snapshot, principal.code, entries, planCodes, excluded);
    staleReferences += found.staleReferences;
    suggestions = found.suggestions.slice(
      0,
      options.maxSuggestions ?? DEFAULT_MAX_UNKNOWN_SUGGESTIONS,
    );
  }

  if (staleReferences > 0) {
    options.metrics?.recordStaleReferences(staleReferences);
  }
  options.metrics?.recordPlanBuilt();

  const secondaries = entries.reduce((sum, entry) => sum + entry.workValue, 0);

  return {
    dataVersion: snapshot.version,
    principal: {
      code: principal.code,
      label: principal.label,
      workValue: principal.workValue,
    },
    entries,
    rejected,
    suggestions,
    totalWorkValue: roundWorkValue(principal.workValue + secondaries),
    skippedStaleReferences: staleReferences,
  };
}

/**
 * Codes associated with an accepted entry but with no recorded relation to
 * the principal. Listed beside the plan, never added to it.
 */
function collectSuggestions(
  snapshot: CodingSnapshot,
  principal: string,
  entries: readonly PlanEntry[],
  planCodes: readonly string[],
  excluded: ReadonlySet<string>,
): { suggestions: PlanSuggestion[]; staleReferences: number } {
  const { catalog, graph } = snapshot;
  const visited = new Set<string>(planCodes);
  const suggestions: PlanSuggestion[] = [];
  let staleReferences = 0;

  for (const entry of entries) {
    for (const neighbor of graph.neighbors(entry.code, AssociationTier.CROSS_REGION)) {
      if (visited.has(neighbor.code)) continue;
      if (graph.tierOf(principal, neighbor.code) !== PairStatus.UNKNOWN) continue;
      visited.add(neighbor.code);

      const code = getCode(catalog, neighbor.code);
      if (!code) {
        staleReferences += 1;
        continue;
      }
      if (excluded.has(code.code) || !isActive(code)) continue;
      if (planCodes.some((c) => graph.isIncompatible(c, code.code))) continue;

      suggestions.push({
        code: code.code,
        label: code.label,
        workValue: code.workValue,
        via: entry.code,
        viaTier: neighbor.tier,
      });
    }
  }

  suggestions.sort(
    (a, b) => b.workValue - a.workValue || compareCodeIdentifiers(a.code, b.code),
  );
  return { suggestions, staleReferences };
}

// ---------------------------------------------------------------------------
// Compatibility check
// ---------------------------------------------------------------------------

/**
 * Report on an arbitrary set of codes: unknown and retired codes, and the
 * status of every pair among the known ones. `ok` is false when any code is
 * unknown or retired, or any pair is incompatible.
 */
export function checkCompatibility(
  snapshot: CodingSnapshot,
  codes: readonly string[],
): CompatibilityReport {
  const { catalog, graph } = snapshot;
  const identifiers = uniqueIdentifiers(codes);
  const issues: CompatibilityIssue[] = [];
  const known: string[] = [];
  let ok = true;

  for (const identifier of identifiers) {
    const code = getCode(catalog, identifier);
    if (!code) {
      ok = false;
      issues.push({
        type: CompatibilityIssueType.UNKNOWN_CODE,
        codes: [identifier],
        message: `Code ${identifier} is not in the catalog`,
      });
      continue;
    }
    if (!isActive(code)) {
      ok = false;
      issues.push({
        type: CompatibilityIssueType.RETIRED_CODE,
        codes: [identifier],
        message: `Code ${identifier} is retired`,
      });
    }
    known.push(identifier);
  }

  for (let i = 0; i < known.length; i++) {
    for (let j = i + 1; j < known.length; j++) {
      const a = known[i];
      const b = known[j];
      if (a === undefined || b === undefined) continue;

      const status = graph.tierOf(a, b);
      if (status === PairStatus.INCOMPATIBLE) {
        ok = false;
        issues.push({
          type: CompatibilityIssueType.INCOMPATIBLE,
          codes: [a, b],
          message: `${a} and ${b} cannot be billed together`,
        });
      } else if (status === PairStatus.UNKNOWN) {
        issues.push({
          type: CompatibilityIssueType.UNRELATED,
          codes: [a, b],
          message: `No recorded association between ${a} and ${b}`,
        });
      } else {
        issues.push({
          type: CompatibilityIssueType.ASSOCIATED,
          codes: [a, b],
          tier: status,
          message: `${a} and ${b} have a ${status} association`,
        });
      }
    }
  }

  return { dataVersion: snapshot.version, codes: identifiers, ok, issues };
}
