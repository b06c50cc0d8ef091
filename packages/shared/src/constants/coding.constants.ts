// ============================================================================
// Procedure Coding — Constants
// ============================================================================

// --- Code Status ---

export const CodeStatus = {
  ACTIVE: 'active',
  RETIRED: 'retired',
} as const;

export type CodeStatus = (typeof CodeStatus)[keyof typeof CodeStatus];

export const CODE_STATUSES = [CodeStatus.ACTIVE, CodeStatus.RETIRED] as const;

// --- Association Tiers ---
// Listed in descending trust order.

export const AssociationTier = {
  VERIFIED: 'verified',
  OFFICIAL: 'official',
  SAME_REGION: 'same_region',
  CROSS_REGION: 'cross_region',
} as const;

export type AssociationTier =
  (typeof AssociationTier)[keyof typeof AssociationTier];

export const ASSOCIATION_TIERS = [
  AssociationTier.VERIFIED,
  AssociationTier.OFFICIAL,
  AssociationTier.SAME_REGION,
  AssociationTier.CROSS_REGION,
] as const;

export const ASSOCIATION_TIER_TRUST: Readonly<Record<AssociationTier, number>> = {
  verified: 4,
  official: 3,
  same_region: 2,
  cross_region: 1,
};

// --- Pair Status ---
// Result of looking up an unordered code pair in the compatibility graph.

export const PairStatus = {
  ...AssociationTier,
  INCOMPATIBLE: 'incompatible',
  UNKNOWN: 'unknown',
} as const;

export type PairStatus = (typeof PairStatus)[keyof typeof PairStatus];

/** Tiers a plan entry can carry: forced codes have no recorded association. */
export const PLAN_ENTRY_TIERS = [...ASSOCIATION_TIERS, PairStatus.UNKNOWN] as const;

export type PlanEntryTier = (typeof PLAN_ENTRY_TIERS)[number];

// --- Official Association Types ---

export const AssociationType = {
  COMPLEMENTARY_GESTURE: 'complementary_gesture',
  COMPLEMENTARY_ANESTHESIA: 'complementary_anesthesia',
} as const;

export type AssociationType =
  (typeof AssociationType)[keyof typeof AssociationType];

export const ASSOCIATION_TYPES = [
  AssociationType.COMPLEMENTARY_GESTURE,
  AssociationType.COMPLEMENTARY_ANESTHESIA,
] as const;

// --- Search ---

export const SearchStage = {
  CONJUNCTIVE: 'conjunctive',
  DISJUNCTIVE: 'disjunctive',
  SUBSTRING: 'substring',
} as const;

export type SearchStage = (typeof SearchStage)[keyof typeof SearchStage];

export const SEARCH_STAGES = [
  SearchStage.CONJUNCTIVE,
  SearchStage.DISJUNCTIVE,
  SearchStage.SUBSTRING,
] as const;

export const SearchEmptyReason = {
  EMPTY_QUERY: 'EMPTY_QUERY',
  NO_MATCH: 'NO_MATCH',
} as const;

export type SearchEmptyReason =
  (typeof SearchEmptyReason)[keyof typeof SearchEmptyReason];

export const SEARCH_DEFAULT_LIMIT = 15;
export const SEARCH_MAX_LIMIT = 50;
export const SEARCH_MAX_QUERY_LENGTH = 200;

/** Tokens shorter than this are dropped from multi-token queries ("de", "la"). */
export const MIN_QUERY_TOKEN_LENGTH = 3;

/**
 * Mean best-word trigram similarity a code needs to match when no query
 * token is contained in its text (pg_trgm's default threshold).
 */
export const FUZZY_MIN_SIMILARITY = 0.3;

// --- Plan Assembly ---

export const InclusionSource = {
  OFFICIAL_AND_OBSERVED: 'official_and_observed',
  OFFICIAL: 'official',
  OBSERVED_SAME_REGION: 'observed_same_region',
  OBSERVED_CROSS_REGION: 'observed_cross_region',
  USER_FORCED: 'user_forced',
} as const;

export type InclusionSource =
  (typeof InclusionSource)[keyof typeof InclusionSource];

export const INCLUSION_SOURCES = [
  InclusionSource.OFFICIAL_AND_OBSERVED,
  InclusionSource.OFFICIAL,
  InclusionSource.OBSERVED_SAME_REGION,
  InclusionSource.OBSERVED_CROSS_REGION,
  InclusionSource.USER_FORCED,
] as const;

export const INCLUSION_SOURCE_FOR_TIER: Readonly<Record<AssociationTier, InclusionSource>> = {
  verified: InclusionSource.OFFICIAL_AND_OBSERVED,
  official: InclusionSource.OFFICIAL,
  same_region: InclusionSource.OBSERVED_SAME_REGION,
  cross_region: InclusionSource.OBSERVED_CROSS_REGION,
};

export const RejectionReason = {
  INCOMPATIBLE: 'INCOMPATIBLE',
  RETIRED: 'RETIRED',
  UNKNOWN_CODE: 'UNKNOWN_CODE',
  EXCLUDED_BY_USER: 'EXCLUDED_BY_USER',
} as const;

export type RejectionReason =
  (typeof RejectionReason)[keyof typeof RejectionReason];

export const REJECTION_REASONS = [
  RejectionReason.INCOMPATIBLE,
  RejectionReason.RETIRED,
  RejectionReason.UNKNOWN_CODE,
  RejectionReason.EXCLUDED_BY_USER,
] as const;

export const InvalidPrincipalReason = {
  NOT_FOUND: 'NOT_FOUND',
  RETIRED: 'RETIRED',
} as const;

export type InvalidPrincipalReason =
  (typeof InvalidPrincipalReason)[keyof typeof InvalidPrincipalReason];

/**
 * What to do with code pairs that have no record in any source.
 * `hidden` never shows them; `suggest` lists second-degree candidates
 * beside the plan without adding them.
 */
export const UnknownPairPolicy = {
  HIDDEN: 'hidden',
  SUGGEST: 'suggest',
} as const;

export type UnknownPairPolicy =
  (typeof UnknownPairPolicy)[keyof typeof UnknownPairPolicy];

export const UNKNOWN_PAIR_POLICIES = [
  UnknownPairPolicy.HIDDEN,
  UnknownPairPolicy.SUGGEST,
] as const;

export const DEFAULT_MAX_UNKNOWN_SUGGESTIONS = 10;

// --- Compatibility Check ---

export const CompatibilityIssueType = {
  UNKNOWN_CODE: 'unknown_code',
  RETIRED_CODE: 'retired_code',
  INCOMPATIBLE: 'incompatible',
  ASSOCIATED: 'associated',
  UNRELATED: 'unrelated',
} as const;

export type CompatibilityIssueType =
  (typeof CompatibilityIssueType)[keyof typeof CompatibilityIssueType];

export const MIN_CHECK_CODES = 2;
export const MAX_CHECK_CODES = 20;

// --- Code Identifiers ---

/** Four letters and three digits, e.g. HHFA016. */
export const CODE_IDENTIFIER_PATTERN = /^[A-Z]{4}\d{3}$/;
