// ============================================================================
// Procedure Coding — Zod Validation Schemas
// ============================================================================

import { z } from 'zod';
import {
  ASSOCIATION_TIERS,
  ASSOCIATION_TYPES,
  AssociationTier,
  CODE_IDENTIFIER_PATTERN,
  INCLUSION_SOURCES,
  MAX_CHECK_CODES,
  MIN_CHECK_CODES,
  PLAN_ENTRY_TIERS,
  REJECTION_REASONS,
  SEARCH_MAX_LIMIT,
  SEARCH_MAX_QUERY_LENGTH,
} from '../constants/coding.constants.js';

// --- Helpers ---

const codeIdentifier = z
  .string()
  .trim()
  .toUpperCase()
  .regex(CODE_IDENTIFIER_PATTERN, 'Must be a procedure code such as HHFA016');

const booleanFlag = z
  .enum(['true', 'false'])
  .transform((v) => v === 'true');

// --- Code Search ---

export const codeSearchSchema = z.object({
  q: z.string().max(SEARCH_MAX_QUERY_LENGTH).default(''),
  limit: z.coerce.number().int().min(1).max(SEARCH_MAX_LIMIT).optional(),
  include_retired: booleanFlag.default('false'),
});

export type CodeSearch = z.infer<typeof codeSearchSchema>;

// --- Code Detail ---

export const codeParamSchema = z.object({
  code: codeIdentifier,
});

export type CodeParam = z.infer<typeof codeParamSchema>;

// --- Code Associations ---

export const associationListSchema = z.object({
  min_tier: z.enum(ASSOCIATION_TIERS).default(AssociationTier.CROSS_REGION),
});

export type AssociationList = z.infer<typeof associationListSchema>;

// --- Compatibility Check ---

export const compatibilityCheckSchema = z.object({
  codes: z.array(codeIdentifier).min(MIN_CHECK_CODES).max(MAX_CHECK_CODES),
});

export type CompatibilityCheck = z.infer<typeof compatibilityCheckSchema>;

// --- Build Plan ---

export const buildPlanSchema = z.object({
  principal: codeIdentifier,
  excluded: z.array(codeIdentifier).max(100).default([]),
  forced: z.array(codeIdentifier).max(20).default([]),
  data_version: z.string().min(1).max(64).optional(),
});

export type BuildPlan = z.infer<typeof buildPlanSchema>;

// --- Billing Plan ---

export const inclusionReasonSchema = z.object({
  source: z.enum(INCLUSION_SOURCES),
  associationTypes: z.array(z.enum(ASSOCIATION_TYPES)),
  supportCount: z.number().int().nonnegative().nullable(),
  message: z.string(),
});

export type InclusionReason = z.infer<typeof inclusionReasonSchema>;

export const planPrincipalSchema = z.object({
  code: z.string(),
  label: z.string(),
  workValue: z.number().nonnegative(),
});

export type PlanPrincipal = z.infer<typeof planPrincipalSchema>;

export const planEntrySchema = z.object({
  code: z.string(),
  label: z.string(),
  workValue: z.number().nonnegative(),
  tier: z.enum(PLAN_ENTRY_TIERS),
  enabled: z.boolean(),
  reason: inclusionReasonSchema,
});

export type PlanEntry = z.infer<typeof planEntrySchema>;

export const planRejectionSchema = z.object({
  code: z.string(),
  reason: z.enum(REJECTION_REASONS),
  conflictsWith: z.array(z.string()),
});

export type PlanRejection = z.infer<typeof planRejectionSchema>;

export const planSuggestionSchema = z.object({
  code: z.string(),
  label: z.string(),
  workValue: z.number().nonnegative(),
  via: z.string(),
  viaTier: z.enum(ASSOCIATION_TIERS),
});

export type PlanSuggestion = z.infer<typeof planSuggestionSchema>;

export const billingPlanSchema = z.object({
  dataVersion: z.string(),
  principal: planPrincipalSchema,
  entries: z.array(planEntrySchema),
  rejected: z.array(planRejectionSchema),
  suggestions: z.array(planSuggestionSchema),
  totalWorkValue: z.number().nonnegative(),
  skippedStaleReferences: z.number().int().nonnegative(),
});

export type BillingPlan = z.infer<typeof billingPlanSchema>;

// --- Toggle Plan Entry ---

export const togglePlanEntrySchema = z.object({
  plan: billingPlanSchema,
  code: codeIdentifier,
  enabled: z.boolean(),
});

export type TogglePlanEntry = z.infer<typeof togglePlanEntrySchema>;

// --- Admin Reload ---

export const adminReloadHeaderSchema = z
  .object({
    'x-admin-token': z.string().min(1),
  })
  .passthrough();

export type AdminReloadHeader = z.infer<typeof adminReloadHeaderSchema>;
