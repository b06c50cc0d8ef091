// ============================================================================
// Procedure Coding — Billing Plan Utilities
// Pure helpers a client can run locally while the user edits a plan.
// ============================================================================

import type { BillingPlan } from '../schemas/coding.schema.js';

/**
 * Rounds a work-value sum to two decimals so repeated toggling does not
 * accumulate floating point drift.
 */
export function roundWorkValue(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Principal plus every enabled entry.
 */
export function computePlanTotal(
  plan: Pick<BillingPlan, 'principal' | 'entries'>,
): number {
  const secondaries = plan.entries
    .filter((entry) => entry.enabled)
    .reduce((sum, entry) => sum + entry.workValue, 0);
  return roundWorkValue(plan.principal.workValue + secondaries);
}

export type TogglePlanEntryResult =
  | { ok: true; plan: BillingPlan }
  | { ok: false; error: 'PRINCIPAL_NOT_TOGGLEABLE' | 'ENTRY_NOT_FOUND' };

/**
 * Switch a secondary entry on or off and recompute the running total.
 *
 * Acceptance was checked pairwise against every other entry when the plan
 * was built, so no other entry's compatibility depends on this one: only
 * the total changes. The input plan is not modified.
 */
export function togglePlanEntry(
  plan: BillingPlan,
  code: string,
  enabled: boolean,
): TogglePlanEntryResult {
  if (code === plan.principal.code) {
    return { ok: false, error: 'PRINCIPAL_NOT_TOGGLEABLE' };
  }
  if (!plan.entries.some((entry) => entry.code === code)) {
    return { ok: false, error: 'ENTRY_NOT_FOUND' };
  }

  const entries = plan.entries.map((entry) =>
    entry.code === code ? { ...entry, enabled } : entry,
  );

  return {
    ok: true,
    plan: {
      ...plan,
      entries,
      totalWorkValue: computePlanTotal({ principal: plan.principal, entries }),
    },
  };
}
