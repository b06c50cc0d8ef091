// ============================================================================
// Procedure Coding — Plan Routes
// Build a billing plan from a principal code; toggle entries of a plan the
// client already holds.
// ============================================================================

import { type FastifyInstance, type FastifyRequest, type FastifyReply } from 'fastify';
import {
  buildPlanSchema,
  togglePlanEntrySchema,
  type BuildPlan,
  type TogglePlanEntry,
} from '@codeplan/shared/schemas/coding.schema.js';
import { togglePlanEntry } from '@codeplan/shared/utils/plan.utils.js';
import { ValidationError } from '../../../lib/errors.js';
import { buildPlan } from '../services/plan.service.js';
import { assertVersion } from '../services/snapshot.service.js';
import type { CodingRouteDeps } from './code.routes.js';

const TOGGLE_ERROR_MESSAGES = {
  PRINCIPAL_NOT_TOGGLEABLE: 'The principal code cannot be disabled',
  ENTRY_NOT_FOUND: 'Code is not an entry of this plan',
} as const;

// ---------------------------------------------------------------------------
// Route registration
// ---------------------------------------------------------------------------

export async function planRoutes(
  app: FastifyInstance,
  opts: { deps: CodingRouteDeps },
) {
  const { store, metrics, unknownPairPolicy, maxUnknownSuggestions } = opts.deps;

  // =========================================================================
  // POST /api/v1/plans — assemble a plan around a principal code
  // =========================================================================

  app.post('/api/v1/plans', {
    schema: { body: buildPlanSchema },
    handler: async (
      request: FastifyRequest<{ Body: BuildPlan }>,
      reply: FastifyReply,
    ) => {
      const body = request.body;
      const snapshot = store.current();
      assertVersion(snapshot, body.data_version);

      const data = buildPlan(snapshot, body.principal, {
        excluded: body.excluded,
        forced: body.forced,
        unknownPairPolicy,
        maxSuggestions: maxUnknownSuggestions,
        metrics,
      });
      return reply.code(200).send({ data });
    },
  });

  // =========================================================================
  // POST /api/v1/plans/toggle — enable/disable one entry, recompute total
  // =========================================================================

  app.post('/api/v1/plans/toggle', {
    schema: { body: togglePlanEntrySchema },
    handler: async (
      request: FastifyRequest<{ Body: TogglePlanEntry }>,
      reply: FastifyReply,
    ) => {
      const { plan, code, enabled } = request.body;
      const result = togglePlanEntry(plan, code, enabled);
      if (!result.ok) {
        throw new ValidationError(TOGGLE_ERROR_MESSAGES[result.error], {
          code,
          reason: result.error,
        });
      }
      return reply.code(200).send({ data: result.plan });
    },
  });
}
