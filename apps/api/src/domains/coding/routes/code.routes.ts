// ============================================================================
// Procedure Coding — Code Routes
// Search, detail, association listing, compatibility check and stats.
// Every handler reads the live snapshot exactly once.
// ============================================================================

import { type FastifyInstance, type FastifyRequest, type FastifyReply } from 'fastify';
import {
  codeSearchSchema,
  codeParamSchema,
  associationListSchema,
  compatibilityCheckSchema,
  type CodeSearch,
  type CodeParam,
  type AssociationList,
  type CompatibilityCheck,
} from '@codeplan/shared/schemas/coding.schema.js';
import { type UnknownPairPolicy } from '@codeplan/shared/constants/coding.constants.js';
import type { CodingMetrics } from '../services/metrics.service.js';
import type { SnapshotStore } from '../services/snapshot.service.js';
import { searchCodes } from '../services/search.service.js';
import { checkCompatibility } from '../services/plan.service.js';
import {
  getCodeDetail,
  getCodingStats,
  listAssociations,
} from '../services/code-lookup.service.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CodingRouteDeps {
  store: SnapshotStore;
  metrics: CodingMetrics;
  searchDefaultLimit: number;
  unknownPairPolicy: UnknownPairPolicy;
  maxUnknownSuggestions: number;
}

// ---------------------------------------------------------------------------
// Route registration
// ---------------------------------------------------------------------------

export async function codeRoutes(
  app: FastifyInstance,
  opts: { deps: CodingRouteDeps },
) {
  const { store, metrics, searchDefaultLimit } = opts.deps;

  // =========================================================================
  // GET /api/v1/codes/search — free-text search
  // =========================================================================

  app.get('/api/v1/codes/search', {
    schema: { querystring: codeSearchSchema },
    handler: async (
      request: FastifyRequest<{ Querystring: CodeSearch }>,
      reply: FastifyReply,
    ) => {
      const { q, limit, include_retired } = request.query;
      const data = searchCodes(store.current(), q, {
        limit: limit ?? searchDefaultLimit,
        includeRetired: include_retired,
        metrics,
      });
      return reply.code(200).send({ data });
    },
  });

  // =========================================================================
  // POST /api/v1/codes/check — pairwise compatibility of a code set
  // =========================================================================

  app.post('/api/v1/codes/check', {
    schema: { body: compatibilityCheckSchema },
    handler: async (
      request: FastifyRequest<{ Body: CompatibilityCheck }>,
      reply: FastifyReply,
    ) => {
      const data = checkCompatibility(store.current(), request.body.codes);
      return reply.code(200).send({ data });
    },
  });

  // =========================================================================
  // GET /api/v1/codes/:code — code detail (retired codes included)
  // =========================================================================

  app.get('/api/v1/codes/:code', {
    schema: { params: codeParamSchema },
    handler: async (
      request: FastifyRequest<{ Params: CodeParam }>,
      reply: FastifyReply,
    ) => {
      const data = getCodeDetail(store.current(), request.params.code);
      return reply.code(200).send({ data });
    },
  });

  // =========================================================================
  // GET /api/v1/codes/:code/associations — neighbours at or above a tier
  // =========================================================================

  app.get('/api/v1/codes/:code/associations', {
    schema: { params: codeParamSchema, querystring: associationListSchema },
    handler: async (
      request: FastifyRequest<{ Params: CodeParam; Querystring: AssociationList }>,
      reply: FastifyReply,
    ) => {
      const data = listAssociations(
        store.current(),
        request.params.code,
        request.query.min_tier,
      );
      return reply.code(200).send({ data });
    },
  });

  // =========================================================================
  // GET /api/v1/coding/stats — snapshot contents and counters
  // =========================================================================

  app.get('/api/v1/coding/stats', {
    handler: async (_request: FastifyRequest, reply: FastifyReply) => {
      const data = getCodingStats(store.current(), metrics);
      return reply.code(200).send({ data });
    },
  });
}
