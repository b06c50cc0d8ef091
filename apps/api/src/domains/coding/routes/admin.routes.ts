// ============================================================================
// Procedure Coding — Admin Routes
// Swap in the snapshot of the currently active data version. Registered
// only when an admin token is configured.
// ============================================================================

import { createHash, timingSafeEqual } from 'node:crypto';
import { type FastifyInstance, type FastifyRequest, type FastifyReply } from 'fastify';
import {
  adminReloadHeaderSchema,
  type AdminReloadHeader,
} from '@codeplan/shared/schemas/coding.schema.js';
import { ForbiddenError } from '../../../lib/errors.js';
import { reloadRateLimit } from '../../../plugins/rate-limit.plugin.js';
import { reloadSnapshot, type SnapshotDeps } from '../services/snapshot.service.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AdminRouteDeps {
  adminToken: string;
  snapshotDeps: SnapshotDeps;
}

function tokenMatches(presented: string, expected: string): boolean {
  const a = createHash('sha256').update(presented).digest();
  const b = createHash('sha256').update(expected).digest();
  return timingSafeEqual(a, b);
}

// ---------------------------------------------------------------------------
// Route registration
// ---------------------------------------------------------------------------

export async function adminRoutes(
  app: FastifyInstance,
  opts: { deps: AdminRouteDeps },
) {
  const { adminToken, snapshotDeps } = opts.deps;

  // =========================================================================
  // POST /api/v1/admin/coding/reload — rebuild and swap the snapshot
  // =========================================================================

  app.post('/api/v1/admin/coding/reload', {
    schema: { headers: adminReloadHeaderSchema },
    config: { rateLimit: reloadRateLimit() },
    handler: async (
      request: FastifyRequest<{ Headers: AdminReloadHeader }>,
      reply: FastifyReply,
    ) => {
      if (!tokenMatches(request.headers['x-admin-token'], adminToken)) {
        throw new ForbiddenError('Invalid admin token');
      }

      const data = await reloadSnapshot({ ...snapshotDeps, logger: request.log });
      return reply.code(200).send({ data });
    },
  });
}
