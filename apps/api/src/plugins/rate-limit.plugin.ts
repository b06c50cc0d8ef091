import { type FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';
import rateLimit from '@fastify/rate-limit';
import { AppError } from '../lib/errors.js';

// ---------------------------------------------------------------------------
// Rate limit tiers:
//   Default:        100 req/min per IP
//   Admin reload:   5 req/min per IP
// ---------------------------------------------------------------------------

export interface RateLimitPluginOptions {
  /** Override default max for testing. */
  defaultMax?: number;
}

async function rateLimitPlugin(app: FastifyInstance, opts: RateLimitPluginOptions) {
  const defaultMax = opts.defaultMax ?? 100;

  await app.register(rateLimit, {
    max: defaultMax,
    timeWindow: '1 minute',
    keyGenerator: (request) => request.ip,
    errorResponseBuilder: (_request, context) =>
      new AppError(
        429,
        'RATE_LIMITED',
        `Rate limit exceeded. Retry after ${Math.ceil(context.ttl / 1000)} seconds.`,
      ),
  });
}

// ---------------------------------------------------------------------------
// Route-level rate limit config factories
// ---------------------------------------------------------------------------

/**
 * Snapshot reload rebuilds the whole index: 5 req/min per IP.
 * Use as route-level config: { config: { rateLimit: reloadRateLimit() } }
 */
export function reloadRateLimit() {
  return {
    max: 5,
    timeWindow: '1 minute',
  };
}

// ---------------------------------------------------------------------------
// Export
// ---------------------------------------------------------------------------

export const rateLimitPluginFp = fp(rateLimitPlugin, {
  name: 'rate-limit-plugin',
});

export { rateLimitPlugin };
