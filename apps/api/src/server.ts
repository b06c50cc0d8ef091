import Fastify, { type FastifyServerOptions } from 'fastify';
import helmet from '@fastify/helmet';
import cors from '@fastify/cors';
import { serializerCompiler, validatorCompiler } from 'fastify-type-provider-zod';
import { drizzle } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import { randomUUID } from 'node:crypto';
import { fileURLToPath } from 'node:url';
import { getEnv } from './lib/env.js';
import { errorHandlerPluginFp } from './plugins/error-handler.plugin.js';
import { rateLimitPluginFp } from './plugins/rate-limit.plugin.js';
import { codeRoutes, type CodingRouteDeps } from './domains/coding/routes/code.routes.js';
import { planRoutes } from './domains/coding/routes/plan.routes.js';
import { adminRoutes, type AdminRouteDeps } from './domains/coding/routes/admin.routes.js';
import { createCodingRepository } from './domains/coding/repos/coding-data.repo.js';
import { CodingMetrics } from './domains/coding/services/metrics.service.js';
import { SnapshotStore, reloadSnapshot } from './domains/coding/services/snapshot.service.js';

export interface BuildAppOptions {
  logger?: FastifyServerOptions['logger'];
  corsOrigin?: string;
  rateLimitMax?: number;
  coding: CodingRouteDeps;
  /** Reload route is registered only when provided. */
  admin?: AdminRouteDeps;
}

export function buildApp(opts: BuildAppOptions) {
  const app = Fastify({
    logger: opts.logger ?? {
      level: process.env.LOG_LEVEL ?? 'info',
    },
    genReqId: () => randomUUID(),
  });

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  // Register plugins
  app.register(errorHandlerPluginFp);
  app.register(helmet);
  app.register(cors, {
    origin: opts.corsOrigin ?? 'http://localhost:3000',
  });
  app.register(rateLimitPluginFp, { defaultMax: opts.rateLimitMax });

  // Health check
  app.get('/health', async () => ({ status: 'ok' }));

  // Domain routes
  app.register(codeRoutes, { deps: opts.coding });
  app.register(planRoutes, { deps: opts.coding });
  if (opts.admin) {
    app.register(adminRoutes, { deps: opts.admin });
  }

  return app;
}

async function main() {
  const env = getEnv();

  const pool = new pg.Pool({ connectionString: env.DATABASE_URL });
  const repo = createCodingRepository(drizzle(pool));
  const store = new SnapshotStore();
  const metrics = new CodingMetrics();

  const app = buildApp({
    logger: { level: env.LOG_LEVEL },
    corsOrigin: env.CORS_ORIGIN,
    coding: {
      store,
      metrics,
      searchDefaultLimit: env.SEARCH_DEFAULT_LIMIT,
      unknownPairPolicy: env.UNKNOWN_PAIR_POLICY,
      maxUnknownSuggestions: env.MAX_UNKNOWN_SUGGESTIONS,
    },
    admin: env.ADMIN_TOKEN
      ? { adminToken: env.ADMIN_TOKEN, snapshotDeps: { repo, store, metrics } }
      : undefined,
  });

  // Serve nothing until the first snapshot is in place.
  await reloadSnapshot({ repo, store, metrics, logger: app.log });

  const shutdown = async () => {
    await app.close();
    await pool.end();
  };
  process.once('SIGTERM', () => {
    shutdown().catch((err: unknown) => app.log.error(err));
  });

  await app.listen({ port: env.API_PORT, host: env.API_HOST });
}

// Start server when run directly
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
}
