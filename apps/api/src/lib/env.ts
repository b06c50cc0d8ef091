import dotenv from 'dotenv';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import {
  DEFAULT_MAX_UNKNOWN_SUGGESTIONS,
  SEARCH_DEFAULT_LIMIT,
  SEARCH_MAX_LIMIT,
  UNKNOWN_PAIR_POLICIES,
  UnknownPairPolicy,
} from '@codeplan/shared/constants/coding.constants.js';

// Load .env from monorepo root
dotenv.config({ path: fileURLToPath(new URL('../../../../.env', import.meta.url)) });

const envSchema = z.object({
  DATABASE_URL: z.string().min(1),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  API_PORT: z.coerce.number().default(3001),
  API_HOST: z.string().default('0.0.0.0'),
  CORS_ORIGIN: z.string().default('http://localhost:3000'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
  SEARCH_DEFAULT_LIMIT: z.coerce.number().int().min(1).max(SEARCH_MAX_LIMIT).default(SEARCH_DEFAULT_LIMIT),
  UNKNOWN_PAIR_POLICY: z.enum(UNKNOWN_PAIR_POLICIES).default(UnknownPairPolicy.HIDDEN),
  MAX_UNKNOWN_SUGGESTIONS: z.coerce.number().int().min(0).max(100).default(DEFAULT_MAX_UNKNOWN_SUGGESTIONS),
  ADMIN_TOKEN: z.string().min(16).optional(),
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | undefined;

export function getEnv(): Env {
  if (!_env) {
    const result = envSchema.safeParse(process.env);
    if (!result.success) {
      console.error('Invalid environment variables:', result.error.flatten().fieldErrors);
      throw new Error('Invalid environment variables');
    }
    _env = result.data;
  }
  return _env;
}
