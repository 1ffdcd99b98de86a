/**
 * Environment configuration
 *
 * Loaded once at boot from process.env (and `.env` via dotenv).
 */

import 'dotenv/config';
import { z } from 'zod';

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(8001),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGINS: z.string().default('*'),

  MONGO_URL: z.string().default('mongodb://localhost:27017'),
  MONGO_DB: z.string().default('subnet_leverage'),
  MONGO_ENABLED: z
    .enum(['0', '1'])
    .default('1')
    .transform((v) => v === '1'),

  PROTOCOL_OWNER: z.string().min(1).default('owner'),
  // overrides the treasury from the defaults or the parameters file
  PROTOCOL_TREASURY: z.string().min(1).optional(),
  PROTOCOL_PARAMS_PATH: z.string().optional(),

  // Block height is derived from wall clock: (now - GENESIS_TS) / BLOCK_TIME_MS
  BLOCK_TIME_MS: z.coerce.number().int().positive().default(12_000),
  GENESIS_TS: z.coerce.number().int().nonnegative().default(0),
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid environment: ${issues.join('; ')}`);
  }
  return parsed.data;
}

export const env: Env = loadEnv();
