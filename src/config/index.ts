import dotenv from 'dotenv';
import { z } from 'zod';
import type { EnvConfig } from '../types';

dotenv.config();

const optionalPath = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().default('localhost'),
  API_PREFIX: z.string().startsWith('/').default('/api/v1'),
  CORS_ORIGIN: z
    .string()
    .default('*')
    .transform((value) =>
      value
        .split(',')
        .map((origin) => origin.trim())
        .filter(Boolean)
    ),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(15 * 60 * 1000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(100),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),
  REGISTRY_PATH: optionalPath,
  MATCHING_CONFIG_PATH: optionalPath,
  REPORTS_DIR: z.string().default('reconciliation_reports'),
  BANK_STATEMENT_CSV: optionalPath,
  STRIPE_CSV: optionalPath,
  PAPER_RECEIPTS_CSV: optionalPath,
});

/**
 * Parses an environment map into the application config.
 * Exported separately so tests can validate arbitrary inputs.
 */
export function parseEnv(source: NodeJS.ProcessEnv): EnvConfig {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const issues = result.error.errors
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid environment configuration:\n${issues}`);
  }

  return result.data;
}

export const env: EnvConfig = parseEnv(process.env);

export { loadMatchingConfig, parseMatchingConfig, defaultMatchingConfig } from './matching';
export type { MatchingConfig, ConfidenceThresholds } from './matching';

export default env;
