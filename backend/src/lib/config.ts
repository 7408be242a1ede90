/**
 * Environment configuration.
 * Read once at startup; invalid values fail fast with the offending keys listed.
 */

import 'dotenv/config';
import { z } from 'zod';

const numberFromEnv = (fallback: number) =>
  z.coerce.number().finite().default(fallback);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(4000),

  // Catalog storage backend
  CATALOG_STORE: z.enum(['memory', 'file', 'supabase']).default('file'),
  CATALOG_FILE: z.string().default('data/catalog.json'),
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1).optional(),
  SUPABASE_CATALOG_TABLE: z.string().default('venues'),

  // Cross-process batch lock
  REDIS_URL: z.string().optional(),
  BATCH_LOCK_TTL_MS: numberFromEnv(15 * 60 * 1000),

  // Fuzzy matching
  FUZZY_AUTO_MATCH_THRESHOLD: numberFromEnv(95),
  FUZZY_AMBIGUOUS_LOWER_BOUND: numberFromEnv(60),
  FUZZY_MAX_CANDIDATES: z.coerce.number().int().positive().default(6),

  // Coordinate backfill
  GEOCODER_URL: z.string().url().default('https://nominatim.openstreetmap.org'),
  GEOCODER_USER_AGENT: z.string().min(1).default('pub-catalog/0.1 (venue coordinate backfill)'),
  GEOCODER_COUNTRY_CODES: z.string().default('gb'),
  GEOCODER_MIN_INTERVAL_MS: z.coerce.number().int().nonnegative().default(1100),

  LOG_DIR: z.string().default('log_files'),
});

export type AppConfig = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }

  const config = parsed.data;
  if (config.FUZZY_AMBIGUOUS_LOWER_BOUND > config.FUZZY_AUTO_MATCH_THRESHOLD) {
    throw new Error(
      'Invalid environment configuration: FUZZY_AMBIGUOUS_LOWER_BOUND must not exceed FUZZY_AUTO_MATCH_THRESHOLD'
    );
  }
  return config;
}

let cached: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cached) {
    cached = loadConfig();
  }
  return cached;
}
