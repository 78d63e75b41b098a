/**
 * Environment Configuration
 *
 * Validates and exports typed environment variables using Zod.
 * Fails fast on startup if variables are present but invalid.
 *
 * Usage:
 *   import { getEnv } from '../config/env';
 *   const { PORT } = getEnv(); // number, guaranteed to be valid
 */

import { z } from 'zod';

// ─────────────────────────────────────────────────────────────────────────────
// Schema Definition
// ─────────────────────────────────────────────────────────────────────────────

const booleanFlag = z
  .string()
  .transform((val) => ['true', '1', 'yes'].includes(val.trim().toLowerCase()));

const envSchema = z
  .object({
    // Server
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    HOST: z.string().min(1).default('0.0.0.0'),
    PORT: z.coerce.number().int().positive().default(8000),
    SERVICE_NAME: z.string().min(1).default('http-instrumentation-demo'),
    CORS_ALLOWED_ORIGINS: z.string().default('*'),

    // Logging
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

    // Metrics
    METRICS_ENABLED: booleanFlag.default(true),
    METRICS_PATH: z.string().regex(/^\/\S*$/, 'METRICS_PATH must start with "/"').default('/metrics'),
    METRICS_PREFIX: z
      .string()
      .regex(/^([a-zA-Z_:][a-zA-Z0-9_:]*)?$/, 'METRICS_PREFIX must be a valid metric name prefix')
      .default(''),

    // Demo service
    SIMULATED_LATENCY_MIN_MS: z.coerce.number().int().min(0).default(10),
    SIMULATED_LATENCY_MAX_MS: z.coerce.number().int().min(0).default(200),
    PAYMENT_FAILURE_RATE: z.coerce.number().min(0).max(1).default(0),
  })
  .refine((env) => env.SIMULATED_LATENCY_MAX_MS >= env.SIMULATED_LATENCY_MIN_MS, {
    message: 'SIMULATED_LATENCY_MAX_MS must be >= SIMULATED_LATENCY_MIN_MS',
    path: ['SIMULATED_LATENCY_MAX_MS'],
  });

// ─────────────────────────────────────────────────────────────────────────────
// Validation
// ─────────────────────────────────────────────────────────────────────────────

export type Env = z.infer<typeof envSchema>;

/**
 * Parse an environment-like record without touching the cache.
 * Throws with one line per invalid variable.
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const errors = result.error.issues
      .map((err) => `  - ${err.path.join('.')}: ${err.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }

  return result.data;
}

/** Like `parseEnv`, but `null` instead of throwing. */
export function tryParseEnv(source: Record<string, string | undefined>): Env | null {
  const result = envSchema.safeParse(source);
  return result.success ? result.data : null;
}

let _env: Env | null = null;

/**
 * Get the validated environment configuration.
 * Parses `process.env` on first call and caches the result.
 */
export function getEnv(): Env {
  if (_env) {
    return _env;
  }
  _env = parseEnv(process.env);
  return _env;
}

/**
 * Pino level for the current environment: explicit LOG_LEVEL wins,
 * otherwise debug everywhere but production. An environment that failed
 * validation logs at info, so the failure itself still gets reported.
 */
export function resolveLogLevel(env: Env | null): string {
  if (env === null) {
    return 'info';
  }
  if (env.LOG_LEVEL) {
    return env.LOG_LEVEL;
  }
  return env.NODE_ENV === 'production' ? 'info' : 'debug';
}
