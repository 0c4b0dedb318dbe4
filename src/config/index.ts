/**
 * Configuration Module
 *
 * Loads and validates environment variables for the health summary ingester.
 * Uses Zod for runtime validation with sensible defaults.
 *
 * @module config
 */

import 'dotenv/config';
import { z } from 'zod';
import { join } from 'node:path';

// ============================================================================
// Defaults
// ============================================================================

/** Endpoint used when API_URL is not set */
export const DEFAULT_API_URL = 'http://localhost:5000/ingest';

/** API_URL value that replaces HTTP delivery with printing */
export const PRINT_MODE = 'PRINT_MODE';

/** Summaries accumulated before a batch is dispatched */
export const DEFAULT_BATCH_SIZE = 100;

/** Deliveries allowed in flight at once */
export const DEFAULT_MAX_CONCURRENT = 10;

/** Records folded between partial flushes of the aggregator */
export const DEFAULT_FLUSH_EVERY = 50_000;

// ============================================================================
// Environment Schema
// ============================================================================

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  API_URL: z.string().min(1).optional(),
  HEALTH_DATA_DIR: z.string().min(1).optional(),
  INGEST_BATCH_SIZE: positiveInt(DEFAULT_BATCH_SIZE),
  INGEST_MAX_CONCURRENT: positiveInt(DEFAULT_MAX_CONCURRENT),
  INGEST_FLUSH_EVERY: positiveInt(DEFAULT_FLUSH_EVERY),
});

/**
 * Raised when one or more environment variables fail validation.
 */
export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid environment variables: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Resolved application configuration.
 */
export interface Config {
  /** Ingest endpoint, or PRINT_MODE for a dry run */
  apiUrl: string;
  /** Default data directory when none is given on the command line */
  dataDir: string;
  batchSize: number;
  maxConcurrent: number;
  flushEvery: number;
}

/**
 * Build the configuration from an environment map.
 *
 * @param env - Environment variables (default: process.env)
 * @param cwd - Directory the default data path is resolved against
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): Readonly<Config> {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const vars = parsed.data;

  return Object.freeze({
    apiUrl: vars.API_URL ?? DEFAULT_API_URL,
    dataDir: vars.HEALTH_DATA_DIR ?? join(cwd, 'data'),
    batchSize: vars.INGEST_BATCH_SIZE,
    maxConcurrent: vars.INGEST_MAX_CONCURRENT,
    flushEvery: vars.INGEST_FLUSH_EVERY,
  });
}

/**
 * Whether the endpoint selects dry-run printing.
 */
export function isPrintMode(apiUrl: string): boolean {
  return apiUrl === PRINT_MODE;
}
