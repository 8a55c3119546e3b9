/**
 * Centralized environment validation using Zod
 * Validates the search engine's environment variables at startup
 * Fails fast in production when configuration is invalid
 */

import { z } from 'zod';
import { logger } from './logger';
import {
  DEFAULT_PAGE_SIZE,
  DEFAULT_QUERY_TIMEOUT_MS,
  MAX_PAGE_SIZE,
} from './constants';

// Schema for server-side environment variables
const serverEnvSchema = z.object({
  // Database (optional - only the PostgreSQL executor needs it)
  DATABASE_URL: z
    .string()
    .regex(/^postgres(ql)?:\/\//, 'DATABASE_URL must be a postgres:// connection string')
    .optional(),
  DATABASE_POOL_MAX: z.coerce.number().int().min(1).max(100).default(10),

  // Logging
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),

  // Search behaviour
  SEARCH_ARCHIVE_URL: z.string().min(1).default('/listings'),
  SEARCH_PER_PAGE: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(DEFAULT_PAGE_SIZE),
  SEARCH_QUERY_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .min(100)
    .max(60_000)
    .default(DEFAULT_QUERY_TIMEOUT_MS),

  // Node environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

// Type exports for use throughout the application
export type ServerEnv = z.infer<typeof serverEnvSchema>;

/**
 * Validates server environment variables
 * Call this at startup to fail fast on missing configuration
 */
export function validateServerEnv(
  source: Record<string, string | undefined> = process.env
): ServerEnv {
  const result = serverEnvSchema.safeParse(source);

  if (result.success) {
    return result.data;
  }

  const errors = result.error.issues
    .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
    .join('\n');

  logger.error('Environment validation failed:\n' + errors);

  // In production, fail fast. In development, warn and fall back to defaults
  if (source.NODE_ENV === 'production') {
    throw new Error('Invalid environment configuration. Check logs for details.');
  }

  return serverEnvSchema.parse({ NODE_ENV: source.NODE_ENV === 'test' ? 'test' : 'development' });
}

// Validated environment object - import this instead of using process.env directly
export const serverEnv = validateServerEnv();

