import { LOG_LEVELS } from '@services/logger/createLogger.ts';
import { z } from 'zod';

/**
 * Environment variable schema with validation
 */
const envSchema = z.object({
  // Application
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging
  LOG_LEVEL: z.enum(LOG_LEVELS).default('debug'),
  LOGGER_CONFIG: z.string().optional(),

  // Endpoint configuration: inline document wins over the file
  CONFIG: z.string().optional(),
  CONFIG_FILE: z.string().min(1).default('config.json'),

  // Fetching
  DEFAULT_TIMEZONE: z.string().min(1).default('Europe/London'),
  ANCHOR_DATE_ZONE: z.enum(['utc', 'endpoint']).default('utc'),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  FETCH_MAX_CONCURRENCY: z.coerce.number().int().positive().optional(),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parse and validate environment variables
 * Throws detailed error if validation fails
 */
export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const errors = result.error.format();
    console.error('❌ Invalid environment variables:');
    console.error(JSON.stringify(errors, null, 2));
    throw new Error('Environment validation failed');
  }

  return result.data;
}

/**
 * Validated environment variables
 * Use this throughout the application
 */
export const env = parseEnv();
