import { env } from './env.ts';

/**
 * Application configuration derived from environment variables
 */
export const appConfig = {
  /**
   * Application environment
   */
  env: env.NODE_ENV,

  /**
   * Is production environment
   */
  isProduction: env.NODE_ENV === 'production',

  /**
   * Logger settings
   */
  logging: {
    level: env.LOG_LEVEL,
    config: env.LOGGER_CONFIG,
  },

  /**
   * Where the endpoint list is read from
   */
  endpoints: {
    inline: env.CONFIG,
    filePath: env.CONFIG_FILE,
  },

  /**
   * Per-endpoint fetch settings
   */
  fetch: {
    defaultTimezone: env.DEFAULT_TIMEZONE,
    anchorDateZone: env.ANCHOR_DATE_ZONE,
    timeoutMs: env.FETCH_TIMEOUT_MS,
  },

  /**
   * Fan-out settings
   */
  orchestration: {
    concurrency: env.FETCH_MAX_CONCURRENCY,
  },
} as const;
