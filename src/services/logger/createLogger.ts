import pino from 'pino';
import { z } from 'zod';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

/**
 * Log levels type
 */
export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Logger type for dependency injection
 */
export type Logger = pino.Logger;

/**
 * Structured logger settings accepted through LOGGER_CONFIG
 */
const loggerConfigSchema = z.object({
  level: z.enum(LOG_LEVELS).optional(),
  name: z.string().optional(),
  base: z.record(z.string(), z.unknown()).nullable().optional(),
  redact: z.array(z.string()).optional(),
  messageKey: z.string().optional(),
});

export type LoggerConfig = z.infer<typeof loggerConfigSchema>;

export interface LoggerSettings {
  level: LogLevel;
  /** Raw JSON logger configuration; absent means a pretty-printed development logger */
  config?: string | undefined;
}

/**
 * Parse a JSON logger configuration document
 */
export function parseLoggerConfig(raw: string): LoggerConfig {
  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (error) {
    throw new Error('could not parse logger config', { cause: error });
  }

  const result = loggerConfigSchema.safeParse(document);
  if (!result.success) {
    throw new Error('could not parse logger config', { cause: result.error });
  }
  return result.data;
}

/**
 * Create the application logger
 */
export function createLogger(settings: LoggerSettings): Logger {
  // Structured configuration
  if (settings.config) {
    const config = parseLoggerConfig(settings.config);
    return pino({
      ...config,
      level: config.level ?? settings.level,
      formatters: {
        level: (label) => {
          return { level: label };
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    });
  }

  // Development configuration with pretty printing
  return pino({
    level: settings.level,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        singleLine: false,
      },
    },
  });
}
