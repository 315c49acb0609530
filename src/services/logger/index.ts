import { appConfig } from '@config/app.ts';
import { createLogger } from './createLogger.ts';

export { LOG_LEVELS, createLogger, parseLoggerConfig } from './createLogger.ts';
export type { LogLevel, Logger, LoggerConfig, LoggerSettings } from './createLogger.ts';

/**
 * Main application logger
 */
export const logger = createLogger(appConfig.logging);

export default logger;
