import { ConfigError } from '@core/index.ts';
import { logger } from '@services/logger/index.ts';
import { handler } from './handler.ts';

/**
 * Run the occupancy job once; the trigger lives outside the process
 */
async function main(): Promise<void> {
  await handler();
}

main()
  .catch((error: unknown) => {
    if (error instanceof ConfigError) {
      logger.fatal({ err: error }, 'could not load config');
    } else {
      logger.fatal({ err: error }, 'occupancy run failed');
    }
    process.exitCode = 1;
  })
  .finally(() => logger.flush());
