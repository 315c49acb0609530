import { appConfig } from '@config/app.ts';
import type { OrchestrationReport } from '@core/index.ts';
import { type OccupancyJobDeps, runOccupancyJob } from '@services/jobs/index.ts';
import { logger } from '@services/logger/index.ts';

/**
 * Production dependencies: global fetch and the application logger
 */
export function createJobDeps(): OccupancyJobDeps {
  return {
    logger,
    httpClient: fetch,
    endpointSource: appConfig.endpoints,
    fetcherOptions: appConfig.fetch,
    orchestrationOptions: appConfig.orchestration,
  };
}

/**
 * Parameterless entry point for an external scheduler or serverless trigger
 */
export async function handler(): Promise<OrchestrationReport> {
  return runOccupancyJob(createJobDeps());
}
