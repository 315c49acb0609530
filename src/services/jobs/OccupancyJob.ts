import { type EndpointSource, loadEndpoints } from '@config/endpoints.ts';
import { EndpointFetcher, type EndpointFetcherOptions } from '@core/fetching/EndpointFetcher.ts';
import { FetchOrchestrator } from '@core/orchestration/FetchOrchestrator.ts';
import type { OrchestrationOptions, OrchestrationReport } from '@core/orchestration/types.ts';
import type { Logger } from '@services/logger/createLogger.ts';
import type { HttpClient } from '../../types/index.ts';

/**
 * Everything a run needs, built once by the entry point
 */
export interface OccupancyJobDeps {
  logger: Logger;
  httpClient: HttpClient;
  endpointSource: EndpointSource;
  fetcherOptions?: EndpointFetcherOptions;
  orchestrationOptions?: OrchestrationOptions;
}

/**
 * Load the endpoint list and fetch every endpoint once.
 * Only a ConfigError rejects; endpoint failures are in the report.
 */
export async function runOccupancyJob(deps: OccupancyJobDeps): Promise<OrchestrationReport> {
  const endpoints = await loadEndpoints(deps.endpointSource, deps.logger);

  const fetcher = new EndpointFetcher(deps.httpClient, deps.logger, deps.fetcherOptions);
  const orchestrator = new FetchOrchestrator(fetcher, deps.logger, deps.orchestrationOptions);

  return orchestrator.run(endpoints);
}
