/**
 * Fetch Orchestrator
 * Fans out one fetch per endpoint, joins once, and reports every outcome
 */

import type { Logger } from '@services/logger/createLogger.ts';
import type { Endpoint } from '../../types/index.ts';
import { UnexpectedError } from '../errors.ts';
import type { OccupancyFetcher } from '../fetching/EndpointFetcher.ts';
import type {
  EndpointFailure,
  EndpointOutcome,
  EndpointSuccess,
  OrchestrationOptions,
  OrchestrationReport,
} from './types.ts';

/**
 * FetchOrchestrator
 * A failing endpoint never affects its siblings; nothing is retried.
 */
export class FetchOrchestrator {
  private readonly concurrency: number;

  constructor(
    private readonly fetcher: OccupancyFetcher,
    private readonly logger: Logger,
    options: OrchestrationOptions = {}
  ) {
    this.concurrency = options.concurrency ?? Number.POSITIVE_INFINITY;
    if (!(this.concurrency >= 1)) {
      throw new Error(`concurrency must be at least 1, got ${this.concurrency}`);
    }
  }

  /**
   * Fetch every endpoint
   */
  async run(endpoints: Endpoint[]): Promise<OrchestrationReport> {
    const startTime = Date.now();

    this.logger.info(
      { totalEndpoints: endpoints.length, concurrency: this.concurrency },
      `Fetching ${endpoints.length} endpoints`
    );

    const outcomes = await this.dispatchAll(endpoints);

    return this.generateReport(outcomes, startTime);
  }

  /**
   * Start every fetch before awaiting any. With a concurrency cap, a pool of
   * workers drains a shared iterator instead.
   */
  private async dispatchAll(endpoints: Endpoint[]): Promise<EndpointOutcome[]> {
    if (this.concurrency >= endpoints.length) {
      return Promise.all(endpoints.map((endpoint) => this.fetchOne(endpoint)));
    }

    const outcomes: EndpointOutcome[] = [];
    const queue = endpoints.entries();
    const worker = async () => {
      for (const [index, endpoint] of queue) {
        outcomes[index] = await this.fetchOne(endpoint);
      }
    };

    await Promise.all(Array.from({ length: this.concurrency }, worker));
    return outcomes;
  }

  private async fetchOne(endpoint: Endpoint): Promise<EndpointOutcome> {
    const startTime = Date.now();
    const base = { endpoint: endpoint.name, brand: endpoint.brand };

    try {
      const result = await this.fetcher.fetch(endpoint);
      const duration = Date.now() - startTime;

      if (result.success) {
        return { ...base, duration, success: true, data: result.data };
      }
      return { ...base, duration, success: false, error: result.error };
    } catch (error) {
      const failure = UnexpectedError.from(error);
      this.logger.error(
        { endpoint: endpoint.name, err: failure },
        `[${endpoint.name}] Unexpected fetch error`
      );
      return { ...base, duration: Date.now() - startTime, success: false, error: failure };
    }
  }

  /**
   * Generate final report
   */
  private generateReport(outcomes: EndpointOutcome[], startTime: number): OrchestrationReport {
    const successful = outcomes.filter((outcome): outcome is EndpointSuccess => outcome.success);
    const failed = outcomes.filter((outcome): outcome is EndpointFailure => !outcome.success);
    const total = outcomes.length;
    const duration = Date.now() - startTime;
    const successRate =
      total > 0 ? ((successful.length / total) * 100).toFixed(1) + '%' : '0%';

    const report: OrchestrationReport = {
      summary: {
        total,
        successful: successful.length,
        failed: failed.length,
        successRate,
        duration: `${(duration / 1000).toFixed(1)} seconds`,
        startTime: new Date(startTime),
        endTime: new Date(),
      },
      successful,
      failed,
      gyms: successful.flatMap((outcome) => outcome.data.gyms),
    };

    if (failed.length > 0) {
      this.logger.warn(
        {
          failed: failed.map((outcome) => ({
            endpoint: outcome.endpoint,
            error: outcome.error.message,
          })),
        },
        'Some endpoints failed to fetch'
      );
    }

    this.logger.info(
      { summary: report.summary },
      `Fetch completed: ${report.summary.successful}/${report.summary.total} successful (${report.summary.successRate})`
    );

    return report;
  }
}
