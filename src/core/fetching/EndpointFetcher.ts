/**
 * Endpoint Fetcher
 * Fetches one endpoint's occupancy page and merges the extracted data onto its gyms
 */

import type { Logger } from '@services/logger/createLogger.ts';
import {
  type AnchorDateZone,
  type Endpoint,
  type Gym,
  type GymData,
  type HttpClient,
  type Result,
  failure,
  success,
} from '../../types/index.ts';
import { type OccupancyError, TransportError, UnexpectedError } from '../errors.ts';
import { extractOccupancyData } from '../extraction/EmbeddedDataExtractor.ts';
import { DEFAULT_TIMEZONE, loadZone, resolveLastUpdate } from '../time/TimeResolver.ts';

/**
 * Endpoint fetcher options
 */
export interface EndpointFetcherOptions {
  /** Zone used when an endpoint has none (default: Europe/London) */
  defaultTimezone?: string;

  /** Which calendar day "last update" times are anchored onto (default: 'utc') */
  anchorDateZone?: AnchorDateZone;

  /** Abort the request after this many milliseconds (default: no timeout) */
  timeoutMs?: number | undefined;

  /** Clock used as the reference instant for time resolution */
  now?: () => Date;
}

/**
 * Anything that can fetch one endpoint
 */
export interface OccupancyFetcher {
  fetch(endpoint: Endpoint): Promise<Result<Endpoint, OccupancyError>>;
}

/**
 * Build the occupancy page URL for an endpoint
 */
export function buildOccupancyUrl(endpoint: Pick<Endpoint, 'url' | 'id'>): string {
  return `${endpoint.url}/portal/public/${endpoint.id}/occupancy`;
}

/**
 * Merge fresh occupancy data onto a copy of the endpoint's gyms.
 * Every gym takes the endpoint's brand; gyms without a record keep their previous data.
 */
export function mergeGymData(
  endpoint: Endpoint,
  data: ReadonlyMap<string, GymData>
): { endpoint: Endpoint; updated: Gym[] } {
  const updated: Gym[] = [];

  const gyms = endpoint.gyms.map((gym) => {
    const fresh = data.get(gym.shortCode);
    const merged: Gym = {
      ...gym,
      brand: endpoint.brand,
      data: fresh ?? gym.data,
    };
    if (fresh) {
      updated.push(merged);
    }
    return merged;
  });

  return { endpoint: { ...endpoint, gyms }, updated };
}

export class EndpointFetcher implements OccupancyFetcher {
  private readonly defaultTimezone: string;
  private readonly anchorDateZone: AnchorDateZone;
  private readonly timeoutMs: number | undefined;
  private readonly now: () => Date;

  constructor(
    private readonly httpClient: HttpClient,
    private readonly logger: Logger,
    options: EndpointFetcherOptions = {}
  ) {
    this.defaultTimezone = options.defaultTimezone ?? DEFAULT_TIMEZONE;
    this.anchorDateZone = options.anchorDateZone ?? 'utc';
    this.timeoutMs = options.timeoutMs;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Fetch an endpoint and return an updated copy of it.
   * Never rejects: every failure is returned as an OccupancyError.
   */
  async fetch(endpoint: Endpoint): Promise<Result<Endpoint, OccupancyError>> {
    const target: Endpoint = {
      ...endpoint,
      timezone: endpoint.timezone || this.defaultTimezone,
    };
    const log = this.logger.child({ endpoint: target.name, brand: target.brand });

    let data: Map<string, GymData>;
    try {
      data = await this.fetchGymData(target);
    } catch (error) {
      const failed = UnexpectedError.from(error);
      log.error({ err: failed, target: describeEndpoint(target) }, 'get endpoint failed');
      return failure(failed);
    }

    log.debug(
      { target: describeEndpoint(target), data: Object.fromEntries(data) },
      'got endpoint'
    );

    const merged = mergeGymData(target, data);
    for (const gym of merged.updated) {
      log.info({ gym }, 'got gym data');
    }

    return success(merged.endpoint);
  }

  private async fetchGymData(endpoint: Endpoint): Promise<Map<string, GymData>> {
    const zone = loadZone(endpoint.timezone ?? this.defaultTimezone);
    const body = await this.request(endpoint);
    const records = extractOccupancyData(body);

    const referenceInstant = this.now();
    const output = new Map<string, GymData>();
    for (const [shortCode, record] of Object.entries(records)) {
      output.set(shortCode, {
        capacity: record.capacity,
        count: record.count,
        lastUpdate: resolveLastUpdate(record.lastUpdate, zone, referenceInstant, this.anchorDateZone),
      });
    }

    return output;
  }

  /**
   * Single GET attempt, no retry
   */
  private async request(endpoint: Endpoint): Promise<string> {
    const url = buildOccupancyUrl(endpoint);

    let response: Response;
    try {
      const headers = new Headers();
      for (const header of endpoint.headers) {
        headers.set(header.key, header.value);
      }

      response = await this.httpClient(url, {
        method: 'GET',
        headers,
        signal: this.timeoutMs ? AbortSignal.timeout(this.timeoutMs) : undefined,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new TransportError('network', `request to ${url} failed: ${message}`, {
        cause: error,
      });
    }

    if (response.status !== 200) {
      throw new TransportError(
        'unexpected_response',
        `received unexpected response from server: HTTP ${response.status}`,
        { status: response.status }
      );
    }

    try {
      return await response.text();
    } catch (error) {
      throw new TransportError('network', `could not read response body from ${url}`, {
        cause: error,
      });
    }
  }
}

/**
 * Endpoint fields safe to log (headers may carry credentials)
 */
function describeEndpoint(endpoint: Endpoint): Record<string, unknown> {
  return {
    name: endpoint.name,
    brand: endpoint.brand,
    url: endpoint.url,
    id: endpoint.id,
    timezone: endpoint.timezone,
    gyms: endpoint.gyms.map((gym) => gym.shortCode),
  };
}
