import type { Logger } from '@services/logger/createLogger.ts';
import pino from 'pino';
import { type Endpoint, type HttpClient, emptyGymData } from '../types/index.ts';

export interface LogLine {
  level: number;
  msg: string;
  [key: string]: unknown;
}

/**
 * Logger that keeps every line in memory
 */
export function createTestLogger(): { logger: Logger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const logger = pino(
    { level: 'trace' },
    {
      write: (message: string) => {
        lines.push(JSON.parse(message));
      },
    }
  );
  return { logger, lines };
}

export interface RecordedRequest {
  url: string;
  init: RequestInit;
}

/**
 * In-process stand-in for fetch. Unknown URLs fail like a refused connection.
 */
export function createFakeHttp(routes: Record<string, () => Response>): {
  httpClient: HttpClient;
  requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];
  const httpClient: HttpClient = async (url, init) => {
    requests.push({ url, init });
    const route = routes[url];
    if (!route) {
      throw new TypeError(`fetch failed: connect ECONNREFUSED ${url}`);
    }
    return route();
  };
  return { httpClient, requests };
}

/**
 * Single-quoted record literal as the occupancy pages embed it
 */
export function record(shortCode: string, capacity: number, count: number, lastUpdate: string): string {
  return `'${shortCode}' : {'capacity':${capacity},'count':${count},'lastUpdate':'${lastUpdate}'}`;
}

/**
 * Server-rendered occupancy page embedding the given records
 */
export function occupancyPage(records: string[]): string {
  return [
    '<html><body>',
    '<script type="text/javascript">',
    '  var data = {',
    ...records.map((entry) => `    ${entry},`),
    '  };',
    '</script>',
    '</body></html>',
  ].join('\n');
}

export function makeEndpoint(overrides: Partial<Endpoint> = {}): Endpoint {
  return {
    name: 'leeds-north',
    brand: 'Boulder Co',
    url: 'https://occupancy.example.test',
    id: 'acct-1',
    headers: [],
    gyms: [{ shortCode: 'A1', brand: '', location: 'Leeds', data: emptyGymData() }],
    ...overrides,
  };
}

/**
 * Run a function that must throw and hand back what it threw
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected function to throw');
}
