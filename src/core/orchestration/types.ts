/**
 * Types for endpoint fan-out
 */

import type { Endpoint, Gym } from '../../types/index.ts';
import type { OccupancyError } from '../errors.ts';

/**
 * Orchestration options
 */
export interface OrchestrationOptions {
  /** Maximum number of endpoints fetched at once (default: unbounded) */
  concurrency?: number | undefined;
}

interface EndpointOutcomeBase {
  endpoint: string;
  brand: string;
  duration: number;
}

/**
 * Fetch outcome for a single endpoint
 */
export type EndpointSuccess = EndpointOutcomeBase & {
  success: true;
  data: Endpoint;
};

export type EndpointFailure = EndpointOutcomeBase & {
  success: false;
  error: OccupancyError;
};

export type EndpointOutcome = EndpointSuccess | EndpointFailure;

/**
 * Final orchestration report
 */
export interface OrchestrationReport {
  summary: {
    total: number;
    successful: number;
    failed: number;
    successRate: string;
    duration: string;
    startTime: Date;
    endTime: Date;
  };
  successful: EndpointSuccess[];
  failed: EndpointFailure[];
  /** Every gym of every successful endpoint, in endpoint order */
  gyms: Gym[];
}
