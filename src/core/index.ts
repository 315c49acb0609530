/**
 * Core module exports
 * Extraction, time resolution, per-endpoint fetching and fan-out
 */

// Errors
export {
  ConfigError,
  ExtractionError,
  OccupancyError,
  TimeParseError,
  TransportError,
  UnexpectedError,
  ZoneError,
} from './errors.ts';
export type { ExtractionFailure, OccupancyErrorCode, TransportFailure } from './errors.ts';

// Extraction
export { extractOccupancyData } from './extraction/EmbeddedDataExtractor.ts';

// Time
export { DEFAULT_TIMEZONE, loadZone, resolveLastUpdate } from './time/TimeResolver.ts';

// Fetching
export { EndpointFetcher, buildOccupancyUrl, mergeGymData } from './fetching/EndpointFetcher.ts';
export type { EndpointFetcherOptions, OccupancyFetcher } from './fetching/EndpointFetcher.ts';

// Orchestration
export { FetchOrchestrator } from './orchestration/index.ts';
export type {
  EndpointFailure,
  EndpointOutcome,
  EndpointSuccess,
  OrchestrationOptions,
  OrchestrationReport,
} from './orchestration/index.ts';
