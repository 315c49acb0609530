/**
 * Core type definitions used throughout the application
 */

/**
 * Static request header applied verbatim to an endpoint request
 */
export interface Header {
  key: string;
  value: string;
}

/**
 * Occupancy snapshot for one gym
 */
export interface GymData {
  capacity: number;
  count: number;
  /** Absolute instant in UTC, null until a fetch has reported one */
  lastUpdate: Date | null;
}

/**
 * One physical gym location, correlated to extracted records by short code
 */
export interface Gym {
  shortCode: string;
  brand: string;
  location: string;
  data: GymData;
}

/**
 * One occupancy data source and the gyms it reports on
 */
export interface Endpoint {
  name: string;
  brand: string;
  url: string;
  id: string;
  headers: Header[];
  /** IANA zone name, the configured default applies when absent */
  timezone?: string;
  gyms: Gym[];
}

/**
 * Occupancy record as embedded in the upstream page
 */
export interface RawOccupancyRecord {
  capacity: number;
  count: number;
  lastUpdate: string;
}

/**
 * Which calendar day a date-less wall-clock time is anchored onto.
 * 'utc' takes the reference instant's date in UTC, 'endpoint' its date in the endpoint's zone.
 */
export type AnchorDateZone = 'utc' | 'endpoint';

/**
 * Minimal fetch-compatible HTTP client
 */
export type HttpClient = (url: string, init: RequestInit) => Promise<Response>;

/**
 * Result wrapper with success/error handling
 */
export type Result<T, E = Error> = { success: true; data: T } | { success: false; error: E };

/**
 * Create success result
 */
export function success<T>(data: T): Result<T, never> {
  return { success: true, data };
}

/**
 * Create error result
 */
export function failure<E = Error>(error: E): Result<never, E> {
  return { success: false, error };
}

/**
 * Zero-value occupancy data for a gym that has not been fetched yet
 */
export function emptyGymData(): GymData {
  return { capacity: 0, count: 0, lastUpdate: null };
}
