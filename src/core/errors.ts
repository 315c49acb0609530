/**
 * Error taxonomy for the occupancy pipeline.
 * ConfigError is fatal to a run; every other error is scoped to a single endpoint.
 */

export type OccupancyErrorCode =
  | 'CONFIG_ERROR'
  | 'ZONE_ERROR'
  | 'TRANSPORT_ERROR'
  | 'EXTRACTION_ERROR'
  | 'TIME_PARSE_ERROR'
  | 'UNEXPECTED_ERROR';

export abstract class OccupancyError extends Error {
  abstract readonly code: OccupancyErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Missing or unparseable endpoint configuration
 */
export class ConfigError extends OccupancyError {
  readonly code = 'CONFIG_ERROR';
}

/**
 * Unknown IANA timezone name
 */
export class ZoneError extends OccupancyError {
  readonly code = 'ZONE_ERROR';

  constructor(readonly zone: string) {
    super(`unknown time zone: ${zone}`);
  }
}

export type TransportFailure = 'network' | 'unexpected_response';

/**
 * Network failure or a response other than HTTP 200
 */
export class TransportError extends OccupancyError {
  readonly code = 'TRANSPORT_ERROR';
  readonly status: number | undefined;

  constructor(
    readonly reason: TransportFailure,
    message: string,
    options?: { cause?: unknown; status?: number }
  ) {
    super(message, options);
    this.status = options?.status;
  }
}

export type ExtractionFailure = 'NoMatch' | 'MalformedRecord' | 'TimeNotFound';

/**
 * Embedded data or time text could not be located or has the wrong shape
 */
export class ExtractionError extends OccupancyError {
  readonly code = 'EXTRACTION_ERROR';

  constructor(
    readonly reason: ExtractionFailure,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Time text was found but is not a valid 12-hour clock time
 */
export class TimeParseError extends OccupancyError {
  readonly code = 'TIME_PARSE_ERROR';

  constructor(readonly text: string) {
    super(`could not parse time: ${text}`);
  }
}

/**
 * Any other failure raised while fetching an endpoint, kept as the cause
 */
export class UnexpectedError extends OccupancyError {
  readonly code = 'UNEXPECTED_ERROR';

  static from(error: unknown): OccupancyError {
    if (error instanceof OccupancyError) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new UnexpectedError(message, { cause: error });
  }
}
