/**
 * Embedded Data Extractor
 * Pulls the occupancy object literal out of an endpoint's server-rendered page
 */

import { z } from 'zod';
import type { RawOccupancyRecord } from '../../types/index.ts';
import { ExtractionError } from '../errors.ts';

/**
 * Matches `var data = { ... , };` and captures the body between the braces.
 * The body may not contain a semicolon.
 */
const DATA_ASSIGNMENT = /var\s+data\s+=\s+\{([^;]+),\s+\};/g;

const rawRecordSchema = z.object({
  capacity: z.number().int(),
  count: z.number().int(),
  lastUpdate: z.string(),
});

const payloadSchema = z.record(z.string(), rawRecordSchema);

/**
 * Extract the occupancy records keyed by gym short code.
 *
 * The page holds a JavaScript object literal with single-quoted strings.
 * Every single quote is swapped for a double quote before parsing as JSON,
 * so a value containing an apostrophe fails with MalformedRecord.
 */
export function extractOccupancyData(body: string): Record<string, RawOccupancyRecord> {
  const matches = Array.from(body.matchAll(DATA_ASSIGNMENT));
  const captured = matches.length === 1 ? matches[0]?.[1] : undefined;
  if (captured === undefined) {
    throw new ExtractionError(
      'NoMatch',
      `expected exactly one data assignment, found ${matches.length}`
    );
  }

  const repaired = `{${captured.replaceAll("'", '"')}}`;

  let document: unknown;
  try {
    document = JSON.parse(repaired);
  } catch (error) {
    throw new ExtractionError('MalformedRecord', 'embedded data is not valid JSON', {
      cause: error,
    });
  }

  const result = payloadSchema.safeParse(document);
  if (!result.success) {
    const details = result.error.errors
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ExtractionError('MalformedRecord', `embedded data has unexpected shape (${details})`, {
      cause: result.error,
    });
  }

  return result.data;
}
