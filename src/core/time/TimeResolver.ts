/**
 * Time Resolver
 * Turns the date-less "last updated" text of an endpoint into an absolute UTC instant
 */

import { formatDateInZone, isValidTimeZone, parseClockTime, zonedWallClockToInstant } from '@utils/date.ts';
import type { AnchorDateZone } from '../../types/index.ts';
import { ExtractionError, TimeParseError, ZoneError } from '../errors.ts';

export const DEFAULT_TIMEZONE = 'Europe/London';

const TIME_PATTERN = /(\d{1,2}):(\d{1,2}) (AM|PM)/;

/**
 * Validate an IANA zone name and return it for use with resolveLastUpdate
 */
export function loadZone(name: string): string {
  if (!isValidTimeZone(name)) {
    throw new ZoneError(name);
  }
  return name;
}

/**
 * Resolve free text such as "Last updated 2:30 PM" to an instant.
 *
 * The upstream only reports a time of day, so the calendar date comes from
 * `referenceInstant`: its UTC date by default, or its date in `zone` when
 * `anchor` is 'endpoint'. The wall-clock time is read in `zone`. A reference
 * instant just after midnight in one zone and before it in the other lands on
 * the neighbouring day; that is not corrected.
 */
export function resolveLastUpdate(
  text: string,
  zone: string,
  referenceInstant: Date,
  anchor: AnchorDateZone = 'utc'
): Date {
  const match = TIME_PATTERN.exec(text);
  if (!match) {
    throw new ExtractionError('TimeNotFound', `no time of day found in "${text}"`);
  }

  const clock = parseClockTime(match[0]);
  if (!clock) {
    throw new TimeParseError(match[0]);
  }

  const day = formatDateInZone(referenceInstant, anchor === 'endpoint' ? zone : 'UTC');
  return zonedWallClockToInstant(day, clock, zone);
}
