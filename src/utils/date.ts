import { format, isValid, parse } from 'date-fns';
import { formatInTimeZone, fromZonedTime } from 'date-fns-tz';

/**
 * Check whether a name is an IANA time zone the runtime knows about
 */
export function isValidTimeZone(name: string): boolean {
  if (!name) {
    return false;
  }

  try {
    new Intl.DateTimeFormat('en-GB', { timeZone: name });
    return true;
  } catch {
    return false;
  }
}

/**
 * Format the calendar date of an instant as YYYY-MM-DD in the given zone
 */
export function formatDateInZone(date: Date, timeZone: string): string {
  return formatInTimeZone(date, timeZone, 'yyyy-MM-dd');
}

/**
 * Parse a 12-hour clock time such as "2:30 PM"
 * Returns null when the text is not a valid time
 */
export function parseClockTime(text: string): { hours: number; minutes: number } | null {
  const parsed = parse(text, 'h:mm a', new Date(2000, 0, 1));
  if (!isValid(parsed)) {
    return null;
  }

  return { hours: parsed.getHours(), minutes: parsed.getMinutes() };
}

/**
 * Interpret a calendar date (YYYY-MM-DD) and wall-clock time in a zone as an absolute instant
 */
export function zonedWallClockToInstant(
  day: string,
  clock: { hours: number; minutes: number },
  timeZone: string
): Date {
  const wallClock = format(new Date(2000, 0, 1, clock.hours, clock.minutes), 'HH:mm');
  return fromZonedTime(`${day}T${wallClock}:00`, timeZone);
}
