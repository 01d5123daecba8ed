/**
 * Time Model for Retention PDP
 *
 * All timestamps are ISO 8601 strings in UTC (`toISOString()` form), so they
 * compare lexicographically and hash identically across processes.
 * Evaluation never reads the wall clock; only the clocks injected into the
 * audit log and the scheduler do.
 */

/**
 * Timestamp in ISO 8601 format (UTC, millisecond precision)
 */
export type Timestamp = string;

/**
 * A source of the current time
 */
export type Clock = () => Timestamp;

/**
 * A half-open time window [from, until)
 */
export interface TimeWindow {
  readonly from: Timestamp;
  readonly until?: Timestamp;
}

/**
 * Get the current timestamp in ISO 8601 format
 */
export function now(): Timestamp {
  return new Date().toISOString();
}

export const systemClock: Clock = now;

/**
 * Clock that always returns the given instant (tests, replays)
 */
export function fixedClock(timestamp: Timestamp): Clock {
  return () => timestamp;
}

export function fromDate(date: Date): Timestamp {
  return date.toISOString();
}

export function toDate(timestamp: Timestamp): Date {
  return new Date(timestamp);
}

/**
 * Check if a timestamp is in canonical form
 */
export function isValidTimestamp(timestamp: string): timestamp is Timestamp {
  const date = new Date(timestamp);
  return !isNaN(date.getTime()) && date.toISOString() === timestamp;
}

const ISO_DATE_PREFIX = /^\d{4}-\d{2}-\d{2}/;
const HAS_ZONE = /(Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Normalize an ISO 8601 date or date-time into canonical UTC form.
 * Date-only and zone-less values are read as UTC. Returns null when unparseable.
 */
export function normalizeTimestamp(value: string): Timestamp | null {
  const trimmed = value.trim();
  if (!ISO_DATE_PREFIX.test(trimmed)) {
    return null;
  }

  const withZone = trimmed.length > 10 && !HAS_ZONE.test(trimmed) ? `${trimmed}Z` : trimmed;
  const date = new Date(withZone);
  return isNaN(date.getTime()) ? null : date.toISOString();
}

/**
 * Compare two timestamps
 * Returns negative if a < b, zero if equal, positive if a > b
 */
export function compareTimestamps(a: Timestamp, b: Timestamp): number {
  return toDate(a).getTime() - toDate(b).getTime();
}

export function isBefore(a: Timestamp, b: Timestamp): boolean {
  return compareTimestamps(a, b) < 0;
}

/**
 * Check if a timestamp falls within a window (inclusive start, exclusive end)
 */
export function isWithinWindow(timestamp: Timestamp, window: TimeWindow): boolean {
  if (isBefore(timestamp, window.from)) {
    return false;
  }

  if (window.until !== undefined && !isBefore(timestamp, window.until)) {
    return false;
  }

  return true;
}

/**
 * Add a number of milliseconds to a timestamp (UTC arithmetic, no DST drift)
 */
export function addMilliseconds(timestamp: Timestamp, ms: number): Timestamp {
  return fromDate(new Date(toDate(timestamp).getTime() + ms));
}
