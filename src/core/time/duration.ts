/**
 * Retention period durations.
 *
 * Written as `<positive integer><unit>`, e.g. `30d`, `12h`, `90m`.
 */

export const DurationUnit = {
  MILLISECONDS: 'ms',
  SECONDS: 's',
  MINUTES: 'm',
  HOURS: 'h',
  DAYS: 'd',
  WEEKS: 'w',
} as const;

export type DurationUnitValue = (typeof DurationUnit)[keyof typeof DurationUnit];

const UNIT_MS: Record<DurationUnitValue, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
  w: 7 * 24 * 60 * 60 * 1000,
};

/**
 * Longest period a duration may span: 1000 years of 365 days.
 * Timestamps carry four-digit years, so any timestamp plus this stays a valid date.
 */
export const MAX_DURATION_MS = 1000 * 365 * UNIT_MS.d;

const DURATION_PATTERN = /^(\d+)(ms|s|m|h|d|w)$/;

function isDurationUnit(value: string): value is DurationUnitValue {
  return Object.prototype.hasOwnProperty.call(UNIT_MS, value);
}

/**
 * Parse a duration string into milliseconds.
 * Returns null for malformed, zero or unsafe values.
 */
export function parseDuration(value: string): number | null {
  const match = DURATION_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }

  const [, amountText, unit] = match;
  if (amountText === undefined || unit === undefined || !isDurationUnit(unit)) {
    return null;
  }

  const ms = Number(amountText) * UNIT_MS[unit];
  if (ms <= 0 || !Number.isSafeInteger(ms)) {
    return null;
  }

  return ms;
}

export function isValidDuration(value: string): boolean {
  return parseDuration(value) !== null;
}
