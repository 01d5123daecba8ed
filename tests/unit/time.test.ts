import { describe, it, expect } from '@jest/globals';
import { isValidDuration, parseDuration } from '../../src/core/time/duration.js';
import {
  addMilliseconds,
  compareTimestamps,
  fixedClock,
  isValidTimestamp,
  isWithinWindow,
  normalizeTimestamp,
} from '../../src/core/time/temporal.js';

const DAY_MS = 24 * 60 * 60 * 1000;

describe('Durations', () => {
  it('should parse every supported unit', () => {
    expect(parseDuration('500ms')).toBe(500);
    expect(parseDuration('45s')).toBe(45_000);
    expect(parseDuration('90m')).toBe(5_400_000);
    expect(parseDuration('12h')).toBe(43_200_000);
    expect(parseDuration('30d')).toBe(30 * DAY_MS);
    expect(parseDuration('2w')).toBe(14 * DAY_MS);
  });

  it('should ignore surrounding whitespace', () => {
    expect(parseDuration(' 7d ')).toBe(7 * DAY_MS);
  });

  it('should reject zero, negative, fractional and unknown durations', () => {
    expect(parseDuration('0d')).toBeNull();
    expect(parseDuration('-1d')).toBeNull();
    expect(parseDuration('1.5d')).toBeNull();
    expect(parseDuration('1y')).toBeNull();
    expect(parseDuration('30 days')).toBeNull();
    expect(parseDuration('')).toBeNull();
  });

  it('should reject durations beyond safe integer milliseconds', () => {
    expect(parseDuration('99999999999999999w')).toBeNull();
  });

  it('should expose a boolean check', () => {
    expect(isValidDuration('30d')).toBe(true);
    expect(isValidDuration('thirty days')).toBe(false);
  });
});

describe('Timestamps', () => {
  describe('normalizeTimestamp', () => {
    it('should read date-only values as UTC midnight', () => {
      expect(normalizeTimestamp('2024-01-01')).toBe('2024-01-01T00:00:00.000Z');
    });

    it('should read zone-less date-times as UTC', () => {
      expect(normalizeTimestamp('2024-03-01T10:00:00')).toBe('2024-03-01T10:00:00.000Z');
    });

    it('should convert offsets to UTC', () => {
      expect(normalizeTimestamp('2024-03-01T10:00:00+02:00')).toBe('2024-03-01T08:00:00.000Z');
    });

    it('should return null for unparseable values', () => {
      expect(normalizeTimestamp('yesterday')).toBeNull();
      expect(normalizeTimestamp('2024-13-45')).toBeNull();
    });
  });

  it('should recognise canonical timestamps only', () => {
    expect(isValidTimestamp('2024-01-01T00:00:00.000Z')).toBe(true);
    expect(isValidTimestamp('2024-01-01')).toBe(false);
  });

  it('should add milliseconds in UTC', () => {
    expect(addMilliseconds('2024-01-01T00:00:00.000Z', 30 * DAY_MS)).toBe('2024-01-31T00:00:00.000Z');
    expect(addMilliseconds('2024-03-30T12:00:00.000Z', DAY_MS)).toBe('2024-03-31T12:00:00.000Z');
  });

  it('should compare timestamps chronologically', () => {
    expect(compareTimestamps('2024-01-01T00:00:00.000Z', '2024-01-02T00:00:00.000Z')).toBeLessThan(0);
    expect(compareTimestamps('2024-01-02T00:00:00.000Z', '2024-01-02T00:00:00.000Z')).toBe(0);
  });

  it('should treat windows as inclusive start and exclusive end', () => {
    const window = { from: '2024-01-01T00:00:00.000Z', until: '2024-02-01T00:00:00.000Z' };

    expect(isWithinWindow('2024-01-01T00:00:00.000Z', window)).toBe(true);
    expect(isWithinWindow('2024-01-31T23:59:59.999Z', window)).toBe(true);
    expect(isWithinWindow('2024-02-01T00:00:00.000Z', window)).toBe(false);
    expect(isWithinWindow('2023-12-31T23:59:59.999Z', window)).toBe(false);
    expect(isWithinWindow('2030-01-01T00:00:00.000Z', { from: window.from })).toBe(true);
  });

  it('should build fixed clocks', () => {
    const clock = fixedClock('2024-05-01T00:00:00.000Z');
    expect(clock()).toBe('2024-05-01T00:00:00.000Z');
    expect(clock()).toBe('2024-05-01T00:00:00.000Z');
  });
});
