import { describe, it, expect } from 'vitest';
import {
  parseDuration,
  formatDuration,
  formatDateTime,
  formatDate,
  fromEpochSeconds,
  toEpochSeconds,
} from '@/utils/time.js';

describe('parseDuration', () => {
  it('parses unit suffixes', () => {
    expect(parseDuration('30s')).toBe(30_000);
    expect(parseDuration('90m')).toBe(5_400_000);
    expect(parseDuration('24h')).toBe(86_400_000);
    expect(parseDuration('7d')).toBe(604_800_000);
    expect(parseDuration('1w')).toBe(604_800_000);
  });

  it('treats bare numbers as hours', () => {
    expect(parseDuration(24)).toBe(86_400_000);
    expect(parseDuration(1.5)).toBe(5_400_000);
    expect(parseDuration('12')).toBe(43_200_000);
  });

  it('accepts upper-case units and surrounding whitespace', () => {
    expect(parseDuration(' 2H ')).toBe(7_200_000);
  });

  it('rejects zero, negative and unparseable input', () => {
    expect(() => parseDuration(0)).toThrow('Invalid duration');
    expect(() => parseDuration(-3)).toThrow('Invalid duration');
    expect(() => parseDuration('0h')).toThrow('must be positive');
    expect(() => parseDuration('yesterday')).toThrow('expected e.g. 90m, 24h, 7d');
  });
});

describe('formatDuration', () => {
  it('uses the largest whole unit', () => {
    expect(formatDuration(86_400_000)).toBe('1d');
    expect(formatDuration(7_200_000)).toBe('2h');
    expect(formatDuration(5_400_000)).toBe('90m');
    expect(formatDuration(1_209_600_000)).toBe('2w');
    expect(formatDuration(1_500)).toBe('1.5s');
  });
});

describe('timestamp formatting', () => {
  it('formats date-times in UTC', () => {
    expect(formatDateTime(new Date('2024-03-15T09:05:07.900Z'))).toBe('2024-03-15 09:05:07');
  });

  it('formats dates in UTC', () => {
    expect(formatDate(new Date('2024-01-02T23:59:59Z'))).toBe('2024-01-02');
  });

  it('converts epoch seconds both ways', () => {
    expect(fromEpochSeconds(1710504000).toISOString()).toBe('2024-03-15T12:00:00.000Z');
    expect(toEpochSeconds(new Date('2024-03-15T12:00:00.999Z'))).toBe(1710504000);
  });
});
