/**
 * Tests for timestamp extraction and canonicalization.
 */

import { describe, it, expect } from 'vitest';
import {
  extractTimestamp,
  parseCanonicalTimestamp,
  resolveRowTimestamp,
} from '@/timeline/timestamp-extractor.js';

describe('extractTimestamp', () => {
  it('finds an ISO-style timestamp inside free text', () => {
    expect(extractTimestamp('Event occurred 2024-03-15 10:22:05 on host')).toBe('2024-03-15 10:22:05');
  });

  it('reads US month/day order', () => {
    expect(extractTimestamp('03/15/2024 10:22:05')).toBe('2024-03-15 10:22:05');
  });

  it('reads the T-separated form', () => {
    expect(extractTimestamp('2024-03-15T10:22:05.123Z')).toBe('2024-03-15 10:22:05');
  });

  it('reads day-first dashed dates', () => {
    expect(extractTimestamp('15-03-2024 10:22:05')).toBe('2024-03-15 10:22:05');
  });

  it('renders epoch seconds and milliseconds in UTC', () => {
    expect(extractTimestamp('1700000000')).toBe('2023-11-14 22:13:20');
    expect(extractTimestamp('1700000000000')).toBe('2023-11-14 22:13:20');
    expect(extractTimestamp(1700000000)).toBe('2023-11-14 22:13:20');
  });

  it('ignores digit runs of other lengths', () => {
    expect(extractTimestamp('12345678901')).toBeNull();
    expect(extractTimestamp('pid 4242')).toBeNull();
  });

  it('rejects calendar-invalid captures', () => {
    expect(extractTimestamp('2024-13-01 00:00:00')).toBeNull();
    expect(extractTimestamp('2023-02-30 10:00:00')).toBeNull();
  });

  it('falls through to a later format when an earlier capture is invalid', () => {
    expect(extractTimestamp('2024-13-01 00:00:00 then 2024-01-02T03:04:05')).toBe('2024-01-02 03:04:05');
  });

  it('returns null for empty values', () => {
    expect(extractTimestamp(null)).toBeNull();
    expect(extractTimestamp(undefined)).toBeNull();
    expect(extractTimestamp('   ')).toBeNull();
  });
});

describe('resolveRowTimestamp', () => {
  const row = { timestamp: '2024-03-15 10:22:05', message: 'logon' };

  it('prefers the directly referenced value', () => {
    expect(resolveRowTimestamp(row, 'seen at 2024-03-16 08:00:00')).toBe('2024-03-16 08:00:00');
  });

  it('falls back to conventional timestamp columns', () => {
    expect(resolveRowTimestamp(row, 'logon')).toBe('2024-03-15 10:22:05');
  });

  it('tries the columns in the given order', () => {
    const both = { created: '2024-01-01 00:00:00', modified: '2024-02-01 00:00:00' };
    expect(resolveRowTimestamp(both, undefined, ['modified', 'created'])).toBe('2024-02-01 00:00:00');
  });

  it('returns null when nothing carries a timestamp', () => {
    expect(resolveRowTimestamp({ message: 'logon' }, 'logon')).toBeNull();
  });
});

describe('parseCanonicalTimestamp', () => {
  it('parses canonical values as UTC', () => {
    expect(parseCanonicalTimestamp('2024-03-15 10:22:05')).toBe(Date.UTC(2024, 2, 15, 10, 22, 5));
  });

  it('rejects non-canonical and impossible values', () => {
    expect(parseCanonicalTimestamp('2024-03-15T10:22:05')).toBeNull();
    expect(parseCanonicalTimestamp('2024-02-30 00:00:00')).toBeNull();
  });
});
