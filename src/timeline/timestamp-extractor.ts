/**
 * Timestamp extraction from free-form cell text.
 *
 * Formats are tried in a fixed order and the first one found anywhere in
 * the text wins. A capture that is not a real calendar date (month 13,
 * Feb 30) falls through to the next format instead of failing.
 *
 * Output is always canonical `YYYY-MM-DD HH:MM:SS`. Epoch values are
 * rendered in UTC.
 */

import { cellToText, getCell } from '../ingestion/record-store.js';
import type { CellValue, Row } from '../types/records.js';

interface TimestampFormat {
  name: string;
  regex: RegExp;
  toParts: (m: RegExpExecArray) => DateParts;
}

interface DateParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const num = (s: string | undefined): number => parseInt(s ?? '', 10);

const TIMESTAMP_FORMATS: readonly TimestampFormat[] = [
  {
    name: 'YYYY-MM-DD HH:MM:SS',
    regex: /(\d{4})-(\d{2})-(\d{2})\s+(\d{2}):(\d{2}):(\d{2})/,
    toParts: m => ({ year: num(m[1]), month: num(m[2]), day: num(m[3]), hour: num(m[4]), minute: num(m[5]), second: num(m[6]) }),
  },
  {
    name: 'MM/DD/YYYY HH:MM:SS',
    regex: /(\d{2})\/(\d{2})\/(\d{4})\s+(\d{2}):(\d{2}):(\d{2})/,
    toParts: m => ({ year: num(m[3]), month: num(m[1]), day: num(m[2]), hour: num(m[4]), minute: num(m[5]), second: num(m[6]) }),
  },
  {
    name: 'YYYY-MM-DDTHH:MM:SS',
    regex: /(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})/,
    toParts: m => ({ year: num(m[1]), month: num(m[2]), day: num(m[3]), hour: num(m[4]), minute: num(m[5]), second: num(m[6]) }),
  },
  {
    name: 'DD-MM-YYYY HH:MM:SS',
    regex: /(\d{2})-(\d{2})-(\d{4})\s+(\d{2}):(\d{2}):(\d{2})/,
    toParts: m => ({ year: num(m[3]), month: num(m[2]), day: num(m[1]), hour: num(m[4]), minute: num(m[5]), second: num(m[6]) }),
  },
];

/** 13-digit (milliseconds) or 10-digit (seconds) run not embedded in a longer number. */
const EPOCH_PATTERN = /(?<!\d)(\d{13}|\d{10})(?!\d)/;

/**
 * Conventional timestamp column names, tried in order when the referenced
 * cell carries no timestamp of its own.
 */
export const TIMESTAMP_COLUMNS = Object.freeze([
  'timestamp',
  'time',
  'date',
  'datetime',
  'created',
  'modified',
  'last_accessed',
  'last_modified',
  'event_time',
  'log_time',
] as const);

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

const pad = (n: number, width = 2): string => String(n).padStart(width, '0');

function formatUtc(date: Date): string {
  return (
    `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
  );
}

/**
 * Build a UTC date from parts, or null when the parts are not a real
 * calendar moment.
 */
function toValidDate(p: DateParts): Date | null {
  if (p.month < 1 || p.month > 12 || p.day < 1) return null;
  if (p.hour > 23 || p.minute > 59 || p.second > 59) return null;

  const date = new Date(Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second));
  // Date.UTC maps years 0-99 to 1900-1999
  date.setUTCFullYear(p.year);
  if (date.getUTCMonth() !== p.month - 1 || date.getUTCDate() !== p.day) return null;
  return date;
}

// ---------------------------------------------------------------------------
// Extraction
// ---------------------------------------------------------------------------

/**
 * Extract the first recognizable timestamp embedded in a text or value.
 *
 * @example extractTimestamp('Event occurred 2024-03-15 10:22:05 on host')
 *   => '2024-03-15 10:22:05'
 * @example extractTimestamp('1700000000') => '2023-11-14 22:13:20'
 */
export function extractTimestamp(value: CellValue | undefined): string | null {
  if (value === undefined) return null;
  const text = cellToText(value);
  if (text === null || text.trim() === '') return null;

  for (const format of TIMESTAMP_FORMATS) {
    const match = format.regex.exec(text);
    if (!match) continue;
    const date = toValidDate(format.toParts(match));
    if (date) return formatUtc(date);
  }

  const epoch = EPOCH_PATTERN.exec(text);
  if (epoch) {
    const digits = epoch[1];
    const ms = digits.length === 13 ? Number(digits) : Number(digits) * 1000;
    return formatUtc(new Date(ms));
  }

  return null;
}

/**
 * Resolve a row's timestamp: the directly referenced value first, then
 * each conventional timestamp column once, in order.
 */
export function resolveRowTimestamp(
  row: Row,
  directValue?: CellValue,
  columns: readonly string[] = TIMESTAMP_COLUMNS,
): string | null {
  const direct = extractTimestamp(directValue);
  if (direct) return direct;

  for (const column of columns) {
    const resolved = extractTimestamp(getCell(row, column));
    if (resolved) return resolved;
  }

  return null;
}

/**
 * Parse a canonical timestamp to epoch milliseconds (UTC).
 * Returns null for anything that is not canonical.
 */
export function parseCanonicalTimestamp(value: string): number | null {
  const match = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/.exec(value);
  if (!match) return null;
  const date = toValidDate({
    year: num(match[1]),
    month: num(match[2]),
    day: num(match[3]),
    hour: num(match[4]),
    minute: num(match[5]),
    second: num(match[6]),
  });
  return date ? date.getTime() : null;
}
