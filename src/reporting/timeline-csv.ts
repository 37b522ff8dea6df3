/**
 * Timeline CSV writer.
 *
 * One header line with the fixed timeline columns, then one line per
 * finding in timeline order. Fields are quoted only when they contain a
 * comma, a double quote or a line break; embedded quotes are doubled.
 */

import { writeFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';

import { TIMELINE_COLUMNS, type Finding } from '../types/findings.js';
import { toTimelineRows } from '../timeline/builder.js';

/**
 * Quote a CSV field when needed.
 *
 * @example escapeCsvField('a,b') => '"a,b"'
 * @example escapeCsvField('say "hi"') => '"say ""hi"""'
 */
export function escapeCsvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function generateTimelineCsv(findings: readonly Finding[]): string {
  const lines = [TIMELINE_COLUMNS.map(escapeCsvField).join(',')];
  for (const row of toTimelineRows(findings)) {
    lines.push(TIMELINE_COLUMNS.map(column => escapeCsvField(row[column])).join(','));
  }
  return lines.join('\n') + '\n';
}

/**
 * Write the timeline CSV, creating parent directories as needed.
 */
export function writeTimelineCsv(findings: readonly Finding[], outputPath: string): void {
  mkdirSync(dirname(outputPath), { recursive: true });
  writeFileSync(outputPath, generateTimelineCsv(findings), 'utf-8');
}
