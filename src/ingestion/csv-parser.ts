/**
 * CSV parsing for forensic tool exports.
 */

import type { CellValue, Dataset } from '../types/records.js';
import { createDatasetFromTable } from './record-store.js';

const BOM = '\uFEFF';

/**
 * Parse CSV text into rows of raw field strings.
 *
 * Handles quoted fields, doubled quotes inside quotes, commas and newlines
 * embedded in quoted fields, and CRLF line endings. A leading UTF-8 BOM is
 * dropped. Blank lines are skipped.
 */
export function parseCsv(text: string): string[][] {
  const input = text.startsWith(BOM) ? text.slice(1) : text;
  const rows: string[][] = [];
  let row: string[] = [];
  let current = '';
  let inQuotes = false;
  let fieldQuoted = false;
  let rowQuoted = false;

  const endField = () => {
    row.push(current);
    current = '';
    fieldQuoted = false;
  };
  const endRow = () => {
    endField();
    // a lone empty unquoted field is a blank line
    if (row.length > 1 || row[0] !== '' || rowQuoted) rows.push(row);
    row = [];
    rowQuoted = false;
  };

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];

    if (inQuotes) {
      if (ch === '"') {
        if (input[i + 1] === '"') {
          current += '"';
          i++; // skip escaped quote
        } else {
          inQuotes = false;
        }
      } else {
        current += ch;
      }
      continue;
    }

    if (ch === '"' && current === '' && !fieldQuoted) {
      inQuotes = true;
      fieldQuoted = true;
      rowQuoted = true;
    } else if (ch === ',') {
      endField();
    } else if (ch === '\n') {
      endRow();
    } else if (ch === '\r') {
      if (input[i + 1] === '\n') i++;
      endRow();
    } else {
      current += ch;
    }
  }

  if (current !== '' || row.length > 0 || fieldQuoted) endRow();
  return rows;
}

/**
 * Coerce a raw CSV field to a cell value.
 *
 * Empty fields become null. Plain decimal numbers become numbers when they
 * survive the round trip: no leading zeros, at most 15 significant digits,
 * an integer part of at most 12 digits, and printing back to the same text. Epoch-milliseconds values and
 * zero-padded identifiers therefore stay text.
 *
 * @example coerceCell('') => null
 * @example coerceCell('4624') => 4624
 * @example coerceCell('1700000000000') => '1700000000000'
 */
export function coerceCell(raw: string): CellValue {
  const trimmed = raw.trim();
  if (trimmed === '') return null;

  const match = /^-?(0|[1-9]\d*)(?:\.(\d+))?$/.exec(trimmed);
  if (!match) return raw;

  const integerPart = match[1];
  const fraction = match[2] ?? '';
  if (integerPart.length > 12) return raw;
  const significant = (integerPart === '0' ? '' : integerPart) + fraction;
  if (significant.replace(/^0+/, '').length > 15) return raw;

  // '3.10', '10.0' and '-0' would print differently once parsed.
  const value = Number(trimmed);
  return String(value) === trimmed ? value : raw;
}

/**
 * Parse a CSV document into a dataset. The first row is the header.
 */
export function datasetFromCsv(name: string, text: string): Dataset {
  const [header = [], ...body] = parseCsv(text);
  return createDatasetFromTable(
    name,
    header,
    body.map(fields => fields.map(coerceCell)),
  );
}
