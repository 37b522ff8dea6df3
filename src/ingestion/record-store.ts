/**
 * Record store construction and typed row access.
 *
 * Everything that enters the correlation core goes through `createDataset`,
 * which normalizes column names, fills missing cells with null, and narrows
 * arbitrary values to the closed `CellValue` variant. The core only ever
 * reads datasets; scans work on the case-folded view from `foldDataset`.
 */

import type { CellValue, Dataset, DatasetSummary, RecordStore, Row } from '../types/records.js';

// ---------------------------------------------------------------------------
// Column names
// ---------------------------------------------------------------------------

/**
 * Normalize a column header to lower_snake form.
 *
 * @example normalizeColumnName('Last Modified') => 'last_modified'
 * @example normalizeColumnName('Event-ID') => 'event_id'
 */
export function normalizeColumnName(name: string): string {
  return name.trim().toLowerCase().replace(/[ -]/g, '_');
}

/**
 * Normalize a header row. Blank headers become `column_<n>` (1-based) and
 * repeated names get `_2`, `_3`, ... suffixes so every column stays addressable.
 */
export function normalizeColumnNames(headers: readonly string[]): string[] {
  const used = new Set<string>();
  return headers.map((header, i) => {
    const base = normalizeColumnName(header) || `column_${i + 1}`;
    let name = base;
    let suffix = 2;
    while (used.has(name)) {
      name = `${base}_${suffix++}`;
    }
    used.add(name);
    return name;
  });
}

// ---------------------------------------------------------------------------
// Cells
// ---------------------------------------------------------------------------

/**
 * Narrow an arbitrary value to a cell value.
 * Finite numbers stay numbers; anything else non-empty becomes text.
 */
export function toCellValue(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string') return value;
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value.toISOString();
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/** Comparison text of a cell; null cells have none. */
export function cellToText(value: CellValue): string | null {
  if (value === null) return null;
  return typeof value === 'number' ? String(value) : value;
}

/**
 * Read a cell by column name, case-insensitively.
 * Returns null when the column is absent.
 */
export function getCell(row: Row, column: string): CellValue {
  if (Object.hasOwn(row, column)) return row[column] ?? null;
  const wanted = normalizeColumnName(column);
  if (Object.hasOwn(row, wanted)) return row[wanted] ?? null;
  return null;
}

// ---------------------------------------------------------------------------
// Datasets
// ---------------------------------------------------------------------------

/**
 * Build a dataset from loosely typed records.
 *
 * The column set is the union of all record keys in first-seen order, so
 * every row ends up with the same columns.
 */
export function createDataset(
  name: string,
  records: ReadonlyArray<Readonly<Record<string, unknown>>>,
): Dataset {
  const rawColumns: string[] = [];
  const seenRaw = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      if (!seenRaw.has(key)) {
        seenRaw.add(key);
        rawColumns.push(key);
      }
    }
  }

  const columns = normalizeColumnNames(rawColumns);
  const rows: Row[] = records.map(record => {
    const row: Record<string, CellValue> = {};
    rawColumns.forEach((raw, i) => {
      row[columns[i]] = toCellValue(record[raw]);
    });
    return Object.freeze(row);
  });

  return Object.freeze({ name, columns: Object.freeze(columns), rows: Object.freeze(rows) });
}

/**
 * Build a dataset from a header row and positional value rows.
 * Short rows are padded with null; extra values are dropped.
 */
export function createDatasetFromTable(
  name: string,
  headers: readonly string[],
  valueRows: ReadonlyArray<ReadonlyArray<CellValue>>,
): Dataset {
  const columns = normalizeColumnNames(headers);
  const rows: Row[] = valueRows.map(values => {
    const row: Record<string, CellValue> = {};
    columns.forEach((column, i) => {
      row[column] = values[i] ?? null;
    });
    return Object.freeze(row);
  });

  return Object.freeze({ name, columns: Object.freeze(columns), rows: Object.freeze(rows) });
}

/**
 * Assemble a record store. Later datasets with a duplicate name replace
 * earlier ones but keep the original position.
 */
export function createRecordStore(datasets: Iterable<Dataset>): RecordStore {
  const store = new Map<string, Dataset>();
  for (const dataset of datasets) {
    store.set(dataset.name, dataset);
  }
  return store;
}

export function summarizeStore(store: RecordStore): Record<string, DatasetSummary> {
  const summary: Record<string, DatasetSummary> = {};
  for (const [name, dataset] of store) {
    summary[name] = {
      rows: dataset.rows.length,
      columns: dataset.columns.length,
      columnNames: [...dataset.columns],
    };
  }
  return summary;
}

// ---------------------------------------------------------------------------
// Case-folded view
// ---------------------------------------------------------------------------

export interface FoldedDataset {
  dataset: Dataset;
  /** Rows with string cells lower-cased; numbers and nulls unchanged */
  rows: readonly Row[];
  /** Per-column comparison text (null for empty cells) */
  text: ReadonlyMap<string, ReadonlyArray<string | null>>;
  /** Columns holding at least one string cell */
  textColumns: ReadonlySet<string>;
}

/**
 * Build the case-folded view used by scans. The source dataset is untouched.
 */
export function foldDataset(dataset: Dataset): FoldedDataset {
  const text = new Map<string, Array<string | null>>();
  const textColumns = new Set<string>();
  for (const column of dataset.columns) {
    text.set(column, []);
  }

  const rows: Row[] = dataset.rows.map(row => {
    const folded: Record<string, CellValue> = {};
    for (const column of dataset.columns) {
      const value = row[column] ?? null;
      const lowered = typeof value === 'string' ? value.toLowerCase() : value;
      if (typeof value === 'string') textColumns.add(column);
      folded[column] = lowered;
      text.get(column)?.push(cellToText(lowered));
    }
    return folded;
  });

  return { dataset, rows, text, textColumns };
}
