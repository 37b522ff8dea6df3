/**
 * Types for the in-memory record store built from forensic tool exports.
 */

/** A single cell. Empty cells are `null`. */
export type CellValue = string | number | null;

/** One row keyed by normalized (lower_snake) column name. */
export type Row = Readonly<Record<string, CellValue>>;

export interface Dataset {
  /** Source name, usually the CSV file stem */
  name: string;
  /** Normalized column names, in file order */
  columns: readonly string[];
  rows: readonly Row[];
}

/** Source name → dataset, iterated in ingestion order. */
export type RecordStore = ReadonlyMap<string, Dataset>;

export interface DatasetSummary {
  rows: number;
  columns: number;
  columnNames: string[];
}
