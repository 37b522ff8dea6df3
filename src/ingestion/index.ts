/**
 * Ingestion: CSV exports into the record store.
 */

export {
  normalizeColumnName,
  normalizeColumnNames,
  toCellValue,
  cellToText,
  getCell,
  createDataset,
  createDatasetFromTable,
  createRecordStore,
  summarizeStore,
  foldDataset,
  type FoldedDataset,
} from './record-store.js';

export { parseCsv, coerceCell, datasetFromCsv } from './csv-parser.js';
export { decodeText, ingestDirectory, type IngestOptions } from './directory.js';
