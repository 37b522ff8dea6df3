/**
 * Directory ingestion: every `*.csv` in a directory becomes one dataset.
 */

import { readdir, readFile, stat } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import { createLogger } from '../utils/logger.js';
import { IngestionError, errorMessage } from '../utils/errors.js';
import type { Dataset, RecordStore } from '../types/records.js';
import { datasetFromCsv } from './csv-parser.js';
import { createRecordStore } from './record-store.js';

const log = createLogger('ingestion');

/**
 * Decode file bytes as UTF-8, falling back to latin1 when the bytes are
 * not valid UTF-8.
 */
export function decodeText(bytes: Buffer): string {
  const utf8 = new TextDecoder('utf-8').decode(bytes);
  return utf8.includes('\uFFFD') ? bytes.toString('latin1') : utf8;
}

export interface IngestOptions {
  /** Restrict ingestion to these source names (file stems, case-insensitive) */
  only?: readonly string[];
}

/**
 * Load every CSV file in `dir` into a record store, in file-name order.
 * The source name is the file stem. Unreadable files are logged and skipped.
 *
 * @throws IngestionError when `dir` does not exist or is not a directory
 */
export async function ingestDirectory(dir: string, options: IngestOptions = {}): Promise<RecordStore> {
  try {
    const info = await stat(dir);
    if (!info.isDirectory()) {
      throw new IngestionError(`Not a directory: ${dir}`, dir);
    }
  } catch (err) {
    if (err instanceof IngestionError) throw err;
    throw new IngestionError(`Input directory not found: ${dir}`, dir);
  }

  const only = options.only ? new Set(options.only.map(name => name.toLowerCase())) : null;
  const files = (await readdir(dir))
    .filter(file => extname(file).toLowerCase() === '.csv')
    .filter(file => !only || only.has(basename(file, extname(file)).toLowerCase()))
    .sort();

  const datasets: Dataset[] = [];
  for (const file of files) {
    const name = basename(file, extname(file));
    const path = join(dir, file);
    try {
      const dataset = datasetFromCsv(name, decodeText(await readFile(path)));
      log.debug(`Loaded ${name}: ${dataset.rows.length} rows, ${dataset.columns.length} columns`);
      datasets.push(dataset);
    } catch (err) {
      log.warn(`Skipping ${file}: ${errorMessage(err)}`);
    }
  }

  log.info(`Ingested ${datasets.length} of ${files.length} CSV files from ${dir}`);
  return createRecordStore(datasets);
}
