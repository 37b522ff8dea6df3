/**
 * Error classes raised by CaseTrace.
 *
 * "No match" and "field absent" are never errors; these cover contract
 * violations and unusable input only.
 */

/** A detection referenced a row outside its dataset. */
export class RowIndexError extends Error {
  constructor(
    public readonly source: string,
    public readonly rowIndex: number,
    public readonly rowCount: number,
  ) {
    super(`Row ${rowIndex} is outside dataset "${source}" (${rowCount} rows)`);
    this.name = 'RowIndexError';
  }
}

/** A finding was added after the timeline was finalized. */
export class TimelineFinalizedError extends Error {
  constructor() {
    super('Timeline has already been finalized; no further findings can be added');
    this.name = 'TimelineFinalizedError';
  }
}

/** An input directory or file could not be read. */
export class IngestionError extends Error {
  constructor(message: string, public readonly path: string) {
    super(message);
    this.name = 'IngestionError';
  }
}

/** The configuration file is unreadable or fails validation. */
export class ConfigError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n${issues.join('\n')}` : message);
    this.name = 'ConfigError';
  }
}

/** Render an unknown thrown value as a message. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
