/**
 * Barrel exports for the CaseTrace reporters.
 */

export {
  escapeCsvField,
  generateTimelineCsv,
  writeTimelineCsv,
} from './timeline-csv.js';

export {
  generateJsonReport,
  writeCaseReport,
  type CaseReport,
} from './json-reporter.js';

export {
  formatSummary,
  formatDuration,
  printSummary,
  type SummaryData,
} from './summary-reporter.js';

export {
  generateTextReport,
  writeTextReport,
  sourcedThreats,
  formatThreatTable,
  printThreatTable,
  type TextReportData,
  type SourcedThreat,
} from './text-reporter.js';
