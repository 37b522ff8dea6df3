/**
 * Barrel exports for CaseTrace types.
 */

export type {
  CellValue,
  Row,
  Dataset,
  RecordStore,
  DatasetSummary,
} from './records.js';

export type {
  IndicatorKind,
  ClassifiedIndicator,
  MatchKind,
  Match,
  AnomalyRuleType,
  Severity,
  Anomaly,
  Threat,
  FindingLevel,
  Finding,
  TimelineColumn,
  TimelineRow,
  MatchSummary,
  AnomalySummary,
} from './findings.js';

export { TIMELINE_COLUMNS } from './findings.js';

export type {
  AIConfig,
  APIUsage,
} from './config.js';
