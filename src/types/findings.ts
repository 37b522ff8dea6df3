/**
 * Types for detections (matches, anomalies, threats) and the timeline
 * findings normalized from them.
 */

import type { Row } from './records.js';

// --- Indicators ---

export type IndicatorKind =
  | 'ip_address'
  | 'hash'
  | 'domain'
  | 'email'
  | 'executable'
  | 'unknown';

export interface ClassifiedIndicator {
  /** Indicator as supplied (trimmed) */
  value: string;
  /** Trimmed, lower-cased search form */
  normalized: string;
  kind: IndicatorKind;
}

// --- Matches ---

export type MatchKind = 'exact' | 'partial';

export interface Match {
  source: string;
  indicator: string;
  indicatorKind: IndicatorKind;
  matchKind: MatchKind;
  column: string;
  rowIndex: number;
  matchedValue: string;
  /** Snapshot of the case-folded row at match time */
  fullRow: Row;
}

// --- Anomalies ---

export type AnomalyRuleType =
  | 'suspicious_extension'
  | 'suspicious_keyword'
  | 'suspicious_path';

export type Severity = 'critical' | 'high' | 'medium' | 'low';

export interface Anomaly {
  source: string;
  ruleType: AnomalyRuleType;
  severity: Severity;
  column: string;
  value: string;
  rowIndex: number;
  description: string;
  /** Rule table entry that fired */
  pattern: string;
}

// --- Threats (produced by the AI assessment collaborator) ---

export interface Threat {
  type: string;
  severity: string;
  description: string;
  indicators?: string[];
  recommendation?: string;
  /** Dataset the threat was raised against */
  source: string;
  /** Originating row, when the producer can point at one */
  rowIndex?: number;
}

// --- Timeline ---

export type FindingLevel = 'Suspicious' | 'Malicious';

export interface Finding {
  /** Canonical `YYYY-MM-DD HH:MM:SS`, or null when unresolved */
  timestamp: string | null;
  deviceName: string | null;
  account: string | null;
  eventDescription: string;
  artifactType: string;
  eventId: string | null;
  analyst: string;
  comments: string;
  level: FindingLevel;
}

export const TIMELINE_COLUMNS = [
  'Timestamp',
  'Device Name',
  'Account',
  'Event',
  'Artifact',
  'Event ID',
  'Analyst',
  'Comments',
  'Level',
] as const;

export type TimelineColumn = (typeof TIMELINE_COLUMNS)[number];

/** Serialized timeline row; absent values are empty strings. */
export type TimelineRow = Record<TimelineColumn, string>;

// --- Summaries ---

export interface MatchSummary {
  totalMatches: number;
  bySource: Record<string, number>;
  byIndicatorKind: Partial<Record<IndicatorKind, number>>;
  byIndicator: Record<string, number>;
}

export interface AnomalySummary {
  totalAnomalies: number;
  bySource: Record<string, number>;
  byRuleType: Partial<Record<AnomalyRuleType, number>>;
  bySeverity: Partial<Record<Severity, number>>;
}
