/**
 * Machine-readable JSON case report.
 *
 * Carries the full run output: case metadata, per-source shape, the
 * indicators searched for, anomalies and matches with their summaries,
 * threat assessments, the ordered timeline and the API cost.
 */

import { writeFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';

import type { DatasetSummary } from '../types/records.js';
import type {
  Anomaly,
  AnomalySummary,
  ClassifiedIndicator,
  Finding,
  Match,
  MatchSummary,
  Threat,
} from '../types/findings.js';
import type { ThreatAssessment } from '../analysis/threat-analyzer.js';
import type { ThreatIntel } from '../intel/threat-intel.js';

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

export interface CaseReport {
  metadata: {
    generatedAt: string;
    casetraceVersion: string;
    inputDir: string;
    analyst: string;
    caseType?: string;
    threatActor?: string;
    processingTimeMs: number;
  };
  sources: Record<string, DatasetSummary>;
  indicators: {
    provided: string[];
    fromIntel: string[];
    searched: ClassifiedIndicator[];
  };
  intel?: ThreatIntel;
  anomalies: Anomaly[];
  anomalySummary: AnomalySummary;
  matches: Match[];
  matchSummary: MatchSummary;
  assessments: ThreatAssessment[];
  threats: Threat[];
  timeline: readonly Finding[];
  cost: {
    totalUsd: number;
    totalTokens: number;
    requestCount: number;
    byOperation: Record<string, { count: number; costUsd: number }>;
  };
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Pretty-print the case report with 2-space indentation.
 */
export function generateJsonReport(data: CaseReport): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Write the case report to disk, creating parent directories as needed.
 */
export function writeCaseReport(data: CaseReport, outputPath: string): void {
  mkdirSync(dirname(outputPath), { recursive: true });
  writeFileSync(outputPath, generateJsonReport(data), 'utf-8');
}
