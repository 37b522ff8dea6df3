/**
 * Plain-text case report for reading or attaching to a ticket, plus the
 * terminal table of assessed threats.
 */

import { writeFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import chalk from 'chalk';

import type { Anomaly, MatchSummary } from '../types/findings.js';
import type { AssessedThreat, ThreatAssessment } from '../analysis/threat-analyzer.js';

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

export interface TextReportData {
  /** Local time the report was generated, already formatted */
  generatedAt: string;
  caseTitle: string;
  assessments: readonly ThreatAssessment[];
  anomalies: readonly Anomaly[];
  matchSummary: MatchSummary;
}

/** An assessed threat together with the source it was raised against. */
export interface SourcedThreat extends AssessedThreat {
  source: string;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const REPORT_WIDTH = 80;
const RULE = '='.repeat(REPORT_WIDTH);
const SECTION_RULE = '-'.repeat(REPORT_WIDTH);

const SEVERITY_ORDER: Record<string, number> = { critical: 0, high: 1, medium: 2, low: 3 };

const SEVERITY_COLORS: Record<string, (s: string) => string> = {
  critical: chalk.red,
  high: chalk.redBright,
  medium: chalk.yellow,
  low: chalk.blue,
};

const TABLE_DESCRIPTION_WIDTH = 50;

// ---------------------------------------------------------------------------
// Text report
// ---------------------------------------------------------------------------

/**
 * Render the report: summary counts, numbered anomalies, numbered threats
 * per source, then each source's assessment summary.
 */
export function generateTextReport(data: TextReportData): string {
  const threats = sourcedThreats(data.assessments);
  const lines: string[] = [
    RULE,
    'CASETRACE FORENSIC ANALYSIS REPORT',
    RULE,
    `Case: ${data.caseTitle}`,
    `Generated: ${data.generatedAt}`,
    '',
    'SUMMARY',
    SECTION_RULE,
    `Sources Analyzed: ${data.assessments.length}`,
    `Pattern-based Anomalies: ${data.anomalies.length}`,
    `IOC Matches: ${data.matchSummary.totalMatches}`,
    `Assessed Threats: ${threats.length}`,
    '',
  ];

  if (data.anomalies.length > 0) {
    lines.push('PATTERN-BASED ANOMALIES', SECTION_RULE);
    data.anomalies.forEach((anomaly, i) => {
      lines.push(
        `${i + 1}. [${anomaly.severity.toUpperCase()}] ${anomaly.description}`,
        `   Source: ${anomaly.source}`,
        `   Column: ${anomaly.column}`,
        `   Row: ${anomaly.rowIndex}`,
        `   Value: ${anomaly.value}`,
        '',
      );
    });
  }

  if (threats.length > 0) {
    lines.push('ASSESSED THREATS', SECTION_RULE);
    threats.forEach((threat, i) => {
      lines.push(
        `${i + 1}. [${threat.severity.toUpperCase()}] ${threat.type}`,
        `   Source: ${threat.source}`,
        `   Description: ${threat.description || 'No description'}`,
      );
      if (threat.indicators.length > 0) {
        lines.push(`   Indicators: ${threat.indicators.join(', ')}`);
      }
      if (threat.recommendation) {
        lines.push(`   Recommendation: ${threat.recommendation}`);
      }
      lines.push('');
    });
  }

  lines.push('DETAILED ANALYSIS', SECTION_RULE);
  for (const assessment of data.assessments) {
    lines.push(
      `Source: ${assessment.source}`,
      `Mode: ${assessment.mode}`,
      `Confidence: ${assessment.confidence}`,
      `Summary: ${assessment.summary || 'No summary available'}`,
      '',
    );
  }

  lines.push(RULE);
  return lines.join('\n');
}

export function writeTextReport(data: TextReportData, outputPath: string): void {
  mkdirSync(dirname(outputPath), { recursive: true });
  writeFileSync(outputPath, generateTextReport(data), 'utf-8');
}

// ---------------------------------------------------------------------------
// Threat table
// ---------------------------------------------------------------------------

/** Flatten assessments into threats tagged with their source, in source order. */
export function sourcedThreats(assessments: readonly ThreatAssessment[]): SourcedThreat[] {
  return assessments.flatMap(a => a.threats.map(threat => ({ ...threat, source: a.source })));
}

/**
 * Terminal table of threats, most severe first. Ties keep source order.
 * Descriptions are cut to 50 characters.
 */
export function formatThreatTable(threats: readonly SourcedThreat[]): string {
  if (threats.length === 0) return chalk.green('✓ No threats detected');

  const sorted = [...threats].sort(
    (a, b) => (SEVERITY_ORDER[a.severity] ?? 4) - (SEVERITY_ORDER[b.severity] ?? 4),
  );
  const sourceWidth = Math.max('Source'.length, ...sorted.map(t => t.source.length));
  const typeWidth = Math.max('Type'.length, ...sorted.map(t => t.type.length));
  const severityWidth = Math.max('Severity'.length, ...sorted.map(t => t.severity.length));

  const header = [
    'Source'.padEnd(sourceWidth),
    'Type'.padEnd(typeWidth),
    'Severity'.padEnd(severityWidth),
    'Description',
  ].join('  ');

  const rows = sorted.map(t => {
    const color = SEVERITY_COLORS[t.severity] ?? chalk.white;
    return [
      chalk.cyan(t.source.padEnd(sourceWidth)),
      t.type.padEnd(typeWidth),
      color(t.severity.toUpperCase().padEnd(severityWidth)),
      t.description.slice(0, TABLE_DESCRIPTION_WIDTH),
    ].join('  ');
  });

  return [chalk.bold.magenta('Detected Threats'), chalk.bold(header), ...rows].join('\n');
}

export function printThreatTable(threats: readonly SourcedThreat[]): void {
  console.log(formatThreatTable(threats));
}
