/**
 * Terminal summary box for a CaseTrace run, drawn with box-drawing
 * characters and chalk colors.
 */

import chalk from 'chalk';

import type { AnomalySummary, MatchSummary } from '../types/findings.js';

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

export interface SummaryData {
  caseTitle: string;
  processingTimeMs: number;
  sources: {
    count: number;
    rows: number;
  };
  anomalies: AnomalySummary;
  matches: MatchSummary;
  threats: number;
  timeline: {
    total: number;
    dated: number;
    malicious: number;
  };
  cost?: {
    totalUsd: number;
    totalTokens: number;
  };
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Fixed width of the summary box interior (between the box edges). */
const BOX_WIDTH = 56;

const TOP = `╔${''.padStart(BOX_WIDTH, '═')}╗`;
const SEPARATOR = `╠${''.padStart(BOX_WIDTH, '═')}╣`;
const BOTTOM = `╚${''.padStart(BOX_WIDTH, '═')}╝`;

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Format the run summary as a colorized box.
 *
 * Counts that point at something to review (matches, high-severity
 * anomalies, threats, malicious findings) are shown in red when non-zero.
 */
export function formatSummary(data: SummaryData): string {
  const lines: string[] = [];

  lines.push(chalk.cyan(TOP));
  lines.push(formatCenteredLine('CaseTrace Analysis Summary'));
  lines.push(chalk.cyan(SEPARATOR));

  lines.push(formatLine(`Case: ${truncate(data.caseTitle, BOX_WIDTH - 8)}`));
  lines.push(formatLine(`Processing Time: ${formatDuration(data.processingTimeMs)}`));
  lines.push(
    formatLine(`Sources: ${data.sources.count}  │  Rows: ${formatNumber(data.sources.rows)}`),
  );

  lines.push(chalk.cyan(SEPARATOR));
  lines.push(formatSectionHeader('ANOMALIES'));
  const highAnomalies = (data.anomalies.bySeverity.critical ?? 0) + (data.anomalies.bySeverity.high ?? 0);
  lines.push(
    formatLineRaw(
      `  Total: ${data.anomalies.totalAnomalies}  │  High: ${alertCount(highAnomalies)}  │  Medium: ${data.anomalies.bySeverity.medium ?? 0}`,
    ),
  );

  lines.push(chalk.cyan(SEPARATOR));
  lines.push(formatSectionHeader('IOC MATCHES'));
  lines.push(
    formatLineRaw(
      `  Total: ${alertCount(data.matches.totalMatches)}  │  Sources: ${Object.keys(data.matches.bySource).length}  │  Indicators: ${Object.keys(data.matches.byIndicator).length}`,
    ),
  );

  lines.push(chalk.cyan(SEPARATOR));
  lines.push(formatSectionHeader('TIMELINE'));
  lines.push(
    formatLineRaw(
      `  Findings: ${data.timeline.total}  │  Dated: ${data.timeline.dated}  │  Malicious: ${alertCount(data.timeline.malicious)}`,
    ),
  );
  lines.push(formatLineRaw(`  Threats: ${alertCount(data.threats)}`));

  if (data.cost) {
    lines.push(chalk.cyan(SEPARATOR));
    lines.push(formatSectionHeader('COST'));
    lines.push(
      formatLine(
        `  Total: $${data.cost.totalUsd.toFixed(3)}  │  Tokens: ${formatNumber(data.cost.totalTokens)}`,
      ),
    );
  }

  lines.push(chalk.cyan(BOTTOM));
  return lines.join('\n');
}

export function printSummary(data: SummaryData): void {
  console.log(formatSummary(data));
}

// ---------------------------------------------------------------------------
// Formatting Helpers
// ---------------------------------------------------------------------------

function formatLine(text: string): string {
  const padded = text.padEnd(BOX_WIDTH - 2);
  return `${chalk.cyan('║')} ${padded} ${chalk.cyan('║')}`;
}

/**
 * Format a line that may contain chalk-colored segments. Padding is
 * computed from the visible length, without ANSI escapes.
 */
function formatLineRaw(text: string): string {
  const visibleLen = stripAnsi(text).length;
  const paddingNeeded = BOX_WIDTH - 2 - visibleLen;
  const padding = paddingNeeded > 0 ? ' '.repeat(paddingNeeded) : '';
  return `${chalk.cyan('║')} ${text}${padding} ${chalk.cyan('║')}`;
}

function formatCenteredLine(text: string): string {
  const totalPadding = BOX_WIDTH - 2 - text.length;
  const leftPad = Math.floor(totalPadding / 2);
  const padded = ' '.repeat(leftPad) + text + ' '.repeat(totalPadding - leftPad);
  return `${chalk.cyan('║')} ${chalk.bold.white(padded)} ${chalk.cyan('║')}`;
}

function formatSectionHeader(text: string): string {
  const padded = text.padEnd(BOX_WIDTH - 2);
  return `${chalk.cyan('║')} ${chalk.cyan.bold(padded)} ${chalk.cyan('║')}`;
}

/** Red when there is something to review, green otherwise. */
function alertCount(n: number): string {
  return n > 0 ? chalk.red(String(n)) : chalk.green(String(n));
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

function formatNumber(n: number): string {
  return n.toLocaleString('en-US');
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1b\[[0-9;]*m/g, '');
}
