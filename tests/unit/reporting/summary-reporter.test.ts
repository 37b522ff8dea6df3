/**
 * Unit tests for the summary reporter.
 *
 * Tests: formatSummary, printSummary, formatDuration
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  formatDuration,
  formatSummary,
  printSummary,
  type SummaryData,
} from '@/reporting/summary-reporter.js';

// ---------------------------------------------------------------------------
// Fixture Builders
// ---------------------------------------------------------------------------

function makeSummaryData(overrides?: Partial<SummaryData>): SummaryData {
  return {
    caseTitle: 'IR-042 Ransomware',
    processingTimeMs: 45200,
    sources: { count: 3, rows: 1234 },
    anomalies: {
      totalAnomalies: 11,
      bySource: { process_list: 9, network_connections: 2 },
      byRuleType: { suspicious_extension: 6, suspicious_keyword: 2, suspicious_path: 3 },
      bySeverity: { medium: 9, high: 2 },
    },
    matches: {
      totalMatches: 5,
      bySource: { process_list: 2, network_connections: 2, security_event_log: 1 },
      byIndicatorKind: { executable: 3, ip_address: 2 },
      byIndicator: { 'payload.exe': 3, '203.0.113.7': 2 },
    },
    threats: 0,
    timeline: { total: 16, dated: 16, malicious: 0 },
    ...overrides,
  };
}

function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\u001b\[\d+(;\d+)*m/g, '');
}

function plainLines(data: SummaryData): string[] {
  return stripAnsi(formatSummary(data)).split('\n');
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('formatSummary', () => {
  it('draws every line at the same width', () => {
    for (const line of plainLines(makeSummaryData({ cost: { totalUsd: 0.0123, totalTokens: 15000 } }))) {
      expect(line).toHaveLength(58);
    }
  });

  it('shows the case header', () => {
    const lines = plainLines(makeSummaryData());

    expect(lines[1]).toBe(`║${' '.repeat(15)}CaseTrace Analysis Summary${' '.repeat(15)}║`);
    expect(lines.some(l => l.includes('Case: IR-042 Ransomware'))).toBe(true);
    expect(lines.some(l => l.includes('Processing Time: 45.2s'))).toBe(true);
    expect(lines.some(l => l.includes('Sources: 3  │  Rows: 1,234'))).toBe(true);
  });

  it('summarizes anomalies, matches and the timeline', () => {
    const lines = plainLines(makeSummaryData());

    expect(lines).toContain(`║   Total: 11  │  High: 2  │  Medium: 9${' '.repeat(17)} ║`);
    expect(lines.some(l => l.includes('Total: 5  │  Sources: 3  │  Indicators: 2'))).toBe(true);
    expect(lines.some(l => l.includes('Findings: 16  │  Dated: 16  │  Malicious: 0'))).toBe(true);
    expect(lines.some(l => l.includes('Threats: 0'))).toBe(true);
  });

  it('adds the cost section only when cost is known', () => {
    expect(plainLines(makeSummaryData()).some(l => l.includes('COST'))).toBe(false);

    const lines = plainLines(makeSummaryData({ cost: { totalUsd: 0.0123, totalTokens: 15000 } }));
    expect(lines.some(l => l.includes('Total: $0.012  │  Tokens: 15,000'))).toBe(true);
  });

  it('truncates long case titles', () => {
    const lines = plainLines(makeSummaryData({ caseTitle: 'x'.repeat(80) }));
    expect(lines.some(l => l.includes(`Case: ${'x'.repeat(45)}...`))).toBe(true);
  });
});

describe('printSummary', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes the formatted box to stdout', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const data = makeSummaryData();

    printSummary(data);

    expect(spy).toHaveBeenCalledWith(formatSummary(data));
  });
});

describe('formatDuration', () => {
  it('uses milliseconds below one second', () => {
    expect(formatDuration(850)).toBe('850ms');
  });

  it('uses seconds with one decimal above', () => {
    expect(formatDuration(45200)).toBe('45.2s');
    expect(formatDuration(1000)).toBe('1.0s');
  });
});
