/**
 * Unit tests for the text reporter.
 *
 * Tests: generateTextReport, writeTextReport, sourcedThreats, formatThreatTable
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { writeFileSync, mkdirSync } from 'fs';
import {
  formatThreatTable,
  generateTextReport,
  sourcedThreats,
  writeTextReport,
  type TextReportData,
} from '@/reporting/text-reporter.js';
import type { ThreatAssessment } from '@/analysis/threat-analyzer.js';

vi.mock('fs', async () => {
  const actual = await vi.importActual('fs');
  return {
    ...actual,
    writeFileSync: vi.fn(),
    mkdirSync: vi.fn(),
  };
});

// ---------------------------------------------------------------------------
// Fixture Builders
// ---------------------------------------------------------------------------

const ASSESSMENTS: ThreatAssessment[] = [
  {
    source: 'process_list',
    threats: [
      {
        type: 'malware',
        severity: 'high',
        description: 'Payload staged in temp',
        indicators: ['payload.exe'],
        recommendation: 'Isolate WS01',
      },
    ],
    summary: 'Staged payload',
    confidence: 'high',
    mode: 'ai',
  },
  {
    source: 'network_connections',
    threats: [
      { type: 'c2', severity: 'critical', description: 'Beacon to 203.0.113.7', indicators: [] },
    ],
    summary: '',
    confidence: 'low',
    mode: 'rule-based',
  },
];

function makeData(overrides?: Partial<TextReportData>): TextReportData {
  return {
    generatedAt: '2024-03-15T12:00:00.000Z',
    caseTitle: 'Ransomware: /cases/ir-042',
    assessments: ASSESSMENTS,
    anomalies: [
      {
        source: 'process_list',
        ruleType: 'suspicious_extension',
        severity: 'medium',
        column: 'command_line',
        value: 'c:\\temp\\payload.exe',
        rowIndex: 0,
        description: 'Found suspicious extension .exe in command_line',
        pattern: '.exe',
      },
    ],
    matchSummary: { totalMatches: 2, bySource: {}, byIndicatorKind: {}, byIndicator: {} },
    ...overrides,
  };
}

function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\u001b\[\d+(;\d+)*m/g, '');
}

const RULE = '='.repeat(80);
const SECTION = '-'.repeat(80);

// ---------------------------------------------------------------------------
// generateTextReport
// ---------------------------------------------------------------------------

describe('generateTextReport', () => {
  it('lists summary, numbered anomalies, threats and per-source analysis', () => {
    expect(generateTextReport(makeData()).split('\n')).toEqual([
      RULE,
      'CASETRACE FORENSIC ANALYSIS REPORT',
      RULE,
      'Case: Ransomware: /cases/ir-042',
      'Generated: 2024-03-15T12:00:00.000Z',
      '',
      'SUMMARY',
      SECTION,
      'Sources Analyzed: 2',
      'Pattern-based Anomalies: 1',
      'IOC Matches: 2',
      'Assessed Threats: 2',
      '',
      'PATTERN-BASED ANOMALIES',
      SECTION,
      '1. [MEDIUM] Found suspicious extension .exe in command_line',
      '   Source: process_list',
      '   Column: command_line',
      '   Row: 0',
      '   Value: c:\\temp\\payload.exe',
      '',
      'ASSESSED THREATS',
      SECTION,
      '1. [HIGH] malware',
      '   Source: process_list',
      '   Description: Payload staged in temp',
      '   Indicators: payload.exe',
      '   Recommendation: Isolate WS01',
      '',
      '2. [CRITICAL] c2',
      '   Source: network_connections',
      '   Description: Beacon to 203.0.113.7',
      '',
      'DETAILED ANALYSIS',
      SECTION,
      'Source: process_list',
      'Mode: ai',
      'Confidence: high',
      'Summary: Staged payload',
      '',
      'Source: network_connections',
      'Mode: rule-based',
      'Confidence: low',
      'Summary: No summary available',
      '',
      RULE,
    ]);
  });

  it('leaves out the anomaly and threat sections when there are none', () => {
    const lines = generateTextReport(makeData({ assessments: [], anomalies: [] })).split('\n');

    expect(lines).not.toContain('PATTERN-BASED ANOMALIES');
    expect(lines).not.toContain('ASSESSED THREATS');
    expect(lines.slice(-3)).toEqual(['DETAILED ANALYSIS', SECTION, RULE]);
  });
});

describe('writeTextReport', () => {
  beforeEach(() => {
    vi.mocked(writeFileSync).mockReset();
    vi.mocked(mkdirSync).mockReset();
  });

  it('creates the directory and writes the rendered report', () => {
    const data = makeData();
    writeTextReport(data, '/cases/out/report.txt');

    expect(mkdirSync).toHaveBeenCalledWith('/cases/out', { recursive: true });
    expect(writeFileSync).toHaveBeenCalledWith('/cases/out/report.txt', generateTextReport(data), 'utf-8');
  });
});

// ---------------------------------------------------------------------------
// Threat table
// ---------------------------------------------------------------------------

describe('sourcedThreats', () => {
  it('tags each threat with its source in source order', () => {
    expect(sourcedThreats(ASSESSMENTS).map(t => [t.source, t.type])).toEqual([
      ['process_list', 'malware'],
      ['network_connections', 'c2'],
    ]);
  });
});

describe('formatThreatTable', () => {
  it('orders rows by severity and aligns columns', () => {
    const lines = stripAnsi(formatThreatTable(sourcedThreats(ASSESSMENTS))).split('\n');

    expect(lines).toEqual([
      'Detected Threats',
      `${'Source'.padEnd(19)}  Type     Severity  Description`,
      'network_connections  c2       CRITICAL  Beacon to 203.0.113.7',
      `${'process_list'.padEnd(19)}  malware  HIGH      Payload staged in temp`,
    ]);
  });

  it('cuts descriptions to 50 characters', () => {
    const table = stripAnsi(
      formatThreatTable([
        { source: 'x', type: 't', severity: 'low', description: 'd'.repeat(60), indicators: [] },
      ]),
    );
    expect(table.split('\n')[2]).toBe(`x       t     LOW       ${'d'.repeat(50)}`);
  });

  it('reports when there is nothing to show', () => {
    expect(stripAnsi(formatThreatTable([]))).toBe('✓ No threats detected');
  });
});
