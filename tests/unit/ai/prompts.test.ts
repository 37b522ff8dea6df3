/**
 * Tests for prompt builders.
 */

import { describe, it, expect } from 'vitest';
import { buildThreatIntelPrompt } from '@/ai/prompts/threat-intel.js';
import {
  buildThreatAssessmentPrompt,
  formatCaseContext,
  formatDatasetSummary,
  formatSampleRows,
} from '@/ai/prompts/threat-assessment.js';
import { createDatasetFromTable } from '@/ingestion/record-store.js';

const processList = createDatasetFromTable(
  'process_list',
  ['PID', 'Name', 'Parent'],
  [
    [4242, 'payload.exe', null],
    [1337, 'notepad.exe', 'explorer.exe'],
  ],
);

describe('buildThreatIntelPrompt', () => {
  it('names the actor in the request and the JSON template', () => {
    const { system, user } = buildThreatIntelPrompt('APT-Test');

    expect(system).toContain('Respond with a single JSON object');
    expect(user.startsWith('Threat actor group: APT-Test\n')).toBe(true);
    expect(user).toContain('"threat_actor": "APT-Test"');
  });
});

describe('formatCaseContext', () => {
  it('has a placeholder for an empty context', () => {
    expect(formatCaseContext({})).toBe('No specific case context provided.');
  });

  it('lists case type, actor, indicators and TTPs', () => {
    const text = formatCaseContext({
      caseType: 'Ransomware',
      threatActor: 'APT-Test',
      indicators: ['evil.com', '203.0.113.7'],
      ttps: [{ tactic: 'Execution', technique: 'T1059', description: 'PowerShell loaders' }],
    });

    expect(text).toBe(
      [
        'Case Type: Ransomware',
        'Threat Actor Group: APT-Test',
        'Known IOCs to search for: evil.com, 203.0.113.7',
        'Known TTPs: 1 TTP(s) associated with threat actor',
        '  - T1059: PowerShell loaders',
      ].join('\n'),
    );
  });

  it('caps long indicator lists', () => {
    const indicators = Array.from({ length: 23 }, (_, i) => `ioc${i}`);
    const lines = formatCaseContext({ indicators }).split('\n');

    expect(lines[0].split(', ')).toHaveLength(20);
    expect(lines[1]).toBe('... and 3 more IOCs');
  });

  it('shows at most five TTPs', () => {
    const ttps = Array.from({ length: 7 }, (_, i) => ({
      tactic: 'Execution',
      technique: `T100${i}`,
      description: 'd',
    }));
    const lines = formatCaseContext({ ttps }).split('\n');

    expect(lines[0]).toBe('Known TTPs: 7 TTP(s) associated with threat actor');
    expect(lines).toHaveLength(6);
  });
});

describe('formatSampleRows', () => {
  it('renders a pipe-separated table with empty nulls', () => {
    expect(formatSampleRows(processList)).toBe(
      ['pid | name | parent', '4242 | payload.exe | ', '1337 | notepad.exe | explorer.exe'].join('\n'),
    );
  });

  it('respects the row limit', () => {
    expect(formatSampleRows(processList, 1).split('\n')).toHaveLength(2);
  });
});

describe('formatDatasetSummary', () => {
  it('describes the dataset shape', () => {
    expect(formatDatasetSummary(processList)).toBe(
      'Rows: 2\nColumns: 3\nColumn names: pid, name, parent',
    );
  });
});

describe('buildThreatAssessmentPrompt', () => {
  it('embeds the source, summary, sample and context', () => {
    const { user } = buildThreatAssessmentPrompt(processList, { caseType: 'Insider' });

    expect(user).toContain('Data Source: process_list');
    expect(user).toContain('Case Type: Insider');
    expect(user).toContain('4242 | payload.exe | ');
    expect(user).toContain('consistent with the case type (Insider)');
  });

  it('falls back to a general case type', () => {
    const { user } = buildThreatAssessmentPrompt(processList, {});
    expect(user).toContain('consistent with the case type (general)');
  });
});
