/**
 * Tests for per-source threat assessment.
 */

import { describe, it, expect, vi } from 'vitest';
import {
  ThreatAnalyzer,
  collectThreats,
  ruleBasedAssessment,
  type ThreatAssessment,
} from '@/analysis/threat-analyzer.js';
import { createDatasetFromTable, createRecordStore } from '@/ingestion/record-store.js';
import type { InferenceResult, PromptClient } from '@/ai/client.js';

const fileListing = createDatasetFromTable(
  'file_listing',
  ['Path', 'Size'],
  [['C:\\Users\\alice\\AppData\\Local\\Temp\\stage.bin', 2048]],
);

const logons = createDatasetFromTable('security_log', ['User', 'Host'], [['alice', 'WS01']]);

function reply(content: string): InferenceResult {
  return {
    content,
    usage: {
      operation: 'inference',
      model: 'test-model',
      inputTokens: 10,
      outputTokens: 5,
      costUsd: 0,
      durationMs: 1,
      timestamp: '2024-03-15T10:00:00.000Z',
    },
  };
}

describe('ruleBasedAssessment', () => {
  it('flags temporary directory usage', () => {
    expect(ruleBasedAssessment(fileListing)).toEqual({
      source: 'file_listing',
      threats: [
        {
          type: 'file_anomaly',
          severity: 'medium',
          description: 'Files in temporary directories detected',
          indicators: ['temp directory usage'],
          recommendation: 'Review files in temporary directories',
        },
      ],
      summary: 'Rule-based analysis completed. Enable AI analysis for a deeper review.',
      confidence: 'low',
      mode: 'rule-based',
    });
  });

  it('reports no threats for other data', () => {
    expect(ruleBasedAssessment(logons).threats).toEqual([]);
  });
});

describe('ThreatAnalyzer', () => {
  it('uses the rule-based assessment without a client', async () => {
    const assessment = await new ThreatAnalyzer().analyzeDataset(fileListing);
    expect(assessment.mode).toBe('rule-based');
  });

  it('returns the model assessment on success', async () => {
    const prompt = vi.fn<PromptClient['prompt']>().mockResolvedValue(
      reply('```json\n{"threats": [{"type": "malware", "severity": "Critical", "description": "Dropper in temp"}], "summary": "Dropper staged", "confidence": "high"}\n```'),
    );

    const assessment = await new ThreatAnalyzer({ client: { prompt } }).analyzeDataset(fileListing, {
      caseType: 'Ransomware',
    });

    expect(assessment).toEqual({
      source: 'file_listing',
      threats: [{ type: 'malware', severity: 'critical', description: 'Dropper in temp', indicators: [] }],
      summary: 'Dropper staged',
      confidence: 'high',
      mode: 'ai',
    });
    expect(prompt).toHaveBeenCalledWith(
      expect.any(String),
      expect.stringContaining('Case Type: Ransomware'),
      { model: 'standard', jsonMode: true, operation: 'threat-assessment' },
    );
  });

  it('falls back to rules when the model answer is unusable', async () => {
    const prompt = vi.fn<PromptClient['prompt']>().mockResolvedValue(reply('{"threats": "none"}'));

    const assessment = await new ThreatAnalyzer({ client: { prompt } }).analyzeDataset(fileListing);

    expect(assessment.mode).toBe('rule-based');
    expect(assessment.threats).toHaveLength(1);
  });

  it('assesses every source in store order', async () => {
    const prompt = vi.fn<PromptClient['prompt']>().mockResolvedValue(reply('{"threats": [], "confidence": "medium"}'));
    const store = createRecordStore([logons, fileListing]);

    const assessments = await new ThreatAnalyzer({ client: { prompt }, model: 'quality' }).analyzeAll(store);

    expect(assessments.map(a => a.source)).toEqual(['security_log', 'file_listing']);
    expect(prompt.mock.calls[0][1]).toContain('Data Source: security_log');
    expect(prompt.mock.calls[1][2]).toEqual({ model: 'quality', jsonMode: true, operation: 'threat-assessment' });
  });
});

describe('collectThreats', () => {
  it('tags each threat with its source', () => {
    const assessments: ThreatAssessment[] = [
      ruleBasedAssessment(logons),
      ruleBasedAssessment(fileListing),
    ];

    expect(collectThreats(assessments)).toEqual([
      {
        type: 'file_anomaly',
        severity: 'medium',
        description: 'Files in temporary directories detected',
        indicators: ['temp directory usage'],
        recommendation: 'Review files in temporary directories',
        source: 'file_listing',
      },
    ]);
  });
});
