/**
 * Tests for AI response parser with Zod validation.
 */

import { describe, it, expect } from 'vitest';
import {
  extractJsonFromResponse,
  parseThreatAssessmentResponse,
  parseThreatIntelResponse,
  ThreatSchema,
} from '@/ai/response-parser.js';

describe('extractJsonFromResponse', () => {
  it('should extract raw JSON', () => {
    expect(extractJsonFromResponse('{"key": "value"}')).toEqual({ key: 'value' });
  });

  it('should extract JSON from a markdown code block', () => {
    expect(extractJsonFromResponse('```json\n{"key": "value"}\n```')).toEqual({ key: 'value' });
    expect(extractJsonFromResponse('```\n{"key": "value"}\n```')).toEqual({ key: 'value' });
  });

  it('should ignore prose around the object', () => {
    const raw = 'Here is the assessment:\n{"outer": {"inner": 1}}\n\nLet me know if you need more.';
    expect(extractJsonFromResponse(raw)).toEqual({ outer: { inner: 1 } });
  });

  it('should drop trailing commas', () => {
    expect(extractJsonFromResponse('{"a": [1, 2,],}')).toEqual({ a: [1, 2] });
  });

  it('should close truncated output', () => {
    expect(extractJsonFromResponse('{"threats": [{"type": "c2"')).toEqual({
      threats: [{ type: 'c2' }],
    });
    expect(extractJsonFromResponse('{"summary": "cut off')).toEqual({ summary: 'cut off' });
  });

  it('should throw when there is no JSON at all', () => {
    expect(() => extractJsonFromResponse('no json here')).toThrow();
  });
});

describe('parseThreatAssessmentResponse', () => {
  it('should normalize severities and fill defaults', () => {
    const raw = JSON.stringify({
      threats: [
        { type: 'c2', severity: 'HIGH', description: 'Beaconing', indicators: ['evil.com'] },
        { severity: 'urgent' },
      ],
      summary: 'Outbound beaconing from WS01',
      confidence: 'certain',
    });

    expect(parseThreatAssessmentResponse(raw)).toEqual({
      threats: [
        { type: 'c2', severity: 'high', description: 'Beaconing', indicators: ['evil.com'] },
        { type: 'other', severity: 'medium', description: '', indicators: [] },
      ],
      summary: 'Outbound beaconing from WS01',
      confidence: 'low',
    });
  });

  it('should keep recommendations', () => {
    const raw = '{"threats": [{"type": "persistence", "severity": "low", "recommendation": "Remove run key"}], "confidence": "medium"}';
    const parsed = parseThreatAssessmentResponse(raw);

    expect(parsed.threats[0].recommendation).toBe('Remove run key');
    expect(parsed.confidence).toBe('medium');
    expect(parsed.summary).toBe('');
  });

  it('should reject responses with the wrong shape', () => {
    expect(() => parseThreatAssessmentResponse('{"threats": "none"}')).toThrow(
      'Threat assessment response validation failed',
    );
  });
});

describe('ThreatSchema', () => {
  it('should validate a single threat on its own', () => {
    expect(ThreatSchema.parse({ severity: ' Critical ', description: 'Beaconing' })).toEqual({
      type: 'other',
      severity: 'critical',
      description: 'Beaconing',
      indicators: [],
    });
  });

  it('should fall back to medium for an unknown severity', () => {
    expect(ThreatSchema.parse({ type: 'c2', severity: 'severe' }).severity).toBe('medium');
  });
});

describe('parseThreatIntelResponse', () => {
  it('should default every IOC group', () => {
    const raw = JSON.stringify({
      threat_actor: 'APT-Test',
      ttps: [{ tactic: 'Execution', technique: 'T1059' }],
      iocs: { domains: ['evil.com'] },
    });

    expect(parseThreatIntelResponse(raw)).toEqual({
      threat_actor: 'APT-Test',
      ttps: [{ tactic: 'Execution', technique: 'T1059', description: '' }],
      iocs: {
        ip_addresses: [],
        domains: ['evil.com'],
        file_hashes: [],
        email_addresses: [],
        executables: [],
        registry_keys: [],
        user_agents: [],
        other: [],
      },
      sources: [],
    });
  });

  it('should accept an empty object', () => {
    const parsed = parseThreatIntelResponse('{}');
    expect(parsed.ttps).toEqual([]);
    expect(parsed.iocs.domains).toEqual([]);
  });
});
