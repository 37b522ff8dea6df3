/**
 * Unit tests for the timeline CSV writer.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { writeFileSync, mkdirSync } from 'fs';
import {
  escapeCsvField,
  generateTimelineCsv,
  writeTimelineCsv,
} from '@/reporting/timeline-csv.js';
import type { Finding } from '@/types/findings.js';

vi.mock('fs', async () => {
  const actual = await vi.importActual('fs');
  return {
    ...actual,
    writeFileSync: vi.fn(),
    mkdirSync: vi.fn(),
  };
});

const HEADER = 'Timestamp,Device Name,Account,Event,Artifact,Event ID,Analyst,Comments,Level';

function makeFinding(overrides?: Partial<Finding>): Finding {
  return {
    timestamp: '2024-03-15 10:22:05',
    deviceName: 'WS01',
    account: 'alice',
    eventDescription: 'IOC Match: payload.exe found in name: payload.exe',
    artifactType: 'Process List',
    eventId: null,
    analyst: 'Analyst A',
    comments: 'Matched IOC (executable) in name',
    level: 'Suspicious',
    ...overrides,
  };
}

describe('escapeCsvField', () => {
  it('leaves plain values alone', () => {
    expect(escapeCsvField('payload.exe')).toBe('payload.exe');
    expect(escapeCsvField('')).toBe('');
  });

  it('quotes values with commas, quotes or line breaks', () => {
    expect(escapeCsvField('a,b')).toBe('"a,b"');
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvField('two\nlines')).toBe('"two\nlines"');
    expect(escapeCsvField('cr\rhere')).toBe('"cr\rhere"');
  });
});

describe('generateTimelineCsv', () => {
  it('writes only the header for an empty timeline', () => {
    expect(generateTimelineCsv([])).toBe(`${HEADER}\n`);
  });

  it('writes one line per finding with empty absent values', () => {
    const csv = generateTimelineCsv([makeFinding()]);

    expect(csv).toBe(
      `${HEADER}\n` +
        '2024-03-15 10:22:05,WS01,alice,IOC Match: payload.exe found in name: payload.exe,Process List,,Analyst A,Matched IOC (executable) in name,Suspicious\n',
    );
  });

  it('escapes fields that need quoting', () => {
    const csv = generateTimelineCsv([
      makeFinding({
        timestamp: null,
        eventDescription: 'IOC Match: 203.0.113.7 found in message: logon from 203.0.113.7, type 3',
        comments: 'Reset credentials Indicators: alice, WS01',
      }),
    ]);
    const [, line] = csv.split('\n');

    expect(line).toBe(
      ',WS01,alice,"IOC Match: 203.0.113.7 found in message: logon from 203.0.113.7, type 3",Process List,,Analyst A,"Reset credentials Indicators: alice, WS01",Suspicious',
    );
  });
});

describe('writeTimelineCsv', () => {
  beforeEach(() => {
    vi.mocked(writeFileSync).mockReset();
    vi.mocked(mkdirSync).mockReset();
  });

  it('creates the parent directory and writes the CSV', () => {
    writeTimelineCsv([makeFinding()], '/cases/out/timeline.csv');

    expect(mkdirSync).toHaveBeenCalledWith('/cases/out', { recursive: true });
    expect(writeFileSync).toHaveBeenCalledWith(
      '/cases/out/timeline.csv',
      generateTimelineCsv([makeFinding()]),
      'utf-8',
    );
  });
});
