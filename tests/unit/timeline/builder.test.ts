/**
 * Tests for TimelineBuilder ordering and finalization.
 */

import { describe, it, expect } from 'vitest';
import { TimelineBuilder, toTimelineRows } from '@/timeline/builder.js';
import { createDatasetFromTable, createRecordStore } from '@/ingestion/record-store.js';
import { TimelineFinalizedError } from '@/utils/errors.js';
import type { Finding, Match } from '@/types/findings.js';

function finding(timestamp: string | null, eventDescription: string): Finding {
  return {
    timestamp,
    deviceName: null,
    account: null,
    eventDescription,
    artifactType: 'Process List',
    eventId: null,
    analyst: 'Analyst A',
    comments: '',
    level: 'Suspicious',
  };
}

describe('TimelineBuilder', () => {
  it('sorts dated findings and keeps ties in insertion order', () => {
    const timeline = new TimelineBuilder({ analyst: 'Analyst A' })
      .addFinding(finding('2024-03-15 10:00:00', 'b'))
      .addFinding(finding('2024-03-14 09:00:00', 'a'))
      .addFinding(finding(null, 'u'))
      .addFinding(finding('2024-03-15 10:00:00', 'c'))
      .finalize();

    expect(timeline.map(f => f.eventDescription)).toEqual(['a', 'b', 'c', 'u']);
  });

  it('appends undated findings in insertion order', () => {
    const timeline = new TimelineBuilder({ analyst: 'Analyst A' })
      .addFinding(finding(null, 'u1'))
      .addFinding(finding('2024-01-01 00:00:00', 'd'))
      .addFinding(finding(null, 'u2'))
      .finalize();

    expect(timeline.map(f => f.eventDescription)).toEqual(['d', 'u1', 'u2']);
  });

  it('canonicalizes recognizable timestamps', () => {
    const [only] = new TimelineBuilder({ analyst: 'Analyst A' })
      .addFinding(finding('03/15/2024 10:22:05', 'x'))
      .finalize();

    expect(only.timestamp).toBe('2024-03-15 10:22:05');
  });

  it('moves unparseable timestamps to the undated tail', () => {
    const timeline = new TimelineBuilder({ analyst: 'Analyst A' })
      .addFinding(finding('not a date', 'bad'))
      .addFinding(finding('2024-01-01 00:00:00', 'good'))
      .finalize();

    expect(timeline.map(f => [f.eventDescription, f.timestamp])).toEqual([
      ['good', '2024-01-01 00:00:00'],
      ['bad', null],
    ]);
  });

  it('does not de-duplicate', () => {
    const same = finding('2024-01-01 00:00:00', 'dup');
    const timeline = new TimelineBuilder({ analyst: 'Analyst A' })
      .addFinding(same)
      .addFinding(same)
      .finalize();

    expect(timeline).toHaveLength(2);
  });

  it('returns the same frozen timeline on repeated finalize', () => {
    const builder = new TimelineBuilder({ analyst: 'Analyst A' }).addFinding(finding(null, 'x'));
    const first = builder.finalize();

    expect(builder.finalize()).toBe(first);
    expect(Object.isFrozen(first)).toBe(true);
    expect(builder.isFinalized).toBe(true);
  });

  it('freezes findings supplied by the caller without touching the original', () => {
    const supplied = finding(null, 'external');
    const [stored] = new TimelineBuilder({ analyst: 'Analyst A' }).addFinding(supplied).finalize();

    expect(Object.isFrozen(stored)).toBe(true);
    expect(stored).toEqual(supplied);
    expect(Object.isFrozen(supplied)).toBe(false);
  });

  it('rejects additions after finalize', () => {
    const builder = new TimelineBuilder({ analyst: 'Analyst A' });
    builder.finalize();

    expect(() => builder.addFinding(finding(null, 'late'))).toThrow(TimelineFinalizedError);
  });

  it('finalizes an empty builder to an empty timeline', () => {
    expect(new TimelineBuilder({ analyst: 'Analyst A' }).finalize()).toEqual([]);
  });

  it('resolves datasets from the store when adding matches', () => {
    const dataset = createDatasetFromTable(
      'process_list',
      ['Created', 'Hostname', 'Name'],
      [['2024-03-15 10:22:05', 'WS01', 'payload.exe']],
    );
    const matches: Match[] = [
      {
        source: 'process_list',
        indicator: 'payload.exe',
        indicatorKind: 'executable',
        matchKind: 'exact',
        column: 'name',
        rowIndex: 0,
        matchedValue: 'payload.exe',
        fullRow: {},
      },
    ];

    const builder = new TimelineBuilder({ analyst: 'Analyst A' });
    builder.addMatches(matches, createRecordStore([dataset]));
    const [entry] = builder.finalize();

    expect(builder.size).toBe(1);
    expect(entry).toMatchObject({
      timestamp: '2024-03-15 10:22:05',
      deviceName: 'WS01',
      artifactType: 'Process List',
      analyst: 'Analyst A',
    });
  });
});

describe('toTimelineRows', () => {
  it('maps findings to timeline columns with empty strings for absent values', () => {
    expect(toTimelineRows([finding(null, 'x')])).toEqual([
      {
        'Timestamp': '',
        'Device Name': '',
        'Account': '',
        'Event': 'x',
        'Artifact': 'Process List',
        'Event ID': '',
        'Analyst': 'Analyst A',
        'Comments': '',
        'Level': 'Suspicious',
      },
    ]);
  });
});
