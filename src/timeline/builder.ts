/**
 * Timeline Builder — accumulates findings and emits the ordered timeline.
 *
 * Accumulation is append-only and unordered. `finalize()` is terminal:
 *   1. split findings into dated and undated
 *   2. stable-sort the dated ones by time (ties keep insertion order)
 *   3. append the undated ones in insertion order
 *
 * An unparseable date is never coerced into a position; it goes to the
 * undated tail. Findings are not de-duplicated.
 */

import { TimelineFinalizedError } from '../utils/errors.js';
import type { Dataset, RecordStore } from '../types/records.js';
import type { Anomaly, Finding, Match, Threat, TimelineRow } from '../types/findings.js';
import { FindingNormalizer } from './normalizer.js';
import { extractTimestamp, parseCanonicalTimestamp } from './timestamp-extractor.js';

export interface TimelineBuilderOptions {
  analyst: string;
  normalizer?: FindingNormalizer;
}

export class TimelineBuilder {
  readonly normalizer: FindingNormalizer;
  private readonly entries: Finding[] = [];
  private finalized: readonly Finding[] | null = null;

  constructor(options: TimelineBuilderOptions) {
    this.normalizer = options.normalizer ?? new FindingNormalizer({ analyst: options.analyst });
  }

  get size(): number {
    return this.entries.length;
  }

  get isFinalized(): boolean {
    return this.finalized !== null;
  }

  /** Store a frozen copy; the caller's object is left as it was. */
  addFinding(finding: Finding): this {
    if (this.finalized) throw new TimelineFinalizedError();
    this.entries.push(Object.isFrozen(finding) ? finding : Object.freeze({ ...finding }));
    return this;
  }

  addMatch(match: Match, dataset?: Dataset): this {
    return this.addFinding(this.normalizer.fromMatch(match, dataset));
  }

  addAnomaly(anomaly: Anomaly, dataset?: Dataset): this {
    return this.addFinding(this.normalizer.fromAnomaly(anomaly, dataset));
  }

  addThreat(threat: Threat, dataset?: Dataset): this {
    return this.addFinding(this.normalizer.fromThreat(threat, dataset));
  }

  /** Add matches, resolving each one's dataset from the store. */
  addMatches(matches: readonly Match[], store: RecordStore): this {
    for (const match of matches) this.addMatch(match, store.get(match.source));
    return this;
  }

  addAnomalies(anomalies: readonly Anomaly[], store: RecordStore): this {
    for (const anomaly of anomalies) this.addAnomaly(anomaly, store.get(anomaly.source));
    return this;
  }

  addThreats(threats: readonly Threat[], store: RecordStore): this {
    for (const threat of threats) this.addThreat(threat, store.get(threat.source));
    return this;
  }

  /**
   * Produce the ordered timeline. Further calls return the same result;
   * further additions throw.
   */
  finalize(): readonly Finding[] {
    if (this.finalized) return this.finalized;

    const dated: Array<{ finding: Finding; time: number; order: number }> = [];
    const undated: Finding[] = [];

    this.entries.forEach((finding, order) => {
      const canonical = finding.timestamp === null ? null : extractTimestamp(finding.timestamp);
      const time = canonical === null ? null : parseCanonicalTimestamp(canonical);
      if (canonical === null || time === null) {
        undated.push(finding.timestamp === null ? finding : Object.freeze({ ...finding, timestamp: null }));
        return;
      }
      const normalized = canonical === finding.timestamp
        ? finding
        : Object.freeze({ ...finding, timestamp: canonical });
      dated.push({ finding: normalized, time, order });
    });

    // Array.prototype.sort is stable; the order tie-break keeps that explicit.
    dated.sort((a, b) => a.time - b.time || a.order - b.order);

    this.finalized = Object.freeze([...dated.map(d => d.finding), ...undated]);
    return this.finalized;
  }
}

/**
 * Map findings to output rows with the fixed timeline column set.
 */
export function toTimelineRows(findings: readonly Finding[]): TimelineRow[] {
  return findings.map(f => ({
    'Timestamp': f.timestamp ?? '',
    'Device Name': f.deviceName ?? '',
    'Account': f.account ?? '',
    'Event': f.eventDescription,
    'Artifact': f.artifactType,
    'Event ID': f.eventId ?? '',
    'Analyst': f.analyst,
    'Comments': f.comments,
    'Level': f.level,
  }));
}
