/**
 * Finding Normalizer — turns matches, anomalies and threats into
 * timeline findings.
 *
 * Row-derived fields (timestamp, device, account, event id) come from the
 * detection's originating row. A row index outside the dataset is a broken
 * contract between a producer and the normalizer; it is logged and the
 * row-derived fields are left null so the rest of the pass continues.
 */

import { createLogger } from '../utils/logger.js';
import { RowIndexError } from '../utils/errors.js';
import { getCell } from '../ingestion/record-store.js';
import type { Dataset, Row } from '../types/records.js';
import type { Anomaly, Finding, FindingLevel, Match, Threat } from '../types/findings.js';
import { inferArtifactType } from './artifact-type.js';
import { DEFAULT_FIELD_ALIASES, extractRowFields, type FieldAliases } from './field-extractor.js';
import { TIMESTAMP_COLUMNS, resolveRowTimestamp } from './timestamp-extractor.js';

const log = createLogger('normalizer');

const MALICIOUS_SEVERITIES = new Set(['critical', 'high']);

export interface FindingNormalizerOptions {
  analyst: string;
  aliases?: FieldAliases;
  timestampColumns?: readonly string[];
}

interface RowContext {
  timestamp: string | null;
  deviceName: string | null;
  account: string | null;
  eventId: string | null;
}

const EMPTY_CONTEXT: RowContext = Object.freeze({
  timestamp: null,
  deviceName: null,
  account: null,
  eventId: null,
});

/**
 * Map a threat severity to a timeline level.
 */
export function severityToLevel(severity: string | undefined): FindingLevel {
  return MALICIOUS_SEVERITIES.has((severity ?? 'medium').trim().toLowerCase())
    ? 'Malicious'
    : 'Suspicious';
}

/**
 * Fetch a row, throwing when the index is outside the dataset.
 */
export function rowAt(dataset: Dataset, rowIndex: number): Row {
  if (!Number.isInteger(rowIndex) || rowIndex < 0 || rowIndex >= dataset.rows.length) {
    throw new RowIndexError(dataset.name, rowIndex, dataset.rows.length);
  }
  return dataset.rows[rowIndex];
}

export class FindingNormalizer {
  readonly analyst: string;
  private readonly aliases: FieldAliases;
  private readonly timestampColumns: readonly string[];

  constructor(options: FindingNormalizerOptions) {
    this.analyst = options.analyst;
    this.aliases = options.aliases ?? DEFAULT_FIELD_ALIASES;
    this.timestampColumns = options.timestampColumns ?? TIMESTAMP_COLUMNS;
  }

  fromMatch(match: Match, dataset?: Dataset): Finding {
    const context = this.rowContext(dataset, match.rowIndex, match.column);
    return this.build(context, {
      eventDescription: `IOC Match: ${match.indicator} found in ${match.column}: ${match.matchedValue}`,
      artifactType: this.artifactFor(match.source, dataset),
      comments: `Matched IOC (${match.indicatorKind}) in ${match.column}`,
      level: 'Suspicious',
    });
  }

  fromAnomaly(anomaly: Anomaly, dataset?: Dataset): Finding {
    const context = this.rowContext(dataset, anomaly.rowIndex, anomaly.column);
    return this.build(context, {
      eventDescription: anomaly.description || 'Pattern-based anomaly detected',
      artifactType: this.artifactFor(anomaly.source, dataset),
      comments: `Detected ${anomaly.ruleType} pattern in ${anomaly.column}`,
      level: 'Suspicious',
    });
  }

  fromThreat(threat: Threat, dataset?: Dataset): Finding {
    const context =
      threat.rowIndex === undefined ? EMPTY_CONTEXT : this.rowContext(dataset, threat.rowIndex);

    let comments = threat.recommendation ?? '';
    if (threat.indicators && threat.indicators.length > 0) {
      comments += ` Indicators: ${threat.indicators.join(', ')}`;
    }

    return this.build(context, {
      eventDescription: threat.description || threat.type || 'Unknown threat',
      artifactType: this.artifactFor(threat.source, dataset),
      comments: comments.trim(),
      level: severityToLevel(threat.severity),
    });
  }

  private artifactFor(source: string, dataset?: Dataset): string {
    return inferArtifactType(source, dataset?.columns ?? []);
  }

  private rowContext(dataset: Dataset | undefined, rowIndex: number, column?: string): RowContext {
    if (!dataset) return EMPTY_CONTEXT;

    let row: Row;
    try {
      row = rowAt(dataset, rowIndex);
    } catch (err) {
      if (err instanceof RowIndexError) {
        log.warn(err.message);
        return EMPTY_CONTEXT;
      }
      throw err;
    }

    const direct = column === undefined ? undefined : getCell(row, column);
    return {
      timestamp: resolveRowTimestamp(row, direct, this.timestampColumns),
      ...extractRowFields(row, this.aliases),
    };
  }

  private build(
    context: RowContext,
    detail: Pick<Finding, 'eventDescription' | 'artifactType' | 'comments' | 'level'>,
  ): Finding {
    return Object.freeze({
      timestamp: context.timestamp,
      deviceName: context.deviceName,
      account: context.account,
      eventDescription: detail.eventDescription,
      artifactType: detail.artifactType,
      eventId: context.eventId,
      analyst: this.analyst,
      comments: detail.comments,
      level: detail.level,
    });
  }
}
