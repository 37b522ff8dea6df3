/**
 * Rule-Based Anomaly Detector.
 *
 * Scans the textual columns of a dataset for fixed suspicion patterns and
 * emits one anomaly per (pattern, column, row) hit. Hits are never merged:
 * a cell matching `.exe` and `payload` yields two anomalies.
 *
 * Scan order is family (extensions, keywords, paths) → column → pattern →
 * row, so repeated runs produce identical lists.
 */

import { foldDataset } from '../ingestion/record-store.js';
import { createLogger } from '../utils/logger.js';
import type { Dataset, RecordStore } from '../types/records.js';
import type { Anomaly, AnomalyRuleType, AnomalySummary } from '../types/findings.js';
import { DEFAULT_SUSPICION_RULES, RULE_SEVERITY, type SuspicionRules } from './rules.js';

const log = createLogger('detector');

const RULE_FAMILIES: readonly AnomalyRuleType[] = [
  'suspicious_extension',
  'suspicious_keyword',
  'suspicious_path',
];

interface CompiledRule {
  type: AnomalyRuleType;
  pattern: string;
  test: (text: string) => boolean;
  describe: (column: string) => string;
}

export interface DetectionResult {
  /** Sources with at least one anomaly, in store order */
  bySource: Map<string, Anomaly[]>;
  /** Every anomaly, in store order then scan order */
  anomalies: Anomaly[];
}

/**
 * Compile rule tables into testers. Path patterns are compiled here, so a
 * malformed expression fails at construction rather than mid-scan.
 */
function compileRules(rules: SuspicionRules): CompiledRule[] {
  const compiled: CompiledRule[] = [];

  for (const ext of rules.extensions) {
    const needle = ext.toLowerCase();
    compiled.push({
      type: 'suspicious_extension',
      pattern: ext,
      test: text => text.includes(needle),
      describe: column => `Found suspicious extension ${ext} in ${column}`,
    });
  }

  for (const keyword of rules.keywords) {
    const needle = keyword.toLowerCase();
    compiled.push({
      type: 'suspicious_keyword',
      pattern: keyword,
      test: text => text.includes(needle),
      describe: column => `Found suspicious keyword '${keyword}' in ${column}`,
    });
  }

  for (const source of rules.paths) {
    const regex = new RegExp(source);
    compiled.push({
      type: 'suspicious_path',
      pattern: source,
      test: text => regex.test(text),
      describe: column => `Found suspicious path pattern '${source}' in ${column}`,
    });
  }

  return compiled;
}

export class AnomalyDetector {
  private readonly compiled: readonly CompiledRule[];

  constructor(readonly rules: SuspicionRules = DEFAULT_SUSPICION_RULES) {
    this.compiled = compileRules(rules);
  }

  /**
   * Detect anomalies in one dataset. Datasets without textual columns
   * produce an empty list.
   */
  detect(dataset: Dataset): Anomaly[] {
    const folded = foldDataset(dataset);
    const anomalies: Anomaly[] = [];

    const textColumns = dataset.columns.filter(column => folded.textColumns.has(column));

    for (const family of RULE_FAMILIES) {
      const familyRules = this.compiled.filter(rule => rule.type === family);
      for (const column of textColumns) {
        const cells = folded.text.get(column) ?? [];
        for (const rule of familyRules) {
          cells.forEach((cell, rowIndex) => {
            if (cell === null || !rule.test(cell)) return;
            anomalies.push({
              source: dataset.name,
              ruleType: rule.type,
              severity: RULE_SEVERITY[rule.type],
              column,
              value: cell,
              rowIndex,
              description: rule.describe(column),
              pattern: rule.pattern,
            });
          });
        }
      }
    }

    return anomalies;
  }

  /**
   * Detect anomalies across the store, in store order.
   */
  detectAll(store: RecordStore): DetectionResult {
    const bySource = new Map<string, Anomaly[]>();
    const anomalies: Anomaly[] = [];

    for (const [name, dataset] of store) {
      const found = this.detect(dataset);
      log.debug(`${name}: ${found.length} anomal${found.length === 1 ? 'y' : 'ies'}`);
      if (found.length > 0) {
        bySource.set(name, found);
        anomalies.push(...found);
      }
    }

    return { bySource, anomalies };
  }
}

/**
 * Count anomalies by source, rule type and severity.
 */
export function summarizeAnomalies(anomalies: readonly Anomaly[]): AnomalySummary {
  const summary: AnomalySummary = {
    totalAnomalies: anomalies.length,
    bySource: {},
    byRuleType: {},
    bySeverity: {},
  };

  for (const anomaly of anomalies) {
    summary.bySource[anomaly.source] = (summary.bySource[anomaly.source] ?? 0) + 1;
    summary.byRuleType[anomaly.ruleType] = (summary.byRuleType[anomaly.ruleType] ?? 0) + 1;
    summary.bySeverity[anomaly.severity] = (summary.bySeverity[anomaly.severity] ?? 0) + 1;
  }

  return summary;
}
