/**
 * Indicator Matcher — scans record stores for known indicators.
 *
 * Every indicator is compared against every column of every row of the
 * case-folded dataset:
 *   - exact:   the cell is the indicator (see `ExactMatchMode`)
 *   - partial: the cell contains the indicator as a literal substring
 *
 * A cell that qualifies as both is reported once, as exact. The folded view
 * is built once per dataset and shared by all indicators.
 */

import { foldDataset, type FoldedDataset } from '../ingestion/record-store.js';
import { createLogger } from '../utils/logger.js';
import type { Dataset, RecordStore } from '../types/records.js';
import type { ClassifiedIndicator, Match, MatchKind, MatchSummary } from '../types/findings.js';
import { classifyIndicators } from './indicator-classifier.js';

const log = createLogger('matcher');

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/**
 * - `token`: the cell equals the indicator, or an occurrence of it is
 *   bounded by delimiters on both sides (`payload.exe` in `c:\temp\payload.exe`)
 * - `cell`:  whole-cell equality only
 */
export type ExactMatchMode = 'token' | 'cell';

/**
 * - `all`:  partial matching on every column
 * - `text`: partial matching only on columns holding string cells
 */
export type PartialMatchScope = 'all' | 'text';

export interface IndicatorMatcherOptions {
  /** Default: 'token' */
  exactMatchMode?: ExactMatchMode;
  /** Default: 'all' */
  partialMatchScope?: PartialMatchScope;
}

export interface SearchResult {
  /** Sources with at least one match, in store order */
  bySource: Map<string, Match[]>;
  /** Every match, in store order then scan order */
  matches: Match[];
}

// ---------------------------------------------------------------------------
// Token boundaries
// ---------------------------------------------------------------------------

const TOKEN_DELIMITERS = new Set([
  ' ', '\t', '\r', '\n', '\\', '/', '"', "'", ',', ';', '|', '=', ':', '(', ')', '[', ']', '<', '>',
]);

function isBoundary(text: string, index: number): boolean {
  return index < 0 || index >= text.length || TOKEN_DELIMITERS.has(text[index]);
}

/**
 * True when some occurrence of `needle` in `text` is delimited on both sides.
 */
export function containsToken(text: string, needle: string): boolean {
  if (!needle) return false;
  let from = text.indexOf(needle);
  while (from !== -1) {
    if (isBoundary(text, from - 1) && isBoundary(text, from + needle.length)) {
      return true;
    }
    from = text.indexOf(needle, from + 1);
  }
  return false;
}

// ---------------------------------------------------------------------------
// Matcher
// ---------------------------------------------------------------------------

export class IndicatorMatcher {
  readonly indicators: readonly ClassifiedIndicator[];
  private readonly exactMatchMode: ExactMatchMode;
  private readonly partialMatchScope: PartialMatchScope;

  constructor(indicators: readonly string[], options: IndicatorMatcherOptions = {}) {
    this.indicators = Object.freeze(classifyIndicators(indicators));
    this.exactMatchMode = options.exactMatchMode ?? 'token';
    this.partialMatchScope = options.partialMatchScope ?? 'all';
  }

  /**
   * Search one dataset for every indicator.
   */
  search(dataset: Dataset): Match[] {
    if (this.indicators.length === 0 || dataset.rows.length === 0) return [];
    return this.searchFolded(foldDataset(dataset));
  }

  /**
   * Search every dataset in the store, in store order.
   */
  searchAll(store: RecordStore): SearchResult {
    const bySource = new Map<string, Match[]>();
    const matches: Match[] = [];

    for (const [name, dataset] of store) {
      const found = this.search(dataset);
      log.debug(`${name}: ${found.length} match(es)`);
      if (found.length > 0) {
        bySource.set(name, found);
        matches.push(...found);
      }
    }

    return { bySource, matches };
  }

  private searchFolded(folded: FoldedDataset): Match[] {
    const { dataset } = folded;
    const matches: Match[] = [];

    for (const indicator of this.indicators) {
      for (const column of dataset.columns) {
        const cells = folded.text.get(column) ?? [];
        const allowPartial =
          this.partialMatchScope === 'all' || folded.textColumns.has(column);

        cells.forEach((cell, rowIndex) => {
          const kind = this.matchCell(cell, indicator.normalized, allowPartial);
          if (!kind) return;
          matches.push({
            source: dataset.name,
            indicator: indicator.value,
            indicatorKind: indicator.kind,
            matchKind: kind,
            column,
            rowIndex,
            matchedValue: cell ?? '',
            fullRow: { ...folded.rows[rowIndex] },
          });
        });
      }
    }

    return matches;
  }

  private matchCell(cell: string | null, needle: string, allowPartial: boolean): MatchKind | null {
    if (cell === null) return null;
    if (cell === needle) return 'exact';
    if (!cell.includes(needle)) return null;
    if (this.exactMatchMode === 'token' && containsToken(cell, needle)) return 'exact';
    return allowPartial ? 'partial' : null;
  }
}

// ---------------------------------------------------------------------------
// Summary
// ---------------------------------------------------------------------------

/**
 * Count matches by source, indicator kind and indicator value.
 * Each grouping sums to `totalMatches`.
 */
export function summarizeMatches(matches: readonly Match[]): MatchSummary {
  const summary: MatchSummary = {
    totalMatches: matches.length,
    bySource: {},
    byIndicatorKind: {},
    byIndicator: {},
  };

  for (const match of matches) {
    summary.bySource[match.source] = (summary.bySource[match.source] ?? 0) + 1;
    summary.byIndicatorKind[match.indicatorKind] =
      (summary.byIndicatorKind[match.indicatorKind] ?? 0) + 1;
    summary.byIndicator[match.indicator] = (summary.byIndicator[match.indicator] ?? 0) + 1;
  }

  return summary;
}
