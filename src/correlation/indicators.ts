/**
 * Indicator list handling: merging user-supplied and intel-supplied
 * indicators, and parsing pasted or file-based indicator lists.
 */

import { readFileSync } from 'fs';
import { refang } from '../utils/defang.js';
import { IngestionError, errorMessage } from '../utils/errors.js';
import { normalizeIndicator } from './indicator-classifier.js';

const ITEM_DELIMITERS = [',', ';', '|'] as const;

/**
 * Combine known indicators with intel-derived ones.
 *
 * Duplicates under trim + case-fold collapse to the first-seen entry, and
 * blank entries are dropped. Order is first-seen order.
 */
export function combineIndicators(
  known: readonly string[],
  osint: readonly string[] = [],
): string[] {
  const seen = new Set<string>();
  const unique: string[] = [];

  for (const ioc of [...known, ...osint]) {
    const key = normalizeIndicator(ioc);
    if (!key || seen.has(key)) continue;
    seen.add(key);
    unique.push(ioc);
  }

  return unique;
}

/**
 * Split one line on the first delimiter it contains.
 */
function splitLine(line: string): string[] {
  for (const delimiter of ITEM_DELIMITERS) {
    if (line.includes(delimiter)) {
      return line.split(delimiter);
    }
  }
  return [line];
}

/**
 * Parse a pasted indicator list.
 *
 * Lines are split on the first of `,` `;` `|` they contain. Entries are
 * trimmed, refanged and de-duplicated.
 *
 * @example parseIndicatorList('evil[.]com, 203.0.113.7\npayload.exe')
 *   => ['evil.com', '203.0.113.7', 'payload.exe']
 */
export function parseIndicatorList(text: string): string[] {
  const items: string[] = [];

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;
    for (const item of splitLine(line)) {
      const trimmed = item.trim();
      if (trimmed) items.push(refang(trimmed));
    }
  }

  return combineIndicators(items);
}

/**
 * Read and parse an indicator file (one per line, or delimited).
 */
export function readIndicatorFile(path: string): string[] {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new IngestionError(`Could not read indicator file: ${errorMessage(err)}`, path);
  }
  return parseIndicatorList(text);
}
