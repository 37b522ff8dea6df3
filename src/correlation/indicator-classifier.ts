/**
 * Indicator classification — infers what kind of IOC a string is.
 *
 * Rules are evaluated in priority order and the first one that applies
 * wins, so every string maps to exactly one kind:
 *   1. IPv4 dotted quad        → ip_address
 *   2. 32/40/64 hex characters → hash
 *   3. domain shape            → domain
 *   4. local@domain.tld        → email
 *   5. executable extension    → executable
 *   6. otherwise               → unknown
 */

import { isDottedQuad, isValidDomain, isValidEmail } from '../utils/network.js';
import { isHash } from '../utils/hash.js';
import type { ClassifiedIndicator, IndicatorKind } from '../types/findings.js';

/** File extensions that mark an indicator as an executable name. */
export const EXECUTABLE_EXTENSIONS = Object.freeze([
  '.exe',
  '.dll',
  '.bat',
  '.cmd',
  '.ps1',
  '.vbs',
  '.scr',
] as const);

function hasExecutableExtension(lower: string): boolean {
  return EXECUTABLE_EXTENSIONS.some(ext => lower.endsWith(ext));
}

/**
 * Classify a raw indicator string. Deterministic and total.
 */
export function classifyIndicator(value: string): IndicatorKind {
  const trimmed = value.trim();
  const lower = trimmed.toLowerCase();

  if (isDottedQuad(trimmed)) return 'ip_address';
  if (isHash(trimmed)) return 'hash';
  // payload.exe has a domain shape; the extension takes it out of the domain rule
  if (isValidDomain(trimmed) && !hasExecutableExtension(lower)) return 'domain';
  if (isValidEmail(trimmed)) return 'email';
  if (hasExecutableExtension(lower)) return 'executable';
  return 'unknown';
}

/**
 * Normalize an indicator to its search form (trimmed, case-folded).
 */
export function normalizeIndicator(value: string): string {
  return value.trim().toLowerCase();
}

/**
 * Normalize and classify a list of indicators, skipping blanks.
 * Duplicates under trim + case-fold keep the first-seen entry, so each
 * indicator is classified and searched once.
 */
export function classifyIndicators(values: readonly string[]): ClassifiedIndicator[] {
  const seen = new Set<string>();
  const results: ClassifiedIndicator[] = [];
  for (const raw of values) {
    const normalized = normalizeIndicator(raw);
    if (!normalized || seen.has(normalized)) continue;
    seen.add(normalized);
    results.push({ value: raw.trim(), normalized, kind: classifyIndicator(raw) });
  }
  return results;
}
