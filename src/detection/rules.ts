/**
 * Heuristic suspicion rule tables.
 *
 * Three families, each with a fixed severity:
 *   - extensions: literal substrings, medium
 *   - keywords:   literal substrings, high
 *   - paths:      regular expressions over the case-folded cell, medium
 */

import type { AnomalyRuleType, Severity } from '../types/findings.js';

export interface SuspicionRules {
  readonly extensions: readonly string[];
  readonly keywords: readonly string[];
  /** Regular expression sources, matched against lower-cased text */
  readonly paths: readonly string[];
}

export const DEFAULT_SUSPICION_RULES: SuspicionRules = Object.freeze({
  extensions: Object.freeze(['.exe', '.dll', '.bat', '.cmd', '.ps1', '.vbs', '.scr', '.com']),
  keywords: Object.freeze([
    'malware', 'trojan', 'virus', 'backdoor', 'keylogger',
    'ransomware', 'rootkit', 'exploit', 'payload', 'shellcode',
  ]),
  paths: Object.freeze([
    'temp', 'tmp', 'appdata', 'local.*temp',
    'programdata', 'windows.*system32', 'syswow64',
  ]),
});

export const RULE_SEVERITY: Readonly<Record<AnomalyRuleType, Severity>> = Object.freeze({
  suspicious_extension: 'medium',
  suspicious_keyword: 'high',
  suspicious_path: 'medium',
});

/**
 * Merge partial overrides (e.g. from the config file) over the defaults.
 * A family that is given replaces the default family entirely.
 */
export function resolveSuspicionRules(overrides: Partial<SuspicionRules> = {}): SuspicionRules {
  return Object.freeze({
    extensions: Object.freeze([...(overrides.extensions ?? DEFAULT_SUSPICION_RULES.extensions)]),
    keywords: Object.freeze([...(overrides.keywords ?? DEFAULT_SUSPICION_RULES.keywords)]),
    paths: Object.freeze([...(overrides.paths ?? DEFAULT_SUSPICION_RULES.paths)]),
  });
}
