/**
 * YAML parsing utilities.
 * Wraps the 'yaml' package with error handling.
 */

import { parse } from 'yaml';

/**
 * Validate that a string is valid YAML. Returns the parsed value or the
 * parser's message.
 */
export function validateYaml(input: string): { valid: boolean; data?: unknown; error?: string } {
  try {
    const data: unknown = parse(input);
    return { valid: true, data };
  } catch (e) {
    return { valid: false, error: e instanceof Error ? e.message : String(e) };
  }
}
