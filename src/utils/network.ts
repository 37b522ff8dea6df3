/**
 * Network indicator shape checks.
 * These test the *shape* of a value only; no octet range or TLD validation.
 */

const DOTTED_QUAD_PATTERN = /^\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}$/;
const DOMAIN_PATTERN = /^[a-zA-Z0-9]([a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?(\.[a-zA-Z0-9]([a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?)*\.[a-zA-Z]{2,}$/;
const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

export function isDottedQuad(value: string): boolean {
  return DOTTED_QUAD_PATTERN.test(value);
}

export function isValidDomain(value: string): boolean {
  return DOMAIN_PATTERN.test(value) && value.length <= 253;
}

export function isValidEmail(value: string): boolean {
  return EMAIL_PATTERN.test(value);
}
