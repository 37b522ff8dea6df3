/**
 * AI response parsing with Zod validation.
 *
 * Handles:
 * - JSON extraction from markdown code blocks
 * - Extra prose around the JSON object
 * - Trailing commas and unclosed brackets
 * - Schema validation with lenient defaults for optional fields
 */

import { z } from 'zod';

// --- Zod Schemas ---

const stringList = z.array(z.string()).default([]);

export const SEVERITIES = ['critical', 'high', 'medium', 'low'] as const;

export const ThreatIntelResponseSchema = z.object({
  threat_actor: z.string().optional(),
  ttps: z.array(
    z.object({
      tactic: z.string().default(''),
      technique: z.string().default('Unknown'),
      description: z.string().default(''),
    })
  ).default([]),
  iocs: z.object({
    ip_addresses: stringList,
    domains: stringList,
    file_hashes: stringList,
    email_addresses: stringList,
    executables: stringList,
    registry_keys: stringList,
    user_agents: stringList,
    other: stringList,
  }).default({}),
  sources: stringList,
});

/** One threat as reported by the model; severity is case-folded. */
export const ThreatSchema = z.object({
  type: z.string().default('other'),
  severity: z.preprocess(
    value => (typeof value === 'string' ? value.trim().toLowerCase() : value),
    z.enum(SEVERITIES).catch('medium'),
  ),
  description: z.string().default(''),
  indicators: stringList,
  recommendation: z.string().optional(),
});

export const ThreatAssessmentSchema = z.object({
  threats: z.array(ThreatSchema).default([]),
  summary: z.string().default(''),
  confidence: z.enum(['high', 'medium', 'low']).catch('low'),
});

// --- Type Inference ---

export type ThreatIntelResponse = z.infer<typeof ThreatIntelResponseSchema>;
export type ThreatAssessmentResponse = z.infer<typeof ThreatAssessmentSchema>;

// --- Parser Functions ---

/**
 * Extract JSON from various response formats.
 * Handles:
 * - Raw JSON
 * - JSON wrapped in markdown code blocks (```json ... ```)
 * - JSON with extra text before/after
 */
export function extractJsonFromResponse(raw: string): unknown {
  let cleaned = raw.trim();

  const codeBlockMatch = cleaned.match(/```(?:json)?\s*\n?([\s\S]*?)\n?```/);
  if (codeBlockMatch) {
    cleaned = codeBlockMatch[1].trim();
  }

  // Outermost object boundaries
  const start = cleaned.indexOf('{');
  const end = cleaned.lastIndexOf('}');
  if (start >= 0 && end > start) {
    cleaned = cleaned.slice(start, end + 1);
  } else if (start >= 0) {
    cleaned = cleaned.slice(start);
  }

  try {
    return JSON.parse(cleaned);
  } catch {
    return JSON.parse(repairJson(cleaned));
  }
}

/**
 * Repair common model JSON errors: trailing commas and unclosed
 * brackets or braces (truncated output).
 */
function repairJson(json: string): string {
  let repaired = json.replace(/,(\s*[}\]])/g, '$1');

  const stack: string[] = [];
  let inString = false;
  let escaped = false;

  for (const ch of repaired) {
    if (escaped) {
      escaped = false;
      continue;
    }
    if (ch === '\\') {
      escaped = true;
      continue;
    }
    if (ch === '"') {
      inString = !inString;
      continue;
    }
    if (inString) continue;

    if (ch === '{') stack.push('}');
    else if (ch === '[') stack.push(']');
    else if ((ch === '}' || ch === ']') && stack[stack.length - 1] === ch) stack.pop();
  }

  if (inString) repaired += '"';
  while (stack.length > 0) {
    repaired += stack.pop();
  }
  return repaired;
}

function parseWith<S extends z.ZodTypeAny>(schema: S, raw: string, label: string): z.infer<S> {
  const extracted = extractJsonFromResponse(raw);
  const result = schema.safeParse(extracted);
  if (!result.success) {
    const formattedErrors = result.error.errors
      .map(err => `  - ${err.path.join('.')}: ${err.message}`)
      .join('\n');
    throw new Error(
      `${label} response validation failed:\n${formattedErrors}\n\nRaw response:\n${raw.substring(0, 500)}`
    );
  }
  return result.data;
}

/**
 * Parse and validate a threat-actor intelligence response.
 */
export function parseThreatIntelResponse(raw: string): ThreatIntelResponse {
  return parseWith(ThreatIntelResponseSchema, raw, 'Threat intel');
}

/**
 * Parse and validate a per-source threat assessment response.
 */
export function parseThreatAssessmentResponse(raw: string): ThreatAssessmentResponse {
  return parseWith(ThreatAssessmentSchema, raw, 'Threat assessment');
}
