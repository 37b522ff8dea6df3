import { z } from 'zod';

/**
 * Zod schema for the CaseTrace configuration file.
 * Every field has a default, so an empty file is a valid configuration.
 */
export const ConfigSchema = z.object({
  /** Name stamped on every timeline finding. */
  analyst: z.string().min(1).default('CaseTrace'),

  /** Columns eligible for partial IOC matches. */
  partialMatchScope: z.enum(['all', 'text']).default('all'),

  /** Exact-match semantics: whole cell, or delimited token inside a cell. */
  exactMatchMode: z.enum(['cell', 'token']).default('token'),

  /** Replacement suspicion tables; omitted families keep the defaults. */
  rules: z.object({
    extensions: z.array(z.string().min(1)).optional(),
    keywords: z.array(z.string().min(1)).optional(),
    paths: z.array(z.string().min(1)).optional(),
  }).default({}),

  ai: z.object({
    enabled: z.boolean().default(false),
    model: z.enum(['fast', 'standard', 'quality']).default('standard'),
  }).default({}),

  output: z.object({
    dir: z.string().min(1).default('./output'),
    formats: z.array(z.enum(['csv', 'json', 'text'])).min(1).default(['csv', 'json', 'text']),
  }).default({}),

  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  }).default({}),
});

export type CaseTraceConfig = z.infer<typeof ConfigSchema>;
export type ModelTier = CaseTraceConfig['ai']['model'];
export type OutputFormat = CaseTraceConfig['output']['formats'][number];
