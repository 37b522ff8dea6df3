/**
 * Configuration types for the AI collaborators.
 *
 * The case/analysis configuration file is described by the Zod schema in
 * `src/config/schema.ts`.
 */

export interface AIConfig {
  provider: 'openrouter';
  openrouter: {
    apiKey: string;
    models: {
      fast: string;       // Cheap, for intel lookups
      standard: string;   // Balanced, for threat assessment
      quality: string;    // Best, for long datasets
    };
    baseUrl: string;
  };
  costTracking: boolean;
  maxTokensPerRequest: number;
  temperature: number;
}

// Cost tracking

export interface APIUsage {
  operation: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
  costUsd: number;
  durationMs: number;
  timestamp: string;
}
