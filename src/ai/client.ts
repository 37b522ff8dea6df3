/**
 * OpenRouter AI client.
 *
 * Model tiers:
 *   - fast:     threat-actor intel lookups
 *   - standard: per-source threat assessment
 *   - quality:  large or noisy datasets
 *
 * Tracks token usage and cost per request.
 */

import { z } from 'zod';
import type { ModelTier } from '../config/schema.js';
import type { AIConfig, APIUsage } from '../types/config.js';
import { RETRYABLE_STATUSES, RetryableError, parseRetryAfter } from './retry.js';

export type { ModelTier };

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface InferenceOptions {
  model?: ModelTier;
  temperature?: number;
  maxTokens?: number;
  jsonMode?: boolean;
  /** Label recorded against the request in the usage log. */
  operation?: string;
}

export interface InferenceResult {
  content: string;
  usage: APIUsage;
}

/** Minimal client surface the collaborators depend on; tests stub it. */
export interface PromptClient {
  prompt(systemPrompt: string, userPrompt: string, options?: InferenceOptions): Promise<InferenceResult>;
}

const ChatCompletionSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({ content: z.string().nullish() }),
    }),
  ).default([]),
  usage: z.object({
    prompt_tokens: z.number().default(0),
    completion_tokens: z.number().default(0),
  }).optional(),
});

// OpenRouter pricing per million tokens (approximate, updated as needed)
const MODEL_PRICING: Record<string, { input: number; output: number }> = {
  'google/gemini-2.0-flash-001':    { input: 0.10, output: 0.40 },
  'anthropic/claude-3.5-haiku':     { input: 0.80, output: 4.00 },
  'anthropic/claude-sonnet-4':      { input: 3.00, output: 15.00 },
  'meta-llama/llama-3.1-8b-instruct': { input: 0.06, output: 0.06 },
  'google/gemini-2.0-flash-lite-001': { input: 0.075, output: 0.30 },
};

export interface CostSummary {
  totalCostUsd: number;
  totalTokens: number;
  requestCount: number;
  byOperation: Record<string, { count: number; costUsd: number }>;
}

export class AIClient implements PromptClient {
  private config: AIConfig;
  private usageLog: APIUsage[] = [];

  constructor(config: AIConfig) {
    this.config = config;
  }

  /**
   * Create an AIClient from environment variables.
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): AIClient {
    const config: AIConfig = {
      provider: 'openrouter',
      openrouter: {
        apiKey: env.OPENROUTER_API_KEY || '',
        models: {
          fast: env.OPENROUTER_MODEL_FAST || 'google/gemini-2.0-flash-001',
          standard: env.OPENROUTER_MODEL_STANDARD || 'anthropic/claude-3.5-haiku',
          quality: env.OPENROUTER_MODEL_QUALITY || 'anthropic/claude-sonnet-4',
        },
        baseUrl: env.OPENROUTER_BASE_URL || 'https://openrouter.ai/api/v1',
      },
      costTracking: env.TRACK_API_COSTS !== 'false',
      maxTokensPerRequest: 4096,
      temperature: 0.1,
    };

    if (!config.openrouter.apiKey) {
      throw new Error(
        'OPENROUTER_API_KEY is required. Set it in .env or environment.\n' +
        'Get a key at https://openrouter.ai/keys'
      );
    }

    return new AIClient(config);
  }

  /**
   * Run inference with the specified model tier.
   */
  async infer(
    messages: ChatMessage[],
    options: InferenceOptions = {}
  ): Promise<InferenceResult> {
    const tier = options.model || 'standard';
    const modelId = this.getModelId(tier);
    const startTime = Date.now();

    const body: Record<string, unknown> = {
      model: modelId,
      messages,
      temperature: options.temperature ?? this.config.temperature,
      max_tokens: options.maxTokens ?? this.config.maxTokensPerRequest,
    };

    if (options.jsonMode) {
      body.response_format = { type: 'json_object' };
    }

    const response = await fetch(`${this.config.openrouter.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        'Authorization': `Bearer ${this.config.openrouter.apiKey}`,
        'Content-Type': 'application/json',
        'X-Title': 'CaseTrace',
      },
      body: JSON.stringify(body),
    });

    if (!response.ok) {
      const errorText = await response.text();
      const message = `OpenRouter API error (${response.status}): ${errorText}`;
      if (RETRYABLE_STATUSES.has(response.status)) {
        throw new RetryableError(message, response.status, parseRetryAfter(response.headers.get('retry-after')));
      }
      throw new Error(message);
    }

    const parsed = ChatCompletionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`OpenRouter API returned an unexpected payload: ${parsed.error.message}`);
    }
    const data = parsed.data;

    const content = data.choices?.[0]?.message?.content || '';
    const inputTokens = data.usage?.prompt_tokens || 0;
    const outputTokens = data.usage?.completion_tokens || 0;
    const durationMs = Date.now() - startTime;
    const costUsd = this.calculateCost(modelId, inputTokens, outputTokens);

    const usage: APIUsage = {
      operation: options.operation ?? 'inference',
      model: modelId,
      inputTokens,
      outputTokens,
      costUsd,
      durationMs,
      timestamp: new Date().toISOString(),
    };

    if (this.config.costTracking) {
      this.usageLog.push(usage);
    }

    return { content, usage };
  }

  /**
   * Convenience: single prompt inference.
   */
  async prompt(
    systemPrompt: string,
    userPrompt: string,
    options: InferenceOptions = {}
  ): Promise<InferenceResult> {
    return this.infer(
      [
        { role: 'system', content: systemPrompt },
        { role: 'user', content: userPrompt },
      ],
      options
    );
  }

  /**
   * Get the model ID for a given tier.
   */
  private getModelId(tier: ModelTier): string {
    return this.config.openrouter.models[tier];
  }

  /**
   * Calculate cost based on model pricing.
   */
  private calculateCost(modelId: string, inputTokens: number, outputTokens: number): number {
    const pricing = MODEL_PRICING[modelId];
    if (!pricing) {
      // Unknown model, estimate conservatively
      return (inputTokens * 1.0 + outputTokens * 3.0) / 1_000_000;
    }
    return (inputTokens * pricing.input + outputTokens * pricing.output) / 1_000_000;
  }

  /**
   * Totals across the usage log, broken down by operation label.
   */
  getCostSummary(): CostSummary {
    const byOperation: CostSummary['byOperation'] = {};
    let totalCost = 0;
    let totalTokens = 0;

    for (const entry of this.usageLog) {
      totalCost += entry.costUsd;
      totalTokens += entry.inputTokens + entry.outputTokens;
      const bucket = byOperation[entry.operation] ?? { count: 0, costUsd: 0 };
      bucket.count++;
      bucket.costUsd += entry.costUsd;
      byOperation[entry.operation] = bucket;
    }

    return {
      totalCostUsd: Math.round(totalCost * 10000) / 10000,
      totalTokens,
      requestCount: this.usageLog.length,
      byOperation,
    };
  }
}
