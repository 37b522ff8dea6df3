/**
 * Threat-actor intelligence lookups through the AI client.
 *
 * Results are cached per actor name (case-insensitive) for the lifetime of
 * the service. Any failure (transport, parsing, validation) degrades to an
 * empty intel record so the analysis can carry on with user indicators only.
 */

import { withRetry } from '../ai/retry.js';
import { parseThreatIntelResponse, type ThreatIntelResponse } from '../ai/response-parser.js';
import { buildThreatIntelPrompt } from '../ai/prompts/threat-intel.js';
import type { ModelTier, PromptClient } from '../ai/client.js';
import { createLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { combineIndicators } from '../correlation/indicators.js';

const log = createLogger('intel');

export type ThreatIntel = ThreatIntelResponse;

export interface ThreatIntelServiceOptions {
  client: PromptClient;
  model?: ModelTier;
  maxRetries?: number;
}

export function emptyIntel(threatActor?: string): ThreatIntel {
  return {
    threat_actor: threatActor,
    ttps: [],
    iocs: {
      ip_addresses: [],
      domains: [],
      file_hashes: [],
      email_addresses: [],
      executables: [],
      registry_keys: [],
      user_agents: [],
      other: [],
    },
    sources: [],
  };
}

/**
 * Flatten every IOC group into one de-duplicated list, group by group.
 */
export function collectIndicators(intel: ThreatIntel): string[] {
  return combineIndicators(Object.values(intel.iocs).flat());
}

export function countIndicators(intel: ThreatIntel): number {
  return Object.values(intel.iocs).reduce((total, group) => total + group.length, 0);
}

export class ThreatIntelService {
  private readonly client: PromptClient;
  private readonly model: ModelTier;
  private readonly maxRetries: number;
  private readonly cache = new Map<string, ThreatIntel>();

  constructor(options: ThreatIntelServiceOptions) {
    this.client = options.client;
    this.model = options.model ?? 'fast';
    this.maxRetries = options.maxRetries ?? 2;
  }

  async lookup(threatActor: string): Promise<ThreatIntel> {
    const name = threatActor.trim();
    if (!name) return emptyIntel();

    const key = name.toLowerCase();
    const cached = this.cache.get(key);
    if (cached) return cached;

    const { system, user } = buildThreatIntelPrompt(name);
    try {
      const result = await withRetry(
        () => this.client.prompt(system, user, { model: this.model, jsonMode: true, operation: 'threat-intel' }),
        { maxRetries: this.maxRetries, label: `intel lookup for ${name}` },
      );
      const intel = parseThreatIntelResponse(result.content);
      this.cache.set(key, intel);
      log.info(`${name}: ${intel.ttps.length} TTP(s), ${countIndicators(intel)} IOC(s)`);
      return intel;
    } catch (err) {
      log.warn(`No intelligence retrieved for ${name}: ${errorMessage(err)}`);
      return emptyIntel(name);
    }
  }
}
