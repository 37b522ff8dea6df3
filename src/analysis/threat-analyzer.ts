/**
 * Per-source threat assessment.
 *
 * Each dataset is summarized (shape plus the first rows) and sent to the
 * model together with the case context. Without a client, or when the
 * model call or its validation fails, a rule-based assessment is used
 * instead so every source still gets one.
 */

import { withRetry } from '../ai/retry.js';
import { parseThreatAssessmentResponse, type ThreatAssessmentResponse } from '../ai/response-parser.js';
import {
  buildThreatAssessmentPrompt,
  formatSampleRows,
  type CaseContext,
} from '../ai/prompts/threat-assessment.js';
import type { ModelTier, PromptClient } from '../ai/client.js';
import { createLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import type { Dataset, RecordStore } from '../types/records.js';
import type { Threat } from '../types/findings.js';

const log = createLogger('analyzer');

export type AssessedThreat = ThreatAssessmentResponse['threats'][number];

export interface ThreatAssessment {
  source: string;
  threats: AssessedThreat[];
  summary: string;
  confidence: ThreatAssessmentResponse['confidence'];
  mode: 'ai' | 'rule-based';
}

export interface ThreatAnalyzerOptions {
  /** Omit to run rule-based assessment only */
  client?: PromptClient;
  model?: ModelTier;
  maxRetries?: number;
}

const TEMP_DIRECTORY_MARKERS = ['temp', 'tmp'];

/**
 * Heuristic assessment used when no model answer is available: flags
 * sources whose sample rows mention temporary directories.
 */
export function ruleBasedAssessment(dataset: Dataset): ThreatAssessment {
  const sample = formatSampleRows(dataset).toLowerCase();
  const threats: AssessedThreat[] = [];

  if (TEMP_DIRECTORY_MARKERS.some(marker => sample.includes(marker))) {
    threats.push({
      type: 'file_anomaly',
      severity: 'medium',
      description: 'Files in temporary directories detected',
      indicators: ['temp directory usage'],
      recommendation: 'Review files in temporary directories',
    });
  }

  return {
    source: dataset.name,
    threats,
    summary: 'Rule-based analysis completed. Enable AI analysis for a deeper review.',
    confidence: 'low',
    mode: 'rule-based',
  };
}

export class ThreatAnalyzer {
  private readonly client?: PromptClient;
  private readonly model: ModelTier;
  private readonly maxRetries: number;

  constructor(options: ThreatAnalyzerOptions = {}) {
    this.client = options.client;
    this.model = options.model ?? 'standard';
    this.maxRetries = options.maxRetries ?? 2;
  }

  async analyzeDataset(dataset: Dataset, context: CaseContext = {}): Promise<ThreatAssessment> {
    if (!this.client) return ruleBasedAssessment(dataset);
    const client = this.client;

    const { system, user } = buildThreatAssessmentPrompt(dataset, context);
    try {
      const result = await withRetry(
        () => client.prompt(system, user, { model: this.model, jsonMode: true, operation: 'threat-assessment' }),
        { maxRetries: this.maxRetries, label: `assessment of ${dataset.name}` },
      );
      const parsed = parseThreatAssessmentResponse(result.content);
      log.debug(`${dataset.name}: ${parsed.threats.length} threat(s), confidence ${parsed.confidence}`);
      return { source: dataset.name, ...parsed, mode: 'ai' };
    } catch (err) {
      log.warn(`AI assessment of ${dataset.name} failed, using rule-based fallback: ${errorMessage(err)}`);
      return ruleBasedAssessment(dataset);
    }
  }

  /**
   * Assess every source sequentially, in store order.
   */
  async analyzeAll(store: RecordStore, context: CaseContext = {}): Promise<ThreatAssessment[]> {
    const assessments: ThreatAssessment[] = [];
    for (const dataset of store.values()) {
      assessments.push(await this.analyzeDataset(dataset, context));
    }
    return assessments;
  }
}

/**
 * Flatten assessments into threats tagged with their source.
 */
export function collectThreats(assessments: readonly ThreatAssessment[]): Threat[] {
  return assessments.flatMap(assessment =>
    assessment.threats.map(threat => ({
      type: threat.type,
      severity: threat.severity,
      description: threat.description,
      indicators: [...threat.indicators],
      recommendation: threat.recommendation,
      source: assessment.source,
    })),
  );
}
