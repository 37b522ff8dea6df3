/**
 * End-to-end case analysis over a record store:
 *
 *   detect anomalies → (intel lookup) → match indicators →
 *   (threat assessment) → timeline
 *
 * The AI steps run only when a client is supplied; without one the
 * assessment step can still run in rule-based mode.
 */

import { AnomalyDetector, summarizeAnomalies } from '../detection/anomaly-detector.js';
import { DEFAULT_SUSPICION_RULES, type SuspicionRules } from '../detection/rules.js';
import {
  IndicatorMatcher,
  summarizeMatches,
  type IndicatorMatcherOptions,
} from '../correlation/indicator-matcher.js';
import { combineIndicators } from '../correlation/indicators.js';
import { TimelineBuilder } from '../timeline/builder.js';
import { ThreatIntelService, collectIndicators, type ThreatIntel } from '../intel/threat-intel.js';
import type { ModelTier, PromptClient } from '../ai/client.js';
import { createLogger } from '../utils/logger.js';
import type { RecordStore } from '../types/records.js';
import type {
  Anomaly,
  AnomalySummary,
  ClassifiedIndicator,
  Finding,
  Match,
  MatchSummary,
  Threat,
} from '../types/findings.js';
import { ThreatAnalyzer, collectThreats, type ThreatAssessment } from './threat-analyzer.js';

const log = createLogger('case');

export type CaseStage = 'detect' | 'intel' | 'match' | 'assess' | 'timeline';

export interface CaseAnalysisOptions {
  analyst: string;
  /** Analyst-supplied indicators */
  indicators?: readonly string[];
  caseType?: string;
  threatActor?: string;
  rules?: SuspicionRules;
  matcher?: IndicatorMatcherOptions;
  /** AI client; enables the intel lookup and model-based assessment */
  client?: PromptClient;
  model?: ModelTier;
  /** Run threat assessment (rule-based when there is no client) */
  assess?: boolean;
  onStage?: (stage: CaseStage, detail: string) => void;
}

export interface CaseAnalysisResult {
  anomalies: Anomaly[];
  anomalySummary: AnomalySummary;
  providedIndicators: string[];
  intel?: ThreatIntel;
  intelIndicators: string[];
  searchedIndicators: readonly ClassifiedIndicator[];
  matches: Match[];
  matchSummary: MatchSummary;
  assessments: ThreatAssessment[];
  threats: Threat[];
  timeline: readonly Finding[];
}

export async function analyzeCase(
  store: RecordStore,
  options: CaseAnalysisOptions,
): Promise<CaseAnalysisResult> {
  const report = (stage: CaseStage, detail: string) => {
    log.debug(`[${stage}] ${detail}`);
    options.onStage?.(stage, detail);
  };

  // --- Pattern anomalies ---
  const detector = new AnomalyDetector(options.rules ?? DEFAULT_SUSPICION_RULES);
  const { anomalies } = detector.detectAll(store);
  report('detect', `${anomalies.length} anomalies`);

  // --- Threat-actor intel ---
  let intel: ThreatIntel | undefined;
  let intelIndicators: string[] = [];
  if (options.client && options.threatActor) {
    const service = new ThreatIntelService({ client: options.client, model: 'fast' });
    intel = await service.lookup(options.threatActor);
    intelIndicators = collectIndicators(intel);
    report('intel', `${intel.ttps.length} TTPs, ${intelIndicators.length} indicators`);
  }

  // --- Indicator matching ---
  const providedIndicators = combineIndicators(options.indicators ?? []);
  const indicators = combineIndicators(providedIndicators, intelIndicators);
  const matcher = new IndicatorMatcher(indicators, options.matcher);
  const { matches } = matcher.searchAll(store);
  report('match', `${matches.length} matches for ${indicators.length} indicators`);

  // --- Threat assessment ---
  let assessments: ThreatAssessment[] = [];
  if (options.assess) {
    const analyzer = new ThreatAnalyzer({ client: options.client, model: options.model });
    assessments = await analyzer.analyzeAll(store, {
      caseType: options.caseType,
      threatActor: options.threatActor,
      indicators,
      ttps: intel?.ttps,
    });
  }
  const threats = collectThreats(assessments);
  if (options.assess) report('assess', `${threats.length} threats`);

  // --- Timeline ---
  const builder = new TimelineBuilder({ analyst: options.analyst });
  builder
    .addMatches(matches, store)
    .addAnomalies(anomalies, store)
    .addThreats(threats, store);
  const timeline = builder.finalize();
  report('timeline', `${timeline.length} findings`);

  return {
    anomalies,
    anomalySummary: summarizeAnomalies(anomalies),
    providedIndicators,
    intel,
    intelIndicators,
    searchedIndicators: matcher.indicators,
    matches,
    matchSummary: summarizeMatches(matches),
    assessments,
    threats,
    timeline,
  };
}
