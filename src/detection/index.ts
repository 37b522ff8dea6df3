/**
 * Detection module — heuristic suspicion rules over record stores.
 */

export {
  AnomalyDetector,
  summarizeAnomalies,
  type DetectionResult,
} from './anomaly-detector.js';

export {
  DEFAULT_SUSPICION_RULES,
  RULE_SEVERITY,
  resolveSuspicionRules,
  type SuspicionRules,
} from './rules.js';
