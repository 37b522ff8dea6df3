/**
 * CaseTrace library entry point.
 */

export * from './types/index.js';
export * from './ingestion/index.js';
export * from './detection/index.js';
export * from './correlation/index.js';
export * from './timeline/index.js';
export * from './reporting/index.js';
export * from './config/index.js';

export { analyzeCase, type CaseAnalysisOptions, type CaseAnalysisResult, type CaseStage } from './analysis/case-analysis.js';
export {
  ThreatAnalyzer,
  collectThreats,
  ruleBasedAssessment,
  type ThreatAssessment,
  type ThreatAnalyzerOptions,
} from './analysis/threat-analyzer.js';
export {
  ThreatIntelService,
  collectIndicators,
  emptyIntel,
  type ThreatIntel,
} from './intel/threat-intel.js';
export { AIClient, type PromptClient, type InferenceOptions, type InferenceResult, type CostSummary } from './ai/client.js';
export { withRetry, RetryableError } from './ai/retry.js';
export {
  RowIndexError,
  TimelineFinalizedError,
  IngestionError,
  ConfigError,
} from './utils/errors.js';
export { createLogger, setLogLevel, type Logger, type LogLevel } from './utils/logger.js';
export { VERSION } from './version.js';
