/**
 * Correlation module — indicator classification and matching.
 */

export {
  classifyIndicator,
  classifyIndicators,
  normalizeIndicator,
  EXECUTABLE_EXTENSIONS,
} from './indicator-classifier.js';

export {
  combineIndicators,
  parseIndicatorList,
  readIndicatorFile,
} from './indicators.js';

export {
  IndicatorMatcher,
  summarizeMatches,
  containsToken,
  type ExactMatchMode,
  type PartialMatchScope,
  type IndicatorMatcherOptions,
  type SearchResult,
} from './indicator-matcher.js';
