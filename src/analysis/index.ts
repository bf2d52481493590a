export { AnalysisHarness, type AnalysisClient, type HarnessOptions } from './harness.js';
export { classifyOperation, hasFormatControl, suggestsDetailedOutput } from './issue-classifier.js';
export type { ClassifierOptions, OperationProfile } from './issue-classifier.js';
export { aggregateOperation, computeStatistics, isFailure } from './metrics.js';
export { generateRecommendations } from './recommendations.js';
export {
  extractPayload,
  isCollectionShaped,
  hasVerboseIdentifiers,
  isTruncated,
  hasLowValueData,
  readSignals,
} from './response-signals.js';
export type * from './types.js';
