import type { AnalysisStatistics, Issue, IssueFlags, OperationMetrics, ScenarioMetric } from './types.js';
import { TOKEN_EFFICIENCY } from '../constants.js';

export function isFailure(metric: ScenarioMetric): boolean {
  return metric.outcome !== 'success' && metric.outcome !== 'corrected';
}

/**
 * Roll scenario metrics up into one operation aggregate. Token figures
 * only count answered scenarios with a non-empty response.
 */
export function aggregateOperation(
  operation: string,
  scenarios: readonly ScenarioMetric[],
  flags: IssueFlags
): OperationMetrics {
  const tokens = scenarios
    .filter((metric) => !isFailure(metric) && metric.tokenEstimate > 0)
    .map((metric) => metric.tokenEstimate);

  return {
    operation,
    scenarios: [...scenarios],
    avgTokens: tokens.length > 0 ? tokens.reduce((sum, value) => sum + value, 0) / tokens.length : 0,
    minTokens: tokens.length > 0 ? Math.min(...tokens) : 0,
    maxTokens: tokens.length > 0 ? Math.max(...tokens) : 0,
    failureCount: scenarios.filter(isFailure).length,
    flags,
  };
}

export function computeStatistics(
  operations: readonly OperationMetrics[],
  issues: readonly Issue[],
  oversizedTokenThreshold: number = TOKEN_EFFICIENCY.OVERSIZED_THRESHOLD
): AnalysisStatistics {
  const scenarios = operations.flatMap((operation) => operation.scenarios);
  const tokens = scenarios
    .filter((metric) => !isFailure(metric) && metric.tokenEstimate > 0)
    .map((metric) => metric.tokenEstimate);

  return {
    operationsAnalyzed: operations.length,
    scenariosRun: scenarios.length,
    successes: scenarios.filter((metric) => !isFailure(metric)).length,
    failures: scenarios.filter(isFailure).length,
    corrected: scenarios.filter((metric) => metric.outcome === 'corrected').length,
    operationsWithIssues: new Set(issues.map((issue) => issue.operation)).size,
    responsesExceedingLimit: tokens.filter((value) => value > oversizedTokenThreshold).length,
    avgTokens: tokens.length > 0 ? Math.floor(tokens.reduce((sum, value) => sum + value, 0) / tokens.length) : 0,
    maxTokens: tokens.length > 0 ? Math.max(...tokens) : 0,
  };
}
