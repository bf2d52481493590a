import type { Issue, IssueFlags, ScenarioMetric } from './types.js';
import type { Operation } from '../transport/types.js';
import { DETAIL_INDICATORS, FORMAT_CONTROL_PARAMS, TOKEN_EFFICIENCY } from '../constants.js';
import { isRecord } from '../utils/json.js';

export interface ClassifierOptions {
  oversizedTokenThreshold?: number;
  formatControlParams?: readonly string[];
}

/**
 * What the classifier needs to know about one operation besides its results.
 */
export interface OperationProfile {
  operation: Operation;
  paginationParams: readonly string[];
  filterParams: readonly string[];
}

function isAnswered(metric: ScenarioMetric): boolean {
  return metric.outcome === 'success' || metric.outcome === 'corrected';
}

/**
 * Whether the operation offers a response-format control parameter.
 */
export function hasFormatControl(operation: Operation, params: readonly string[] = FORMAT_CONTROL_PARAMS): boolean {
  const properties = operation.inputSchema.properties;
  if (!isRecord(properties)) {
    return false;
  }
  const wanted = new Set(params.map((param) => param.toLowerCase()));
  return Object.keys(properties).some((name) => wanted.has(name.toLowerCase()));
}

/**
 * Name or description suggests the operation returns detailed output.
 */
export function suggestsDetailedOutput(operation: Operation): boolean {
  const name = operation.name.toLowerCase();
  const description = operation.description.toLowerCase();
  return DETAIL_INDICATORS.some((word) => name.includes(word) || description.includes(word));
}

/**
 * Derive the issue flags and issue list for one operation.
 */
export function classifyOperation(
  profile: OperationProfile,
  metrics: readonly ScenarioMetric[],
  options: ClassifierOptions = {}
): { flags: IssueFlags; issues: Issue[] } {
  const { operation } = profile;
  const threshold = options.oversizedTokenThreshold ?? TOKEN_EFFICIENCY.OVERSIZED_THRESHOLD;
  const answered = metrics.filter(isAnswered);
  const collectionShaped = answered.some((metric) => metric.collectionShaped);
  const issues: Issue[] = [];

  const oversized = answered.filter((metric) => metric.tokenEstimate > threshold);
  for (const metric of oversized) {
    issues.push({
      operation: operation.name,
      type: 'oversized_response',
      severity: 'warning',
      message: `Response contains ${metric.tokenEstimate.toLocaleString('en-US')} tokens (>${threshold.toLocaleString('en-US')} recommended)`,
      suggestion: 'Consider implementing pagination, filtering, or truncation to reduce response size',
      scenario: metric.scenario,
      measuredTokens: metric.tokenEstimate,
    });
  }

  const missingPagination = collectionShaped && profile.paginationParams.length === 0;
  if (missingPagination) {
    issues.push({
      operation: operation.name,
      type: 'no_pagination',
      severity: 'info',
      message: "Tool returns collections but doesn't support pagination",
      suggestion: 'Consider adding pagination parameters (limit, offset, page) to control response size',
    });
  }

  const missingFiltering = collectionShaped && profile.filterParams.length === 0;
  if (missingFiltering) {
    issues.push({
      operation: operation.name,
      type: 'missing_filtering',
      severity: 'info',
      message: 'Tool would benefit from filtering capabilities to reduce response size',
      suggestion: 'Consider adding filtering parameters to allow users to specify exactly what data they need',
    });
  }

  const verbose = answered.some((metric) => metric.verboseIdentifiers);
  if (verbose) {
    issues.push({
      operation: operation.name,
      type: 'verbose_identifiers',
      severity: 'info',
      message: 'Responses contain verbose technical identifiers (UUIDs, hashes)',
      suggestion: 'Consider using semantic identifiers or provide response format options to exclude technical IDs',
    });
  }

  const lowValue = answered.some((metric) => metric.lowValueData);
  if (lowValue) {
    issues.push({
      operation: operation.name,
      type: 'redundant_data',
      severity: 'info',
      message: 'Responses contain potentially redundant or low-value data',
      suggestion: 'Review response format to prioritize high-signal information',
    });
  }

  const truncatedMetric = answered.find((metric) => metric.truncated);
  if (truncatedMetric) {
    issues.push({
      operation: operation.name,
      type: 'truncated_response',
      severity: 'info',
      message: 'Responses indicate truncated or partial results',
      suggestion: 'Make sure callers can tell how to fetch the remaining data',
      scenario: truncatedMetric.scenario,
    });
  }

  const noFormatControl = !hasFormatControl(operation, options.formatControlParams) && suggestsDetailedOutput(operation);
  if (noFormatControl) {
    issues.push({
      operation: operation.name,
      type: 'no_response_format_control',
      severity: 'info',
      message: 'Tool could benefit from response format control options',
      suggestion: "Consider adding response_format parameter (e.g., 'concise', 'detailed') to control output verbosity",
    });
  }

  return {
    flags: {
      oversizedResponse: oversized.length > 0,
      missingPagination,
      verboseIdentifiers: verbose,
      missingFiltering,
      truncation: truncatedMetric !== undefined,
      lowValueData: lowValue,
      noFormatControl,
    },
    issues,
  };
}
