/**
 * Types for analysis results.
 */

import type { ScenarioName } from '../scenarios/argument-synthesizer.js';
import type { TransportType } from '../transport/base-transport.js';
import type { ServerIdentity } from '../transport/types.js';

/**
 * How one scenario ended.
 *
 * - success: the first call succeeded
 * - corrected: the first call failed validation and the corrected retry succeeded
 * - validation_failure: arguments were rejected and no correction helped
 * - tool_failure: the tool failed for another reason
 * - transport_failure: the call never produced a tool-level answer
 */
export type ScenarioOutcome =
  | 'success'
  | 'corrected'
  | 'validation_failure'
  | 'tool_failure'
  | 'transport_failure';

export type IssueType =
  | 'oversized_response'
  | 'no_pagination'
  | 'verbose_identifiers'
  | 'missing_filtering'
  | 'redundant_data'
  | 'truncated_response'
  | 'no_response_format_control';

export type IssueSeverity = 'error' | 'warning' | 'info';

/**
 * Structural signals read from one response payload.
 */
export interface ResponseSignals {
  collectionShaped: boolean;
  verboseIdentifiers: boolean;
  truncated: boolean;
  lowValueData: boolean;
}

export interface ScenarioMetric extends ResponseSignals {
  scenario: ScenarioName;
  /** Arguments of the call that produced the outcome */
  args: Record<string, unknown>;
  /** Synthesized arguments, when a correction replaced them */
  originalArgs?: Record<string, unknown>;
  outcome: ScenarioOutcome;
  tokenEstimate: number;
  elapsedMs: number;
  sizeBytes: number;
  /** Whether the synthesized arguments passed the input schema; null if it did not compile */
  schemaValid: boolean | null;
  error?: string;
  errorCode?: string;
}

/**
 * One boolean per issue category.
 */
export interface IssueFlags {
  oversizedResponse: boolean;
  missingPagination: boolean;
  verboseIdentifiers: boolean;
  missingFiltering: boolean;
  truncation: boolean;
  lowValueData: boolean;
  noFormatControl: boolean;
}

/**
 * Per-operation rollup, rebuilt from the scenario metrics on every run.
 */
export interface OperationMetrics {
  operation: string;
  scenarios: ScenarioMetric[];
  avgTokens: number;
  minTokens: number;
  maxTokens: number;
  failureCount: number;
  flags: IssueFlags;
}

export interface Issue {
  operation: string;
  type: IssueType;
  severity: IssueSeverity;
  message: string;
  suggestion: string;
  scenario?: ScenarioName;
  measuredTokens?: number;
}

export interface AnalysisStatistics {
  operationsAnalyzed: number;
  scenariosRun: number;
  successes: number;
  failures: number;
  corrected: number;
  operationsWithIssues: number;
  /** Scenarios whose response exceeded the oversized threshold */
  responsesExceedingLimit: number;
  avgTokens: number;
  maxTokens: number;
}

export interface AnalysisReport {
  target: string;
  server: ServerIdentity;
  transport: TransportType | null;
  startedAt: string;
  durationMs: number;
  operations: OperationMetrics[];
  issues: Issue[];
  statistics: AnalysisStatistics;
  recommendations: string[];
}
