import { describe, it, expect } from 'vitest';
import { aggregateOperation, computeStatistics, isFailure } from '../../src/analysis/metrics.js';
import { NO_FLAGS, issue, scenarioMetric } from '../fixtures/metrics.js';

describe('isFailure', () => {
  it('should treat success and corrected as answered', () => {
    expect(isFailure(scenarioMetric({ outcome: 'success' }))).toBe(false);
    expect(isFailure(scenarioMetric({ outcome: 'corrected' }))).toBe(false);
    expect(isFailure(scenarioMetric({ outcome: 'validation_failure' }))).toBe(true);
    expect(isFailure(scenarioMetric({ outcome: 'tool_failure' }))).toBe(true);
    expect(isFailure(scenarioMetric({ outcome: 'transport_failure' }))).toBe(true);
  });
});

describe('aggregateOperation', () => {
  it('should count tokens of answered, non-empty responses only', () => {
    const result = aggregateOperation(
      'search',
      [
        scenarioMetric({ tokenEstimate: 100 }),
        scenarioMetric({ tokenEstimate: 300 }),
        scenarioMetric({ tokenEstimate: 0 }),
        scenarioMetric({ outcome: 'tool_failure', tokenEstimate: 5000 }),
      ],
      NO_FLAGS
    );

    expect(result).toMatchObject({ operation: 'search', avgTokens: 200, minTokens: 100, maxTokens: 300, failureCount: 1 });
    expect(result.scenarios).toHaveLength(4);
  });

  it('should report zeros when nothing was answered', () => {
    const result = aggregateOperation('broken', [scenarioMetric({ outcome: 'tool_failure' })], NO_FLAGS);

    expect(result).toMatchObject({ avgTokens: 0, minTokens: 0, maxTokens: 0, failureCount: 1 });
  });
});

describe('computeStatistics', () => {
  it('should roll up every scenario of every operation', () => {
    const a = aggregateOperation(
      'a',
      [
        scenarioMetric({ tokenEstimate: 100 }),
        scenarioMetric({ outcome: 'corrected', tokenEstimate: 300 }),
        scenarioMetric({ outcome: 'validation_failure', tokenEstimate: 0 }),
      ],
      NO_FLAGS
    );
    const b = aggregateOperation(
      'b',
      [
        scenarioMetric({ tokenEstimate: 30000 }),
        scenarioMetric({ outcome: 'tool_failure', tokenEstimate: 0 }),
        scenarioMetric({ outcome: 'transport_failure', tokenEstimate: 0 }),
      ],
      NO_FLAGS
    );

    const stats = computeStatistics([a, b], [issue('b', 'oversized_response'), issue('b', 'no_pagination'), issue('a', 'verbose_identifiers')]);

    expect(stats).toEqual({
      operationsAnalyzed: 2,
      scenariosRun: 6,
      successes: 3,
      failures: 3,
      corrected: 1,
      operationsWithIssues: 2,
      responsesExceedingLimit: 1,
      avgTokens: 10133,
      maxTokens: 30000,
    });
  });

  it('should apply the configured threshold', () => {
    const op = aggregateOperation('a', [scenarioMetric({ tokenEstimate: 1500 }), scenarioMetric({ tokenEstimate: 500 })], NO_FLAGS);

    expect(computeStatistics([op], [], 1000).responsesExceedingLimit).toBe(1);
  });

  it('should handle an empty run', () => {
    expect(computeStatistics([], [])).toEqual({
      operationsAnalyzed: 0,
      scenariosRun: 0,
      successes: 0,
      failures: 0,
      corrected: 0,
      operationsWithIssues: 0,
      responsesExceedingLimit: 0,
      avgTokens: 0,
      maxTokens: 0,
    });
  });
});
