import { describe, it, expect } from 'vitest';
import { parse as parseYaml } from 'yaml';
import {
  formatCacheStats,
  formatFlags,
  formatNumber,
  formatReport,
  isOutputFormat,
  renderTable,
} from '../../src/cli/output/report-formatter.js';
import type { AnalysisReport } from '../../src/analysis/types.js';
import type { ToolCallCacheStats } from '../../src/cache/tool-call-cache.js';
import { NO_FLAGS, scenarioMetric } from '../fixtures/metrics.js';

function sampleReport(): AnalysisReport {
  return {
    target: 'node fake-server.js',
    server: { name: 'fake', version: '1.2.3', protocolVersion: '2025-11-25' },
    transport: 'stdio',
    startedAt: '2026-10-19T08:30:00.000Z',
    durationMs: 1234,
    operations: [
      {
        operation: 'list_items',
        scenarios: [
          scenarioMetric({ scenario: 'minimal', tokenEstimate: 400 }),
          scenarioMetric({ scenario: 'typical', outcome: 'tool_failure', tokenEstimate: 0, error: 'boom' }),
          scenarioMetric({ scenario: 'large', tokenEstimate: 90000 }),
        ],
        avgTokens: 30133.33,
        minTokens: 0,
        maxTokens: 90000,
        failureCount: 1,
        flags: { ...NO_FLAGS, oversizedResponse: true, missingPagination: true },
      },
      {
        operation: 'ping',
        scenarios: [scenarioMetric({ tokenEstimate: 10 })],
        avgTokens: 10,
        minTokens: 10,
        maxTokens: 10,
        failureCount: 0,
        flags: NO_FLAGS,
      },
    ],
    issues: [
      {
        operation: 'list_items',
        type: 'oversized_response',
        severity: 'error',
        message: 'Response is 90,000 tokens',
        suggestion: 'Add pagination',
        scenario: 'large',
        measuredTokens: 90000,
      },
    ],
    statistics: {
      operationsAnalyzed: 2,
      scenariosRun: 4,
      successes: 3,
      failures: 1,
      corrected: 0,
      operationsWithIssues: 1,
      responsesExceedingLimit: 1,
      avgTokens: 22602.5,
      maxTokens: 90000,
    },
    recommendations: ['Paginate list_items'],
  };
}

describe('cli/output/report-formatter', () => {
  describe('helpers', () => {
    it('should group thousands and round', () => {
      expect(formatNumber(30133.33)).toBe('30,133');
      expect(formatNumber(22602.5)).toBe('22,603');
      expect(formatNumber(0)).toBe('0');
    });

    it('should label raised flags in a fixed order', () => {
      expect(formatFlags({ ...NO_FLAGS, noFormatControl: true, oversizedResponse: true })).toBe(
        'oversized, no format control'
      );
      expect(formatFlags(NO_FLAGS)).toBe('-');
    });

    it('should recognize output formats', () => {
      expect(isOutputFormat('yaml')).toBe(true);
      expect(isOutputFormat('xml')).toBe(false);
      expect(isOutputFormat(1)).toBe(false);
    });

    it('should pad columns and trim line ends', () => {
      expect(renderTable(['Tool', 'Calls'], [['list_items', '3'], ['ping', '12']])).toEqual([
        'Tool        Calls',
        '----------  -----',
        'list_items  3',
        'ping        12',
      ]);
    });
  });

  describe('formatReport', () => {
    it('should emit JSON that parses back to the report', () => {
      const report = sampleReport();

      expect(JSON.parse(formatReport(report, 'json'))).toEqual(report);
    });

    it('should emit YAML that parses back to the report', () => {
      const report = sampleReport();

      expect(parseYaml(formatReport(report, 'yaml'))).toEqual(report);
    });

    it('should render the table view', () => {
      const lines = formatReport(sampleReport(), 'table', { color: false }).split('\n');

      expect(lines.slice(0, 5)).toEqual([
        'Server: fake 1.2.3 (protocol 2025-11-25)',
        'Target: node fake-server.js',
        'Transport: stdio (child process)',
        'Duration: 1.2s',
        '',
      ]);
      expect(lines[5]).toBe('Tool        Scenarios  Failed  Avg tokens  Max tokens  Issues');
      expect(lines[7]).toBe(
        'list_items  3' +
          ' '.repeat(10) +
          '1' +
          ' '.repeat(7) +
          '30,133' +
          ' '.repeat(6) +
          '90,000' +
          ' '.repeat(6) +
          'oversized, no pagination'
      );
      expect(lines.slice(10)).toEqual([
        'Issues (1):',
        '  ✗ list_items [large]: Response is 90,000 tokens',
        '      Add pagination',
        '',
        'Summary:',
        '  Tools analyzed: 2',
        '  Scenarios run: 4 (3 succeeded, 1 failed, 0 corrected)',
        '  Tools with issues: 1',
        '  Avg tokens: 22,603 | Max tokens: 90,000',
        '  Responses over limit: 1',
        '',
        'Recommendations:',
        '  1) Paginate list_items',
      ]);
    });

    it('should say when there are no issues', () => {
      const report = { ...sampleReport(), issues: [], transport: null };
      const text = formatReport(report, 'table', { color: false });

      expect(text).toContain('Transport: unknown\n');
      expect(text).toContain('Issues (0):\n  No issues found\n');
    });
  });

  describe('formatCacheStats', () => {
    const stats: ToolCallCacheStats = {
      serverIdentity: 'node fake-server.js',
      cachePath: '/tmp/cache/node_fake-server.js',
      totalOperations: 1,
      totalCalls: 3,
      operations: {
        list_items: {
          operation_name: 'list_items',
          total_cached_calls: 3,
          first_cached: '2026-10-19T08:30:12.345Z',
          last_cached: '2026-10-19T08:30:14.345Z',
          scenarios: { minimal: 1, typical: 1, large: 1 },
        },
      },
    };

    it('should list cached tools', () => {
      expect(formatCacheStats(stats, { color: false }).split('\n')).toEqual([
        'Server: node fake-server.js',
        'Cache path: /tmp/cache/node_fake-server.js',
        'Cached calls: 3 across 1 tools',
        '',
        'Tool        Calls  First cached' + ' '.repeat(14) + 'Last cached',
        '----------  -----  ' + '-'.repeat(24) + '  ' + '-'.repeat(24),
        'list_items  3      2026-10-19T08:30:12.345Z  2026-10-19T08:30:14.345Z',
      ]);
    });

    it('should stop after the summary for an empty cache', () => {
      const empty = { ...stats, totalOperations: 0, totalCalls: 0, operations: {} };

      expect(formatCacheStats(empty, { color: false })).toBe(
        'Server: node fake-server.js\nCache path: /tmp/cache/node_fake-server.js\nCached calls: 0 across 0 tools'
      );
    });
  });
});
