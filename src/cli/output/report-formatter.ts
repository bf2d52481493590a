/**
 * Terminal formatting for analysis reports and cache statistics.
 */

import { Chalk, type ChalkInstance } from 'chalk';
import { stringify as stringifyYaml } from 'yaml';
import type { AnalysisReport, Issue, IssueFlags, IssueSeverity } from '../../analysis/types.js';
import type { ToolCallCacheStats } from '../../cache/tool-call-cache.js';
import { describeTransport } from '../../transport/factory.js';
import { getOutputConfig } from '../output.js';

export type OutputFormat = 'table' | 'json' | 'yaml';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['table', 'json', 'yaml'];

export interface FormatOptions {
  /** Defaults to on when stdout is a TTY and colors are not disabled */
  color?: boolean;
}

const FLAG_LABELS: ReadonlyArray<readonly [keyof IssueFlags, string]> = [
  ['oversizedResponse', 'oversized'],
  ['missingPagination', 'no pagination'],
  ['missingFiltering', 'no filtering'],
  ['verboseIdentifiers', 'verbose ids'],
  ['truncation', 'truncated'],
  ['lowValueData', 'low-value data'],
  ['noFormatControl', 'no format control'],
];

export function isOutputFormat(value: unknown): value is OutputFormat {
  return typeof value === 'string' && OUTPUT_FORMATS.some((format) => format === value);
}

export function formatNumber(value: number): string {
  return Math.round(value).toLocaleString('en-US');
}

export function formatFlags(flags: IssueFlags): string {
  const labels = FLAG_LABELS.filter(([key]) => flags[key]).map(([, label]) => label);
  return labels.length > 0 ? labels.join(', ') : '-';
}

/**
 * Left-aligned columns separated by two spaces, trailing space trimmed.
 */
export function renderTable(headers: string[], rows: string[][]): string[] {
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map((row) => (row[column] ?? '').length))
  );
  const renderRow = (cells: string[]): string =>
    cells.map((cell, column) => cell.padEnd(widths[column] ?? 0)).join('  ').trimEnd();

  return [
    renderRow(headers),
    renderRow(widths.map((width) => '-'.repeat(width))),
    ...rows.map(renderRow),
  ];
}

export function formatReport(report: AnalysisReport, format: OutputFormat, options: FormatOptions = {}): string {
  switch (format) {
    case 'json':
      return JSON.stringify(report, null, 2);
    case 'yaml':
      return stringifyYaml(report);
    case 'table':
      return formatReportTable(report, options);
  }
}

export function formatReportTable(report: AnalysisReport, options: FormatOptions = {}): string {
  const c = palette(options);
  const { server, statistics } = report;
  const lines: string[] = [];

  lines.push(c.bold(`Server: ${server.name} ${server.version} (protocol ${server.protocolVersion})`));
  lines.push(`Target: ${report.target}`);
  lines.push(`Transport: ${report.transport ? describeTransport(report.transport) : 'unknown'}`);
  lines.push(`Duration: ${(report.durationMs / 1000).toFixed(1)}s`);
  lines.push('');

  const rows = report.operations.map((operation) => [
    operation.operation,
    String(operation.scenarios.length),
    String(operation.failureCount),
    formatNumber(operation.avgTokens),
    formatNumber(operation.maxTokens),
    formatFlags(operation.flags),
  ]);
  const [header, rule, ...body] = renderTable(
    ['Tool', 'Scenarios', 'Failed', 'Avg tokens', 'Max tokens', 'Issues'],
    rows
  );
  lines.push(c.bold(header ?? ''), c.dim(rule ?? ''), ...body);
  lines.push('');

  lines.push(c.bold(`Issues (${report.issues.length}):`));
  if (report.issues.length === 0) {
    lines.push('  No issues found');
  }
  for (const issue of report.issues) {
    lines.push(...formatIssue(issue, c));
  }
  lines.push('');

  lines.push(c.bold('Summary:'));
  lines.push(`  Tools analyzed: ${statistics.operationsAnalyzed}`);
  lines.push(
    `  Scenarios run: ${statistics.scenariosRun} (${statistics.successes} succeeded, ` +
      `${statistics.failures} failed, ${statistics.corrected} corrected)`
  );
  lines.push(`  Tools with issues: ${statistics.operationsWithIssues}`);
  lines.push(`  Avg tokens: ${formatNumber(statistics.avgTokens)} | Max tokens: ${formatNumber(statistics.maxTokens)}`);
  lines.push(`  Responses over limit: ${statistics.responsesExceedingLimit}`);
  lines.push('');

  lines.push(c.bold('Recommendations:'));
  report.recommendations.forEach((recommendation, index) => {
    lines.push(`  ${index + 1}) ${recommendation}`);
  });

  return lines.join('\n');
}

export function formatCacheStats(stats: ToolCallCacheStats, options: FormatOptions = {}): string {
  const c = palette(options);
  const lines = [
    c.bold(`Server: ${stats.serverIdentity}`),
    `Cache path: ${stats.cachePath}`,
    `Cached calls: ${stats.totalCalls} across ${stats.totalOperations} tools`,
  ];

  const names = Object.keys(stats.operations).sort();
  if (names.length === 0) {
    return lines.join('\n');
  }

  const rows = names.map((name) => {
    const index = stats.operations[name];
    return [
      name,
      String(index?.total_cached_calls ?? 0),
      index?.first_cached ?? '-',
      index?.last_cached ?? '-',
    ];
  });
  lines.push('', ...renderTable(['Tool', 'Calls', 'First cached', 'Last cached'], rows));
  return lines.join('\n');
}

function formatIssue(issue: Issue, c: ChalkInstance): string[] {
  const scenario = issue.scenario ? ` [${issue.scenario}]` : '';
  return [
    `  ${severityLabel(issue.severity, c)} ${issue.operation}${scenario}: ${issue.message}`,
    `      ${c.dim(issue.suggestion)}`,
  ];
}

function severityLabel(severity: IssueSeverity, c: ChalkInstance): string {
  switch (severity) {
    case 'error':
      return c.red('✗');
    case 'warning':
      return c.yellow('⚠');
    case 'info':
      return c.cyan('ℹ');
  }
}

function palette(options: FormatOptions): ChalkInstance {
  const enabled = options.color ?? (!getOutputConfig().noColor && (process.stdout.isTTY ?? false));
  return new Chalk({ level: enabled ? 1 : 0 });
}
