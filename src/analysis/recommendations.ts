import type { AnalysisStatistics, Issue, IssueType } from './types.js';
import { TOKEN_EFFICIENCY } from '../constants.js';

/**
 * Top-level recommendations from issue counts and run statistics. Counts
 * are of distinct operations, so several oversized scenarios of one tool
 * count once.
 */
export function generateRecommendations(
  issues: readonly Issue[],
  statistics: AnalysisStatistics,
  oversizedTokenThreshold: number = TOKEN_EFFICIENCY.OVERSIZED_THRESHOLD
): string[] {
  const operations = new Map<IssueType, Set<string>>();
  for (const issue of issues) {
    const names = operations.get(issue.type) ?? new Set<string>();
    names.add(issue.operation);
    operations.set(issue.type, names);
  }
  const count = (type: IssueType): number => operations.get(type)?.size ?? 0;
  const limit = `${Math.round(oversizedTokenThreshold / 1000)}k`;

  const recommendations: string[] = [];
  if (count('oversized_response') > 0) {
    recommendations.push(
      `Implement response size limits for ${count('oversized_response')} tools with oversized responses (>${limit} tokens)`
    );
  }
  if (count('no_pagination') > 0) {
    recommendations.push(`Add pagination support to ${count('no_pagination')} tools that return collections`);
  }
  if (count('missing_filtering') > 0) {
    recommendations.push(`Add filtering capabilities to ${count('missing_filtering')} tools to reduce response size`);
  }
  if (count('verbose_identifiers') > 0) {
    recommendations.push(
      `Replace verbose technical identifiers with semantic ones in ${count('verbose_identifiers')} tools`
    );
  }
  if (count('no_response_format_control') > 0) {
    recommendations.push(
      `Add response format control (concise/detailed) to ${count('no_response_format_control')} tools`
    );
  }
  if (statistics.maxTokens > oversizedTokenThreshold) {
    recommendations.push(
      `Consider implementing global response size limits - observed max: ${statistics.maxTokens.toLocaleString('en-US')} tokens`
    );
  }

  if (recommendations.length === 0) {
    recommendations.push('All tools show good token efficiency! Consider monitoring response sizes over time.');
  }
  return recommendations;
}
