/**
 * Domain Summary tool - Aggregates over recent days with a trend line
 */

import type { Explorer } from '../services/explorer.js';
import type { DomainId } from '../types/index.js';
import { errorResult, formatNumber, sparkline, textResult, type ToolResult } from './format.js';

interface DomainSummaryToolInput {
  domain: DomainId;
  days: number;
  points: number;
}

export async function executeDomainSummaryTool(
  explorer: Explorer,
  input: DomainSummaryToolInput,
  signal?: AbortSignal
): Promise<ToolResult> {
  try {
    const spec = explorer.resolver.spec(input.domain);
    const [summary, series] = await Promise.all([
      explorer.domainSummary(input.domain, input.days, signal),
      explorer.domainSeries(input.domain, input.points, signal),
    ]);
    const unit = spec.unit ? ` ${spec.unit}` : '';
    const withUnit = (value: number | null) => (value === null ? 'n/a' : `${formatNumber(value)}${unit}`);

    const lines = [
      `# ${spec.label}: last ${summary.days} day(s)`,
      '',
      `- **Samples**: ${summary.count}`,
      `- **Average**: ${withUnit(summary.average)}`,
      `- **Minimum**: ${withUnit(summary.minimum)}`,
      `- **Maximum**: ${withUnit(summary.maximum)}`,
      `- **Total**: ${withUnit(summary.total)}`,
    ];

    if (series.length > 0) {
      lines.push('');
      lines.push(`Trend (last ${series.length}): ${sparkline(series)}`);
    }

    return textResult(lines.join('\n'));
  } catch (error) {
    return errorResult('summarizing domain', error);
  }
}
