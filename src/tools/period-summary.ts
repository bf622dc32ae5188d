/**
 * Period Summary tool - Weight change, steps and sleep over the last week or month
 */

import type { Explorer } from '../services/explorer.js';
import { errorResult, formatDuration, formatNumber, textResult, type ToolResult } from './format.js';

const PERIOD_DAYS = { week: 7, month: 30 } as const;

interface PeriodSummaryToolInput {
  period: keyof typeof PERIOD_DAYS;
}

export async function executePeriodSummaryTool(
  explorer: Explorer,
  input: PeriodSummaryToolInput,
  signal?: AbortSignal
): Promise<ToolResult> {
  try {
    const summary = await explorer.period(PERIOD_DAYS[input.period], signal);
    const lines = [`# Last ${summary.days} days`, ''];

    if (!summary.weight.available) {
      lines.push(`- **Weight change**: unavailable (${summary.weight.reason})`);
    } else if (summary.weight.value === null) {
      lines.push('- **Weight change**: n/a');
    } else {
      const { first, last, delta } = summary.weight.value;
      const sign = delta >= 0 ? '+' : '';
      lines.push(`- **Weight change**: ${sign}${delta.toFixed(1)} kg (${first.toFixed(1)} -> ${last.toFixed(1)})`);
    }

    if (!summary.steps.available) {
      lines.push(`- **Steps**: unavailable (${summary.steps.reason})`);
    } else {
      const steps = summary.steps.value;
      lines.push(`- **Steps avg/day**: ${steps ? formatNumber(steps.average, 0) : 'n/a'}`);
      lines.push(`- **Steps total**: ${steps ? formatNumber(steps.total, 0) : 'n/a'}`);
    }

    if (!summary.sleep.available) {
      lines.push(`- **Sleep avg**: unavailable (${summary.sleep.reason})`);
    } else {
      lines.push(`- **Sleep avg**: ${summary.sleep.value === null ? 'n/a' : formatDuration(summary.sleep.value)}`);
    }

    return textResult(lines.join('\n'));
  } catch (error) {
    return errorResult('summarizing period', error);
  }
}
