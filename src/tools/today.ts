/**
 * Today tool - One line per health domain for the local calendar day
 */

import type { Explorer } from '../services/explorer.js';
import type { DomainSnapshot } from '../types/index.js';
import { errorResult, escapeCell, formatDuration, formatNumber, textResult, type ToolResult } from './format.js';

function describeSnapshot<T>(snapshot: DomainSnapshot<T | null>, empty: string, render: (value: T) => string): string {
  if (!snapshot.available) return `unavailable (${snapshot.reason})`;
  return snapshot.value === null ? empty : render(snapshot.value);
}

export async function executeTodayTool(explorer: Explorer, signal?: AbortSignal): Promise<ToolResult> {
  try {
    const today = await explorer.today(signal);
    const weightSpec = explorer.resolver.spec('weight');
    const sleepSpec = explorer.resolver.spec('sleep');

    const weight = describeSnapshot(today.weight, 'no record yet', record => {
      const value = weightSpec.valueField ? record[weightSpec.valueField] : undefined;
      const unit = weightSpec.unit ? ` ${weightSpec.unit}` : '';
      return `${escapeCell(value)}${unit} (${escapeCell(record[weightSpec.timestampField])})`;
    });
    const steps = describeSnapshot(today.steps, 'no record today', total => formatNumber(total, 0));
    const sleep = describeSnapshot(today.sleep, 'no session today', record => {
      const minutes = sleepSpec.valueField ? Number(record[sleepSpec.valueField]) : Number.NaN;
      const duration = Number.isFinite(minutes) ? formatDuration(minutes) : 'duration unknown';
      return `${duration} (started ${escapeCell(record[sleepSpec.timestampField])})`;
    });
    const heart = describeSnapshot(
      today.heart,
      'no samples today',
      h =>
        `avg ${formatNumber(h.average, 0)} bpm (min ${formatNumber(h.minimum, 0)}, max ${formatNumber(h.maximum, 0)}, ${h.count} samples)`
    );

    const lines = [
      `# Today (${today.date}, ${today.timeZone})`,
      '',
      `- **Weight**: ${weight}`,
      `- **Steps**: ${steps}`,
      `- **Sleep**: ${sleep}`,
      `- **Heart rate**: ${heart}`,
    ];
    return textResult(lines.join('\n'));
  } catch (error) {
    return errorResult('building today', error);
  }
}
