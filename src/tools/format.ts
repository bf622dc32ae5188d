/**
 * Markdown rendering shared by the tools
 */

import { describeError, isExplorerError } from '../errors.js';
import type { PageResult } from '../types/index.js';

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

const SPARK_LEVELS = '▁▂▃▄▅▆▇█';

export function textResult(text: string): ToolResult {
  return { content: [{ type: 'text', text }] };
}

/**
 * Error content for a failed tool call. Only explorer errors carry a
 * user-facing message; anything else is logged and reported generically.
 */
export function errorResult(action: string, error: unknown): ToolResult {
  if (!isExplorerError(error)) {
    console.error(`Unexpected error ${action}:`, error);
  }
  return {
    content: [{ type: 'text', text: `Error ${action}: ${describeError(error)}` }],
    isError: true,
  };
}

export function escapeCell(val: unknown): string {
  if (val === null || val === undefined) return 'NULL';
  let s: string;
  if (val instanceof Date) {
    s = val.toISOString();
  } else if (typeof val === 'object') {
    s = JSON.stringify(val);
  } else {
    s = String(val);
  }
  return s.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

export function formatTable(columns: readonly string[], rows: readonly unknown[][]): string[] {
  const lines: string[] = [];
  lines.push('| ' + columns.map(escapeCell).join(' | ') + ' |');
  lines.push('|' + columns.map(() => '---').join('|') + '|');
  for (const row of rows) {
    const cells = columns.map((_, i) => escapeCell(row[i]));
    lines.push('| ' + cells.join(' | ') + ' |');
  }
  return lines;
}

export function sparkline(values: readonly number[]): string {
  if (values.length === 0) return '';
  const min = Math.min(...values);
  const max = Math.max(...values);
  const span = max - min;
  const top = SPARK_LEVELS.length - 1;

  return values
    .map(v => SPARK_LEVELS[span === 0 ? 0 : Math.round(((v - min) / span) * top)])
    .join('');
}

/**
 * Minutes as `7h 5m`, or `45m` under an hour
 */
export function formatDuration(minutes: number): string {
  const whole = Math.trunc(minutes);
  const hours = Math.floor(whole / 60);
  const rest = whole % 60;
  return hours > 0 ? `${hours}h ${rest}m` : `${rest}m`;
}

export function formatNumber(value: number | null, digits = 1): string {
  if (value === null) return 'n/a';
  return Number.isInteger(value) ? String(value) : value.toFixed(digits);
}

/**
 * Page footer: position and the cursors to pass back for navigation
 */
export function formatPageFooter(page: PageResult): string[] {
  const lines: string[] = [];
  const first = page.page * page.pageSize + 1;
  const last = page.page * page.pageSize + page.rows.length;

  if (page.rows.length === 0) {
    lines.push(`*Page ${page.page + 1}: no rows*`);
  } else if (page.total !== undefined) {
    lines.push(`*Rows ${first}-${last} of ${page.total} (page ${page.page + 1})*`);
  } else {
    lines.push(`*Rows ${first}-${last} (page ${page.page + 1})*`);
  }

  if (page.previousCursor || page.nextCursor) {
    lines.push('');
    if (page.previousCursor) lines.push(`Previous page: cursor \`${page.previousCursor}\``);
    if (page.nextCursor) lines.push(`Next page: cursor \`${page.nextCursor}\``);
  }
  return lines;
}
