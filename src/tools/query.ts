/**
 * Query tool - Execute a validated, read-only SQL query
 */

import type { Explorer } from '../services/explorer.js';
import type { QueryResult } from '../types/index.js';
import { errorResult, formatTable, textResult, type ToolResult } from './format.js';

interface QueryToolInput {
  sql: string;
}

export async function executeQueryTool(
  explorer: Explorer,
  input: QueryToolInput,
  signal?: AbortSignal
): Promise<ToolResult> {
  try {
    const result = await explorer.runRawQuery(input.sql, { signal });
    return textResult(formatQueryResult(result));
  } catch (error) {
    return errorResult('executing query', error);
  }
}

export function formatQueryResult(result: QueryResult): string {
  if (result.rows.length === 0) {
    return 'Query returned 0 rows.';
  }

  const lines = formatTable(result.columns, result.rows);
  lines.push('');
  lines.push(`*${result.rows.length} row(s) in ${result.elapsedMs}ms*`);

  if (result.rows.length >= result.appliedLimit) {
    lines.push('');
    lines.push(`> Results limited to ${result.appliedLimit} rows. Narrow the query or use guided_query to page.`);
  }

  return lines.join('\n');
}
