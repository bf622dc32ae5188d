/**
 * Guided Query tool - Page through a table without writing SQL
 */

import type { GuidedQueryInput, Explorer } from '../services/explorer.js';
import { errorResult, formatPageFooter, formatTable, textResult, type ToolResult } from './format.js';

interface GuidedQueryToolInput extends GuidedQueryInput {
  cursor?: string;
}

export async function executeGuidedQueryTool(
  explorer: Explorer,
  input: GuidedQueryToolInput,
  signal?: AbortSignal
): Promise<ToolResult> {
  try {
    const { cursor, ...request } = input;
    const page = await explorer.runGuidedQuery(request, cursor, signal);

    const lines = [`# ${input.table}`, ''];
    if (page.rows.length > 0) {
      lines.push(...formatTable(page.columns, page.rows));
      lines.push('');
    }
    lines.push(...formatPageFooter(page));

    return textResult(lines.join('\n'));
  } catch (error) {
    return errorResult('running guided query', error);
  }
}
