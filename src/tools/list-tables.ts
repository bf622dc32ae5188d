/**
 * List Tables tool - Tables and views of the configured schema
 */

import type { Explorer } from '../services/explorer.js';
import { errorResult, textResult, type ToolResult } from './format.js';

export async function executeListTablesTool(explorer: Explorer, signal?: AbortSignal): Promise<ToolResult> {
  try {
    const tables = await explorer.listTables(signal);

    if (tables.length === 0) {
      return textResult(`No tables found in schema ${explorer.catalog.schemaName}.`);
    }

    const lines = [`# Tables in ${explorer.catalog.schemaName}`, ''];
    for (const table of tables) {
      lines.push(`- ${table}`);
    }
    lines.push('');
    lines.push(`*${tables.length} table(s)*`);

    return textResult(lines.join('\n'));
  } catch (error) {
    return errorResult('listing tables', error);
  }
}
