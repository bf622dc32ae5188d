/**
 * Describe Table tool - Live columns and indexes of one table or view
 */

import type { Explorer } from '../services/explorer.js';
import { errorResult, formatTable, textResult, type ToolResult } from './format.js';

interface DescribeTableToolInput {
  table: string;
}

export async function executeDescribeTableTool(
  explorer: Explorer,
  input: DescribeTableToolInput,
  signal?: AbortSignal
): Promise<ToolResult> {
  try {
    const { table, indexes } = await explorer.describeTable(input.table, signal);

    const lines = [`# ${table.schemaName}.${table.tableName}`, ''];
    lines.push(
      ...formatTable(
        ['Column', 'Type', 'Category', 'Nullable', 'Default'],
        table.columns.map(c => [c.name, c.dataType, c.category, c.nullable ? 'yes' : 'no', c.defaultValue ?? ''])
      )
    );
    lines.push('');
    lines.push(`*${table.columns.length} column(s)*`);

    lines.push('');
    lines.push('## Indexes');
    lines.push('');
    if (indexes.length === 0) {
      lines.push('None.');
    } else {
      for (const index of indexes) {
        lines.push(`- **${index.name}**: \`${index.definition}\``);
      }
    }

    return textResult(lines.join('\n'));
  } catch (error) {
    return errorResult('describing table', error);
  }
}
