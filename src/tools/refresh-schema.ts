/**
 * Refresh Schema tool - Reload the schema cache and re-resolve domains
 */

import type { Explorer } from '../services/explorer.js';
import { errorResult, textResult, type ToolResult } from './format.js';

export async function executeRefreshSchemaTool(explorer: Explorer, signal?: AbortSignal): Promise<ToolResult> {
  try {
    const startTime = Date.now();
    const summary = await explorer.refresh(signal);
    const elapsed = Date.now() - startTime;

    const lines: string[] = [
      '# Schema Refresh Complete',
      '',
      `Refresh time: ${elapsed}ms`,
      '',
      '## Summary',
      `- **Tables**: ${summary.tables}`,
      `- **Columns**: ${summary.columns}`,
      '',
      '## Domains',
    ];
    for (const status of summary.domains) {
      lines.push(`- **${status.domainId}**: ${status.available ? 'available' : `unavailable (${status.reason})`}`);
    }

    return textResult(lines.join('\n'));
  } catch (error) {
    return errorResult('refreshing schema', error);
  }
}
