/**
 * Domain Status tool - Which health domains the connected database can serve
 */

import type { Explorer } from '../services/explorer.js';
import { formatTable, textResult, type ToolResult } from './format.js';

export function executeDomainStatusTool(explorer: Explorer): ToolResult {
  const rows = explorer.domainStatuses().map(status => {
    const state = explorer.resolver.state(status.domainId);
    const table = state.status === 'resolved' ? state.domain.table.tableName : '';
    return [
      explorer.resolver.spec(status.domainId).label,
      status.available ? 'available' : 'unavailable',
      table,
      status.reason ?? '',
    ];
  });

  const lines = ['# Health domains', '', ...formatTable(['Domain', 'Status', 'Table', 'Reason'], rows)];
  return textResult(lines.join('\n'));
}
