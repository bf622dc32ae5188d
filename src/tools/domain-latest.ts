/**
 * Domain Latest tool - Most recent record of a health domain
 */

import type { Explorer } from '../services/explorer.js';
import type { DomainId } from '../types/index.js';
import { errorResult, escapeCell, textResult, type ToolResult } from './format.js';

interface DomainLatestToolInput {
  domain: DomainId;
}

export async function executeDomainLatestTool(
  explorer: Explorer,
  input: DomainLatestToolInput,
  signal?: AbortSignal
): Promise<ToolResult> {
  try {
    const spec = explorer.resolver.spec(input.domain);
    const record = await explorer.domainLatest(input.domain, signal);

    if (!record) {
      return textResult(`No ${spec.label.toLowerCase()} records yet.`);
    }

    const lines = [`# Latest ${spec.label.toLowerCase()}`, ''];
    for (const [field, value] of Object.entries(record)) {
      const unit = field === spec.valueField && spec.unit && value !== null ? ` ${spec.unit}` : '';
      lines.push(`- **${field}**: ${escapeCell(value)}${unit}`);
    }

    return textResult(lines.join('\n'));
  } catch (error) {
    return errorResult('loading latest record', error);
  }
}
