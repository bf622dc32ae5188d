/**
 * Domain Records tool - Newest-first pages of a health domain
 */

import type { Explorer } from '../services/explorer.js';
import type { DomainId } from '../types/index.js';
import { errorResult, formatPageFooter, formatTable, textResult, type ToolResult } from './format.js';

interface DomainRecordsToolInput {
  domain: DomainId;
  cursor?: string;
}

export async function executeDomainRecordsTool(
  explorer: Explorer,
  input: DomainRecordsToolInput,
  signal?: AbortSignal
): Promise<ToolResult> {
  try {
    const page = await explorer.domainRecords(input.domain, input.cursor, signal);

    const lines = [`# ${explorer.resolver.spec(input.domain).label} records`, ''];
    if (page.rows.length > 0) {
      lines.push(...formatTable(page.columns, page.rows));
      lines.push('');
    }
    lines.push(...formatPageFooter(page));

    return textResult(lines.join('\n'));
  } catch (error) {
    return errorResult('loading records', error);
  }
}
