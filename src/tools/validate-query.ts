/**
 * Validate Query tool - Run the validation rules without touching the database
 */

import type { Explorer } from '../services/explorer.js';
import { errorResult, textResult, type ToolResult } from './format.js';

interface ValidateQueryToolInput {
  sql: string;
}

export async function executeValidateQueryTool(
  explorer: Explorer,
  input: ValidateQueryToolInput
): Promise<ToolResult> {
  try {
    const outcome = explorer.validate(input.sql);

    if (!outcome.ok) {
      return {
        ...textResult(JSON.stringify({ valid: false, reason: outcome.reason, error: outcome.message }, null, 2)),
        isError: true,
      };
    }

    return textResult(
      JSON.stringify(
        {
          valid: true,
          sql: outcome.query.sql,
          appliedLimit: outcome.query.appliedLimit,
        },
        null,
        2
      )
    );
  } catch (error) {
    return errorResult('validating query', error);
  }
}
