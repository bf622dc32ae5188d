/**
 * Tool executor re-exports
 *
 * Each tool's sole public API is its execute function.
 * Registration (name, schema, description) is handled in server.ts via the MCP SDK.
 */

export { executeQueryTool } from './query.js';
export { executeValidateQueryTool } from './validate-query.js';
export { executeListTablesTool } from './list-tables.js';
export { executeDescribeTableTool } from './describe-table.js';
export { executeGuidedQueryTool } from './guided-query.js';
export { executeDomainStatusTool } from './domain-status.js';
export { executeDomainRecordsTool } from './domain-records.js';
export { executeDomainLatestTool } from './domain-latest.js';
export { executeDomainSummaryTool } from './domain-summary.js';
export { executeTodayTool } from './today.js';
export { executePeriodSummaryTool } from './period-summary.js';
export { executeRefreshSchemaTool } from './refresh-schema.js';
