/**
 * Health database explorer MCP server with Streamable HTTP transport
 *
 * One allowed identity, presented as a Bearer token, may call the tools.
 * Every call is rate limited per identity.
 */

import { randomUUID } from 'node:crypto';
import express, { type Express, type Request, type Response } from 'express';
import cors from 'cors';
import { z } from 'zod';

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { isInitializeRequest } from '@modelcontextprotocol/sdk/types.js';

import { getConfig } from './config.js';
import { closePool, getPool } from './database/client.js';
import { MAX_SERIES_POINTS } from './domains/queries.js';
import { createAuthMiddleware } from './middleware/auth.js';
import { RateLimiter, createRateLimitMiddleware } from './middleware/rate-limit.js';
import { FILTER_OPERATORS } from './query/builder.js';
import { Explorer } from './services/explorer.js';
import { DOMAIN_IDS } from './types/index.js';

import {
  executeQueryTool,
  executeValidateQueryTool,
  executeListTablesTool,
  executeDescribeTableTool,
  executeGuidedQueryTool,
  executeDomainStatusTool,
  executeDomainRecordsTool,
  executeDomainLatestTool,
  executeDomainSummaryTool,
  executeRefreshSchemaTool,
  executeTodayTool,
  executePeriodSummaryTool,
} from './tools/index.js';

const SERVER_NAME = 'health-db-explorer';
const SERVER_VERSION = '1.0.0';

const domainArg = z.enum(DOMAIN_IDS).describe('Health domain: weight, steps, sleep or heart');
const cursorArg = z.string().optional().describe('Cursor from a previous page, to move forward or back');

/**
 * Create and configure the MCP server with all tools
 */
export function createMcpServer(explorer: Explorer): McpServer {
  const server = new McpServer(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
        logging: {},
      },
    }
  );

  server.tool(
    'query',
    'Execute a single read-only SELECT statement. A row limit is appended when the query has none; ' +
      'comments, multiple statements and mutating keywords are rejected.',
    {
      sql: z.string().min(1).describe('The SQL SELECT query to execute'),
    },
    async ({ sql }, extra) => {
      return executeQueryTool(explorer, { sql }, extra.signal);
    }
  );

  server.tool(
    'validate_query',
    'Check a query against the validation rules without executing it. Reports the statement that would run.',
    {
      sql: z.string().min(1).describe('The SQL query to validate'),
    },
    async ({ sql }) => {
      return executeValidateQueryTool(explorer, { sql });
    }
  );

  server.tool(
    'list_tables',
    'List tables and views of the configured schema in alphabetical order.',
    {},
    async (_args, extra) => {
      return executeListTablesTool(explorer, extra.signal);
    }
  );

  server.tool(
    'describe_table',
    'Show the live columns, types and nullability of a table or view.',
    {
      table: z.string().min(1).describe('Table or view name'),
    },
    async ({ table }, extra) => {
      return executeDescribeTableTool(explorer, { table }, extra.signal);
    }
  );

  server.tool(
    'guided_query',
    'Browse a table page by page without writing SQL: pick columns, one filter and a sort order.',
    {
      table: z.string().min(1).describe('Table or view name'),
      columns: z.array(z.string().min(1)).optional().describe('Columns to show (default: all)'),
      filter: z
        .object({
          column: z.string().min(1),
          operator: z.enum(FILTER_OPERATORS),
          value: z.union([z.string(), z.number(), z.boolean()]).optional(),
        })
        .optional()
        .describe('Single filter; isNull and isNotNull take no value'),
      order: z
        .object({
          column: z.string().min(1),
          direction: z.enum(['asc', 'desc']),
        })
        .optional()
        .describe('Sort order (default: newest first by the first timestamp column)'),
      pageSize: z.number().int().min(1).optional().describe('Rows per page'),
      cursor: cursorArg,
    },
    async (args, extra) => {
      return executeGuidedQueryTool(explorer, args, extra.signal);
    }
  );

  server.tool(
    'domain_status',
    'Show which health domains the database can serve and which table backs each.',
    {},
    async () => {
      return executeDomainStatusTool(explorer);
    }
  );

  server.tool(
    'domain_records',
    'Page through the records of a health domain, newest first.',
    {
      domain: domainArg,
      cursor: cursorArg,
    },
    async ({ domain, cursor }, extra) => {
      return executeDomainRecordsTool(explorer, { domain, cursor }, extra.signal);
    }
  );

  server.tool(
    'domain_latest',
    'Show the most recent record of a health domain.',
    {
      domain: domainArg,
    },
    async ({ domain }, extra) => {
      return executeDomainLatestTool(explorer, { domain }, extra.signal);
    }
  );

  server.tool(
    'domain_summary',
    'Count, average, minimum, maximum and total of a health domain over recent days, with a trend line.',
    {
      domain: domainArg,
      days: z.number().int().min(1).max(3650).default(7).describe('Days to look back'),
      points: z.number().int().min(1).max(MAX_SERIES_POINTS).default(30).describe('Values in the trend line'),
    },
    async ({ domain, days, points }, extra) => {
      return executeDomainSummaryTool(explorer, { domain, days, points }, extra.signal);
    }
  );

  server.tool(
    'refresh_schema',
    'Reload the cached schema and re-resolve every health domain. Use after tables change.',
    {},
    async (_args, extra) => {
      return executeRefreshSchemaTool(explorer, extra.signal);
    }
  );

  server.tool(
    'today',
    'Latest weight, plus today\'s steps, sleep session and heart rate. Days start at local midnight in the configured time zone.',
    {},
    async (_args, extra) => {
      return executeTodayTool(explorer, extra.signal);
    }
  );

  server.tool(
    'period_summary',
    'Weight change, average and total steps, and average sleep over the last week or month.',
    {
      period: z.enum(['week', 'month']).default('week').describe('week (7 days) or month (30 days)'),
    },
    async ({ period }, extra) => {
      return executePeriodSummaryTool(explorer, { period }, extra.signal);
    }
  );

  return server;
}

export interface AppOptions {
  allowedIdentity: string;
  rateLimiter: RateLimiter;
}

export interface ExplorerApp {
  app: Express;
  /** Close every open MCP session */
  closeSessions(): Promise<void>;
}

function sessionIdOf(req: Request): string | undefined {
  const value = req.headers['mcp-session-id'];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Build the HTTP app: health check, then authorized and rate-limited MCP routes
 */
export function createApp(explorer: Explorer, options: AppOptions): ExplorerApp {
  const transports = new Map<string, StreamableHTTPServerTransport>();
  const app = express();

  app.use(cors({
    origin: '*',
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'Mcp-Session-Id', 'Last-Event-Id'],
    exposedHeaders: ['Mcp-Session-Id'],
  }));
  app.use(express.json());

  app.get('/health', async (_req, res) => {
    try {
      const report = await explorer.health();
      res.status(report.status === 'healthy' ? 200 : 503).json(report);
    } catch (error) {
      console.error('Health check failed:', error);
      res.status(503).json({ status: 'degraded' });
    }
  });

  const authMiddleware = createAuthMiddleware(options.allowedIdentity);
  const rateLimitMiddleware = createRateLimitMiddleware(options.rateLimiter);

  // MCP POST handler - Initialize sessions and handle requests
  const mcpPostHandler = async (req: Request, res: Response) => {
    try {
      const sessionId = sessionIdOf(req);
      const existing = sessionId ? transports.get(sessionId) : undefined;

      if (existing) {
        await existing.handleRequest(req, res, req.body);
        return;
      }

      if (sessionId || !isInitializeRequest(req.body)) {
        res.status(400).json({
          jsonrpc: '2.0',
          error: { code: -32000, message: 'Bad Request: No valid session ID' },
          id: null,
        });
        return;
      }

      const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
        sessionIdGenerator: () => randomUUID(),
        onsessioninitialized: (sid) => {
          console.log(`Session initialized: ${sid}`);
          transports.set(sid, transport);
        },
      });

      transport.onclose = () => {
        const sid = transport.sessionId;
        if (sid && transports.delete(sid)) {
          console.log(`Session closed: ${sid}`);
        }
      };

      const server = createMcpServer(explorer);
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      console.error('Error handling MCP request:', error);
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: '2.0',
          error: { code: -32603, message: 'Internal server error' },
          id: null,
        });
      }
    }
  };

  // MCP GET (SSE stream) and DELETE (session termination) handler
  const mcpSessionHandler = async (req: Request, res: Response) => {
    const sessionId = sessionIdOf(req);
    const transport = sessionId ? transports.get(sessionId) : undefined;

    if (!transport) {
      res.status(400).send('Invalid or missing session ID');
      return;
    }

    try {
      await transport.handleRequest(req, res);
    } catch (error) {
      console.error('Error handling MCP session request:', error);
      if (!res.headersSent) {
        res.status(500).send('Internal server error');
      }
    }
  };

  app.post('/mcp', authMiddleware, rateLimitMiddleware, mcpPostHandler);
  app.get('/mcp', authMiddleware, rateLimitMiddleware, mcpSessionHandler);
  app.delete('/mcp', authMiddleware, rateLimitMiddleware, mcpSessionHandler);

  const closeSessions = async () => {
    for (const [sessionId, transport] of [...transports]) {
      try {
        await transport.close();
      } catch (error) {
        console.error(`Error closing session ${sessionId}:`, error);
      }
      transports.delete(sessionId);
    }
  };

  return { app, closeSessions };
}

/**
 * Start the MCP server with Streamable HTTP transport
 */
export async function startServer(): Promise<void> {
  const config = getConfig();
  const pool = getPool();

  console.log('Testing database connection...');
  const connected = await pool.healthCheck();

  if (!connected) {
    console.error('Failed to connect to database. Check DATABASE_URL.');
    await closePool();
    process.exit(1);
  }
  console.log('Database connection successful.');

  const explorer = new Explorer(pool, {
    schemaName: config.schemaName,
    maxRows: config.maxRows,
    pageSize: config.pageSize,
    maxPageSize: config.maxPageSize,
    cursorSecret: config.cursorSecret,
    timeZone: config.timeZone,
  });

  console.log('Resolving health domains...');
  const statuses = await explorer.initialize();
  const available = statuses.filter(s => s.available).length;
  console.log(`Health domains available: ${available}/${statuses.length}`);

  const rateLimiter = new RateLimiter(config.rateLimitMax, config.rateLimitWindowMs);
  const pruneInterval = setInterval(() => rateLimiter.prune(), config.rateLimitWindowMs);
  // Don't let the prune interval keep the process alive
  pruneInterval.unref();

  const { app, closeSessions } = createApp(explorer, {
    allowedIdentity: config.allowedIdentity,
    rateLimiter,
  });

  const httpServer = app.listen(config.port, () => {
    console.log(`\n${SERVER_NAME} v${SERVER_VERSION} running on port ${config.port}`);
    console.log(`  MCP endpoint: http://localhost:${config.port}/mcp`);
    console.log(`  Health check: http://localhost:${config.port}/health`);
    console.log('');
  });

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log('\nShutting down...');

    clearInterval(pruneInterval);
    await closeSessions();
    await closePool();

    httpServer.close(() => {
      console.log('Server shutdown complete.');
      process.exit(0);
    });
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      console.error('Error during shutdown:', error);
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}
