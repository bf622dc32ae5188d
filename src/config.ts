/**
 * Configuration module
 * Parses and validates environment variables
 */

import { randomBytes } from 'node:crypto';
import { z } from 'zod';

function isTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: value });
    return true;
  } catch (error) {
    if (error instanceof RangeError) return false;
    throw error;
  }
}

const configSchema = z
  .object({
    databaseUrl: z.string().url().describe('PostgreSQL connection URL'),
    allowedIdentity: z.string().min(1).describe('The single identity allowed to use the explorer'),
    schemaName: z.string().min(1).default('public'),
    port: z.number().int().min(1).max(65535).default(3000),
    maxConnections: z.number().int().min(2).default(5),
    acquireTimeoutMs: z.number().int().positive().default(5000),
    queryTimeoutMs: z.number().int().positive().default(10000),
    maxRows: z.number().int().positive().default(100),
    pageSize: z.number().int().positive().default(10),
    maxPageSize: z.number().int().positive().default(50),
    rateLimitMax: z.number().int().positive().default(30),
    rateLimitWindowMs: z.number().int().positive().default(60000),
    cursorSecret: z.string().min(8).describe('HMAC key for pagination cursors'),
    timeZone: z.string().refine(isTimeZone, 'unknown time zone').default('UTC').describe('Zone that defines day boundaries'),
  })
  .refine(c => c.pageSize <= c.maxPageSize, {
    message: 'must not exceed maxPageSize',
    path: ['pageSize'],
  });

export type Config = z.infer<typeof configSchema>;

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  // Let zod report non-numeric input instead of silently falling back
  return Number(value);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rawConfig = {
    databaseUrl: env.DATABASE_URL,
    allowedIdentity: env.ALLOWED_IDENTITY,
    schemaName: env.DB_SCHEMA || undefined,
    port: parseInteger(env.MCP_PORT),
    maxConnections: parseInteger(env.MAX_CONNECTIONS),
    acquireTimeoutMs: parseInteger(env.POOL_ACQUIRE_TIMEOUT_MS),
    queryTimeoutMs: parseInteger(env.QUERY_TIMEOUT_MS),
    maxRows: parseInteger(env.MAX_ROWS),
    pageSize: parseInteger(env.PAGE_SIZE),
    maxPageSize: parseInteger(env.MAX_PAGE_SIZE),
    rateLimitMax: parseInteger(env.RATE_LIMIT_MAX),
    rateLimitWindowMs: parseInteger(env.RATE_LIMIT_WINDOW_MS),
    // Cursors minted by a previous process become invalid, which only resets paging
    cursorSecret: env.CURSOR_SECRET || randomBytes(24).toString('base64url'),
    timeZone: env.TIMEZONE || undefined,
  };

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new Error(`Invalid configuration: ${errors}`);
  }

  return result.data;
}

// Singleton config instance
let cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}
