/**
 * PostgreSQL connection pool.
 *
 * Every statement runs inside a READ ONLY transaction with a statement
 * timeout. Acquisition is bounded: when all connections are leased, callers
 * queue until one is released or the acquire timeout elapses.
 */

import pg from 'pg';
import { getConfig } from '../config.js';
import {
  DatabaseUnavailableError,
  PoolTimeoutError,
  QueryCancelledError,
  ValidationRejectedError,
  classifyDriverError,
} from '../errors.js';
import { tokenize } from '../query/lexer.js';
import { BLOCKED_KEYWORDS, type ExecutedQuery } from '../types/index.js';

const { Pool } = pg;

export interface DriverResult {
  fields: Array<{ name: string }>;
  rows: unknown[][];
}

export interface DriverClient {
  query(text: string, values?: unknown[]): Promise<DriverResult>;
  /** `destroy` discards the connection instead of returning it for reuse */
  release(destroy?: boolean): void;
}

/**
 * The part of a pg.Pool the explorer relies on
 */
export interface Driver {
  connect(): Promise<DriverClient>;
  end(): Promise<void>;
}

export interface PoolOptions {
  maxConnections: number;
  acquireTimeoutMs: number;
  queryTimeoutMs: number;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
}

export interface ReadOnlyExecutor {
  execute(sql: string, params?: readonly unknown[], options?: ExecuteOptions): Promise<ExecutedQuery>;
}

export interface Lease {
  readonly client: DriverClient;
  release(destroy?: boolean): void;
}

interface Waiter {
  grant(): void;
  fail(error: Error): void;
}

const BLOCKED = new Set<string>(BLOCKED_KEYWORDS);

/**
 * Check if a SQL statement contains blocked keywords.
 * String literals and quoted identifiers are skipped, so values like
 * "WHERE info LIKE '%DELETE%'" don't trigger false positives.
 */
export function containsBlockedKeywords(sql: string): string | null {
  for (const token of tokenize(sql)) {
    if (token.kind !== 'word') continue;
    const word = token.text.toUpperCase();
    if (BLOCKED.has(word)) {
      return word;
    }
  }
  return null;
}

/**
 * Wrap a pg.Pool so rows come back as arrays in column order
 */
export function createPgDriver(
  connectionString: string,
  options: Pick<PoolOptions, 'maxConnections' | 'acquireTimeoutMs'>
): Driver {
  const pool = new Pool({
    connectionString,
    max: options.maxConnections,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: options.acquireTimeoutMs,
  });

  pool.on('error', (err) => {
    console.error('Unexpected error on idle client', err);
  });

  return {
    async connect(): Promise<DriverClient> {
      const client = await pool.connect();
      return {
        async query(text: string, values?: unknown[]) {
          const result = await client.query({ text, values, rowMode: 'array' });
          return { fields: result.fields.map(f => ({ name: f.name })), rows: result.rows };
        },
        release(destroy?: boolean) {
          client.release(destroy);
        },
      };
    },
    end: () => pool.end(),
  };
}

/**
 * Settle with `work`, or reject with QueryCancelledError once `signal` aborts.
 * The work itself keeps running.
 */
export function raceAbort<T>(work: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) return work;

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new QueryCancelledError());
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    work.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      error => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export class ConnectionPool implements ReadOnlyExecutor {
  private active = 0;
  private readonly waiters: Waiter[] = [];
  private lastSuccess: Date | null = null;
  private closed = false;

  constructor(
    private readonly driver: Driver,
    private readonly options: PoolOptions
  ) {
    if (!Number.isInteger(options.maxConnections) || options.maxConnections < 2) {
      throw new RangeError(`maxConnections must be an integer >= 2, got ${options.maxConnections}`);
    }
  }

  get lastSuccessfulQueryAt(): Date | null {
    return this.lastSuccess;
  }

  get stats(): { active: number; waiting: number; max: number } {
    return { active: this.active, waiting: this.waiters.length, max: this.options.maxConnections };
  }

  private takeSlot(signal?: AbortSignal): Promise<void> {
    if (this.closed) {
      return Promise.reject(new DatabaseUnavailableError('Connection pool is closed'));
    }
    if (signal?.aborted) {
      return Promise.reject(new QueryCancelledError());
    }
    if (this.active < this.options.maxConnections) {
      this.active++;
      return Promise.resolve();
    }

    const timeoutMs = this.options.acquireTimeoutMs;

    return new Promise<void>((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;

      const leaveQueue = () => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) this.waiters.splice(index, 1);
      };

      const waiter: Waiter = {
        grant: () => {
          leaveQueue();
          resolve();
        },
        fail: (error) => {
          leaveQueue();
          reject(error);
        },
      };

      const onAbort = () => waiter.fail(new QueryCancelledError());

      timer = setTimeout(() => waiter.fail(new PoolTimeoutError(timeoutMs)), timeoutMs);
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  private freeSlot(): void {
    // Hand the slot straight to the oldest waiter; the active count is unchanged
    const next = this.waiters[0];
    if (next) {
      next.grant();
    } else {
      this.active = Math.max(0, this.active - 1);
    }
  }

  /**
   * Lease a connection. The caller must release it on every path.
   */
  async acquire(signal?: AbortSignal): Promise<Lease> {
    await this.takeSlot(signal);

    let client: DriverClient;
    try {
      client = await this.driver.connect();
    } catch (error) {
      this.freeSlot();
      throw classifyDriverError(error);
    }

    let released = false;
    return {
      client,
      release: (destroy = false) => {
        if (released) return;
        released = true;
        client.release(destroy);
        this.freeSlot();
      },
    };
  }

  /**
   * Execute one statement inside a read-only transaction
   */
  async execute(
    sql: string,
    params: readonly unknown[] = [],
    options: ExecuteOptions = {}
  ): Promise<ExecutedQuery> {
    // Defense-in-depth: the validator should already have refused these
    const blockedKeyword = containsBlockedKeywords(sql);
    if (blockedKeyword) {
      throw new ValidationRejectedError(
        'blockedKeyword',
        `Statement contains blocked keyword: ${blockedKeyword}. Only read-only queries are allowed.`
      );
    }

    const { signal } = options;
    const startTime = Date.now();
    const lease = await this.acquire(signal);
    let destroy = false;

    try {
      await lease.client.query('BEGIN READ ONLY');
      await lease.client.query(`SET LOCAL statement_timeout = ${this.options.queryTimeoutMs}`);
      const result = await raceAbort(lease.client.query(sql, [...params]), signal);
      await lease.client.query('COMMIT');

      this.lastSuccess = new Date();
      return {
        columns: result.fields.map(f => f.name),
        rows: result.rows,
        elapsedMs: Date.now() - startTime,
      };
    } catch (error) {
      if (error instanceof QueryCancelledError) {
        // The statement may still be running; dropping the connection stops it
        destroy = true;
      } else {
        try {
          await lease.client.query('ROLLBACK');
        } catch (rollbackError) {
          destroy = true;
          console.error('Rollback failed, discarding connection:', rollbackError);
        }
      }
      throw classifyDriverError(error);
    } finally {
      lease.release(destroy);
    }
  }

  /**
   * Test database connectivity
   */
  async healthCheck(): Promise<boolean> {
    try {
      const result = await this.execute('SELECT 1');
      return result.rows[0]?.[0] === 1;
    } catch (error) {
      console.warn('Database health check failed:', error instanceof Error ? error.message : error);
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of [...this.waiters]) {
      waiter.fail(new DatabaseUnavailableError('Connection pool is closing'));
    }
    await this.driver.end();
  }
}

let pool: ConnectionPool | null = null;

/**
 * Get or create the process-wide pool
 */
export function getPool(): ConnectionPool {
  if (!pool) {
    const config = getConfig();
    const options: PoolOptions = {
      maxConnections: config.maxConnections,
      acquireTimeoutMs: config.acquireTimeoutMs,
      queryTimeoutMs: config.queryTimeoutMs,
    };
    pool = new ConnectionPool(createPgDriver(config.databaseUrl, options), options);
  }
  return pool;
}

/**
 * Close the database connection pool
 */
export async function closePool(): Promise<void> {
  if (pool) {
    await pool.close();
    pool = null;
  }
}
