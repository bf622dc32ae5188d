/**
 * Explorer facade: the one entry point the transport talks to
 */

import { SchemaCatalog, type RefreshSummary } from '../database/catalog.js';
import type { ExecuteOptions, ReadOnlyExecutor } from '../database/client.js';
import { DomainQueries } from '../domains/queries.js';
import { DomainResolver } from '../domains/resolver.js';
import { DOMAIN_SPECS } from '../domains/specs.js';
import { localDate, localDayRange, recentDaysRange } from '../domains/time.js';
import {
  DomainUnavailableError,
  InvalidArgumentError,
  SchemaMismatchError,
  UnknownIdentifierError,
  ValidationRejectedError,
} from '../errors.js';
import { GuidedQueryBuilder, type GuidedFilter, type GuidedOrder } from '../query/builder.js';
import { encodeCursor, resumeCursor } from '../query/cursor.js';
import { validateQuery } from '../query/validator.js';
import type {
  DomainId,
  DomainRecord,
  DomainSnapshot,
  DomainSpec,
  DomainStatus,
  DomainSummary,
  ExecutedQuery,
  HealthReport,
  PageResult,
  PeriodSummary,
  QueryResult,
  TableDetails,
  TodaySnapshot,
  ValidationOutcome,
} from '../types/index.js';

/**
 * What the explorer needs from the connection pool
 */
export interface ExplorerDatabase extends ReadOnlyExecutor {
  healthCheck(): Promise<boolean>;
  readonly lastSuccessfulQueryAt: Date | null;
}

export interface ExplorerOptions {
  schemaName: string;
  maxRows: number;
  pageSize: number;
  maxPageSize: number;
  cursorSecret: string;
  /** Zone whose midnight starts a day for today and period views */
  timeZone?: string;
  specs?: readonly DomainSpec[];
  now?: () => Date;
}

export interface GuidedQueryInput {
  table: string;
  columns?: readonly string[];
  filter?: GuidedFilter;
  order?: GuidedOrder;
  pageSize?: number;
}

export interface RefreshResult extends RefreshSummary {
  domains: DomainStatus[];
}

/**
 * Turn a domain that cannot answer into an unavailable entry instead of failing the whole view
 */
async function snapshotOf<T>(work: () => Promise<T>): Promise<DomainSnapshot<T>> {
  try {
    return { available: true, value: await work() };
  } catch (error) {
    if (error instanceof DomainUnavailableError) {
      return { available: false, reason: error.reason };
    }
    throw error;
  }
}

export class Explorer {
  readonly catalog: SchemaCatalog;
  readonly resolver: DomainResolver;
  private readonly queries: DomainQueries;
  private readonly builder: GuidedQueryBuilder;
  private readonly now: () => Date;
  private readonly timeZone: string;
  private readonly startedAt: Date;

  constructor(
    private readonly database: ExplorerDatabase,
    private readonly options: ExplorerOptions
  ) {
    this.catalog = new SchemaCatalog(database, options.schemaName);
    this.resolver = new DomainResolver(this.catalog, options.specs ?? DOMAIN_SPECS);
    this.queries = new DomainQueries(database, this.resolver, {
      pageSize: options.pageSize,
      cursorSecret: options.cursorSecret,
    });
    this.builder = new GuidedQueryBuilder(this.catalog, options.maxPageSize);
    this.now = options.now ?? (() => new Date());
    this.timeZone = options.timeZone ?? 'UTC';
    this.startedAt = this.now();
  }

  /**
   * Resolve every domain once; domains that cannot be resolved are logged, not fatal
   */
  async initialize(): Promise<DomainStatus[]> {
    return this.resolver.initialize();
  }

  validate(sql: string): ValidationOutcome {
    return validateQuery(sql, this.options.maxRows);
  }

  async runRawQuery(sql: string, options: ExecuteOptions = {}): Promise<QueryResult> {
    const outcome = this.validate(sql);
    if (!outcome.ok) {
      throw new ValidationRejectedError(outcome.reason, outcome.message);
    }

    const { appliedLimit } = outcome.query;
    const result = await this.database.execute(outcome.query.sql, [], options);
    return {
      columns: result.columns,
      rows: result.rows.slice(0, appliedLimit),
      appliedLimit,
      elapsedMs: result.elapsedMs,
    };
  }

  /**
   * One page of a guided query. The cursor carries the page; a cursor minted
   * for a different filter or sort starts over at the first page. Tables
   * backing a resolved domain default to that domain's timestamp, newest first.
   */
  async runGuidedQuery(input: GuidedQueryInput, cursorToken?: string, signal?: AbortSignal): Promise<PageResult> {
    const { cursorSecret } = this.options;
    const request = {
      table: input.table,
      columns: input.columns,
      filter: input.filter,
      order: input.order,
      page: { index: 0, size: input.pageSize ?? this.options.pageSize },
    };

    const backing = this.resolver.resolvedFor(input.table);
    const defaultOrder: GuidedOrder | undefined = backing
      ? { column: backing.domain.columns[backing.spec.timestampField], direction: 'desc' }
      : undefined;
    const buildOptions = { defaultOrder, signal };

    const firstPage = await this.builder.build(request, buildOptions);
    const cursor = resumeCursor(cursorToken, firstPage.fingerprint, cursorSecret);
    const query =
      cursor.page === 0
        ? firstPage
        : await this.builder.build({ ...request, page: { index: cursor.page, size: firstPage.pageSize } }, buildOptions);

    let result: ExecutedQuery;
    try {
      result = await this.database.execute(query.sql, query.params, { signal });
    } catch (error) {
      if (error instanceof SchemaMismatchError) {
        this.catalog.invalidate([input.table]);
      }
      throw error;
    }

    const hasNext = result.rows.length > query.pageSize;
    const mint = (page: number) =>
      encodeCursor({ page, fingerprint: query.fingerprint, totalKnown: false }, cursorSecret);

    return {
      columns: result.columns,
      rows: result.rows.slice(0, query.pageSize),
      appliedLimit: query.appliedLimit,
      elapsedMs: result.elapsedMs,
      page: cursor.page,
      pageSize: query.pageSize,
      nextCursor: hasNext ? mint(cursor.page + 1) : undefined,
      previousCursor: cursor.page > 0 ? mint(cursor.page - 1) : undefined,
    };
  }

  async listTables(signal?: AbortSignal): Promise<string[]> {
    return this.catalog.listTables(signal);
  }

  /**
   * Columns and indexes, always read from the live schema, never the cache
   */
  async describeTable(name: string, signal?: AbortSignal): Promise<TableDetails> {
    const table = await this.catalog.describe(name, { fresh: true, signal });
    if (!table) {
      throw new UnknownIdentifierError(name, 'table');
    }
    const indexes = await this.catalog.indexes(name, signal);
    return { table, indexes };
  }

  domainStatuses(): DomainStatus[] {
    return this.resolver.statuses();
  }

  async domainLatest(id: DomainId, signal?: AbortSignal): Promise<DomainRecord | null> {
    return this.queries.latest(id, { signal });
  }

  async domainRecords(id: DomainId, cursorToken?: string, signal?: AbortSignal): Promise<PageResult> {
    return this.queries.records(id, cursorToken, signal);
  }

  async domainSummary(id: DomainId, days: number, signal?: AbortSignal): Promise<DomainSummary> {
    return this.queries.summary(id, days, this.now(), signal);
  }

  async domainSeries(id: DomainId, points: number, signal?: AbortSignal): Promise<number[]> {
    return this.queries.series(id, points, signal);
  }

  /**
   * Snapshot of the local calendar day across every domain
   */
  async today(signal?: AbortSignal): Promise<TodaySnapshot> {
    const timeZone = this.timeZone;
    const now = this.now();
    const day = localDayRange(now, timeZone);

    const [weight, steps, sleep, heart] = await Promise.all([
      snapshotOf(() => this.queries.latest('weight', { signal })),
      snapshotOf(async () => {
        const aggregate = await this.queries.aggregate('steps', day, signal);
        return aggregate.count > 0 ? aggregate.total : null;
      }),
      snapshotOf(() => this.queries.latest('sleep', { range: day, signal })),
      snapshotOf(async () => {
        const aggregate = await this.queries.aggregate('heart', day, signal);
        return aggregate.count > 0 ? aggregate : null;
      }),
    ]);

    return { date: localDate(now, timeZone), timeZone, weight, steps, sleep, heart };
  }

  /**
   * Weight change, step totals and average sleep from local midnight `days` days ago through today
   */
  async period(days: number, signal?: AbortSignal): Promise<PeriodSummary> {
    if (!Number.isInteger(days) || days < 1) {
      throw new InvalidArgumentError(`days must be a positive integer, got ${days}`);
    }
    const range = recentDaysRange(this.now(), this.timeZone, days);

    const [weight, steps, sleep] = await Promise.all([
      snapshotOf(() => this.queries.change('weight', range, signal)),
      snapshotOf(async () => {
        const aggregate = await this.queries.aggregate('steps', range, signal);
        return aggregate.count > 0 ? aggregate : null;
      }),
      snapshotOf(async () => (await this.queries.aggregate('sleep', range, signal)).average),
    ]);

    return { days, range, weight, steps, sleep };
  }

  /**
   * Reload the schema, then re-resolve every domain against it
   */
  async refresh(signal?: AbortSignal): Promise<RefreshResult> {
    const summary = await this.catalog.refresh(signal);
    const domains = await this.resolver.refresh();
    return { ...summary, domains };
  }

  async health(): Promise<HealthReport> {
    const database = await this.database.healthCheck();
    const lastSuccess = this.database.lastSuccessfulQueryAt;

    return {
      status: database ? 'healthy' : 'degraded',
      database,
      lastSuccessfulQueryAt: lastSuccess ? lastSuccess.toISOString() : null,
      uptimeSeconds: Math.floor((this.now().getTime() - this.startedAt.getTime()) / 1000),
      domains: this.domainStatuses(),
    };
  }
}
