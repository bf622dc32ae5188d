/**
 * Read queries over resolved health domains. Statements are built from the
 * resolved column mapping, so every identifier exists in the catalog.
 */

import { z } from 'zod';
import type { ReadOnlyExecutor } from '../database/client.js';
import { DomainUnavailableError, InvalidArgumentError } from '../errors.js';
import { encodeCursor, fingerprintOf, resumeCursor } from '../query/cursor.js';
import { qualifiedName, quoteIdent } from '../query/builder.js';
import type {
  DomainId,
  DomainRecord,
  DomainSpec,
  DomainSummary,
  PageResult,
  RangeAggregate,
  ResolvedDomain,
  TimeRange,
  ValueChange,
} from '../types/index.js';
import type { DomainResolver } from './resolver.js';

export const MAX_SERIES_POINTS = 365;

export interface DomainQueryOptions {
  pageSize: number;
  cursorSecret: string;
}

const countRow = z.tuple([z.coerce.number()]);
const nullableNumber = z.union([z.number(), z.string()]).nullable().transform(v => (v === null ? null : Number(v)));
const aggregateRow = z.tuple([z.coerce.number(), nullableNumber, nullableNumber, nullableNumber, nullableNumber]);
const changeRow = z.tuple([nullableNumber, nullableNumber]);

export interface LatestOptions {
  /** Only consider records whose timestamp falls in this range */
  range?: TimeRange;
  signal?: AbortSignal;
}

interface Projection {
  fields: string[];
  selectList: string;
}

/**
 * Resolved fields in declaration order, each aliased to its logical name
 */
function project(spec: DomainSpec, domain: ResolvedDomain): Projection {
  const fields = spec.fields.map(f => f.field).filter(field => domain.columns[field] !== undefined);
  const selectList = fields
    .map(field => `${quoteIdent(domain.columns[field])} AS ${quoteIdent(field)}`)
    .join(', ');
  return { fields, selectList };
}

function inRange(ts: string): string {
  return `${ts} >= $1 AND ${ts} < $2`;
}

function timestampColumn(spec: DomainSpec, domain: ResolvedDomain): string {
  return quoteIdent(domain.columns[spec.timestampField]);
}

/**
 * The value column, which summaries and series need to be numeric
 */
function numericValueColumn(spec: DomainSpec, domain: ResolvedDomain): string {
  const name = spec.valueField ? domain.columns[spec.valueField] : undefined;
  if (name === undefined) {
    throw new DomainUnavailableError(spec.id, 'no value column');
  }
  const column = domain.table.columns.find(c => c.name === name);
  if (column?.category !== 'numeric') {
    throw new DomainUnavailableError(spec.id, `value column ${name} is not numeric`);
  }
  return quoteIdent(name);
}

export class DomainQueries {
  constructor(
    private readonly executor: ReadOnlyExecutor,
    private readonly resolver: DomainResolver,
    private readonly options: DomainQueryOptions
  ) {}

  /**
   * Most recent record, or null when there is none
   */
  async latest(id: DomainId, options: LatestOptions = {}): Promise<DomainRecord | null> {
    const spec = this.resolver.spec(id);
    const { range, signal } = options;

    return this.resolver.run(id, async domain => {
      const { fields, selectList } = project(spec, domain);
      const ts = timestampColumn(spec, domain);
      const where = range ? ` WHERE ${inRange(ts)}` : '';
      const result = await this.executor.execute(
        `SELECT ${selectList} FROM ${qualifiedName(domain.table)}${where} ORDER BY ${ts} DESC NULLS LAST LIMIT 1`,
        range ? [range.since, range.until] : [],
        { signal }
      );

      const row = result.rows[0];
      if (!row) return null;
      return Object.fromEntries(fields.map((field, i) => [field, row[i]]));
    });
  }

  /**
   * One page of records, newest first. An unusable cursor restarts at page 0.
   */
  async records(id: DomainId, cursorToken?: string, signal?: AbortSignal): Promise<PageResult> {
    const spec = this.resolver.spec(id);
    const { pageSize, cursorSecret } = this.options;

    return this.resolver.run(id, async domain => {
      const { fields, selectList } = project(spec, domain);
      const fingerprint = fingerprintOf({ domain: id, table: domain.table.tableName, fields, pageSize });
      const cursor = resumeCursor(cursorToken, fingerprint, cursorSecret);
      const source = qualifiedName(domain.table);
      const ts = timestampColumn(spec, domain);

      const countResult = await this.executor.execute(`SELECT count(*) FROM ${source}`, [], { signal });
      const total = countRow.parse(countResult.rows[0])[0];

      const result = await this.executor.execute(
        `SELECT ${selectList} FROM ${source} ORDER BY ${ts} DESC NULLS LAST LIMIT $1 OFFSET $2`,
        [pageSize + 1, cursor.page * pageSize],
        { signal }
      );

      const hasNext = result.rows.length > pageSize;
      const mint = (page: number) => encodeCursor({ page, fingerprint, totalKnown: true }, cursorSecret);

      return {
        columns: result.columns,
        rows: result.rows.slice(0, pageSize),
        appliedLimit: pageSize,
        elapsedMs: countResult.elapsedMs + result.elapsedMs,
        page: cursor.page,
        pageSize,
        total,
        nextCursor: hasNext ? mint(cursor.page + 1) : undefined,
        previousCursor: cursor.page > 0 ? mint(cursor.page - 1) : undefined,
      };
    });
  }

  /**
   * Count, average, minimum, maximum and total of the value field over [since, until)
   */
  async aggregate(id: DomainId, range: TimeRange, signal?: AbortSignal): Promise<RangeAggregate> {
    const spec = this.resolver.spec(id);

    return this.resolver.run(id, async domain => {
      const value = numericValueColumn(spec, domain);
      const ts = timestampColumn(spec, domain);
      const result = await this.executor.execute(
        `SELECT count(${value}), avg(${value})::float8, min(${value})::float8, max(${value})::float8, sum(${value})::float8` +
          ` FROM ${qualifiedName(domain.table)} WHERE ${inRange(ts)}`,
        [range.since, range.until],
        { signal }
      );

      const [count, average, minimum, maximum, total] = aggregateRow.parse(result.rows[0]);
      return { count, average, minimum, maximum, total };
    });
  }

  /**
   * Aggregate of the value field over [now - days, now)
   */
  async summary(id: DomainId, days: number, now: Date = new Date(), signal?: AbortSignal): Promise<DomainSummary> {
    if (!Number.isInteger(days) || days < 1) {
      throw new InvalidArgumentError(`days must be a positive integer, got ${days}`);
    }
    const since = new Date(now.getTime() - days * 24 * 60 * 60 * 1000);

    const aggregate = await this.aggregate(id, { since, until: now }, signal);
    return { domainId: id, days, ...aggregate };
  }

  /**
   * First and last value in the range, or null when either is missing
   */
  async change(id: DomainId, range: TimeRange, signal?: AbortSignal): Promise<ValueChange | null> {
    const spec = this.resolver.spec(id);

    return this.resolver.run(id, async domain => {
      const value = numericValueColumn(spec, domain);
      const ts = timestampColumn(spec, domain);
      const pick = (direction: 'ASC' | 'DESC') =>
        `(SELECT ${value} FROM ${qualifiedName(domain.table)}` +
        ` WHERE ${inRange(ts)} AND ${value} IS NOT NULL ORDER BY ${ts} ${direction} LIMIT 1)::float8`;
      const result = await this.executor.execute(`SELECT ${pick('ASC')}, ${pick('DESC')}`, [range.since, range.until], {
        signal,
      });

      const [first, last] = changeRow.parse(result.rows[0]);
      if (first === null || last === null) return null;
      return { first, last, delta: last - first };
    });
  }

  /**
   * Last `points` values, oldest first
   */
  async series(id: DomainId, points: number, signal?: AbortSignal): Promise<number[]> {
    if (!Number.isInteger(points) || points < 1 || points > MAX_SERIES_POINTS) {
      throw new InvalidArgumentError(`points must be an integer between 1 and ${MAX_SERIES_POINTS}, got ${points}`);
    }
    const spec = this.resolver.spec(id);

    return this.resolver.run(id, async domain => {
      const value = numericValueColumn(spec, domain);
      const ts = timestampColumn(spec, domain);
      const result = await this.executor.execute(
        `SELECT v FROM (` +
          `SELECT ${ts} AS t, ${value} AS v FROM ${qualifiedName(domain.table)}` +
          ` WHERE ${value} IS NOT NULL ORDER BY ${ts} DESC LIMIT $1` +
          `) recent ORDER BY t ASC`,
        [points],
        { signal }
      );

      return result.rows.map(row => Number(row[0])).filter(n => Number.isFinite(n));
    });
  }
}
