/**
 * Guided queries: structured requests turned into parameterized SELECTs.
 * Identifiers come only from catalog descriptors, values only as $n params.
 */

import { InvalidArgumentError, UnknownIdentifierError } from '../errors.js';
import type { SchemaCatalog } from '../database/catalog.js';
import type { ColumnDescriptor, TableDescriptor } from '../types/index.js';
import { fingerprintOf } from './cursor.js';

export const FILTER_OPERATORS = [
  'eq',
  'ne',
  'lt',
  'lte',
  'gt',
  'gte',
  'contains',
  'isNull',
  'isNotNull',
] as const;

export type FilterOperator = typeof FILTER_OPERATORS[number];
export type SortDirection = 'asc' | 'desc';
export type FilterValue = string | number | boolean;

export interface GuidedFilter {
  column: string;
  operator: FilterOperator;
  value?: FilterValue;
}

export interface GuidedOrder {
  column: string;
  direction: SortDirection;
}

export interface GuidedRequest {
  table: string;
  /** Empty or omitted selects every column in ordinal order */
  columns?: readonly string[];
  filter?: GuidedFilter;
  order?: GuidedOrder;
  page: { index: number; size: number };
}

export interface GuidedQuery {
  sql: string;
  params: unknown[];
  /** Rows the caller may show; the statement fetches one more */
  appliedLimit: number;
  pageSize: number;
  offset: number;
  /** Identifies the filter/sort context, independent of the page */
  fingerprint: string;
}

export interface BuildOptions {
  maxPageSize: number;
  defaultOrder?: GuidedOrder;
}

const COMPARISONS: Partial<Record<FilterOperator, string>> = {
  eq: '=',
  ne: '<>',
  lt: '<',
  lte: '<=',
  gt: '>',
  gte: '>=',
};

/**
 * Double-quote an identifier, doubling embedded quotes
 */
export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function qualifiedName(table: TableDescriptor): string {
  return `${quoteIdent(table.schemaName)}.${quoteIdent(table.tableName)}`;
}

export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, match => `\\${match}`);
}

function findColumn(table: TableDescriptor, name: string): ColumnDescriptor {
  const column = table.columns.find(c => c.name === name);
  if (!column) {
    throw new UnknownIdentifierError(`${table.tableName}.${name}`, 'column');
  }
  return column;
}

function coerceValue(column: ColumnDescriptor, value: FilterValue): FilterValue {
  switch (column.category) {
    case 'numeric': {
      const n = typeof value === 'number' ? value : typeof value === 'string' && value.trim() !== '' ? Number(value) : NaN;
      if (!Number.isFinite(n)) {
        throw new InvalidArgumentError(`Column ${column.name} expects a number, got "${String(value)}"`);
      }
      return n;
    }
    case 'boolean': {
      if (typeof value === 'boolean') return value;
      const text = String(value).trim().toLowerCase();
      if (text === 'true') return true;
      if (text === 'false') return false;
      throw new InvalidArgumentError(`Column ${column.name} expects true or false, got "${String(value)}"`);
    }
    default:
      return String(value);
  }
}

function clampPageSize(size: number, maxPageSize: number): number {
  if (!Number.isFinite(size)) {
    throw new InvalidArgumentError(`Page size must be a number, got ${size}`);
  }
  return Math.min(maxPageSize, Math.max(1, Math.floor(size)));
}

function resolveOrder(table: TableDescriptor, requested: GuidedOrder | undefined, fallback: GuidedOrder | undefined): GuidedOrder {
  if (requested) {
    return { column: findColumn(table, requested.column).name, direction: requested.direction };
  }
  if (fallback && table.columns.some(c => c.name === fallback.column)) {
    return fallback;
  }
  const firstTimestamp = table.columns.find(c => c.category === 'timestamp');
  return { column: (firstTimestamp ?? table.columns[0]).name, direction: 'desc' };
}

/**
 * Build the statement for one page of a guided request
 */
export function buildGuidedQuery(
  table: TableDescriptor,
  request: GuidedRequest,
  options: BuildOptions
): GuidedQuery {
  if (table.columns.length === 0) {
    throw new UnknownIdentifierError(table.tableName, 'table');
  }
  if (!Number.isSafeInteger(request.page.index) || request.page.index < 0) {
    throw new InvalidArgumentError(`Page index must be a non-negative integer, got ${request.page.index}`);
  }

  const selected =
    request.columns && request.columns.length > 0
      ? request.columns.map(name => findColumn(table, name))
      : [...table.columns];

  const params: unknown[] = [];
  const bind = (value: unknown): string => {
    params.push(value);
    return `$${params.length}`;
  };

  let where = '';
  const filter = request.filter;
  if (filter) {
    const column = findColumn(table, filter.column);
    const target = quoteIdent(column.name);

    if (filter.operator === 'isNull') {
      where = ` WHERE ${target} IS NULL`;
    } else if (filter.operator === 'isNotNull') {
      where = ` WHERE ${target} IS NOT NULL`;
    } else {
      if (filter.value === undefined) {
        throw new InvalidArgumentError(`Filter operator ${filter.operator} needs a value`);
      }
      if (filter.operator === 'contains') {
        where = ` WHERE ${target}::text ILIKE ${bind(`%${escapeLikePattern(String(filter.value))}%`)}`;
      } else {
        const comparison = COMPARISONS[filter.operator];
        if (!comparison) {
          throw new InvalidArgumentError(`Unknown filter operator: ${filter.operator}`);
        }
        where = ` WHERE ${target} ${comparison} ${bind(coerceValue(column, filter.value))}`;
      }
    }
  }

  const order = resolveOrder(table, request.order, options.defaultOrder);
  const pageSize = clampPageSize(request.page.size, options.maxPageSize);
  const offset = request.page.index * pageSize;

  const columnList = selected.map(c => quoteIdent(c.name)).join(', ');
  const direction = order.direction === 'asc' ? 'ASC' : 'DESC';
  const limitParam = bind(pageSize + 1);
  const offsetParam = bind(offset);

  const sql =
    `SELECT ${columnList} FROM ${qualifiedName(table)}${where}` +
    ` ORDER BY ${quoteIdent(order.column)} ${direction}` +
    ` LIMIT ${limitParam} OFFSET ${offsetParam}`;

  const fingerprint = fingerprintOf({
    table: table.tableName,
    columns: selected.map(c => c.name),
    filter: filter ? { column: filter.column, operator: filter.operator, value: filter.value } : null,
    order,
    pageSize,
  });

  return { sql, params, appliedLimit: pageSize, pageSize, offset, fingerprint };
}

export interface GuidedBuildOptions {
  /** Sort used when the request names none */
  defaultOrder?: GuidedOrder;
  signal?: AbortSignal;
}

export class GuidedQueryBuilder {
  constructor(
    private readonly catalog: SchemaCatalog,
    private readonly maxPageSize: number
  ) {}

  async build(request: GuidedRequest, options: GuidedBuildOptions = {}): Promise<GuidedQuery> {
    const { defaultOrder, signal } = options;
    const table = await this.catalog.describe(request.table, { signal });
    if (!table) {
      throw new UnknownIdentifierError(request.table, 'table');
    }
    return buildGuidedQuery(table, request, { maxPageSize: this.maxPageSize, defaultOrder });
  }
}
