/**
 * Schema introspection with a process-lifetime cache.
 *
 * Readers always see a complete snapshot: every update builds a new map and
 * swaps it in, so an in-flight request keeps the descriptors it already read.
 */

import { z } from 'zod';
import {
  CatalogUnavailableError,
  PoolTimeoutError,
  QueryCancelledError,
} from '../errors.js';
import { raceAbort, type ReadOnlyExecutor } from './client.js';
import type { ColumnCategory, ColumnDescriptor, IndexDescriptor, TableDescriptor } from '../types/index.js';

const LIST_TABLES_SQL = `
  SELECT table_name
  FROM information_schema.tables
  WHERE table_schema = $1
    AND table_type IN ('BASE TABLE', 'VIEW')
  ORDER BY table_name
`;

const DESCRIBE_TABLE_SQL = `
  SELECT column_name, data_type, is_nullable, column_default
  FROM information_schema.columns
  WHERE table_schema = $1
    AND table_name = $2
  ORDER BY ordinal_position
`;

const ALL_COLUMNS_SQL = `
  SELECT c.table_name, c.column_name, c.data_type, c.is_nullable, c.column_default
  FROM information_schema.columns c
  JOIN information_schema.tables t
    ON t.table_schema = c.table_schema
   AND t.table_name = c.table_name
  WHERE c.table_schema = $1
    AND t.table_type IN ('BASE TABLE', 'VIEW')
  ORDER BY c.table_name, c.ordinal_position
`;

const LIST_INDEXES_SQL = `
  SELECT indexname, indexdef
  FROM pg_indexes
  WHERE schemaname = $1
    AND tablename = $2
  ORDER BY indexname
`;

const tableRow = z.tuple([z.string()]);
const isNullable = z.enum(['YES', 'NO']);
const columnDefault = z.string().nullable();
const columnRow = z.tuple([z.string(), z.string(), isNullable, columnDefault]);
const tableColumnRow = z.tuple([z.string(), z.string(), z.string(), isNullable, columnDefault]);
const indexRow = z.tuple([z.string(), z.string()]);

const NUMERIC_TYPES = new Set([
  'smallint',
  'integer',
  'bigint',
  'numeric',
  'decimal',
  'real',
  'double precision',
]);
const TEXT_TYPES = new Set(['text', 'citext', 'uuid', 'name']);

export function categorizeDataType(dataType: string): ColumnCategory {
  const type = dataType.toLowerCase();
  if (NUMERIC_TYPES.has(type)) return 'numeric';
  if (type === 'boolean') return 'boolean';
  if (type === 'date' || type.startsWith('timestamp') || type.startsWith('time ')) return 'timestamp';
  if (TEXT_TYPES.has(type) || type.startsWith('character')) return 'text';
  return 'other';
}

function toColumn(
  name: string,
  dataType: string,
  nullable: 'YES' | 'NO',
  defaultValue: string | null
): ColumnDescriptor {
  return Object.freeze({
    name,
    dataType,
    category: categorizeDataType(dataType),
    nullable: nullable === 'YES',
    defaultValue,
  });
}

function toTable(schemaName: string, tableName: string, columns: ColumnDescriptor[]): TableDescriptor {
  return Object.freeze({ schemaName, tableName, columns: Object.freeze(columns) });
}

export interface DescribeOptions {
  /** Bypass the cache and replace the cached entry with what the database says now */
  fresh?: boolean;
  signal?: AbortSignal;
}

export interface RefreshSummary {
  tables: number;
  columns: number;
}

export class SchemaCatalog {
  private tableNames: ReadonlySet<string> | null = null;
  private descriptors: ReadonlyMap<string, TableDescriptor> = new Map();
  private readonly inflight = new Map<string, Promise<TableDescriptor | null>>();
  private listing: Promise<ReadonlySet<string>> | null = null;
  // Bumped by invalidate/refresh so that a slow load cannot resurrect stale entries
  private generation = 0;

  constructor(
    private readonly executor: ReadOnlyExecutor,
    readonly schemaName: string
  ) {}

  private async run(sql: string, params: unknown[], signal?: AbortSignal): Promise<unknown[][]> {
    try {
      const result = await this.executor.execute(sql, params, { signal });
      return result.rows;
    } catch (error) {
      if (error instanceof PoolTimeoutError || error instanceof QueryCancelledError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new CatalogUnavailableError(`Schema catalog unavailable: ${message}`, { cause: error });
    }
  }

  /**
   * Shared between concurrent callers, so it runs without any one caller's
   * signal; each caller stops waiting on its own abort instead.
   */
  private loadTableNames(signal?: AbortSignal): Promise<ReadonlySet<string>> {
    if (this.tableNames) return Promise.resolve(this.tableNames);
    if (this.listing) return raceAbort(this.listing, signal);

    const generation = this.generation;
    const listing = this.run(LIST_TABLES_SQL, [this.schemaName])
      .then(rows => {
        const names: ReadonlySet<string> = new Set(rows.map(row => tableRow.parse(row)[0]));
        if (generation === this.generation) {
          this.tableNames = names;
        }
        return names;
      })
      .finally(() => {
        if (this.listing === listing) this.listing = null;
      });

    this.listing = listing;
    return raceAbort(listing, signal);
  }

  /**
   * Table and view names, alphabetical
   */
  async listTables(signal?: AbortSignal): Promise<string[]> {
    const names = await this.loadTableNames(signal);
    return [...names].sort();
  }

  async tableExists(name: string, signal?: AbortSignal): Promise<boolean> {
    const names = await this.loadTableNames(signal);
    return names.has(name);
  }

  /**
   * Cached descriptor, without touching the database
   */
  cached(name: string): TableDescriptor | undefined {
    return this.descriptors.get(name);
  }

  snapshot(): ReadonlyMap<string, TableDescriptor> {
    return this.descriptors;
  }

  private async loadDescriptor(name: string, signal?: AbortSignal): Promise<TableDescriptor | null> {
    const generation = this.generation;
    const rows = await this.run(DESCRIBE_TABLE_SQL, [this.schemaName, name], signal);
    if (rows.length === 0) {
      return null;
    }

    const descriptor = toTable(
      this.schemaName,
      name,
      rows.map(row => {
        const [columnName, dataType, nullable, defaultValue] = columnRow.parse(row);
        return toColumn(columnName, dataType, nullable, defaultValue);
      })
    );

    if (generation === this.generation) {
      this.descriptors = new Map(this.descriptors).set(name, descriptor);
    }
    return descriptor;
  }

  /**
   * Describe a table, or null when the schema has no such table
   */
  async describe(name: string, options: DescribeOptions = {}): Promise<TableDescriptor | null> {
    const { fresh = false, signal } = options;

    if (fresh) {
      const descriptor = await this.loadDescriptor(name, signal);
      if (!descriptor) {
        this.forget([name]);
      }
      return descriptor;
    }

    const cached = this.descriptors.get(name);
    if (cached) return cached;

    if (!(await this.tableExists(name, signal))) {
      return null;
    }

    let pending = this.inflight.get(name);
    if (!pending) {
      pending = this.loadDescriptor(name).finally(() => {
        this.inflight.delete(name);
      });
      this.inflight.set(name, pending);
    }
    return raceAbort(pending, signal);
  }

  /**
   * Indexes of a table, always read live
   */
  async indexes(name: string, signal?: AbortSignal): Promise<IndexDescriptor[]> {
    const rows = await this.run(LIST_INDEXES_SQL, [this.schemaName, name], signal);
    return rows.map(row => {
      const [indexName, definition] = indexRow.parse(row);
      return { name: indexName, definition };
    });
  }

  private forget(names: readonly string[]): void {
    const next = new Map(this.descriptors);
    for (const name of names) next.delete(name);
    this.descriptors = next;
  }

  /**
   * Drop cached entries so the next lookup reads the database again.
   * Without names the whole cache is dropped.
   */
  invalidate(names?: readonly string[]): void {
    this.generation++;
    this.tableNames = null;
    this.listing = null;
    this.inflight.clear();
    if (names) {
      this.forget(names);
    } else {
      this.descriptors = new Map();
    }
  }

  /**
   * Reload every table of the schema in one pass and swap it in
   */
  async refresh(signal?: AbortSignal): Promise<RefreshSummary> {
    const generation = ++this.generation;
    this.listing = null;
    this.inflight.clear();

    const [tableRows, columnRows] = await Promise.all([
      this.run(LIST_TABLES_SQL, [this.schemaName], signal),
      this.run(ALL_COLUMNS_SQL, [this.schemaName], signal),
    ]);

    const names = new Set(tableRows.map(row => tableRow.parse(row)[0]));
    const columnsByTable = new Map<string, ColumnDescriptor[]>();
    for (const row of columnRows) {
      const [tableName, columnName, dataType, nullable, defaultValue] = tableColumnRow.parse(row);
      const columns = columnsByTable.get(tableName) ?? [];
      columns.push(toColumn(columnName, dataType, nullable, defaultValue));
      columnsByTable.set(tableName, columns);
    }

    const descriptors = new Map<string, TableDescriptor>();
    for (const [tableName, columns] of columnsByTable) {
      if (names.has(tableName)) {
        descriptors.set(tableName, toTable(this.schemaName, tableName, columns));
      }
    }

    if (generation === this.generation) {
      this.tableNames = names;
      this.descriptors = descriptors;
    }

    return { tables: names.size, columns: columnRows.length };
  }
}
