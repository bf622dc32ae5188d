/**
 * Type definitions shared across the explorer
 */

/**
 * Coarse type family of a column, derived from information_schema data_type
 */
export type ColumnCategory = 'numeric' | 'timestamp' | 'text' | 'boolean' | 'other';

/**
 * Column information from database introspection
 */
export interface ColumnDescriptor {
  readonly name: string;
  readonly dataType: string;
  readonly category: ColumnCategory;
  readonly nullable: boolean;
  /** Default expression as PostgreSQL prints it, null when there is none */
  readonly defaultValue: string | null;
}

/**
 * Table or view information from database introspection.
 * Identity is (schemaName, tableName).
 */
export interface TableDescriptor {
  readonly schemaName: string;
  readonly tableName: string;
  readonly columns: readonly ColumnDescriptor[];
}

export interface IndexDescriptor {
  readonly name: string;
  readonly definition: string;
}

/**
 * Live description of one table: its columns and its indexes
 */
export interface TableDetails {
  table: TableDescriptor;
  indexes: IndexDescriptor[];
}

export const DOMAIN_IDS = ['weight', 'steps', 'sleep', 'heart'] as const;

export type DomainId = typeof DOMAIN_IDS[number];

/**
 * One logical field of a domain and the column names that may back it,
 * in priority order
 */
export interface FieldSpec {
  readonly field: string;
  readonly candidates: readonly string[];
  readonly required: boolean;
}

export interface DomainSpec {
  readonly id: DomainId;
  readonly label: string;
  readonly unit?: string;
  readonly tables: readonly string[];
  readonly fields: readonly FieldSpec[];
  /** Field used for ordering and time ranges; must be required */
  readonly timestampField: string;
  /** Field aggregated by summaries and series */
  readonly valueField?: string;
}

export interface ResolvedDomain {
  readonly id: DomainId;
  readonly table: TableDescriptor;
  /** logical field -> actual column name */
  readonly columns: Readonly<Record<string, string>>;
  readonly resolvedAt: Date;
}

export type DomainResolution =
  | { readonly status: 'resolved'; readonly domain: ResolvedDomain }
  | { readonly status: 'unavailable'; readonly domainId: DomainId; readonly reason: string };

/** One record of a domain, keyed by logical field name */
export type DomainRecord = Readonly<Record<string, unknown>>;

/** Half-open interval [since, until) */
export interface TimeRange {
  since: Date;
  until: Date;
}

export interface DomainStatus {
  domainId: DomainId;
  available: boolean;
  reason?: string;
}

/**
 * Raw SQL that passed every validation rule
 */
export interface ValidatedQuery {
  readonly sql: string;
  readonly appliedLimit: number;
}

export type RejectionReason =
  | 'multiStatement'
  | 'notSelect'
  | 'blockedKeyword'
  | 'commentInjection'
  | 'limitExceeded';

export type ValidationOutcome =
  | { readonly ok: true; readonly query: ValidatedQuery }
  | { readonly ok: false; readonly reason: RejectionReason; readonly message: string };

export interface QueryCursor {
  readonly page: number;
  readonly fingerprint: string;
  readonly totalKnown: boolean;
}

/**
 * Rows as returned by the pool, before any limit bookkeeping
 */
export interface ExecutedQuery {
  columns: string[];
  rows: unknown[][];
  elapsedMs: number;
}

/**
 * Query result handed to formatting
 */
export interface QueryResult {
  columns: string[];
  rows: unknown[][];
  appliedLimit: number;
  elapsedMs: number;
}

export interface PageResult extends QueryResult {
  page: number;
  pageSize: number;
  total?: number;
  nextCursor?: string;
  previousCursor?: string;
}

/**
 * Aggregates of a domain's value field; count is the number of non-null values
 */
export interface RangeAggregate {
  count: number;
  average: number | null;
  minimum: number | null;
  maximum: number | null;
  total: number | null;
}

export interface DomainSummary extends RangeAggregate {
  domainId: DomainId;
  days: number;
}

/** First and last value of a range, oldest first */
export interface ValueChange {
  first: number;
  last: number;
  delta: number;
}

/**
 * Outcome for one domain inside a cross-domain view
 */
export type DomainSnapshot<T> =
  | { available: true; value: T }
  | { available: false; reason: string };

export interface TodaySnapshot {
  /** Local calendar date, YYYY-MM-DD */
  date: string;
  timeZone: string;
  /** Most recent weight record, whenever it was taken */
  weight: DomainSnapshot<DomainRecord | null>;
  /** Sum of today's steps, null when nothing was recorded */
  steps: DomainSnapshot<number | null>;
  /** Most recent sleep session that started today */
  sleep: DomainSnapshot<DomainRecord | null>;
  /** Today's heart rate aggregates, null without samples */
  heart: DomainSnapshot<RangeAggregate | null>;
}

export interface PeriodSummary {
  days: number;
  range: TimeRange;
  weight: DomainSnapshot<ValueChange | null>;
  steps: DomainSnapshot<RangeAggregate | null>;
  /** Average sleep duration */
  sleep: DomainSnapshot<number | null>;
}

export interface HealthReport {
  status: 'healthy' | 'degraded';
  database: boolean;
  lastSuccessfulQueryAt: string | null;
  uptimeSeconds: number;
  domains: DomainStatus[];
}

/**
 * Statement-level keywords that never reach the database.
 * The connection also runs every statement under BEGIN READ ONLY.
 */
export const BLOCKED_KEYWORDS = [
  'INSERT',
  'UPDATE',
  'DELETE',
  'DROP',
  'ALTER',
  'TRUNCATE',
  'GRANT',
  'REVOKE',
  'CREATE',
  'CALL',
  'COPY',
  'EXECUTE',
  'MERGE',
] as const;
