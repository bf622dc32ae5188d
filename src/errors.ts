/**
 * Error taxonomy. Everything database-adjacent is converted to one of these
 * before it leaves the database, catalog or resolver layer.
 */

import type { DomainId, RejectionReason } from './types/index.js';

export type ErrorKind =
  | 'catalogUnavailable'
  | 'databaseUnavailable'
  | 'domainUnavailable'
  | 'validationRejected'
  | 'poolTimeout'
  | 'invalidCursor'
  | 'schemaMismatch'
  | 'unknownIdentifier'
  | 'queryFailed'
  | 'queryCancelled'
  | 'invalidArgument';

export abstract class ExplorerError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Connectivity lost while introspecting; try again later, never "table absent" */
export class CatalogUnavailableError extends ExplorerError {
  readonly kind = 'catalogUnavailable';
}

export class DatabaseUnavailableError extends ExplorerError {
  readonly kind = 'databaseUnavailable';
}

export class DomainUnavailableError extends ExplorerError {
  readonly kind = 'domainUnavailable';

  constructor(readonly domainId: DomainId, readonly reason: string) {
    super(`Domain ${domainId} is unavailable: ${reason}`);
  }
}

export class ValidationRejectedError extends ExplorerError {
  readonly kind = 'validationRejected';

  constructor(readonly reason: RejectionReason, message: string) {
    super(message);
  }
}

export class PoolTimeoutError extends ExplorerError {
  readonly kind = 'poolTimeout';

  constructor(readonly waitedMs: number) {
    super(`No database connection became available within ${waitedMs}ms`);
  }
}

export class InvalidCursorError extends ExplorerError {
  readonly kind = 'invalidCursor';
}

/** Relation or column referenced by a statement does not exist (anymore) */
export class SchemaMismatchError extends ExplorerError {
  readonly kind = 'schemaMismatch';

  constructor(message: string, readonly code: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class UnknownIdentifierError extends ExplorerError {
  readonly kind = 'unknownIdentifier';

  constructor(readonly identifier: string, readonly scope: 'table' | 'column') {
    super(`Unknown ${scope}: ${identifier}`);
  }
}

export class QueryFailedError extends ExplorerError {
  readonly kind = 'queryFailed';

  constructor(message: string, readonly code?: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class QueryCancelledError extends ExplorerError {
  readonly kind = 'queryCancelled';

  constructor() {
    super('Query was cancelled');
  }
}

/** A well-formed request whose values cannot be used, such as a non-numeric filter on a numeric column */
export class InvalidArgumentError extends ExplorerError {
  readonly kind = 'invalidArgument';
}

export function isExplorerError(error: unknown): error is ExplorerError {
  return error instanceof ExplorerError;
}

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EPIPE',
  'EHOSTUNREACH',
  '53300', // too_many_connections
]);

const SCHEMA_ERROR_CODES = new Set([
  '42P01', // undefined_table
  '42703', // undefined_column
  '3F000', // invalid_schema_name
]);

function readCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return undefined;
  }
  return typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Convert a pg / socket error into the explorer taxonomy.
 * ExplorerErrors pass through untouched.
 */
export function classifyDriverError(error: unknown): ExplorerError {
  if (error instanceof ExplorerError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const code = readCode(error);

  if (code && SCHEMA_ERROR_CODES.has(code)) {
    return new SchemaMismatchError(message, code, { cause: error });
  }

  if (
    (code && (CONNECTION_ERROR_CODES.has(code) || code.startsWith('08') || code.startsWith('57P'))) ||
    /timeout exceeded when trying to connect|Connection terminated/i.test(message)
  ) {
    return new DatabaseUnavailableError(`Database unreachable: ${message}`, { cause: error });
  }

  if (code === '57014') {
    return new QueryFailedError('Query exceeded the statement timeout and was cancelled', code, {
      cause: error,
    });
  }

  return new QueryFailedError(message, code, { cause: error });
}

/**
 * User-facing wording for each error kind
 */
export function describeError(error: unknown): string {
  if (error instanceof DomainUnavailableError) {
    return `No ${error.domainId} data found (${error.reason}).`;
  }
  if (error instanceof ValidationRejectedError) {
    return `Query rejected [${error.reason}]: ${error.message}`;
  }
  if (!(error instanceof ExplorerError)) {
    return 'Unexpected error. Please try again.';
  }

  switch (error.kind) {
    case 'catalogUnavailable':
    case 'databaseUnavailable':
      return 'Database is unreachable right now. Try again later.';
    case 'poolTimeout':
      return 'All database connections are busy. Try again shortly.';
    case 'invalidCursor':
      return 'That page is no longer valid. Start again from the first page.';
    case 'schemaMismatch':
      return `Schema mismatch: ${error.message}`;
    case 'queryFailed':
      return `SQL error: ${error.message}`;
    default:
      return error.message;
  }
}
