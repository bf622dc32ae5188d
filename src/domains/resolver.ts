/**
 * Maps each health domain onto whichever candidate table and columns the
 * connected database actually has.
 */

import { DomainUnavailableError, SchemaMismatchError } from '../errors.js';
import type { SchemaCatalog } from '../database/catalog.js';
import type {
  DomainId,
  DomainResolution,
  DomainSpec,
  DomainStatus,
  ResolvedDomain,
  TableDescriptor,
} from '../types/index.js';
import { DOMAIN_SPECS } from './specs.js';

export const UNRESOLVABLE_REASON = 'table not found or columns unresolvable';
const SCHEMA_CHANGED_REASON = 'schema changed while querying';

export type DomainState = { readonly status: 'pending' } | DomainResolution;

function findColumn(table: TableDescriptor, candidates: readonly string[]): string | undefined {
  for (const candidate of candidates) {
    const wanted = candidate.toLowerCase();
    const column = table.columns.find(c => c.name.toLowerCase() === wanted);
    if (column) return column.name;
  }
  return undefined;
}

/**
 * First candidate table whose columns cover every required field wins.
 * Fields never mix columns from different tables.
 */
export function resolveDomain(
  spec: DomainSpec,
  tables: ReadonlyMap<string, TableDescriptor>,
  now: Date = new Date()
): DomainResolution {
  for (const tableName of spec.tables) {
    const table = tables.get(tableName);
    if (!table) continue;

    const columns: Record<string, string> = {};
    let complete = true;
    for (const field of spec.fields) {
      const column = findColumn(table, field.candidates);
      if (column !== undefined) {
        columns[field.field] = column;
      } else if (field.required) {
        complete = false;
        break;
      }
    }

    if (complete) {
      const domain: ResolvedDomain = Object.freeze({
        id: spec.id,
        table,
        columns: Object.freeze(columns),
        resolvedAt: now,
      });
      return { status: 'resolved', domain };
    }
  }

  return { status: 'unavailable', domainId: spec.id, reason: UNRESOLVABLE_REASON };
}

export interface ResolveOptions {
  fresh?: boolean;
}

export class DomainResolver {
  private states: ReadonlyMap<DomainId, DomainState>;
  private readonly resolving = new Map<DomainId, Promise<DomainResolution>>();

  constructor(
    private readonly catalog: SchemaCatalog,
    private readonly specs: readonly DomainSpec[] = DOMAIN_SPECS
  ) {
    this.states = new Map(specs.map(spec => [spec.id, { status: 'pending' }]));
  }

  /**
   * The spec this resolver resolves `id` against
   */
  spec(id: DomainId): DomainSpec {
    const spec = this.specs.find(s => s.id === id);
    if (!spec) {
      throw new RangeError(`Unknown domain: ${id}`);
    }
    return spec;
  }

  state(id: DomainId): DomainState {
    return this.states.get(id) ?? { status: 'pending' };
  }

  /**
   * The resolved domain backed by `tableName`, if any
   */
  resolvedFor(tableName: string): { spec: DomainSpec; domain: ResolvedDomain } | undefined {
    for (const spec of this.specs) {
      const state = this.state(spec.id);
      if (state.status === 'resolved' && state.domain.table.tableName === tableName) {
        return { spec, domain: state.domain };
      }
    }
    return undefined;
  }

  private setState(id: DomainId, state: DomainState): void {
    this.states = new Map(this.states).set(id, state);
  }

  /**
   * Load candidate descriptors and resolve. Absent tables are not an error;
   * only a catalog outage throws.
   */
  async resolve(spec: DomainSpec, options: ResolveOptions = {}): Promise<DomainResolution> {
    const descriptors = await Promise.all(
      spec.tables.map(name => this.catalog.describe(name, { fresh: options.fresh }))
    );

    const tables = new Map<string, TableDescriptor>();
    for (const descriptor of descriptors) {
      if (descriptor) tables.set(descriptor.tableName, descriptor);
    }
    return resolveDomain(spec, tables);
  }

  /**
   * Resolve and record the outcome. Concurrent callers share one evaluation.
   */
  private evaluate(id: DomainId, fresh: boolean): Promise<DomainResolution> {
    const existing = this.resolving.get(id);
    if (existing) return existing;

    const pending = this.resolve(this.spec(id), { fresh })
      .then(resolution => {
        this.setState(id, resolution);
        if (resolution.status === 'resolved') {
          console.log(`Domain ready: ${id} (${resolution.domain.table.tableName})`);
        } else {
          console.warn(`Domain unavailable: ${id} (${resolution.reason})`);
        }
        return resolution;
      })
      .finally(() => {
        this.resolving.delete(id);
      });

    this.resolving.set(id, pending);
    return pending;
  }

  /**
   * Resolve every domain concurrently. A catalog outage leaves a domain
   * pending so that the next request tries again.
   */
  async initialize(): Promise<DomainStatus[]> {
    const results = await Promise.allSettled(this.specs.map(spec => this.evaluate(spec.id, false)));

    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        const reason = result.reason instanceof Error ? result.reason.message : String(result.reason);
        console.warn(`Domain pending: ${this.specs[index].id} (${reason})`);
      }
    });

    return this.statuses();
  }

  private async ensureResolved(id: DomainId): Promise<ResolvedDomain> {
    const current = this.state(id);
    const resolution = current.status === 'pending' ? await this.evaluate(id, false) : current;

    if (resolution.status === 'unavailable') {
      throw new DomainUnavailableError(id, resolution.reason);
    }
    return resolution.domain;
  }

  private async reresolve(id: DomainId, failed: ResolvedDomain): Promise<ResolvedDomain> {
    // Another request may already have replaced the failed mapping
    const current = this.state(id);
    if (current.status === 'resolved' && current.domain !== failed) {
      return current.domain;
    }

    if (!this.resolving.has(id)) {
      this.catalog.invalidate(this.spec(id).tables);
    }
    const resolution = await this.evaluate(id, true);
    if (resolution.status === 'unavailable') {
      throw new DomainUnavailableError(id, resolution.reason);
    }
    return resolution.domain;
  }

  /**
   * Run `fn` against the resolved mapping of a domain. A schema mismatch
   * triggers one re-resolution and one retry.
   */
  async run<T>(id: DomainId, fn: (domain: ResolvedDomain) => Promise<T>): Promise<T> {
    const domain = await this.ensureResolved(id);

    try {
      return await fn(domain);
    } catch (error) {
      if (!(error instanceof SchemaMismatchError)) throw error;
      console.warn(`Schema changed under domain ${id}, re-resolving: ${error.message}`);
    }

    const retryDomain = await this.reresolve(id, domain);
    try {
      return await fn(retryDomain);
    } catch (error) {
      if (!(error instanceof SchemaMismatchError)) throw error;
      this.setState(id, { status: 'unavailable', domainId: id, reason: SCHEMA_CHANGED_REASON });
      console.warn(`Domain unavailable: ${id} (${SCHEMA_CHANGED_REASON})`);
      throw new DomainUnavailableError(id, SCHEMA_CHANGED_REASON);
    }
  }

  /**
   * Re-resolve every domain; call after the catalog was refreshed
   */
  async refresh(): Promise<DomainStatus[]> {
    return this.initialize();
  }

  statuses(): DomainStatus[] {
    return this.specs.map(spec => {
      const state = this.state(spec.id);
      switch (state.status) {
        case 'resolved':
          return { domainId: spec.id, available: true };
        case 'unavailable':
          return { domainId: spec.id, available: false, reason: state.reason };
        case 'pending':
          return { domainId: spec.id, available: false, reason: 'not resolved yet' };
      }
    });
  }
}
