import { afterEach, describe, it, expect, vi } from 'vitest';
import {
  DatabaseUnavailableError,
  PoolTimeoutError,
  QueryCancelledError,
  QueryFailedError,
  SchemaMismatchError,
  ValidationRejectedError,
} from '../errors.js';
import { FakeDriver, driverError, result } from '../testing/fake-driver.js';
import { ConnectionPool, containsBlockedKeywords, type PoolOptions } from './client.js';

const OPTIONS: PoolOptions = { maxConnections: 2, acquireTimeoutMs: 1000, queryTimeoutMs: 1000 };

function answering(sql: string, columns: string[], rows: unknown[][]) {
  return new FakeDriver(text => (text === sql ? result(columns, rows) : undefined));
}

describe('containsBlockedKeywords', () => {
  it('finds mutating keywords outside literals', () => {
    expect(containsBlockedKeywords('select 1; drop table t')).toBe('DROP');
    expect(containsBlockedKeywords('SELECT update_time FROM t')).toBeNull();
    expect(containsBlockedKeywords("SELECT * FROM t WHERE info LIKE '%DELETE%'")).toBeNull();
  });
});

describe('ConnectionPool', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('needs at least two connections', () => {
    expect(() => new ConnectionPool(new FakeDriver(), { ...OPTIONS, maxConnections: 1 })).toThrow(RangeError);
  });

  it('runs each statement in a read-only transaction', async () => {
    const driver = answering('SELECT date, weight_kg FROM weight', ['date', 'weight_kg'], [['2026-10-01', 71.5]]);
    const pool = new ConnectionPool(driver, OPTIONS);

    const executed = await pool.execute('SELECT date, weight_kg FROM weight');

    expect(executed.columns).toEqual(['date', 'weight_kg']);
    expect(executed.rows).toEqual([['2026-10-01', 71.5]]);
    expect(driver.texts()).toEqual([
      'BEGIN READ ONLY',
      'SET LOCAL statement_timeout = 1000',
      'SELECT date, weight_kg FROM weight',
      'COMMIT',
    ]);
    expect(driver.releases).toEqual([false]);
    expect(pool.lastSuccessfulQueryAt).toBeInstanceOf(Date);
    expect(pool.stats).toEqual({ active: 0, waiting: 0, max: 2 });
  });

  it('passes bound parameters through', async () => {
    const driver = answering('SELECT * FROM steps WHERE steps > $1', ['steps'], []);
    const pool = new ConnectionPool(driver, OPTIONS);

    await pool.execute('SELECT * FROM steps WHERE steps > $1', [5000]);

    expect(driver.statements[2]).toEqual({ text: 'SELECT * FROM steps WHERE steps > $1', values: [5000] });
  });

  it('refuses mutating statements before connecting', async () => {
    const driver = new FakeDriver();
    const pool = new ConnectionPool(driver, OPTIONS);

    await expect(pool.execute('DELETE FROM weight')).rejects.toBeInstanceOf(ValidationRejectedError);
    expect(driver.connects).toBe(0);
  });

  it('rolls back and converts driver errors', async () => {
    const driver = new FakeDriver(text => {
      if (text.startsWith('SELECT')) throw driverError('relation "weight" does not exist', '42P01');
      return undefined;
    });
    const pool = new ConnectionPool(driver, OPTIONS);

    const failure = pool.execute('SELECT * FROM weight');

    await expect(failure).rejects.toBeInstanceOf(SchemaMismatchError);
    expect(driver.texts()).toContain('ROLLBACK');
    expect(driver.texts()).not.toContain('COMMIT');
    expect(driver.releases).toEqual([false]);
    expect(pool.lastSuccessfulQueryAt).toBeNull();
  });

  it('reports statement timeouts as failed queries', async () => {
    const driver = new FakeDriver(text => {
      if (text.startsWith('SELECT')) throw driverError('canceling statement due to statement timeout', '57014');
      return undefined;
    });
    const pool = new ConnectionPool(driver, OPTIONS);

    await expect(pool.execute('SELECT pg_sleep(60)')).rejects.toThrow(
      new QueryFailedError('Query exceeded the statement timeout and was cancelled')
    );
  });

  it('discards the connection when rollback fails', async () => {
    const errorLog = vi.spyOn(console, 'error').mockImplementation(() => {});
    const driver = new FakeDriver(text => {
      if (text.startsWith('SELECT') || text === 'ROLLBACK') throw driverError('server closed the connection', '08006');
      return undefined;
    });
    const pool = new ConnectionPool(driver, OPTIONS);

    await expect(pool.execute('SELECT 1')).rejects.toBeInstanceOf(DatabaseUnavailableError);
    expect(driver.releases).toEqual([true]);
    expect(errorLog).toHaveBeenCalledTimes(1);
  });

  it('frees the slot when connecting fails', async () => {
    const driver = new FakeDriver();
    driver.connectError = driverError('connect ECONNREFUSED 127.0.0.1:5432', 'ECONNREFUSED');
    const pool = new ConnectionPool(driver, OPTIONS);

    await expect(pool.execute('SELECT 1')).rejects.toBeInstanceOf(DatabaseUnavailableError);
    expect(pool.stats.active).toBe(0);
  });

  it('times out when every connection stays leased', async () => {
    vi.useFakeTimers();
    const pool = new ConnectionPool(new FakeDriver(), { ...OPTIONS, acquireTimeoutMs: 50 });
    await pool.acquire();
    await pool.acquire();

    const waiting = pool.acquire();
    const assertion = expect(waiting).rejects.toBeInstanceOf(PoolTimeoutError);
    expect(pool.stats.waiting).toBe(1);

    await vi.advanceTimersByTimeAsync(50);
    await assertion;
    expect(pool.stats).toEqual({ active: 2, waiting: 0, max: 2 });
  });

  it('hands freed connections to waiters in arrival order', async () => {
    const pool = new ConnectionPool(new FakeDriver(), OPTIONS);
    const first = await pool.acquire();
    const second = await pool.acquire();

    const order: string[] = [];
    const third = pool.acquire().then(lease => {
      order.push('third');
      return lease;
    });
    const fourth = pool.acquire().then(lease => {
      order.push('fourth');
      return lease;
    });
    expect(pool.stats).toEqual({ active: 2, waiting: 2, max: 2 });

    first.release();
    const thirdLease = await third;
    expect(order).toEqual(['third']);

    second.release();
    const fourthLease = await fourth;
    expect(order).toEqual(['third', 'fourth']);

    thirdLease.release();
    fourthLease.release();
    expect(pool.stats).toEqual({ active: 0, waiting: 0, max: 2 });
  });

  it('releases a lease only once', async () => {
    const driver = new FakeDriver();
    const pool = new ConnectionPool(driver, OPTIONS);
    const lease = await pool.acquire();

    lease.release();
    lease.release();

    expect(driver.releases).toEqual([false]);
    expect(pool.stats.active).toBe(0);
  });

  it('drops a waiter whose request is aborted', async () => {
    const pool = new ConnectionPool(new FakeDriver(), OPTIONS);
    await pool.acquire();
    await pool.acquire();

    const controller = new AbortController();
    const waiting = pool.acquire(controller.signal);
    controller.abort();

    await expect(waiting).rejects.toBeInstanceOf(QueryCancelledError);
    expect(pool.stats.waiting).toBe(0);
  });

  it('destroys the connection when a running query is aborted', async () => {
    const driver = new FakeDriver(text =>
      text === 'SELECT * FROM heart_rate' ? new Promise<undefined>(() => {}) : undefined
    );
    const pool = new ConnectionPool(driver, OPTIONS);
    const controller = new AbortController();

    const running = pool.execute('SELECT * FROM heart_rate', [], { signal: controller.signal });
    await vi.waitFor(() => expect(driver.texts()).toContain('SELECT * FROM heart_rate'));
    controller.abort();

    await expect(running).rejects.toBeInstanceOf(QueryCancelledError);
    expect(driver.releases).toEqual([true]);
    expect(driver.texts()).not.toContain('ROLLBACK');
  });

  it('reports health without throwing', async () => {
    const healthy = new ConnectionPool(answering('SELECT 1', ['?column?'], [[1]]), OPTIONS);
    expect(await healthy.healthCheck()).toBe(true);

    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const down = new FakeDriver();
    down.connectError = driverError('connect ECONNREFUSED 127.0.0.1:5432', 'ECONNREFUSED');
    expect(await new ConnectionPool(down, OPTIONS).healthCheck()).toBe(false);
  });

  it('fails waiters and new work once closed', async () => {
    const driver = new FakeDriver();
    const pool = new ConnectionPool(driver, OPTIONS);
    await pool.acquire();
    await pool.acquire();
    const waiting = expect(pool.acquire()).rejects.toThrow(new DatabaseUnavailableError('Connection pool is closing'));

    await pool.close();

    await waiting;
    await expect(pool.execute('SELECT 1')).rejects.toThrow('Connection pool is closed');
    expect(driver.ended).toBe(true);
  });
});
