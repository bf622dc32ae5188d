import { beforeEach, describe, it, expect, vi } from 'vitest';
import {
  InvalidArgumentError,
  SchemaMismatchError,
  UnknownIdentifierError,
  ValidationRejectedError,
} from '../errors.js';
import { FakeExecutor, FakeSchema, composeHandlers, result, type QueryHandler } from '../testing/fake-driver.js';
import type { DomainSpec } from '../types/index.js';
import { Explorer } from './explorer.js';

const STEPS_ROWS = [
  ['2026-10-17', 9120],
  ['2026-10-16', 4310],
  ['2026-10-15', 12004],
  ['2026-10-14', 7650],
  ['2026-10-13', 3002],
];

const STEPS_SELECT = 'SELECT "day", "steps" FROM "public"."steps_daily"';

describe('Explorer', () => {
  let schema: FakeSchema;
  let executor: FakeExecutor;
  let explorer: Explorer;
  let data: QueryHandler;
  let clock: Date;

  const statements = () => executor.calls.filter(c => !c.text.includes('information_schema'));

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    schema = new FakeSchema({
      steps_daily: {
        columns: [
          { name: 'day', dataType: 'date' },
          { name: 'steps', dataType: 'integer' },
        ],
      },
      weight: {
        columns: [
          { name: 'date', dataType: 'date' },
          { name: 'weight_kg', dataType: 'numeric' },
        ],
      },
    });

    data = (text, values) => {
      if (text.startsWith(STEPS_SELECT)) {
        const limit = Number(values[values.length - 2]);
        const offset = Number(values[values.length - 1]);
        return result(['day', 'steps'], STEPS_ROWS.slice(offset, offset + limit));
      }
      if (text.startsWith('SELECT * FROM weight')) {
        return result(['date', 'weight_kg'], [['2026-10-17', '81.4']]);
      }
      return undefined;
    };

    clock = new Date('2026-10-18T10:00:00.000Z');
    executor = new FakeExecutor(composeHandlers(schema.handler, (text, values) => data(text, values)));
    explorer = new Explorer(executor, {
      schemaName: 'public',
      maxRows: 50,
      pageSize: 2,
      maxPageSize: 10,
      cursorSecret: 'test-secret',
      now: () => clock,
    });
  });

  describe('runRawQuery', () => {
    it('runs a validated query with the row limit appended', async () => {
      const queryResult = await explorer.runRawQuery('SELECT * FROM weight');

      expect(queryResult).toEqual({
        columns: ['date', 'weight_kg'],
        rows: [['2026-10-17', '81.4']],
        appliedLimit: 50,
        elapsedMs: 1,
      });
      expect(executor.calls).toEqual([{ text: 'SELECT * FROM weight LIMIT 50', values: [] }]);
    });

    it('never returns more rows than the applied limit', async () => {
      data = () =>
        result(
          ['date', 'weight_kg'],
          [
            ['2026-10-17', '81.4'],
            ['2026-10-16', '81.0'],
            ['2026-10-15', '80.9'],
          ]
        );

      const queryResult = await explorer.runRawQuery('SELECT * FROM weight LIMIT 2');

      expect(queryResult.appliedLimit).toBe(2);
      expect(queryResult.rows).toEqual([
        ['2026-10-17', '81.4'],
        ['2026-10-16', '81.0'],
      ]);
    });

    it('rejects what fails validation without touching the database', async () => {
      const failure = explorer.runRawQuery('DELETE FROM weight');

      await expect(failure).rejects.toBeInstanceOf(ValidationRejectedError);
      await expect(failure).rejects.toMatchObject({ reason: 'notSelect' });
      expect(executor.calls).toHaveLength(0);
    });
  });

  describe('runGuidedQuery', () => {
    it('pages newest first by the first timestamp column', async () => {
      const first = await explorer.runGuidedQuery({ table: 'steps_daily' });

      expect(first.rows).toEqual(STEPS_ROWS.slice(0, 2));
      expect(first).toMatchObject({ page: 0, pageSize: 2, appliedLimit: 2 });
      expect(first.total).toBeUndefined();
      expect(first.previousCursor).toBeUndefined();

      const second = await explorer.runGuidedQuery({ table: 'steps_daily' }, first.nextCursor);

      expect(second.rows).toEqual(STEPS_ROWS.slice(2, 4));
      expect(second.page).toBe(1);
      expect(second.previousCursor).toEqual(expect.any(String));
      expect(second.nextCursor).toEqual(expect.any(String));

      expect(statements()).toEqual([
        { text: `${STEPS_SELECT} ORDER BY "day" DESC LIMIT $1 OFFSET $2`, values: [3, 0] },
        { text: `${STEPS_SELECT} ORDER BY "day" DESC LIMIT $1 OFFSET $2`, values: [3, 2] },
      ]);
    });

    it('starts over when the cursor belongs to another view', async () => {
      const first = await explorer.runGuidedQuery({ table: 'steps_daily' });

      const filtered = await explorer.runGuidedQuery(
        { table: 'steps_daily', filter: { column: 'steps', operator: 'gte', value: '5000' } },
        first.nextCursor
      );

      expect(filtered.page).toBe(0);
      expect(statements()[1]).toEqual({
        text: `${STEPS_SELECT} WHERE "steps" >= $1 ORDER BY "day" DESC LIMIT $2 OFFSET $3`,
        values: [5000, 3, 0],
      });
    });

    it('orders a domain table by its resolved timestamp', async () => {
      schema.tables.sleep_sessions = {
        columns: [
          { name: 'created_at', dataType: 'timestamp with time zone' },
          { name: 'start_time', dataType: 'timestamp with time zone' },
          { name: 'duration_minutes', dataType: 'integer' },
        ],
      };
      data = () => result(['created_at', 'start_time', 'duration_minutes']);
      await explorer.initialize();

      await explorer.runGuidedQuery({ table: 'sleep_sessions' });

      expect(statements()).toEqual([
        {
          text:
            'SELECT "created_at", "start_time", "duration_minutes" FROM "public"."sleep_sessions"' +
            ' ORDER BY "start_time" DESC LIMIT $1 OFFSET $2',
          values: [3, 0],
        },
      ]);
    });

    it('clamps the page size to the maximum', async () => {
      const page = await explorer.runGuidedQuery({ table: 'steps_daily', pageSize: 50 });

      expect(page.pageSize).toBe(10);
      expect(statements()[0].values).toEqual([11, 0]);
    });

    it('rejects an unknown table', async () => {
      await expect(explorer.runGuidedQuery({ table: 'nope' })).rejects.toThrow(
        new UnknownIdentifierError('nope', 'table')
      );
    });

    it('drops the cached table after a schema mismatch', async () => {
      await explorer.runGuidedQuery({ table: 'steps_daily' });
      expect(explorer.catalog.cached('steps_daily')).toBeDefined();

      data = () => {
        throw new SchemaMismatchError('column "day" does not exist', '42703');
      };

      await expect(explorer.runGuidedQuery({ table: 'steps_daily' })).rejects.toBeInstanceOf(SchemaMismatchError);
      expect(explorer.catalog.cached('steps_daily')).toBeUndefined();
    });
  });

  describe('describeTable', () => {
    it('always reads the live columns', async () => {
      await explorer.describeTable('weight');
      schema.tables.weight.columns.push({ name: 'source', dataType: 'text', nullable: false, default: "'scale'::text" });

      const { table } = await explorer.describeTable('weight');

      expect(table.columns.map(c => [c.name, c.category, c.nullable, c.defaultValue])).toEqual([
        ['date', 'timestamp', true, null],
        ['weight_kg', 'numeric', true, null],
        ['source', 'text', false, "'scale'::text"],
      ]);
    });

    it('lists the indexes alongside the columns', async () => {
      schema.tables.weight.indexes = [
        { name: 'weight_pkey', definition: 'CREATE UNIQUE INDEX weight_pkey ON public.weight USING btree (date)' },
      ];

      const { indexes } = await explorer.describeTable('weight');

      expect(indexes).toEqual([
        { name: 'weight_pkey', definition: 'CREATE UNIQUE INDEX weight_pkey ON public.weight USING btree (date)' },
      ]);
    });

    it('rejects a table that does not exist', async () => {
      await expect(explorer.describeTable('nope')).rejects.toThrow(new UnknownIdentifierError('nope', 'table'));
    });
  });

  it('refreshes the schema and re-resolves domains', async () => {
    const refreshed = await explorer.refresh();

    expect(refreshed).toEqual({
      tables: 2,
      columns: 4,
      domains: [
        { domainId: 'weight', available: true },
        { domainId: 'steps', available: true },
        { domainId: 'sleep', available: false, reason: 'table not found or columns unresolvable' },
        { domainId: 'heart', available: false, reason: 'table not found or columns unresolvable' },
      ],
    });
  });

  it('passes its clock to domain summaries', async () => {
    data = text =>
      text.startsWith('SELECT count("steps")')
        ? result(['count', 'avg', 'min', 'max', 'sum'], [['2', 6715, 4310, 9120, 13430]])
        : undefined;

    const summary = await explorer.domainSummary('steps', 1);

    expect(summary).toEqual({
      domainId: 'steps',
      days: 1,
      count: 2,
      average: 6715,
      minimum: 4310,
      maximum: 9120,
      total: 13430,
    });
    expect(statements()[0].values).toEqual([new Date('2026-10-17T10:00:00.000Z'), clock]);
  });

  it('queries with the domain specs it was given', async () => {
    const specs: DomainSpec[] = [
      {
        id: 'weight',
        label: 'Body mass',
        unit: 'lb',
        tables: ['body_mass'],
        fields: [
          { field: 'timestamp', candidates: ['taken_at'], required: true },
          { field: 'value', candidates: ['pounds'], required: true },
          { field: 'note', candidates: ['note'], required: false },
        ],
        timestampField: 'timestamp',
        valueField: 'value',
      },
    ];
    schema.tables.body_mass = {
      columns: [
        { name: 'taken_at', dataType: 'timestamp with time zone' },
        { name: 'pounds', dataType: 'numeric' },
        { name: 'note', dataType: 'text' },
      ],
    };
    data = text =>
      text.startsWith('SELECT "taken_at"') ? result(['timestamp', 'value', 'note'], [['2026-10-17', '179.5', 'after run']]) : undefined;
    const custom = new Explorer(executor, {
      schemaName: 'public',
      maxRows: 50,
      pageSize: 2,
      maxPageSize: 10,
      cursorSecret: 'test-secret',
      specs,
    });

    const record = await custom.domainLatest('weight');

    expect(record).toEqual({ timestamp: '2026-10-17', value: '179.5', note: 'after run' });
    expect(statements().map(s => s.text)).toEqual([
      'SELECT "taken_at" AS "timestamp", "pounds" AS "value", "note" AS "note" FROM "public"."body_mass"' +
        ' ORDER BY "taken_at" DESC NULLS LAST LIMIT 1',
    ]);
  });

  describe('daily views', () => {
    const BERLIN_TODAY = {
      since: new Date('2026-10-17T22:00:00.000Z'),
      until: new Date('2026-10-18T22:00:00.000Z'),
    };

    let daily: Explorer;

    beforeEach(() => {
      schema.tables.sleep_sessions = {
        columns: [
          { name: 'start_time', dataType: 'timestamp with time zone' },
          { name: 'duration_minutes', dataType: 'integer' },
        ],
      };
      schema.tables.heart_rate = {
        columns: [
          { name: 'day', dataType: 'date' },
          { name: 'bpm', dataType: 'text' },
        ],
      };
      daily = new Explorer(executor, {
        schemaName: 'public',
        maxRows: 50,
        pageSize: 2,
        maxPageSize: 10,
        cursorSecret: 'test-secret',
        timeZone: 'Europe/Berlin',
        now: () => clock,
      });
    });

    it('snapshots today in the configured zone', async () => {
      data = text => {
        if (text.startsWith('SELECT "date" AS "timestamp"')) {
          return result(['timestamp', 'value'], [['2026-10-17', '81.4']]);
        }
        if (text.startsWith('SELECT count("steps")')) {
          return result(['count', 'avg', 'min', 'max', 'sum'], [['1', 9120, 9120, 9120, 9120]]);
        }
        if (text.startsWith('SELECT "start_time" AS "timestamp"')) {
          return result(['timestamp', 'value']);
        }
        return undefined;
      };

      const today = await daily.today();

      expect(today).toEqual({
        date: '2026-10-18',
        timeZone: 'Europe/Berlin',
        weight: { available: true, value: { timestamp: '2026-10-17', value: '81.4' } },
        steps: { available: true, value: 9120 },
        sleep: { available: true, value: null },
        heart: { available: false, reason: 'value column bpm is not numeric' },
      });
      const steps = statements().find(s => s.text.startsWith('SELECT count("steps")'));
      expect(steps?.values).toEqual([BERLIN_TODAY.since, BERLIN_TODAY.until]);
      const sleep = statements().find(s => s.text.startsWith('SELECT "start_time"'));
      expect(sleep?.values).toEqual([BERLIN_TODAY.since, BERLIN_TODAY.until]);
    });

    it('reports no steps when none were recorded today', async () => {
      data = text => {
        if (text.startsWith('SELECT count("steps")')) {
          return result(['count', 'avg', 'min', 'max', 'sum'], [['0', null, null, null, null]]);
        }
        return result(['timestamp', 'value']);
      };

      const today = await daily.today();

      expect(today.steps).toEqual({ available: true, value: null });
      expect(today.weight).toEqual({ available: true, value: null });
    });

    it('summarizes a period from local midnight', async () => {
      data = text => {
        if (text.startsWith('SELECT (SELECT "weight_kg"')) {
          return result(['first', 'last'], [['80.9', '81.4']]);
        }
        if (text.startsWith('SELECT count("steps")')) {
          return result(['count', 'avg', 'min', 'max', 'sum'], [['7', 8000, 3002, 12004, 56000]]);
        }
        if (text.startsWith('SELECT count("duration_minutes")')) {
          return result(['count', 'avg', 'min', 'max', 'sum'], [['6', 452.5, 380, 510, 2715]]);
        }
        return undefined;
      };

      const period = await daily.period(7);

      expect(period.days).toBe(7);
      expect(period.range).toEqual({
        since: new Date('2026-10-10T22:00:00.000Z'),
        until: BERLIN_TODAY.until,
      });
      expect(period.steps).toEqual({
        available: true,
        value: { count: 7, average: 8000, minimum: 3002, maximum: 12004, total: 56000 },
      });
      expect(period.sleep).toEqual({ available: true, value: 452.5 });
      if (!period.weight.available || !period.weight.value) throw new Error('expected a weight change');
      expect(period.weight.value.first).toBe(80.9);
      expect(period.weight.value.last).toBe(81.4);
      expect(period.weight.value.delta).toBeCloseTo(0.5);
    });

    it('rejects a period that is not a positive number of days', async () => {
      await expect(daily.period(0)).rejects.toBeInstanceOf(InvalidArgumentError);
      expect(statements()).toHaveLength(0);
    });
  });

  describe('health', () => {
    it('reports uptime, last success and domain state', async () => {
      clock = new Date('2026-10-18T10:01:30.500Z');

      expect(await explorer.health()).toEqual({
        status: 'healthy',
        database: true,
        lastSuccessfulQueryAt: null,
        uptimeSeconds: 90,
        domains: [
          { domainId: 'weight', available: false, reason: 'not resolved yet' },
          { domainId: 'steps', available: false, reason: 'not resolved yet' },
          { domainId: 'sleep', available: false, reason: 'not resolved yet' },
          { domainId: 'heart', available: false, reason: 'not resolved yet' },
        ],
      });
    });

    it('is degraded while the database is down', async () => {
      executor.healthy = false;

      const report = await explorer.health();

      expect(report.status).toBe('degraded');
      expect(report.database).toBe(false);
    });
  });
});
