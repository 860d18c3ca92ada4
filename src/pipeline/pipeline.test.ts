import { describe, it, expect } from 'vitest';
import type { Extractor, Row } from '../connectors/types.js';
import { ConfigurationError, StorageError } from '../errors.js';
import { FakeExtractor, MemoryStateStore, RecordingPublisher } from '../test-utils.js';
import { createPipelineContext, type PipelineContextInit } from './context.js';
import { canTransition, runTable } from './controller.js';
import { nextRunId, runCdc, validateTables } from './orchestrator.js';
import type { TableConfig } from './types.js';

const NOW = new Date('2026-03-01T00:00:00Z');
const RUN_ID = '1772323200';

const orders: TableConfig = { name: 'orders', primary_key: 'order_id', excluded_columns: ['created_timestamp'] };
const customers: TableConfig = { name: 'customers', primary_key: 'customer_id', excluded_columns: [] };

function setup(overrides: Partial<PipelineContextInit> = {}) {
  const extractor = new FakeExtractor();
  const store = new MemoryStateStore();
  const publisher = new RecordingPublisher();
  const transitions: string[] = [];
  const ctx = createPipelineContext({
    tables: [orders, customers],
    extractor,
    baselines: store,
    changeLog: store,
    summaries: store,
    publisher,
    retry: { maxAttempts: 3, delayMs: 0, backoff: 'fixed' },
    now: () => NOW,
    onTransition: (table, from, to) => {
      transitions.push(`${table}:${from ?? 'START'}->${to}`);
    },
    ...overrides,
  });
  return { ctx, extractor, store, publisher, transitions };
}

const firstOrders = [
  { order_id: 1, total: 10, created_timestamp: '2026-02-01' },
  { order_id: 2, total: 20, created_timestamp: '2026-02-01' },
];

describe('canTransition', () => {
  it('starts only in EXTRACTING', () => {
    expect(canTransition(null, 'EXTRACTING')).toBe(true);
    expect(canTransition(null, 'HASHING')).toBe(false);
  });

  it('follows the happy path forward only', () => {
    expect(canTransition('EXTRACTING', 'HASHING')).toBe(true);
    expect(canTransition('HASHING', 'DIFFING')).toBe(true);
    expect(canTransition('DIFFING', 'EMITTING')).toBe(true);
    expect(canTransition('EMITTING', 'COMMITTING_BASELINE')).toBe(true);
    expect(canTransition('COMMITTING_BASELINE', 'DONE')).toBe(true);
    expect(canTransition('EMITTING', 'DIFFING')).toBe(false);
    expect(canTransition('HASHING', 'EMITTING')).toBe(false);
  });

  it('lets a skipped table finish from EXTRACTING or DIFFING', () => {
    expect(canTransition('EXTRACTING', 'DONE')).toBe(true);
    expect(canTransition('DIFFING', 'DONE')).toBe(true);
    expect(canTransition('EMITTING', 'DONE')).toBe(false);
  });

  it('treats DONE and FAILED as terminal', () => {
    expect(canTransition('DONE', 'EXTRACTING')).toBe(false);
    expect(canTransition('FAILED', 'EXTRACTING')).toBe(false);
    expect(canTransition('FAILED', 'DONE')).toBe(false);
  });
});

describe('runTable', () => {
  it('treats every row as an insert on the first run and commits the baseline', async () => {
    const { ctx, extractor, store, publisher, transitions } = setup();
    extractor.setRows('orders', firstOrders);

    const outcome = await runTable(orders, RUN_ID, ctx);

    expect(outcome).toMatchObject({ status: 'DONE', stage: 'DONE', changes: 2, inserted: 2, attempts: 1 });
    expect(store.logs.get(`orders/${RUN_ID}`)?.map((r) => [r.change_type, r.primary_key])).toEqual([
      ['INSERT', '1'],
      ['INSERT', '2'],
    ]);
    expect(store.baselines.get('orders')?.fingerprints.map((f) => f.primary_key)).toEqual(['1', '2']);
    expect(store.baselines.get('orders')?.runId).toBe(RUN_ID);
    expect(publisher.published).toHaveLength(2);
    expect(publisher.published[0].change_time).toBe('2026-03-01T00:00:00.000Z');
    expect(transitions).toEqual([
      'orders:START->EXTRACTING',
      'orders:EXTRACTING->HASHING',
      'orders:HASHING->DIFFING',
      'orders:DIFFING->EMITTING',
      'orders:EMITTING->COMMITTING_BASELINE',
      'orders:COMMITTING_BASELINE->DONE',
    ]);
  });

  it('detects inserts, deletes and updates against the previous baseline', async () => {
    const { ctx, extractor, store } = setup();
    extractor.setRows('orders', firstOrders);
    await runTable(orders, '1', ctx);

    extractor.setRows('orders', [
      { order_id: 1, total: 10, created_timestamp: '2026-02-28' },
      { order_id: 3, total: 30, created_timestamp: '2026-02-28' },
      { order_id: 2, total: 25, created_timestamp: '2026-02-28' },
    ]);
    const outcome = await runTable(orders, '2', ctx);

    expect(outcome).toMatchObject({ status: 'DONE', changes: 2, inserted: 1, deleted: 0, updated: 1, unchanged: 1 });
    expect(store.logs.get('orders/2')?.map((r) => [r.change_type, r.primary_key])).toEqual([
      ['INSERT', '3'],
      ['UPDATE', '2'],
    ]);

    extractor.setRows('orders', [{ order_id: 3, total: 30 }]);
    const third = await runTable(orders, '3', ctx);
    expect(third).toMatchObject({ deleted: 2, inserted: 0, updated: 0, unchanged: 1 });
    expect(store.logs.get('orders/3')?.map((r) => [r.change_type, r.primary_key])).toEqual([
      ['DELETE', '1'],
      ['DELETE', '2'],
    ]);
  });

  it('reports no changes when the data is the same as the baseline', async () => {
    const { ctx, extractor, store } = setup();
    extractor.setRows('orders', firstOrders);
    await runTable(orders, '1', ctx);

    const outcome = await runTable(orders, '2', ctx);

    expect(outcome).toMatchObject({ status: 'DONE', changes: 0, unchanged: 2 });
    expect(store.appendCalls).toBe(1);
    expect(store.putCalls).toBe(2);
  });

  it('fails the table after three extraction failures and leaves state untouched', async () => {
    const { ctx, extractor, store, transitions } = setup();
    store.baselines.set('orders', { fingerprints: [{ primary_key: '1', hash: 'h' }], runId: '0' });
    extractor.setRows('orders', firstOrders).failNext('orders', 3);

    const outcome = await runTable(orders, RUN_ID, ctx);

    expect(outcome).toMatchObject({
      status: 'FAILED',
      stage: 'FAILED',
      failed_stage: 'EXTRACTING',
      attempts: 3,
      error: 'connection refused while reading orders (after 3 attempts)',
    });
    expect(extractor.calls).toEqual(['orders', 'orders', 'orders']);
    expect(store.appendCalls).toBe(0);
    expect(store.putCalls).toBe(0);
    expect(store.baselines.get('orders')?.fingerprints).toEqual([{ primary_key: '1', hash: 'h' }]);
    expect(transitions).toEqual(['orders:START->EXTRACTING', 'orders:EXTRACTING->FAILED']);
  });

  it('recovers when a retry succeeds', async () => {
    const { ctx, extractor } = setup();
    extractor.setRows('orders', firstOrders).failNext('orders', 2);

    const outcome = await runTable(orders, RUN_ID, ctx);

    expect(outcome).toMatchObject({ status: 'DONE', attempts: 3, changes: 2 });
  });

  it('does not retry an extraction error that is not an ExtractionError', async () => {
    let calls = 0;
    const extractor: Extractor = {
      name: 'broken',
      async fetch(): Promise<Row[]> {
        calls++;
        throw new TypeError('unsupported column type');
      },
    };
    const { ctx } = setup({ extractor });

    const outcome = await runTable(orders, RUN_ID, ctx);

    expect(calls).toBe(1);
    expect(outcome).toMatchObject({ status: 'FAILED', failed_stage: 'EXTRACTING', error: 'unsupported column type' });
  });

  it('skips an empty extraction without touching the baseline, log or stream', async () => {
    const { ctx, extractor, store, publisher, transitions } = setup();
    store.baselines.set('orders', { fingerprints: [{ primary_key: '1', hash: 'h' }], runId: '0' });
    extractor.setRows('orders', []);

    const outcome = await runTable(orders, RUN_ID, ctx);

    expect(outcome).toMatchObject({ status: 'DONE', stage: 'DONE', changes: 0, skipped: true });
    expect(store.appendCalls).toBe(0);
    expect(store.putCalls).toBe(0);
    expect(publisher.batches).toEqual([]);
    expect(store.baselines.get('orders')?.fingerprints).toEqual([{ primary_key: '1', hash: 'h' }]);
    expect(transitions).toEqual(['orders:START->EXTRACTING', 'orders:EXTRACTING->DONE']);
  });

  it('skips a table whose rows all lack a primary key', async () => {
    const { ctx, extractor, store } = setup();
    extractor.setRows('orders', [{ total: 1 }, { order_id: null, total: 2 }]);

    const outcome = await runTable(orders, RUN_ID, ctx);

    expect(outcome).toMatchObject({ status: 'DONE', skipped: true, changes: 0 });
    expect(outcome.warnings).toEqual([
      { kind: 'missing_primary_key', count: 2, message: '2 row(s) without a value for "order_id" were ignored' },
    ]);
    expect(store.putCalls).toBe(0);
  });

  it('fails a table whose rows have no primary key column at all', async () => {
    const { ctx, extractor, store } = setup();
    extractor.setRows('orders', [{ Order_ID: 1, total: 10 }, { Order_ID: 2, total: 20 }]);

    const outcome = await runTable(orders, RUN_ID, ctx);

    expect(outcome).toMatchObject({
      status: 'FAILED',
      failed_stage: 'HASHING',
      skipped: false,
      error: 'Primary key column "order_id" not found in orders (columns: Order_ID, total)',
    });
    expect(store.putCalls).toBe(0);
    expect(store.appendCalls).toBe(0);
  });

  it('keeps the old baseline when the baseline write fails', async () => {
    const { ctx, extractor, store } = setup();
    store.baselines.set('orders', { fingerprints: [{ primary_key: '9', hash: 'h' }], runId: '0' });
    store.failPut = true;
    extractor.setRows('orders', firstOrders);

    const outcome = await runTable(orders, RUN_ID, ctx);

    expect(outcome).toMatchObject({
      status: 'FAILED',
      failed_stage: 'COMMITTING_BASELINE',
      error: 'baseline write failed for orders',
    });
    expect(store.appendCalls).toBe(1);
    expect(store.baselines.get('orders')?.fingerprints).toEqual([{ primary_key: '9', hash: 'h' }]);
  });

  it('does not commit the baseline when the change log write fails', async () => {
    const { ctx, extractor, store, publisher } = setup();
    store.failAppend = true;
    extractor.setRows('orders', firstOrders);

    const outcome = await runTable(orders, RUN_ID, ctx);

    expect(outcome).toMatchObject({ status: 'FAILED', failed_stage: 'EMITTING' });
    expect(store.putCalls).toBe(0);
    expect(publisher.batches).toEqual([]);
  });

  it('fails at DIFFING when the baseline cannot be read', async () => {
    const { ctx, extractor, store } = setup();
    store.failGet = true;
    extractor.setRows('orders', firstOrders);

    const outcome = await runTable(orders, RUN_ID, ctx);

    expect(outcome).toMatchObject({ status: 'FAILED', failed_stage: 'DIFFING', error: 'baseline read failed for orders' });
  });

  it('finishes the table when only the stream fails', async () => {
    const { ctx, extractor, store, publisher } = setup();
    publisher.failWith = new StorageError('stream', 'orders', 'stream unavailable');
    extractor.setRows('orders', firstOrders);

    const outcome = await runTable(orders, RUN_ID, ctx);

    expect(outcome).toMatchObject({
      status: 'DONE',
      changes: 2,
      stream_error: 'stream unavailable (after 1 attempt)',
    });
    expect(store.baselines.get('orders')?.fingerprints).toHaveLength(2);
  });

  it('warns about duplicate keys and keeps the last row by default', async () => {
    const { ctx, extractor, store } = setup();
    extractor.setRows('orders', [
      { order_id: 1, total: 10 },
      { order_id: 1, total: 11 },
    ]);

    const outcome = await runTable(orders, RUN_ID, ctx);

    expect(outcome.warnings).toEqual([
      {
        kind: 'duplicate_primary_key',
        count: 1,
        message: '1 duplicate value(s) of "order_id"; last occurrence kept',
      },
    ]);
    expect(outcome.inserted).toBe(1);
    expect(store.baselines.get('orders')?.fingerprints).toHaveLength(1);
  });

  it('fails the table on duplicate keys under the reject policy', async () => {
    const { ctx, extractor, store } = setup({ duplicates: 'reject' });
    extractor.setRows('orders', [{ order_id: 1 }, { order_id: 1 }]);

    const outcome = await runTable(orders, RUN_ID, ctx);

    expect(outcome).toMatchObject({
      status: 'FAILED',
      failed_stage: 'DIFFING',
      error: 'Duplicate primary key "1" in extraction of orders',
    });
    expect(store.appendCalls).toBe(0);
  });

  it('ignores excluded columns when comparing rows', async () => {
    const { ctx, extractor } = setup();
    extractor.setRows('orders', firstOrders);
    await runTable(orders, '1', ctx);

    extractor.setRows(
      'orders',
      firstOrders.map((row) => ({ ...row, created_timestamp: '2026-03-01' })),
    );
    const outcome = await runTable(orders, '2', ctx);

    expect(outcome).toMatchObject({ changes: 0, unchanged: 2 });
  });
});

describe('validateTables', () => {
  it('accepts plain and schema-qualified names', () => {
    expect(() => validateTables([orders, { ...customers, name: 'crm.customers' }])).not.toThrow();
  });

  it('lists every problem at once', () => {
    const err = (() => {
      try {
        validateTables([
          { name: 'orders; drop', primary_key: 'id', excluded_columns: [] },
          { name: 'items', primary_key: ' ', excluded_columns: [] },
          { name: 'events', primary_key: 'ID', excluded_columns: ['id'] },
          { name: 'Events', primary_key: 'id', excluded_columns: [] },
        ]);
        return null;
      } catch (e) {
        return e;
      }
    })();

    expect(err).toBeInstanceOf(ConfigurationError);
    expect(err).toMatchObject({
      issues: [
        'tables[0].name "orders; drop" is not a valid table identifier',
        'tables[1] (items) has an empty primary_key',
        'tables[2] (events) excludes its own primary key "ID"',
        'table "Events" is configured more than once',
      ],
    });
  });

  it('rejects an empty table set', () => {
    expect(() => validateTables([])).toThrow('Invalid configuration: no tables configured');
  });
});

describe('nextRunId', () => {
  it('uses the epoch seconds of the run start', () => {
    expect(nextRunId(NOW, null)).toBe(RUN_ID);
    expect(nextRunId(new Date(1700000000999), null)).toBe('1700000000');
  });

  it('moves past the last persisted run id', () => {
    expect(nextRunId(NOW, RUN_ID)).toBe('1772323201');
    expect(nextRunId(NOW, '1772323210')).toBe('1772323211');
    expect(nextRunId(NOW, '1700000000')).toBe(RUN_ID);
  });

  it('ignores a last run id that is not numeric', () => {
    expect(nextRunId(NOW, 'manual')).toBe(RUN_ID);
  });
});

describe('runCdc', () => {
  it('isolates a failing table and reports it in the summary', async () => {
    const { ctx, extractor, store } = setup();
    extractor.setRows('orders', firstOrders);
    extractor.setRows('customers', [{ customer_id: 'c1' }]).failNext('customers', 3);

    const { summary, outcomes } = await runCdc(ctx);

    expect(summary).toEqual({
      run_id: RUN_ID,
      started_at: '2026-03-01T00:00:00.000Z',
      finished_at: '2026-03-01T00:00:00.000Z',
      status: 'complete',
      changes: {
        orders: 2,
        customers: 'Error: connection refused while reading customers (after 3 attempts)',
      },
      warnings: {},
    });
    expect(outcomes.map((o) => o.status)).toEqual(['DONE', 'FAILED']);
    expect(store.summaries.get(RUN_ID)).toEqual(summary);
  });

  it('gives consecutive runs increasing ids even within one second', async () => {
    const { ctx, extractor } = setup();
    extractor.setRows('orders', firstOrders).setRows('customers', [{ customer_id: 'c1' }]);

    const first = await runCdc(ctx);
    const second = await runCdc(ctx);

    expect(first.summary.run_id).toBe(RUN_ID);
    expect(second.summary.run_id).toBe('1772323201');
    expect(second.summary.changes).toEqual({ orders: 0, customers: 0 });
  });

  it('uses an explicit run id when given one', async () => {
    const { ctx, extractor } = setup();
    extractor.setRows('orders', firstOrders);

    const { summary } = await runCdc(ctx, { runId: '42' });

    expect(summary.run_id).toBe('42');
    expect(summary.changes).toEqual({ orders: 2, customers: 0 });
  });

  it('refuses an explicit run id that is not all digits', async () => {
    const { ctx, extractor } = setup();

    await expect(runCdc(ctx, { runId: 'nightly' })).rejects.toThrow(
      'Invalid configuration: run id "nightly" must be digits only',
    );
    expect(extractor.calls).toEqual([]);
  });

  it('records warnings per table', async () => {
    const { ctx, extractor } = setup();
    extractor.setRows('orders', [{ order_id: 1 }, { total: 5 }]);

    const { summary } = await runCdc(ctx);

    expect(summary.warnings).toEqual({
      orders: [{ kind: 'missing_primary_key', count: 1, message: '1 row(s) without a value for "order_id" were ignored' }],
    });
  });

  it('validates tables before extracting anything', async () => {
    const { ctx, extractor, store } = setup({ tables: [orders, { ...orders }] });

    await expect(runCdc(ctx)).rejects.toThrow(ConfigurationError);
    expect(extractor.calls).toEqual([]);
    expect(store.summaries.size).toBe(0);
  });

  it('reports tables in configured order whatever order they finish in', async () => {
    const tables: TableConfig[] = ['a', 'b', 'c'].map((name) => ({ name, primary_key: 'id', excluded_columns: [] }));
    const extractor: Extractor = {
      name: 'timed',
      async fetch(table: string): Promise<Row[]> {
        await new Promise((resolve) => setTimeout(resolve, table === 'a' ? 40 : 0));
        return [{ id: { kind: 'number', value: 1 } }];
      },
    };
    const { ctx } = setup({ tables, extractor, concurrency: 3 });

    const { summary, outcomes } = await runCdc(ctx);

    expect(outcomes.map((o) => o.table)).toEqual(['a', 'b', 'c']);
    expect(Object.keys(summary.changes)).toEqual(['a', 'b', 'c']);
  });

  it('never runs more tables at once than the concurrency limit', async () => {
    let active = 0;
    let peak = 0;
    const tables: TableConfig[] = ['t1', 't2', 't3', 't4', 't5'].map((name) => ({
      name,
      primary_key: 'id',
      excluded_columns: [],
    }));
    const extractor: Extractor = {
      name: 'counting',
      async fetch(): Promise<Row[]> {
        active++;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 10));
        active--;
        return [];
      },
    };
    const { ctx } = setup({ tables, extractor, concurrency: 2 });

    const { outcomes } = await runCdc(ctx);

    expect(peak).toBe(2);
    expect(outcomes).toHaveLength(5);
  });

  it('marks tables not yet started as cancelled once the signal fires', async () => {
    const controller = new AbortController();
    const tables: TableConfig[] = ['t1', 't2', 't3'].map((name) => ({ name, primary_key: 'id', excluded_columns: [] }));
    const extractor: Extractor = {
      name: 'cancelling',
      async fetch(): Promise<Row[]> {
        controller.abort();
        return [{ id: { kind: 'number', value: 1 } }];
      },
    };
    const { ctx, store } = setup({ tables, extractor });

    const { summary } = await runCdc(ctx, { signal: controller.signal });

    expect(summary.status).toBe('cancelled');
    expect(summary.changes).toEqual({
      t1: 1,
      t2: 'Error: run cancelled before table started',
      t3: 'Error: run cancelled before table started',
    });
    expect(store.summaries.get(RUN_ID)?.status).toBe('cancelled');
  });

  it('still returns the summary when it cannot be stored', async () => {
    const { ctx, extractor, store } = setup();
    store.failSummary = true;
    extractor.setRows('orders', firstOrders);

    const { summary } = await runCdc(ctx);

    expect(summary.status).toBe('complete');
    expect(summary.changes.orders).toBe(2);
    expect(store.summaries.size).toBe(0);
  });
});
