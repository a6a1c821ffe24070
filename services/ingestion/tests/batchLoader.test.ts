import assert from 'node:assert/strict';
import test from 'node:test';
import {
  INTRADAY_STREAM_NAME,
  SUMMARY_STREAM_NAME,
  createSilentLogger,
  createStreamCatalog
} from '@heartstore/shared';
import { createBatchLoader, dedupeByPrimaryKey } from '../src/load/batchLoader';
import type { IntradayRow } from '../src/transform/records';
import { createMemoryTableStore } from './support/memoryTableStore';

const logger = createSilentLogger();

function rowsFor(values: number[], entityId = 'user1'): IntradayRow[] {
  return values.map((value, index) => ({
    timestamp: new Date(Date.UTC(2024, 2, 10, 8, 0, index)),
    value,
    user_id: entityId
  }));
}

test('upserting the same key twice keeps one row with the latest value', async () => {
  const { [INTRADAY_STREAM_NAME]: stream } = createStreamCatalog();
  const store = createMemoryTableStore();
  const loader = createBatchLoader({ store, logger });

  const first = await loader.load(stream, rowsFor([70]), { upsert: true });
  const second = await loader.load(stream, rowsFor([88]), { upsert: true });

  assert.equal(first.success, true);
  assert.equal(second.success, true);
  assert.deepEqual(store.rows(INTRADAY_STREAM_NAME), [
    { timestamp: new Date('2024-03-10T08:00:00.000Z'), value: 88, user_id: 'user1' }
  ]);
});

test('duplicate keys within one load collapse to the last occurrence', () => {
  const { [INTRADAY_STREAM_NAME]: stream } = createStreamCatalog();
  const rows = [...rowsFor([70, 71]), ...rowsFor([90])];
  assert.deepEqual(
    dedupeByPrimaryKey(stream, rows).map((row) => row.value),
    [71, 90]
  );
});

test('the same timestamp for different entities is not a duplicate', async () => {
  const { [INTRADAY_STREAM_NAME]: stream } = createStreamCatalog();
  const store = createMemoryTableStore();
  const loader = createBatchLoader({ store, logger });

  await loader.load(stream, [...rowsFor([70], 'user1'), ...rowsFor([80], 'user2')], { upsert: true });
  assert.equal(await store.countRows(stream, 'user1'), 1);
  assert.equal(await store.countRows(stream, 'user2'), 1);
});

test('writes in batches of the stream batch size, one transaction each', async () => {
  const { [INTRADAY_STREAM_NAME]: stream } = createStreamCatalog({ intradayBatchSize: 2 });
  const store = createMemoryTableStore();
  const loader = createBatchLoader({ store, logger });

  const result = await loader.load(stream, rowsFor([60, 61, 62, 63, 64]), { upsert: true });

  assert.deepEqual(result, {
    stream: INTRADAY_STREAM_NAME,
    success: true,
    attempted: 5,
    committed: 5,
    batches: 3,
    failedBatch: null
  });
  assert.deepEqual(store.writes.map((write) => write.rows), [2, 2, 1]);
  assert.equal(store.committedTransactions, 3);
});

test('a failing batch rolls back and aborts the remaining batches', async () => {
  const { [INTRADAY_STREAM_NAME]: stream } = createStreamCatalog({ intradayBatchSize: 2 });
  const store = createMemoryTableStore({ failWrite: (_call, index) => index === 2 });
  const loader = createBatchLoader({ store, logger });

  const result = await loader.load(stream, rowsFor([60, 61, 62, 63, 64]), { upsert: true });

  assert.equal(result.success, false);
  assert.equal(result.failedBatch, 2);
  assert.equal(result.committed, 2);
  assert.match(result.error?.message ?? '', /simulated write failure/);
  assert.equal(store.writes.length, 2);
  assert.equal(store.rolledBackTransactions, 1);
  assert.deepEqual(store.rows(INTRADAY_STREAM_NAME).map((row) => row.value), [60, 61]);
});

test('insert mode fails on an existing key instead of overwriting', async () => {
  const { [INTRADAY_STREAM_NAME]: stream } = createStreamCatalog();
  const store = createMemoryTableStore();
  const loader = createBatchLoader({ store, logger });

  assert.equal((await loader.load(stream, rowsFor([70]), { upsert: false })).success, true);
  const again = await loader.load(stream, rowsFor([75]), { upsert: false });

  assert.equal(again.success, false);
  assert.deepEqual(store.rows(INTRADAY_STREAM_NAME).map((row) => row.value), [70]);
  assert.deepEqual(store.writes.map((write) => write.mode), ['insert', 'insert']);
});

test('summary rows load one per batch', async () => {
  const { [SUMMARY_STREAM_NAME]: stream } = createStreamCatalog();
  const store = createMemoryTableStore();
  const loader = createBatchLoader({ store, logger });
  const rows = ['2024-03-10', '2024-03-11'].map((date) => ({
    timestamp: new Date(`${date}T00:00:00Z`),
    resting_heart_rate: 60,
    heart_rate_zones: [],
    custom_heart_rate_zones: null,
    user_id: 'user1'
  }));

  const result = await loader.load(stream, rows, { upsert: true });
  assert.equal(result.batches, 2);
});

test('verification requires at least the expected number of rows', async () => {
  const { [INTRADAY_STREAM_NAME]: stream } = createStreamCatalog();
  const store = createMemoryTableStore();
  const loader = createBatchLoader({ store, logger });
  await loader.load(stream, rowsFor([60, 61, 62]), { upsert: true });

  assert.equal(await loader.verify(stream, 'user1', 3), true);
  assert.equal(await loader.verify(stream, 'user1', 2), true);
  assert.equal(await loader.verify(stream, 'user1', 4), false);
  assert.equal(await loader.verify(stream, 'user2', 1), false);
});

test('an empty load succeeds without touching the store', async () => {
  const { [INTRADAY_STREAM_NAME]: stream } = createStreamCatalog();
  const store = createMemoryTableStore();
  const loader = createBatchLoader({ store, logger });

  const result = await loader.load(stream, [], { upsert: true });
  assert.equal(result.success, true);
  assert.equal(store.writes.length, 0);
});
