import assert from 'node:assert/strict';
import test, { mock } from 'node:test';
import { createSilentLogger } from '@heartstore/shared';
import { createFanoutExecutor } from '../src/query/fanoutExecutor';
import type { QueryResolution, QueryWindow } from '../src/query/intervalResolver';
import type { SeriesPoint } from '../src/query/seriesReader';

const window: QueryWindow = {
  start: new Date('2024-03-10T00:00:00Z'),
  end: new Date('2024-03-13T00:00:00Z')
};

function pointsFor(entityId: string, count: number): SeriesPoint[] {
  return Array.from({ length: count }, (_, index) => ({
    timestamp: new Date(window.start.getTime() + index * 3_600_000),
    value: 70 + index,
    entityId
  }));
}

test('a failing entity degrades to an empty series while the others answer', async () => {
  const readSeries = mock.fn(async (_resolution: QueryResolution, _window: QueryWindow, entityId: string) => {
    if (entityId === 'B') {
      throw new Error('statement timeout');
    }
    return pointsFor(entityId, entityId === 'A' ? 3 : 2);
  });
  const warn = mock.fn();
  const executor = createFanoutExecutor({ reader: { readSeries }, logger: { warn } });

  const { resolution, results } = await executor.run(['A', 'B', 'C'], window);

  assert.equal(resolution.source.granularity, 'hour');
  assert.deepEqual(
    results.map((entry) => [entry.entityId, entry.count, entry.data.length]),
    [
      ['A', 3, 3],
      ['B', 0, 0],
      ['C', 2, 2]
    ]
  );
  assert.equal(readSeries.mock.callCount(), 3);
  assert.equal(warn.mock.callCount(), 1);
});

test('every entity shares the same resolution', async () => {
  const seen: QueryResolution[] = [];
  const executor = createFanoutExecutor({
    reader: {
      async readSeries(resolution, _window, entityId) {
        seen.push(resolution);
        return pointsFor(entityId, 1);
      }
    },
    logger: createSilentLogger()
  });

  const { resolution } = await executor.run(['user1', 'user2'], window, '1d');

  assert.equal(seen.length, 2);
  assert.ok(seen.every((entry) => entry === resolution));
  assert.equal(resolution.interval, '1d');
});

test('an invalid interval fails before any read is issued', async () => {
  const readSeries = mock.fn(async () => []);
  const executor = createFanoutExecutor({ reader: { readSeries }, logger: createSilentLogger() });

  await assert.rejects(executor.run(['user1'], window, '2h'), /Invalid interval '2h'/);
  assert.equal(readSeries.mock.callCount(), 0);
});
