import assert from 'node:assert/strict';
import test from 'node:test';
import { HttpError } from '../src/errors/httpError';
import {
  parseEntityList,
  parseMultiEntityQuery,
  parseTimeseriesQuery,
  parseTimestampParam
} from '../src/schemas/timeseries';

test('reads dates and offset-less date-times as UTC', () => {
  assert.equal(parseTimestampParam('2024-03-10').toISOString(), '2024-03-10T00:00:00.000Z');
  assert.equal(parseTimestampParam('2024-03-10T06:30:00').toISOString(), '2024-03-10T06:30:00.000Z');
  assert.equal(parseTimestampParam('2024-03-10 06:30').toISOString(), '2024-03-10T06:30:00.000Z');
  assert.equal(parseTimestampParam('2024-03-10T06:30:00+02:00').toISOString(), '2024-03-10T04:30:00.000Z');
});

test('rejects values that are not ISO timestamps', () => {
  for (const value of ['tomorrow', '2024-13-40', '10/03/2024']) {
    assert.throws(
      () => parseTimestampParam(value),
      (err: unknown) => err instanceof HttpError && err.statusCode === 400 && err.message === `Invalid date format: ${value}`
    );
  }
});

test('splits entity lists and keeps an all-separator list empty', () => {
  assert.equal(parseEntityList(undefined), undefined);
  assert.equal(parseEntityList(''), undefined);
  assert.deepEqual(parseEntityList(' user1 ,user2,, '), ['user1', 'user2']);
  assert.deepEqual(parseEntityList(',,'), []);
});

test('blank query parameters are treated as absent', () => {
  const query = parseTimeseriesQuery({ start_date: '', user_id: '  ', interval: '1h' });
  assert.deepEqual(query, { startDate: undefined, endDate: undefined, entityId: undefined, interval: '1h' });
});

test('parses the multi-entity query', () => {
  const query = parseMultiEntityQuery({ end_date: '2024-03-12', user_ids: 'a,b' });
  assert.deepEqual(query.entityIds, ['a', 'b']);
  assert.equal(query.endDate?.toISOString(), '2024-03-12T00:00:00.000Z');
  assert.equal(query.startDate, undefined);
});
