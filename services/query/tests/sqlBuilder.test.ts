import assert from 'node:assert/strict';
import test from 'node:test';
import { resolveQuery } from '../src/query/intervalResolver';
import { buildDefaultEntityQuery, buildEntityListQuery, buildSeriesQuery } from '../src/query/sqlBuilder';

const window = {
  start: new Date('2024-03-10T00:00:00Z'),
  end: new Date('2024-03-10T01:00:00Z')
};

test('native query rounds the source column and binds the window and entity', () => {
  const statement = buildSeriesQuery(resolveQuery(window), window, 'user1');
  assert.equal(
    statement.text,
    'SELECT "minute" AS timestamp, ROUND("avg_heart_rate"::numeric, 2) AS value, user_id ' +
      'FROM "activities_heart_intraday_1m" ' +
      'WHERE "minute" >= $1 AND "minute" <= $2 AND user_id = $3 AND "avg_heart_rate" IS NOT NULL ' +
      'ORDER BY "minute"'
  );
  assert.deepEqual(statement.values, [window.start, window.end, 'user1']);
});

test('a day interval over the minute source buckets with time_bucket', () => {
  const statement = buildSeriesQuery(resolveQuery(window, '1d'), window, 'user2');
  assert.equal(
    statement.text,
    `SELECT time_bucket('1 day', "minute") AS timestamp, ROUND(AVG("avg_heart_rate")::numeric, 2) AS value, user_id ` +
      'FROM "activities_heart_intraday_1m" ' +
      'WHERE "minute" >= $1 AND "minute" <= $2 AND user_id = $3 AND "avg_heart_rate" IS NOT NULL ' +
      `GROUP BY time_bucket('1 day', "minute"), user_id ` +
      'ORDER BY timestamp'
  );
  assert.deepEqual(statement.values, [window.start, window.end, 'user2']);
});

test('entity queries exclude the placeholder entity', () => {
  assert.match(buildEntityListQuery().text, /user_id <> 'default_user'/);
  assert.match(buildEntityListQuery().text, /ORDER BY last_record DESC, user_id ASC$/);
  assert.equal(
    buildDefaultEntityQuery().text,
    `SELECT user_id FROM "activities_heart_intraday" WHERE user_id IS NOT NULL AND user_id <> '' AND user_id <> 'default_user' LIMIT 1`
  );
});
