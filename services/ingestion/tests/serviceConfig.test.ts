import assert from 'node:assert/strict';
import path from 'node:path';
import test from 'node:test';
import { EnvConfigError } from '@heartstore/shared';
import { loadServiceConfig } from '../src/config/serviceConfig';

test('returns defaults when ingestion env vars are unset', () => {
  const config = loadServiceConfig({});
  assert.deepEqual(config.database, {
    host: 'localhost',
    port: 5432,
    database: 'heartstore',
    user: 'postgres',
    password: 'postgres',
    maxConnections: 5
  });
  assert.equal(config.entityId, 'default_user');
  assert.equal(config.batchSize, 10_000);
  assert.equal(config.startDate, null);
  assert.equal(config.endDate, null);
  assert.equal(config.deltaMode, true);
  assert.equal(config.upsertMode, true);
  assert.equal(config.dataSeed, 0);
  assert.equal(config.perturbation, 'jitter');
  assert.equal(config.cache.fileName, 'fixed_heart_rate_data.json');
  assert.equal(config.cache.regenerate, true);
  assert.equal(config.logLevel, 'info');
  assert.ok(Object.isFrozen(config));
});

test('reads overrides from the environment', () => {
  const config = loadServiceConfig({
    DB_HOST: 'db.internal',
    DB_PORT: '6543',
    DB_PASSWORD: 'test-secret',
    USER_ID: 'user7',
    BATCH_SIZE: '500',
    START_DATE: '2025-06-01',
    END_DATE: '2025-06-05 00:00:00+00',
    DELTA_MODE: 'false',
    UPSERT_MODE: 'no',
    DATA_SEED: '42',
    INTRADAY_PERTURBATION: 'Rotate',
    CACHE_DIR: '/tmp/heartstore-cache',
    LOG_LEVEL: 'DEBUG'
  });
  assert.equal(config.database.host, 'db.internal');
  assert.equal(config.database.port, 6543);
  assert.equal(config.database.password, 'test-secret');
  assert.equal(config.entityId, 'user7');
  assert.equal(config.batchSize, 500);
  assert.equal(config.startDate, '2025-06-01');
  assert.equal(config.endDate, '2025-06-05');
  assert.equal(config.deltaMode, false);
  assert.equal(config.upsertMode, false);
  assert.equal(config.dataSeed, 42);
  assert.equal(config.perturbation, 'rotate');
  assert.equal(config.cache.directory, path.resolve('/tmp/heartstore-cache'));
  assert.equal(config.logLevel, 'debug');
});

test('rejects malformed settings with an EnvConfigError', () => {
  assert.throws(
    () => loadServiceConfig({ BATCH_SIZE: '0', START_DATE: '06/01/2025', INTRADAY_PERTURBATION: 'shuffle' }),
    (err: unknown) => {
      assert.ok(err instanceof EnvConfigError);
      assert.equal(err.issues.length, 3);
      assert.match(err.message, /^\[ingestion\] Invalid environment configuration/);
      return true;
    }
  );
});

test('rejects a start date after the end date before any work starts', () => {
  assert.throws(
    () => loadServiceConfig({ START_DATE: '2024-03-12', END_DATE: '2024-03-10' }),
    (err: unknown) => {
      assert.ok(err instanceof EnvConfigError);
      assert.deepEqual(err.issues, ['START_DATE: START_DATE (2024-03-12) must not be after END_DATE (2024-03-10)']);
      return true;
    }
  );
  assert.equal(loadServiceConfig({ START_DATE: '2024-03-10', END_DATE: '2024-03-10' }).startDate, '2024-03-10');
});
