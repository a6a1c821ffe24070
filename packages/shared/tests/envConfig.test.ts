import assert from 'node:assert/strict';
import test from 'node:test';
import { z } from 'zod';
import {
  EnvConfigError,
  booleanVar,
  dateVar,
  integerVar,
  loadEnvConfig,
  stringListVar,
  stringVar
} from '../src/envConfig';

const schema = z.object({
  DB_HOST: stringVar({ defaultValue: 'localhost' }),
  DB_PORT: integerVar({ defaultValue: 5432, min: 1, max: 65535 }),
  DELTA_MODE: booleanVar({ defaultValue: true }),
  MODE: stringVar({ allowed: ['rotate', 'jitter'], lowercase: true, defaultValue: 'jitter' }),
  USER_IDS: stringListVar(),
  START_DATE: dateVar()
});

test('applies defaults when variables are unset or blank', () => {
  const config = loadEnvConfig(schema, { env: { DB_HOST: '  ' } });
  assert.equal(config.DB_HOST, 'localhost');
  assert.equal(config.DB_PORT, 5432);
  assert.equal(config.DELTA_MODE, true);
  assert.equal(config.MODE, 'jitter');
  assert.deepEqual(config.USER_IDS, []);
  assert.equal(config.START_DATE, undefined);
});

test('parses provided values', () => {
  const config = loadEnvConfig(schema, {
    env: {
      DB_PORT: '6543',
      DELTA_MODE: 'off',
      MODE: 'ROTATE',
      USER_IDS: 'user1, user2,user1',
      START_DATE: '2024-03-05 00:00:00'
    }
  });
  assert.equal(config.DB_PORT, 6543);
  assert.equal(config.DELTA_MODE, false);
  assert.equal(config.MODE, 'rotate');
  assert.deepEqual(config.USER_IDS, ['user1', 'user2']);
  assert.equal(config.START_DATE, '2024-03-05');
});

test('collects every issue into an EnvConfigError', () => {
  assert.throws(
    () =>
      loadEnvConfig(schema, {
        env: { DB_PORT: 'abc', DELTA_MODE: 'maybe', START_DATE: '2024-02-30' },
        context: 'test'
      }),
    (err: unknown) => {
      assert.ok(err instanceof EnvConfigError);
      assert.equal(err.issues.length, 3);
      assert.equal(err.issues[0], 'DB_PORT: Expected DB_PORT to be an integer');
      assert.match(err.message, /^\[test\] Invalid environment configuration/);
      return true;
    }
  );
});

test('flags missing required variables', () => {
  const required = z.object({ DB_PASSWORD: stringVar({ required: true }) });
  assert.throws(() => loadEnvConfig(required, { env: {} }), (err: unknown) => {
    assert.ok(err instanceof EnvConfigError);
    assert.deepEqual(err.issues, ['DB_PASSWORD: Missing required DB_PASSWORD']);
    return true;
  });
});

test('rejects integers outside the allowed range', () => {
  assert.throws(() => loadEnvConfig(schema, { env: { DB_PORT: '0' } }), /DB_PORT must be >= 1/);
});
