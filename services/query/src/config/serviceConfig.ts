import { z } from 'zod';
import {
  LOG_LEVELS,
  integerVar,
  loadEnvConfig,
  stringListVar,
  stringVar,
  type DatabaseSettings,
  type EnvSource
} from '@heartstore/shared';

export type ServiceConfig = {
  host: string;
  port: number;
  database: DatabaseSettings;
  /** Entities compared when a multi-entity request names none. */
  defaultComparisonEntities: string[];
  logLevel: string;
};

const envSchema = z.object({
  QUERY_HOST: stringVar({ defaultValue: '0.0.0.0' }),
  QUERY_PORT: integerVar({ defaultValue: 8000, min: 1, max: 65535 }),
  DB_HOST: stringVar({ defaultValue: 'localhost' }),
  DB_PORT: integerVar({ defaultValue: 5432, min: 1, max: 65535 }),
  DB_NAME: stringVar({ defaultValue: 'heartstore' }),
  DB_USER: stringVar({ defaultValue: 'postgres' }),
  DB_PASSWORD: stringVar({ defaultValue: 'postgres' }),
  DB_POOL_MAX: integerVar({ defaultValue: 10, min: 1 }),
  DEFAULT_COMPARISON_USER_IDS: stringListVar({ defaultValue: ['user1', 'user2'] }),
  LOG_LEVEL: stringVar({ allowed: LOG_LEVELS, lowercase: true, defaultValue: 'info' })
});

export function loadServiceConfig(env: EnvSource = process.env): ServiceConfig {
  const parsed = loadEnvConfig(envSchema, { env, context: 'query' });
  return Object.freeze({
    host: parsed.QUERY_HOST,
    port: parsed.QUERY_PORT,
    database: {
      host: parsed.DB_HOST,
      port: parsed.DB_PORT,
      database: parsed.DB_NAME,
      user: parsed.DB_USER,
      password: parsed.DB_PASSWORD,
      maxConnections: parsed.DB_POOL_MAX
    },
    defaultComparisonEntities: parsed.DEFAULT_COMPARISON_USER_IDS,
    logLevel: parsed.LOG_LEVEL
  });
}
