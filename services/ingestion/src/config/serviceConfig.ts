import path from 'node:path';
import { z } from 'zod';
import {
  DEFAULT_INTRADAY_BATCH_SIZE,
  LOG_LEVELS,
  PLACEHOLDER_ENTITY_ID,
  booleanVar,
  dateVar,
  integerVar,
  loadEnvConfig,
  stringVar,
  type DatabaseSettings,
  type EnvSource
} from '@heartstore/shared';

export type PerturbationMode = 'rotate' | 'jitter';

export type IngestionConfig = {
  database: DatabaseSettings;
  entityId: string;
  batchSize: number;
  startDate: string | null;
  endDate: string | null;
  deltaMode: boolean;
  upsertMode: boolean;
  dataSeed: number;
  perturbation: PerturbationMode;
  cache: {
    directory: string;
    fileName: string;
    regenerate: boolean;
    sampleIntervalSeconds: number;
  };
  logLevel: string;
};

export const CACHE_FILE_NAME = 'fixed_heart_rate_data.json';

const envSchema = z.object({
  DB_HOST: stringVar({ defaultValue: 'localhost' }),
  DB_PORT: integerVar({ defaultValue: 5432, min: 1, max: 65535 }),
  DB_NAME: stringVar({ defaultValue: 'heartstore' }),
  DB_USER: stringVar({ defaultValue: 'postgres' }),
  DB_PASSWORD: stringVar({ defaultValue: 'postgres' }),
  DB_POOL_MAX: integerVar({ defaultValue: 5, min: 1 }),
  USER_ID: stringVar({ defaultValue: PLACEHOLDER_ENTITY_ID }),
  BATCH_SIZE: integerVar({ defaultValue: DEFAULT_INTRADAY_BATCH_SIZE, min: 1 }),
  START_DATE: dateVar(),
  END_DATE: dateVar(),
  DELTA_MODE: booleanVar({ defaultValue: true }),
  UPSERT_MODE: booleanVar({ defaultValue: true }),
  DATA_SEED: integerVar({ defaultValue: 0 }),
  INTRADAY_PERTURBATION: stringVar({ allowed: ['rotate', 'jitter'], lowercase: true, defaultValue: 'jitter' }),
  CACHE_DIR: stringVar(),
  CACHE_REGENERATE: booleanVar({ defaultValue: true }),
  CACHE_SAMPLE_INTERVAL_SECONDS: integerVar({ defaultValue: 60, min: 1, max: 3600 }),
  LOG_LEVEL: stringVar({ allowed: LOG_LEVELS, lowercase: true, defaultValue: 'info' })
}).superRefine((value, ctx) => {
  // Calendar dates in YYYY-MM-DD order lexicographically.
  if (value.START_DATE && value.END_DATE && value.START_DATE > value.END_DATE) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['START_DATE'],
      message: `START_DATE (${value.START_DATE}) must not be after END_DATE (${value.END_DATE})`
    });
  }
});

function isPerturbationMode(value: string): value is PerturbationMode {
  return value === 'rotate' || value === 'jitter';
}

export function loadServiceConfig(env: EnvSource = process.env): IngestionConfig {
  const parsed = loadEnvConfig(envSchema, { env, context: 'ingestion' });
  const perturbation = isPerturbationMode(parsed.INTRADAY_PERTURBATION) ? parsed.INTRADAY_PERTURBATION : 'jitter';

  const config: IngestionConfig = {
    database: {
      host: parsed.DB_HOST,
      port: parsed.DB_PORT,
      database: parsed.DB_NAME,
      user: parsed.DB_USER,
      password: parsed.DB_PASSWORD,
      maxConnections: parsed.DB_POOL_MAX
    },
    entityId: parsed.USER_ID,
    batchSize: parsed.BATCH_SIZE,
    startDate: parsed.START_DATE ?? null,
    endDate: parsed.END_DATE ?? null,
    deltaMode: parsed.DELTA_MODE,
    upsertMode: parsed.UPSERT_MODE,
    dataSeed: parsed.DATA_SEED,
    perturbation,
    cache: {
      directory: path.resolve(parsed.CACHE_DIR ?? path.join(__dirname, '..', '..', 'cache')),
      fileName: CACHE_FILE_NAME,
      regenerate: parsed.CACHE_REGENERATE,
      sampleIntervalSeconds: parsed.CACHE_SAMPLE_INTERVAL_SECONDS
    },
    logLevel: parsed.LOG_LEVEL
  };
  return Object.freeze(config);
}
