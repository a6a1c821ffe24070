export const INTRADAY_STREAM_NAME = 'activities_heart_intraday';
export const SUMMARY_STREAM_NAME = 'activities_heart_summary';

export type StreamName = typeof INTRADAY_STREAM_NAME | typeof SUMMARY_STREAM_NAME;

export const DEFAULT_INTRADAY_BATCH_SIZE = 10_000;

/**
 * A persisted logical series. `primaryKey` always holds the timestamp and
 * the entity column and backs the uniqueness constraint upserts conflict on.
 */
export interface StreamDefinition {
  name: StreamName;
  columns: readonly string[];
  primaryKey: readonly string[];
  timestampColumn: string;
  entityColumn: string;
  requiredColumns: readonly string[];
  /** Columns stored as JSONB; values are serialized before they are bound. */
  jsonColumns: readonly string[];
  batchSize: number;
}

export type StreamCatalog = Record<StreamName, StreamDefinition>;

export function createStreamCatalog(options: { intradayBatchSize?: number } = {}): StreamCatalog {
  const intradayBatchSize = options.intradayBatchSize ?? DEFAULT_INTRADAY_BATCH_SIZE;
  if (!Number.isInteger(intradayBatchSize) || intradayBatchSize <= 0) {
    throw new Error(`Intraday batch size must be a positive integer (received ${intradayBatchSize})`);
  }
  return {
    [INTRADAY_STREAM_NAME]: {
      name: INTRADAY_STREAM_NAME,
      columns: ['timestamp', 'value', 'user_id'],
      primaryKey: ['timestamp', 'user_id'],
      timestampColumn: 'timestamp',
      entityColumn: 'user_id',
      requiredColumns: ['timestamp', 'value', 'user_id'],
      jsonColumns: [],
      batchSize: intradayBatchSize
    },
    [SUMMARY_STREAM_NAME]: {
      name: SUMMARY_STREAM_NAME,
      columns: ['timestamp', 'resting_heart_rate', 'heart_rate_zones', 'custom_heart_rate_zones', 'user_id'],
      primaryKey: ['timestamp', 'user_id'],
      timestampColumn: 'timestamp',
      entityColumn: 'user_id',
      requiredColumns: ['timestamp', 'user_id'],
      jsonColumns: ['heart_rate_zones', 'custom_heart_rate_zones'],
      // one row per day
      batchSize: 1
    }
  };
}

export type Granularity = 'raw' | 'minute' | 'hour' | 'day';

export interface SeriesSource {
  granularity: Granularity;
  table: string;
  timeColumn: string;
  valueColumn: string;
  /** Postgres interval literal matching the table's bucket width. */
  bucketWidth: string;
  description: string;
}

/**
 * The raw intraday table and the continuous aggregates derived from it, keyed
 * by granularity. Rollups store min/max/avg per entity and bucket.
 */
export const HEART_RATE_SOURCES: Readonly<Record<Granularity, SeriesSource>> = {
  raw: {
    granularity: 'raw',
    table: INTRADAY_STREAM_NAME,
    timeColumn: 'timestamp',
    valueColumn: 'value',
    bucketWidth: '1 second',
    description: 'Raw heart rate data (per second)'
  },
  minute: {
    granularity: 'minute',
    table: `${INTRADAY_STREAM_NAME}_1m`,
    timeColumn: 'minute',
    valueColumn: 'avg_heart_rate',
    bucketWidth: '1 minute',
    description: '1-minute aggregated heart rate data'
  },
  hour: {
    granularity: 'hour',
    table: `${INTRADAY_STREAM_NAME}_1h`,
    timeColumn: 'hour',
    valueColumn: 'avg_heart_rate',
    bucketWidth: '1 hour',
    description: '1-hour aggregated heart rate data'
  },
  day: {
    granularity: 'day',
    table: `${INTRADAY_STREAM_NAME}_1d`,
    timeColumn: 'day',
    valueColumn: 'avg_heart_rate',
    bucketWidth: '1 day',
    description: '1-day aggregated heart rate data'
  }
};

/** Entity id written when no real user is configured; hidden from listings. */
export const PLACEHOLDER_ENTITY_ID = 'default_user';
