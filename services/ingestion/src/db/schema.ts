import {
  HEART_RATE_SOURCES,
  INTRADAY_STREAM_NAME,
  SUMMARY_STREAM_NAME,
  quoteIdentifier,
  type SeriesSource,
  type StreamDefinition,
  type StreamName
} from '@heartstore/shared';

const COLUMN_TYPES: Record<StreamName, Record<string, string>> = {
  [INTRADAY_STREAM_NAME]: {
    timestamp: 'TIMESTAMPTZ NOT NULL',
    value: 'DOUBLE PRECISION NOT NULL',
    user_id: 'TEXT NOT NULL'
  },
  [SUMMARY_STREAM_NAME]: {
    timestamp: 'TIMESTAMPTZ NOT NULL',
    resting_heart_rate: 'INTEGER',
    heart_rate_zones: 'JSONB',
    custom_heart_rate_zones: 'JSONB',
    user_id: 'TEXT NOT NULL'
  }
};

export function streamTableStatements(stream: StreamDefinition): string[] {
  const types = COLUMN_TYPES[stream.name];
  const columns = stream.columns.map((column) => {
    const type = types[column];
    if (!type) {
      throw new Error(`No column type registered for ${stream.name}.${column}`);
    }
    return `${quoteIdentifier(column)} ${type}`;
  });
  const primaryKey = stream.primaryKey.map(quoteIdentifier).join(', ');
  const table = quoteIdentifier(stream.name);
  return [
    `CREATE TABLE IF NOT EXISTS ${table} (${columns.join(', ')}, PRIMARY KEY (${primaryKey}))`,
    `CREATE UNIQUE INDEX IF NOT EXISTS ${quoteIdentifier(`idx_${stream.name}_${stream.primaryKey.join('_')}`)} ON ${table} (${primaryKey})`,
    `CREATE INDEX IF NOT EXISTS ${quoteIdentifier(`idx_${stream.name}_${stream.entityColumn}_time`)} ON ${table} (${quoteIdentifier(stream.entityColumn)}, ${quoteIdentifier(stream.timestampColumn)} DESC)`
  ];
}

function rollupViewStatement(source: SeriesSource, raw: SeriesSource): string {
  const time = quoteIdentifier(source.timeColumn);
  const value = quoteIdentifier(raw.valueColumn);
  return [
    `CREATE MATERIALIZED VIEW IF NOT EXISTS ${quoteIdentifier(source.table)}`,
    'WITH (timescaledb.continuous) AS',
    'SELECT',
    '  user_id,',
    `  time_bucket('${source.bucketWidth}', ${quoteIdentifier(raw.timeColumn)}) AS ${time},`,
    `  ROUND(MIN(${value})::numeric, 2) AS min_heart_rate,`,
    `  ROUND(MAX(${value})::numeric, 2) AS max_heart_rate,`,
    `  ROUND(AVG(${value})::numeric, 2) AS avg_heart_rate,`,
    '  COUNT(*) AS record_count',
    `FROM ${quoteIdentifier(raw.table)}`,
    `GROUP BY user_id, ${time}`
  ].join('\n');
}

const REFRESH_POLICIES: Record<'minute' | 'hour' | 'day', { startOffset: string; scheduleInterval: string }> = {
  minute: { startOffset: '1 day', scheduleInterval: '1 minute' },
  hour: { startOffset: '7 days', scheduleInterval: '30 minutes' },
  day: { startOffset: '90 days', scheduleInterval: '1 hour' }
};

/**
 * TimescaleDB objects layered over the raw intraday table. Continuous
 * aggregates cannot be created inside a transaction, so each statement runs
 * on its own.
 */
export function timescaleStatements(): string[] {
  const raw = HEART_RATE_SOURCES.raw;
  const statements = [
    'CREATE EXTENSION IF NOT EXISTS timescaledb',
    `SELECT create_hypertable('${raw.table}', '${raw.timeColumn}', if_not_exists => TRUE, migrate_data => TRUE)`
  ];
  for (const granularity of ['minute', 'hour', 'day'] as const) {
    const source = HEART_RATE_SOURCES[granularity];
    const policy = REFRESH_POLICIES[granularity];
    statements.push(rollupViewStatement(source, raw));
    statements.push(
      `SELECT add_continuous_aggregate_policy('${source.table}', start_offset => INTERVAL '${policy.startOffset}', end_offset => NULL, schedule_interval => INTERVAL '${policy.scheduleInterval}', if_not_exists => TRUE)`
    );
  }
  return statements;
}

export function schemaStatements(streams: readonly StreamDefinition[]): string[] {
  return [...streams.flatMap(streamTableStatements), ...timescaleStatements()];
}
