import { HEART_RATE_SOURCES, PLACEHOLDER_ENTITY_ID, quoteIdentifier } from '@heartstore/shared';
import { OUTPUT_INTERVALS, type QueryResolution, type QueryWindow } from './intervalResolver';

export type SqlStatement = {
  text: string;
  values: unknown[];
};

/**
 * Parameterized fetch for one entity. Native rows are rounded to two
 * decimals; a requested interval wraps the source in `time_bucket` averaging.
 */
export function buildSeriesQuery(resolution: QueryResolution, window: QueryWindow, entityId: string): SqlStatement {
  const { source } = resolution;
  const table = quoteIdentifier(source.table);
  const time = quoteIdentifier(source.timeColumn);
  const value = quoteIdentifier(source.valueColumn);
  const filters = `WHERE ${time} >= $1 AND ${time} <= $2 AND user_id = $3 AND ${value} IS NOT NULL`;
  const values = [window.start, window.end, entityId];

  if (resolution.requested) {
    const bucket = `time_bucket('${OUTPUT_INTERVALS[resolution.requested].bucket}', ${time})`;
    return {
      text: [
        `SELECT ${bucket} AS timestamp, ROUND(AVG(${value})::numeric, 2) AS value, user_id`,
        `FROM ${table}`,
        filters,
        `GROUP BY ${bucket}, user_id`,
        'ORDER BY timestamp'
      ].join(' '),
      values
    };
  }

  return {
    text: [
      `SELECT ${time} AS timestamp, ROUND(${value}::numeric, 2) AS value, user_id`,
      `FROM ${table}`,
      filters,
      `ORDER BY ${time}`
    ].join(' '),
    values
  };
}

const RAW_TABLE = quoteIdentifier(HEART_RATE_SOURCES.raw.table);
const REAL_ENTITY_FILTER = `user_id IS NOT NULL AND user_id <> '' AND user_id <> '${PLACEHOLDER_ENTITY_ID}'`;

export function buildEntityListQuery(): SqlStatement {
  return {
    text: [
      'SELECT user_id, COUNT(*) AS record_count, MIN("timestamp") AS first_record, MAX("timestamp") AS last_record',
      `FROM ${RAW_TABLE}`,
      `WHERE ${REAL_ENTITY_FILTER}`,
      'GROUP BY user_id',
      'ORDER BY last_record DESC, user_id ASC'
    ].join(' '),
    values: []
  };
}

export function buildDefaultEntityQuery(): SqlStatement {
  return {
    text: `SELECT user_id FROM ${RAW_TABLE} WHERE ${REAL_ENTITY_FILTER} LIMIT 1`,
    values: []
  };
}
