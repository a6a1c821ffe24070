import type { PostgresHelpers } from '@heartstore/shared';
import type { QueryResolution, QueryWindow } from './intervalResolver';
import { buildDefaultEntityQuery, buildEntityListQuery, buildSeriesQuery } from './sqlBuilder';

export type SeriesPoint = {
  timestamp: Date;
  value: number;
  entityId: string;
};

export type EntitySummary = {
  entityId: string;
  recordCount: number;
  firstRecord: Date | null;
  lastRecord: Date | null;
};

/** Read side of the store, shared by the single and multi-entity endpoints. */
export interface SeriesReader {
  readSeries(resolution: QueryResolution, window: QueryWindow, entityId: string): Promise<SeriesPoint[]>;
  listEntities(): Promise<EntitySummary[]>;
  /** First real entity with raw samples, or `null` when the store holds none. */
  findDefaultEntity(): Promise<string | null>;
  ping(): Promise<void>;
}

type SeriesRow = {
  timestamp: Date;
  value: number | string;
  user_id: string;
};

type EntityRow = {
  user_id: string;
  record_count: number | string;
  first_record: Date | null;
  last_record: Date | null;
};

function toNumber(value: number | string): number {
  return typeof value === 'number' ? value : Number.parseFloat(value);
}

export function createPostgresSeriesReader(options: { db: PostgresHelpers }): SeriesReader {
  const { db } = options;

  return {
    async readSeries(resolution, window, entityId) {
      const statement = buildSeriesQuery(resolution, window, entityId);
      const result = await db.withConnection((client) => client.query<SeriesRow>(statement.text, statement.values));
      return result.rows.map((row) => ({
        timestamp: row.timestamp,
        value: toNumber(row.value),
        entityId: row.user_id
      }));
    },

    async listEntities() {
      const statement = buildEntityListQuery();
      const result = await db.withConnection((client) => client.query<EntityRow>(statement.text, statement.values));
      return result.rows.map((row) => ({
        entityId: row.user_id,
        recordCount: toNumber(row.record_count),
        firstRecord: row.first_record,
        lastRecord: row.last_record
      }));
    },

    async findDefaultEntity() {
      const statement = buildDefaultEntityQuery();
      const result = await db.withConnection((client) =>
        client.query<{ user_id: string }>(statement.text, statement.values)
      );
      return result.rows[0]?.user_id ?? null;
    },

    async ping() {
      await db.withConnection((client) => client.query('SELECT 1 AS health_check'));
    }
  };
}
