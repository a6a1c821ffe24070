import type { PoolClient } from 'pg';
import type { Logger, PostgresHelpers, StreamDefinition } from '@heartstore/shared';
import type { CanonicalRow } from '../transform/records';
import type { TableStore, TableTransaction, WriteMode } from '../load/tableStore';
import { buildCountQuery, buildWatermarkQuery, buildWriteStatement, rowsPerStatement } from './sql';
import { streamTableStatements } from './schema';

export type PostgresTableStoreOptions = {
  db: PostgresHelpers;
  logger: Logger;
};

function createTransaction(client: PoolClient): TableTransaction {
  return {
    async writeRows(stream: StreamDefinition, rows: readonly CanonicalRow[], mode: WriteMode): Promise<number> {
      const chunkSize = rowsPerStatement(stream);
      let written = 0;
      for (let offset = 0; offset < rows.length; offset += chunkSize) {
        const statement = buildWriteStatement(stream, rows.slice(offset, offset + chunkSize), mode);
        const result = await client.query(statement.text, statement.values);
        written += result.rowCount ?? 0;
      }
      return written;
    }
  };
}

export function createPostgresTableStore(options: PostgresTableStoreOptions): TableStore {
  const { db, logger } = options;

  return {
    async checkReady(stream: StreamDefinition): Promise<void> {
      await db.withConnection(async (client) => {
        await client.query('SELECT 1 AS readiness_check');
        for (const statement of streamTableStatements(stream)) {
          await client.query(statement);
        }
        const { rows } = await client.query<{ column_name: string }>(
          'SELECT column_name FROM information_schema.columns WHERE table_schema = current_schema() AND table_name = $1',
          [stream.name]
        );
        const present = new Set(rows.map((row) => row.column_name));
        const missing = stream.columns.filter((column) => !present.has(column));
        if (missing.length > 0) {
          throw new Error(`Table ${stream.name} is missing columns: ${missing.join(', ')}`);
        }
      });
      logger.debug({ stream: stream.name }, 'stream table ready');
    },

    async readWatermark(stream: StreamDefinition, entityId: string): Promise<Date | null> {
      const query = buildWatermarkQuery(stream, entityId);
      const { rows } = await db.withConnection((client) =>
        client.query<{ watermark: Date | null }>(query.text, query.values)
      );
      const watermark = rows[0]?.watermark ?? null;
      return watermark instanceof Date ? watermark : null;
    },

    async countRows(stream: StreamDefinition, entityId: string): Promise<number> {
      const query = buildCountQuery(stream, entityId);
      const { rows } = await db.withConnection((client) =>
        client.query<{ count: number }>(query.text, query.values)
      );
      return Number(rows[0]?.count ?? 0);
    },

    withTransaction<T>(fn: (tx: TableTransaction) => Promise<T>): Promise<T> {
      return db.withTransaction((client) => fn(createTransaction(client)));
    }
  };
}
