import type { Logger, StreamDefinition, StreamName } from '@heartstore/shared';
import type { CanonicalRow } from '../transform/records';
import type { TableStore, WriteMode } from './tableStore';

export type LoadOptions = {
  upsert: boolean;
};

export type LoadResult = {
  stream: StreamName;
  success: boolean;
  /** Rows handed to the store after key de-duplication. */
  attempted: number;
  /** Rows in batches that committed. */
  committed: number;
  batches: number;
  failedBatch: number | null;
  error?: Error;
};

export interface BatchLoader {
  load(stream: StreamDefinition, rows: readonly CanonicalRow[], options: LoadOptions): Promise<LoadResult>;
  /** `true` when the entity's row count is at least `expectedMinCount`. */
  verify(stream: StreamDefinition, entityId: string, expectedMinCount: number): Promise<boolean>;
}

export type BatchLoaderOptions = {
  store: TableStore;
  logger: Logger;
};

function keyOf(stream: StreamDefinition, row: CanonicalRow): string {
  return stream.primaryKey
    .map((column) => {
      const value = row[column];
      return value instanceof Date ? value.toISOString() : JSON.stringify(value ?? null);
    })
    .join('\u0000');
}

/**
 * Collapses rows sharing a primary key, keeping the last occurrence. One
 * upsert statement cannot touch the same key twice.
 */
export function dedupeByPrimaryKey<R extends CanonicalRow>(stream: StreamDefinition, rows: readonly R[]): R[] {
  const byKey = new Map<string, R>();
  for (const row of rows) {
    const key = keyOf(stream, row);
    byKey.delete(key);
    byKey.set(key, row);
  }
  return Array.from(byKey.values());
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export function createBatchLoader(options: BatchLoaderOptions): BatchLoader {
  const { store } = options;
  const logger = options.logger.child({ component: 'batch-loader' });

  async function load(
    stream: StreamDefinition,
    rows: readonly CanonicalRow[],
    loadOptions: LoadOptions
  ): Promise<LoadResult> {
    const mode: WriteMode = loadOptions.upsert ? 'upsert' : 'insert';
    const pending = mode === 'upsert' ? dedupeByPrimaryKey(stream, rows) : rows.slice();
    const result: LoadResult = {
      stream: stream.name,
      success: true,
      attempted: pending.length,
      committed: 0,
      batches: 0,
      failedBatch: null
    };

    if (rows.length !== pending.length) {
      logger.debug({ stream: stream.name, duplicates: rows.length - pending.length }, 'collapsed rows sharing a key');
    }
    if (pending.length === 0) {
      logger.debug({ stream: stream.name }, 'no rows to load');
      return result;
    }

    const batchSize = stream.batchSize;
    const totalBatches = Math.ceil(pending.length / batchSize);
    logger.info({ stream: stream.name, rows: pending.length, batchSize, mode }, 'loading rows');

    for (let index = 0; index < totalBatches; index += 1) {
      const batch = pending.slice(index * batchSize, (index + 1) * batchSize);
      const batchNumber = index + 1;
      try {
        const written = await store.withTransaction((tx) => tx.writeRows(stream, batch, mode));
        if (mode === 'insert' && written !== batch.length) {
          logger.warn(
            { stream: stream.name, batch: batchNumber, expected: batch.length, written },
            'insert wrote an unexpected number of rows'
          );
        }
        result.batches += 1;
        result.committed += batch.length;
        logger.debug(
          { stream: stream.name, batch: batchNumber, of: totalBatches, committed: result.committed },
          'batch committed'
        );
      } catch (err) {
        const error = toError(err);
        logger.error({ err: error, stream: stream.name, batch: batchNumber }, 'batch failed and was rolled back');
        return { ...result, success: false, failedBatch: batchNumber, error };
      }
    }

    return result;
  }

  async function verify(stream: StreamDefinition, entityId: string, expectedMinCount: number): Promise<boolean> {
    try {
      const count = await store.countRows(stream, entityId);
      if (count >= expectedMinCount) {
        logger.info({ stream: stream.name, count, expected: expectedMinCount }, 'load verification passed');
        return true;
      }
      logger.warn({ stream: stream.name, count, expected: expectedMinCount }, 'load verification found fewer rows than expected');
      return false;
    } catch (err) {
      logger.warn({ err, stream: stream.name }, 'load verification could not count rows');
      return false;
    }
  }

  return { load, verify };
}
