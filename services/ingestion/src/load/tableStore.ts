import type { StreamDefinition } from '@heartstore/shared';
import type { CanonicalRow } from '../transform/records';

export type WriteMode = 'upsert' | 'insert';

export interface TableTransaction {
  /** Resolves to the number of rows the store reports as written. */
  writeRows(stream: StreamDefinition, rows: readonly CanonicalRow[], mode: WriteMode): Promise<number>;
}

/**
 * Storage boundary for the ingestion side. Watermarks and counts are scoped
 * to one entity and always read from the store, never cached.
 */
export interface TableStore {
  /** Rejects when the store is unreachable or the stream's table is not usable. */
  checkReady(stream: StreamDefinition): Promise<void>;
  readWatermark(stream: StreamDefinition, entityId: string): Promise<Date | null>;
  countRows(stream: StreamDefinition, entityId: string): Promise<number>;
  /** Commits when `fn` resolves, rolls back and rethrows when it rejects. */
  withTransaction<T>(fn: (tx: TableTransaction) => Promise<T>): Promise<T>;
}
