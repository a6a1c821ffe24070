import type { StreamDefinition, StreamName } from '@heartstore/shared';
import type { TableStore, TableTransaction, WriteMode } from '../../src/load/tableStore';
import type { CanonicalRow } from '../../src/transform/records';

type Tables = Map<StreamName, Map<string, CanonicalRow>>;

export type WriteCall = {
  stream: StreamName;
  rows: number;
  mode: WriteMode;
};

export type MemoryTableStoreOptions = {
  /** Streams whose readiness check rejects. */
  unavailable?: StreamName[];
  /** Return `true` to make the n-th write (1-based, across all streams) throw. */
  failWrite?: (call: WriteCall, index: number) => boolean;
};

export type MemoryTableStore = TableStore & {
  rows(stream: StreamName): CanonicalRow[];
  writes: WriteCall[];
  committedTransactions: number;
  rolledBackTransactions: number;
};

function keyFor(stream: StreamDefinition, row: CanonicalRow): string {
  return stream.primaryKey
    .map((column) => {
      const value = row[column];
      return value instanceof Date ? value.toISOString() : String(value);
    })
    .join('|');
}

function cloneTables(tables: Tables): Tables {
  return new Map(Array.from(tables.entries(), ([name, rows]) => [name, new Map(rows)]));
}

function byTimestamp(stream: StreamName, tables: Tables): CanonicalRow[] {
  const rows = Array.from(tables.get(stream)?.values() ?? []);
  return rows.sort((a, b) => {
    const left = a.timestamp instanceof Date ? a.timestamp.getTime() : 0;
    const right = b.timestamp instanceof Date ? b.timestamp.getTime() : 0;
    return left - right;
  });
}

/**
 * In-process stand-in for the Postgres table store. Writes are staged per
 * transaction and only become visible on commit; primary keys and required
 * columns are enforced the way the real tables enforce them.
 */
export function createMemoryTableStore(options: MemoryTableStoreOptions = {}): MemoryTableStore {
  let tables: Tables = new Map();
  const writes: WriteCall[] = [];

  const store: MemoryTableStore = {
    writes,
    committedTransactions: 0,
    rolledBackTransactions: 0,

    rows(stream: StreamName): CanonicalRow[] {
      return byTimestamp(stream, tables);
    },

    async checkReady(stream: StreamDefinition): Promise<void> {
      if (options.unavailable?.includes(stream.name)) {
        throw new Error(`relation "${stream.name}" does not exist`);
      }
    },

    async readWatermark(stream: StreamDefinition, entityId: string): Promise<Date | null> {
      let watermark: Date | null = null;
      for (const row of tables.get(stream.name)?.values() ?? []) {
        const timestamp = row[stream.timestampColumn];
        if (row[stream.entityColumn] === entityId && timestamp instanceof Date) {
          if (!watermark || timestamp.getTime() > watermark.getTime()) {
            watermark = timestamp;
          }
        }
      }
      return watermark;
    },

    async countRows(stream: StreamDefinition, entityId: string): Promise<number> {
      let count = 0;
      for (const row of tables.get(stream.name)?.values() ?? []) {
        if (row[stream.entityColumn] === entityId) {
          count += 1;
        }
      }
      return count;
    },

    async withTransaction<T>(fn: (tx: TableTransaction) => Promise<T>): Promise<T> {
      const staged = cloneTables(tables);
      const tx: TableTransaction = {
        async writeRows(stream: StreamDefinition, rows: readonly CanonicalRow[], mode: WriteMode): Promise<number> {
          const call: WriteCall = { stream: stream.name, rows: rows.length, mode };
          writes.push(call);
          if (options.failWrite?.(call, writes.length)) {
            throw new Error(`simulated write failure on ${stream.name}`);
          }
          const table = staged.get(stream.name) ?? new Map<string, CanonicalRow>();
          staged.set(stream.name, table);
          for (const row of rows) {
            for (const column of stream.requiredColumns) {
              if (row[column] === null || row[column] === undefined) {
                throw new Error(`null value in column "${column}" violates not-null constraint`);
              }
            }
            const key = keyFor(stream, row);
            if (mode === 'insert' && table.has(key)) {
              throw new Error(`duplicate key value violates unique constraint on ${stream.name}`);
            }
            table.set(key, { ...row });
          }
          return rows.length;
        }
      };

      try {
        const result = await fn(tx);
        tables = staged;
        store.committedTransactions += 1;
        return result;
      } catch (err) {
        store.rolledBackTransactions += 1;
        throw err;
      }
    }
  };

  return store;
}
