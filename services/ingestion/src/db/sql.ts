import { quoteIdentifier, type StreamDefinition } from '@heartstore/shared';
import type { CanonicalRow, RowValue } from '../transform/records';
import type { WriteMode } from '../load/tableStore';

export const MAX_BIND_PARAMETERS = 65_535;

export type SqlStatement = {
  text: string;
  values: unknown[];
};

function bindValue(stream: StreamDefinition, column: string, value: RowValue | undefined): unknown {
  if (value === undefined) {
    return null;
  }
  if (stream.jsonColumns.includes(column) && value !== null && !(value instanceof Date)) {
    return JSON.stringify(value);
  }
  return value;
}

/** Rows per statement so a single INSERT never exceeds the bind limit. */
export function rowsPerStatement(stream: StreamDefinition): number {
  return Math.max(1, Math.floor(MAX_BIND_PARAMETERS / stream.columns.length));
}

export function buildWriteStatement(
  stream: StreamDefinition,
  rows: readonly CanonicalRow[],
  mode: WriteMode
): SqlStatement {
  if (rows.length === 0) {
    throw new Error(`Cannot build an insert for ${stream.name} without rows`);
  }
  const columnList = stream.columns.map(quoteIdentifier).join(', ');
  const values: unknown[] = [];
  const tuples = rows.map((row) => {
    const placeholders = stream.columns.map((column) => {
      values.push(bindValue(stream, column, row[column]));
      return `$${values.length}`;
    });
    return `(${placeholders.join(', ')})`;
  });

  let text = `INSERT INTO ${quoteIdentifier(stream.name)} (${columnList}) VALUES ${tuples.join(', ')}`;

  if (mode === 'upsert') {
    const conflictTarget = stream.primaryKey.map(quoteIdentifier).join(', ');
    const updates = stream.columns
      .filter((column) => !stream.primaryKey.includes(column))
      .map((column) => `${quoteIdentifier(column)} = EXCLUDED.${quoteIdentifier(column)}`);
    text += updates.length > 0
      ? ` ON CONFLICT (${conflictTarget}) DO UPDATE SET ${updates.join(', ')}`
      : ` ON CONFLICT (${conflictTarget}) DO NOTHING`;
  }

  return { text, values };
}

export function buildWatermarkQuery(stream: StreamDefinition, entityId: string): SqlStatement {
  return {
    text: `SELECT MAX(${quoteIdentifier(stream.timestampColumn)}) AS watermark FROM ${quoteIdentifier(stream.name)} WHERE ${quoteIdentifier(stream.entityColumn)} = $1`,
    values: [entityId]
  };
}

export function buildCountQuery(stream: StreamDefinition, entityId: string): SqlStatement {
  return {
    text: `SELECT COUNT(*) AS count FROM ${quoteIdentifier(stream.name)} WHERE ${quoteIdentifier(stream.entityColumn)} = $1`,
    values: [entityId]
  };
}
