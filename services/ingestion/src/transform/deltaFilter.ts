import type { CanonicalRow } from './records';

/**
 * Keeps rows strictly newer than the watermark. Timestamps are compared as
 * instants, and naive values were already pinned to UTC by the transformer.
 * A `null` watermark lets everything through.
 */
export function filterNew<R extends CanonicalRow>(
  rows: readonly R[],
  watermark: Date | null,
  timestampColumn: string
): R[] {
  if (!watermark) {
    return rows.slice();
  }
  const threshold = watermark.getTime();
  return rows.filter((row) => {
    const timestamp = row[timestampColumn];
    return timestamp instanceof Date && timestamp.getTime() > threshold;
  });
}
