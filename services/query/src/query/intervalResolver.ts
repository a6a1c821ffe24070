import { HEART_RATE_SOURCES, type SeriesSource } from '@heartstore/shared';

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

/**
 * Span thresholds, finest first. A span shorter than `RAW_MAX_SPAN_MS` reads
 * raw samples; up to `MINUTE_MAX_SPAN_MS` the minute rollup; up to
 * `HOUR_MAX_SPAN_MS` the hour rollup; anything longer the day rollup.
 */
export const RAW_MAX_SPAN_MS = 2 * MINUTE_MS;
export const MINUTE_MAX_SPAN_MS = 2 * HOUR_MS;
export const HOUR_MAX_SPAN_MS = 7 * DAY_MS;

export type QueryWindow = {
  start: Date;
  end: Date;
};

export type OutputInterval = '1s' | '1m' | '1h' | '1d';

export const OUTPUT_INTERVALS: Readonly<Record<OutputInterval, { bucket: string; ms: number }>> = {
  '1s': { bucket: '1 second', ms: 1000 },
  '1m': { bucket: '1 minute', ms: MINUTE_MS },
  '1h': { bucket: '1 hour', ms: HOUR_MS },
  '1d': { bucket: '1 day', ms: DAY_MS }
};

const NATIVE_INTERVAL_LABELS = {
  raw: 'raw',
  minute: '1m',
  hour: '1h',
  day: '1d'
} as const;

export type IntervalLabel = (typeof NATIVE_INTERVAL_LABELS)[keyof typeof NATIVE_INTERVAL_LABELS] | OutputInterval;

export type QueryResolution = {
  source: SeriesSource;
  /** Explicit re-bucketing interval, or `null` for the source's native rows. */
  requested: OutputInterval | null;
  /** Interval the returned rows are spaced at. */
  interval: IntervalLabel;
};

export class InvalidIntervalError extends Error {
  constructor(readonly interval: string) {
    super(`Invalid interval '${interval}'. Valid options: 1s, 1m, 1h, 1d`);
    this.name = 'InvalidIntervalError';
  }
}

export function isOutputInterval(value: string): value is OutputInterval {
  return Object.prototype.hasOwnProperty.call(OUTPUT_INTERVALS, value);
}

/** Chooses the source table from the span of the window, never from row counts. */
export function resolveSource(window: QueryWindow): SeriesSource {
  const span = window.end.getTime() - window.start.getTime();
  if (span < RAW_MAX_SPAN_MS) {
    return HEART_RATE_SOURCES.raw;
  }
  if (span <= MINUTE_MAX_SPAN_MS) {
    return HEART_RATE_SOURCES.minute;
  }
  if (span <= HOUR_MAX_SPAN_MS) {
    return HEART_RATE_SOURCES.hour;
  }
  return HEART_RATE_SOURCES.day;
}

/**
 * Resolves the source for the window and, when an interval is requested,
 * re-buckets over that source whatever its native granularity. A fine
 * interval over a coarse source averages already-aggregated values.
 */
export function resolveQuery(window: QueryWindow, requested?: string | null): QueryResolution {
  const source = resolveSource(window);
  if (requested === undefined || requested === null || requested === '') {
    return { source, requested: null, interval: NATIVE_INTERVAL_LABELS[source.granularity] };
  }
  if (!isOutputInterval(requested)) {
    throw new InvalidIntervalError(requested);
  }
  return { source, requested, interval: requested };
}
