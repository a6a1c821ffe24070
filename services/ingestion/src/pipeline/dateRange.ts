import { addDays, daysBetween, toCalendarDate, type StreamName } from '@heartstore/shared';

export const DEFAULT_LOOKBACK_DAYS = 30;

export type DateRange = {
  start: string;
  end: string;
};

export type DateRangeSource = 'explicit' | 'watermark' | 'configured_start' | 'lookback';

export type ResolvedDateRange = DateRange & {
  source: DateRangeSource;
};

export type StreamWatermark = {
  stream: StreamName;
  watermark: Date | null;
};

export type DateRangeInput = {
  watermarks: readonly StreamWatermark[];
  today: string;
  startDate?: string | null;
  endDate?: string | null;
  lookbackDays?: number;
};

/** First day after the watermark, or `null` when that day is still ahead of `today`. */
export function nextMissingDate(watermark: Date, today: string): string | null {
  const candidate = addDays(toCalendarDate(watermark), 1);
  return daysBetween(candidate, today) >= 0 ? candidate : null;
}

/**
 * Picks the dates a run covers. An explicit start and end pair wins outright;
 * otherwise the stream furthest behind sets the start. With no usable
 * watermark the configured start date, then a fixed lookback, applies. The
 * end is always today.
 */
export function determineDateRange(input: DateRangeInput): ResolvedDateRange {
  const { today } = input;
  if (input.startDate && input.endDate) {
    return { start: input.startDate, end: input.endDate, source: 'explicit' };
  }

  let earliest: string | null = null;
  for (const { watermark } of input.watermarks) {
    if (!watermark) {
      continue;
    }
    const candidate = nextMissingDate(watermark, today);
    if (candidate && (earliest === null || daysBetween(candidate, earliest) > 0)) {
      earliest = candidate;
    }
  }

  if (earliest) {
    return { start: earliest, end: today, source: 'watermark' };
  }
  if (input.startDate) {
    return { start: input.startDate, end: today, source: 'configured_start' };
  }
  return {
    start: addDays(today, -(input.lookbackDays ?? DEFAULT_LOOKBACK_DAYS)),
    end: today,
    source: 'lookback'
  };
}
