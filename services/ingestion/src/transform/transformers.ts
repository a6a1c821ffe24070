import {
  INTRADAY_STREAM_NAME,
  SUMMARY_STREAM_NAME,
  isCalendarDate,
  type StreamName
} from '@heartstore/shared';
import {
  candidateRecordSchema,
  type CandidateKind,
  type CandidateRecord,
  type IntradayCandidate,
  type SummaryCandidate
} from '../extract/types';
import type { CanonicalRow, IntradayRow, SummaryRow } from './records';

const TIME_OF_DAY_PATTERN = /^(\d{2}):(\d{2})(?::(\d{2})(\.\d{1,6})?)?$/;

export type TransformOutcome<R> = {
  row: R;
  /** Number of fields that fell back to their default value. */
  filled: number;
};

export interface Transformer<R extends CanonicalRow = CanonicalRow> {
  readonly stream: StreamName;
  readonly kind: CandidateKind;
  /** `null` rejects the candidate; never throws for bad input. */
  transform(candidate: CandidateRecord): TransformOutcome<R> | null;
}

export type TransformStats = {
  total: number;
  valid: number;
  invalid: number;
  missingValuesFilled: number;
};

export type TransformBatchResult<R> = {
  rows: R[];
  stats: TransformStats;
};

/**
 * Combines a calendar date and a time of day into a UTC instant. Returns
 * `null` when either part is missing or out of range.
 */
export function combineTimestamp(date: string | null, time: string | null): Date | null {
  if (!date || !time || !isCalendarDate(date)) {
    return null;
  }
  const match = TIME_OF_DAY_PATTERN.exec(time.trim());
  if (!match) {
    return null;
  }
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  const seconds = match[3] === undefined ? 0 : Number(match[3]);
  if (hours > 23 || minutes > 59 || seconds > 59) {
    return null;
  }
  const fraction = match[4] ?? '';
  const timestamp = new Date(`${date}T${match[1]}:${match[2]}:${String(seconds).padStart(2, '0')}${fraction}Z`);
  return Number.isNaN(timestamp.getTime()) ? null : timestamp;
}

export function parseNumeric(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export const DEFAULT_SAMPLE_VALUE = 0;

export function transformIntraday(candidate: IntradayCandidate): TransformOutcome<IntradayRow> | null {
  const timestamp = combineTimestamp(candidate.date, candidate.time);
  if (!timestamp || candidate.value === null || candidate.value === undefined) {
    return null;
  }
  const value = parseNumeric(candidate.value);
  return {
    row: {
      timestamp,
      value: value ?? DEFAULT_SAMPLE_VALUE,
      user_id: candidate.entityId
    },
    filled: value === null ? 1 : 0
  };
}

export function transformSummary(candidate: SummaryCandidate): TransformOutcome<SummaryRow> | null {
  const timestamp = combineTimestamp(candidate.date, '00:00:00');
  if (!timestamp) {
    return null;
  }
  const hasRestingValue = candidate.restingHeartRate !== null && candidate.restingHeartRate !== undefined;
  const parsed = parseNumeric(candidate.restingHeartRate);
  const restingHeartRate = parsed === null ? null : Math.round(parsed);
  return {
    row: {
      timestamp,
      resting_heart_rate: restingHeartRate,
      heart_rate_zones: candidate.heartRateZones,
      custom_heart_rate_zones: candidate.customHeartRateZones,
      user_id: candidate.entityId
    },
    filled: hasRestingValue && parsed === null ? 1 : 0
  };
}

export const intradayTransformer: Transformer<IntradayRow> = {
  stream: INTRADAY_STREAM_NAME,
  kind: 'intraday',
  transform: (candidate) => (candidate.kind === 'intraday' ? transformIntraday(candidate) : null)
};

export const summaryTransformer: Transformer<SummaryRow> = {
  stream: SUMMARY_STREAM_NAME,
  kind: 'summary',
  transform: (candidate) => (candidate.kind === 'summary' ? transformSummary(candidate) : null)
};

export function defaultTransformers(): Transformer[] {
  return [intradayTransformer, summaryTransformer];
}

/**
 * Validates each candidate at the extractor boundary and transforms the ones
 * that pass. Anything that fails validation or is rejected counts as invalid.
 */
export function transformBatch<R extends CanonicalRow>(
  transformer: Transformer<R>,
  candidates: readonly unknown[]
): TransformBatchResult<R> {
  const rows: R[] = [];
  const stats: TransformStats = { total: candidates.length, valid: 0, invalid: 0, missingValuesFilled: 0 };

  for (const raw of candidates) {
    const parsed = candidateRecordSchema.safeParse(raw);
    if (!parsed.success || parsed.data.kind !== transformer.kind) {
      stats.invalid += 1;
      continue;
    }
    const outcome = transformer.transform(parsed.data);
    if (!outcome) {
      stats.invalid += 1;
      continue;
    }
    rows.push(outcome.row);
    stats.valid += 1;
    stats.missingValuesFilled += outcome.filled;
  }

  return { rows, stats };
}
