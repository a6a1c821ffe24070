import type { JsonValue } from '../source/dayRecord';

export type RowValue = Date | JsonValue;

/** A row keyed by its stream's persisted column names. */
export type CanonicalRow = Record<string, RowValue>;

export type IntradayRow = {
  timestamp: Date;
  value: number;
  user_id: string;
};

export type SummaryRow = {
  timestamp: Date;
  resting_heart_rate: number | null;
  heart_rate_zones: JsonValue;
  custom_heart_rate_zones: JsonValue;
  user_id: string;
};
