import { z } from 'zod';
import { badRequest } from '../errors/httpError';

const optionalParam = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value === undefined || value === '' ? undefined : value));

const timeseriesQuerySchema = z.object({
  start_date: optionalParam,
  end_date: optionalParam,
  user_id: optionalParam,
  interval: optionalParam
});

const multiEntityQuerySchema = z.object({
  start_date: optionalParam,
  end_date: optionalParam,
  user_ids: z.string().optional(),
  interval: optionalParam
});

export type TimeseriesQuery = {
  startDate?: Date;
  endDate?: Date;
  entityId?: string;
  interval?: string;
};

export type MultiEntityQuery = {
  startDate?: Date;
  endDate?: Date;
  entityIds?: string[];
  interval?: string;
};

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const HAS_ZONE = /(Z|[+-]\d{2}:?\d{2})$/i;
const ISO_LIKE = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?$/i;

/** ISO-8601 date or date-time. Values without an offset are read as UTC. */
export function parseTimestampParam(value: string): Date {
  let normalized: string;
  if (DATE_ONLY.test(value)) {
    normalized = `${value}T00:00:00Z`;
  } else if (ISO_LIKE.test(value)) {
    const withT = value.replace(' ', 'T');
    normalized = HAS_ZONE.test(withT) ? withT : `${withT}Z`;
  } else {
    throw badRequest(`Invalid date format: ${value}`);
  }
  const parsed = new Date(normalized);
  if (Number.isNaN(parsed.getTime())) {
    throw badRequest(`Invalid date format: ${value}`);
  }
  return parsed;
}

function optionalTimestamp(value: string | undefined): Date | undefined {
  return value === undefined ? undefined : parseTimestampParam(value);
}

/**
 * Splits a comma-separated entity list. An absent or empty parameter yields
 * `undefined` so the caller applies its defaults; a list of only separators
 * yields an empty array.
 */
export function parseEntityList(raw: string | undefined): string[] | undefined {
  if (raw === undefined || raw === '') {
    return undefined;
  }
  return raw
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

export function parseTimeseriesQuery(query: unknown): TimeseriesQuery {
  const parsed = timeseriesQuerySchema.parse(query ?? {});
  return {
    startDate: optionalTimestamp(parsed.start_date),
    endDate: optionalTimestamp(parsed.end_date),
    entityId: parsed.user_id,
    interval: parsed.interval
  };
}

export function parseMultiEntityQuery(query: unknown): MultiEntityQuery {
  const parsed = multiEntityQuerySchema.parse(query ?? {});
  return {
    startDate: optionalTimestamp(parsed.start_date),
    endDate: optionalTimestamp(parsed.end_date),
    entityIds: parseEntityList(parsed.user_ids),
    interval: parsed.interval
  };
}
