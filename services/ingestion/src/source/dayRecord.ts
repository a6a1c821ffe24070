import { z } from 'zod';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

export const sampleValueSchema = z.union([z.number(), z.string()]).nullable();

// Leaf fields stay unvalidated here: a bad sample is rejected and counted by
// the transformer instead of failing the whole day.
const intradaySampleSchema = z.object({
  time: z.unknown().optional(),
  value: z.unknown().optional()
});

const heartSummarySchema = z.object({
  dateTime: z.string().optional(),
  value: z
    .object({
      restingHeartRate: z.unknown().optional(),
      heartRateZones: jsonValueSchema.optional(),
      customHeartRateZones: jsonValueSchema.optional()
    })
    .default({})
});

const heartRateDaySchema = z.object({
  'activities-heart': z.array(heartSummarySchema).default([]),
  'activities-heart-intraday': z
    .object({
      dataset: z.array(intradaySampleSchema).default([]),
      datasetInterval: z.number().optional(),
      datasetType: z.string().optional()
    })
    .optional()
});

/**
 * One cached day in the wearable vendor's heart-rate response shape. Only the
 * first `heart_rate_day` entry is read.
 */
export const dayRecordSchema = z.object({
  heart_rate_day: z.array(heartRateDaySchema).min(1)
});

/** The cache file only needs to be a non-empty list; each day is validated when it is replayed. */
export const dayRecordCacheSchema = z.array(z.unknown()).min(1);

export type DayRecord = z.infer<typeof dayRecordSchema>;
export type IntradaySample = z.infer<typeof intradaySampleSchema>;
export type HeartSummary = z.infer<typeof heartSummarySchema>;

export function intradaySamples(record: DayRecord): IntradaySample[] {
  return record.heart_rate_day[0]['activities-heart-intraday']?.dataset ?? [];
}

export function heartSummary(record: DayRecord): HeartSummary | null {
  return record.heart_rate_day[0]['activities-heart'][0] ?? null;
}
