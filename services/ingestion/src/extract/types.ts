import { z } from 'zod';
import type { StreamName } from '@heartstore/shared';
import { jsonValueSchema, sampleValueSchema } from '../source/dayRecord';

/**
 * Candidate records are still in source vocabulary: the calendar date and
 * time of day travel separately and numeric fields may be strings.
 */
export const intradayCandidateSchema = z.object({
  kind: z.literal('intraday'),
  date: z.string().nullable(),
  time: z.string().nullable(),
  value: sampleValueSchema.optional(),
  entityId: z.string().min(1)
});

export const summaryCandidateSchema = z.object({
  kind: z.literal('summary'),
  date: z.string().nullable(),
  restingHeartRate: z.unknown().optional(),
  heartRateZones: jsonValueSchema.nullable(),
  customHeartRateZones: jsonValueSchema.nullable(),
  entityId: z.string().min(1)
});

export const candidateRecordSchema = z.discriminatedUnion('kind', [intradayCandidateSchema, summaryCandidateSchema]);

export type IntradayCandidate = z.infer<typeof intradayCandidateSchema>;
export type SummaryCandidate = z.infer<typeof summaryCandidateSchema>;
export type CandidateRecord = z.infer<typeof candidateRecordSchema>;
export type CandidateKind = CandidateRecord['kind'];

/**
 * Extractor output before validation. Fields copied from the cache may hold
 * anything the file held; `transformBatch` validates them.
 */
export type ExtractedRecord = {
  kind: CandidateKind;
  entityId: string;
  [field: string]: unknown;
};

export type ExtractedBatch = {
  stream: StreamName;
  records: ExtractedRecord[];
};

export interface Extractor {
  readonly name: string;
  readonly streams: readonly StreamName[];
  /** Never rejects; failures are logged and yield an empty list. */
  extract(date: string): Promise<ExtractedBatch[]>;
}
