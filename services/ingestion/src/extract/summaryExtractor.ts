import { SUMMARY_STREAM_NAME, daysBetween, type Logger } from '@heartstore/shared';
import { heartSummary, type JsonValue } from '../source/dayRecord';
import type { DayRecordSource } from '../source/cacheReplaySource';
import { createRandom, randomInt, type RandomSource } from '../source/random';
import type { Extractor, ExtractedBatch, SummaryCandidate } from './types';

export type SummaryExtractorOptions = {
  source: DayRecordSource;
  entityId: string;
  seed: number;
  logger: Logger;
};

type ZoneRange = [minutesMin: number, minutesMax: number];

const ZONE_BOUNDS = {
  outOfRange: { min: 60, max: 70 },
  fatBurn: { min: 70, max: 85 },
  cardio: { min: 85, max: 100 },
  peak: { min: 100, max: 120 }
} as const;

type ZoneName = keyof typeof ZONE_BOUNDS;

const ZONE_NAMES: readonly ZoneName[] = ['outOfRange', 'fatBurn', 'cardio', 'peak'];

function buildZones(random: RandomSource, minutes: Record<ZoneName, ZoneRange>): JsonValue {
  const zones: { [key: string]: JsonValue } = {};
  for (const name of ZONE_NAMES) {
    const [low, high] = minutes[name];
    zones[name] = { ...ZONE_BOUNDS[name], minutes: randomInt(random, low, high) };
  }
  return zones;
}

/**
 * Deterministic stand-in used when the source has no record for a date. It
 * is seeded from the data seed and the calendar date only, so two runs over
 * the same date agree.
 */
export function synthesizeSummary(date: string, seed: number, entityId: string): SummaryCandidate {
  const epochDay = daysBetween('1970-01-01', date);
  const random = createRandom(seed * 100_003 + epochDay);
  const heartRateZones = buildZones(random, {
    outOfRange: [30, 120],
    fatBurn: [60, 180],
    cardio: [20, 90],
    peak: [5, 30]
  });
  const restingHeartRate = randomInt(random, 60, 80);
  const customHeartRateZones = buildZones(random, {
    outOfRange: [20, 100],
    fatBurn: [50, 160],
    cardio: [15, 80],
    peak: [3, 25]
  });
  return {
    kind: 'summary',
    date,
    restingHeartRate,
    heartRateZones,
    customHeartRateZones,
    entityId
  };
}

export function createSummaryExtractor(options: SummaryExtractorOptions): Extractor {
  const { source, entityId, seed } = options;
  const logger = options.logger.child({ extractor: SUMMARY_STREAM_NAME });

  async function collect(date: string): Promise<SummaryCandidate | null> {
    const record = await source.getDayRecord(date);
    if (!record) {
      logger.warn({ date, seed }, 'no cached summary; synthesizing a seeded placeholder');
      return synthesizeSummary(date, seed, entityId);
    }
    const summary = heartSummary(record);
    if (!summary) {
      logger.warn({ date }, 'cached day record has no heart rate summary');
      return null;
    }
    return {
      kind: 'summary',
      date,
      restingHeartRate: summary.value.restingHeartRate ?? null,
      heartRateZones: summary.value.heartRateZones ?? null,
      customHeartRateZones: summary.value.customHeartRateZones ?? null,
      entityId
    };
  }

  return {
    name: SUMMARY_STREAM_NAME,
    streams: [SUMMARY_STREAM_NAME],
    async extract(date: string): Promise<ExtractedBatch[]> {
      try {
        const candidate = await collect(date);
        if (!candidate) {
          return [];
        }
        logger.info({ date }, 'extracted heart rate summary');
        return [{ stream: SUMMARY_STREAM_NAME, records: [candidate] }];
      } catch (err) {
        logger.error({ err, date }, 'failed to extract heart rate summary');
        return [];
      }
    }
  };
}
