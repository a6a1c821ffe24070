import { addDays } from '@heartstore/shared';
import type { DayRecord, JsonValue } from './dayRecord';
import { clamp, createRandom, randomInt, uniform, type RandomSource } from './random';

export type SyntheticCacheOptions = {
  seed?: number;
  days?: number;
  startDate?: string;
  sampleIntervalSeconds?: number;
};

export const SYNTHETIC_CACHE_SEED = 100;

function formatTimeOfDay(secondsIntoDay: number): string {
  const hours = Math.floor(secondsIntoDay / 3600);
  const minutes = Math.floor((secondsIntoDay % 3600) / 60);
  const seconds = secondsIntoDay % 60;
  return [hours, minutes, seconds].map((part) => String(part).padStart(2, '0')).join(':');
}

// Low overnight, peaks through the afternoon.
function circadianBaseline(secondsIntoDay: number, resting: number): number {
  const hour = secondsIntoDay / 3600;
  const phase = ((hour - 4) / 24) * 2 * Math.PI;
  const daytimeLift = Math.max(0, Math.sin(phase)) * 28;
  return resting + daytimeLift;
}

function buildZones(random: RandomSource, restingHeartRate: number): JsonValue {
  const minutesInDay = 1440;
  const peak = randomInt(random, 5, 30);
  const cardio = randomInt(random, 20, 90);
  const fatBurn = randomInt(random, 60, 180);
  const outOfRange = minutesInDay - peak - cardio - fatBurn;
  return [
    { name: 'Out of Range', min: 30, max: Math.max(restingHeartRate + 30, 91), minutes: outOfRange, caloriesOut: Math.round(outOfRange * 1.2) },
    { name: 'Fat Burn', min: 91, max: 127, minutes: fatBurn, caloriesOut: Math.round(fatBurn * 5.2) },
    { name: 'Cardio', min: 127, max: 154, minutes: cardio, caloriesOut: Math.round(cardio * 8.4) },
    { name: 'Peak', min: 154, max: 220, minutes: peak, caloriesOut: Math.round(peak * 11.1) }
  ];
}

/**
 * Produces a replayable cache of vendor-shaped day records. Intraday values
 * are whole beats per minute sampled every `sampleIntervalSeconds`.
 */
export function generateSyntheticCache(options: SyntheticCacheOptions = {}): DayRecord[] {
  const seed = options.seed ?? SYNTHETIC_CACHE_SEED;
  const days = options.days ?? 30;
  const startDate = options.startDate ?? '2024-01-01';
  const interval = options.sampleIntervalSeconds ?? 60;
  if (!Number.isInteger(interval) || interval <= 0 || 86_400 % interval !== 0) {
    throw new RangeError(`Sample interval must divide a day evenly (received ${interval})`);
  }

  const random = createRandom(seed);
  const records: DayRecord[] = [];

  for (let day = 0; day < days; day += 1) {
    const date = addDays(startDate, day);
    const restingHeartRate = randomInt(random, 58, 72);
    const dataset: Array<{ time: string; value: number }> = [];
    let drift = 0;

    for (let second = 0; second < 86_400; second += interval) {
      drift = clamp(drift * 0.9 + uniform(random, -3, 3), -15, 15);
      const value = Math.round(clamp(circadianBaseline(second, restingHeartRate) + drift, 45, 190));
      dataset.push({ time: formatTimeOfDay(second), value });
    }

    records.push({
      heart_rate_day: [
        {
          'activities-heart': [
            {
              dateTime: date,
              value: {
                restingHeartRate,
                heartRateZones: buildZones(random, restingHeartRate),
                customHeartRateZones: []
              }
            }
          ],
          'activities-heart-intraday': {
            dataset,
            datasetInterval: interval,
            datasetType: 'second'
          }
        }
      ]
    });
  }

  return records;
}
