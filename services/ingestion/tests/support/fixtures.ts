import type { DayRecord } from '../../src/source/dayRecord';

export type SampleSpec = { time: string; value: unknown };

export function makeDayRecord(samples: SampleSpec[], restingHeartRate: unknown = 62): DayRecord {
  return {
    heart_rate_day: [
      {
        'activities-heart': [
          {
            dateTime: '2024-01-01',
            value: {
              restingHeartRate,
              heartRateZones: [{ name: 'Fat Burn', min: 91, max: 127, minutes: 42 }],
              customHeartRateZones: []
            }
          }
        ],
        'activities-heart-intraday': {
          dataset: samples,
          datasetInterval: 1,
          datasetType: 'second'
        }
      }
    ]
  };
}

/** One whole-number sample on every hour of the day. */
export function hourlySamples(base: number): SampleSpec[] {
  return Array.from({ length: 24 }, (_, hour) => ({
    time: `${String(hour).padStart(2, '0')}:00:00`,
    value: base + hour
  }));
}
