import { INTRADAY_STREAM_NAME, type Logger } from '@heartstore/shared';
import { intradaySamples } from '../source/dayRecord';
import type { DayRecordSource } from '../source/cacheReplaySource';
import { perturbValues, type PerturbationVariant } from '../source/perturbation';
import type { Extractor, ExtractedBatch } from './types';

type IntradayDraft = {
  kind: 'intraday';
  date: string;
  time: unknown;
  value: unknown;
  entityId: string;
};

function isAbsent(value: unknown): boolean {
  return value === null || value === undefined || value === '';
}

export type IntradayExtractorOptions = {
  source: DayRecordSource;
  entityId: string;
  seed: number;
  perturbation: PerturbationVariant;
  logger: Logger;
};

export function createIntradayExtractor(options: IntradayExtractorOptions): Extractor {
  const { source, entityId, seed, perturbation } = options;
  const logger = options.logger.child({ extractor: INTRADAY_STREAM_NAME });

  async function collect(date: string): Promise<IntradayDraft[]> {
    const record = await source.getDayRecord(date);
    if (!record) {
      logger.warn({ date }, 'no heart rate data found');
      return [];
    }

    // The replayed record carries the date of the cycle it came from; every
    // candidate is stamped with the date under extraction instead.
    const candidates: IntradayDraft[] = [];
    for (const sample of intradaySamples(record)) {
      if (isAbsent(sample.time) || sample.value === null || sample.value === undefined) {
        continue;
      }
      candidates.push({ kind: 'intraday', date, time: sample.time, value: sample.value, entityId });
    }

    return perturbValues(perturbation, candidates, seed);
  }

  return {
    name: INTRADAY_STREAM_NAME,
    streams: [INTRADAY_STREAM_NAME],
    async extract(date: string): Promise<ExtractedBatch[]> {
      try {
        const records = await collect(date);
        if (records.length === 0) {
          return [];
        }
        logger.info({ date, records: records.length, perturbation, seed }, 'extracted intraday heart rate records');
        return [{ stream: INTRADAY_STREAM_NAME, records }];
      } catch (err) {
        logger.error({ err, date }, 'failed to extract intraday heart rate data');
        return [];
      }
    }
  };
}
