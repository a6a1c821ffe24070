import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { daysBetween, type Logger } from '@heartstore/shared';
import { dayRecordCacheSchema, dayRecordSchema, type DayRecord } from './dayRecord';

export const REPLAY_BASE_DATE = '2024-01-01';
export const DEFAULT_CYCLE_LENGTH = 30;

/** Index into the cached cycle for `date`; always in `[0, cycleLength)`. */
export function computeShift(
  date: string,
  baseDate: string = REPLAY_BASE_DATE,
  cycleLength: number = DEFAULT_CYCLE_LENGTH
): number {
  if (!Number.isInteger(cycleLength) || cycleLength <= 0) {
    throw new RangeError(`Cycle length must be a positive integer (received ${cycleLength})`);
  }
  const days = daysBetween(baseDate, date);
  return ((days % cycleLength) + cycleLength) % cycleLength;
}

export interface DayRecordSource {
  /** `null` when no cached record can be produced for the date. */
  getDayRecord(date: string): Promise<DayRecord | null>;
}

export type CacheReplaySourceOptions = {
  cachePath: string;
  logger: Logger;
  baseDate?: string;
  regenerate?: () => DayRecord[] | Promise<DayRecord[]>;
};

type CacheState = { records: unknown[] } | { records: null; reason: string };

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export function createCacheReplaySource(options: CacheReplaySourceOptions): DayRecordSource {
  const { cachePath, logger } = options;
  const baseDate = options.baseDate ?? REPLAY_BASE_DATE;
  let loading: Promise<CacheState> | null = null;

  async function regenerateCache(): Promise<CacheState> {
    if (!options.regenerate) {
      return { records: null, reason: `cache file ${cachePath} not found` };
    }
    logger.warn({ cachePath }, 'cache file not found; generating a new one');
    try {
      const records = dayRecordCacheSchema.parse(await options.regenerate());
      await mkdir(path.dirname(cachePath), { recursive: true });
      await writeFile(cachePath, JSON.stringify(records, null, 2), 'utf8');
      logger.info({ cachePath, days: records.length }, 'cache file written');
      return { records };
    } catch (err) {
      logger.error({ err, cachePath }, 'failed to generate cache file');
      return { records: null, reason: `cache regeneration failed: ${err instanceof Error ? err.message : String(err)}` };
    }
  }

  async function loadCache(): Promise<CacheState> {
    let contents: string;
    try {
      contents = await readFile(cachePath, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) {
        return regenerateCache();
      }
      logger.error({ err, cachePath }, 'failed to read cache file');
      return { records: null, reason: `cache file ${cachePath} unreadable` };
    }

    try {
      const parsed = dayRecordCacheSchema.safeParse(JSON.parse(contents));
      if (!parsed.success) {
        logger.error({ cachePath, issues: parsed.error.issues.slice(0, 5) }, 'cache file has an unexpected shape');
        return { records: null, reason: `cache file ${cachePath} is malformed` };
      }
      logger.info({ cachePath, days: parsed.data.length }, 'loaded cached heart rate data');
      return { records: parsed.data };
    } catch (err) {
      logger.error({ err, cachePath }, 'cache file is not valid JSON');
      return { records: null, reason: `cache file ${cachePath} is not valid JSON` };
    }
  }

  return {
    async getDayRecord(date: string): Promise<DayRecord | null> {
      if (!loading) {
        loading = loadCache();
      }
      const state = await loading;
      if (state.records === null) {
        logger.error({ date, reason: state.reason }, 'no cached day record available');
        return null;
      }
      const shift = computeShift(date, baseDate, state.records.length);
      const parsed = dayRecordSchema.safeParse(state.records[shift]);
      if (!parsed.success) {
        logger.error({ date, shift, issues: parsed.error.issues.slice(0, 5) }, 'cached day record has an unexpected shape');
        return null;
      }
      logger.debug({ date, shift }, 'replaying cached day record');
      return parsed.data;
    }
  };
}
