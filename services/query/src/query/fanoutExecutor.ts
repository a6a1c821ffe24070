import type { Logger } from '@heartstore/shared';
import { resolveQuery, type QueryResolution, type QueryWindow } from './intervalResolver';
import type { SeriesPoint, SeriesReader } from './seriesReader';

export type EntitySeries = {
  entityId: string;
  data: SeriesPoint[];
  count: number;
};

export type FanoutResult = {
  resolution: QueryResolution;
  results: EntitySeries[];
};

export type FanoutExecutor = {
  run(entityIds: readonly string[], window: QueryWindow, interval?: string | null): Promise<FanoutResult>;
};

/**
 * Resolves the window once, then runs one read per entity concurrently.
 * Results keep the order of `entityIds`; a failed read is logged and
 * reported as an empty series so the remaining entities still answer.
 */
export function createFanoutExecutor(options: {
  reader: Pick<SeriesReader, 'readSeries'>;
  logger: Pick<Logger, 'warn'>;
}): FanoutExecutor {
  const { reader, logger } = options;

  return {
    async run(entityIds, window, interval) {
      const resolution = resolveQuery(window, interval);
      const settled = await Promise.allSettled(
        entityIds.map((entityId) => reader.readSeries(resolution, window, entityId))
      );

      const results = settled.map((outcome, index): EntitySeries => {
        const entityId = entityIds[index];
        if (outcome.status === 'fulfilled') {
          return { entityId, data: outcome.value, count: outcome.value.length };
        }
        logger.warn({ err: outcome.reason, entityId }, 'series read failed during fan-out');
        return { entityId, data: [], count: 0 };
      });

      return { resolution, results };
    }
  };
}
