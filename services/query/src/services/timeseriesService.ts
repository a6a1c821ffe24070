import type { Logger } from '@heartstore/shared';
import { badRequest } from '../errors/httpError';
import { createFanoutExecutor, type EntitySeries } from '../query/fanoutExecutor';
import { resolveQuery, type QueryResolution, type QueryWindow } from '../query/intervalResolver';
import type { EntitySummary, SeriesPoint, SeriesReader } from '../query/seriesReader';
import type { MultiEntityQuery, TimeseriesQuery } from '../schemas/timeseries';

const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_WINDOW_DAYS = 7;
export const MAX_SINGLE_ENTITY_SPAN_DAYS = 365;
export const MAX_MULTI_ENTITY_SPAN_DAYS = 180;
export const MAX_MULTI_ENTITIES = 5;
export const FALLBACK_ENTITY_ID = 'user1';
export const DEFAULT_MULTI_ENTITY_IDS: readonly string[] = ['user1', 'user2'];

export type QueryInfo = {
  tableUsed: string;
  tableDescription: string;
  interval: string;
};

export type TimeseriesResult = {
  data: SeriesPoint[];
  queryInfo: QueryInfo;
};

export type MultiEntityResult = {
  data: EntitySeries[];
  queryInfo: QueryInfo;
};

export type EntityListing = {
  entities: EntitySummary[];
  lastUpdated: Date;
};

export type HealthReport = {
  healthy: boolean;
  checkedAt: Date;
  responseTimeSeconds: number;
};

export type TimeseriesService = {
  getTimeseries(query: TimeseriesQuery): Promise<TimeseriesResult>;
  getMultiEntityTimeseries(query: MultiEntityQuery): Promise<MultiEntityResult>;
  listEntities(): Promise<EntityListing>;
  checkHealth(): Promise<HealthReport>;
};

function describe(resolution: QueryResolution): QueryInfo {
  return {
    tableUsed: resolution.source.table,
    tableDescription: resolution.source.description,
    interval: resolution.interval
  };
}

function resolveWindow(
  query: { startDate?: Date; endDate?: Date },
  now: Date,
  maxSpanDays: number,
  tooLargeMessage: string
): QueryWindow {
  const end = query.endDate ?? now;
  const start = query.startDate ?? new Date(now.getTime() - DEFAULT_WINDOW_DAYS * DAY_MS);
  if (start.getTime() >= end.getTime()) {
    throw badRequest('Start date must be before end date');
  }
  if (Math.floor((end.getTime() - start.getTime()) / DAY_MS) > maxSpanDays) {
    throw badRequest(tooLargeMessage);
  }
  return { start, end };
}

export function createTimeseriesService(options: {
  reader: SeriesReader;
  logger: Pick<Logger, 'debug' | 'warn' | 'error'>;
  defaultEntityIds?: readonly string[];
  clock?: () => Date;
}): TimeseriesService {
  const { reader, logger } = options;
  const defaultEntityIds = options.defaultEntityIds ?? DEFAULT_MULTI_ENTITY_IDS;
  const clock = options.clock ?? (() => new Date());
  const fanout = createFanoutExecutor({ reader, logger });

  async function defaultEntity(): Promise<string> {
    try {
      return (await reader.findDefaultEntity()) ?? FALLBACK_ENTITY_ID;
    } catch (err) {
      logger.warn({ err }, 'default entity lookup failed; using fallback');
      return FALLBACK_ENTITY_ID;
    }
  }

  return {
    async getTimeseries(query) {
      const window = resolveWindow(
        query,
        clock(),
        MAX_SINGLE_ENTITY_SPAN_DAYS,
        `Date range too large. Maximum ${MAX_SINGLE_ENTITY_SPAN_DAYS} days allowed for optimal performance.`
      );
      const resolution = resolveQuery(window, query.interval);
      const entityId = query.entityId ?? (await defaultEntity());
      const data = await reader.readSeries(resolution, window, entityId);
      logger.debug(
        { entityId, table: resolution.source.table, interval: resolution.interval, rows: data.length },
        'timeseries query served'
      );
      return { data, queryInfo: describe(resolution) };
    },

    async getMultiEntityTimeseries(query) {
      const window = resolveWindow(
        query,
        clock(),
        MAX_MULTI_ENTITY_SPAN_DAYS,
        `Date range too large for multi-user queries. Maximum ${MAX_MULTI_ENTITY_SPAN_DAYS} days allowed.`
      );
      const entityIds = query.entityIds ?? [...defaultEntityIds];
      if (entityIds.length > MAX_MULTI_ENTITIES) {
        throw badRequest(`Maximum ${MAX_MULTI_ENTITIES} users allowed for comparison`);
      }
      if (entityIds.length === 0) {
        throw badRequest('At least one user ID must be provided');
      }
      const { resolution, results } = await fanout.run(entityIds, window, query.interval);
      return { data: results, queryInfo: describe(resolution) };
    },

    async listEntities() {
      const entities = await reader.listEntities();
      return { entities, lastUpdated: clock() };
    },

    async checkHealth() {
      const started = process.hrtime.bigint();
      let healthy = true;
      try {
        await reader.ping();
      } catch (err) {
        logger.error({ err }, 'database health check failed');
        healthy = false;
      }
      const elapsedNs = Number(process.hrtime.bigint() - started);
      return {
        healthy,
        checkedAt: clock(),
        responseTimeSeconds: Math.round(elapsedNs / 1e6) / 1e3
      };
    }
  };
}
