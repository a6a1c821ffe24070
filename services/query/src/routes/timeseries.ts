import type { FastifyInstance } from 'fastify';
import { parseMultiEntityQuery, parseTimeseriesQuery } from '../schemas/timeseries';
import type { TimeseriesService } from '../services/timeseriesService';
import { serializeEntitySeries, serializeEntitySummary, serializePoint, serializeQueryInfo } from './serializers';

export async function registerTimeseriesRoutes(app: FastifyInstance, service: TimeseriesService): Promise<void> {
  app.get('/timeseries', async (request) => {
    const query = parseTimeseriesQuery(request.query);
    const result = await service.getTimeseries(query);
    return {
      data: result.data.map(serializePoint),
      metadata: { query_info: serializeQueryInfo(result.queryInfo) }
    };
  });

  app.get('/multi-user/timeseries', async (request) => {
    const query = parseMultiEntityQuery(request.query);
    const result = await service.getMultiEntityTimeseries(query);
    return {
      data: result.data.map(serializeEntitySeries),
      metadata: { query_info: serializeQueryInfo(result.queryInfo) }
    };
  });

  app.get('/users', async () => {
    const listing = await service.listEntities();
    return {
      users: listing.entities.map(serializeEntitySummary),
      total_count: listing.entities.length,
      last_updated: listing.lastUpdated.toISOString()
    };
  });
}
