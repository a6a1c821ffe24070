import type { FastifyInstance } from 'fastify';
import type { TimeseriesService } from '../services/timeseriesService';

export const API_VERSION = '1.0.0';

export async function registerSystemRoutes(app: FastifyInstance, service: TimeseriesService): Promise<void> {
  app.get('/', async () => ({
    message: 'Heart Rate Time-Series API',
    version: API_VERSION,
    description: 'Heart rate time-series queries with automatic rollup selection',
    endpoints: {
      timeseries: '/timeseries',
      multi_user_timeseries: '/multi-user/timeseries',
      users: '/users',
      health: '/health'
    }
  }));

  app.get('/health', async () => {
    const report = await service.checkHealth();
    return {
      status: report.healthy ? 'healthy' : 'unhealthy',
      timestamp: report.checkedAt.toISOString(),
      response_time_seconds: report.responseTimeSeconds,
      database_connected: report.healthy
    };
  });
}
