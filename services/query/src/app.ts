import Fastify from 'fastify';
import { createPostgresPool, poolOptionsFromSettings } from '@heartstore/shared';
import { stdTimeFunctions } from 'pino';
import { loadServiceConfig, type ServiceConfig } from './config/serviceConfig';
import { createHttpErrorHandler } from './errors/errorHandler';
import { createPostgresSeriesReader, type SeriesReader } from './query/seriesReader';
import { registerSystemRoutes } from './routes/system';
import { registerTimeseriesRoutes } from './routes/timeseries';
import { createTimeseriesService } from './services/timeseriesService';

export type BuildAppOptions = {
  config?: ServiceConfig;
  /** Replaces the Postgres-backed reader; no pool is opened when given. */
  reader?: SeriesReader;
  clock?: () => Date;
};

export async function buildApp(options?: BuildAppOptions) {
  const config = options?.config ?? loadServiceConfig();

  const app = Fastify({
    logger: {
      level: config.logLevel,
      base: undefined,
      timestamp: stdTimeFunctions.isoTime
    }
  });

  app.setErrorHandler(createHttpErrorHandler());

  let reader = options?.reader;
  if (!reader) {
    const db = createPostgresPool({ ...poolOptionsFromSettings(config.database), logger: app.log });
    reader = createPostgresSeriesReader({ db });
    app.addHook('onClose', async () => {
      await db.closePool();
    });
  }

  const service = createTimeseriesService({
    reader,
    logger: app.log,
    defaultEntityIds: config.defaultComparisonEntities,
    clock: options?.clock
  });

  await registerSystemRoutes(app, service);
  await registerTimeseriesRoutes(app, service);

  return { app, config };
}
