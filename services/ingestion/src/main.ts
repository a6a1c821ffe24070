import { EnvConfigError, createLogger, createPostgresPool, poolOptionsFromSettings } from '@heartstore/shared';
import { loadServiceConfig } from './config/serviceConfig';
import { createPostgresTableStore } from './db/postgresTableStore';
import { EXIT_CONFIG_ERROR, createIngestionPipeline, exitCodeFor } from './ingestion';

async function main(): Promise<number> {
  let config: ReturnType<typeof loadServiceConfig>;
  try {
    config = loadServiceConfig();
  } catch (err) {
    if (err instanceof EnvConfigError) {
      console.error(err.message);
      return EXIT_CONFIG_ERROR;
    }
    throw err;
  }

  const logger = createLogger({ name: 'ingestion', level: config.logLevel });
  logger.info(
    {
      database: `${config.database.host}:${config.database.port}/${config.database.database}`,
      entityId: config.entityId,
      batchSize: config.batchSize,
      deltaMode: config.deltaMode,
      upsertMode: config.upsertMode,
      perturbation: config.perturbation
    },
    'ingestion pipeline starting'
  );

  const db = createPostgresPool({ ...poolOptionsFromSettings(config.database), logger });
  try {
    const store = createPostgresTableStore({ db, logger });
    const result = await createIngestionPipeline(config, { store, logger }).run();
    return exitCodeFor(result);
  } finally {
    await db.closePool();
  }
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err) => {
      console.error('[ingestion] unexpected error while running pipeline', err);
      process.exitCode = 1;
    });
}
