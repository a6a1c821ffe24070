import { EnvConfigError, createLogger, createPostgresPool, poolOptionsFromSettings } from '@heartstore/shared';
import { loadServiceConfig } from '../config/serviceConfig';
import { schemaStatements } from '../db/schema';
import { EXIT_CONFIG_ERROR, streamsFor } from '../ingestion';

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

  const logger = createLogger({ name: 'provision', level: config.logLevel });
  const db = createPostgresPool({ ...poolOptionsFromSettings(config.database), logger });
  try {
    const statements = schemaStatements(streamsFor(config));
    await db.withConnection(async (client) => {
      for (const statement of statements) {
        logger.debug({ statement }, 'applying schema statement');
        await client.query(statement);
      }
    });
    logger.info({ statements: statements.length }, 'schema provisioned');
    return 0;
  } catch (err) {
    logger.error({ err }, 'schema provisioning failed');
    return 1;
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
      console.error('[provision] unexpected error', err);
      process.exitCode = 1;
    });
}
