import { EnvConfigError } from '@heartstore/shared';
import { buildApp } from './app';
import { loadServiceConfig, type ServiceConfig } from './config/serviceConfig';

async function main(): Promise<void> {
  let config: ServiceConfig;
  try {
    config = loadServiceConfig();
  } catch (err) {
    if (err instanceof EnvConfigError) {
      console.error(err.message);
      process.exitCode = 78;
      return;
    }
    throw err;
  }

  const { app } = await buildApp({ config });

  try {
    await app.ready();
    await app.listen({ host: config.host, port: config.port });
    app.log.info(`Heart rate query API listening on http://${config.host}:${config.port}`);
  } catch (err) {
    app.log.error({ err }, 'Failed to start heart rate query API');
    process.exit(1);
  }
}

if (require.main === module) {
  main().catch((err) => {
    console.error('[query] unexpected error while starting server', err);
    process.exit(1);
  });
}
