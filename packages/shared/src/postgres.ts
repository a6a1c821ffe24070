import pg, { Pool, type PoolClient, type PoolConfig } from 'pg';
import type { Logger } from 'pino';

let int8Configured = false;

// COUNT(*) comes back as int8; row counts stay well inside Number range.
function configureGlobalParsers(): void {
  if (int8Configured) {
    return;
  }
  pg.types.setTypeParser(pg.types.builtins.INT8, (value: string) => Number.parseInt(value, 10));
  pg.types.setTypeParser(pg.types.builtins.NUMERIC, (value: string) => Number.parseFloat(value));
  int8Configured = true;
}

export function quoteIdentifier(input: string): string {
  return `"${input.replace(/"/g, '""')}"`;
}

export interface DatabaseSettings {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  maxConnections: number;
}

export interface PostgresPoolOptions extends PoolConfig {
  /** Session time zone applied to every acquired client. Defaults to UTC. */
  timeZone?: string;
  logger?: Pick<Logger, 'error'>;
}

/**
 * Connection helpers bound to one pool. Instances are created by the process
 * entry points and handed to the components that need a database.
 */
export interface PostgresHelpers {
  getClient(): Promise<PoolClient>;
  withConnection<T>(fn: (client: PoolClient) => Promise<T>): Promise<T>;
  withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T>;
  closePool(): Promise<void>;
  getPool(): Pool;
}

export function poolOptionsFromSettings(settings: DatabaseSettings): PoolConfig {
  return {
    host: settings.host,
    port: settings.port,
    database: settings.database,
    user: settings.user,
    password: settings.password,
    max: settings.maxConnections
  };
}

export function createPostgresPool(options: PostgresPoolOptions = {}): PostgresHelpers {
  configureGlobalParsers();
  const { timeZone = 'UTC', logger, ...poolConfig } = options;
  const pool = new Pool(poolConfig);

  pool.on('error', (err: Error) => {
    if (logger) {
      logger.error({ err }, 'unexpected error on idle postgres client');
    } else {
      console.error('[postgres] unexpected error on idle client', err);
    }
  });

  async function getClient(): Promise<PoolClient> {
    const client = await pool.connect();
    try {
      await client.query(`SET TIME ZONE '${timeZone.replace(/'/g, "''")}'`);
    } catch (err) {
      client.release();
      throw err;
    }
    return client;
  }

  async function withConnection<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await getClient();
    try {
      return await fn(client);
    } finally {
      client.release();
    }
  }

  async function withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    return withConnection(async (client) => {
      await client.query('BEGIN');
      try {
        const result = await fn(client);
        await client.query('COMMIT');
        return result;
      } catch (err) {
        try {
          await client.query('ROLLBACK');
        } catch (rollbackErr) {
          if (logger) {
            logger.error({ err: rollbackErr }, 'failed to rollback transaction');
          } else {
            console.error('[postgres] failed to rollback transaction', rollbackErr);
          }
        }
        throw err;
      }
    });
  }

  async function closePool(): Promise<void> {
    await pool.end();
  }

  function getPool(): Pool {
    return pool;
  }

  return {
    getClient,
    withConnection,
    withTransaction,
    closePool,
    getPool
  };
}
