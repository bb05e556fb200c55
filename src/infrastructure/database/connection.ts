/**
 * Database Connection Pool — Singleton
 * Layer: Infrastructure
 * Pattern: Singleton
 *
 * One Knex pool per process. Each cluster worker (server.ts) and the ETL
 * worker thread build their own: processes and threads cannot share sockets.
 * `createKnex` is the shared factory; `getDbConnection` caches the instance the
 * HTTP process uses.
 *
 * `destroyDbConnection()` runs during graceful shutdown and in test teardown.
 */
import knex, { type Knex } from 'knex';
import { config } from '@core/config';
import { logger } from '@core/logger';

/** Connection settings passed to the ETL worker (matches config.database). */
export interface DbConfig {
  url: string;
  ssl: boolean;
  pool: { min: number; max: number };
}

export function createKnex(dbConfig: DbConfig, poolOverrides?: Partial<Knex.PoolConfig>): Knex {
  return knex({
    client: 'pg',
    connection: {
      connectionString: dbConfig.url,
      ssl: dbConfig.ssl ? { rejectUnauthorized: false } : false,
    },
    pool: {
      min: dbConfig.pool.min,
      max: dbConfig.pool.max,
      ...poolOverrides,
    },
    acquireConnectionTimeout: 60_000,
  });
}

let instance: Knex | null = null;

export function getDbConnection(): Knex {
  if (!instance) {
    instance = createKnex(config.database, {
      afterCreate: (conn: unknown, done: (err: Error | null, conn: unknown) => void) => {
        logger.debug('New database connection established');
        done(null, conn);
      },
    });
    logger.info({ pool: config.database.pool }, 'Database connection pool initialized');
  }

  return instance;
}

/** Gracefully tears down the pool (used on SIGTERM / test cleanup). */
export async function destroyDbConnection(): Promise<void> {
  if (instance) {
    await instance.destroy();
    instance = null;
    logger.info('Database connection pool destroyed');
  }
}
