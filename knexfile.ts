/**
 * Knex Configuration (knexfile.ts)
 *
 * Connection settings come from the same source of truth as the app,
 * src/core/config.ts (DATABASE_URL, DB_SSL, DB_POOL_*), keyed by NODE_ENV.
 *
 * Migrations are TypeScript files under src/infrastructure/database/migrations.
 * This file is read by the knex CLI (`knex migrate:make`, `knex migrate:status`);
 * `npm run migrate` (src/scripts/migrate.ts) builds its own Knex from the same
 * config and migration directory.
 */
import type { Knex } from 'knex';

import { config } from './src/core/config';
import path from 'node:path';

function getConnection(): Knex.PgConnectionConfig {
  return {
    connectionString: config.database.url,
    ssl: config.database.ssl ? { rejectUnauthorized: false } : false,
  };
}

const migrations: Knex.MigratorConfig = {
  directory: path.join(__dirname, 'src/infrastructure/database/migrations'),
  extension: 'ts',
  loadExtensions: ['.ts'],
};

const knexConfig: Record<string, Knex.Config> = {
  development: {
    client: 'pg',
    connection: getConnection(),
    pool: {
      min: config.database.pool.min,
      max: config.database.pool.max,
    },
    migrations,
  },

  test: {
    client: 'pg',
    connection: getConnection(),
    pool: { min: 0, max: 2 },
    migrations,
  },

  production: {
    client: 'pg',
    connection: getConnection(),
    pool: {
      min: config.database.pool.min,
      max: Math.max(config.database.pool.max, 20),
    },
    migrations,
  },
};

export default knexConfig;
