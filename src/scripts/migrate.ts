/**
 * Migration CLI — npm run migrate [-- --rollback]
 * Layer: Entry Point (CLI)
 *
 * Applies pending knex migrations from src/infrastructure/database/migrations,
 * or rolls back the latest batch with --rollback.
 */
import { logger } from '@core/logger';
import { createKnex } from '@infrastructure/database/connection';
import { config } from '@core/config';
import path from 'path';

const MIGRATIONS_DIR = path.resolve(__dirname, '../infrastructure/database/migrations');

async function migrate(): Promise<void> {
  const rollback = process.argv.slice(2).includes('--rollback');
  const db = createKnex(config.database, { min: 0, max: 1 });

  try {
    if (rollback) {
      const [batch, files]: [number, string[]] = await db.migrate.rollback({
        directory: MIGRATIONS_DIR,
        loadExtensions: ['.ts'],
      });
      logger.info({ batch, files }, 'Rolled back latest migration batch');
    } else {
      const [batch, files]: [number, string[]] = await db.migrate.latest({
        directory: MIGRATIONS_DIR,
        loadExtensions: ['.ts'],
      });
      logger.info({ batch, files }, files.length ? 'Migrations applied' : 'Already up to date');
    }
  } finally {
    await db.destroy();
  }
}

migrate().catch((err: unknown) => {
  logger.error({ err }, 'Database migration failed');
  process.exit(1);
});
