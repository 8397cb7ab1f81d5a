import { migrate } from 'drizzle-orm/node-postgres/migrator';
import { config } from '../config/index.js';
import { createLogger } from '../utils/logger.js';
import { createDatabase } from './index.js';

const logger = createLogger('Migrate');

async function runMigrations() {
  const { db, pool } = createDatabase(config.databaseUrl);
  logger.info('Running migrations...');

  try {
    await migrate(db, {
      migrationsFolder: new URL('./migrations', import.meta.url).pathname,
    });
    logger.info('Migrations complete.');
  } finally {
    await pool.end();
  }
}

runMigrations().catch((err) => {
  logger.error({ err }, 'Migration failed');
  process.exit(1);
});
