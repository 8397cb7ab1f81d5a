import { migrate } from 'drizzle-orm/node-postgres/migrator';
import { buildApp } from './app.js';
import { config } from './config/index.js';
import { createDatabase } from './db/index.js';
import { connectDescriptiveStore } from './db/mongo.js';
import { runSeed } from './db/seed.js';
import { createJwtAuthenticator, parseJwtAlgorithm } from './middleware/auth.js';
import { DrizzleAdminMetadataStore } from './stores/drizzle-admin-metadata.store.js';
import { MongoDescriptiveMetadataStore } from './stores/mongo-descriptive-metadata.store.js';

async function main(): Promise<void> {
  const { db, pool } = createDatabase(config.databaseUrl);
  const mongo = await connectDescriptiveStore(config.mongoUrl, config.mongoDb, config.mongoCollection);

  const adminStore = new DrizzleAdminMetadataStore(db);
  const app = await buildApp({
    adminStore,
    descriptiveStore: new MongoDescriptiveMetadataStore(mongo.collection),
    authenticate: createJwtAuthenticator({
      key: config.jwtPublicKey || config.jwtSecret,
      algorithm: parseJwtAlgorithm(config.jwtAlgorithm),
    }),
  });

  const closeStores = async (): Promise<void> => {
    await pool.end();
    await mongo.client.close();
  };

  // Run database migrations before accepting traffic
  try {
    await migrate(db, {
      migrationsFolder: new URL('./db/migrations', import.meta.url).pathname,
    });
    app.log.info({ service: 'Server' }, 'Database migrations complete');
  } catch (err) {
    app.log.error({ service: 'Server', err }, 'Database migration failed');
    await closeStores();
    process.exit(1);
  }

  // Seed bootstrap data; non-fatal
  try {
    await runSeed(adminStore, {
      adminUsername: config.seedAdminUsername,
      baseUri: config.seedBaseUri,
    });
  } catch (err) {
    app.log.warn({ service: 'Server', err }, 'Database seed failed, continuing startup');
  }

  const shutdown = (signal: string): void => {
    app.log.info({ service: 'Server', signal }, 'Shutting down');
    app
      .close()
      .then(closeStores)
      .then(
        () => process.exit(0),
        (err: unknown) => {
          app.log.error({ service: 'Server', err }, 'Shutdown failed');
          process.exit(1);
        },
      );
  };
  process.once('SIGTERM', shutdown);
  process.once('SIGINT', shutdown);

  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(
      { service: 'Server', port: config.port, host: config.host, env: config.nodeEnv },
      'Dataset lookup server started',
    );
  } catch (err) {
    app.log.error({ service: 'Server', err }, 'Failed to start server');
    await closeStores();
    process.exit(1);
  }
}

main().catch((err) => {
  console.error('Startup failed:', err);
  process.exit(1);
});
