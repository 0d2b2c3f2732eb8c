import type { Server } from 'http';
import { createApp } from './app';
import { appConfig, dbConfig } from './connections/config';
import { migrate, openStore, seedDemoData, Store } from './connections';
import { createServices } from './services';
import { logger } from './utils/logging';

const closeServer = (server: Server) =>
  new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });

/**
 * Open the store, bring the schema up to date and start serving
 */
const startServer = async () => {
  let store: Store | undefined;
  try {
    logger.info('Connecting to database...');
    store = await openStore(dbConfig);

    await migrate(store);
    if (appConfig.seedDemoData) {
      await seedDemoData(store);
    }

    const app = createApp(createServices(store));
    const server = app.listen(appConfig.port, () => {
      logger.info(`Server is running on port ${appConfig.port}`);
      logger.info(`Environment: ${appConfig.nodeEnv}`);
    });

    const openStoreHandle = store;
    const shutdown = (signal: string) => {
      logger.info(`${signal} received, shutting down`);
      closeServer(server)
        .then(() => openStoreHandle.close())
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Shutdown failed', { error: error instanceof Error ? error.stack : String(error) });
          process.exit(1);
        });
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
  } catch (error: unknown) {
    logger.error('Failed to start server', { error: error instanceof Error ? error.stack : String(error) });
    if (store) {
      await store.close().catch((closeError: unknown) => {
        logger.error('Failed to close database pool', { error: String(closeError) });
      });
    }
    process.exit(1);
  }
};

void startServer();
