import { serve } from '@hono/node-server';
import { createGrantServer } from './app.js';
import { getConfig } from './config/index.js';
import { createLogger } from './logging/logger.js';
import { createMemoryGrantStore } from './storage/memory/index.js';
import { createMongoGrantStore } from './storage/mongo/index.js';
import type { IGrantStorage } from './storage/interfaces/grant-storage.js';

const config = getConfig();
const logger = createLogger(config.logging.level);

const storeOptions = {
  collections: config.collections,
  keyFormat: config.storage.keyFormat,
  expiryIndexDelaySeconds: config.storage.expiryIndexDelaySeconds,
  logger,
};

// Create storage based on environment
let store: IGrantStorage;

if (config.database.url) {
  logger.info('Using MongoDB grant storage', { database: config.database.name });
  store = await createMongoGrantStore({
    ...storeOptions,
    url: config.database.url,
    dbName: config.database.name,
    connectTimeoutMs: config.database.connectTimeoutMs,
  });
} else {
  logger.warn('Using in-memory grant storage (no MONGODB_URL configured), data is lost on restart');
  ({ store } = await createMemoryGrantStore(storeOptions));
}

const app = createGrantServer({
  store,
  auth: { apiKey: config.secrets.adminApiKey },
  enableLogging: config.server.nodeEnv !== 'test',
  logger,
});

const server = serve(
  {
    fetch: app.fetch,
    port: config.server.port,
    hostname: config.server.host,
  },
  (info) => {
    logger.info('Grant store API listening', { address: info.address, port: info.port });
  }
);

async function shutdown(signal: string): Promise<void> {
  logger.info('Shutting down', { signal });
  server.close();
  await store.close();
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal).then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error('Shutdown failed', { error: err instanceof Error ? err.message : String(err) });
        process.exit(1);
      }
    );
  });
}
