import type { Connection, mongo } from 'mongoose';
import { GrantStore, createGrantStore, type GrantStoreOptions } from '../../services/grant-store.js';
import { MongoGrantRecordStorage } from './grant-record-storage.js';
import { initializeMongo, type MongoConnectionOptions } from './client.js';

export { initializeMongo, type MongoConnectionOptions } from './client.js';
export { MongoGrantRecordStorage } from './grant-record-storage.js';
export { isNamespaceExistsError, isIndexOptionsConflictError, isDuplicateKeyError } from './errors.js';

export type MongoGrantStoreOptions = Omit<GrantStoreOptions<mongo.ClientSession>, 'records'> &
  ({ connection: Connection } | MongoConnectionOptions);

/**
 * Create an initialized grant store on MongoDB.
 * Either reuses an open connection or opens the shared one from `url` and `dbName`.
 */
export async function createMongoGrantStore(
  options: MongoGrantStoreOptions
): Promise<GrantStore<mongo.ClientSession>> {
  const connection = 'connection' in options ? options.connection : await initializeMongo(options);
  const records = new MongoGrantRecordStorage(connection, options.logger);

  return createGrantStore({
    records,
    collections: options.collections,
    keyFormat: options.keyFormat,
    expiryIndexDelaySeconds: options.expiryIndexDelaySeconds,
    logger: options.logger,
    clock: options.clock,
  });
}
