import { GrantStore, createGrantStore, type GrantStoreOptions } from '../../services/grant-store.js';
import {
  MemoryGrantRecordStorage,
  MemoryTransaction,
  type MemoryGrantRecordStorageOptions,
} from './grant-record-storage.js';

export {
  MemoryGrantRecordStorage,
  MemoryTransaction,
  DuplicateRecordError,
  type MemoryGrantRecordStorageOptions,
} from './grant-record-storage.js';

export interface MemoryGrantStoreOptions
  extends Omit<GrantStoreOptions<MemoryTransaction>, 'records'>,
    MemoryGrantRecordStorageOptions {}

/**
 * Create an initialized grant store backed by in-memory records
 */
export async function createMemoryGrantStore(
  options: MemoryGrantStoreOptions = {}
): Promise<{ store: GrantStore<MemoryTransaction>; records: MemoryGrantRecordStorage }> {
  const { ttlMonitorIntervalMs, ...storeOptions } = options;
  const records = new MemoryGrantRecordStorage({ ttlMonitorIntervalMs });
  const store = await createGrantStore({ ...storeOptions, records });
  return { store, records };
}
