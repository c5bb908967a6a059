import type { BasicRecord, IndexRecord } from '../../types/records.js';

/**
 * Options for the expiry (TTL) index on `expiresAt`
 */
export interface ExpiryIndexOptions {
  name: string;
  /**
   * Delay between `expiresAt` passing and the database deleting the record
   */
  expireAfterSeconds: number;
}

/**
 * Storage interface for the records behind the grant store
 *
 * `TSession` is whatever the implementation uses to scope writes to a
 * transaction; the grant store passes it through without looking inside.
 */
export interface IGrantRecordStorage<TSession> {
  /**
   * Create a collection, succeeding if it already exists
   */
  ensureCollection(collection: string): Promise<void>;

  /**
   * Ensure exactly one expiry index exists on `expiresAt`
   */
  ensureExpiryIndex(collection: string, options: ExpiryIndexOptions): Promise<void>;

  /**
   * Insert a basic record
   * Rejects if a record with the same id exists
   */
  insertBasic(collection: string, record: BasicRecord, session?: TSession): Promise<void>;

  /**
   * Insert an index record
   * Rejects if a record with the same id exists
   */
  insertIndex(collection: string, record: IndexRecord, session?: TSession): Promise<void>;

  /**
   * Find a basic record whose `expiresAt` is after `now`
   */
  findBasic(collection: string, id: string, now: Date): Promise<BasicRecord | null>;

  /**
   * Find an index record whose `expiresAt` is after `now`
   */
  findIndex(collection: string, id: string, now: Date): Promise<IndexRecord | null>;

  /**
   * Delete a record by id
   * Returns false if nothing was deleted
   */
  deleteById(collection: string, id: string): Promise<boolean>;

  /**
   * Run `work` inside a transaction.
   * Commits if `work` resolves; aborts and rethrows if it rejects.
   */
  runInTransaction<T>(work: (session: TSession) => Promise<T>): Promise<T>;

  /**
   * Release the underlying connection
   */
  close(): Promise<void>;
}
