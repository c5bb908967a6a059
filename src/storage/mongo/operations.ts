import type { mongo } from 'mongoose';
import type { ExpiryIndexOptions } from '../interfaces/grant-record-storage.js';
import { isNamespaceExistsError, isIndexOptionsConflictError } from './errors.js';
import { EXPIRY_FIELD } from '../../config/constants.js';
import type { Logger } from '../../logging/logger.js';

/**
 * The parts of `mongo.Db` used for schema setup
 */
export interface RecordDatabase {
  createCollection(name: string): Promise<unknown>;
  collection(name: string): RecordCollection;
  command(command: mongo.Document): Promise<mongo.Document>;
}

export interface RecordCollection {
  createIndex(keys: mongo.IndexSpecification, options: mongo.CreateIndexesOptions): Promise<string>;
}

/**
 * The parts of `mongo.ClientSession` used to drive a transaction
 */
export interface TransactionSession {
  startTransaction(): void;
  commitTransaction(): Promise<unknown>;
  abortTransaction(): Promise<unknown>;
  endSession(): Promise<void>;
  inTransaction(): boolean;
}

/**
 * Create a collection, absorbing NamespaceExists
 */
export async function ensureCollection(db: RecordDatabase, collection: string): Promise<void> {
  try {
    await db.createCollection(collection);
  } catch (err) {
    if (!isNamespaceExistsError(err)) {
      throw err;
    }
  }
}

/**
 * Create the TTL index on `expiresAt`, or retune it if it exists with other options
 */
export async function ensureExpiryIndex(
  db: RecordDatabase,
  collection: string,
  options: ExpiryIndexOptions,
  logger: Logger
): Promise<void> {
  const keyPattern = { [EXPIRY_FIELD]: 1 };

  try {
    await db.collection(collection).createIndex(keyPattern, {
      name: options.name,
      expireAfterSeconds: options.expireAfterSeconds,
    });
  } catch (err) {
    if (!isIndexOptionsConflictError(err)) {
      throw err;
    }

    // Same key, different TTL: retune the existing index instead of adding a second one
    logger.warn('Updating expiry index options', {
      collection,
      expireAfterSeconds: options.expireAfterSeconds,
    });
    await db.command({
      collMod: collection,
      index: { keyPattern, expireAfterSeconds: options.expireAfterSeconds },
    });
  }
}

/**
 * Explicit transaction without the driver's retry loop:
 * a failed commit is reported to the caller as is.
 * The session is always ended.
 */
export async function runExplicitTransaction<TSession extends TransactionSession, T>(
  session: TSession,
  work: (session: TSession) => Promise<T>,
  logger: Logger
): Promise<T> {
  try {
    session.startTransaction();
    const result = await work(session);
    await session.commitTransaction();
    return result;
  } catch (err) {
    if (session.inTransaction()) {
      await session.abortTransaction().catch((abortErr: unknown) => {
        logger.error('Failed to abort transaction', {
          error: abortErr instanceof Error ? abortErr.message : String(abortErr),
        });
      });
    }
    throw err;
  } finally {
    await session.endSession();
  }
}
