import { mongo } from 'mongoose';
import {
  MONGO_NAMESPACE_EXISTS,
  MONGO_INDEX_OPTIONS_CONFLICT,
  MONGO_DUPLICATE_KEY,
} from '../../config/constants.js';

function hasServerCode(err: unknown, code: number): boolean {
  return err instanceof mongo.MongoServerError && err.code === code;
}

/**
 * `create` on a collection that already exists
 */
export function isNamespaceExistsError(err: unknown): boolean {
  return hasServerCode(err, MONGO_NAMESPACE_EXISTS);
}

/**
 * `createIndex` on a key that is already indexed with other options
 */
export function isIndexOptionsConflictError(err: unknown): boolean {
  return hasServerCode(err, MONGO_INDEX_OPTIONS_CONFLICT);
}

/**
 * E11000 on insert
 */
export function isDuplicateKeyError(err: unknown): boolean {
  return hasServerCode(err, MONGO_DUPLICATE_KEY);
}
