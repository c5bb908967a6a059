import { Types } from 'mongoose';
import type { GrantKeyKind } from '../types/grant.js';
import {
  type TokenKeyFormat,
  KEY_FORMAT_OBJECT_ID,
  OBJECT_ID_PATTERN,
} from '../config/constants.js';
import { TokenStoreError } from '../errors/token-store-error.js';
import { generateId } from '../crypto/random.js';

/**
 * Validates token keys and generates basic record ids for one key format
 */
export interface KeyCodec {
  readonly format: TokenKeyFormat;
  /**
   * Return the stored form of a key, or throw an `invalid_key` error
   */
  encode(kind: GrantKeyKind, value: string): string;
  generateId(): string;
}

/**
 * `opaque` keys are stored as given; `objectId` keys must be
 * 24 hex characters and are stored lower-cased.
 */
export function createKeyCodec(format: TokenKeyFormat): KeyCodec {
  if (format === KEY_FORMAT_OBJECT_ID) {
    return {
      format,
      encode(kind, value) {
        if (!OBJECT_ID_PATTERN.test(value)) {
          throw TokenStoreError.invalidKey(`The ${kind} key must be a 24 character hex string`);
        }
        return value.toLowerCase();
      },
      generateId: () => new Types.ObjectId().toHexString(),
    };
  }

  return {
    format,
    encode(kind, value) {
      if (value.length === 0) {
        throw TokenStoreError.invalidKey(`The ${kind} key must not be empty`);
      }
      return value;
    },
    generateId: () => generateId(),
  };
}
