/**
 * Grant store constants
 */

import type { CollectionNames } from '../types/records.js';

// Default collection names
export const DEFAULT_TRANSACTION_COLLECTION = 'oauth2_txn';
export const DEFAULT_BASIC_COLLECTION = 'oauth2_basic';
export const DEFAULT_ACCESS_COLLECTION = 'oauth2_access';
export const DEFAULT_REFRESH_COLLECTION = 'oauth2_refresh';

export const DEFAULT_COLLECTION_NAMES: Readonly<CollectionNames> = {
  transaction: DEFAULT_TRANSACTION_COLLECTION,
  basic: DEFAULT_BASIC_COLLECTION,
  access: DEFAULT_ACCESS_COLLECTION,
  refresh: DEFAULT_REFRESH_COLLECTION,
};

// Expiry (TTL) index
export const EXPIRY_FIELD = 'expiresAt' as const;
export const EXPIRY_INDEX_NAME = 'expires_at_ttl';
export const DEFAULT_EXPIRY_INDEX_DELAY_SECONDS = 1;

// How often mongod's TTL monitor wakes up (ttlMonitorSleepSecs)
export const DEFAULT_TTL_MONITOR_INTERVAL_MS = 60000; // 1 minute

// MongoDB server error codes
export const MONGO_NAMESPACE_EXISTS = 48;
export const MONGO_INDEX_OPTIONS_CONFLICT = 85;
export const MONGO_DUPLICATE_KEY = 11000;

// Connection defaults
export const DEFAULT_DATABASE_NAME = 'oauth2';
export const DEFAULT_CONNECT_TIMEOUT_MS = 10000; // 10 seconds

// Token key formats
export const KEY_FORMAT_OPAQUE = 'opaque' as const;
export const KEY_FORMAT_OBJECT_ID = 'objectId' as const;
export const SUPPORTED_KEY_FORMATS = [KEY_FORMAT_OPAQUE, KEY_FORMAT_OBJECT_ID] as const;
export type TokenKeyFormat = (typeof SUPPORTED_KEY_FORMATS)[number];

export const OBJECT_ID_PATTERN = /^[0-9a-fA-F]{24}$/;
export const GENERATED_ID_LENGTH = 16; // bytes

// Log levels
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

// HTTP
export const DEFAULT_PORT = 3000;
export const DEFAULT_HOST = '0.0.0.0';
export const HEADER_API_KEY = 'x-api-key';
export const HEADER_AUTHORIZATION = 'Authorization';
export const HEADER_CACHE_CONTROL = 'Cache-Control';
export const NO_STORE = 'no-store';
