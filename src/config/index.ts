import { readFileSync, existsSync } from 'node:fs';
import { z } from 'zod';
import * as constants from './constants.js';
import type { CollectionNames } from '../types/records.js';

/**
 * Read a secret from file (Docker secrets) or environment variable
 * Supports both `VAR_FILE` (path to file) and `VAR` (direct value) patterns
 */
function readSecret(envVar: string): string | undefined {
  const fileEnvVar = `${envVar}_FILE`;
  const filePath = process.env[fileEnvVar];

  if (filePath && existsSync(filePath)) {
    try {
      return readFileSync(filePath, 'utf-8').trim();
    } catch {
      console.warn(`Warning: Could not read secret from ${filePath}`);
    }
  }

  return process.env[envVar];
}

const keyFormatSchema = z.enum(constants.SUPPORTED_KEY_FORMATS);
const logLevelSchema = z.enum(constants.LOG_LEVELS);

const nonNegativeIntegerSchema = z.coerce.number().int().nonnegative();
const portSchema = nonNegativeIntegerSchema.max(65535);

/**
 * Read a numeric variable, falling back when unset
 * Throws naming the variable when the value is not a valid integer
 */
function parseInteger(
  envVar: string,
  fallback: number,
  schema = nonNegativeIntegerSchema,
  expected = 'a non-negative integer'
): number {
  const raw = process.env[envVar];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new Error(`${envVar} must be ${expected}, got "${raw}"`);
  }
  return result.data;
}

/**
 * Application configuration loaded from environment
 */
export interface Config {
  server: {
    port: number;
    host: string;
    nodeEnv: string;
  };
  database: {
    url: string | undefined;
    name: string;
    connectTimeoutMs: number;
  };
  collections: CollectionNames;
  storage: {
    keyFormat: constants.TokenKeyFormat;
    expiryIndexDelaySeconds: number;
  };
  secrets: {
    adminApiKey: string | undefined;
  };
  logging: {
    level: constants.LogLevel;
  };
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(): Config {
  return {
    server: {
      port: parseInteger('PORT', constants.DEFAULT_PORT, portSchema, 'a port number from 0 to 65535'),
      host: process.env['HOST'] ?? constants.DEFAULT_HOST,
      nodeEnv: process.env['NODE_ENV'] ?? 'development',
    },
    database: {
      url: readSecret('MONGODB_URL'),
      name: process.env['MONGODB_DB_NAME'] ?? constants.DEFAULT_DATABASE_NAME,
      connectTimeoutMs: parseInteger('MONGODB_CONNECT_TIMEOUT_MS', constants.DEFAULT_CONNECT_TIMEOUT_MS),
    },
    collections: {
      transaction: process.env['OAUTH2_TXN_COLLECTION'] ?? constants.DEFAULT_TRANSACTION_COLLECTION,
      basic: process.env['OAUTH2_BASIC_COLLECTION'] ?? constants.DEFAULT_BASIC_COLLECTION,
      access: process.env['OAUTH2_ACCESS_COLLECTION'] ?? constants.DEFAULT_ACCESS_COLLECTION,
      refresh: process.env['OAUTH2_REFRESH_COLLECTION'] ?? constants.DEFAULT_REFRESH_COLLECTION,
    },
    storage: {
      keyFormat: keyFormatSchema.parse(process.env['TOKEN_KEY_FORMAT'] ?? constants.KEY_FORMAT_OPAQUE),
      expiryIndexDelaySeconds: parseInteger(
        'EXPIRY_INDEX_DELAY_SECONDS',
        constants.DEFAULT_EXPIRY_INDEX_DELAY_SECONDS
      ),
    },
    secrets: {
      adminApiKey: readSecret('ADMIN_API_KEY'),
    },
    logging: {
      level: logLevelSchema.parse(process.env['LOG_LEVEL'] ?? 'info'),
    },
  };
}

// Singleton config instance
let config: Config | null = null;

/**
 * Get the current configuration (loads if not already loaded)
 */
export function getConfig(): Config {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  config = null;
}

export { constants };
