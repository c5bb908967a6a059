export { createGrantServer, type GrantServerOptions } from './app.js';
export { GrantStore, createGrantStore, type GrantStoreOptions } from './services/grant-store.js';
export { codeRecordExpiry, tokenRecordExpiry, addSeconds, type TokenRecordExpiry } from './services/grant-expiry.js';
export { createKeyCodec, type KeyCodec } from './storage/keys.js';
export * from './storage/memory/index.js';
export * from './storage/mongo/index.js';
export * from './storage/interfaces/index.js';
export * from './types/index.js';
export * from './codec/index.js';
export * from './config/index.js';
export * from './errors/index.js';
export * from './logging/logger.js';
