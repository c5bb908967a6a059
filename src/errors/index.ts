export * from './error-codes.js';
export * from './token-store-error.js';
