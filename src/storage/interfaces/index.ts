export * from './grant-storage.js';
export * from './grant-record-storage.js';
