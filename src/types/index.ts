export * from './grant.js';
export * from './records.js';
