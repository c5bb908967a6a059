export * from './grant-codec.js';
