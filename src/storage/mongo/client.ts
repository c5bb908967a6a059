import mongoose, { type Connection } from 'mongoose';
import { DEFAULT_CONNECT_TIMEOUT_MS } from '../../config/constants.js';

export interface MongoConnectionOptions {
  url: string;
  dbName: string;
  connectTimeoutMs?: number;
}

// One shared connection per server URL and database
const connections = new Map<string, Promise<Connection>>();

/**
 * Open the shared MongoDB connection for `url` and `dbName`,
 * or return it if it is already open or opening
 */
export function initializeMongo(options: MongoConnectionOptions): Promise<Connection> {
  const key = `${options.dbName}@${options.url}`;
  const existing = connections.get(key);
  if (existing) {
    return existing;
  }

  const timeout = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
  const pending: Promise<Connection> = mongoose
    .createConnection(options.url, {
      dbName: options.dbName,
      connectTimeoutMS: timeout,
      serverSelectionTimeoutMS: timeout,
      autoIndex: false,
      autoCreate: false,
    })
    .asPromise()
    .then(
      (opened) => {
        // Closing the store closes the connection; the next call reconnects
        opened.once('close', () => {
          if (connections.get(key) === pending) {
            connections.delete(key);
          }
        });
        return opened;
      },
      (err: unknown) => {
        connections.delete(key);
        throw err;
      }
    );

  connections.set(key, pending);
  return pending;
}
