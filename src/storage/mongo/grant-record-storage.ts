import { Schema, mongo, type Connection, type Model } from 'mongoose';
import type { BasicRecord, IndexRecord } from '../../types/records.js';
import type { IGrantRecordStorage, ExpiryIndexOptions } from '../interfaces/grant-record-storage.js';
import * as operations from './operations.js';
import { silentLogger, type Logger } from '../../logging/logger.js';

interface BasicRecordDocument {
  _id: string;
  payload: Buffer;
  expiresAt: Date;
}

interface IndexRecordDocument {
  _id: string;
  basicId: string;
  expiresAt: Date;
}

const schemaOptions = { versionKey: false, autoIndex: false, autoCreate: false } as const;

const basicRecordSchema = new Schema<BasicRecordDocument>(
  {
    _id: { type: String, required: true },
    payload: { type: Buffer, required: true },
    expiresAt: { type: Date, required: true },
  },
  schemaOptions
);

const indexRecordSchema = new Schema<IndexRecordDocument>(
  {
    _id: { type: String, required: true },
    basicId: { type: String, required: true },
    expiresAt: { type: Date, required: true },
  },
  schemaOptions
);

/**
 * MongoDB record storage on a mongoose connection
 *
 * Collection names are chosen at runtime, so models are compiled per
 * collection and cached. Schema setup goes through the native driver,
 * see `operations.ts`.
 */
export class MongoGrantRecordStorage implements IGrantRecordStorage<mongo.ClientSession> {
  private basicModels = new Map<string, Model<BasicRecordDocument>>();
  private indexModels = new Map<string, Model<IndexRecordDocument>>();

  constructor(
    private readonly connection: Connection,
    private readonly logger: Logger = silentLogger
  ) {}

  async ensureCollection(collection: string): Promise<void> {
    await operations.ensureCollection(this.database(), collection);
  }

  async ensureExpiryIndex(collection: string, options: ExpiryIndexOptions): Promise<void> {
    await operations.ensureExpiryIndex(this.database(), collection, options, this.logger);
  }

  async insertBasic(collection: string, record: BasicRecord, session?: mongo.ClientSession): Promise<void> {
    await this.basicModel(collection).create(
      [{ _id: record.id, payload: record.payload, expiresAt: record.expiresAt }],
      { session }
    );
  }

  async insertIndex(collection: string, record: IndexRecord, session?: mongo.ClientSession): Promise<void> {
    await this.indexModel(collection).create(
      [{ _id: record.id, basicId: record.basicId, expiresAt: record.expiresAt }],
      { session }
    );
  }

  async findBasic(collection: string, id: string, now: Date): Promise<BasicRecord | null> {
    const doc = await this.basicModel(collection)
      .findOne({ _id: id, expiresAt: { $gt: now } })
      .exec();

    return doc ? { id: doc._id, payload: doc.payload, expiresAt: doc.expiresAt } : null;
  }

  async findIndex(collection: string, id: string, now: Date): Promise<IndexRecord | null> {
    const doc = await this.indexModel(collection)
      .findOne({ _id: id, expiresAt: { $gt: now } })
      .exec();

    return doc ? { id: doc._id, basicId: doc.basicId, expiresAt: doc.expiresAt } : null;
  }

  async deleteById(collection: string, id: string): Promise<boolean> {
    const result = await this.database()
      .collection<{ _id: string }>(collection)
      .deleteOne({ _id: id });
    return result.deletedCount > 0;
  }

  async runInTransaction<T>(work: (session: mongo.ClientSession) => Promise<T>): Promise<T> {
    const session = await this.connection.startSession();
    return operations.runExplicitTransaction(session, work, this.logger);
  }

  async close(): Promise<void> {
    await this.connection.close();
  }

  private database(): mongo.Db {
    const db = this.connection.db;
    if (!db) {
      throw new Error('MongoDB connection is not open');
    }
    return db;
  }

  private basicModel(collection: string): Model<BasicRecordDocument> {
    let model = this.basicModels.get(collection);
    if (!model) {
      model = this.connection.model<BasicRecordDocument>(
        `BasicRecord:${collection}`,
        basicRecordSchema,
        collection,
        { overwriteModels: true }
      );
      this.basicModels.set(collection, model);
    }
    return model;
  }

  private indexModel(collection: string): Model<IndexRecordDocument> {
    let model = this.indexModels.get(collection);
    if (!model) {
      model = this.connection.model<IndexRecordDocument>(
        `IndexRecord:${collection}`,
        indexRecordSchema,
        collection,
        { overwriteModels: true }
      );
      this.indexModels.set(collection, model);
    }
    return model;
  }
}
