import type { BasicRecord, IndexRecord } from '../../types/records.js';
import type { IGrantRecordStorage, ExpiryIndexOptions } from '../interfaces/grant-record-storage.js';
import { DEFAULT_TTL_MONITOR_INTERVAL_MS } from '../../config/constants.js';

type StoredRecord = { kind: 'basic'; record: BasicRecord } | { kind: 'index'; record: IndexRecord };

interface MemoryCollection {
  records: Map<string, StoredRecord>;
  expiryIndex?: ExpiryIndexOptions;
}

interface StagedWrite {
  collection: string;
  entry: StoredRecord;
}

/**
 * Writes buffered until the transaction commits
 */
export class MemoryTransaction {
  readonly writes: StagedWrite[] = [];
}

/**
 * Raised on an insert whose id is already taken
 */
export class DuplicateRecordError extends Error {
  constructor(collection: string) {
    super(`Duplicate record id in collection ${collection}`);
    this.name = 'DuplicateRecordError';
  }
}

export interface MemoryGrantRecordStorageOptions {
  /**
   * How often expired records are deleted, like mongod's TTL monitor
   */
  ttlMonitorIntervalMs?: number;
}

/**
 * In-memory record storage
 *
 * Transactions stage their inserts and apply them on commit. Records are
 * deleted by a periodic TTL monitor once `expiresAt` plus the index delay
 * has passed.
 */
export class MemoryGrantRecordStorage implements IGrantRecordStorage<MemoryTransaction> {
  private collections = new Map<string, MemoryCollection>();
  private ttlMonitor: NodeJS.Timeout | null = null;
  private readonly ttlMonitorIntervalMs: number;

  constructor(options: MemoryGrantRecordStorageOptions = {}) {
    this.ttlMonitorIntervalMs = options.ttlMonitorIntervalMs ?? DEFAULT_TTL_MONITOR_INTERVAL_MS;
  }

  async ensureCollection(collection: string): Promise<void> {
    this.collection(collection);
  }

  async ensureExpiryIndex(collection: string, options: ExpiryIndexOptions): Promise<void> {
    this.collection(collection).expiryIndex = { ...options };
    this.startTtlMonitor();
  }

  async insertBasic(collection: string, record: BasicRecord, session?: MemoryTransaction): Promise<void> {
    this.insert(collection, { kind: 'basic', record: { ...record } }, session);
  }

  async insertIndex(collection: string, record: IndexRecord, session?: MemoryTransaction): Promise<void> {
    this.insert(collection, { kind: 'index', record: { ...record } }, session);
  }

  async findBasic(collection: string, id: string, now: Date): Promise<BasicRecord | null> {
    const entry = this.collections.get(collection)?.records.get(id);
    if (entry?.kind !== 'basic' || entry.record.expiresAt <= now) {
      return null;
    }
    return { ...entry.record };
  }

  async findIndex(collection: string, id: string, now: Date): Promise<IndexRecord | null> {
    const entry = this.collections.get(collection)?.records.get(id);
    if (entry?.kind !== 'index' || entry.record.expiresAt <= now) {
      return null;
    }
    return { ...entry.record };
  }

  async deleteById(collection: string, id: string): Promise<boolean> {
    return this.collections.get(collection)?.records.delete(id) ?? false;
  }

  async runInTransaction<T>(work: (session: MemoryTransaction) => Promise<T>): Promise<T> {
    const transaction = new MemoryTransaction();
    const result = await work(transaction);

    // Another transaction may have committed the same id while `work` was awaiting
    for (const { collection, entry } of transaction.writes) {
      if (this.collections.get(collection)?.records.has(entry.record.id)) {
        throw new DuplicateRecordError(collection);
      }
    }

    for (const { collection, entry } of transaction.writes) {
      this.collection(collection).records.set(entry.record.id, entry);
    }
    return result;
  }

  async close(): Promise<void> {
    if (this.ttlMonitor) {
      clearInterval(this.ttlMonitor);
      this.ttlMonitor = null;
    }
  }

  /**
   * Delete every record past its expiry, as the TTL monitor does
   * Returns the number of deleted records
   */
  sweepExpired(now: Date = new Date()): number {
    let deleted = 0;

    for (const { records, expiryIndex } of this.collections.values()) {
      if (!expiryIndex) continue;

      const cutoff = now.getTime() - expiryIndex.expireAfterSeconds * 1000;
      for (const [id, entry] of records) {
        if (entry.record.expiresAt.getTime() <= cutoff) {
          records.delete(id);
          deleted++;
        }
      }
    }

    return deleted;
  }

  /**
   * Ids currently stored in a collection, ignoring expiry
   */
  listIds(collection: string): string[] {
    return [...(this.collections.get(collection)?.records.keys() ?? [])];
  }

  /**
   * Collection names and their expiry index, if any
   */
  describe(): Record<string, ExpiryIndexOptions | null> {
    const description: Record<string, ExpiryIndexOptions | null> = {};
    for (const [name, { expiryIndex }] of this.collections) {
      description[name] = expiryIndex ? { ...expiryIndex } : null;
    }
    return description;
  }

  private collection(name: string): MemoryCollection {
    let collection = this.collections.get(name);
    if (!collection) {
      collection = { records: new Map() };
      this.collections.set(name, collection);
    }
    return collection;
  }

  private insert(collection: string, entry: StoredRecord, session?: MemoryTransaction): void {
    const id = entry.record.id;
    const taken =
      this.collections.get(collection)?.records.has(id) ||
      session?.writes.some((write) => write.collection === collection && write.entry.record.id === id);

    if (taken) {
      throw new DuplicateRecordError(collection);
    }

    if (session) {
      session.writes.push({ collection, entry });
    } else {
      this.collection(collection).records.set(id, entry);
    }
  }

  private startTtlMonitor(): void {
    if (this.ttlMonitor) return;
    this.ttlMonitor = setInterval(() => this.sweepExpired(), this.ttlMonitorIntervalMs);
    this.ttlMonitor.unref();
  }
}
