import type { TokenGrant } from '../types/grant.js';
import type { CollectionNames } from '../types/records.js';
import type { IGrantStorage, OperationOptions } from '../storage/interfaces/grant-storage.js';
import type { IGrantRecordStorage } from '../storage/interfaces/grant-record-storage.js';
import { createKeyCodec, type KeyCodec } from '../storage/keys.js';
import { encodeGrant, decodeGrant } from '../codec/grant-codec.js';
import { codeRecordExpiry, tokenRecordExpiry } from './grant-expiry.js';
import { TokenStoreError } from '../errors/token-store-error.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import {
  type TokenKeyFormat,
  DEFAULT_COLLECTION_NAMES,
  DEFAULT_EXPIRY_INDEX_DELAY_SECONDS,
  EXPIRY_INDEX_NAME,
  KEY_FORMAT_OPAQUE,
} from '../config/constants.js';

/**
 * Lifetimes may be fractional but must be finite and not negative
 */
function assertLifetime(field: string, seconds: number): void {
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw TokenStoreError.invalidGrant(`${field} must be a non-negative number of seconds`);
  }
}

export interface GrantStoreOptions<TSession> {
  records: IGrantRecordStorage<TSession>;
  collections?: Partial<CollectionNames>;
  keyFormat?: TokenKeyFormat;
  /**
   * Seconds the database waits past `expiresAt` before deleting a record
   */
  expiryIndexDelaySeconds?: number;
  logger?: Logger;
  clock?: () => Date;
}

/**
 * Grant store over any record storage
 *
 * A code grant is one basic record keyed by the code. An access/refresh
 * grant is a basic record under a generated id plus one index record per
 * token, written in a single transaction.
 */
export class GrantStore<TSession> implements IGrantStorage {
  readonly collections: CollectionNames;
  private readonly records: IGrantRecordStorage<TSession>;
  private readonly keys: KeyCodec;
  private readonly expiryIndexDelaySeconds: number;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(options: GrantStoreOptions<TSession>) {
    this.records = options.records;
    this.collections = { ...DEFAULT_COLLECTION_NAMES, ...options.collections };
    this.keys = createKeyCodec(options.keyFormat ?? KEY_FORMAT_OPAQUE);
    this.expiryIndexDelaySeconds = options.expiryIndexDelaySeconds ?? DEFAULT_EXPIRY_INDEX_DELAY_SECONDS;
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Ensure the basic, access and refresh collections exist with their expiry index
   */
  async initialize(options?: OperationOptions): Promise<void> {
    const { basic, access, refresh } = this.collections;

    for (const collection of [basic, access, refresh]) {
      options?.signal?.throwIfAborted();
      await this.records.ensureCollection(collection);
      await this.records.ensureExpiryIndex(collection, {
        name: EXPIRY_INDEX_NAME,
        expireAfterSeconds: this.expiryIndexDelaySeconds,
      });
    }

    this.logger.info('Grant store initialized', {
      collections: [basic, access, refresh],
      keyFormat: this.keys.format,
      expireAfterSeconds: this.expiryIndexDelaySeconds,
    });
  }

  async create(grant: TokenGrant, options?: OperationOptions): Promise<void> {
    if (grant.code) {
      return this.createCodeGrant(grant, grant.code, options);
    }
    return this.createTokenGrant(grant, options);
  }

  private async createCodeGrant(grant: TokenGrant, code: string, options?: OperationOptions): Promise<void> {
    const id = this.keys.encode('code', code);
    if (!grant.codeCreatedAt || grant.codeExpiresIn === undefined) {
      throw TokenStoreError.invalidGrant('An authorization code requires codeCreatedAt and codeExpiresIn');
    }
    assertLifetime('codeExpiresIn', grant.codeExpiresIn);

    const payload = encodeGrant(grant);
    options?.signal?.throwIfAborted();

    await this.records.insertBasic(this.collections.basic, {
      id,
      payload,
      expiresAt: codeRecordExpiry(grant.codeCreatedAt, grant.codeExpiresIn),
    });

    this.logger.debug('Stored authorization code grant', { clientId: grant.clientId });
  }

  private async createTokenGrant(grant: TokenGrant, options?: OperationOptions): Promise<void> {
    if (!grant.access) {
      throw TokenStoreError.invalidGrant('A grant requires either a code or an access token');
    }
    if (!grant.accessCreatedAt || grant.accessExpiresIn === undefined) {
      throw TokenStoreError.invalidGrant('An access token requires accessCreatedAt and accessExpiresIn');
    }
    assertLifetime('accessExpiresIn', grant.accessExpiresIn);

    const accessId = this.keys.encode('access', grant.access);
    let refreshId: string | undefined;
    let refreshTiming: { createdAt: Date; expiresIn: number } | undefined;

    if (grant.refresh) {
      if (!grant.refreshCreatedAt || grant.refreshExpiresIn === undefined) {
        throw TokenStoreError.invalidGrant('A refresh token requires refreshCreatedAt and refreshExpiresIn');
      }
      assertLifetime('refreshExpiresIn', grant.refreshExpiresIn);
      refreshId = this.keys.encode('refresh', grant.refresh);
      refreshTiming = { createdAt: grant.refreshCreatedAt, expiresIn: grant.refreshExpiresIn };
    }

    const expiry = tokenRecordExpiry(
      { createdAt: grant.accessCreatedAt, expiresIn: grant.accessExpiresIn },
      refreshTiming
    );
    const payload = encodeGrant(grant);
    const basicId = this.keys.generateId();
    const signal = options?.signal;

    signal?.throwIfAborted();

    await this.records.runInTransaction(async (session) => {
      await this.records.insertBasic(
        this.collections.basic,
        { id: basicId, payload, expiresAt: expiry.basic },
        session
      );

      signal?.throwIfAborted();
      await this.records.insertIndex(
        this.collections.access,
        { id: accessId, basicId, expiresAt: expiry.access },
        session
      );

      if (refreshId !== undefined && expiry.refresh) {
        signal?.throwIfAborted();
        await this.records.insertIndex(
          this.collections.refresh,
          { id: refreshId, basicId, expiresAt: expiry.refresh },
          session
        );
      }

      // Last chance to back out before commit
      signal?.throwIfAborted();
    });

    this.logger.debug('Stored token grant', {
      clientId: grant.clientId,
      withRefresh: refreshId !== undefined,
    });
  }

  async getByCode(code: string, options?: OperationOptions): Promise<TokenGrant | null> {
    const id = this.keys.encode('code', code);
    return this.getBasic(id, options);
  }

  async getByAccess(access: string, options?: OperationOptions): Promise<TokenGrant | null> {
    const id = this.keys.encode('access', access);
    return this.getThroughIndex(this.collections.access, id, options);
  }

  async getByRefresh(refresh: string, options?: OperationOptions): Promise<TokenGrant | null> {
    const id = this.keys.encode('refresh', refresh);
    return this.getThroughIndex(this.collections.refresh, id, options);
  }

  private async getThroughIndex(
    collection: string,
    id: string,
    options?: OperationOptions
  ): Promise<TokenGrant | null> {
    options?.signal?.throwIfAborted();
    const index = await this.records.findIndex(collection, id, this.clock());
    if (!index) {
      return null;
    }

    const grant = await this.getBasic(index.basicId, options);
    if (!grant) {
      // The basic record expired or was removed under a live index
      this.logger.debug('Index record references a missing basic record', { collection });
    }
    return grant;
  }

  private async getBasic(id: string, options?: OperationOptions): Promise<TokenGrant | null> {
    options?.signal?.throwIfAborted();
    const record = await this.records.findBasic(this.collections.basic, id, this.clock());
    return record ? decodeGrant(record.payload) : null;
  }

  async removeByCode(code: string, options?: OperationOptions): Promise<void> {
    await this.remove(this.collections.basic, this.keys.encode('code', code), options);
  }

  async removeByAccess(access: string, options?: OperationOptions): Promise<void> {
    await this.remove(this.collections.access, this.keys.encode('access', access), options);
  }

  async removeByRefresh(refresh: string, options?: OperationOptions): Promise<void> {
    await this.remove(this.collections.refresh, this.keys.encode('refresh', refresh), options);
  }

  private async remove(collection: string, id: string, options?: OperationOptions): Promise<void> {
    options?.signal?.throwIfAborted();
    const deleted = await this.records.deleteById(collection, id);
    this.logger.debug('Removed grant record', { collection, deleted });
  }

  async close(): Promise<void> {
    await this.records.close();
  }
}

/**
 * Create a grant store and initialize its collections.
 * Rejects if the collections or their expiry indexes cannot be set up.
 */
export async function createGrantStore<TSession>(
  options: GrantStoreOptions<TSession>
): Promise<GrantStore<TSession>> {
  const store = new GrantStore(options);
  await store.initialize();
  return store;
}
