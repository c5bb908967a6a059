import type { TokenGrant } from '../../types/grant.js';

/**
 * Per-call options
 */
export interface OperationOptions {
  /**
   * Aborting rejects the call with the signal's reason.
   * A write aborted mid-transaction leaves no records behind.
   */
  signal?: AbortSignal;
}

/**
 * Storage interface for OAuth 2.0 grants
 */
export interface IGrantStorage {
  /**
   * Store a new grant
   * Code grants are written as one record, access/refresh grants atomically as two or three
   */
  create(grant: TokenGrant, options?: OperationOptions): Promise<void>;

  /**
   * Find a grant by authorization code
   */
  getByCode(code: string, options?: OperationOptions): Promise<TokenGrant | null>;

  /**
   * Find a grant by access token
   */
  getByAccess(access: string, options?: OperationOptions): Promise<TokenGrant | null>;

  /**
   * Find a grant by refresh token
   */
  getByRefresh(refresh: string, options?: OperationOptions): Promise<TokenGrant | null>;

  /**
   * Remove an authorization code (no-op if absent)
   */
  removeByCode(code: string, options?: OperationOptions): Promise<void>;

  /**
   * Remove an access token (no-op if absent)
   */
  removeByAccess(access: string, options?: OperationOptions): Promise<void>;

  /**
   * Remove a refresh token (no-op if absent)
   */
  removeByRefresh(refresh: string, options?: OperationOptions): Promise<void>;

  /**
   * Close the underlying connection
   */
  close(): Promise<void>;
}
