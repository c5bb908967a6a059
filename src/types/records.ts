/**
 * Canonical stored form of a grant.
 * For code grants `id` is the code itself; otherwise it is generated by the store.
 */
export interface BasicRecord {
  id: string;
  payload: Buffer;
  expiresAt: Date;
}

/**
 * Maps an access or refresh token to the basic record that owns it.
 * `basicId` may outlive its target; readers treat that as "no grant".
 */
export interface IndexRecord {
  id: string;
  basicId: string;
  expiresAt: Date;
}

/**
 * Physical collection names
 */
export interface CollectionNames {
  /** Reserved for transaction bookkeeping, not written by the store */
  transaction: string;
  basic: string;
  access: string;
  refresh: string;
}
