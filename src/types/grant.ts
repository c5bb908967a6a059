/**
 * A single OAuth 2.0 issuance: either an authorization code, or an
 * access token with an optional refresh token.
 *
 * Lifetimes are in seconds.
 */
export interface TokenGrant {
  readonly clientId: string;
  readonly userId: string;
  readonly redirectUri?: string;
  readonly scope?: string;

  // Authorization code
  readonly code?: string;
  readonly codeCreatedAt?: Date;
  readonly codeExpiresIn?: number;

  // Access token
  readonly access?: string;
  readonly accessCreatedAt?: Date;
  readonly accessExpiresIn?: number;

  // Refresh token
  readonly refresh?: string;
  readonly refreshCreatedAt?: Date;
  readonly refreshExpiresIn?: number;
}

export const GRANT_KEY_KINDS = ['code', 'access', 'refresh'] as const;

/**
 * Which key a grant is looked up or removed by
 */
export type GrantKeyKind = (typeof GRANT_KEY_KINDS)[number];
