/**
 * Expiry computation for stored grants
 */

/**
 * Add a lifetime in seconds to a timestamp
 */
export function addSeconds(date: Date, seconds: number): Date {
  return new Date(date.getTime() + seconds * 1000);
}

/**
 * When each record of an access/refresh grant expires
 */
export interface TokenRecordExpiry {
  basic: Date;
  access: Date;
  refresh?: Date;
}

/**
 * Expiry of the single record written for an authorization code
 */
export function codeRecordExpiry(codeCreatedAt: Date, codeExpiresIn: number): Date {
  return addSeconds(codeCreatedAt, codeExpiresIn);
}

/**
 * Expiries for an access token and its optional refresh token.
 *
 * The access index never outlives the refresh token it was issued with,
 * so the basic record lives exactly as long as the refresh index.
 * Instants are compared at millisecond precision.
 */
export function tokenRecordExpiry(
  access: { createdAt: Date; expiresIn: number },
  refresh?: { createdAt: Date; expiresIn: number }
): TokenRecordExpiry {
  const accessExpiry = addSeconds(access.createdAt, access.expiresIn);

  if (!refresh) {
    return { basic: accessExpiry, access: accessExpiry };
  }

  const refreshExpiry = addSeconds(refresh.createdAt, refresh.expiresIn);

  return {
    basic: refreshExpiry,
    access: accessExpiry.getTime() > refreshExpiry.getTime() ? refreshExpiry : accessExpiry,
    refresh: refreshExpiry,
  };
}
