import { z } from 'zod';
import type { TokenGrant } from '../types/grant.js';
import { TokenStoreError } from '../errors/token-store-error.js';

const timestamp = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

const lifetime = z.number().finite().nonnegative();

/**
 * JSON shape of a grant: ISO-8601 timestamps, lifetimes in seconds.
 * Used both for stored payloads and for admin API request bodies.
 */
export const grantJsonSchema = z.object({
  clientId: z.string(),
  userId: z.string(),
  redirectUri: z.string().optional(),
  scope: z.string().optional(),
  code: z.string().optional(),
  codeCreatedAt: timestamp.optional(),
  codeExpiresIn: lifetime.optional(),
  access: z.string().optional(),
  accessCreatedAt: timestamp.optional(),
  accessExpiresIn: lifetime.optional(),
  refresh: z.string().optional(),
  refreshCreatedAt: timestamp.optional(),
  refreshExpiresIn: lifetime.optional(),
});

export type GrantJson = z.input<typeof grantJsonSchema>;

/**
 * Convert a grant to its JSON shape.
 * Throws RangeError on an invalid Date.
 */
export function serializeGrant(grant: TokenGrant): GrantJson {
  return {
    clientId: grant.clientId,
    userId: grant.userId,
    redirectUri: grant.redirectUri,
    scope: grant.scope,
    code: grant.code,
    codeCreatedAt: grant.codeCreatedAt?.toISOString(),
    codeExpiresIn: grant.codeExpiresIn,
    access: grant.access,
    accessCreatedAt: grant.accessCreatedAt?.toISOString(),
    accessExpiresIn: grant.accessExpiresIn,
    refresh: grant.refresh,
    refreshCreatedAt: grant.refreshCreatedAt?.toISOString(),
    refreshExpiresIn: grant.refreshExpiresIn,
  };
}

/**
 * Validate a JSON value as a grant.
 * Keys absent from the input stay absent in the result.
 */
export function parseGrant(json: unknown): TokenGrant {
  return grantJsonSchema.parse(json);
}

/**
 * Encode a grant to the bytes stored in a basic record
 */
export function encodeGrant(grant: TokenGrant): Buffer {
  try {
    return Buffer.from(JSON.stringify(serializeGrant(grant)), 'utf8');
  } catch (err) {
    throw TokenStoreError.encodeFailed(err);
  }
}

/**
 * Decode the bytes of a basic record back into a grant
 */
export function decodeGrant(payload: Uint8Array): TokenGrant {
  try {
    const json: unknown = JSON.parse(Buffer.from(payload).toString('utf8'));
    return parseGrant(json);
  } catch (err) {
    throw TokenStoreError.decodeFailed(err);
  }
}
