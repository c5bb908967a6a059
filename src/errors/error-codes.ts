/**
 * Grant store error codes
 *
 * Input errors are raised before any I/O is attempted.
 * Codec errors wrap a failure to encode or decode a stored payload.
 */

// Input errors
export const ERROR_INVALID_KEY = 'invalid_key' as const;
export const ERROR_INVALID_GRANT = 'invalid_grant' as const;

// Codec errors
export const ERROR_ENCODE_FAILED = 'encode_failed' as const;
export const ERROR_DECODE_FAILED = 'decode_failed' as const;

/**
 * All grant store error codes
 */
export type TokenStoreErrorCode =
  | typeof ERROR_INVALID_KEY
  | typeof ERROR_INVALID_GRANT
  | typeof ERROR_ENCODE_FAILED
  | typeof ERROR_DECODE_FAILED;

/**
 * HTTP status codes used when an error reaches the admin API
 */
export const ERROR_STATUS_CODES: Record<TokenStoreErrorCode, 400 | 500> = {
  [ERROR_INVALID_KEY]: 400,
  [ERROR_INVALID_GRANT]: 400,
  [ERROR_ENCODE_FAILED]: 500,
  [ERROR_DECODE_FAILED]: 500,
};

/**
 * Default error descriptions
 */
export const ERROR_DESCRIPTIONS: Record<TokenStoreErrorCode, string> = {
  [ERROR_INVALID_KEY]: 'The token key does not match the key format required by the store.',
  [ERROR_INVALID_GRANT]: 'The grant is missing the fields required to store it.',
  [ERROR_ENCODE_FAILED]: 'The grant could not be encoded for storage.',
  [ERROR_DECODE_FAILED]: 'The stored grant payload could not be decoded.',
};

/**
 * Input errors are the caller's fault; everything else is a storage failure
 */
export function isInputErrorCode(code: TokenStoreErrorCode): boolean {
  return code === ERROR_INVALID_KEY || code === ERROR_INVALID_GRANT;
}
