import {
  type TokenStoreErrorCode,
  ERROR_STATUS_CODES,
  ERROR_DESCRIPTIONS,
  ERROR_INVALID_KEY,
  ERROR_INVALID_GRANT,
  ERROR_ENCODE_FAILED,
  ERROR_DECODE_FAILED,
  isInputErrorCode,
} from './error-codes.js';

/**
 * JSON body returned by the admin API for store errors
 */
export interface TokenStoreErrorResponse {
  error: TokenStoreErrorCode;
  error_description?: string;
}

/**
 * Error raised by the grant store itself.
 * Driver errors are not wrapped and reach the caller unchanged.
 */
export class TokenStoreError extends Error {
  public readonly code: TokenStoreErrorCode;
  public readonly statusCode: 400 | 500;
  public readonly description: string;

  constructor(code: TokenStoreErrorCode, description?: string, options?: { cause?: unknown }) {
    const desc = description ?? ERROR_DESCRIPTIONS[code];
    super(desc);
    this.name = 'TokenStoreError';
    this.code = code;
    this.statusCode = ERROR_STATUS_CODES[code];
    this.description = desc;

    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Whether the operation was rejected before touching the database
   */
  get isInputError(): boolean {
    return isInputErrorCode(this.code);
  }

  toJSON(): TokenStoreErrorResponse {
    const response: TokenStoreErrorResponse = {
      error: this.code,
    };

    if (this.description) {
      response.error_description = this.description;
    }

    return response;
  }

  // Factory methods

  static invalidKey(description?: string): TokenStoreError {
    return new TokenStoreError(ERROR_INVALID_KEY, description);
  }

  static invalidGrant(description?: string): TokenStoreError {
    return new TokenStoreError(ERROR_INVALID_GRANT, description);
  }

  static encodeFailed(cause: unknown): TokenStoreError {
    return new TokenStoreError(ERROR_ENCODE_FAILED, undefined, { cause });
  }

  static decodeFailed(cause: unknown): TokenStoreError {
    return new TokenStoreError(ERROR_DECODE_FAILED, undefined, { cause });
  }
}
