import type { ErrorHandler, MiddlewareHandler } from 'hono';
import { ZodError } from 'zod';
import { TokenStoreError } from '../errors/token-store-error.js';
import { DuplicateRecordError } from '../storage/memory/grant-record-storage.js';
import { isDuplicateKeyError } from '../storage/mongo/errors.js';
import { HEADER_CACHE_CONTROL, NO_STORE } from '../config/constants.js';
import type { Logger } from '../logging/logger.js';

/**
 * Global error handler for the admin API
 *
 * Store errors keep their status; duplicate ids become 409.
 */
export function grantErrorHandler(logger: Logger): ErrorHandler {
  return (err, c) => {
    c.header(HEADER_CACHE_CONTROL, NO_STORE);

    if (err instanceof TokenStoreError) {
      if (!err.isInputError) {
        logger.error('Grant store error', { code: err.code });
      }
      return c.json(err.toJSON(), err.statusCode);
    }

    if (err instanceof ZodError) {
      const messages = err.errors.map((e) => e.message).join(', ');
      return c.json({ error: 'invalid_request', error_description: messages }, 400);
    }

    if (err instanceof DuplicateRecordError || isDuplicateKeyError(err)) {
      return c.json({ error: 'conflict', error_description: 'A record with this key already exists' }, 409);
    }

    logger.error('Unhandled error', { error: err.message });

    return c.json(
      {
        error: 'server_error',
        error_description:
          process.env['NODE_ENV'] === 'production' ? 'An unexpected error occurred' : err.message,
      },
      500
    );
  };
}

const KEY_SEGMENT = /^(.*\/grants\/(?:code|access|refresh)\/)[^/]+$/;

/**
 * Replace the token in a grant lookup path with `:key`
 */
export function redactPath(path: string): string {
  return path.replace(KEY_SEGMENT, '$1:key');
}

/**
 * Request logging middleware
 */
export function requestLogger(logger: Logger): MiddlewareHandler {
  return async (c, next) => {
    const start = Date.now();
    const method = c.req.method;
    const path = redactPath(c.req.path);

    await next();

    logger.info('request', {
      method,
      path,
      status: c.res.status,
      duration: Date.now() - start,
    });
  };
}
