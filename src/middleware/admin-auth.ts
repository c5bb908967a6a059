import type { MiddlewareHandler } from 'hono';
import { HEADER_API_KEY, HEADER_AUTHORIZATION } from '../config/constants.js';

export interface AdminAuthOptions {
  apiKey?: string;
  headerName?: string;
}

/**
 * Admin API authentication middleware
 * Validates API key from header
 */
export function adminAuth(options: AdminAuthOptions = {}): MiddlewareHandler {
  const { apiKey, headerName = HEADER_API_KEY } = options;

  return async (c, next) => {
    // If no API key is configured, allow all requests (development mode)
    if (!apiKey) {
      return next();
    }

    const providedKey =
      c.req.header(headerName) || c.req.header(HEADER_AUTHORIZATION)?.replace('Bearer ', '');

    if (!providedKey) {
      return c.json({ error: 'unauthorized', message: 'API key required' }, 401);
    }

    if (providedKey !== apiKey) {
      return c.json({ error: 'forbidden', message: 'Invalid API key' }, 403);
    }

    return next();
  };
}
