import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { IGrantStorage } from '../storage/interfaces/grant-storage.js';
import { GRANT_KEY_KINDS, type GrantKeyKind, type TokenGrant } from '../types/grant.js';
import { grantJsonSchema, serializeGrant } from '../codec/grant-codec.js';

const keyParamsSchema = z.object({
  kind: z.enum(GRANT_KEY_KINDS),
  key: z.string().min(1),
});

export interface GrantRoutesOptions {
  store: IGrantStorage;
}

/**
 * Grant routes
 * Mount at /grants
 */
export function createGrantRoutes(options: GrantRoutesOptions) {
  const { store } = options;
  const app = new Hono();

  const lookups: Record<GrantKeyKind, (key: string) => Promise<TokenGrant | null>> = {
    code: (key) => store.getByCode(key),
    access: (key) => store.getByAccess(key),
    refresh: (key) => store.getByRefresh(key),
  };

  const removals: Record<GrantKeyKind, (key: string) => Promise<void>> = {
    code: (key) => store.removeByCode(key),
    access: (key) => store.removeByAccess(key),
    refresh: (key) => store.removeByRefresh(key),
  };

  // Validation failures go through the global error handler
  const throwOnInvalid = (result: { success: boolean; error?: z.ZodError }) => {
    if (!result.success && result.error) {
      throw result.error;
    }
  };

  // Store a grant
  app.post('/', zValidator('json', grantJsonSchema, throwOnInvalid), async (c) => {
    await store.create(c.req.valid('json'));
    return c.json({ status: 'created' }, 201);
  });

  // Look up a grant by code, access token or refresh token
  app.get('/:kind/:key', zValidator('param', keyParamsSchema, throwOnInvalid), async (c) => {
    const { kind, key } = c.req.valid('param');
    const grant = await lookups[kind](key);

    if (!grant) {
      return c.json({ error: 'not_found', message: 'Grant not found' }, 404);
    }

    return c.json(serializeGrant(grant));
  });

  // Remove a code, access token or refresh token
  app.delete('/:kind/:key', zValidator('param', keyParamsSchema, throwOnInvalid), async (c) => {
    const { kind, key } = c.req.valid('param');
    await removals[kind](key);
    return c.body(null, 204);
  });

  return app;
}
