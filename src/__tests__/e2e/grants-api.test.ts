import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Hono } from 'hono';
import { createGrantServer } from '../../app.js';
import { redactPath } from '../../middleware/error-handler.js';
import { serializeGrant } from '../../codec/grant-codec.js';
import { silentLogger } from '../../logging/logger.js';
import type { TokenGrant } from '../../types/grant.js';
import {
  setupTestContext,
  codeGrant,
  tokenGrant,
  secondsAfter,
  T0,
  type TestContext,
} from '../test-setup.js';

const API_KEY = 'test-secret';

function grantBody(grant: TokenGrant): unknown {
  return JSON.parse(JSON.stringify(serializeGrant(grant)));
}

describe('Grant admin API', () => {
  let ctx: TestContext;
  let app: Hono;

  const request = (path: string, init: { method?: string; body?: string } = {}) =>
    app.request(path, {
      ...init,
      headers: {
        'Content-Type': 'application/json',
        'X-API-Key': API_KEY,
      },
    });

  const post = (body: unknown) => request('/grants', { method: 'POST', body: JSON.stringify(body) });

  beforeEach(async () => {
    ctx = await setupTestContext();
    app = createGrantServer({
      store: ctx.store,
      auth: { apiKey: API_KEY },
      enableLogging: false,
      logger: silentLogger,
    });
  });

  afterEach(async () => {
    await ctx.store.close();
  });

  describe('health and auth', () => {
    it('should report health without an API key', async () => {
      const res = await app.request('/health');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ status: 'ok' });
    });

    it('should require an API key for grant routes', async () => {
      const res = await app.request('/grants/code/abc123');

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({ error: 'unauthorized', message: 'API key required' });
    });

    it('should reject a wrong API key', async () => {
      const res = await app.request('/grants/code/abc123', { headers: { 'X-API-Key': 'wrong' } });

      expect(res.status).toBe(403);
      expect(await res.json()).toEqual({ error: 'forbidden', message: 'Invalid API key' });
    });

    it('should accept the API key as a bearer token', async () => {
      const res = await app.request('/grants/code/abc123', {
        headers: { Authorization: `Bearer ${API_KEY}` },
      });

      expect(res.status).toBe(404);
    });

    it('should return 404 for unknown routes', async () => {
      const res = await request('/nope');

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: 'not_found', message: 'Route not found' });
    });
  });

  describe('POST /grants', () => {
    it('should store a code grant', async () => {
      const res = await post(grantBody(codeGrant()));

      expect(res.status).toBe(201);
      expect(await res.json()).toEqual({ status: 'created' });
      expect(ctx.records.listIds('oauth2_basic')).toEqual(['abc123']);
    });

    it('should store a token grant with both index records', async () => {
      const res = await post(grantBody(tokenGrant()));

      expect(res.status).toBe(201);
      expect(ctx.records.listIds('oauth2_access')).toEqual(['access-1']);
      expect(ctx.records.listIds('oauth2_refresh')).toEqual(['refresh-1']);
    });

    it('should reject a body that is not a grant', async () => {
      const res = await post({ clientId: 'client-1' });

      expect(res.status).toBe(400);
      expect(res.headers.get('Cache-Control')).toBe('no-store');
      expect(await res.json()).toEqual({ error: 'invalid_request', error_description: 'Required' });
    });

    it('should reject a grant with neither code nor access token', async () => {
      const res = await post({ clientId: 'client-1', userId: 'user-1' });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: 'invalid_grant',
        error_description: 'A grant requires either a code or an access token',
      });
    });

    it('should answer 409 when the code is already stored', async () => {
      await post(grantBody(codeGrant()));
      const res = await post(grantBody(codeGrant({ userId: 'user-9' })));

      expect(res.status).toBe(409);
      expect(await res.json()).toEqual({
        error: 'conflict',
        error_description: 'A record with this key already exists',
      });
    });
  });

  describe('GET /grants/:kind/:key', () => {
    it('should return a stored code grant', async () => {
      await post(grantBody(codeGrant()));

      const res = await request('/grants/code/abc123');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual(grantBody(codeGrant()));
    });

    it('should look up token grants through both tokens', async () => {
      await post(grantBody(tokenGrant()));

      const byAccess = await request('/grants/access/access-1');
      const byRefresh = await request('/grants/refresh/refresh-1');

      expect(await byAccess.json()).toEqual(grantBody(tokenGrant()));
      expect(await byRefresh.json()).toEqual(grantBody(tokenGrant()));
    });

    it('should return 404 for an unknown key', async () => {
      const res = await request('/grants/access/missing');

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: 'not_found', message: 'Grant not found' });
    });

    it('should return 404 once the grant has expired', async () => {
      await post(grantBody(codeGrant()));
      ctx.clock.advance(6);

      const res = await request('/grants/code/abc123');
      expect(res.status).toBe(404);
    });

    it('should reject an unknown key kind', async () => {
      const res = await request('/grants/token/abc123');

      expect(res.status).toBe(400);
      const body: unknown = await res.json();
      expect(body).toMatchObject({ error: 'invalid_request' });
    });

    it('should answer 500 for a payload that cannot be decoded', async () => {
      await ctx.records.insertBasic('oauth2_basic', {
        id: 'broken',
        payload: Buffer.from('not json', 'utf8'),
        expiresAt: secondsAfter(T0, 60),
      });

      const res = await request('/grants/code/broken');

      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({
        error: 'decode_failed',
        error_description: 'The stored grant payload could not be decoded.',
      });
    });
  });

  describe('DELETE /grants/:kind/:key', () => {
    it('should remove a code and stay idempotent', async () => {
      await post(grantBody(codeGrant()));

      const first = await request('/grants/code/abc123', { method: 'DELETE' });
      expect(first.status).toBe(204);

      const lookup = await request('/grants/code/abc123');
      expect(lookup.status).toBe(404);

      const second = await request('/grants/code/abc123', { method: 'DELETE' });
      expect(second.status).toBe(204);
    });

    it('should remove only the access index of a token grant', async () => {
      await post(grantBody(tokenGrant()));

      await request('/grants/access/access-1', { method: 'DELETE' });

      expect((await request('/grants/access/access-1')).status).toBe(404);
      expect((await request('/grants/refresh/refresh-1')).status).toBe(200);
    });
  });

  describe('objectId keys', () => {
    it('should reject malformed keys with invalid_key', async () => {
      const objectIdCtx = await setupTestContext({ keyFormat: 'objectId' });
      const objectIdApp = createGrantServer({
        store: objectIdCtx.store,
        enableLogging: false,
        logger: silentLogger,
      });

      const res = await objectIdApp.request('/grants/code/abc123');

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: 'invalid_key',
        error_description: 'The code key must be a 24 character hex string',
      });
      await objectIdCtx.store.close();
    });
  });

  describe('request log paths', () => {
    it('should hide token keys', () => {
      expect(redactPath('/grants/refresh/refresh-1')).toBe('/grants/refresh/:key');
      expect(redactPath('/grants')).toBe('/grants');
      expect(redactPath('/health')).toBe('/health');
    });
  });
});
