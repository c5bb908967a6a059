import { expect } from 'vitest';
import type { TokenGrant } from '../types/grant.js';
import { TokenStoreError } from '../errors/token-store-error.js';
import type { TokenStoreErrorCode } from '../errors/error-codes.js';
import type { GrantStore } from '../services/grant-store.js';
import {
  createMemoryGrantStore,
  type MemoryGrantRecordStorage,
  type MemoryGrantStoreOptions,
  type MemoryTransaction,
} from '../storage/memory/index.js';

/**
 * Test fixtures and helpers
 */

export const T0 = new Date('2026-01-15T10:00:00.000Z');

export function secondsAfter(start: Date, seconds: number): Date {
  return new Date(start.getTime() + seconds * 1000);
}

/**
 * Manually advanced clock handed to the store
 */
export class TestClock {
  private current: Date;

  constructor(start: Date = T0) {
    this.current = new Date(start.getTime());
  }

  now = (): Date => new Date(this.current.getTime());

  advance(seconds: number): void {
    this.current = secondsAfter(this.current, seconds);
  }
}

export function codeGrant(overrides: Partial<TokenGrant> = {}): TokenGrant {
  return {
    clientId: 'client-1',
    userId: 'user-1',
    redirectUri: 'http://localhost/callback',
    scope: 'all',
    code: 'abc123',
    codeCreatedAt: T0,
    codeExpiresIn: 5,
    ...overrides,
  };
}

export function tokenGrant(overrides: Partial<TokenGrant> = {}): TokenGrant {
  return {
    clientId: 'client-1',
    userId: 'user-2',
    redirectUri: 'http://localhost/callback',
    scope: 'all',
    access: 'access-1',
    accessCreatedAt: T0,
    accessExpiresIn: 5,
    refresh: 'refresh-1',
    refreshCreatedAt: T0,
    refreshExpiresIn: 15,
    ...overrides,
  };
}

/**
 * An access-only grant, without refresh token fields
 */
export function accessOnlyGrant(overrides: Partial<TokenGrant> = {}): TokenGrant {
  return {
    clientId: 'client-1',
    userId: 'user-3',
    access: 'access-only',
    accessCreatedAt: T0,
    accessExpiresIn: 5,
    ...overrides,
  };
}

// Shared test context
export interface TestContext {
  store: GrantStore<MemoryTransaction>;
  records: MemoryGrantRecordStorage;
  clock: TestClock;
}

export async function setupTestContext(options: MemoryGrantStoreOptions = {}): Promise<TestContext> {
  const clock = new TestClock();
  const { store, records } = await createMemoryGrantStore({ clock: clock.now, ...options });
  return { store, records, clock };
}

export async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error('Expected promise to reject');
}

export async function expectStoreError(
  promise: Promise<unknown>,
  code: TokenStoreErrorCode
): Promise<TokenStoreError> {
  const err = await captureError(promise);
  expect(err).toBeInstanceOf(TokenStoreError);
  if (!(err instanceof TokenStoreError)) {
    throw err;
  }
  expect(err.code).toBe(code);
  return err;
}
