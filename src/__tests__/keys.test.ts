import { describe, it, expect } from 'vitest';
import { createKeyCodec } from '../storage/keys.js';
import { TokenStoreError } from '../errors/token-store-error.js';

describe('key codec', () => {
  describe('opaque', () => {
    const keys = createKeyCodec('opaque');

    it('should store keys as given', () => {
      expect(keys.encode('access', 'Some Token/with+chars')).toBe('Some Token/with+chars');
    });

    it('should reject an empty key', () => {
      expect(() => keys.encode('refresh', '')).toThrow('The refresh key must not be empty');
      expect(() => keys.encode('refresh', '')).toThrow(TokenStoreError);
    });

    it('should generate url-safe random ids', () => {
      const first = keys.generateId();
      const second = keys.generateId();

      expect(first).toMatch(/^[A-Za-z0-9_-]{22}$/);
      expect(second).not.toBe(first);
    });
  });

  describe('objectId', () => {
    const keys = createKeyCodec('objectId');

    it('should lower-case valid keys', () => {
      expect(keys.encode('code', '507F1F77BCF86CD799439011')).toBe('507f1f77bcf86cd799439011');
    });

    it('should reject keys that are not 24 hex characters', () => {
      expect(() => keys.encode('code', 'abc123')).toThrow('The code key must be a 24 character hex string');
      expect(() => keys.encode('code', '507f1f77bcf86cd79943901z')).toThrow(TokenStoreError);
      expect(() => keys.encode('code', '')).toThrow(TokenStoreError);
    });

    it('should generate ids that are valid objectId keys', () => {
      const id = keys.generateId();

      expect(id).toMatch(/^[0-9a-f]{24}$/);
      expect(keys.encode('access', id)).toBe(id);
    });
  });
});
