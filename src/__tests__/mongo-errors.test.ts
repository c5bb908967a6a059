import { describe, it, expect } from 'vitest';
import { mongo } from 'mongoose';
import {
  isNamespaceExistsError,
  isIndexOptionsConflictError,
  isDuplicateKeyError,
} from '../storage/mongo/errors.js';

function serverError(code: number, codeName: string): mongo.MongoServerError {
  return new mongo.MongoServerError({ message: codeName, code, codeName });
}

describe('mongo error classification', () => {
  it('should recognise server error codes', () => {
    expect(isNamespaceExistsError(serverError(48, 'NamespaceExists'))).toBe(true);
    expect(isIndexOptionsConflictError(serverError(85, 'IndexOptionsConflict'))).toBe(true);
    expect(isDuplicateKeyError(serverError(11000, 'DuplicateKey'))).toBe(true);
  });

  it('should not confuse one code for another', () => {
    expect(isNamespaceExistsError(serverError(85, 'IndexOptionsConflict'))).toBe(false);
    expect(isDuplicateKeyError(serverError(48, 'NamespaceExists'))).toBe(false);
  });

  it('should ignore errors that did not come from the server', () => {
    const plain = Object.assign(new Error('duplicate'), { code: 11000 });

    expect(isDuplicateKeyError(plain)).toBe(false);
    expect(isNamespaceExistsError('NamespaceExists')).toBe(false);
  });
});
