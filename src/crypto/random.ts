import { randomBytes } from 'node:crypto';
import { GENERATED_ID_LENGTH } from '../config/constants.js';

/**
 * Generate cryptographically secure random bytes as base64url string
 */
export function generateRandomBase64Url(length: number): string {
  return randomBytes(length)
    .toString('base64')
    .replace(/\+/g, '-')
    .replace(/\//g, '_')
    .replace(/=/g, '');
}

/**
 * Generate a unique ID for basic records
 */
export function generateId(length: number = GENERATED_ID_LENGTH): string {
  return generateRandomBase64Url(length);
}
