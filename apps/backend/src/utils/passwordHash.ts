/**
 * Salted one-way password digests (PBKDF2).
 *
 * Stored credentials have the form `<iterations>:<saltHex>:<digestHex>`, so a
 * digest keeps verifying after the configured iteration count changes.
 */

import crypto from 'crypto';
import { config } from '../config/default.ts';
import { PASSWORD_HASHING } from '../constants.ts';

const ITERATIONS_PATTERN = /^[1-9][0-9]*$/;

function deriveKey(password: string, salt: string, iterations: number): Buffer {
  return crypto.pbkdf2Sync(
    password,
    salt,
    iterations,
    PASSWORD_HASHING.KEY_LENGTH_BYTES,
    PASSWORD_HASHING.DIGEST,
  );
}

/**
 * Hash a plaintext password with a fresh random salt.
 */
export function hashPassword(
  password: string,
  iterations: number = config.security.passwordHashIterations,
): string {
  const salt = crypto
    .randomBytes(PASSWORD_HASHING.SALT_LENGTH_BYTES)
    .toString('hex');
  const digest = deriveKey(password, salt, iterations);
  return `${iterations}:${salt}:${digest.toString('hex')}`;
}

/**
 * Recompute the digest with the stored salt and iteration count and compare
 * in constant time. Malformed stored credentials never verify.
 */
export function verifyPassword(password: string, storedHash: string): boolean {
  const parts = storedHash.split(':');
  if (parts.length !== 3) return false;

  const [iterationsText, salt, digestHex] = parts;
  if (!iterationsText || !salt || !digestHex) return false;
  if (!ITERATIONS_PATTERN.test(iterationsText)) return false;

  const expected = Buffer.from(digestHex, 'hex');
  if (expected.length !== PASSWORD_HASHING.KEY_LENGTH_BYTES) return false;

  const actual = deriveKey(password, salt, Number(iterationsText));
  return crypto.timingSafeEqual(actual, expected);
}
