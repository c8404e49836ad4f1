// Unsubscribe token utilities
import { createHmac, randomBytes, timingSafeEqual } from 'crypto';

/**
 * Derives the unsubscribe token for an address: base64url HMAC-SHA256, no padding
 */
export function generateToken(email: string, secret: string): string {
  return createHmac('sha256', secret).update(email, 'utf8').digest('base64url');
}

/**
 * Checks a token against the one derived for the address
 */
export function verifyToken(email: string, token: string, secret: string): boolean {
  const expected = Buffer.from(generateToken(email, secret), 'utf8');
  const actual = Buffer.from(token, 'utf8');

  if (expected.length !== actual.length) {
    return false;
  }

  return timingSafeEqual(expected, actual);
}

/**
 * Random base64url token of `size` bytes
 */
export function generateRandomToken(size: number = 32): string {
  return randomBytes(size).toString('base64url');
}
