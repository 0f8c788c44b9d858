/**
 * Password hashing and verification utilities
 * Uses Node's built-in scrypt for password storage (no native addons needed)
 */
import { randomBytes, scrypt, timingSafeEqual } from 'node:crypto';
import { SCRYPT_COST, SCRYPT_KEY_LENGTH, SCRYPT_SALT_BYTES } from './constants.js';

function deriveKey(password: string, salt: Buffer, keyLength: number, cost: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(password, salt, keyLength, { N: cost }, (error, derivedKey) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(derivedKey);
    });
  });
}

/**
 * Hash a password using scrypt
 * @returns `scrypt$<cost>$<salt>$<key>` with base64 salt and key
 */
export async function hashPassword(password: string): Promise<string> {
  const salt = randomBytes(SCRYPT_SALT_BYTES);
  const derivedKey = await deriveKey(password, salt, SCRYPT_KEY_LENGTH, SCRYPT_COST);
  return `scrypt$${SCRYPT_COST}$${salt.toString('base64')}$${derivedKey.toString('base64')}`;
}

/**
 * Verify a password against a scrypt hash
 * Uses constant-time comparison to prevent timing attacks
 */
export async function verifyPassword(password: string, hashedPassword: string): Promise<boolean> {
  const [scheme, costStr, saltB64, keyB64, ...rest] = hashedPassword.split('$');
  if (scheme !== 'scrypt' || !costStr || !saltB64 || !keyB64 || rest.length > 0) {
    return false;
  }

  const cost = Number.parseInt(costStr, 10);
  if (!Number.isInteger(cost) || cost < 2) {
    return false;
  }

  const salt = Buffer.from(saltB64, 'base64');
  const storedKey = Buffer.from(keyB64, 'base64');
  if (storedKey.length === 0) {
    return false;
  }

  const derivedKey = await deriveKey(password, salt, storedKey.length, cost);
  return timingSafeEqual(storedKey, derivedKey);
}
