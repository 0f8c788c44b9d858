/**
 * Authentication constants
 * Single source of truth for auth configuration
 */

// Access tokens
export const ACCESS_TOKEN_ALGORITHM = 'HS256';
export const ACCESS_TOKEN_TTL_SECONDS = 60 * 60; // 1 hour
export const DEFAULT_TOKEN_ISSUER = 'payflow-api';
export const DEFAULT_TOKEN_AUDIENCE = 'payflow-clients';
export const MIN_JWT_SECRET_LENGTH = 32;

// Clock skew tolerance for token validation
export const CLOCK_SKEW_TOLERANCE_SECONDS = 60;

// Password hashing (scrypt)
export const SCRYPT_COST = 16384;
export const SCRYPT_KEY_LENGTH = 64;
export const SCRYPT_SALT_BYTES = 16;
