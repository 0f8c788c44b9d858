/**
 * @payflow/auth
 *
 * Authentication primitives for payflow
 * - Password hashing/verification
 * - Access token signing and verification
 * - Role to capability mapping
 * - Auth events for audit logging
 */

// Password utilities
export { hashPassword, verifyPassword } from './password.js';

// Access tokens
export { signAccessToken, verifyAccessToken } from './access-token.js';
export type { AccessTokenClaims, AccessTokenConfig, IssuedAccessToken } from './access-token.js';

// Capabilities
export {
  CAPABILITIES,
  ROLES,
  ROLE_CAPABILITIES,
  capabilitiesForRole,
} from './capabilities.js';
export type { Capability, Role } from './capabilities.js';

// Errors
export { AuthError, AuthorizationError, InactiveUserError, UnauthorizedError } from './errors.js';

// Events
export { AuthEventEmitter, authEvents } from './events.js';
export type {
  AuthEvent,
  AuthEventHandler,
  AuthEventType,
  TokenCapabilityDeniedEvent,
  UserStatusChangedEvent,
} from './events.js';

// Constants
export {
  ACCESS_TOKEN_ALGORITHM,
  ACCESS_TOKEN_TTL_SECONDS,
  CLOCK_SKEW_TOLERANCE_SECONDS,
  DEFAULT_TOKEN_AUDIENCE,
  DEFAULT_TOKEN_ISSUER,
  MIN_JWT_SECRET_LENGTH,
} from './constants.js';
