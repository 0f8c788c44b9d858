import {
  capabilitiesForRole,
  InactiveUserError,
  UnauthorizedError,
  verifyAccessToken,
  type AccessTokenClaims,
} from '@payflow/auth';
import type { Context, Next } from 'hono';
import { resolveClientIp } from '../lib/client-ip.js';
import type { AppBindings } from '../types/context.js';

const BEARER_PATTERN = /^Bearer\s+(\S+)$/i;

function extractBearerToken(header: string | undefined): string | null {
  if (!header) {
    return null;
  }
  return BEARER_PATTERN.exec(header.trim())?.[1] ?? null;
}

/**
 * Bearer token authentication
 *
 * Verifies the access token, loads the user and rejects suspended accounts
 * before any route handler runs. Sets `userId` and `auth` on the context.
 */
export async function authMiddleware(c: Context<AppBindings>, next: Next) {
  const services = c.get('services');
  const token = extractBearerToken(c.req.header('authorization'));

  if (!token) {
    throw new UnauthorizedError('Missing bearer token');
  }

  let claims: AccessTokenClaims;
  try {
    claims = await verifyAccessToken(c.get('config').accessToken, token);
  } catch (error) {
    await services.authEvents.emit({
      type: 'token.auth_failed',
      ip: resolveClientIp(c),
      metadata: {
        reason: error instanceof Error ? error.message : 'unknown',
        requestId: c.get('requestId'),
      },
    });
    throw error;
  }

  const user = await services.users.findById(claims.sub);
  if (!user) {
    throw new UnauthorizedError('User no longer exists');
  }
  if (user.status !== 'active') {
    throw new InactiveUserError();
  }

  c.set('userId', user.id);
  c.set('auth', {
    userId: user.id,
    email: user.email,
    role: user.role,
    capabilities: capabilitiesForRole(user.role),
    jti: claims.jti,
  });

  await next();
}
