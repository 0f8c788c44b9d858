/**
 * Capability enforcement middleware
 * Routes declare what they need; roles are mapped to capabilities in @payflow/auth
 */

import { AuthorizationError, UnauthorizedError, type Capability } from '@payflow/auth';
import type { Context, Next } from 'hono';
import type { AppBindings } from '../types/context.js';

/**
 * @example
 * ```typescript
 * route.get('/', authMiddleware, requireCapability('wallet:read'), handler);
 * ```
 */
export function requireCapability(...required: Capability[]) {
  return async (c: Context<AppBindings>, next: Next) => {
    const auth = c.get('auth');
    if (!auth) {
      throw new UnauthorizedError();
    }

    const missing = required.filter((capability) => !auth.capabilities.includes(capability));
    if (missing.length > 0) {
      await c.get('services').authEvents.emit({
        type: 'token.capability_denied',
        userId: auth.userId,
        metadata: {
          endpoint: c.req.path,
          method: c.req.method,
          requiredCapabilities: missing,
          role: auth.role,
          requestId: c.get('requestId'),
        },
      });
      throw new AuthorizationError(`Missing capability: ${missing.join(', ')}`);
    }

    await next();
  };
}
